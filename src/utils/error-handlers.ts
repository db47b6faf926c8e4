import { logger } from './logger.js';
import { errorMessage, isTrackerError } from './errors.js';

const log = logger.createContext('error-handlers');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_MISSING_PREREQUISITE = 2;
export const EXIT_AMBIGUOUS_RUN_STATE = 3;

/**
 * Install global process error handlers.
 * This should be called once at application startup
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    // A stray rejection means some stage outcome was never observed; fail the process
    log.error('Unhandled Promise Rejection:', reason);
    process.exitCode = exitCodeFor(reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    log.error('FATAL: Uncaught Exception:', err);
    log.error(`Origin: ${origin}`);
    // Must exit - the process is in an undefined state
    process.exit(exitCodeFor(err));
  });

  log.debug('Global error handlers installed');
}

/**
 * Process exit status for an error that reached the CLI.
 */
export function exitCodeFor(error: unknown): number {
  if (!isTrackerError(error)) {
    return EXIT_FAILURE;
  }
  switch (error.code) {
    case 'MISSING_PREREQUISITE_STAGE':
      return EXIT_MISSING_PREREQUISITE;
    case 'AMBIGUOUS_RUN_STATE':
      return EXIT_AMBIGUOUS_RUN_STATE;
    default:
      return EXIT_FAILURE;
  }
}

/**
 * One-line message for the CLI, scoped to the command that failed.
 */
export function describeFailure(scope: string, error: unknown): string {
  const kind = isTrackerError(error) ? `${error.code}: ` : '';
  return `${scope} failed: ${kind}${errorMessage(error)}`;
}
