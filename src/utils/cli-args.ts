import { LogLevel, parseLogLevel } from './logger.js';

export interface CliOptions {
  retryFailed?: boolean;
  includeExpired?: boolean;
  includeSent?: boolean;
  ignoreHistory?: boolean;
  dryRun?: boolean;
  skipSend?: boolean;
  strictHistory?: boolean;
  runDir?: string;
  /** Test-mode recipients */
  to?: string[];
  logLevel?: LogLevel;
}

export interface ParsedArgs {
  command: string | undefined;
  options: CliOptions;
  /** Arguments that were not recognised */
  unknown: string[];
}

const BOOLEAN_FLAGS = {
  '--retry-failed': 'retryFailed',
  '--include-expired': 'includeExpired',
  '--include-sent': 'includeSent',
  '--ignore-history': 'ignoreHistory',
  '--dry-run': 'dryRun',
  '--skip-send': 'skipSend',
  '--strict-history': 'strictHistory'
} as const satisfies Record<string, keyof CliOptions>;

type BooleanFlag = keyof typeof BOOLEAN_FLAGS;

function isBooleanFlag(arg: string): arg is BooleanFlag {
  return Object.hasOwn(BOOLEAN_FLAGS, arg);
}

const splitList = (value: string): string[] =>
  value.split(',').map(s => s.trim()).filter(s => s.length > 0);

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --dry-run) don't take values.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0];
  const options: CliOptions = {};
  const unknown: string[] = [];

  // Value flags accept both forms; returns the value and advances past it when separate
  const valueOf = (flag: string, i: number): { value: string; next: number } | null => {
    const arg = args[i];
    if (arg.startsWith(`${flag}=`)) {
      return { value: arg.slice(flag.length + 1), next: i };
    }
    if (arg === flag && i + 1 < args.length) {
      return { value: args[i + 1], next: i + 1 };
    }
    return null;
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (isBooleanFlag(arg)) {
      options[BOOLEAN_FLAGS[arg]] = true;
      continue;
    }

    const runDir = valueOf('--run-dir', i);
    if (runDir) {
      options.runDir = runDir.value;
      i = runDir.next;
      continue;
    }

    const to = valueOf('--to', i);
    if (to) {
      options.to = splitList(to.value);
      i = to.next;
      continue;
    }

    const logLevel = valueOf('--log-level', i);
    if (logLevel) {
      options.logLevel = parseLogLevel(logLevel.value);
      i = logLevel.next;
      continue;
    }

    unknown.push(arg);
  }

  return { command, options, unknown };
}
