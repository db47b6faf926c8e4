#!/usr/bin/env node

/**
 * CLI for the grant digest pipeline
 * Usage:
 *   npm run grants <stage> [options]     # Run one stage (scrape ... build-digest)
 *   npm run grants send [options]        # Send the newest digest
 *   npm run pipeline [options]           # All stages against today's run, then send
 *   npm run grants runs                  # Show run status
 *   npm run grants history               # Delivery and seen-URL statistics
 */

import { existsSync } from 'fs';
import { loadConfig, type TrackerConfig } from '../src/lib/config.js';
import { DeliveryHistoryStore } from '../src/lib/delivery-history.js';
import { createDefaultServices } from '../src/engines/default-services.js';
import { runPipeline, runSend, runStage, type PipelineFlags } from '../src/engines/pipeline.js';
import type { SendResult } from '../src/engines/send-engine.js';
import { isStageName, type StageName } from '../src/types/stage.js';
import { logger } from '../src/utils/logger.js';
import { parseArgs, type CliOptions } from '../src/utils/cli-args.js';
import {
  EXIT_FAILURE,
  EXIT_OK,
  describeFailure,
  exitCodeFor,
  installGlobalErrorHandlers
} from '../src/utils/error-handlers.js';

installGlobalErrorHandlers();

// Without a .env file the environment is used as is
if (existsSync('.env')) {
  process.loadEnvFile('.env');
}

const log = logger.createContext('grants-cli');

function printUsage(): void {
  console.log('Usage:');
  console.log('  npm run grants <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  scrape | deduplicate | classify | extract | match-keywords | build-digest');
  console.log('                            Run one stage in the current run');
  console.log('  send                      Send the newest digest across all runs');
  console.log('  pipeline                  Run every stage against today\'s run, then send');
  console.log('  runs                      Show the status of every run');
  console.log('  history                   Delivery history and seen-URL statistics');
  console.log('');
  console.log('Options:');
  console.log('  --retry-failed            Include grants whose extraction failed');
  console.log('  --include-expired         Include grants whose deadline has passed');
  console.log('  --include-sent            Include grants already delivered to the recipient');
  console.log('  --ignore-history          Keep URLs seen in earlier runs (scrape)');
  console.log('  --strict-history          Fail when the seen-URL store is unreadable (scrape)');
  console.log('  --dry-run                 Log mail instead of sending; record nothing');
  console.log('  --to a@x.com,b@y.com      Test mode: send every digest to these addresses only');
  console.log('  --skip-send               Stop the pipeline after build-digest');
  console.log('  --run-dir <path>          Write into this directory instead of a dated run (not tracked)');
  console.log('  --log-level <level>       quiet | normal | verbose | debug');
}

function toFlags(options: CliOptions): PipelineFlags {
  return {
    includeSent: options.includeSent,
    retryFailed: options.retryFailed,
    includeExpired: options.includeExpired,
    ignoreHistory: options.ignoreHistory,
    strictHistory: options.strictHistory,
    dryRun: options.dryRun,
    testRecipients: options.to,
    skipSend: options.skipSend,
    overrideDir: options.runDir
  };
}

function printSend(result: SendResult): void {
  console.log(`\nDigest: ${result.digestPath}`);
  console.log(`Mode: ${result.report.mode}`);
  console.log(`Sent: ${result.report.delivered}`);
  console.log(`Failed: ${result.report.failed}`);
  console.log(`Skipped: ${result.report.skippedEmpty + result.report.skippedAlreadySent}`);
  console.log(`Report: ${result.reportPath}`);
  for (const failure of result.report.results.filter(r => r.outcome === 'failed')) {
    console.log(`  ${failure.recipientId}: ${failure.error}`);
  }
}

async function runStageCommand(stage: StageName, config: TrackerConfig, flags: PipelineFlags): Promise<boolean> {
  const { run, result } = await runStage(stage, createDefaultServices(config), flags);
  console.log(`\n${stage}: ${result.summary}`);
  console.log(`Run: ${run.kind === 'tracked' ? run.date : `${run.root} (untracked)`}`);
  for (const output of result.outputs) {
    console.log(`  ${output}`);
  }
  return true;
}

async function runSendCommand(config: TrackerConfig, flags: PipelineFlags): Promise<boolean> {
  const result = await runSend(createDefaultServices(config), flags);
  printSend(result);
  return result.report.failed === 0;
}

async function runPipelineCommand(config: TrackerConfig, flags: PipelineFlags): Promise<boolean> {
  const result = await runPipeline(createDefaultServices(config), flags);
  console.log(`\nRun: ${result.run.kind === 'tracked' ? result.run.date : result.run.root}`);
  for (const stage of result.stages) {
    console.log(`  ${stage.result.summary}`);
  }
  if (result.send) {
    printSend(result.send);
    return result.send.report.failed === 0;
  }
  return true;
}

async function showRuns(config: TrackerConfig): Promise<boolean> {
  const { runs } = createDefaultServices(config);
  for (const line of await runs.summary()) {
    console.log(line);
  }
  return true;
}

async function showHistory(config: TrackerConfig): Promise<boolean> {
  const services = createDefaultServices(config);
  const history = await DeliveryHistoryStore.open({ path: config.paths.deliveryHistory, readOnly: true });
  const delivery = history.stats();
  const seen = await services.seenUrls.stats();

  console.log(`Delivery history: ${history.path}`);
  console.log(`  Records: ${delivery.recordCount}`);
  console.log(`  Grants: ${delivery.distinctGrantCount}`);
  console.log(`  Recipients: ${delivery.distinctRecipientCount}`);
  console.log(`  Last updated: ${delivery.lastUpdated ?? 'never'}`);
  console.log(`Seen URLs: ${services.seenUrls.path}`);
  console.log(`  Total: ${seen.totalSeen}`);
  console.log(`  First seen: ${seen.firstSeenAt ?? 'n/a'}`);
  console.log(`  Last seen: ${seen.lastSeenAt ?? 'n/a'}`);
  return true;
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    printUsage();
    return EXIT_FAILURE;
  }

  const { command, options, unknown } = parseArgs(args);
  const scope = command ?? 'grants';

  try {
    const config = loadConfig();
    logger.setLevel(options.logLevel ?? config.logLevel);

    if (unknown.length > 0) {
      log.error(`Ignoring unknown arguments: ${unknown.join(' ')}`);
    }

    const flags = toFlags(options);
    let success: boolean;

    if (command && isStageName(command)) {
      success = await runStageCommand(command, config, flags);
    } else {
      switch (command) {
        case 'send':
          success = await runSendCommand(config, flags);
          break;
        case 'pipeline':
          success = await runPipelineCommand(config, flags);
          break;
        case 'runs':
          success = await showRuns(config);
          break;
        case 'history':
          success = await showHistory(config);
          break;
        default:
          console.error(`Unknown command: ${command}`);
          console.log('Use "npm run grants" to see available commands');
          return EXIT_FAILURE;
      }
    }

    return success ? EXIT_OK : EXIT_FAILURE;
  } catch (error) {
    log.error(describeFailure(scope, error));
    log.debug('Stack:', error);
    return exitCodeFor(error);
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error(describeFailure('grants', error));
    process.exitCode = exitCodeFor(error);
  }
);
