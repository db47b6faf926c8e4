import { policyFromFlags, type FilterFlags } from '../lib/candidate-filter.js';
import { DeliveryHistoryStore } from '../lib/delivery-history.js';
import type { ExtractionCache } from '../lib/extraction-cache.js';
import type { KeywordMatcher } from '../lib/keyword-matcher.js';
import type { RunFolderManager } from '../lib/run-folder-manager.js';
import type { SeenUrlStore } from '../lib/seen-url-store.js';
import type {
  DigestRenderer,
  GrantExtractor,
  LinkClassifier,
  LinkSource,
  MailTransport
} from '../types/collaborators.js';
import type { RunHandle } from '../types/run.js';
import { STAGE_NAMES, type StageName } from '../types/stage.js';
import { logger } from '../utils/logger.js';
import { ClassifyEngine } from './classify-engine.js';
import { DeduplicateEngine } from './deduplicate-engine.js';
import { DigestEngine } from './digest-engine.js';
import { ExtractEngine } from './extract-engine.js';
import { MatchEngine } from './match-engine.js';
import { ScrapeEngine } from './scrape-engine.js';
import { SendEngine, type SendResult } from './send-engine.js';
import { StageRunner, type StageRunResult } from './stage-runner.js';
import type { StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('pipeline');

/** Stores and collaborators the stages run against. */
export interface PipelineServices {
  runs: RunFolderManager;
  seenUrls: SeenUrlStore;
  extractionCache: ExtractionCache;
  deliveryHistoryPath: string;
  linkSource: LinkSource;
  classifier: LinkClassifier;
  extractor: GrantExtractor;
  loadKeywords: () => Promise<KeywordMatcher>;
  renderer: DigestRenderer;
  /** Transport for a real send, or a logging one for dry runs */
  transportFor: (dryRun: boolean) => MailTransport;
  sendReportsDir: string;
  adminEmail: string | null;
  now: () => Date;
}

export interface PipelineFlags extends FilterFlags {
  ignoreHistory?: boolean;
  strictHistory?: boolean;
  dryRun?: boolean;
  testRecipients?: string[];
  skipSend?: boolean;
  overrideDir?: string;
}

export async function createStageEngine(
  stage: StageName,
  services: PipelineServices,
  flags: PipelineFlags = {}
): Promise<StageEngine<StageOutcome>> {
  switch (stage) {
    case 'scrape':
      return new ScrapeEngine(services.linkSource, services.seenUrls, {
        ignoreHistory: flags.ignoreHistory,
        strictHistory: flags.strictHistory
      });
    case 'deduplicate':
      return new DeduplicateEngine();
    case 'classify':
      return new ClassifyEngine(services.classifier);
    case 'extract':
      return new ExtractEngine(services.extractor, services.extractionCache);
    case 'match-keywords': {
      const matcher = await services.loadKeywords();
      // Matching only reads the history; a corrupt store is fatal here
      const history = await DeliveryHistoryStore.open({
        path: services.deliveryHistoryPath,
        readOnly: true,
        now: services.now
      });
      return new MatchEngine(matcher, history, policyFromFlags(flags));
    }
    case 'build-digest':
      return new DigestEngine(services.renderer);
  }
}

export async function runStage(
  stage: StageName,
  services: PipelineServices,
  flags: PipelineFlags = {}
): Promise<StageRunResult<StageOutcome>> {
  const runner = new StageRunner(services.runs, services.now);
  const engine = await createStageEngine(stage, services, flags);
  return runner.runStage(engine, { mode: 'stage', overrideDir: flags.overrideDir });
}

export async function runSend(
  services: PipelineServices,
  flags: PipelineFlags = {},
  digestPath?: string
): Promise<SendResult> {
  const testRecipients = flags.testRecipients ?? [];
  // Only a live send may write delivery records
  const readOnly = (flags.dryRun ?? false) || testRecipients.length > 0;
  const history = await DeliveryHistoryStore.open({
    path: services.deliveryHistoryPath,
    readOnly,
    now: services.now
  });

  const engine = new SendEngine(
    {
      runs: services.runs,
      history,
      transport: services.transportFor(flags.dryRun ?? false),
      reportsDir: services.sendReportsDir,
      adminEmail: services.adminEmail,
      now: services.now
    },
    { dryRun: flags.dryRun, testRecipients, digestPath }
  );
  return engine.send();
}

export interface PipelineResult {
  run: RunHandle;
  stages: StageRunResult<StageOutcome>[];
  send: SendResult | null;
}

/**
 * Every stage against one run resolved in pipeline mode, then send the digest it built.
 */
export async function runPipeline(services: PipelineServices, flags: PipelineFlags = {}): Promise<PipelineResult> {
  const runner = new StageRunner(services.runs, services.now);
  const run = await services.runs.resolveRunForStage('scrape', {
    mode: 'pipeline',
    overrideDir: flags.overrideDir
  });

  const stages: StageRunResult<StageOutcome>[] = [];
  for (const stage of STAGE_NAMES) {
    const engine = await createStageEngine(stage, services, flags);
    stages.push(await runner.runStage(engine, { run }));
  }

  if (flags.skipSend) {
    log.normal('Skipping send (--skip-send)');
    return { run, stages, send: null };
  }

  const digestPath = stages[stages.length - 1]?.result.outputs[0];
  const send = await runSend(services, flags, digestPath);
  return { run, stages, send };
}
