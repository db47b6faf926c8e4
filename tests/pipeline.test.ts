import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runPipeline, runSend, runStage, type PipelineServices } from '../src/engines/pipeline.js';
import { DeliveryHistoryStore, DELIVERY_HISTORY_FILENAME } from '../src/lib/delivery-history.js';
import { ExtractionCache, GRANT_CACHE_FILENAME } from '../src/lib/extraction-cache.js';
import { KeywordMatcher } from '../src/lib/keyword-matcher.js';
import { RunFolderManager } from '../src/lib/run-folder-manager.js';
import { SeenUrlStore, SEEN_URLS_FILENAME } from '../src/lib/seen-url-store.js';
import { AcceptAllClassifier } from '../src/providers/accept-all-classifier.js';
import { LogTransport } from '../src/providers/log-transport.js';
import { PlainTextDigestRenderer } from '../src/providers/plain-text-renderer.js';
import { readArtifact } from '../src/providers/stage-files.js';
import { mkGrantId } from '../src/core/utils/url-utils.js';
import { MatchOutputSchema } from '../src/types/digest.js';
import { SendReportSchema } from '../src/types/send.js';
import type {
  GrantExtractor,
  LinkSource,
  MailMessage,
  MailReceipt,
  MailTransport
} from '../src/types/collaborators.js';
import type { GrantDetails, SiteLinks } from '../src/types/grant.js';
import { MissingPrerequisiteStage } from '../src/utils/errors.js';
import { exitCodeFor } from '../src/utils/error-handlers.js';

const OCEAN_URL = 'https://funder.example/call/1';
const CLIMATE_URL = 'https://funder.example/call/2';
const REEF_URL = 'https://other.example/grant/9';

class FakeLinkSource implements LinkSource {
  readonly name = 'fake-links';

  async collectLinks(): Promise<Record<string, SiteLinks>> {
    return {
      'other.example': {
        [`${OCEAN_URL}/`]: 'Ocean call (mirror)',
        [REEF_URL]: 'Reef restoration grant'
      },
      'funder.example': {
        [OCEAN_URL]: 'Ocean resilience call',
        [CLIMATE_URL]: 'Climate fund'
      }
    };
  }
}

class FakeExtractor implements GrantExtractor {
  readonly name = 'fake-extractor';
  readonly calls: string[] = [];

  private readonly pages: Record<string, GrantDetails> = {
    [OCEAN_URL]: {
      title: 'Ocean resilience call',
      organization: 'Sea Fund',
      abstract: 'Funding for coastal ocean research',
      deadline: '2026-04-30'
    },
    [REEF_URL]: {
      title: 'Reef restoration grant',
      abstract: 'Support for coral restoration projects',
      deadline: '15/05/2026'
    }
  };

  async extract(url: string): Promise<GrantDetails> {
    this.calls.push(url);
    const page = this.pages[url];
    if (!page) {
      throw new Error('page layout not recognised');
    }
    return page;
  }
}

class FakeTransport implements MailTransport {
  readonly name = 'fake-smtp';
  readonly sent: MailMessage[] = [];

  constructor(private readonly failFor: string[] = []) {}

  async send(message: MailMessage): Promise<MailReceipt> {
    if (this.failFor.includes(message.to)) {
      throw new Error(`mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}` };
  }
}

describe('grant digest pipeline', () => {
  let dataDir: string;
  let clock: Date;
  let extractor: FakeExtractor;
  let transport: FakeTransport;
  let dryRunTransport: LogTransport;
  let services: PipelineServices;

  const historyPath = () => join(dataDir, DELIVERY_HISTORY_FILENAME);

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'pipeline-test-'));
    clock = new Date(2026, 2, 10, 9, 0, 0);
    const now = () => clock;
    extractor = new FakeExtractor();
    transport = new FakeTransport();
    dryRunTransport = new LogTransport();

    services = {
      runs: new RunFolderManager({ dataDir, now }),
      seenUrls: new SeenUrlStore({ path: join(dataDir, SEEN_URLS_FILENAME), now }),
      extractionCache: new ExtractionCache({ path: join(dataDir, GRANT_CACHE_FILENAME), now }),
      deliveryHistoryPath: historyPath(),
      linkSource: new FakeLinkSource(),
      classifier: new AcceptAllClassifier(),
      extractor,
      loadKeywords: async () =>
        new KeywordMatcher({ 'a@x.com': ['ocean', 'climate'], 'b@x.com': ['reef'] }),
      renderer: new PlainTextDigestRenderer(),
      transportFor: dryRun => (dryRun ? dryRunTransport : transport),
      sendReportsDir: join(dataDir, 'send_reports'),
      adminEmail: 'admin@x.com',
      now
    };
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  test('should run every stage into today\'s run and deliver one digest per recipient', async () => {
    const result = await runPipeline(services);

    expect(result.run).toEqual({ kind: 'tracked', date: '20260310', root: join(dataDir, '20260310') });
    expect(result.stages.map(stage => stage.result.summary)).toEqual([
      '2 sites, 4 new URLs',
      '3 unique links from 4 across 2 sites',
      '3 of 3 links classified as grants',
      '2/3 grants extracted',
      '2 grant/recipient pairs to send to 2 recipients ' +
        '(excluded: 0 already sent, 1 failed extraction, 0 expired)',
      '2 digests, 2 grants'
    ]);
    expect((await services.runs.status(result.run)).state).toBe('complete');

    expect(transport.sent.map(message => [message.to, message.subject])).toEqual([
      ['a@x.com', 'Grant digest 2026-03-10: 1 new opportunity'],
      ['b@x.com', 'Grant digest 2026-03-10: 1 new opportunity'],
      ['admin@x.com', '[Grant digest] 2026-03-10: 2 sent, 0 failed']
    ]);
    expect(result.send?.report).toMatchObject({
      mode: 'live',
      delivered: 2,
      failed: 0,
      deliveryRecordsWritten: 2,
      adminAlert: 'sent'
    });

    const history = await DeliveryHistoryStore.open({ path: historyPath(), readOnly: true });
    expect(history.wasDelivered(mkGrantId(OCEAN_URL), 'a@x.com')).toEqual({ delivered: true, outcome: 'delivered' });
    expect(history.wasDelivered(mkGrantId(REEF_URL), 'b@x.com')).toEqual({ delivered: true, outcome: 'delivered' });
    expect(history.stats().recordCount).toBe(2);
  });

  test('should write the send report beside the data', async () => {
    const result = await runPipeline(services);
    const reportPath = result.send?.reportPath ?? '';

    expect(reportPath).toBe(join(dataDir, 'send_reports', 'send_report_20260310_090000.json'));
    const report = await readArtifact(reportPath, SendReportSchema);
    expect(report.results.map(r => [r.recipientId, r.outcome, r.messageId])).toEqual([
      ['a@x.com', 'delivered', 'msg-1'],
      ['b@x.com', 'delivered', 'msg-2']
    ]);
  });

  test('should exclude pairs already delivered when matching again', async () => {
    await runPipeline(services);

    const rerun = await runStage('match-keywords', services);

    const output = await readArtifact(rerun.result.outputs[0], MatchOutputSchema);
    expect(output.results).toEqual([]);
    expect(output.filterStats.totals).toEqual({
      recipients: 2,
      totalCandidates: 3,
      includedCount: 0,
      excluded: { already_sent: 2, failed_extraction: 1, deadline_expired: 0 }
    });
  });

  test('should send previously delivered grants again with --include-sent', async () => {
    await runPipeline(services);

    const rerun = await runStage('match-keywords', services, { includeSent: true, retryFailed: true });

    const output = await readArtifact(rerun.result.outputs[0], MatchOutputSchema);
    expect(output.results.map(grant => grant.url)).toEqual([OCEAN_URL, CLIMATE_URL, REEF_URL]);
  });

  test('should not send the same digest twice', async () => {
    await runPipeline(services);
    transport.sent.length = 0;

    const again = await runSend(services);

    expect(again.report).toMatchObject({ delivered: 0, skippedAlreadySent: 2, deliveryRecordsWritten: 0 });
    expect(transport.sent.map(message => message.to)).toEqual(['admin@x.com']);
  });

  test('should filter URLs seen by an earlier run and reuse cached extractions', async () => {
    await runPipeline(services, { skipSend: true });

    clock = new Date(2026, 2, 11, 9, 0, 0);
    const next = await runPipeline(services, { skipSend: true });

    expect(next.run.kind === 'tracked' && next.run.date).toBe('20260311');
    expect(next.stages[0].result.summary).toBe('2 sites, 0 new URLs, 4 already seen');
    expect(next.stages[5].result.summary).toBe('0 digests, 0 grants');

    const withHistoryIgnored = await runPipeline(services, { skipSend: true, ignoreHistory: true });
    expect(withHistoryIgnored.stages[3].result.summary).toBe('2/3 grants extracted (2 from cache)');
    expect(extractor.calls.filter(url => url === OCEAN_URL)).toHaveLength(1);
  });

  describe('dry run', () => {
    test('should report the same filter statistics as a real run and record nothing', async () => {
      const dry = await runPipeline(services, { dryRun: true });

      expect(dry.send?.report).toMatchObject({ mode: 'dry-run', delivered: 2, deliveryRecordsWritten: 0 });
      expect(dryRunTransport.sent.map(message => message.to)).toEqual(['a@x.com', 'b@x.com', 'admin@x.com']);
      expect(transport.sent).toEqual([]);
      await expect(stat(historyPath())).rejects.toMatchObject({ code: 'ENOENT' });

      const live = await runPipeline(services, { ignoreHistory: true });

      const dryStats = await readArtifact(dry.stages[4].result.outputs[0], MatchOutputSchema);
      const liveStats = await readArtifact(live.stages[4].result.outputs[0], MatchOutputSchema);
      expect(dryStats.filterStats).toEqual(liveStats.filterStats);
      expect((await DeliveryHistoryStore.open({ path: historyPath() })).stats().recordCount).toBe(2);
    });

    test('should leave an existing history unchanged', async () => {
      await runPipeline(services);
      const before = await readFile(historyPath(), 'utf-8');

      await runSend(services, { dryRun: true, includeSent: true });

      expect(await readFile(historyPath(), 'utf-8')).toBe(before);
    });
  });

  describe('test mode', () => {
    test('should redirect every digest and record nothing', async () => {
      await runPipeline(services, { skipSend: true });

      const result = await runSend(services, { testRecipients: ['qa@x.com', 'lead@x.com'] });

      expect(transport.sent.map(message => [message.to, message.subject])).toEqual([
        ['qa@x.com, lead@x.com', '[TEST for a@x.com] Grant digest 2026-03-10: 1 new opportunity'],
        ['qa@x.com, lead@x.com', '[TEST for b@x.com] Grant digest 2026-03-10: 1 new opportunity']
      ]);
      expect(result.report).toMatchObject({ mode: 'test', delivered: 2, adminAlert: 'skipped' });
      await expect(stat(historyPath())).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('failures', () => {
    test('should record a failed delivery without suppressing the next attempt', async () => {
      transport = new FakeTransport(['b@x.com']);

      const result = await runPipeline(services);

      expect(result.send?.report).toMatchObject({ delivered: 1, failed: 1, deliveryRecordsWritten: 2 });
      expect(result.send?.report.results[1].error).toBe('mailbox unavailable: b@x.com');
      expect(transport.sent.map(message => message.subject)).toEqual([
        'Grant digest 2026-03-10: 1 new opportunity',
        '[Grant digest] 2026-03-10: 1 sent, 1 failed'
      ]);

      const history = await DeliveryHistoryStore.open({ path: historyPath(), readOnly: true });
      expect(history.wasDelivered(mkGrantId(REEF_URL), 'b@x.com')).toEqual({ delivered: false, outcome: 'failed' });

      const rerun = await runStage('match-keywords', services);
      const output = await readArtifact(rerun.result.outputs[0], MatchOutputSchema);
      expect(output.results.map(grant => [grant.url, grant.recipients.map(r => r.recipientId)])).toEqual([
        [REEF_URL, ['b@x.com']]
      ]);
    });

    test('should refuse a stage whose prerequisites are missing', async () => {
      const attempt = runStage('classify', services);

      await expect(attempt).rejects.toBeInstanceOf(MissingPrerequisiteStage);
      await expect(runStage('classify', services).catch(exitCodeFor)).resolves.toBe(2);
    });

    test('should fail send when no digest has been built', async () => {
      await expect(runSend(services)).rejects.toThrow(
        'No email_digests_*.json found in any run; run "build-digest" first'
      );
    });
  });
});
