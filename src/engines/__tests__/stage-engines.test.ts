import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ScrapeEngine } from '../scrape-engine.js';
import { DeduplicateEngine } from '../deduplicate-engine.js';
import { ClassifyEngine } from '../classify-engine.js';
import { ExtractEngine } from '../extract-engine.js';
import { StageRunner } from '../stage-runner.js';
import { RunFolderManager } from '../../lib/run-folder-manager.js';
import { SeenUrlStore, SEEN_URLS_FILENAME } from '../../lib/seen-url-store.js';
import { ExtractionCache, GRANT_CACHE_FILENAME } from '../../lib/extraction-cache.js';
import { CLASSIFIED_LINKS } from '../../lib/artifacts.js';
import { readArtifact, writeArtifact } from '../../providers/stage-files.js';
import {
  DeduplicatedLinksSchema,
  ExtractedGrantsSchema,
  type ClassifiedLink,
  type DeduplicatedLink,
  type GrantDetails,
  type SiteLinks
} from '../../types/grant.js';
import type { GrantExtractor, LinkClassifier, LinkSource } from '../../types/collaborators.js';
import type { RunHandle } from '../../types/run.js';
import { HistoryStoreCorrupt } from '../../utils/errors.js';

class StaticLinkSource implements LinkSource {
  readonly name = 'static';

  constructor(private readonly links: Record<string, SiteLinks>) {}

  async collectLinks(): Promise<Record<string, SiteLinks>> {
    return this.links;
  }
}

describe('stage engines', () => {
  let dataDir: string;
  let runs: RunFolderManager;
  let runner: StageRunner;
  let run: RunHandle;
  const now = () => new Date(2026, 2, 10, 9, 0, 0);

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'engines-test-'));
    runs = new RunFolderManager({ dataDir, now });
    runner = new StageRunner(runs, now);
    run = { kind: 'override', date: null, root: join(dataDir, 'manual') };
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe('ScrapeEngine', () => {
    const source = new StaticLinkSource({
      'https://www.funder.example': { 'https://funder.example/call/1': 'Ocean call' }
    });

    test('should write one links file per site and record the new URLs', async () => {
      const seenUrls = new SeenUrlStore({ path: join(dataDir, SEEN_URLS_FILENAME), now });

      const { result } = await runner.runStage(new ScrapeEngine(source, seenUrls), { run });

      expect(result.outputs).toEqual([join(run.root, '01_scrape', 'funder.example_links.json')]);
      expect(JSON.parse(await readFile(result.outputs[0], 'utf-8'))).toEqual({
        'https://funder.example/call/1': 'Ocean call'
      });
      expect(result.urlsRecorded).toBe(1);
      expect(await seenUrls.isSeen('https://funder.example/call/1')).toBe(true);
    });

    test('should continue without history when the seen-URL store is corrupt', async () => {
      const path = join(dataDir, SEEN_URLS_FILENAME);
      await writeFile(path, '{ broken');

      const { result } = await runner.runStage(new ScrapeEngine(source, new SeenUrlStore({ path, now })), { run });

      expect(result).toMatchObject({ degraded: true, newUrls: 1, urlsRecorded: 0 });
      expect(result.summary).toBe('1 sites, 1 new URLs (seen-URL history unavailable)');
      expect(await readFile(path, 'utf-8')).toBe('{ broken');
    });

    test('should fail on a corrupt store with strict history', async () => {
      const path = join(dataDir, SEEN_URLS_FILENAME);
      await writeFile(path, '{ broken');
      const engine = new ScrapeEngine(source, new SeenUrlStore({ path, now }), { strictHistory: true });

      await expect(runner.runStage(engine, { run })).rejects.toBeInstanceOf(HistoryStoreCorrupt);
    });
  });

  describe('DeduplicateEngine', () => {
    test('should merge equivalent URLs across sites', async () => {
      const scrapeDir = runs.stagePath(run, 'scrape');
      await writeArtifact(scrapeDir, 'a.example_links.json', {
        'https://grants.example/x#top': null,
        'https://grants.example/y': 'Y'
      });
      await writeArtifact(scrapeDir, 'b.example_links.json', { 'https://GRANTS.example/x/': 'X' });

      const { result } = await runner.runStage(new DeduplicateEngine(), { run });

      const output = await readArtifact(result.outputs[0], DeduplicatedLinksSchema);
      expect(output.links).toEqual([
        { url: 'https://grants.example/x#top', text: 'X', sites: ['a.example', 'b.example'] },
        { url: 'https://grants.example/y', text: 'Y', sites: ['a.example'] }
      ]);
      expect(output.stats).toEqual({
        totalSites: 2,
        totalLinksBefore: 3,
        uniqueLinks: 2,
        duplicatesRemoved: 1,
        deduplicationRate: 33.33
      });
    });
  });

  describe('ClassifyEngine', () => {
    test('should keep only relevant links that came from the input', async () => {
      await writeArtifact(runs.stagePath(run, 'deduplicate'), 'deduplicated_links_20260310_080000.json', {
        processingDate: '2026-03-10',
        links: [
          { url: 'https://grants.example/x', text: 'X', sites: ['a'] },
          { url: 'https://grants.example/news', text: 'News', sites: ['a'] }
        ],
        stats: { totalSites: 1, totalLinksBefore: 2, uniqueLinks: 2, duplicatesRemoved: 0, deduplicationRate: 0 }
      });
      const classifier: LinkClassifier = {
        name: 'stub',
        classify: async (links: DeduplicatedLink[]): Promise<ClassifiedLink[]> => [
          ...links.map(link => ({ url: link.url, text: link.text, relevant: link.text === 'X' })),
          { url: 'https://invented.example', text: null, relevant: true }
        ]
      };

      const { result } = await runner.runStage(new ClassifyEngine(classifier), { run });

      expect(result.summary).toBe('1 of 2 links classified as grants');
    });
  });

  describe('ExtractEngine', () => {
    const links: ClassifiedLink[] = [
      { url: 'https://grants.example/ok', text: 'Ok grant', relevant: true },
      { url: 'https://grants.example/broken', text: 'Broken grant', relevant: true }
    ];

    const extractor: GrantExtractor = {
      name: 'stub',
      extract: async (url: string): Promise<GrantDetails> => {
        if (url.endsWith('/broken')) {
          throw new Error('timeout');
        }
        return { title: 'Ok grant details', deadline: '2026-06-01' };
      }
    };

    beforeEach(async () => {
      await writeArtifact(runs.stagePath(run, 'classify'), CLASSIFIED_LINKS.filename(now()), {
        processingDate: '2026-03-10',
        totalLinks: 2,
        relevantLinks: 2,
        links
      });
    });

    test('should keep failed pages with their link text and cache only successes', async () => {
      const cache = new ExtractionCache({ path: join(dataDir, GRANT_CACHE_FILENAME), now });

      const { result } = await runner.runStage(new ExtractEngine(extractor, cache, { concurrency: 2 }), { run });

      const output = await readArtifact(result.outputs[0], ExtractedGrantsSchema);
      expect(output.grants.map(g => [g.url, g.title, g.extractionSuccess, g.error])).toEqual([
        ['https://grants.example/ok', 'Ok grant details', true, null],
        ['https://grants.example/broken', 'Broken grant', false, 'timeout']
      ]);
      expect(output.stats).toEqual({ total: 2, extractionSuccess: 1, extractionFailed: 1, fromCache: 0 });
      expect(cache.stats().itemCount).toBe(1);
    });

    test('should serve cached pages on the next run unless refreshing', async () => {
      const cache = new ExtractionCache({ path: join(dataDir, GRANT_CACHE_FILENAME), now });
      await runner.runStage(new ExtractEngine(extractor, cache), { run });

      const cached = await runner.runStage(new ExtractEngine(extractor, cache), { run });
      expect(cached.result.summary).toBe('1/2 grants extracted (1 from cache)');

      const refreshed = await runner.runStage(new ExtractEngine(extractor, cache, { forceRefresh: true }), { run });
      expect(refreshed.result.fromCache).toBe(0);
    });
  });

  test('should clean the stage folder before an engine runs', async () => {
    const scrapeDir = runs.stagePath(run, 'scrape');
    await writeArtifact(scrapeDir, 'stale.example_links.json', {});
    const seenUrls = new SeenUrlStore({ path: join(dataDir, SEEN_URLS_FILENAME), now });

    await runner.runStage(new ScrapeEngine(new StaticLinkSource({}), seenUrls), { run });

    expect(await readdir(scrapeDir)).toEqual([]);
  });
});
