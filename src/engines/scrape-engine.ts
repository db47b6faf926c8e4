import type { LinkSource } from '../types/collaborators.js';
import type { SiteLinks } from '../types/grant.js';
import type { SeenUrlStore } from '../lib/seen-url-store.js';
import { siteLinksFilename } from '../lib/artifacts.js';
import { writeArtifact } from '../providers/stage-files.js';
import { HistoryStoreCorrupt } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('scrape-engine');

export interface ScrapeOptions {
  /** Keep URLs seen in earlier runs */
  ignoreHistory?: boolean;
  /** Fail instead of running without history when the seen-URL store is unreadable */
  strictHistory?: boolean;
}

export interface ScrapeResult extends StageOutcome {
  sitesProcessed: number;
  totalUrls: number;
  newUrls: number;
  alreadySeen: number;
  urlsRecorded: number;
  /** The seen-URL store could not be read and was bypassed */
  degraded: boolean;
}

export class ScrapeEngine implements StageEngine<ScrapeResult> {
  readonly stage = 'scrape';

  constructor(
    private readonly source: LinkSource,
    private readonly seenUrls: SeenUrlStore,
    private readonly options: ScrapeOptions = {}
  ) {}

  async run(context: StageContext): Promise<ScrapeResult> {
    const degraded = await this.loadHistory();
    const ignoreHistory = degraded || (this.options.ignoreHistory ?? false);

    const linksBySite = await this.source.collectLinks();
    const outputs: string[] = [];
    const kept: string[] = [];
    let totalUrls = 0;
    let alreadySeen = 0;

    for (const site of Object.keys(linksBySite).sort()) {
      const links = linksBySite[site];
      const urls = Object.keys(links);
      totalUrls += urls.length;

      const unseen = await this.seenUrls.filterUnseen(urls, { ignoreHistory });
      alreadySeen += unseen.alreadySeenCount;

      const siteLinks: SiteLinks = {};
      for (const url of unseen.newUrls) {
        siteLinks[url] = links[url];
      }
      kept.push(...unseen.newUrls);

      outputs.push(await writeArtifact(context.stageDir, siteLinksFilename(site), siteLinks));
      log.verbose(`${site}: ${unseen.newUrls.length} new of ${urls.length} links`);
    }

    // A degraded run must not write history it could not read
    const urlsRecorded = degraded ? 0 : await this.seenUrls.recordSeen(kept);

    const newUrls = new Set(kept).size;
    return {
      outputs,
      sitesProcessed: outputs.length,
      totalUrls,
      newUrls,
      alreadySeen,
      urlsRecorded,
      degraded,
      summary:
        `${outputs.length} sites, ${newUrls} new URLs` +
        (alreadySeen > 0 ? `, ${alreadySeen} already seen` : '') +
        (degraded ? ' (seen-URL history unavailable)' : '')
    };
  }

  private async loadHistory(): Promise<boolean> {
    try {
      await this.seenUrls.load();
      return false;
    } catch (error) {
      if (!(error instanceof HistoryStoreCorrupt) || this.options.strictHistory) {
        throw error;
      }
      log.error(`${error.message}`);
      log.error('Continuing without seen-URL history: every URL is treated as new and none are recorded');
      return true;
    }
  }
}
