import { canonicalizeUrl } from '../core/utils/url-utils.js';
import { JsonDocumentStore } from '../providers/json-store.js';
import {
  SEEN_URLS_VERSION,
  SeenUrlsDocumentSchema,
  type SeenUrlStats,
  type SeenUrlsDocument,
  type UnseenResult
} from '../types/seen-urls.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('seen-urls');

export const SEEN_URLS_FILENAME = 'seen_urls.json';

export interface SeenUrlStoreOptions {
  path: string;
  now?: () => Date;
}

export interface FilterUnseenOptions {
  /** Return every input URL unfiltered */
  ignoreHistory?: boolean;
}

/**
 * Every URL the scrape stage has ever kept, with the time it was first seen.
 * The set only grows: recording a URL twice keeps its original timestamp.
 * Entries are keyed by canonical URL, so `/call/1` and `/call/1/` are one entry.
 */
export class SeenUrlStore {
  private readonly store: JsonDocumentStore<SeenUrlsDocument>;
  private readonly now: () => Date;
  private snapshot: Map<string, string> | null = null;

  constructor(options: SeenUrlStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.store = new JsonDocumentStore<SeenUrlsDocument>({
      name: 'seen URL store',
      path: options.path,
      schema: SeenUrlsDocumentSchema,
      now: this.now,
      createEmpty: nowIso => ({
        version: SEEN_URLS_VERSION,
        revision: 0,
        updatedAt: nowIso,
        seenUrls: {}
      })
    });
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * (Re)load the store from disk. Throws HistoryStoreCorrupt when it cannot be read.
   */
  async load(): Promise<void> {
    const document = await this.store.load();
    this.snapshot = new Map(Object.entries(document.seenUrls));
    log.verbose(`Loaded ${this.snapshot.size} seen URLs from ${this.path}`);
  }

  /**
   * Set difference of `urls` against the store. Does not write anything.
   */
  async filterUnseen(urls: Iterable<string>, options: FilterUnseenOptions = {}): Promise<UnseenResult> {
    const unique = [...new Set(urls)];
    if (options.ignoreHistory) {
      log.verbose(`Ignoring history: keeping all ${unique.length} URLs`);
      return { newUrls: unique, alreadySeenCount: 0 };
    }

    const seen = await this.seenUrls();
    const newUrls = unique.filter(url => !seen.has(canonicalizeUrl(url)));
    const alreadySeenCount = unique.length - newUrls.length;

    if (alreadySeenCount > 0) {
      log.normal(`Filtered out ${alreadySeenCount} previously seen URLs, ${newUrls.length} are new`);
    }
    return { newUrls, alreadySeenCount };
  }

  async isSeen(url: string): Promise<boolean> {
    return (await this.seenUrls()).has(canonicalizeUrl(url));
  }

  /**
   * Add URLs to the permanent set. Returns how many were not there before.
   */
  async recordSeen(urls: Iterable<string>): Promise<number> {
    const unique = [...new Set(urls)];
    if (unique.length === 0) {
      return 0;
    }

    const { document, result: added } = await this.store.update(current => {
      const timestamp = this.now().toISOString();
      let count = 0;
      for (const url of unique.map(canonicalizeUrl)) {
        if (!Object.hasOwn(current.seenUrls, url)) {
          current.seenUrls[url] = timestamp;
          count++;
        }
      }
      return count;
    });

    this.snapshot = new Map(Object.entries(document.seenUrls));
    if (added > 0) {
      log.normal(`Marked ${added} new URLs as seen`);
    }
    return added;
  }

  async stats(): Promise<SeenUrlStats> {
    const seen = await this.seenUrls();
    if (seen.size === 0) {
      return { totalSeen: 0, firstSeenAt: null, lastSeenAt: null };
    }
    const timestamps = [...seen.values()].sort();
    return {
      totalSeen: seen.size,
      firstSeenAt: timestamps[0],
      lastSeenAt: timestamps[timestamps.length - 1]
    };
  }

  private async seenUrls(): Promise<Map<string, string>> {
    if (!this.snapshot) {
      await this.load();
    }
    return this.snapshot ?? new Map();
  }
}
