import { canonicalizeUrl } from '../core/utils/url-utils.js';
import { JsonDocumentStore } from '../providers/json-store.js';
import {
  GRANT_CACHE_VERSION,
  GrantCacheDocumentSchema,
  type CacheStats,
  type CachedGrant,
  type GrantCacheDocument
} from '../types/cache.js';
import type { GrantDetails } from '../types/grant.js';
import { HistoryStoreCorrupt } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('extraction-cache');

export const GRANT_CACHE_FILENAME = 'grant_cache.json';

export interface ExtractionCacheOptions {
  path: string;
  now?: () => Date;
}

/**
 * Details of successfully extracted grants, keyed by canonical URL, so later runs skip
 * pages already extracted. Failed extractions are never cached.
 *
 * New entries are buffered and written in one swap by `flush()`.
 */
export class ExtractionCache {
  private readonly store: JsonDocumentStore<GrantCacheDocument>;
  private readonly now: () => Date;
  private entries = new Map<string, CachedGrant>();
  private readonly pending = new Map<string, CachedGrant>();
  private hits = 0;
  private misses = 0;
  private disabled = false;

  constructor(options: ExtractionCacheOptions) {
    this.now = options.now ?? (() => new Date());
    this.store = new JsonDocumentStore<GrantCacheDocument>({
      name: 'grant cache',
      path: options.path,
      schema: GrantCacheDocumentSchema,
      now: this.now,
      createEmpty: nowIso => ({
        version: GRANT_CACHE_VERSION,
        revision: 0,
        updatedAt: nowIso,
        grants: {}
      })
    });
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * Load cached grants. An unreadable cache is reported and then ignored for this
   * run: nothing is served from it and nothing is written back over it.
   */
  async load(): Promise<void> {
    try {
      const document = await this.store.load();
      this.entries = new Map(Object.entries(document.grants));
      this.disabled = false;
      log.verbose(`Loaded ${this.entries.size} cached grants from ${this.path}`);
    } catch (error) {
      if (!(error instanceof HistoryStoreCorrupt)) {
        throw error;
      }
      log.error(`${error.message}; extracting without cache this run`);
      this.entries = new Map();
      this.disabled = true;
    }
  }

  get(url: string): CachedGrant | null {
    const key = canonicalizeUrl(url);
    const cached = this.pending.get(key) ?? this.entries.get(key);
    if (cached) {
      this.hits++;
      log.debug(`Cache hit for: ${url}`);
      return cached;
    }
    this.misses++;
    return null;
  }

  put(url: string, details: GrantDetails): void {
    if (this.disabled) return;
    this.pending.set(canonicalizeUrl(url), {
      title: details.title,
      organization: details.organization ?? null,
      abstract: details.abstract ?? null,
      deadline: details.deadline ?? null,
      fundingAmount: details.fundingAmount ?? null,
      cachedAt: this.now().toISOString()
    });
  }

  /**
   * Write buffered entries. Returns how many were written.
   */
  async flush(): Promise<number> {
    if (this.disabled || this.pending.size === 0) {
      return 0;
    }

    const additions = new Map(this.pending);
    const { document } = await this.store.update(current => {
      for (const [url, cached] of additions) {
        current.grants[url] = cached;
      }
    });

    this.entries = new Map(Object.entries(document.grants));
    this.pending.clear();
    log.normal(`Saved ${additions.size} grants to cache (${this.entries.size} total)`);
    return additions.size;
  }

  stats(): CacheStats {
    const urls = new Set([...this.entries.keys(), ...this.pending.keys()]);
    return { hits: this.hits, misses: this.misses, itemCount: urls.size };
  }
}
