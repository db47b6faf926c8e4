import { CLASSIFIED_LINKS, EXTRACTED_GRANTS } from '../lib/artifacts.js';
import type { ExtractionCache } from '../lib/extraction-cache.js';
import { writeArtifact } from '../providers/stage-files.js';
import type { GrantExtractor } from '../types/collaborators.js';
import {
  ClassifiedLinksSchema,
  type ClassifiedLink,
  type ExtractedGrant,
  type ExtractedGrants
} from '../types/grant.js';
import { mkGrantId } from '../core/utils/url-utils.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { readStageInput } from './stage-input.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('extract-engine');

export interface ExtractOptions {
  /** Pages extracted at once (default: 4) */
  concurrency?: number;
  /** Re-extract even when the cache has the page */
  forceRefresh?: boolean;
}

export interface ExtractResult extends StageOutcome {
  total: number;
  extractionSuccess: number;
  extractionFailed: number;
  fromCache: number;
}

export class ExtractEngine implements StageEngine<ExtractResult> {
  readonly stage = 'extract';

  constructor(
    private readonly extractor: GrantExtractor,
    private readonly cache: ExtractionCache,
    private readonly options: ExtractOptions = {}
  ) {}

  async run(context: StageContext): Promise<ExtractResult> {
    const input = await readStageInput(context, 'classify', CLASSIFIED_LINKS, ClassifiedLinksSchema);
    const links = input.data.links.filter(link => link.relevant);

    await this.cache.load();

    const grants: ExtractedGrant[] = new Array(links.length);
    let fromCache = 0;
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < links.length) {
        const index = cursor++;
        const link = links[index];
        const cached = this.options.forceRefresh ? null : this.cache.get(link.url);
        if (cached) {
          fromCache++;
          grants[index] = {
            grantId: mkGrantId(link.url),
            url: link.url,
            title: cached.title,
            organization: cached.organization,
            abstract: cached.abstract,
            deadline: cached.deadline,
            fundingAmount: cached.fundingAmount,
            extractionSuccess: true,
            extractionDate: cached.cachedAt,
            error: null
          };
          continue;
        }
        grants[index] = await this.extractOne(link, context.now());
      }
    };

    const concurrency = Math.max(1, Math.min(this.options.concurrency ?? 4, links.length));
    if (links.length > 0) {
      log.normal(`Extracting ${links.length} grants with ${this.extractor.name} (${concurrency} at a time)`);
    }
    await Promise.all(Array.from({ length: concurrency }, () => worker()));
    await this.cache.flush();

    const extractionSuccess = grants.filter(grant => grant.extractionSuccess).length;
    const output: ExtractedGrants = {
      processingDate: context.processingDate,
      grants,
      stats: {
        total: grants.length,
        extractionSuccess,
        extractionFailed: grants.length - extractionSuccess,
        fromCache
      }
    };
    const path = await writeArtifact(context.stageDir, EXTRACTED_GRANTS.filename(context.now()), output);

    return {
      outputs: [path],
      ...output.stats,
      summary:
        `${extractionSuccess}/${grants.length} grants extracted` +
        (fromCache > 0 ? ` (${fromCache} from cache)` : '')
    };
  }

  private async extractOne(link: ClassifiedLink, now: Date): Promise<ExtractedGrant> {
    const base = { grantId: mkGrantId(link.url), url: link.url, extractionDate: now.toISOString() };
    try {
      const details = await this.extractor.extract(link.url, link.text);
      this.cache.put(link.url, details);
      return {
        ...base,
        title: details.title,
        organization: details.organization ?? null,
        abstract: details.abstract ?? null,
        deadline: details.deadline ?? null,
        fundingAmount: details.fundingAmount ?? null,
        extractionSuccess: true,
        error: null
      };
    } catch (error) {
      log.error(`Failed to extract from ${link.url}: ${errorMessage(error)}`);
      // Keep the link text as title so the grant can still be matched and reported
      return {
        ...base,
        title: link.text,
        organization: null,
        abstract: null,
        deadline: null,
        fundingAmount: null,
        extractionSuccess: false,
        error: errorMessage(error)
      };
    }
  }
}
