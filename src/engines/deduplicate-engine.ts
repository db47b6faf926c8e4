import { join } from 'path';
import { DEDUPLICATED_LINKS, SITE_LINKS_PATTERN, siteFromLinksFilename } from '../lib/artifacts.js';
import { listArtifacts, readArtifact, writeArtifact } from '../providers/stage-files.js';
import { SiteLinksSchema, type DeduplicatedLink, type DeduplicatedLinks } from '../types/grant.js';
import { canonicalizeUrl } from '../core/utils/url-utils.js';
import { formatPercent, logger } from '../utils/logger.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('deduplicate-engine');

export interface DeduplicateResult extends StageOutcome {
  totalSites: number;
  totalLinksBefore: number;
  uniqueLinks: number;
  duplicatesRemoved: number;
}

/**
 * Merge the per-site link files of the scrape stage into one list of unique
 * grant URLs. URLs differing only in fragment, trailing slash or host case are
 * the same grant.
 */
export class DeduplicateEngine implements StageEngine<DeduplicateResult> {
  readonly stage = 'deduplicate';

  async run(context: StageContext): Promise<DeduplicateResult> {
    const scrapeDir = context.runs.stagePath(context.run, 'scrape');
    const files = await listArtifacts(scrapeDir, SITE_LINKS_PATTERN);
    if (files.length === 0) {
      log.normal(`No *_links.json files in ${scrapeDir}`);
    }

    const byCanonical = new Map<string, DeduplicatedLink>();
    let totalLinksBefore = 0;

    for (const file of files) {
      const site = siteFromLinksFilename(file) ?? file;
      const links = await readArtifact(join(scrapeDir, file), SiteLinksSchema);

      for (const [url, text] of Object.entries(links)) {
        totalLinksBefore++;
        const key = canonicalizeUrl(url);
        const existing = byCanonical.get(key);
        if (!existing) {
          byCanonical.set(key, { url, text, sites: [site] });
          continue;
        }
        existing.text ??= text;
        if (!existing.sites.includes(site)) {
          existing.sites.push(site);
        }
      }
    }

    const links = [...byCanonical.values()].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
    const duplicatesRemoved = totalLinksBefore - links.length;
    const output: DeduplicatedLinks = {
      processingDate: context.processingDate,
      links,
      stats: {
        totalSites: files.length,
        totalLinksBefore,
        uniqueLinks: links.length,
        duplicatesRemoved,
        deduplicationRate: formatPercent(duplicatesRemoved, totalLinksBefore)
      }
    };

    const path = await writeArtifact(context.stageDir, DEDUPLICATED_LINKS.filename(context.now()), output);
    log.verbose(`Removed ${duplicatesRemoved} duplicates (${output.stats.deduplicationRate}%)`);

    return {
      outputs: [path],
      totalSites: files.length,
      totalLinksBefore,
      uniqueLinks: links.length,
      duplicatesRemoved,
      summary: `${links.length} unique links from ${totalLinksBefore} across ${files.length} sites`
    };
  }
}
