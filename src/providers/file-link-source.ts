import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SiteLinksSchema, type SiteLinks } from '../types/grant.js';
import type { LinkSource } from '../types/collaborators.js';
import { isValidUrl } from '../core/utils/url-utils.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('file-link-source');

// site -> { url -> link text }
const LinksFileSchema = z.record(z.string(), SiteLinksSchema);

/**
 * Link source backed by a JSON file of links already collected per site.
 * Stands in for the site scrapers, which live outside this repository.
 */
export class FileLinkSource implements LinkSource {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async collectLinks(): Promise<Record<string, SiteLinks>> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load links file ${this.path}: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = LinksFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Links file ${this.path} must map each site to { url: link text }`);
    }

    const result: Record<string, SiteLinks> = {};
    for (const [site, links] of Object.entries(parsed.data)) {
      const valid: SiteLinks = {};
      for (const [url, text] of Object.entries(links)) {
        if (isValidUrl(url)) {
          valid[url] = text;
        } else {
          log.verbose(`${site}: skipping invalid URL ${url}`);
        }
      }
      result[site] = valid;
    }

    log.normal(`Loaded links for ${Object.keys(result).length} sites from ${this.path}`);
    return result;
  }
}
