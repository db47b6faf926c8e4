import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { GrantExtractor } from '../types/collaborators.js';
import type { GrantDetails } from '../types/grant.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('imported-extractor');

const GrantDetailsSchema = z.object({
  title: z.string().nullable(),
  organization: z.string().nullable().optional(),
  abstract: z.string().nullable().optional(),
  deadline: z.string().nullable().optional(),
  fundingAmount: z.string().nullable().optional()
});

// url -> details
const ImportedGrantsSchema = z.record(z.string(), GrantDetailsSchema);

/**
 * Extractor serving grant details prepared elsewhere and saved as JSON.
 * URLs missing from the file count as failed extractions.
 */
export class ImportedGrantExtractor implements GrantExtractor {
  readonly name = 'imported';
  private grants: Map<string, GrantDetails> | null = null;

  constructor(private readonly path: string) {}

  async extract(url: string): Promise<GrantDetails> {
    const grants = await this.load();
    const details = grants.get(url);
    if (!details) {
      throw new Error(`No extracted details for ${url}`);
    }
    return details;
  }

  private async load(): Promise<Map<string, GrantDetails>> {
    if (this.grants) {
      return this.grants;
    }

    let json: unknown;
    try {
      json = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load extracted grants ${this.path}: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = ImportedGrantsSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Extracted grants file ${this.path} must map each URL to grant details`);
    }

    this.grants = new Map(Object.entries(parsed.data));
    log.verbose(`Loaded ${this.grants.size} extracted grants from ${this.path}`);
    return this.grants;
  }
}
