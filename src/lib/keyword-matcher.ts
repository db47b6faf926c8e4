import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { RecipientInterest } from '../types/candidate.js';
import { normalizeRecipientId } from '../core/utils/url-utils.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('keyword-matcher');

export const KeywordsFileSchema = z.object({
  // recipient email -> keywords
  keywords: z.record(z.string(), z.array(z.string()))
});

export type KeywordsFile = z.infer<typeof KeywordsFileSchema>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word matcher from keywords to interested recipients.
 * Word boundaries are Unicode-aware so accented terms match as whole words too.
 */
export class KeywordMatcher {
  private readonly keywordToRecipients = new Map<string, string[]>();
  private readonly patterns = new Map<string, RegExp>();
  private readonly recipients = new Set<string>();

  constructor(keywordsByRecipient: Record<string, string[]>) {
    for (const [email, keywords] of Object.entries(keywordsByRecipient)) {
      const recipientId = normalizeRecipientId(email);
      this.recipients.add(recipientId);

      for (const keyword of keywords) {
        const normalized = keyword.trim().toLowerCase();
        if (!normalized) continue;

        const interested = this.keywordToRecipients.get(normalized);
        if (!interested) {
          this.keywordToRecipients.set(normalized, [recipientId]);
          this.patterns.set(
            normalized,
            new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(normalized)}(?![\\p{L}\\p{N}_])`, 'iu')
          );
        } else if (!interested.includes(recipientId)) {
          interested.push(recipientId);
        }
      }
    }
    log.debug(`Indexed ${this.keywordToRecipients.size} keywords for ${this.recipients.size} recipients`);
  }

  static async fromFile(path: string): Promise<KeywordMatcher> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load keywords file ${path}: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = KeywordsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Keywords file ${path} must contain a "keywords" map of email -> keyword list`);
    }
    const matcher = new KeywordMatcher(parsed.data.keywords);
    log.normal(`Loaded keywords for ${matcher.recipientCount} recipients from ${path}`);
    return matcher;
  }

  get recipientCount(): number {
    return this.recipients.size;
  }

  get keywordCount(): number {
    return this.keywordToRecipients.size;
  }

  /**
   * Recipients whose keywords occur in `text`, each with its sorted matched keywords.
   * Recipients come back sorted by id.
   */
  match(text: string): RecipientInterest[] {
    const lowered = text.toLowerCase();
    const matched = new Map<string, Set<string>>();

    for (const [keyword, recipients] of this.keywordToRecipients) {
      // Cheap substring check before the boundary-aware regex
      if (!lowered.includes(keyword)) continue;
      const pattern = this.patterns.get(keyword);
      if (!pattern || !pattern.test(lowered)) continue;

      for (const recipientId of recipients) {
        const keywords = matched.get(recipientId) ?? new Set<string>();
        keywords.add(keyword);
        matched.set(recipientId, keywords);
      }
    }

    return [...matched.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([recipientId, keywords]) => ({ recipientId, matchedKeywords: [...keywords].sort() }));
  }

  /**
   * Match against abstract and title together. Returns [] when neither is present.
   */
  matchGrant(grant: { title: string | null; abstract: string | null }): RecipientInterest[] {
    const parts = [grant.abstract, grant.title]
      .map(part => part?.trim() ?? '')
      .filter(part => part.length > 0);
    if (parts.length === 0) {
      return [];
    }
    return this.match(parts.join(' '));
  }
}
