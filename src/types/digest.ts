import { z } from 'zod';
import { ExtractionStatsSchema } from './grant.js';
import { FilterStatsSchema } from './candidate.js';

export const MatchedGrantSchema = z.object({
  grantId: z.string(),
  url: z.string(),
  title: z.string().nullable(),
  organization: z.string().nullable(),
  abstract: z.string().nullable(),
  deadline: z.string().nullable(),
  fundingAmount: z.string().nullable(),
  extractionSuccess: z.boolean(),
  recipients: z.array(z.object({
    recipientId: z.string(),
    matchedKeywords: z.array(z.string())
  }))
}).passthrough();

export type MatchedGrant = z.infer<typeof MatchedGrantSchema>;

/** Output of the match-keywords stage: the final, already filtered send set. */
export const MatchOutputSchema = z.object({
  processingDate: z.string(),
  sourceFile: z.string(),
  totalGrants: z.number(),
  grantsWithKeywordMatches: z.number(),
  matchRate: z.number(),
  totalRecipients: z.number(),
  extractionStats: ExtractionStatsSchema.nullable(),
  filterStats: FilterStatsSchema,
  results: z.array(MatchedGrantSchema)
}).passthrough();

export type MatchOutput = z.infer<typeof MatchOutputSchema>;

export const DeadlineStatusSchema = z.enum(['missing', 'past', 'critical', 'warning', 'ok']);

export type DeadlineStatus = z.infer<typeof DeadlineStatusSchema>;

export const DigestGrantSchema = z.object({
  grantId: z.string(),
  url: z.string(),
  title: z.string().nullable(),
  organization: z.string().nullable(),
  abstract: z.string().nullable(),
  deadline: z.string().nullable(),
  fundingAmount: z.string().nullable(),
  matchedKeywords: z.array(z.string()),
  parsedDeadline: z.string().nullable(),
  daysToDeadline: z.number().nullable(),
  deadlineStatus: DeadlineStatusSchema,
  deadlineLabel: z.string()
}).passthrough();

export type DigestGrant = z.infer<typeof DigestGrantSchema>;

export const RecipientDigestSchema = z.object({
  recipientId: z.string(),
  displayName: z.string(),
  totalGrants: z.number(),
  keywords: z.array(z.string()),
  subject: z.string(),
  textBody: z.string(),
  htmlBody: z.string().nullable(),
  grants: z.array(DigestGrantSchema)
}).passthrough();

export type RecipientDigest = z.infer<typeof RecipientDigestSchema>;

export const DigestDocumentSchema = z.object({
  processingDate: z.string(),
  /** ISO timestamp of the build; deliveries recorded after it came from this digest */
  builtAt: z.string().nullable().default(null),
  sourceFile: z.string(),
  totalRecipients: z.number(),
  totalGrants: z.number(),
  digests: z.array(RecipientDigestSchema)
}).passthrough();

export type DigestDocument = z.infer<typeof DigestDocumentSchema>;
