import { z } from 'zod';

/** `<site>_links.json`: url -> link text seen on the listing page. */
export const SiteLinksSchema = z.record(z.string(), z.string().nullable());

export type SiteLinks = z.infer<typeof SiteLinksSchema>;

export const DeduplicationStatsSchema = z.object({
  totalSites: z.number(),
  totalLinksBefore: z.number(),
  uniqueLinks: z.number(),
  duplicatesRemoved: z.number(),
  deduplicationRate: z.number()
});

export type DeduplicationStats = z.infer<typeof DeduplicationStatsSchema>;

export const DeduplicatedLinksSchema = z.object({
  processingDate: z.string(),
  links: z.array(z.object({
    url: z.string(),
    text: z.string().nullable(),
    sites: z.array(z.string())
  })),
  stats: DeduplicationStatsSchema
}).passthrough();

export type DeduplicatedLinks = z.infer<typeof DeduplicatedLinksSchema>;
export type DeduplicatedLink = DeduplicatedLinks['links'][number];

export const ClassifiedLinkSchema = z.object({
  url: z.string(),
  text: z.string().nullable(),
  relevant: z.boolean(),
  reason: z.string().nullable().optional()
}).passthrough();

export type ClassifiedLink = z.infer<typeof ClassifiedLinkSchema>;

export const ClassifiedLinksSchema = z.object({
  processingDate: z.string(),
  totalLinks: z.number(),
  relevantLinks: z.number(),
  links: z.array(ClassifiedLinkSchema)
}).passthrough();

export type ClassifiedLinks = z.infer<typeof ClassifiedLinksSchema>;

export const ExtractedGrantSchema = z.object({
  grantId: z.string(),
  url: z.string(),
  title: z.string().nullable(),
  organization: z.string().nullable().default(null),
  abstract: z.string().nullable().default(null),
  deadline: z.string().nullable().default(null),
  fundingAmount: z.string().nullable().default(null),
  extractionSuccess: z.boolean(),
  extractionDate: z.string(),
  error: z.string().nullable().optional()
}).passthrough();

export type ExtractedGrant = z.infer<typeof ExtractedGrantSchema>;

export const ExtractionStatsSchema = z.object({
  total: z.number(),
  extractionSuccess: z.number(),
  extractionFailed: z.number(),
  fromCache: z.number()
});

export type ExtractionStats = z.infer<typeof ExtractionStatsSchema>;

export const ExtractedGrantsSchema = z.object({
  processingDate: z.string(),
  grants: z.array(ExtractedGrantSchema),
  stats: ExtractionStatsSchema
}).passthrough();

export type ExtractedGrants = z.infer<typeof ExtractedGrantsSchema>;

/** Fields the extractor hands back for one grant page. */
export interface GrantDetails {
  title: string | null;
  organization?: string | null;
  abstract?: string | null;
  deadline?: string | null;
  fundingAmount?: string | null;
}
