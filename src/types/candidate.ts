import { z } from 'zod';

export interface RecipientInterest {
  recipientId: string;
  matchedKeywords: string[];
}

/** A grant under consideration for one or more recipients in the current run. */
export interface Candidate {
  grantId: string;
  url: string;
  title: string | null;
  organization: string | null;
  abstract: string | null;
  deadline: string | null;
  fundingAmount: string | null;
  extractionSuccess: boolean;
  recipients: RecipientInterest[];
}

export interface FilterPolicy {
  excludeAlreadySent: boolean;
  excludeFailedExtraction: boolean;
  excludeExpiredDeadline: boolean;
}

export const EXCLUSION_REASONS = ['already_sent', 'failed_extraction', 'deadline_expired'] as const;

export type ExclusionReason = (typeof EXCLUSION_REASONS)[number];

export type ExclusionCounts = Record<ExclusionReason, number>;

export type FilterDecision =
  | { grantId: string; recipientId: string; included: true }
  | { grantId: string; recipientId: string; included: false; reason: ExclusionReason };

export interface RecipientFilterReport {
  recipientId: string;
  totalCandidates: number;
  includedCount: number;
  excluded: ExclusionCounts;
  decisions: FilterDecision[];
  included: Candidate[];
}

export interface FilterTotals {
  recipients: number;
  totalCandidates: number;
  includedCount: number;
  excluded: ExclusionCounts;
}

export interface FilterReport {
  processingDate: string;
  policy: FilterPolicy;
  recipients: RecipientFilterReport[];
  totals: FilterTotals;
}

// Persisted form of the filter statistics (no candidate payloads)
export const ExclusionCountsSchema = z.object({
  already_sent: z.number(),
  failed_extraction: z.number(),
  deadline_expired: z.number()
});

export const FilterStatsSchema = z.object({
  processingDate: z.string(),
  policy: z.object({
    excludeAlreadySent: z.boolean(),
    excludeFailedExtraction: z.boolean(),
    excludeExpiredDeadline: z.boolean()
  }),
  recipients: z.array(z.object({
    recipientId: z.string(),
    totalCandidates: z.number(),
    includedCount: z.number(),
    excluded: ExclusionCountsSchema
  })),
  totals: z.object({
    recipients: z.number(),
    totalCandidates: z.number(),
    includedCount: z.number(),
    excluded: ExclusionCountsSchema
  })
});

export type FilterStats = z.infer<typeof FilterStatsSchema>;
