import { z } from 'zod';
import { StoreHeaderSchema } from './store.js';

export const DeliveryOutcomeSchema = z.enum(['delivered', 'failed']);

export type DeliveryOutcome = z.infer<typeof DeliveryOutcomeSchema>;

export const DeliveryEntrySchema = z.object({
  grantUrl: z.string(),
  outcome: DeliveryOutcomeSchema,
  sentAt: z.string(),
  channelId: z.string().nullable(),
  attempts: z.number().int().positive().default(1),
  lastFailedAt: z.string().optional()
}).passthrough();

export type DeliveryEntry = z.infer<typeof DeliveryEntrySchema>;

export const DELIVERY_HISTORY_VERSION = 1;

export const DeliveryHistoryDocumentSchema = StoreHeaderSchema.extend({
  // grantId -> recipientId -> entry
  deliveries: z.record(z.string(), z.record(z.string(), DeliveryEntrySchema))
}).passthrough();

export type DeliveryHistoryDocument = z.infer<typeof DeliveryHistoryDocumentSchema>;

export interface DeliveryRecordInput {
  grantId: string;
  grantUrl: string;
  recipientId: string;
  outcome: DeliveryOutcome;
  channelId: string | null;
  sentAt?: string;
}

export interface DeliveryLookupResult {
  delivered: boolean;
  outcome: DeliveryOutcome | null;
}

/** Read access the candidate filter needs. */
export interface DeliveryLookup {
  wasDelivered(grantId: string, recipientId: string): DeliveryLookupResult;
}

export interface DeliveryStats {
  recordCount: number;
  distinctGrantCount: number;
  distinctRecipientCount: number;
  lastUpdated: string | null;
}
