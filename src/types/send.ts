import { z } from 'zod';

export const SendModeSchema = z.enum(['live', 'dry-run', 'test']);

export type SendMode = z.infer<typeof SendModeSchema>;

export const RecipientSendResultSchema = z.object({
  recipientId: z.string(),
  /** Actual destination(s); differs from recipientId in test mode */
  to: z.array(z.string()),
  grantCount: z.number(),
  outcome: z.enum(['delivered', 'failed', 'skipped']),
  skipReason: z.enum(['empty', 'already-sent']).nullable(),
  messageId: z.string().nullable(),
  error: z.string().nullable()
});

export type RecipientSendResult = z.infer<typeof RecipientSendResultSchema>;

export const SendReportSchema = z.object({
  mode: SendModeSchema,
  digestFile: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  totalDigests: z.number(),
  delivered: z.number(),
  failed: z.number(),
  skippedEmpty: z.number(),
  skippedAlreadySent: z.number(),
  deliveryRecordsWritten: z.number(),
  adminAlert: z.enum(['sent', 'failed', 'not-configured', 'skipped']),
  results: z.array(RecipientSendResultSchema)
});

export type SendReport = z.infer<typeof SendReportSchema>;
