import { z } from 'zod';
import { StoreHeaderSchema } from './store.js';

export const SEEN_URLS_VERSION = 1;

export const SeenUrlsDocumentSchema = StoreHeaderSchema.extend({
  seenUrls: z.record(z.string(), z.string())
}).passthrough();

export type SeenUrlsDocument = z.infer<typeof SeenUrlsDocumentSchema>;

export interface UnseenResult {
  newUrls: string[];
  alreadySeenCount: number;
}

export interface SeenUrlStats {
  totalSeen: number;
  firstSeenAt: string | null;
  lastSeenAt: string | null;
}
