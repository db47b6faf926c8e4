import { z } from 'zod';
import { StoreHeaderSchema } from './store.js';

export const GRANT_CACHE_VERSION = 1;

/** Grant details kept from an earlier successful extraction. */
export const CachedGrantSchema = z.object({
  title: z.string().nullable(),
  organization: z.string().nullable().default(null),
  abstract: z.string().nullable().default(null),
  deadline: z.string().nullable().default(null),
  fundingAmount: z.string().nullable().default(null),
  cachedAt: z.string()
}).passthrough();

export type CachedGrant = z.infer<typeof CachedGrantSchema>;

export const GrantCacheDocumentSchema = StoreHeaderSchema.extend({
  // url -> details
  grants: z.record(z.string(), CachedGrantSchema)
}).passthrough();

export type GrantCacheDocument = z.infer<typeof GrantCacheDocumentSchema>;

export interface CacheStats {
  hits: number;
  misses: number;
  itemCount: number;
}
