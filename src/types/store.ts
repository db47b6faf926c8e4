import { z } from 'zod';

/**
 * Fields every persisted store document carries.
 * `revision` is bumped on every write and is what concurrent writers are checked against.
 */
export const StoreHeaderSchema = z.object({
  version: z.number().int().positive(),
  revision: z.number().int().nonnegative(),
  updatedAt: z.string()
});

export type StoreHeader = z.infer<typeof StoreHeaderSchema>;
