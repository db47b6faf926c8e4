import { z } from 'zod';
import { StageNameSchema, type StageName } from './stage.js';
import { StoreHeaderSchema } from './store.js';

export const RUN_DATE_PATTERN = /^\d{8}$/;

export const RunDateSchema = z.string().regex(RUN_DATE_PATTERN, 'run date must be YYYYMMDD');

export const CompletedStageSchema = z.object({
  name: StageNameSchema,
  completedAt: z.string()
}).passthrough();

export const RunRecordSchema = z.object({
  date: RunDateSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  restartedAt: z.string().optional(),
  stages: z.array(CompletedStageSchema)
}).passthrough();

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const RUN_INDEX_VERSION = 1;

export const RunIndexSchema = StoreHeaderSchema.extend({
  runs: z.array(RunRecordSchema)
}).passthrough();

export type RunIndex = z.infer<typeof RunIndexSchema>;

/**
 * The unit of work a stage writes into.
 * `tracked` handles are backed by the run index; `override` handles point at an
 * explicit directory and carry no resumability guarantees.
 */
export type RunHandle =
  | { kind: 'tracked'; date: string; root: string }
  | { kind: 'override'; date: null; root: string };

export type ResolveMode = 'pipeline' | 'stage';

export interface ResolveRunOptions {
  mode?: ResolveMode;
  overrideDir?: string;
}

export interface RunStatus {
  date: string;
  state: 'complete' | 'incomplete';
  stages: StageName[];
  missing: StageName[];
  createdAt: string;
}
