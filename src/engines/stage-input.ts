import type { z } from 'zod';
import type { StageName } from '../types/stage.js';
import { readArtifact } from '../providers/stage-files.js';
import type { StageContext } from './types.js';

export interface StageInput<T> {
  path: string;
  data: T;
}

/**
 * Newest artifact an earlier stage left in the same run.
 */
export async function readStageInput<T>(
  context: StageContext,
  stage: StageName,
  artifact: { prefix: string; pattern: RegExp },
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<StageInput<T>> {
  const path = await context.runs.latestStageFile(context.run, stage, artifact.pattern);
  if (!path) {
    const dir = context.runs.stagePath(context.run, stage);
    throw new Error(`No ${artifact.prefix}_*.json found in ${dir}; run "${stage}" first`);
  }
  return { path, data: await readArtifact(path, schema) };
}
