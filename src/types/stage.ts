import { z } from 'zod';

/**
 * The six dated pipeline stages, in execution order.
 * `send` is not listed: it reads the latest digest regardless of run date.
 */
export const STAGES = [
  { name: 'scrape', folder: '01_scrape' },
  { name: 'deduplicate', folder: '02_deduplicate' },
  { name: 'classify', folder: '03_classify' },
  { name: 'extract', folder: '04_extract' },
  { name: 'match-keywords', folder: '05_match_keywords' },
  { name: 'build-digest', folder: '06_digests' }
] as const;

export type StageName = (typeof STAGES)[number]['name'];

export const STAGE_NAMES: readonly StageName[] = STAGES.map(stage => stage.name);

export const StageNameSchema = z.enum([
  'scrape',
  'deduplicate',
  'classify',
  'extract',
  'match-keywords',
  'build-digest'
]);

export const FIRST_STAGE: StageName = 'scrape';

export function isStageName(value: string): value is StageName {
  return StageNameSchema.safeParse(value).success;
}

/** 1-based position of a stage. */
export function stageOrder(stage: StageName): number {
  return STAGE_NAMES.indexOf(stage) + 1;
}

export function stageFolder(stage: StageName): string {
  const found = STAGES.find(entry => entry.name === stage);
  if (!found) {
    throw new Error(`Unknown stage: ${stage}`);
  }
  return found.folder;
}

/** Every stage with a lower position, in order. */
export function prerequisitesOf(stage: StageName): StageName[] {
  return STAGE_NAMES.slice(0, stageOrder(stage) - 1);
}

export function stagesAfter(stage: StageName): StageName[] {
  return STAGE_NAMES.slice(stageOrder(stage));
}
