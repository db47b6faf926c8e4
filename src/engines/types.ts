import type { RunFolderManager } from '../lib/run-folder-manager.js';
import type { RunHandle } from '../types/run.js';
import type { StageName } from '../types/stage.js';

export interface StageContext {
  runs: RunFolderManager;
  run: RunHandle;
  /** This stage's folder, emptied before the engine runs */
  stageDir: string;
  now: () => Date;
  /** YYYY-MM-DD */
  processingDate: string;
}

export interface StageOutcome {
  outputs: string[];
  /** One-line summary for the CLI */
  summary: string;
}

export interface StageEngine<R extends StageOutcome = StageOutcome> {
  readonly stage: StageName;
  run(context: StageContext): Promise<R>;
}
