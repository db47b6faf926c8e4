import type { RunFolderManager } from '../lib/run-folder-manager.js';
import type { ResolveMode, RunHandle } from '../types/run.js';
import { toIsoDate } from '../utils/time-parser.js';
import { errorMessage } from '../utils/errors.js';
import { formatTime, logger } from '../utils/logger.js';
import type { StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('stage-runner');

export interface RunStageOptions {
  mode?: ResolveMode;
  overrideDir?: string;
  /** Run already resolved by the caller (pipeline) */
  run?: RunHandle;
}

export interface StageRunResult<R extends StageOutcome> {
  run: RunHandle;
  result: R;
  duration: number;
}

/**
 * Drives one stage through its lifecycle: resolve the run, check prerequisites,
 * give the engine a clean folder, and mark the stage complete only once the
 * engine has returned.
 */
export class StageRunner {
  constructor(
    private readonly runs: RunFolderManager,
    private readonly now: () => Date = () => new Date()
  ) {}

  async runStage<R extends StageOutcome>(
    engine: StageEngine<R>,
    options: RunStageOptions = {}
  ): Promise<StageRunResult<R>> {
    const startTime = Date.now();
    const stage = engine.stage;

    const run =
      options.run ??
      (await this.runs.resolveRunForStage(stage, { mode: options.mode, overrideDir: options.overrideDir }));
    await this.runs.validatePrerequisites(run, stage);

    const stageDir = await this.runs.ensureStageDir(run, stage, { clean: true });
    logger.started(stage, run.kind === 'tracked' ? `run ${run.date}` : `${run.root} (untracked)`);
    log.debug(`Stage folder: ${stageDir}`);

    let result: R;
    try {
      result = await engine.run({
        runs: this.runs,
        run,
        stageDir,
        now: this.now,
        processingDate: toIsoDate(this.now())
      });
    } catch (error) {
      // The stage stays incomplete so the next invocation retries it
      logger.failure(stage, errorMessage(error));
      throw error;
    }

    await this.runs.markStageComplete(run, stage);

    const duration = Date.now() - startTime;
    logger.success(stage, `${result.summary} (${formatTime(duration)})`);
    return { run, result, duration };
  }
}
