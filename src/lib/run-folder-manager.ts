import { mkdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { JsonDocumentStore } from '../providers/json-store.js';
import { latestArtifact } from '../providers/stage-files.js';
import {
  RUN_INDEX_VERSION,
  RunIndexSchema,
  type ResolveRunOptions,
  type RunHandle,
  type RunIndex,
  type RunRecord,
  type RunStatus
} from '../types/run.js';
import {
  FIRST_STAGE,
  STAGE_NAMES,
  prerequisitesOf,
  stageFolder,
  stageOrder,
  stagesAfter,
  type StageName
} from '../types/stage.js';
import { AmbiguousRunState, MissingPrerequisiteStage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runDateToIso, toRunDate } from '../utils/time-parser.js';

const log = logger.createContext('run-folder-manager');

export const RUN_INDEX_FILENAME = 'runs.json';

export interface RunFolderManagerOptions {
  /** Root holding the run index and one folder per run date */
  dataDir: string;
  now?: () => Date;
}

function completedStages(run: RunRecord): Set<StageName> {
  return new Set(run.stages.map(stage => stage.name));
}

function isComplete(run: RunRecord): boolean {
  const present = completedStages(run);
  return STAGE_NAMES.every(stage => present.has(stage));
}

function firstMissingPrerequisite(run: RunRecord, stage: StageName): StageName | null {
  const present = completedStages(run);
  return prerequisitesOf(stage).find(prerequisite => !present.has(prerequisite)) ?? null;
}

/**
 * Two entries for one date means the index was edited outside the tracker.
 */
function assertUniqueDates(runs: RunRecord[]): void {
  const seen = new Set<string>();
  for (const run of runs) {
    if (seen.has(run.date)) {
      throw new AmbiguousRunState(run.date, 'more than one run in the index claims this date');
    }
    seen.add(run.date);
  }
}

function isRunHandle(value: RunHandle | RunRecord): value is RunHandle {
  return value.kind === 'tracked' || value.kind === 'override';
}

function findRun(index: RunIndex, date: string): RunRecord | undefined {
  assertUniqueDates(index.runs);
  return index.runs.find(run => run.date === date);
}

/**
 * Decides which dated run a stage writes into, checks stage prerequisites and
 * records stage completion.
 *
 * Layout under `dataDir`:
 *   runs.json                  run index (date -> completed stages)
 *   YYYYMMDD/01_scrape/ ...    one folder per stage of that run
 */
export class RunFolderManager {
  private readonly index: JsonDocumentStore<RunIndex>;
  private readonly now: () => Date;

  constructor(private readonly options: RunFolderManagerOptions) {
    this.now = options.now ?? (() => new Date());
    this.index = new JsonDocumentStore<RunIndex>({
      name: 'run index',
      path: join(options.dataDir, RUN_INDEX_FILENAME),
      schema: RunIndexSchema,
      now: this.now,
      createEmpty: nowIso => ({
        version: RUN_INDEX_VERSION,
        revision: 0,
        updatedAt: nowIso,
        runs: []
      })
    });
  }

  get dataDir(): string {
    return this.options.dataDir;
  }

  runRoot(date: string): string {
    return join(this.options.dataDir, date);
  }

  handleFor(date: string): RunHandle {
    return { kind: 'tracked', date, root: this.runRoot(date) };
  }

  /**
   * All runs, most recent first (YYYYMMDD sorts chronologically).
   */
  async listRuns(): Promise<RunRecord[]> {
    const index = await this.index.load();
    assertUniqueDates(index.runs);
    return [...index.runs].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  }

  async getRun(date: string): Promise<RunRecord | null> {
    const index = await this.index.load();
    return findRun(index, date) ?? null;
  }

  async findMostRecentIncompleteRun(): Promise<RunRecord | null> {
    const runs = await this.listRuns();
    return runs.find(run => !isComplete(run)) ?? null;
  }

  /**
   * Pick the run a stage invocation should write into.
   *
   * - `overrideDir`: untracked handle on that directory.
   * - `pipeline` mode: today's run, restarted from the first stage if it already exists.
   * - `stage` mode: append to the most recent run when it is incomplete, lacks this
   *   stage and holds all of its prerequisites; otherwise target a run dated today.
   */
  async resolveRunForStage(stage: StageName, options: ResolveRunOptions = {}): Promise<RunHandle> {
    if (options.overrideDir) {
      const root = resolve(options.overrideDir);
      log.normal(`Using override directory ${root} for ${stage} (not tracked)`);
      return { kind: 'override', date: null, root };
    }

    const today = toRunDate(this.now());

    if ((options.mode ?? 'stage') === 'pipeline') {
      log.normal(`Full pipeline run: using run ${today} from the first stage`);
      return this.startRun(today);
    }

    const [mostRecent] = await this.listRuns();

    if (!mostRecent) {
      if (stage === FIRST_STAGE) {
        log.normal(`No existing runs found, creating run ${today}`);
        return this.startRun(today);
      }
      throw new MissingPrerequisiteStage(stage, FIRST_STAGE, null);
    }

    const present = completedStages(mostRecent);
    const missing = firstMissingPrerequisite(mostRecent, stage);

    if (!isComplete(mostRecent) && !present.has(stage) && missing === null) {
      log.normal(`Continuing incomplete run ${mostRecent.date}: ${stage} will be added`);
      return this.handleFor(mostRecent.date);
    }

    if (mostRecent.date === today) {
      // Only one run per date: a fresh run for today means rebuilding today's run
      if (stage === FIRST_STAGE) {
        log.normal(`Run ${today} already has ${stage}, restarting it from the first stage`);
        return this.startRun(today);
      }
      if (present.has(stage) && missing === null) {
        log.normal(`Rebuilding ${stage} in run ${today}`);
        await this.invalidateFrom(today, stage);
        return this.handleFor(today);
      }
      throw new MissingPrerequisiteStage(stage, missing ?? FIRST_STAGE, today);
    }

    if (stage === FIRST_STAGE) {
      log.normal(
        present.has(stage)
          ? `Step ${stage} already exists in ${mostRecent.date}, creating run ${today}`
          : `Run ${mostRecent.date} cannot take ${stage}, creating run ${today}`
      );
      return this.startRun(today);
    }

    // A new run dated today would have to start with the first stage
    throw new MissingPrerequisiteStage(stage, FIRST_STAGE, null);
  }

  /**
   * Throws MissingPrerequisiteStage naming the first prerequisite absent from the run.
   */
  async validatePrerequisites(run: RunHandle, stage: StageName): Promise<void> {
    if (run.kind === 'override') {
      return;
    }
    const record = await this.requireRun(run.date);
    const missing = firstMissingPrerequisite(record, stage);
    if (missing) {
      throw new MissingPrerequisiteStage(stage, missing, run.date);
    }
  }

  stagePath(run: RunHandle, stage: StageName): string {
    return join(run.root, stageFolder(stage));
  }

  /**
   * Create the stage folder and return it. With `clean`, output left by an earlier
   * attempt at the same stage is removed first.
   */
  async ensureStageDir(run: RunHandle, stage: StageName, options: { clean?: boolean } = {}): Promise<string> {
    const dir = this.stagePath(run, stage);
    if (options.clean) {
      await rm(dir, { recursive: true, force: true });
    }
    await mkdir(dir, { recursive: true });
    log.debug(`Ensured stage folder exists: ${dir}`);
    return dir;
  }

  async markStageComplete(run: RunHandle, stage: StageName): Promise<void> {
    if (run.kind === 'override') {
      log.debug(`Override run ${run.root}: completion of ${stage} is not tracked`);
      return;
    }

    const current = await this.requireRun(run.date);
    if (completedStages(current).has(stage)) {
      log.debug(`Stage ${stage} already complete in run ${run.date}`);
      return;
    }

    const date = run.date;
    await this.index.update(index => {
      const record = findRun(index, date);
      if (!record) {
        throw new Error(`Run ${date} is not in the run index`);
      }
      if (completedStages(record).has(stage)) {
        return;
      }
      const nowIso = this.now().toISOString();
      record.stages.push({ name: stage, completedAt: nowIso });
      record.stages.sort((a, b) => stageOrder(a.name) - stageOrder(b.name));
      record.updatedAt = nowIso;
    });
    log.normal(`Marked ${stage} complete in run ${run.date}`);
  }

  async status(run: RunHandle | RunRecord): Promise<RunStatus> {
    const record = isRunHandle(run) ? await this.requireRunFromHandle(run) : run;
    const present = completedStages(record);
    return {
      date: record.date,
      state: isComplete(record) ? 'complete' : 'incomplete',
      stages: STAGE_NAMES.filter(stage => present.has(stage)),
      missing: STAGE_NAMES.filter(stage => !present.has(stage)),
      createdAt: record.createdAt
    };
  }

  async latestStageFile(run: RunHandle, stage: StageName, pattern: RegExp): Promise<string | null> {
    return latestArtifact(this.stagePath(run, stage), pattern);
  }

  /**
   * Newest artifact for a stage across every run, most recent run first.
   */
  async findLatestArtifact(stage: StageName, pattern: RegExp): Promise<{ run: RunHandle; path: string } | null> {
    for (const record of await this.listRuns()) {
      const run = this.handleFor(record.date);
      const path = await this.latestStageFile(run, stage, pattern);
      if (path) {
        return { run, path };
      }
    }
    return null;
  }

  async summary(): Promise<string[]> {
    const runs = await this.listRuns();
    if (runs.length === 0) {
      return ['No pipeline runs found'];
    }

    const lines: string[] = [];
    for (const run of runs) {
      const status = await this.status(run);
      const label =
        status.state === 'complete'
          ? 'COMPLETE'
          : `INCOMPLETE (${status.stages.length}/${STAGE_NAMES.length})`;
      lines.push(`${runDateToIso(run.date)}: ${label}`);
      const present = new Set(status.stages);
      for (const stage of STAGE_NAMES) {
        lines.push(`  ${present.has(stage) ? '✓' : '✗'} ${stageFolder(stage)}`);
      }
    }
    return lines;
  }

  /**
   * Create the run for `date`, or clear the completed stages of an existing one.
   */
  private async startRun(date: string): Promise<RunHandle> {
    await this.index.update(index => {
      const nowIso = this.now().toISOString();
      const existing = findRun(index, date);
      if (existing) {
        existing.stages = [];
        existing.restartedAt = nowIso;
        existing.updatedAt = nowIso;
        return;
      }
      index.runs.push({ date, createdAt: nowIso, updatedAt: nowIso, stages: [] });
    });
    await mkdir(this.runRoot(date), { recursive: true });
    return this.handleFor(date);
  }

  /**
   * Drop `stage` and every later stage from the completed set; their outputs are stale.
   */
  private async invalidateFrom(date: string, stage: StageName): Promise<void> {
    const stale = new Set<StageName>([stage, ...stagesAfter(stage)]);
    await this.index.update(index => {
      const record = findRun(index, date);
      if (!record) {
        throw new Error(`Run ${date} is not in the run index`);
      }
      record.stages = record.stages.filter(entry => !stale.has(entry.name));
      record.updatedAt = this.now().toISOString();
    });
  }

  private async requireRun(date: string): Promise<RunRecord> {
    const record = await this.getRun(date);
    if (!record) {
      throw new Error(`Run ${date} is not in the run index`);
    }
    return record;
  }

  private async requireRunFromHandle(run: RunHandle): Promise<RunRecord> {
    if (run.kind === 'override') {
      throw new Error(`Override directory ${run.root} has no tracked status`);
    }
    return this.requireRun(run.date);
  }
}
