import { join } from 'node:path';
import { rename } from 'node:fs/promises';
import { atomicWriteJSON, readFileOrNull, ensureDir, exists } from '../util/fs.js';
import type { StructuredLogger } from '../logging/logger.js';
import { RunNotFoundError, RunAlreadyExistsError, StateCorruptError } from '../errors.js';
import { RunSchema, RUN_STATE_VERSION, assertRunInvariants, createRun, type Run } from './run-state.js';

export const STATE_DIR_NAME = '.stageline';
export const STATE_FILE_NAME = 'run-state.json';

export function stateDirFor(workDir: string): string {
  return join(workDir, STATE_DIR_NAME);
}

/**
 * Durable home of a single Run: `<workDir>/.stageline/run-state.json`.
 *
 * Every save goes through a temp file, fsync and rename, so a reader sees
 * either the previous record or the new one in full.
 */
export class StateStore {
  readonly stateDir: string;
  readonly statePath: string;

  constructor(
    readonly workDir: string,
    private readonly logger: StructuredLogger,
  ) {
    this.stateDir = stateDirFor(workDir);
    this.statePath = join(this.stateDir, STATE_FILE_NAME);
  }

  async exists(): Promise<boolean> {
    const content = await readFileOrNull(this.statePath);
    return content !== null && content.trim().length > 0;
  }

  /**
   * Read and validate the persisted Run. Never repairs a bad record.
   */
  async load(): Promise<Run> {
    const content = await readFileOrNull(this.statePath);
    if (content === null || content.trim().length === 0) {
      throw new RunNotFoundError(`No run state at ${this.statePath}`, this.statePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new StateCorruptError(
        `Run state at ${this.statePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        this.statePath,
      );
    }

    if (typeof raw === 'object' && raw !== null && 'version' in raw && raw.version !== RUN_STATE_VERSION) {
      throw new StateCorruptError(
        `Run state at ${this.statePath} has unsupported version ${String(raw.version)} (expected ${RUN_STATE_VERSION})`,
        this.statePath,
        [`version: ${String(raw.version)}`],
      );
    }

    const result = RunSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new StateCorruptError(
        `Run state at ${this.statePath} failed validation:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
        this.statePath,
        issues,
      );
    }
    return result.data;
  }

  /** Like load(), but null when there is no record yet. */
  async tryLoad(): Promise<Run | null> {
    try {
      return await this.load();
    } catch (err) {
      if (err instanceof RunNotFoundError) return null;
      throw err;
    }
  }

  /**
   * Validate and persist the Run. `updatedAt` is stamped on the passed object.
   */
  async save(run: Run): Promise<void> {
    assertRunInvariants(run);
    run.updatedAt = new Date().toISOString();
    await atomicWriteJSON(this.statePath, run);
    this.logger.debug('Saved run state', {
      runId: run.runId,
      data: { currentStage: run.currentStage, completed: run.completed },
    });
  }

  /**
   * Create and persist a fresh Run with every stage pending.
   */
  async initialize(stageNames: readonly string[], runId?: string): Promise<Run> {
    if (await this.exists()) {
      const existing = await this.tryLoadId();
      throw new RunAlreadyExistsError(
        `A run already exists at ${this.statePath}${existing ? ` (${existing})` : ''}`,
        this.statePath,
        existing,
      );
    }

    await ensureDir(this.stateDir);
    const run = createRun(stageNames, runId);
    await this.save(run);
    this.logger.info(`Initialized run ${run.runId}`, {
      runId: run.runId,
      data: { stages: [...stageNames] },
    });
    return run;
  }

  /**
   * Move the current record aside as `run-state.<runId>.json` so a new Run can start.
   * Returns the archive path, or null when there was nothing to archive.
   */
  async archive(): Promise<string | null> {
    if (!(await exists(this.statePath))) return null;

    const runId = (await this.tryLoadId()) ?? `unknown-${Date.now()}`;
    const target = join(this.stateDir, `run-state.${runId}.json`);
    await rename(this.statePath, target);
    this.logger.info(`Archived run state to ${target}`, { runId });
    return target;
  }

  /** Best-effort run id of the current record, for messages. */
  private async tryLoadId(): Promise<string | null> {
    try {
      return (await this.load()).runId;
    } catch (err) {
      if (err instanceof StateCorruptError || err instanceof RunNotFoundError) return null;
      throw err;
    }
  }
}
