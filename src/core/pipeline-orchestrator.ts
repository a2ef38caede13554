import { resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  StageExecutor,
  type StageResult,
  type StageRunner,
} from '../../packages/agent-runtime/src/index.js';
import type { RuntimeConfig, RuntimeStageConfig } from '../config/loader.js';
import type { StructuredLogger } from '../logging/logger.js';
import { RunStateError } from '../errors.js';
import { StateStore } from '../state/state-store.js';
import { RunLock } from '../state/run-lock.js';
import {
  archiveAttempt,
  firstOpenStage,
  getStage,
  isFinal,
  type Run,
  type StageRecord,
} from '../state/run-state.js';
import { RunProgressWriter } from './progress.js';
import { buildStageSpec } from './stage-plan.js';
import { exists } from '../util/fs.js';

export type StageCallback = (stage: StageRecord, run: Run) => void | Promise<void>;

export interface PipelineOrchestratorOptions {
  config: RuntimeConfig;
  logger: StructuredLogger;
  /** Defaults to a StageExecutor configured from `config`. */
  runner?: StageRunner;
  store?: StateStore;
  lock?: RunLock;
  /** Fires once the stage's `running` record has been saved. */
  onStageStarted?: StageCallback;
  /** Fires once the stage's terminal record has been saved. */
  onStageFinished?: StageCallback;
}

export interface RunOptions {
  /** Archive an existing Run instead of refusing to start. */
  force?: boolean;
  /** Stages to mark skipped before anything executes. */
  skip?: readonly string[];
  /** Pass the approval checkpoint without suspending. */
  approve?: boolean;
  signal?: AbortSignal;
}

export interface ResumeOptions {
  approve?: boolean;
  signal?: AbortSignal;
}

export type PipelineResult =
  | { status: 'completed'; run: Run }
  | { status: 'suspended'; run: Run; afterStage: string; nextStage: string }
  | { status: 'halted'; run: Run; stage: string; error: string }
  | { status: 'cancelled'; run: Run; stage: string };

interface AdvanceOptions {
  approve: boolean;
  signal?: AbortSignal;
}

/**
 * Drives a Run through its stages, persisting every transition before acting on it.
 *
 * Flow: load/initialize → skip final records → mark running, save → execute →
 * save terminal result → checkpoint, retry, halt or move on.
 */
export class PipelineOrchestrator {
  readonly store: StateStore;
  private readonly config: RuntimeConfig;
  private readonly logger: StructuredLogger;
  private readonly runner: StageRunner;
  private readonly lock: RunLock;
  private readonly progress: RunProgressWriter;
  private readonly onStageStarted?: StageCallback;
  private readonly onStageFinished?: StageCallback;

  constructor(opts: PipelineOrchestratorOptions) {
    this.config = opts.config;
    this.logger = opts.logger;
    this.store = opts.store ?? new StateStore(opts.config.workDir, opts.logger);
    this.lock = opts.lock ?? new RunLock(this.store.stateDir, opts.logger);
    this.progress = new RunProgressWriter(this.store.stateDir, opts.logger);
    this.runner =
      opts.runner ??
      new StageExecutor({
        logger: opts.logger,
        pollIntervalMs: opts.config.pollIntervalMs,
        killGraceMs: opts.config.killGraceMs,
        maxLogBufferBytes: opts.config.maxLogBufferBytes,
        redactLogs: opts.config.environment.redactLogs,
      });
    this.onStageStarted = opts.onStageStarted;
    this.onStageFinished = opts.onStageFinished;
  }

  /**
   * Start a fresh Run of the configured pipeline.
   */
  async run(options: RunOptions = {}): Promise<PipelineResult> {
    const skip = options.skip ?? [];
    for (const name of skip) {
      this.stageConfig(name);
    }

    return this.lock.withLock(async () => {
      if (options.force) {
        await this.store.archive();
      }
      const run = await this.store.initialize(this.config.stages.map((s) => s.name));

      if (skip.length > 0) {
        for (const name of skip) {
          await this.markSkipped(run, getStage(run, name), 'skipped at launch');
        }
        run.currentStage = firstOpenStage(run)?.name ?? null;
        this.settle(run);
        await this.persist(run);
      }

      this.logger.event({
        type: 'run-started',
        runId: run.runId,
        workDir: this.config.workDir,
        stages: run.stages.map((s) => s.name),
        resumed: false,
      });
      this.progress.appendEvent(`Run ${run.runId} started`);

      return this.advance(run, { approve: options.approve ?? false, signal: options.signal });
    });
  }

  /**
   * Continue the persisted Run from wherever it stopped.
   */
  async resume(options: ResumeOptions = {}): Promise<PipelineResult> {
    const approve = options.approve ?? false;

    // Nothing to do: leave the record untouched and skip the lock.
    const snapshot = await this.store.load();
    const idle = this.idleResult(snapshot, approve);
    if (idle) return idle;

    return this.lock.withLock(async () => {
      const run = await this.store.load();
      const idleNow = this.idleResult(run, approve);
      if (idleNow) return idleNow;

      this.assertMatchesPipeline(run);

      for (const record of run.stages) {
        if (record.status === 'running') {
          this.logger.warn(`Stage ${record.name} was running when the orchestrator stopped; starting a new attempt`, {
            runId: run.runId,
            stage: record.name,
          });
          archiveAttempt(record, 'abandoned');
        }
      }

      if (run.failedStage !== null) {
        const failed = getStage(run, run.failedStage);
        if (failed.status === 'failed') archiveAttempt(failed);
        run.failedStage = null;
        run.outcome = null;
      }

      // A failed critical stage is never passed over, even when failedStage was not recorded.
      for (const record of run.stages) {
        if (record.status === 'failed' && this.stageConfig(record.name).critical) {
          this.logger.warn(`Stage ${record.name} failed without halting the run; starting a new attempt`, {
            runId: run.runId,
            stage: record.name,
          });
          archiveAttempt(record);
        }
      }

      if (run.awaitingApproval) {
        this.logger.info(`Approval granted after ${run.awaitingApproval.afterStage}`, { runId: run.runId });
        this.progress.appendEvent(`Approved after ${run.awaitingApproval.afterStage}`);
        run.awaitingApproval = null;
      }

      run.resumeCount += 1;
      run.currentStage = firstOpenStage(run)?.name ?? null;
      this.settle(run);
      await this.persist(run);

      this.logger.event({
        type: 'run-started',
        runId: run.runId,
        workDir: this.config.workDir,
        stages: run.stages.map((s) => s.name),
        resumed: true,
      });
      this.progress.appendEvent(`Run ${run.runId} resumed (#${run.resumeCount})`);

      return this.advance(run, { approve, signal: options.signal });
    });
  }

  /**
   * Mark a pending or failed stage as skipped.
   */
  async skipStage(name: string, reason = 'skipped by operator'): Promise<Run> {
    return this.lock.withLock(async () => {
      const run = await this.store.load();
      const record = getStage(run, name);
      if (run.completed) {
        throw new RunStateError(`run ${run.runId} is already completed`, name);
      }
      if (record.status !== 'pending' && record.status !== 'failed') {
        throw new RunStateError(`cannot skip stage ${name}: it is ${record.status}`, name);
      }

      await this.markSkipped(run, record, reason);
      if (run.failedStage === name) {
        run.failedStage = null;
        run.outcome = null;
      }
      run.currentStage = firstOpenStage(run)?.name ?? null;
      this.settle(run);
      await this.persist(run);
      return run;
    });
  }

  /**
   * Close the Run as degraded: every open record is skipped.
   */
  async finalize(): Promise<Run> {
    return this.lock.withLock(async () => {
      const run = await this.store.load();
      if (run.completed) return run;

      for (const record of run.stages) {
        if (record.status === 'pending' || record.status === 'running') {
          await this.markSkipped(run, record, 'finalized as degraded');
        }
      }
      const now = new Date().toISOString();
      run.completed = true;
      run.completedAt = now;
      run.outcome = 'degraded';
      run.currentStage = null;
      run.awaitingApproval = null;
      await this.persist(run);

      this.logger.event(
        { type: 'run-completed', runId: run.runId, outcome: 'degraded', duration: elapsedMs(run.createdAt, now) },
        'warn',
      );
      return run;
    });
  }

  /** The persisted Run, read fresh from disk. */
  async status(): Promise<Run> {
    return this.store.load();
  }

  // ── Advancing ──

  private async advance(run: Run, opts: AdvanceOptions): Promise<PipelineResult> {
    const attemptsThisInvocation = new Map<string, number>();

    for (const record of run.stages) {
      if (record.status !== 'pending' && record.status !== 'running') continue;
      const stage = this.stageConfig(record.name);

      for (;;) {
        if (opts.signal?.aborted) {
          this.logger.warn(`Cancelled before stage ${record.name} started`, { runId: run.runId, stage: record.name });
          return { status: 'cancelled', run, stage: record.name };
        }

        const used = (attemptsThisInvocation.get(record.name) ?? 0) + 1;
        attemptsThisInvocation.set(record.name, used);

        const result = await this.executeStage(run, record, stage, opts.signal);

        if (result.success) {
          run.currentStage = firstOpenStage(run)?.name ?? null;
          const gate = this.approvalGate(run, record, opts.approve);
          if (gate) {
            run.awaitingApproval = { afterStage: record.name, since: new Date().toISOString() };
          }
          this.settle(run);
          await this.persist(run);
          await this.onStageFinished?.(record, run);

          if (gate) {
            this.logger.event({ type: 'run-suspended', runId: run.runId, afterStage: record.name, nextStage: gate });
            this.progress.appendEvent(`Suspended for approval after ${record.name}`);
            await this.progress.write(run);
            return { status: 'suspended', run, afterStage: record.name, nextStage: gate };
          }
          break;
        }

        const retryable =
          result.failure !== 'cancelled' && !opts.signal?.aborted && used < this.config.maxAttempts;

        if (retryable) {
          // Saved as halted until the failed attempt is archived and reopened.
          run.currentStage = null;
          run.failedStage = record.name;
          run.outcome = 'failed';
          await this.persist(run);
          await this.onStageFinished?.(record, run);

          const waitMs = retryBackoffMs(used, this.config.retryDelayMs, this.config.retryMaxDelayMs);
          this.logger.event(
            {
              type: 'stage-retrying',
              runId: run.runId,
              stage: record.name,
              attempt: used + 1,
              maxAttempts: this.config.maxAttempts,
              delayMs: Math.round(waitMs),
            },
            'warn',
          );
          archiveAttempt(record);
          run.failedStage = null;
          run.outcome = null;
          run.currentStage = record.name;
          await this.persist(run);
          await delay(waitMs, opts.signal);
          continue;
        }

        const cancelled = result.failure === 'cancelled' || opts.signal?.aborted === true;
        if (stage.critical || cancelled) {
          run.currentStage = null;
          run.failedStage = record.name;
          run.outcome = 'failed';
          run.completed = false;
          await this.persist(run);
          await this.onStageFinished?.(record, run);

          const error = result.error ?? 'stage failed';
          this.logger.event({ type: 'run-halted', runId: run.runId, stage: record.name, error }, 'error');
          this.progress.appendEvent(`Halted at ${record.name}: ${error}`);
          await this.progress.write(run);
          return cancelled
            ? { status: 'cancelled', run, stage: record.name }
            : { status: 'halted', run, stage: record.name, error };
        }

        // Non-critical: record the failure and keep going.
        run.currentStage = firstOpenStage(run)?.name ?? null;
        this.settle(run);
        await this.persist(run);
        await this.onStageFinished?.(record, run);
        break;
      }
    }

    this.settle(run);
    await this.persist(run);
    const outcome = run.outcome === 'degraded' ? 'degraded' : 'success';
    this.logger.event({
      type: 'run-completed',
      runId: run.runId,
      outcome,
      duration: elapsedMs(run.createdAt, run.completedAt ?? new Date().toISOString()),
    });
    this.progress.appendEvent(`Run completed (${outcome})`);
    await this.progress.write(run);
    return { status: 'completed', run };
  }

  /**
   * One attempt: persist `running`, execute, apply the terminal result to the record.
   * The caller persists the terminal state.
   */
  private async executeStage(
    run: Run,
    record: StageRecord,
    stage: RuntimeStageConfig,
    signal?: AbortSignal,
  ): Promise<StageResult> {
    const attempt = record.attemptCount + 1;
    const spec = await buildStageSpec(this.config, stage, { runId: run.runId, attempt });

    record.status = 'running';
    record.startedAt = new Date().toISOString();
    record.completedAt = null;
    record.success = null;
    record.attemptCount = attempt;
    record.logFile = spec.logFile;
    run.currentStage = record.name;
    await this.persist(run);

    this.logger.event({ type: 'stage-started', runId: run.runId, stage: record.name, attempt });
    this.progress.appendEvent(`Stage ${record.name} started (attempt ${attempt})`);
    await this.onStageStarted?.(record, run);

    let result: StageResult;
    try {
      result = await this.runner.runStage(spec, signal);
    } catch (err) {
      // The runner could not supervise the process at all; record it as a failed attempt.
      const message = err instanceof Error ? err.message : String(err);
      const now = new Date().toISOString();
      result = {
        stage: record.name,
        status: 'failed',
        success: false,
        startedAt: record.startedAt,
        completedAt: now,
        durationMs: elapsedMs(record.startedAt, now),
        outputs: {},
        error: `stage runner error: ${message}`,
        failure: null,
        exitCode: null,
        pid: null,
        markerMetadata: null,
        logFile: spec.logFile,
      };
    }

    record.status = result.success ? 'completed' : 'failed';
    record.success = result.success;
    record.completedAt = result.completedAt;
    record.outputs = result.success ? result.outputs : {};
    record.error = result.error;
    record.failure = result.failure;
    record.exitCode = result.exitCode;
    record.logFile = result.logFile;

    if (result.success) {
      this.logger.event({
        type: 'stage-completed',
        runId: run.runId,
        stage: record.name,
        duration: result.durationMs,
        outputs: result.outputs,
      });
      this.progress.appendEvent(`Stage ${record.name} completed in ${result.durationMs}ms`);
    } else {
      this.logger.event(
        {
          type: 'stage-failed',
          runId: run.runId,
          stage: record.name,
          attempt,
          failure: result.failure,
          error: result.error ?? 'stage failed',
          critical: stage.critical,
        },
        'error',
      );
      this.progress.appendEvent(`Stage ${record.name} failed: ${result.error ?? 'unknown error'}`);
    }
    return result;
  }

  // ── Helpers ──

  /**
   * Returns the next stage name when the run should park at the approval checkpoint.
   */
  private approvalGate(run: Run, record: StageRecord, approve: boolean): string | null {
    if (approve || this.config.approvalAfter !== record.name) return null;
    return run.currentStage;
  }

  /** Result for a resume that has nothing to do, or null when work remains. */
  private idleResult(run: Run, approve: boolean): PipelineResult | null {
    if (run.completed) {
      this.logger.info(`Run ${run.runId} is already completed`, { runId: run.runId });
      return { status: 'completed', run };
    }
    if (run.awaitingApproval && !approve) {
      const nextStage = run.currentStage ?? firstOpenStage(run)?.name ?? '';
      this.logger.info(`Run ${run.runId} is awaiting approval after ${run.awaitingApproval.afterStage}`, {
        runId: run.runId,
      });
      return { status: 'suspended', run, afterStage: run.awaitingApproval.afterStage, nextStage };
    }
    return null;
  }

  /**
   * Mark the run completed once no record is open and nothing halted it.
   */
  private settle(run: Run): void {
    if (run.failedStage !== null || run.completed) return;
    if (run.stages.some((s) => s.status === 'pending' || s.status === 'running')) return;

    run.completed = true;
    run.completedAt = new Date().toISOString();
    run.outcome = run.stages.every((s) => isFinal(s.status)) ? 'success' : 'degraded';
    run.currentStage = null;
    run.awaitingApproval = null;
  }

  private async markSkipped(run: Run, record: StageRecord, reason: string): Promise<void> {
    const stage = this.stageConfig(record.name);
    const outputs: Record<string, string> = {};
    for (const [name, rel] of Object.entries({ ...stage.requiredOutputs, ...stage.optionalOutputs })) {
      const abs = resolve(this.config.workDir, rel);
      if (await exists(abs)) outputs[name] = abs;
    }

    record.status = 'skipped';
    record.success = true;
    record.completedAt = new Date().toISOString();
    record.outputs = outputs;
    record.error = null;
    record.failure = null;

    this.logger.event({ type: 'stage-skipped', runId: run.runId, stage: record.name, reason });
    this.progress.appendEvent(`Stage ${record.name} skipped: ${reason}`);
  }

  private stageConfig(name: string): RuntimeStageConfig {
    const stage = this.config.stages.find((s) => s.name === name);
    if (!stage) throw new RunStateError(`stage "${name}" is not defined in the pipeline config`, name);
    return stage;
  }

  private assertMatchesPipeline(run: Run): void {
    const persisted = run.stages.map((s) => s.name).join(', ');
    const configured = this.config.stages.map((s) => s.name).join(', ');
    if (persisted !== configured) {
      throw new RunStateError(
        `run ${run.runId} was created for stages [${persisted}] but the config defines [${configured}]`,
      );
    }
  }

  private async persist(run: Run): Promise<void> {
    await this.store.save(run);
    await this.progress.write(run);
  }
}

function elapsedMs(from: string, to: string): number {
  return Math.max(0, Date.parse(to) - Date.parse(from));
}

/**
 * Wait before automatic retry `attempt + 1`: exponential backoff from `baseMs` plus up to
 * `baseMs` of jitter, capped at `maxMs`.
 */
export function retryBackoffMs(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  if (baseMs <= 0) return 0;
  return Math.min(baseMs * Math.pow(2, attempt - 1) + random() * baseMs, maxMs);
}

async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
}
