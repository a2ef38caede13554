import { randomBytes } from 'node:crypto';
import { format } from 'date-fns';
import { z } from 'zod';
import { RunStateError } from '../errors.js';

export const RUN_STATE_VERSION = 1;

export const StageStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'skipped']);
export type StageStatus = z.infer<typeof StageStatusSchema>;

export const StageFailureSchema = z.enum([
  'timeout',
  'incomplete-outputs',
  'exited-without-marker',
  'cancelled',
  'abandoned',
]);

const isoString = z.string().min(1);

/** Summary of an earlier attempt that failed or was abandoned. */
export const AttemptSummarySchema = z.object({
  attempt: z.number().int().min(1),
  startedAt: isoString.nullable(),
  completedAt: isoString.nullable(),
  failure: StageFailureSchema.nullable(),
  error: z.string().nullable(),
  exitCode: z.number().int().nullable(),
  logFile: z.string().nullable(),
});
export type AttemptSummary = z.infer<typeof AttemptSummarySchema>;

export const StageRecordSchema = z.object({
  name: z.string().min(1),
  status: StageStatusSchema,
  startedAt: isoString.nullable(),
  completedAt: isoString.nullable(),
  success: z.boolean().nullable(),
  outputs: z.record(z.string(), z.string()),
  error: z.string().nullable(),
  failure: StageFailureSchema.nullable(),
  exitCode: z.number().int().nullable(),
  attemptCount: z.number().int().min(0),
  attempts: z.array(AttemptSummarySchema),
  logFile: z.string().nullable(),
});
export type StageRecord = z.infer<typeof StageRecordSchema>;

export const RunSchema = z.object({
  version: z.literal(RUN_STATE_VERSION),
  runId: z.string().min(1),
  createdAt: isoString,
  updatedAt: isoString,
  currentStage: z.string().nullable(),
  completed: z.boolean(),
  completedAt: isoString.nullable(),
  outcome: z.enum(['success', 'degraded', 'failed']).nullable(),
  failedStage: z.string().nullable(),
  awaitingApproval: z
    .object({
      afterStage: z.string(),
      since: isoString,
    })
    .nullable(),
  resumeCount: z.number().int().min(0),
  stages: z.array(StageRecordSchema).min(1),
});
export type Run = z.infer<typeof RunSchema>;
export type RunOutcome = NonNullable<Run['outcome']>;

const TERMINAL: ReadonlySet<StageStatus> = new Set(['completed', 'failed', 'skipped']);

/** True for statuses that close out a stage for the Run (never re-executed). */
export function isFinal(status: StageStatus): boolean {
  return status === 'completed' || status === 'skipped';
}

export function isTerminal(status: StageStatus): boolean {
  return TERMINAL.has(status);
}

/** `<yyyyMMdd-HHmmss>-<8 hex>` */
export function generateRunId(now: Date = new Date()): string {
  return `${format(now, 'yyyyMMdd-HHmmss')}-${randomBytes(4).toString('hex')}`;
}

export function createStageRecord(name: string): StageRecord {
  return {
    name,
    status: 'pending',
    startedAt: null,
    completedAt: null,
    success: null,
    outputs: {},
    error: null,
    failure: null,
    exitCode: null,
    attemptCount: 0,
    attempts: [],
    logFile: null,
  };
}

export function createRun(stageNames: readonly string[], runId: string = generateRunId()): Run {
  if (stageNames.length === 0) {
    throw new RunStateError('a run needs at least one stage');
  }
  const seen = new Set<string>();
  for (const name of stageNames) {
    if (name.length === 0) throw new RunStateError('stage names must not be empty');
    if (seen.has(name)) throw new RunStateError(`duplicate stage name "${name}"`, name);
    seen.add(name);
  }

  const now = new Date().toISOString();
  return {
    version: RUN_STATE_VERSION,
    runId,
    createdAt: now,
    updatedAt: now,
    currentStage: stageNames[0] ?? null,
    completed: false,
    completedAt: null,
    outcome: null,
    failedStage: null,
    awaitingApproval: null,
    resumeCount: 0,
    stages: stageNames.map(createStageRecord),
  };
}

export function findStage(run: Run, name: string): StageRecord | undefined {
  return run.stages.find((s) => s.name === name);
}

export function getStage(run: Run, name: string): StageRecord {
  const record = findStage(run, name);
  if (!record) throw new RunStateError(`unknown stage "${name}"`, name);
  return record;
}

/** First record that is pending or running, in pipeline order. */
export function firstOpenStage(run: Run): StageRecord | undefined {
  return run.stages.find((s) => s.status === 'pending' || s.status === 'running');
}

/**
 * Move the latest attempt of a record into its history and reset it to pending.
 * `failure` overrides the recorded failure kind (used for abandoned attempts).
 */
export function archiveAttempt(record: StageRecord, failure?: AttemptSummary['failure']): void {
  record.attempts.push({
    attempt: record.attemptCount,
    startedAt: record.startedAt,
    completedAt: record.completedAt,
    failure: failure ?? record.failure,
    error: failure === 'abandoned' ? 'orchestrator stopped while the stage was running' : record.error,
    exitCode: record.exitCode,
    logFile: record.logFile,
  });
  record.status = 'pending';
  record.startedAt = null;
  record.completedAt = null;
  record.success = null;
  record.outputs = {};
  record.error = null;
  record.failure = null;
  record.exitCode = null;
}

/**
 * Check the structural invariants of a Run.
 * Returns the list of violations; empty when the Run is consistent.
 */
export function findInvariantViolations(run: Run): string[] {
  const violations: string[] = [];

  const names = new Set<string>();
  for (const record of run.stages) {
    if (names.has(record.name)) violations.push(`duplicate stage record "${record.name}"`);
    names.add(record.name);
  }

  const running = run.stages.filter((s) => s.status === 'running');
  if (running.length > 1) {
    violations.push(`more than one stage is running: ${running.map((s) => s.name).join(', ')}`);
  }

  if (run.currentStage !== null) {
    const current = findStage(run, run.currentStage);
    if (!current) {
      violations.push(`currentStage "${run.currentStage}" does not name a stage`);
    } else if (current.status !== 'pending' && current.status !== 'running') {
      violations.push(`currentStage "${run.currentStage}" is ${current.status}`);
    }
  }

  const allFinal = run.stages.every((s) => isFinal(s.status));
  if (allFinal && !run.completed) {
    violations.push('every stage is completed or skipped but the run is not marked completed');
  }

  if (run.completed) {
    const open = run.stages.filter((s) => s.status === 'pending' || s.status === 'running');
    if (open.length > 0) {
      violations.push(`run is marked completed but ${open.map((s) => s.name).join(', ')} still open`);
    }
  }

  return violations;
}

export function assertRunInvariants(run: Run): void {
  const violations = findInvariantViolations(run);
  if (violations.length > 0) {
    throw new RunStateError(`run ${run.runId} violates its invariants: ${violations.join('; ')}`);
  }
}
