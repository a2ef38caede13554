import { describe, it, expect } from 'vitest';
import {
  archiveAttempt,
  assertRunInvariants,
  createRun,
  findInvariantViolations,
  firstOpenStage,
  generateRunId,
  getStage,
  isFinal,
  isTerminal,
  RunSchema,
} from '../../src/state/run-state.js';
import { RunStateError } from '../../src/errors.js';

describe('createRun', () => {
  it('should create every stage pending with the first one current', () => {
    const run = createRun(['gather', 'execute'], 'run-1');

    expect(run.runId).toBe('run-1');
    expect(run.version).toBe(1);
    expect(run.currentStage).toBe('gather');
    expect(run.completed).toBe(false);
    expect(run.resumeCount).toBe(0);
    expect(run.stages.map((s) => [s.name, s.status, s.attemptCount])).toEqual([
      ['gather', 'pending', 0],
      ['execute', 'pending', 0],
    ]);
    expect(RunSchema.safeParse(run).success).toBe(true);
  });

  it('should reject an empty pipeline', () => {
    expect(() => createRun([])).toThrow(RunStateError);
  });

  it('should reject duplicate stage names', () => {
    expect(() => createRun(['gather', 'gather'])).toThrow('duplicate stage name "gather"');
  });

  it('should reject an empty stage name', () => {
    expect(() => createRun(['gather', ''])).toThrow('stage names must not be empty');
  });
});

describe('generateRunId', () => {
  it('should combine a timestamp and a random suffix', () => {
    const id = generateRunId(new Date(2026, 2, 4, 5, 6, 7));
    expect(id).toMatch(/^20260304-050607-[0-9a-f]{8}$/);
  });
});

describe('status helpers', () => {
  it('should treat completed and skipped as final', () => {
    expect(isFinal('completed')).toBe(true);
    expect(isFinal('skipped')).toBe(true);
    expect(isFinal('failed')).toBe(false);
    expect(isFinal('pending')).toBe(false);
  });

  it('should treat failed as terminal but not final', () => {
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('running')).toBe(false);
  });

  it('should find the first pending or running stage', () => {
    const run = createRun(['a', 'b', 'c']);
    getStage(run, 'a').status = 'completed';
    getStage(run, 'b').status = 'failed';
    expect(firstOpenStage(run)?.name).toBe('c');
  });

  it('should throw for an unknown stage', () => {
    expect(() => getStage(createRun(['a']), 'zzz')).toThrow('unknown stage "zzz"');
  });
});

describe('archiveAttempt', () => {
  it('should move the failed attempt into history and reset the record', () => {
    const run = createRun(['a']);
    const record = getStage(run, 'a');
    Object.assign(record, {
      status: 'failed',
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: '2026-01-01T00:01:00.000Z',
      success: false,
      error: 'stage exceeded timeout of 60sec',
      failure: 'timeout',
      exitCode: null,
      attemptCount: 1,
      logFile: '/tmp/logs/a-attempt-1.log',
    });

    archiveAttempt(record);

    expect(record.attempts).toEqual([
      {
        attempt: 1,
        startedAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:01:00.000Z',
        failure: 'timeout',
        error: 'stage exceeded timeout of 60sec',
        exitCode: null,
        logFile: '/tmp/logs/a-attempt-1.log',
      },
    ]);
    expect(record.status).toBe('pending');
    expect(record.error).toBeNull();
    expect(record.failure).toBeNull();
    expect(record.attemptCount).toBe(1);
  });

  it('should label an interrupted attempt as abandoned', () => {
    const run = createRun(['a']);
    const record = getStage(run, 'a');
    record.status = 'running';
    record.attemptCount = 2;

    archiveAttempt(record, 'abandoned');

    expect(record.attempts[0]).toMatchObject({
      attempt: 2,
      failure: 'abandoned',
      error: 'orchestrator stopped while the stage was running',
    });
  });
});

describe('findInvariantViolations', () => {
  it('should accept a fresh run', () => {
    expect(findInvariantViolations(createRun(['a', 'b']))).toEqual([]);
  });

  it('should flag more than one running stage', () => {
    const run = createRun(['a', 'b']);
    getStage(run, 'a').status = 'running';
    getStage(run, 'b').status = 'running';

    expect(findInvariantViolations(run)).toEqual(['more than one stage is running: a, b']);
  });

  it('should flag a current stage that is already closed', () => {
    const run = createRun(['a', 'b']);
    getStage(run, 'a').status = 'completed';

    expect(findInvariantViolations(run)).toEqual(['currentStage "a" is completed']);
  });

  it('should flag a finished pipeline that is not marked completed', () => {
    const run = createRun(['a']);
    getStage(run, 'a').status = 'skipped';
    run.currentStage = null;

    expect(findInvariantViolations(run)).toEqual([
      'every stage is completed or skipped but the run is not marked completed',
    ]);
  });

  it('should flag a completed run with open stages', () => {
    const run = createRun(['a', 'b']);
    run.completed = true;
    run.currentStage = null;

    expect(findInvariantViolations(run)).toEqual(['run is marked completed but a, b still open']);
  });

  it('should throw a RunStateError listing the violations', () => {
    const run = createRun(['a']);
    run.currentStage = 'ghost';

    expect(() => assertRunInvariants(run)).toThrow(
      `run ${run.runId} violates its invariants: currentStage "ghost" does not name a stage`,
    );
  });
});
