import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { StageExecutor } from '../../../../packages/agent-runtime/src/executor/stage-executor.js';
import type { Logger, StageSpec } from '../../../../packages/agent-runtime/src/types.js';

function makeLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('StageExecutor', () => {
  let workDir: string;
  let executor: StageExecutor;

  const spec = (script: string, overrides: Partial<StageSpec> = {}): StageSpec => ({
    name: 'demo',
    command: 'sh',
    args: ['-c', script],
    workingDir: workDir,
    timeoutMs: 10_000,
    markerName: '.stage_done',
    requiredOutputs: {},
    allowExitCodeSuccess: false,
    logFile: join(workDir, 'logs', 'demo-attempt-1.log'),
    ...overrides,
  });

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'stageline-exec-'));
    executor = new StageExecutor({ logger: makeLogger(), pollIntervalMs: 25, killGraceMs: 200 });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should succeed when the marker and required outputs exist', async () => {
    const result = await executor.runStage(
      spec(`echo working; echo '# review' > review.md; printf '{"papers":2}' > m.tmp && mv m.tmp .stage_done`, {
        requiredOutputs: { review: 'review.md' },
        optionalOutputs: { papers: 'papers', notes: 'notes.md' },
      }),
    );

    expect(result.success).toBe(true);
    expect(result.status).toBe('completed');
    expect(result.error).toBeNull();
    expect(result.failure).toBeNull();
    expect(result.outputs).toEqual({ review: join(workDir, 'review.md') });
    expect(result.markerMetadata).toEqual({ papers: 2 });
  });

  it('should record optional outputs only when present', async () => {
    const result = await executor.runStage(
      spec(`mkdir papers; touch .stage_done`, { optionalOutputs: { papers: 'papers' } }),
    );
    expect(result.outputs).toEqual({ papers: join(workDir, 'papers') });
  });

  it('should write a header, the child output and a footer to the log file', async () => {
    const result = await executor.runStage(spec(`echo working; touch .stage_done`));
    const lines = (await readFile(result.logFile, 'utf-8')).split('\n');

    expect(lines[0]).toBe('=== Stage: demo ===');
    expect(lines[2]).toBe("=== Command: sh -c echo working; touch .stage_done ===");
    expect(lines).toContain('working');
    expect(lines).toContain('=== Outcome: completed ===');
  });

  it('should fail with incomplete-outputs when the marker exists but an output is missing', async () => {
    const result = await executor.runStage(
      spec(`touch .stage_done`, { requiredOutputs: { review: 'review.md', plan: 'plan.md' } }),
    );

    expect(result.success).toBe(false);
    expect(result.failure).toBe('incomplete-outputs');
    expect(result.error).toBe('stage reported completion but required outputs are missing: review.md, plan.md');
    expect(result.outputs).toEqual({});
  });

  it('should terminate the process when the timeout elapses', async () => {
    const started = Date.now();
    const result = await executor.runStage(spec(`sleep 30`, { timeoutMs: 300 }));

    expect(result.failure).toBe('timeout');
    expect(result.error).toBe('stage exceeded timeout of 0.3sec');
    expect(Date.now() - started).toBeLessThan(300 + 200 + 2000);
    expect(result.pid).not.toBeNull();
    expect(pidAlive(result.pid ?? process.pid)).toBe(false);
  });

  it('should fail with exited-without-marker on a non-zero exit', async () => {
    const result = await executor.runStage(spec(`exit 4`));

    expect(result.failure).toBe('exited-without-marker');
    expect(result.exitCode).toBe(4);
    expect(result.error).toBe('process exited with code 4 without writing completion marker .stage_done');
  });

  it('should name the signal when the process is killed', async () => {
    const result = await executor.runStage(spec(`kill -9 $$`));

    expect(result.failure).toBe('exited-without-marker');
    expect(result.error).toBe('process terminated by signal SIGKILL without writing completion marker .stage_done');
  });

  it('should not count a marker left by an earlier attempt', async () => {
    await writeFile(join(workDir, '.stage_done'), '');
    const result = await executor.runStage(spec(`exit 1`));

    expect(result.failure).toBe('exited-without-marker');
  });

  it('should accept exit code 0 without a marker when allowed', async () => {
    const result = await executor.runStage(
      spec(`echo ok > review.md`, { allowExitCodeSuccess: true, requiredOutputs: { review: 'review.md' } }),
    );

    expect(result.success).toBe(true);
    expect(result.outputs).toEqual({ review: join(workDir, 'review.md') });
  });

  it('should still verify outputs on exit-code success', async () => {
    const result = await executor.runStage(
      spec(`exit 0`, { allowExitCodeSuccess: true, requiredOutputs: { review: 'review.md' } }),
    );

    expect(result.failure).toBe('incomplete-outputs');
  });

  it('should report launch failures', async () => {
    const result = await executor.runStage(spec('', { command: 'stageline-no-such-binary', args: [] }));

    expect(result.failure).toBe('exited-without-marker');
    expect(result.error).toContain('failed to launch stageline-no-such-binary:');
    expect(result.pid).toBeNull();
  });

  it('should terminate the process when cancelled', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await executor.runStage(spec(`sleep 30`), controller.signal);

    expect(result.failure).toBe('cancelled');
    expect(result.error).toBe('stage cancelled by operator');
    expect(pidAlive(result.pid ?? process.pid)).toBe(false);
  });

  it('should pipe the input blob to the process', async () => {
    const result = await executor.runStage(
      spec(`cat > prompt.txt; touch .stage_done`, { input: 'gather resources', requiredOutputs: { prompt: 'prompt.txt' } }),
    );

    expect(result.success).toBe(true);
    expect(await readFile(join(workDir, 'prompt.txt'), 'utf-8')).toBe('gather resources');
  });
});
