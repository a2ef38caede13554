import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FileMarkerSignal,
  readMarkerMetadata,
  type LivenessProbe,
} from '../../../../packages/agent-runtime/src/completion/completion-signal.js';
import type { ExitInfo } from '../../../../packages/agent-runtime/src/types.js';

/** A controllable stand-in for a running process. */
function makeProbe(): LivenessProbe & { finish: (info: ExitInfo) => void } {
  let exit: ExitInfo | null = null;
  let resolveExit: (info: ExitInfo) => void = () => {};
  const exited = new Promise<ExitInfo>((resolve) => {
    resolveExit = resolve;
  });
  return {
    exited,
    get exit() {
      return exit;
    },
    finish(info: ExitInfo) {
      exit = info;
      resolveExit(info);
    },
  };
}

describe('FileMarkerSignal', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'stageline-marker-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should report completion once the marker appears', async () => {
    const probe = makeProbe();
    const signal = new FileMarkerSignal(20);
    // Written aside and renamed so the poller never sees a half-written marker.
    setTimeout(async () => {
      await writeFile(join(workDir, 'marker.tmp'), JSON.stringify({ papers: 3 }));
      await rename(join(workDir, 'marker.tmp'), join(workDir, '.done'));
    }, 60);

    const outcome = await signal.poll({
      workingDir: workDir,
      markerName: '.done',
      deadline: Date.now() + 5000,
      process: probe,
    });

    expect(outcome).toEqual({ kind: 'completed', markerPath: join(workDir, '.done'), metadata: { papers: 3 } });
  });

  it('should count a marker left behind by an exited process as completed', async () => {
    const probe = makeProbe();
    await writeFile(join(workDir, '.done'), '');
    probe.finish({ exitCode: 0, signal: null });

    const outcome = await new FileMarkerSignal(20).poll({
      workingDir: workDir,
      markerName: '.done',
      deadline: Date.now() + 5000,
      process: probe,
    });

    expect(outcome).toEqual({ kind: 'completed', markerPath: join(workDir, '.done'), metadata: null });
  });

  it('should wake early when the process exits without a marker', async () => {
    const probe = makeProbe();
    setTimeout(() => probe.finish({ exitCode: 2, signal: null }), 30);
    const started = Date.now();

    const outcome = await new FileMarkerSignal(10_000).poll({
      workingDir: workDir,
      markerName: '.done',
      deadline: Date.now() + 20_000,
      process: probe,
    });

    expect(outcome).toEqual({ kind: 'exited-without-marker', exitCode: 2, signal: null, error: undefined });
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('should time out at the deadline', async () => {
    const outcome = await new FileMarkerSignal(20).poll({
      workingDir: workDir,
      markerName: '.done',
      deadline: Date.now() + 80,
      process: makeProbe(),
    });

    expect(outcome).toEqual({ kind: 'timed-out' });
  });

  it('should stop when the abort signal fires', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const outcome = await new FileMarkerSignal(10_000).poll({
      workingDir: workDir,
      markerName: '.done',
      deadline: Date.now() + 20_000,
      process: makeProbe(),
      signal: controller.signal,
    });

    expect(outcome).toEqual({ kind: 'cancelled' });
  });
});

describe('readMarkerMetadata', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'stageline-marker-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should ignore content that is not a JSON object', async () => {
    const path = join(workDir, '.done');
    await writeFile(path, '["a"]');
    expect(await readMarkerMetadata(path)).toBeNull();
    await writeFile(path, 'done');
    expect(await readMarkerMetadata(path)).toBeNull();
  });
});
