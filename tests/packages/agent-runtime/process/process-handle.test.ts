import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { ProcessHandle } from '../../../../packages/agent-runtime/src/process/process-handle.js';

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('ProcessHandle', () => {
  it('should report exit code and captured output', async () => {
    const chunks: string[] = [];
    const handle = ProcessHandle.spawn('sh', ['-c', 'echo hi; exit 3'], {
      stageName: 'demo',
      cwd: tmpdir(),
      timeoutMs: 5000,
      onOutput: (chunk) => chunks.push(chunk.toString()),
    });

    const exit = await handle.exited;
    await handle.streamsClosed;

    expect(exit).toEqual({ exitCode: 3, signal: null });
    expect(chunks.join('')).toBe('hi\n');
    expect(handle.isAlive()).toBe(false);
    expect(handle.stageName).toBe('demo');
  });

  it('should pipe input to stdin', async () => {
    const chunks: string[] = [];
    const handle = ProcessHandle.spawn('cat', [], {
      stageName: 'demo',
      cwd: tmpdir(),
      input: 'opaque prompt',
      timeoutMs: 5000,
      onOutput: (chunk) => chunks.push(chunk.toString()),
    });

    await handle.exited;
    await handle.streamsClosed;
    expect(chunks.join('')).toBe('opaque prompt');
  });

  it('should surface launch failures as an exit with an error', async () => {
    const handle = ProcessHandle.spawn('stageline-no-such-binary', [], {
      stageName: 'demo',
      cwd: tmpdir(),
      timeoutMs: 5000,
    });

    const exit = await handle.exited;
    expect(handle.pid).toBeNull();
    expect(exit.exitCode).toBeNull();
    expect(exit.error).toContain('ENOENT');
  });

  it('should terminate the whole process group', async () => {
    const handle = ProcessHandle.spawn('sh', ['-c', 'sleep 30 & echo $!; wait'], {
      stageName: 'demo',
      cwd: tmpdir(),
      timeoutMs: 5000,
      onOutput: () => {},
    });
    expect(handle.pid).not.toBeNull();

    const exit = await handle.terminate(200);

    expect(exit.signal).toBe('SIGTERM');
    expect(handle.isAlive()).toBe(false);
    expect(pidAlive(handle.pid ?? 0)).toBe(false);
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    const handle = ProcessHandle.spawn('sh', ['-c', "trap '' TERM; while :; do sleep 0.05; done"], {
      stageName: 'demo',
      cwd: tmpdir(),
      timeoutMs: 5000,
    });
    // Let the shell install its trap.
    await new Promise((resolve) => setTimeout(resolve, 150));

    const exit = await handle.terminate(200);
    expect(exit.signal).toBe('SIGKILL');
  });
});
