import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { ExitInfo } from '../types.js';

export interface SpawnHandleOptions {
  /** Stage this process belongs to. */
  stageName: string;
  cwd: string;
  env?: Record<string, string | undefined>;
  /** Written to stdin, which is then closed. stdin is ignored when omitted. */
  input?: string;
  /** Budget the supervisor enforces; recorded on the handle for reporting. */
  timeoutMs: number;
  /** Receives stdout and stderr chunks as they arrive. */
  onOutput?: (chunk: Buffer) => void;
}

/**
 * One spawned external process, owned by a single stage supervision.
 *
 * The child runs as the leader of its own process group so that termination
 * reaches anything it forked.
 */
export class ProcessHandle {
  readonly pid: number | null;
  readonly startedAt: Date;
  readonly stageName: string;
  readonly timeoutMs: number;
  /** Resolves once the process itself has exited (or failed to launch). */
  readonly exited: Promise<ExitInfo>;
  /** Resolves once stdout and stderr are closed. */
  readonly streamsClosed: Promise<void>;

  private exitInfo: ExitInfo | null = null;
  private cancelRequested = false;
  private stdinFailure: string | null = null;

  private constructor(private readonly child: ChildProcess, opts: SpawnHandleOptions) {
    this.pid = child.pid ?? null;
    this.startedAt = new Date();
    this.stageName = opts.stageName;
    this.timeoutMs = opts.timeoutMs;

    child.stdout?.on('data', (chunk: Buffer) => opts.onOutput?.(chunk));
    child.stderr?.on('data', (chunk: Buffer) => opts.onOutput?.(chunk));

    this.exited = new Promise<ExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitInfo = { exitCode: code, signal };
        resolve(this.exitInfo);
      });
      child.on('error', (err) => {
        // A launch failure leaves no pid and emits no 'exit'.
        if (child.pid === undefined && this.exitInfo === null) {
          this.exitInfo = { exitCode: null, signal: null, error: err.message };
          resolve(this.exitInfo);
        }
      });
    });

    this.streamsClosed = new Promise<void>((resolve) => {
      child.once('close', () => resolve());
      child.once('error', () => {
        if (child.pid === undefined) resolve();
      });
    });

    if (child.stdin) {
      child.stdin.on('error', (err) => {
        // EPIPE when the child exits without reading its input.
        this.stdinFailure = err.message;
      });
      child.stdin.end(opts.input ?? '');
    }
  }

  /**
   * Spawn a command in its own process group.
   */
  static spawn(command: string, args: string[], opts: SpawnHandleOptions): ProcessHandle {
    const spawnOpts: SpawnOptions = {
      cwd: opts.cwd,
      env: opts.env,
      stdio: [opts.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      detached: true,
    };
    return new ProcessHandle(spawn(command, args, spawnOpts), opts);
  }

  /** Exit details, or null while the process is alive. */
  get exit(): ExitInfo | null {
    return this.exitInfo;
  }

  get cancelled(): boolean {
    return this.cancelRequested;
  }

  get stdinError(): string | null {
    return this.stdinFailure;
  }

  isAlive(): boolean {
    return this.exitInfo === null;
  }

  markCancelled(): void {
    this.cancelRequested = true;
  }

  /**
   * Send SIGTERM to the process group, then SIGKILL if it is still alive after
   * `graceMs`. Resolves with the exit details once the process is gone.
   */
  async terminate(graceMs: number): Promise<ExitInfo> {
    if (this.exitInfo) {
      this.reapGroup();
      return this.exitInfo;
    }

    this.signalGroup('SIGTERM');
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<null>((resolve) => {
      graceTimer = setTimeout(() => resolve(null), graceMs);
    });
    const settled = await Promise.race([this.exited, graceElapsed]);
    clearTimeout(graceTimer);
    if (settled) {
      this.reapGroup();
      return settled;
    }

    this.signalGroup('SIGKILL');
    return this.exited;
  }

  /**
   * Kill whatever is left in the process group after the leader exited.
   */
  reapGroup(): void {
    this.signalGroup('SIGKILL');
  }

  private signalGroup(signal: NodeJS.Signals): void {
    if (this.pid === null) return;
    try {
      process.kill(-this.pid, signal);
    } catch (err) {
      if (isNoSuchProcess(err)) return;
      // Process groups are unavailable (e.g. Windows); signal the child alone.
      this.child.kill(signal);
    }
  }
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}
