import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExitInfo } from '../types.js';
import { exists } from '../util/fs.js';

/** What the detector can observe about the supervised process. */
export interface LivenessProbe {
  /** Resolves when the process exits. */
  readonly exited: Promise<ExitInfo>;
  /** Exit details, or null while alive. */
  readonly exit: ExitInfo | null;
}

export interface PollOptions {
  workingDir: string;
  markerName: string;
  /** Epoch milliseconds after which the stage counts as timed out. */
  deadline: number;
  process: LivenessProbe;
  signal?: AbortSignal;
}

export type CompletionOutcome =
  | { kind: 'completed'; markerPath: string; metadata: Record<string, unknown> | null }
  | { kind: 'timed-out' }
  | { kind: 'exited-without-marker'; exitCode: number | null; signal: NodeJS.Signals | null; error?: string }
  | { kind: 'cancelled' };

/**
 * Decides when an external process has finished its logical unit of work.
 */
export interface CompletionSignal {
  poll(opts: PollOptions): Promise<CompletionOutcome>;
}

/**
 * Completion signalled by a marker file the agent writes into its working
 * directory. Polls on a fixed interval, waking early on process exit or abort.
 */
export class FileMarkerSignal implements CompletionSignal {
  constructor(private readonly intervalMs = 2000) {}

  async poll(opts: PollOptions): Promise<CompletionOutcome> {
    const markerPath = join(opts.workingDir, opts.markerName);
    let wake: (() => void) | null = null;
    const onAbort = (): void => wake?.();
    opts.signal?.addEventListener('abort', onAbort);
    void opts.process.exited.then(() => wake?.());

    try {
      for (;;) {
        if (opts.signal?.aborted) return { kind: 'cancelled' };

        if (await exists(markerPath)) {
          return { kind: 'completed', markerPath, metadata: await readMarkerMetadata(markerPath) };
        }

        const exit = opts.process.exit;
        if (exit) {
          // The marker may have landed between the check above and the exit.
          if (await exists(markerPath)) {
            return { kind: 'completed', markerPath, metadata: await readMarkerMetadata(markerPath) };
          }
          return { kind: 'exited-without-marker', exitCode: exit.exitCode, signal: exit.signal, error: exit.error };
        }

        const remaining = opts.deadline - Date.now();
        if (remaining <= 0) return { kind: 'timed-out' };

        await new Promise<void>((resolve) => {
          const timer = setTimeout(done, Math.min(this.intervalMs, remaining));
          function done(): void {
            clearTimeout(timer);
            resolve();
          }
          wake = done;
        });
        wake = null;
      }
    } finally {
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Best-effort parse of the marker's content. Anything but a JSON object yields null.
 */
export async function readMarkerMetadata(markerPath: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(markerPath, 'utf-8');
  } catch {
    return null;
  }
  if (content.trim().length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(content);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
