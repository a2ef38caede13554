import { resolve } from 'node:path';
import { vi } from 'vitest';
import type {
  StageFailureKind,
  StageResult,
  StageRunner,
  StageSpec,
} from '../../packages/agent-runtime/src/index.js';
import type { StructuredLogger } from '../../src/logging/logger.js';

export type FakeOutcome =
  | { success: true }
  | { success: false; failure: StageFailureKind; error: string };

export const succeed = (): FakeOutcome => ({ success: true });

export const fail = (failure: StageFailureKind, error = `stage failed: ${failure}`): FakeOutcome => ({
  success: false,
  failure,
  error,
});

/**
 * In-process StageRunner. Outcomes are queued per stage; the last one repeats.
 * Unscripted stages succeed.
 */
export class FakeStageRunner implements StageRunner {
  readonly calls: StageSpec[] = [];
  private readonly scripts = new Map<string, FakeOutcome[]>();

  script(stage: string, ...outcomes: FakeOutcome[]): this {
    this.scripts.set(stage, outcomes);
    return this;
  }

  get stagesRun(): string[] {
    return this.calls.map((c) => c.name);
  }

  async runStage(spec: StageSpec): Promise<StageResult> {
    this.calls.push(spec);
    const queue = this.scripts.get(spec.name) ?? [];
    const outcome = (queue.length > 1 ? queue.shift() : queue[0]) ?? succeed();

    const startedAt = new Date();
    const completedAt = new Date(startedAt.getTime() + 5);
    const outputs: Record<string, string> = {};
    if (outcome.success) {
      for (const [name, rel] of Object.entries(spec.requiredOutputs)) {
        outputs[name] = resolve(spec.workingDir, rel);
      }
    }

    return {
      stage: spec.name,
      status: outcome.success ? 'completed' : 'failed',
      success: outcome.success,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: 5,
      outputs,
      error: outcome.success ? null : outcome.error,
      failure: outcome.success ? null : outcome.failure,
      exitCode: outcome.success ? 0 : 1,
      pid: 4242,
      markerMetadata: null,
      logFile: spec.logFile,
    };
  }
}

export function makeLogger(): StructuredLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    event: vi.fn(),
  };
}
