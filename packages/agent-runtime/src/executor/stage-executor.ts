import { join, resolve } from 'node:path';
import type { ExitInfo, Logger, StageFailureKind, StageResult, StageRunner, StageSpec } from '../types.js';
import { FileMarkerSignal, type CompletionOutcome, type CompletionSignal } from '../completion/completion-signal.js';
import { ProcessHandle } from '../process/process-handle.js';
import { LogSink } from '../process/log-sink.js';
import { exists, removeFile } from '../util/fs.js';

export interface StageExecutorOptions {
  logger: Logger;
  /** Defaults to a FileMarkerSignal polling every `pollIntervalMs`. */
  completion?: CompletionSignal;
  pollIntervalMs?: number;
  /** Time between SIGTERM and SIGKILL, and the time a finished agent gets to exit by itself. */
  killGraceMs?: number;
  maxLogBufferBytes?: number;
  redactLogs?: boolean;
}

/** Upper bound on waiting for stdout/stderr to close once the process is gone. */
const STREAM_DRAIN_MS = 1000;

interface Classification {
  success: boolean;
  error: string | null;
  failure: StageFailureKind | null;
  outputs: Record<string, string>;
}

/**
 * Supervises a single external process from launch to a terminal StageResult.
 *
 * The executor never persists anything and never retries; both belong to the caller.
 */
export class StageExecutor implements StageRunner {
  private readonly logger: Logger;
  private readonly completion: CompletionSignal;
  private readonly killGraceMs: number;
  private readonly maxLogBufferBytes: number;
  private readonly redactLogs: boolean;

  constructor(opts: StageExecutorOptions) {
    this.logger = opts.logger;
    this.completion = opts.completion ?? new FileMarkerSignal(opts.pollIntervalMs ?? 2000);
    this.killGraceMs = opts.killGraceMs ?? 5000;
    this.maxLogBufferBytes = opts.maxLogBufferBytes ?? 1024 * 1024;
    this.redactLogs = opts.redactLogs ?? true;
  }

  async runStage(spec: StageSpec, signal?: AbortSignal): Promise<StageResult> {
    const startedAt = new Date();
    // A marker from an earlier attempt must not count for this one.
    await removeFile(join(spec.workingDir, spec.markerName));

    const sink = await LogSink.open(spec.logFile, {
      maxBufferedBytes: this.maxLogBufferBytes,
      redact: this.redactLogs,
      logger: this.logger,
      stage: spec.name,
    });
    sink.writeLine(`=== Stage: ${spec.name} ===`);
    sink.writeLine(`=== Started: ${startedAt.toISOString()} ===`);
    sink.writeLine(`=== Command: ${[spec.command, ...spec.args].join(' ')} ===`);
    sink.writeLine('');

    const handle = ProcessHandle.spawn(spec.command, spec.args, {
      stageName: spec.name,
      cwd: spec.workingDir,
      env: spec.env,
      input: spec.input,
      timeoutMs: spec.timeoutMs,
      onOutput: (chunk) => sink.write(chunk),
    });

    this.logger.info(`Launched stage ${spec.name}`, {
      stage: spec.name,
      data: { pid: handle.pid, command: spec.command, timeoutMs: spec.timeoutMs, logFile: spec.logFile },
    });

    const onAbort = (): void => handle.markCancelled();
    signal?.addEventListener('abort', onAbort, { once: true });

    let outcome: CompletionOutcome;
    let exit: ExitInfo;
    try {
      outcome = await this.completion.poll({
        workingDir: spec.workingDir,
        markerName: spec.markerName,
        deadline: startedAt.getTime() + spec.timeoutMs,
        process: handle,
        signal,
      });
      exit = await this.settleProcess(handle, outcome);
    } catch (err) {
      await handle.terminate(this.killGraceMs);
      await sink.close();
      throw err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    await Promise.race([handle.streamsClosed, delay(STREAM_DRAIN_MS)]);
    if (handle.stdinError) {
      this.logger.debug(`Stage ${spec.name} did not read its input: ${handle.stdinError}`, { stage: spec.name });
    }

    const classification = await this.classify(spec, outcome, exit);
    const completedAt = new Date();
    const durationMs = completedAt.getTime() - startedAt.getTime();

    sink.writeLine('');
    sink.writeLine(`=== Outcome: ${outcome.kind} ===`);
    sink.writeLine(`=== Exit Code: ${exit.exitCode} (signal: ${exit.signal ?? 'none'}) ===`);
    sink.writeLine(`=== Duration: ${durationMs}ms ===`);
    await sink.close();

    if (classification.success) {
      this.logger.info(`Stage ${spec.name} completed in ${durationMs}ms`, {
        stage: spec.name,
        data: { outputs: classification.outputs },
      });
    } else {
      this.logger.error(`Stage ${spec.name} failed: ${classification.error}`, {
        stage: spec.name,
        data: { failure: classification.failure, exitCode: exit.exitCode, droppedLogBytes: sink.droppedBytes },
      });
    }

    return {
      stage: spec.name,
      status: classification.success ? 'completed' : 'failed',
      success: classification.success,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs,
      outputs: classification.outputs,
      error: classification.error,
      failure: classification.failure,
      exitCode: exit.exitCode,
      pid: handle.pid,
      markerMetadata: outcome.kind === 'completed' ? outcome.metadata : null,
      logFile: spec.logFile,
    };
  }

  /**
   * Make sure the process is gone once the outcome is known.
   */
  private async settleProcess(handle: ProcessHandle, outcome: CompletionOutcome): Promise<ExitInfo> {
    switch (outcome.kind) {
      case 'completed': {
        // Agents often linger after writing the marker; give them a moment to leave.
        let graceTimer: ReturnType<typeof setTimeout> | undefined;
        const graceElapsed = new Promise<null>((resolve) => {
          graceTimer = setTimeout(() => resolve(null), this.killGraceMs);
        });
        const exited = await Promise.race([handle.exited, graceElapsed]);
        clearTimeout(graceTimer);
        if (exited) {
          handle.reapGroup();
          return exited;
        }
        this.logger.debug(`Stage ${handle.stageName} still running after completion marker; terminating`, {
          stage: handle.stageName,
        });
        return handle.terminate(this.killGraceMs);
      }
      case 'timed-out':
        this.logger.warn(`Stage ${handle.stageName} exceeded its timeout; terminating pid ${handle.pid}`, {
          stage: handle.stageName,
        });
        return handle.terminate(this.killGraceMs);
      case 'cancelled':
        this.logger.warn(`Stage ${handle.stageName} cancelled; terminating pid ${handle.pid}`, {
          stage: handle.stageName,
        });
        return handle.terminate(this.killGraceMs);
      case 'exited-without-marker': {
        handle.reapGroup();
        return { exitCode: outcome.exitCode, signal: outcome.signal, error: outcome.error };
      }
    }
  }

  private async classify(spec: StageSpec, outcome: CompletionOutcome, exit: ExitInfo): Promise<Classification> {
    switch (outcome.kind) {
      case 'completed':
        return this.verifyOutputs(spec);
      case 'timed-out':
        return failed('timeout', `stage exceeded timeout of ${spec.timeoutMs / 1000}sec`);
      case 'cancelled':
        return failed('cancelled', 'stage cancelled by operator');
      case 'exited-without-marker': {
        if (exit.error) {
          return failed('exited-without-marker', `failed to launch ${spec.command}: ${exit.error}`);
        }
        if (spec.allowExitCodeSuccess && exit.exitCode === 0) {
          return this.verifyOutputs(spec);
        }
        if (exit.exitCode === null && exit.signal) {
          return failed(
            'exited-without-marker',
            `process terminated by signal ${exit.signal} without writing completion marker ${spec.markerName}`,
          );
        }
        return failed(
          'exited-without-marker',
          `process exited with code ${exit.exitCode} without writing completion marker ${spec.markerName}`,
        );
      }
    }
  }

  /**
   * The marker says the agent thinks it is done; the declared outputs say whether it is.
   */
  private async verifyOutputs(spec: StageSpec): Promise<Classification> {
    const outputs: Record<string, string> = {};
    const missing: string[] = [];

    for (const [name, relative] of Object.entries(spec.requiredOutputs)) {
      const path = resolve(spec.workingDir, relative);
      if (await exists(path)) {
        outputs[name] = path;
      } else {
        missing.push(relative);
      }
    }

    if (missing.length > 0) {
      return failed(
        'incomplete-outputs',
        `stage reported completion but required outputs are missing: ${missing.join(', ')}`,
      );
    }

    for (const [name, relative] of Object.entries(spec.optionalOutputs ?? {})) {
      const path = resolve(spec.workingDir, relative);
      if (await exists(path)) {
        outputs[name] = path;
      }
    }

    return { success: true, error: null, failure: null, outputs };
  }
}

function failed(failure: StageFailureKind, error: string): Classification {
  return { success: false, error, failure, outputs: {} };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}
