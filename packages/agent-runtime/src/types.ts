/**
 * Shared type definitions for the agent runtime.
 */

/** Minimal logger interface for runtime consumers. */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/** How a spawned process ended. */
export interface ExitInfo {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be launched at all. */
  error?: string;
}

/** Why a stage attempt did not succeed. */
export type StageFailureKind =
  | 'timeout'
  | 'incomplete-outputs'
  | 'exited-without-marker'
  | 'cancelled'
  | 'abandoned';

/**
 * Everything needed to supervise one external process invocation.
 */
export interface StageSpec {
  /** Stage name, used for logging and the process handle. */
  name: string;
  command: string;
  args: string[];
  /** Working directory of the child; the marker and outputs are resolved against it. */
  workingDir: string;
  /** Wall-clock budget in milliseconds. */
  timeoutMs: number;
  /** File name (relative to workingDir) the agent writes when it considers itself done. */
  markerName: string;
  /** Logical output name → path relative to workingDir. All must exist for success. */
  requiredOutputs: Record<string, string>;
  /** Logical output name → path relative to workingDir. Recorded when present. */
  optionalOutputs?: Record<string, string>;
  /** Treat exit code 0 without a marker as success. */
  allowExitCodeSuccess: boolean;
  /** Opaque blob piped to the child's stdin. */
  input?: string;
  env?: Record<string, string | undefined>;
  /** Destination of the child's combined stdout/stderr. */
  logFile: string;
}

/** Terminal outcome of a single stage attempt. */
export interface StageResult {
  stage: string;
  status: 'completed' | 'failed';
  success: boolean;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** Logical output name → absolute path. Empty on failure. */
  outputs: Record<string, string>;
  error: string | null;
  failure: StageFailureKind | null;
  exitCode: number | null;
  pid: number | null;
  /** Parsed JSON content of the completion marker, when it had any. */
  markerMetadata: Record<string, unknown> | null;
  logFile: string;
}

/**
 * Anything that can run a stage to a terminal result.
 * The orchestrator depends on this rather than on StageExecutor directly.
 */
export interface StageRunner {
  runStage(spec: StageSpec, signal?: AbortSignal): Promise<StageResult>;
}
