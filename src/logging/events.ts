/**
 * Typed event definitions for stageline's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  runId?: string;
  stage?: string;
  message: string;
  data?: Record<string, unknown>;
}

// ── Run-level events ──

export interface RunStartedEvent {
  type: 'run-started';
  runId: string;
  workDir: string;
  stages: string[];
  resumed: boolean;
}

export interface RunSuspendedEvent {
  type: 'run-suspended';
  runId: string;
  afterStage: string;
  nextStage: string;
}

export interface RunCompletedEvent {
  type: 'run-completed';
  runId: string;
  outcome: 'success' | 'degraded';
  duration: number;
}

export interface RunHaltedEvent {
  type: 'run-halted';
  runId: string;
  stage: string;
  error: string;
}

// ── Stage-level events ──

export interface StageStartedEvent {
  type: 'stage-started';
  runId: string;
  stage: string;
  attempt: number;
}

export interface StageCompletedEvent {
  type: 'stage-completed';
  runId: string;
  stage: string;
  duration: number;
  outputs: Record<string, string>;
}

export interface StageFailedEvent {
  type: 'stage-failed';
  runId: string;
  stage: string;
  attempt: number;
  failure: string | null;
  error: string;
  critical: boolean;
}

export interface StageRetryingEvent {
  type: 'stage-retrying';
  runId: string;
  stage: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
}

export interface StageSkippedEvent {
  type: 'stage-skipped';
  runId: string;
  stage: string;
  reason: string;
}

export type PipelineEvent =
  | RunStartedEvent
  | RunSuspendedEvent
  | RunCompletedEvent
  | RunHaltedEvent
  | StageStartedEvent
  | StageCompletedEvent
  | StageFailedEvent
  | StageRetryingEvent
  | StageSkippedEvent;
