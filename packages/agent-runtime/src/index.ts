// @stageline/agent-runtime entry point

export type {
  Logger,
  ExitInfo,
  StageFailureKind,
  StageSpec,
  StageResult,
  StageRunner,
} from './types.js';

// Process supervision
export { ProcessHandle } from './process/process-handle.js';
export type { SpawnHandleOptions } from './process/process-handle.js';
export { LogSink } from './process/log-sink.js';
export type { LogSinkOptions } from './process/log-sink.js';
export { redactSecrets, stripEditorEnv, scrubSecretEnv, SENSITIVE_ENV_VARS } from './process/redact.js';

// Completion detection
export { FileMarkerSignal, readMarkerMetadata } from './completion/completion-signal.js';
export type {
  CompletionSignal,
  CompletionOutcome,
  LivenessProbe,
  PollOptions,
} from './completion/completion-signal.js';

// Stage execution
export { StageExecutor } from './executor/stage-executor.js';
export type { StageExecutorOptions } from './executor/stage-executor.js';
