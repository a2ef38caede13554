// stageline library entry point

export { loadConfig, resolveConfig, applyOverrides, ConfigLoadError, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { RuntimeConfig, RuntimeStageConfig } from './config/loader.js';
export { StagelineConfigSchema, StageConfigSchema } from './config/schema.js';
export type { StagelineConfig, StageConfig } from './config/schema.js';

export {
  StateCorruptError,
  RunNotFoundError,
  RunAlreadyExistsError,
  RunStateError,
  RunLockedError,
  RuntimeInterruptedError,
} from './errors.js';

export { Logger } from './logging/logger.js';
export type { LoggerOptions, LogContext, StructuredLogger } from './logging/logger.js';
export type { LogLevel, LogEntry, PipelineEvent } from './logging/events.js';

export { StateStore, STATE_DIR_NAME, STATE_FILE_NAME, stateDirFor } from './state/state-store.js';
export { RunLock } from './state/run-lock.js';
export { RunSchema, StageRecordSchema, findInvariantViolations, generateRunId } from './state/run-state.js';
export type { Run, StageRecord, StageStatus, AttemptSummary, RunOutcome } from './state/run-state.js';

export { PipelineOrchestrator } from './core/pipeline-orchestrator.js';
export type {
  PipelineOrchestratorOptions,
  PipelineResult,
  RunOptions,
  ResumeOptions,
  StageCallback,
} from './core/pipeline-orchestrator.js';
export { RunProgressWriter } from './core/progress.js';
export { buildStageSpec, renderTemplate } from './core/stage-plan.js';

export {
  StageExecutor,
  FileMarkerSignal,
  type StageSpec,
  type StageResult,
  type StageRunner,
  type CompletionSignal,
  type CompletionOutcome,
} from '../packages/agent-runtime/src/index.js';
