import { join, delimiter } from 'node:path';
import { readFile } from 'node:fs/promises';
import {
  stripEditorEnv,
  scrubSecretEnv,
  type StageSpec,
} from '../../packages/agent-runtime/src/index.js';
import type { RuntimeConfig, RuntimeStageConfig } from '../config/loader.js';

export interface StageContext {
  runId: string;
  /** 1-based attempt number of the attempt about to start. */
  attempt: number;
}

type TemplateVars = Record<'workDir' | 'runId' | 'stage' | 'attempt' | 'marker', string>;

/**
 * Replace `{name}` placeholders. Unknown placeholders are left as written.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(/\{(workDir|runId|stage|attempt|marker)\}/g, (_match, key: keyof TemplateVars) => vars[key]);
}

export function stageLogFile(logDir: string, stage: string, attempt: number): string {
  return join(logDir, `${stage}-attempt-${attempt}.log`);
}

/**
 * Build the environment for a stage process.
 */
export function buildStageEnv(
  config: RuntimeConfig,
  stage: RuntimeStageConfig,
  vars: TemplateVars,
  baseEnv: NodeJS.ProcessEnv = process.env,
): Record<string, string | undefined> {
  let env = stripEditorEnv({ ...baseEnv });
  if (config.environment.scrubSecrets) {
    env = scrubSecretEnv(env);
  }

  env['STAGELINE_RUN_ID'] = vars.runId;
  env['STAGELINE_STAGE'] = vars.stage;
  env['STAGELINE_ATTEMPT'] = vars.attempt;
  env['STAGELINE_WORK_DIR'] = vars.workDir;
  env['STAGELINE_MARKER'] = vars.marker;

  if (config.environment.extraPath.length > 0) {
    env['PATH'] = [...config.environment.extraPath, env['PATH'] ?? ''].join(delimiter);
  }

  for (const [key, value] of Object.entries(stage.env)) {
    env[key] = renderTemplate(value, vars);
  }
  return env;
}

/**
 * Turn a configured stage into the executor's StageSpec for one attempt.
 * Reads `inputFile` at call time.
 */
export async function buildStageSpec(
  config: RuntimeConfig,
  stage: RuntimeStageConfig,
  ctx: StageContext,
): Promise<StageSpec> {
  const vars: TemplateVars = {
    workDir: config.workDir,
    runId: ctx.runId,
    stage: stage.name,
    attempt: String(ctx.attempt),
    marker: stage.marker,
  };

  const input = stage.inputFile !== undefined ? await readFile(stage.inputFile, 'utf-8') : stage.input;

  return {
    name: stage.name,
    command: stage.command,
    args: stage.args.map((arg) => renderTemplate(arg, vars)),
    workingDir: config.workDir,
    timeoutMs: stage.timeoutSec * 1000,
    markerName: stage.marker,
    requiredOutputs: { ...stage.requiredOutputs },
    optionalOutputs: { ...stage.optionalOutputs },
    allowExitCodeSuccess: stage.allowExitCodeSuccess,
    ...(input !== undefined ? { input } : {}),
    env: buildStageEnv(config, stage, vars),
    logFile: stageLogFile(config.logging.logDir, stage.name, ctx.attempt),
  };
}
