import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute, dirname, join } from 'node:path';
import { StagelineConfigSchema, type StagelineConfig, type StageConfig } from './schema.js';
import { exists } from '../util/fs.js';

export interface RuntimeStageConfig extends Omit<StageConfig, 'inputFile'> {
  /** Absolute path, resolved against the config file. */
  readonly inputFile?: string;
}

/**
 * Config as consumed by the runtime: paths are absolute and optional
 * directories are filled in.
 */
export interface RuntimeConfig extends Omit<StagelineConfig, 'workDir' | 'stages' | 'logging'> {
  /** Always an absolute path, resolved by loadConfig. */
  readonly workDir: string;
  readonly stages: readonly RuntimeStageConfig[];
  readonly logging: StagelineConfig['logging'] & { readonly logDir: string };
  /** Absolute path of the file this config came from. */
  readonly configPath: string;
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export const DEFAULT_CONFIG_FILE = 'stageline.config.json';

/**
 * Load, parse, and validate a stageline.config.json file.
 * Relative paths resolve against the directory holding the config file.
 */
export async function loadConfig(configPath: string): Promise<RuntimeConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!(await exists(absPath))) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(absPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
  }

  return resolveConfig(raw, dirname(absPath), absPath);
}

/**
 * Validate an already-parsed config object. `baseDir` anchors relative paths.
 */
export function resolveConfig(raw: unknown, baseDir: string, configPath = join(baseDir, DEFAULT_CONFIG_FILE)): RuntimeConfig {
  const result = StagelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid config:\n${issues}`, result.error);
  }

  const config = result.data;
  const abs = (p: string, base: string): string => (isAbsolute(p) ? p : resolve(base, p));

  const workDir = abs(config.workDir, baseDir);
  const stages = config.stages.map((stage): RuntimeStageConfig => {
    const { inputFile, ...rest } = stage;
    return inputFile === undefined ? rest : { ...rest, inputFile: abs(inputFile, baseDir) };
  });

  const frozen: RuntimeConfig = {
    ...config,
    workDir,
    stages,
    logging: {
      ...config.logging,
      logDir: config.logging.logDir ? abs(config.logging.logDir, baseDir) : join(workDir, 'logs'),
    },
    environment: {
      ...config.environment,
      extraPath: config.environment.extraPath.map((p) => abs(p, baseDir)),
    },
    configPath,
  };

  return Object.freeze(frozen);
}

/**
 * Apply CLI overrides to a loaded config.
 */
export function applyOverrides(
  config: RuntimeConfig,
  overrides: {
    workDir?: string;
    maxAttempts?: number;
    /** Drop the approval checkpoint for this invocation. */
    noApprovalGate?: boolean;
    logLevel?: StagelineConfig['logging']['level'];
    quiet?: boolean;
  },
): RuntimeConfig {
  let workDir = config.workDir;
  let logging = { ...config.logging };
  let maxAttempts = config.maxAttempts;
  let approvalAfter = config.approvalAfter;

  if (overrides.workDir != null) {
    workDir = resolve(process.cwd(), overrides.workDir);
    if (logging.logDir === join(config.workDir, 'logs')) {
      logging = { ...logging, logDir: join(workDir, 'logs') };
    }
  }

  if (overrides.maxAttempts != null) {
    maxAttempts = overrides.maxAttempts;
  }

  if (overrides.noApprovalGate) {
    approvalAfter = undefined;
  }

  if (overrides.logLevel != null) {
    logging = { ...logging, level: overrides.logLevel };
  }

  if (overrides.quiet) {
    logging = { ...logging, console: false };
  }

  return Object.freeze({ ...config, workDir, logging, maxAttempts, approvalAfter });
}
