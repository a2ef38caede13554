import { z } from 'zod';

const STAGE_NAME = /^[a-z0-9][a-z0-9_-]*$/;

const OutputMapSchema = z.record(z.string().min(1), z.string().min(1));

export const StageConfigSchema = z
  .object({
    /** Stable stage identifier (e.g. "resource-gathering"). */
    name: z.string().regex(STAGE_NAME, 'stage names use lowercase letters, digits, "-" and "_"'),
    /** Executable to launch. */
    command: z.string().min(1),
    /**
     * Arguments. Supports {workDir}, {runId}, {stage}, {attempt} and {marker} placeholders.
     */
    args: z.array(z.string()).default([]),
    /** Inline input piped to the process's stdin. */
    input: z.string().optional(),
    /** File whose content is piped to stdin. Relative to the config file. */
    inputFile: z.string().optional(),
    /** Wall-clock budget in seconds. */
    timeoutSec: z.number().positive(),
    /** File the agent writes into the work directory when it is done. */
    marker: z.string().min(1),
    /** Logical output name → path relative to the work directory. All must exist. */
    requiredOutputs: OutputMapSchema.default({}),
    /** Logical output name → path relative to the work directory. Recorded when present. */
    optionalOutputs: OutputMapSchema.default({}),
    /** Accept exit code 0 as success even without a marker. */
    allowExitCodeSuccess: z.boolean().default(false),
    /** Whether failure in this stage should halt the pipeline. */
    critical: z.boolean().default(true),
    /** Extra environment for this stage. Values support the same placeholders as args. */
    env: z.record(z.string(), z.string()).default({}),
  })
  .refine((s) => !(s.input !== undefined && s.inputFile !== undefined), {
    message: 'input and inputFile are mutually exclusive',
    path: ['inputFile'],
  });

export type StageConfig = z.infer<typeof StageConfigSchema>;

export const StagelineConfigSchema = z
  .object({
    /** Directory the agents work in; state lives under its .stageline/ folder. Relative to the config file. */
    workDir: z.string().min(1),

    /** Ordered stages. */
    stages: z.array(StageConfigSchema).min(1),

    /** Suspend for human approval after this stage succeeds. */
    approvalAfter: z.string().optional(),

    /** Attempts per stage within one orchestrator invocation. 1 disables automatic retry. */
    maxAttempts: z.number().int().min(1).default(1),

    /** Base delay before an automatic retry; doubles with each attempt. 0 retries at once. */
    retryDelayMs: z.number().int().min(0).default(0),

    /** Upper bound on the backoff delay. */
    retryMaxDelayMs: z.number().int().min(0).default(60_000),

    /** How often the completion marker is checked. */
    pollIntervalMs: z.number().int().positive().default(2000),

    /** Time between SIGTERM and SIGKILL. */
    killGraceMs: z.number().int().min(0).default(5000),

    /** Child output buffered for the log file before it is dropped. */
    maxLogBufferBytes: z.number().int().positive().default(1024 * 1024),

    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        console: z.boolean().default(true),
        /** Defaults to <workDir>/logs. */
        logDir: z.string().nullable().optional(),
      })
      .default({}),

    environment: z
      .object({
        /** Prepended to PATH for every stage. */
        extraPath: z.array(z.string()).default([]),
        /** Remove credential variables from the child environment. */
        scrubSecrets: z.boolean().default(false),
        /** Redact credentials from stage logs. */
        redactLogs: z.boolean().default(true),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.stages.forEach((stage, index) => {
      if (seen.has(stage.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate stage name "${stage.name}"`,
          path: ['stages', index, 'name'],
        });
      }
      seen.add(stage.name);
    });
    if (config.approvalAfter !== undefined && !seen.has(config.approvalAfter)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `approvalAfter names unknown stage "${config.approvalAfter}"`,
        path: ['approvalAfter'],
      });
    }
  });

export type StagelineConfig = z.infer<typeof StagelineConfigSchema>;
