import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig, applyOverrides, DEFAULT_CONFIG_FILE, type RuntimeConfig } from '../config/loader.js';
import { Logger } from '../logging/logger.js';
import { PipelineOrchestrator, type PipelineResult } from '../core/pipeline-orchestrator.js';
import { RuntimeInterruptedError } from '../errors.js';
import { renderRunStatus } from './status-renderer.js';
import { withCommandHandler } from './command-error-handler.js';

interface CommonOpts {
  config: string;
  workDir?: string;
  quiet?: boolean;
  verbose?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

async function openSession(
  opts: CommonOpts,
  extra: { maxAttempts?: number; noApprovalGate?: boolean } = {},
): Promise<{ config: RuntimeConfig; logger: Logger; orchestrator: PipelineOrchestrator }> {
  const config = applyOverrides(await loadConfig(opts.config), {
    workDir: opts.workDir,
    quiet: opts.quiet,
    logLevel: opts.verbose ? 'debug' : undefined,
    ...extra,
  });
  const logger = new Logger({
    source: 'stageline',
    logDir: config.logging.logDir,
    level: config.logging.level,
    console: config.logging.console,
  });
  return { config, logger, orchestrator: new PipelineOrchestrator({ config, logger }) };
}

/**
 * Route SIGINT/SIGTERM into an AbortController so the running stage is
 * terminated through the orchestrator. A second signal exits immediately.
 */
function interceptSignals(logger: Logger): {
  signal: AbortSignal;
  received: () => NodeJS.Signals | null;
  dispose: () => void;
} {
  const controller = new AbortController();
  let received: NodeJS.Signals | null = null;

  const handler = (sig: NodeJS.Signals): void => {
    if (received) {
      process.exit(sig === 'SIGINT' ? 130 : 143);
    }
    received = sig;
    logger.warn(`Received ${sig}, stopping the current stage`);
    controller.abort();
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return {
    signal: controller.signal,
    received: () => received,
    dispose: () => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
    },
  };
}

function reportResult(result: PipelineResult): number {
  switch (result.status) {
    case 'completed':
      if (result.run.outcome === 'degraded') {
        console.log(chalk.yellow(`⚠️  Run ${result.run.runId} completed with failed non-critical stages`));
      } else {
        console.log(chalk.green(`✅ Run ${result.run.runId} completed`));
      }
      return 0;
    case 'suspended':
      console.log(chalk.yellow(`⏸️  Run ${result.run.runId} is awaiting approval after ${result.afterStage}`));
      console.log(`Review the outputs, then continue with 'stageline resume --approve' (next: ${result.nextStage}).`);
      return 0;
    case 'halted':
      console.error(chalk.red(`❌ Run ${result.run.runId} halted at ${result.stage}: ${result.error}`));
      console.error(`Fix the cause and run 'stageline resume', or skip it with 'stageline skip ${result.stage}'.`);
      return 1;
    case 'cancelled':
      console.error(chalk.yellow(`Run ${result.run.runId} cancelled during ${result.stage}`));
      return 1;
  }
}

async function drive(logger: Logger, fn: (signal: AbortSignal) => Promise<PipelineResult>): Promise<never> {
  const interrupt = interceptSignals(logger);
  let result: PipelineResult;
  try {
    result = await fn(interrupt.signal);
  } finally {
    interrupt.dispose();
  }

  const sig = interrupt.received();
  if (sig) {
    reportResult(result);
    throw new RuntimeInterruptedError(`Interrupted by ${sig}`, sig, sig === 'SIGINT' ? 130 : 143);
  }
  process.exit(reportResult(result));
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILE}`, DEFAULT_CONFIG_FILE)
    .option('-w, --work-dir <path>', 'Override: work directory')
    .option('-q, --quiet', 'Do not log to the console')
    .option('-v, --verbose', 'Log debug output');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stageline')
    .description('Run long-lived agent processes through a resumable, multi-stage pipeline')
    .version('0.1.0');

  // ─── run ──────────────────────────────────────────────
  addCommonOptions(program.command('run'))
    .description('Start a fresh run of the configured pipeline')
    .option('-f, --force', 'Archive an existing run and start over')
    .option('-s, --skip <stages...>', 'Mark stages skipped before starting')
    .option('--approve', 'Do not stop at the approval checkpoint')
    .option('--max-attempts <n>', 'Override: attempts per stage', parsePositiveInt)
    .action(withCommandHandler(async (opts: CommonOpts & { force?: boolean; skip?: string[]; approve?: boolean; maxAttempts?: number }) => {
      const { logger, orchestrator } = await openSession(opts, { maxAttempts: opts.maxAttempts });
      await drive(logger, (signal) =>
        orchestrator.run({ force: opts.force, skip: opts.skip, approve: opts.approve, signal }),
      );
    }));

  // ─── resume ───────────────────────────────────────────
  addCommonOptions(program.command('resume'))
    .description('Continue the current run from where it stopped')
    .option('--approve', 'Approve the pending checkpoint and continue')
    .option('--max-attempts <n>', 'Override: attempts per stage', parsePositiveInt)
    .action(withCommandHandler(async (opts: CommonOpts & { approve?: boolean; maxAttempts?: number }) => {
      const { logger, orchestrator } = await openSession(opts, { maxAttempts: opts.maxAttempts });
      await drive(logger, (signal) => orchestrator.resume({ approve: opts.approve, signal }));
    }));

  // ─── status ───────────────────────────────────────────
  addCommonOptions(program.command('status'))
    .description('Show the persisted state of the current run')
    .option('--json', 'Print the raw run state')
    .action(withCommandHandler(async (opts: CommonOpts & { json?: boolean }) => {
      const { orchestrator } = await openSession({ ...opts, quiet: true });
      const run = await orchestrator.status();
      console.log(opts.json ? JSON.stringify(run, null, 2) : renderRunStatus(run));
    }));

  // ─── skip ─────────────────────────────────────────────
  addCommonOptions(program.command('skip <stage>'))
    .description('Mark a pending or failed stage as skipped')
    .option('-r, --reason <text>', 'Why the stage is skipped')
    .action(withCommandHandler(async (stage: string, opts: CommonOpts & { reason?: string }) => {
      const { orchestrator } = await openSession(opts);
      const run = await orchestrator.skipStage(stage, opts.reason);
      console.log(chalk.green(`⏭️  Skipped ${stage}`));
      if (run.completed) {
        console.log(chalk.green(`✅ Run ${run.runId} completed`));
      }
    }));

  // ─── finalize ─────────────────────────────────────────
  addCommonOptions(program.command('finalize'))
    .description('Close the run, skipping every stage that has not finished')
    .requiredOption('--degraded', 'Acknowledge that the run ends degraded')
    .action(withCommandHandler(async (opts: CommonOpts) => {
      const { orchestrator } = await openSession(opts);
      const run = await orchestrator.finalize();
      console.log(chalk.yellow(`⚠️  Run ${run.runId} finalized as ${run.outcome ?? 'degraded'}`));
    }));

  return program;
}
