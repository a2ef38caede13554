/**
 * Human-readable progress report for a Run.
 */

import { join } from 'node:path';
import { atomicWriteFile, ensureDir } from '../util/fs.js';
import type { StructuredLogger } from '../logging/logger.js';
import type { Run, StageRecord, StageStatus } from '../state/run-state.js';

export const STATUS_EMOJI: Record<StageStatus, string> = {
  pending: '⏳',
  running: '🔄',
  completed: '✅',
  failed: '❌',
  skipped: '⏭️',
};

/** Seconds between two ISO timestamps, or '—' when the stage has not finished. */
export function stageDuration(record: Pick<StageRecord, 'startedAt' | 'completedAt'>): string {
  if (!record.startedAt || !record.completedAt) return '—';
  const ms = Date.parse(record.completedAt) - Date.parse(record.startedAt);
  return Number.isFinite(ms) ? `${(ms / 1000).toFixed(1)}s` : '—';
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function runStatusLine(run: Run): string {
  if (run.awaitingApproval) return `awaiting approval after ${run.awaitingApproval.afterStage}`;
  if (run.completed) return `completed (${run.outcome ?? 'success'})`;
  if (run.outcome === 'failed') return `halted at ${run.failedStage ?? 'unknown stage'}`;
  return run.currentStage ? `in progress (${run.currentStage})` : 'in progress';
}

const MAX_EVENTS = 20;

/**
 * Writes `.stageline/progress.md` next to the run state.
 */
export class RunProgressWriter {
  readonly progressPath: string;
  private readonly events: string[] = [];

  constructor(
    private readonly stateDir: string,
    private readonly logger: StructuredLogger,
  ) {
    this.progressPath = join(stateDir, 'progress.md');
  }

  render(run: Run): string {
    let md = `# Run ${run.runId}\n\n`;
    md += `## Pipeline Status\n`;
    md += `- **Status**: ${runStatusLine(run)}\n`;
    md += `- **Resumes**: ${run.resumeCount}\n`;
    md += `- **Last Updated**: ${run.updatedAt}\n\n`;

    md += `## Stages\n\n`;
    md += `| # | Stage | Status | Attempts | Duration | Error |\n`;
    md += `|---|-------|--------|----------|----------|-------|`;

    run.stages.forEach((stage, i) => {
      const error = stage.error ? escapeCell(stage.error) : '—';
      md += `\n| ${i + 1} | ${stage.name} | ${STATUS_EMOJI[stage.status]} ${stage.status} | ${stage.attemptCount} | ${stageDuration(stage)} | ${error} |`;
    });

    const withOutputs = run.stages.filter((s) => Object.keys(s.outputs).length > 0);
    if (withOutputs.length > 0) {
      md += `\n\n## Outputs\n`;
      for (const stage of withOutputs) {
        md += `\n### ${stage.name}\n`;
        for (const [name, path] of Object.entries(stage.outputs)) {
          md += `- ${name}: \`${path}\`\n`;
        }
      }
    }

    if (this.events.length > 0) {
      md += `\n\n## Event Log\n\n`;
      for (const event of this.events) {
        md += `- ${event}\n`;
      }
    }

    return md + '\n';
  }

  /**
   * Write or update the progress file. A write failure is logged, never thrown:
   * the run state is the source of truth.
   */
  async write(run: Run): Promise<void> {
    try {
      await ensureDir(this.stateDir);
      await atomicWriteFile(this.progressPath, this.render(run));
    } catch (err) {
      this.logger.warn(`Failed to write progress report: ${err instanceof Error ? err.message : String(err)}`, {
        runId: run.runId,
      });
    }
  }

  /**
   * Append an event to the progress log.
   */
  appendEvent(event: string): void {
    const ts = new Date().toISOString().slice(11, 19);
    this.events.push(`\`${ts}\` ${event}`);
    if (this.events.length > MAX_EVENTS) {
      this.events.splice(0, this.events.length - MAX_EVENTS);
    }
  }
}
