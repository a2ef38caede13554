import type { Run } from '../state/run-state.js';
import { STATUS_EMOJI, stageDuration } from '../core/progress.js';

/**
 * Converts an ISO timestamp to a human-readable elapsed string like "5m ago" or "2h ago".
 */
export function formatElapsed(isoDate?: string | null, now: number = Date.now()): string {
  if (!isoDate) return '—';
  const diffMs = now - new Date(isoDate).getTime();
  if (isNaN(diffMs) || diffMs < 0) return '—';
  if (diffMs < 60_000) return 'just now';
  const diffMin = Math.floor(diffMs / 60_000);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  return `${Math.floor(diffHr / 24)}d ago`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function runState(run: Run): string {
  if (run.awaitingApproval) return `⏸️ awaiting approval after ${run.awaitingApproval.afterStage}`;
  if (run.completed) return run.outcome === 'degraded' ? '⚠️ completed (degraded)' : '✅ completed';
  if (run.outcome === 'failed') return `❌ halted at ${run.failedStage ?? '?'}`;
  return `🔄 in progress${run.currentStage ? ` (${run.currentStage})` : ''}`;
}

/**
 * Renders a Run's stage table as a string.
 * Pure: everything it shows comes from the arguments.
 */
export function renderRunStatus(run: Run, now: number = Date.now()): string {
  const header = [
    `Run: ${run.runId}`,
    `State: ${runState(run)}`,
    `Resumes: ${run.resumeCount}`,
    `Updated: ${formatElapsed(run.updatedAt, now)}`,
  ].join('  |  ');

  const rows = run.stages.map((stage, i) => [
    String(i + 1),
    stage.name,
    `${STATUS_EMOJI[stage.status]} ${stage.status}`,
    String(stage.attemptCount),
    stageDuration(stage),
    stage.error ? truncate(stage.error, 60) : '—',
  ]);

  const headers = ['#', 'Stage', 'Status', 'Attempts', 'Duration', 'Error'];
  let out = header + '\n\n' + renderTable(headers, rows);

  const failed = run.stages.filter((s) => s.status === 'failed' && s.logFile);
  if (failed.length > 0) {
    out += '\n\nLogs:\n';
    for (const stage of failed) {
      out += `  ${stage.name}: ${stage.logFile ?? ''}\n`;
    }
  }
  return out;
}

export function renderTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIdx) =>
    Math.max(...allRows.map((row) => (row[colIdx] ?? '').length)),
  );

  const formatRow = (row: string[]) =>
    '| ' + row.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join(' | ') + ' |';

  const separator = '|-' + colWidths.map((w) => '-'.repeat(w)).join('-|-') + '-|';

  const lines = [formatRow(headers), separator, ...rows.map(formatRow)];
  return lines.join('\n');
}
