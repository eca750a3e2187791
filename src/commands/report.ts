/**
 * commands/report.ts
 *
 * Turns a WorkflowReport into the lines the CLI prints.
 */

import { SkippedWindow, WindowSummary, WorkflowReport } from '../core/types';

export function formatWindowCounts(summary: WindowSummary): string {
  return `${summary.succeeded} succeeded, ${summary.skipped} skipped`;
}

function formatSkipped(w: SkippedWindow): string {
  const title = w.title ? ` "${w.title}"` : '';
  const message = w.message ? ` (${w.message})` : '';
  return `     - ${w.app}${title} #${w.windowId}: ${w.reason}${message}`;
}

export function formatReport(report: WorkflowReport, verbose: boolean): string[] {
  const lines: string[] = [];

  for (const step of report.steps) {
    lines.push(`${step.step}. ${step.label} (${step.durationMs}ms)`);
  }

  lines.push(`   Display ${report.displayId}: ${report.fromMode} → ${report.toMode}`);
  if (report.region) {
    const r = report.region;
    lines.push(`   Visible region: ${r.width}x${r.height} at (${r.x}, ${r.y})`);
  }
  lines.push(`   Windows: ${formatWindowCounts(report.windows)}`);
  if (verbose) {
    lines.push(...report.windows.skippedWindows.map(formatSkipped));
  }
  for (const warning of report.warnings) {
    lines.push(`   Warning: ${warning}`);
  }

  lines.push(`Done in ${(report.elapsedMs / 1000).toFixed(2)}s`);
  return lines;
}
