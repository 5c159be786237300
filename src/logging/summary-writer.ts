import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TerminalState } from '../types/step-result.js';

export interface AccountReport {
  account: string;
  ok: boolean;
  reason: string | null;
  state: TerminalState;
  durationMs: number;
}

export interface SummaryOptions {
  runDir: string;
  runId: string;
  scenario: string;
  startedAt: string;
  reports: AccountReport[];
  operatorNotes?: string[];
}

/**
 * Write `summary.md` for a batch run.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  await mkdir(options.runDir, { recursive: true });
  await writeFile(join(options.runDir, 'summary.md'), buildSummaryMarkdown(options), 'utf-8');
}

export function buildSummaryMarkdown(options: Omit<SummaryOptions, 'runDir'>): string {
  const { runId, scenario, startedAt, reports, operatorNotes } = options;
  const total = reports.length;
  const succeeded = reports.filter((r) => r.ok).length;
  const failed = reports.filter((r) => !r.ok);
  const overallResult = failed.length === 0 ? 'Success' : succeeded === 0 ? 'Failure' : 'Partial Failure';
  const totalDurationMs = reports.reduce((sum, r) => sum + r.durationMs, 0);

  const lines: string[] = [
    '# Run Summary',
    `- Scenario: ${scenario}`,
    `- Result: ${overallResult}`,
    `- Duration: ${formatDuration(totalDurationMs)}`,
    `- Accounts: ${succeeded}/${total} succeeded`,
    '',
    '## Key Events',
  ];

  failed.forEach((report, idx) => {
    lines.push(`${idx + 1}. Account "${report.account}": ${report.state} - ${report.reason ?? 'no details'}`);
  });
  if (failed.length === 0) {
    lines.push('- All accounts completed successfully');
  }

  lines.push('');
  lines.push('## Accounts');
  for (const report of reports) {
    lines.push(`- ${report.account}: ${report.state} (${formatDuration(report.durationMs)})`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${runId}`);
  lines.push(`- Started at: ${startedAt}`);

  if (operatorNotes && operatorNotes.length > 0) {
    lines.push('');
    lines.push('## Operator Notes');
    for (const note of operatorNotes) {
      lines.push(`- ${note}`);
    }
  }

  return lines.join('\n') + '\n';
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
