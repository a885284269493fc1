import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DetectedEvent, RunState } from '../control-plane/types.js';
import type { HistoryRecord } from '../history/reader.js';

export type ReportFormat = 'json' | 'md';

export interface EmittedReport {
  reportPath: string;
  ledgerPath: string | null;
}

function describeEvent(event: DetectedEvent): string {
  if (event.kind === 'calendar') {
    return `${event.tag} (${event.date}, ${event.days_away} days away)`;
  }
  const op = event.direction === 'below' ? '<' : '>';
  return `${event.tag} (${event.param} ${event.value} ${op} ${event.threshold})`;
}

function formatNumber(value: number | null): string {
  return value === null ? '-' : value.toFixed(2);
}

export function renderMarkdown(state: RunState, narrative?: string): string {
  const { stage_results: results } = state;
  const lines: string[] = [
    `# Analysis: ${state.symbol} (${state.mode})`,
    '',
    `**Cache key:** ${state.cache_key}`,
    `**As of:** ${state.timestamp}`,
    `**Created:** ${state.created_at}`,
  ];
  if (state.ledger) lines.push(`**Run ID:** ${state.ledger.run_id}`);
  lines.push('');

  const events = results.event_detection?.output;
  if (events) {
    lines.push('## Events', '');
    if (events.events.length === 0) {
      lines.push('- none');
    }
    for (const event of events.events) {
      lines.push(`- ${describeEvent(event)}`);
    }
    lines.push('');
  }

  const scoring = results.scoring?.output;
  if (scoring) {
    lines.push('## Score', '', `**Score:** ${scoring.score.toFixed(2)}`, '');
    lines.push('| Factor | Contribution |', '| --- | --- |');
    for (const [factor, contribution] of Object.entries(scoring.breakdown)) {
      lines.push(`| ${factor} | ${contribution.toFixed(2)} |`);
    }
    lines.push('');
  }

  const strategy = results.strategy_calc?.output;
  if (strategy) {
    lines.push('## Strategy', '', `**Recommendation:** ${strategy.strategy}`, '', strategy.rationale, '');
  }

  const comparison = results.comparison?.output;
  if (comparison) {
    lines.push('## Comparison', '');
    lines.push(`**Baseline:** ${comparison.baseline_timestamp}`);
    lines.push(`**Material change:** ${comparison.material_change ? 'yes' : 'no'}`, '');
    lines.push('| Field | Previous | Current | Delta | Change % | Significant |');
    lines.push('| --- | --- | --- | --- | --- | --- |');
    for (const [field, d] of Object.entries(comparison.deltas)) {
      lines.push(
        `| ${field} | ${d.previous} | ${d.current} | ${formatNumber(d.delta)} | ${formatNumber(d.change_pct)} | ${d.significant ? 'yes' : 'no'} |`
      );
    }
    lines.push('');
  }

  if (narrative) {
    lines.push('## Narrative', '', narrative.trim(), '');
  }

  return lines.join('\n');
}

export function renderHistoryTable(records: HistoryRecord[]): string {
  if (records.length === 0) return '(no cached analyses)';

  const header = ['KEY', 'TIMESTAMP', 'MODE', 'SCORE', 'STRATEGY', 'MATERIAL'];
  const rows = records.map((r) => [
    r.key,
    r.timestamp,
    r.summary.mode,
    formatNumber(r.summary.score),
    r.summary.strategy ?? '-',
    r.summary.material_change === null ? '-' : r.summary.material_change ? 'yes' : 'no',
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i]?.length ?? 0)));
  const format = (row: string[]): string =>
    row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [format(header), ...rows.map(format)].join('\n');
}

/** Writes `<key>-<mode>.<ext>` and, when the run has one, its ledger alongside. */
export async function emitReport(
  state: RunState,
  outDir: string,
  format: ReportFormat,
  narrative?: string
): Promise<EmittedReport> {
  await mkdir(outDir, { recursive: true });
  const base = `${state.cache_key}-${state.mode}`;

  const reportPath = join(outDir, `${base}.${format}`);
  if (format === 'md') {
    await writeFile(reportPath, renderMarkdown(state, narrative));
  } else {
    const body = narrative ? { ...state, narrative } : state;
    await writeFile(reportPath, `${JSON.stringify(body, null, 2)}\n`);
  }

  let ledgerPath: string | null = null;
  if (state.ledger) {
    ledgerPath = join(outDir, `${base}-ledger.json`);
    await writeFile(ledgerPath, `${JSON.stringify(state.ledger, null, 2)}\n`);
  }
  return { reportPath, ledgerPath };
}
