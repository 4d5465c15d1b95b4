import {
  ReportGenerator,
  toReportPayload,
  type AuditOutcome,
  type ReportFormat,
  type RunSummary,
} from '@accessaudit/core';

/**
 * Render one or more finished runs in a single document.
 *
 * Several runs become a JSON array, a CSV with one header row, or
 * consecutive Markdown/console sections.
 */
export function renderOutcomes(
  format: ReportFormat,
  outcomes: readonly AuditOutcome[],
  options: { noColor?: boolean } = {},
): string {
  const reporter = new ReportGenerator();
  const [first, ...rest] = outcomes;
  if (!first) return '';

  if (format === 'json' && rest.length > 0) {
    return JSON.stringify(
      outcomes.map((o) => toReportPayload(o.result, o.artifact.runId)),
      null,
      2,
    );
  }

  if (format === 'csv') {
    const rows = rest.map((o) => withoutHeader(reporter.generateCSV(o.result, o.artifact.runId)));
    return [reporter.generateCSV(first.result, first.artifact.runId), ...rows].join('');
  }

  return outcomes
    .map((o) => reporter.generate(format, o.result, o.artifact.runId, { noColor: options.noColor }))
    .join('\n\n');
}

export function formatSummaryTable(runs: readonly RunSummary[]): string {
  if (runs.length === 0) return 'No runs stored.';
  return runs
    .map(
      (r) =>
        `${r.runId}  ${r.kind.padEnd(4)}  ${String(r.score).padStart(3)} ${r.grade}  ` +
        `${r.status.padEnd(7)}  ${r.targetLabel}`,
    )
    .join('\n');
}

function withoutHeader(csv: string): string {
  const newline = csv.indexOf('\n');
  return newline === -1 ? '' : csv.slice(newline + 1);
}
