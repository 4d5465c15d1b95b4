import { stringify } from 'csv-stringify/sync';

import type { ReportFormat } from '../config/schema.js';
import { countBySeverity, toGrade } from '../scoring/ScoreAggregator.js';
import { toReportPayload } from '../store/ReportStore.js';
import type { AuditResult } from '../types/audit.js';
import type { TargetDescriptor } from '../types/target.js';
import type { Violation } from '../types/violation.js';

/**
 * Options for JSON report generation.
 */
export interface JsonReportOptions {
  /** Pretty-print output. Defaults to true. */
  pretty?: boolean;
}

/**
 * Options for console report generation.
 */
export interface ConsoleReportOptions {
  /** Disable ANSI colors. Defaults to false. */
  noColor?: boolean;

  /** Violations listed before the rest is summarized. Defaults to 50. */
  limit?: number;
}

const CSV_COLUMNS = ['run_id', 'kind', 'target', 'rule_id', 'severity', 'wcag', 'locator', 'message', 'suggestion'];

/**
 * Renders a stored run in the supported output formats.
 */
export class ReportGenerator {
  generate(format: ReportFormat, result: AuditResult, runId: string, options: ConsoleReportOptions = {}): string {
    switch (format) {
      case 'json':
        return this.generateJSON(result, runId);
      case 'md':
        return this.generateMarkdown(result, runId);
      case 'csv':
        return this.generateCSV(result, runId);
      case 'console':
        return this.generateConsole(result, runId, options);
    }
  }

  /**
   * The stable retrieval payload.
   */
  generateJSON(result: AuditResult, runId: string, options: JsonReportOptions = {}): string {
    const pretty = options.pretty !== false;
    return JSON.stringify(toReportPayload(result, runId), null, pretty ? 2 : 0);
  }

  generateMarkdown(result: AuditResult, runId: string): string {
    const counts = countBySeverity(result.violations);

    const lines: string[] = [];
    lines.push(`# Accessibility report: ${targetLabel(result.target)}`);
    lines.push('');
    lines.push(`- Run: \`${runId}\``);
    lines.push(`- Kind: ${result.target.kind}`);
    lines.push(`- Score: **${result.score}** (${toGrade(result.score)})`);
    lines.push(`- Status: ${result.status}`);
    lines.push(`- Violations: **${result.violations.length}**`);
    if (result.error) lines.push(`- Error: \`${result.error.code}\` ${result.error.message}`);
    lines.push('');

    lines.push(`## Severity breakdown`);
    lines.push('');
    lines.push(`| critical | serious | moderate | minor |`);
    lines.push(`| --- | --- | --- | --- |`);
    lines.push(`| ${counts.critical} | ${counts.serious} | ${counts.moderate} | ${counts.minor} |`);
    lines.push('');

    if (result.skippedChecks.length > 0) {
      lines.push(`## Skipped checks`);
      lines.push('');
      for (const skipped of result.skippedChecks) lines.push(`- \`${skipped.checkId}\`: ${skipped.reason}`);
      lines.push('');
    }

    if (result.violations.length > 0) {
      lines.push(`## Violations`);
      lines.push('');
      for (const [ruleId, violations] of groupByRule(result.violations)) {
        lines.push(`### ${ruleId}`);
        lines.push('');
        violations.forEach((v, idx) => {
          lines.push(`${idx + 1}. **${v.severity}** ${v.message}`);
          lines.push(`   - Location: \`${v.locator}\``);
          if (v.wcag?.length) lines.push(`   - WCAG: ${v.wcag.join(', ')}`);
          if (v.suggestion) lines.push(`   - Suggestion: ${v.suggestion}`);
        });
        lines.push('');
      }
    }

    if (result.linkedPdfs?.length) {
      lines.push(`## Linked PDF documents`);
      lines.push('');
      for (const url of result.linkedPdfs) lines.push(`- ${url}`);
      lines.push('');
    }

    return lines.join('\n');
  }

  /**
   * One row per violation, with a header row.
   */
  generateCSV(result: AuditResult, runId: string): string {
    const target = targetLabel(result.target);
    return stringify(
      result.violations.map((v) => [
        runId,
        result.target.kind,
        target,
        v.ruleId,
        v.severity,
        v.wcag?.join(' ') ?? '',
        v.locator,
        v.message,
        v.suggestion ?? '',
      ]),
      { header: true, columns: CSV_COLUMNS },
    );
  }

  generateConsole(result: AuditResult, runId: string, options: ConsoleReportOptions = {}): string {
    const color = options.noColor ? noColorize : colorize;
    const limit = options.limit ?? 50;
    const counts = countBySeverity(result.violations);
    const scoreColor = result.score >= 80 ? 'green' : result.score >= 70 ? 'yellow' : 'red';

    const lines: string[] = [];
    lines.push(
      `${color(scoreColor, `Score: ${result.score} (${toGrade(result.score)})`)}  ${targetLabel(result.target)}`,
    );
    lines.push(`Run: ${runId}  Status: ${result.status}`);
    if (result.error) lines.push(color('red', `Error: ${result.error.code}: ${result.error.message}`));
    lines.push(`Violations: ${result.violations.length}`);
    lines.push(
      `By severity: critical=${counts.critical} serious=${counts.serious} moderate=${counts.moderate} minor=${counts.minor}`,
    );

    for (const v of result.violations.slice(0, limit)) {
      const sevColor = v.severity === 'critical' ? 'red' : v.severity === 'serious' ? 'yellow' : 'blue';
      lines.push(`- ${color(sevColor, v.severity.toUpperCase())} [${v.ruleId}] ${v.locator}: ${v.message}`);
    }
    if (result.violations.length > limit) {
      lines.push(`…and ${result.violations.length - limit} more`);
    }

    for (const skipped of result.skippedChecks) {
      lines.push(color('yellow', `Skipped ${skipped.checkId}: ${skipped.reason}`));
    }

    return lines.join('\n');
  }
}

export function targetLabel(target: TargetDescriptor): string {
  return target.kind === 'web' ? target.url : target.filename;
}

function groupByRule(violations: Violation[]): Map<string, Violation[]> {
  const grouped = new Map<string, Violation[]>();
  for (const v of violations) {
    const list = grouped.get(v.ruleId);
    if (list) list.push(v);
    else grouped.set(v.ruleId, [v]);
  }
  return grouped;
}

type ColorName = 'red' | 'yellow' | 'green' | 'blue';

function colorize(color: ColorName, text: string): string {
  const code = color === 'red' ? 31 : color === 'yellow' ? 33 : color === 'green' ? 32 : 34;
  return `\u001b[${code}m${text}\u001b[0m`;
}

function noColorize(_color: ColorName, text: string): string {
  return text;
}
