import Papa from 'papaparse';
import { SEVERITIES } from '../types/validation.js';
import type { Finding, Severity, ValidationResult } from '../types/validation.js';
import { header, icons, label } from '../utils/output.js';

export type ReportFormat = 'human' | 'json' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['human', 'json', 'csv'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export const CSV_COLUMNS = ['severity', 'rule', 'field', 'message', 'expected', 'actual', 'count'] as const;

export function renderJson(result: ValidationResult): string {
  return JSON.stringify(
    {
      ok: result.ok,
      file_type: result.file_type,
      counts: result.counts,
      findings: result.findings,
      metadata: result.metadata,
    },
    null,
    2,
  );
}

/** One row per finding, in finding order. Archivable as-is. */
export function renderCsv(result: ValidationResult): string {
  return Papa.unparse({
    fields: [...CSV_COLUMNS],
    data: result.findings.map((f) => [
      f.severity,
      f.rule,
      f.field ?? '',
      f.message,
      f.expected ?? '',
      f.actual ?? '',
      String(f.count),
    ]),
  });
}

const SECTION_TITLES: Readonly<Record<Severity, string>> = {
  error: 'Errors',
  warning: 'Warnings',
  info: 'Info',
};

function severityIcon(severity: Severity): string {
  switch (severity) {
    case 'error':
      return icons.error;
    case 'warning':
      return icons.warning;
    case 'info':
      return icons.info;
  }
}

function renderFinding(finding: Finding): string[] {
  const fieldStr = finding.field ? ` (${finding.field})` : '';
  const lines = [`  ${severityIcon(finding.severity)} [${finding.rule}] ${finding.message}${fieldStr}`];
  if (finding.expected !== null) lines.push(`      ${label('expected:')} ${finding.expected}`);
  if (finding.actual !== null) lines.push(`      ${label('actual:')}   ${finding.actual}`);
  return lines;
}

export function renderHuman(result: ValidationResult, source?: string): string {
  const { errors, warnings, info } = result.counts;
  const subject = source ? `${source} ` : '';
  const tally = `${errors} error(s), ${warnings} warning(s), ${info} info`;
  const lines = [
    result.ok
      ? `${icons.success} ${subject}passed as ${result.file_type} (${tally})`
      : `${icons.error} ${subject}failed as ${result.file_type} (${tally})`,
  ];

  for (const severity of SEVERITIES) {
    const group = result.findings.filter((f) => f.severity === severity);
    if (group.length === 0) continue;
    lines.push('', header(SECTION_TITLES[severity]));
    for (const finding of group) lines.push(...renderFinding(finding));
  }
  return lines.join('\n');
}

export function renderReport(result: ValidationResult, format: ReportFormat, source?: string): string {
  switch (format) {
    case 'json':
      return renderJson(result);
    case 'csv':
      return renderCsv(result);
    case 'human':
      return renderHuman(result, source);
  }
}
