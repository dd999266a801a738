import type { ValidationResult } from '../types/validation.js';

export type BadgeValue = 'PASS' | 'FAIL' | '–';

/** Condensed two-value summary persisted at the upload boundary. */
export interface Badge {
  tabular: BadgeValue;
  structured: BadgeValue;
}

export interface SummaryRow {
  artifact: string;
  file_type: string;
  ok: boolean;
  errors: number;
  warnings: number;
  info: number;
  /** Distinct rule codes with an error finding, in finding order. */
  failed_rules: string;
}

export function toBadge(result: ValidationResult): Badge {
  const verdict: BadgeValue = result.ok ? 'PASS' : 'FAIL';
  if (result.file_type.startsWith('tabular-')) return { tabular: verdict, structured: '–' };
  if (result.file_type.startsWith('structured-')) return { tabular: '–', structured: verdict };
  return { tabular: '–', structured: '–' };
}

export function toSummaryRow(result: ValidationResult, artifact: string): SummaryRow {
  const failed = new Set(result.findings.filter((f) => f.severity === 'error').map((f) => f.rule));
  return {
    artifact,
    file_type: result.file_type,
    ok: result.ok,
    errors: result.counts.errors,
    warnings: result.counts.warnings,
    info: result.counts.info,
    failed_rules: [...failed].join(';'),
  };
}
