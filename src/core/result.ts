import type { FileType, Finding, SeverityCounts, ValidationResult } from '../types/validation.js';
import { createFinding } from './findings.js';
import { deepFreeze } from '../utils/freeze.js';

export function countFindings(findings: readonly Finding[]): SeverityCounts {
  let errors = 0;
  let warnings = 0;
  let info = 0;
  for (const finding of findings) {
    switch (finding.severity) {
      case 'error':
        errors += finding.count;
        break;
      case 'warning':
        warnings += finding.count;
        break;
      case 'info':
        info += finding.count;
        break;
    }
  }
  return { errors, warnings, info };
}

export function assembleResult(
  fileType: FileType,
  findings: readonly Finding[],
  metadata: Record<string, unknown> = {},
): ValidationResult {
  const counts = countFindings(findings);
  return deepFreeze({
    ok: counts.errors === 0,
    file_type: fileType,
    counts,
    findings: [...findings],
    metadata: { ...metadata },
  });
}

export function unknownTypeResult(filename?: string): ValidationResult {
  return assembleResult(
    'unknown',
    [
      createFinding({
        severity: 'error',
        rule: 'detect.unknown_type',
        message: 'Could not determine whether the file is tabular (CSV/TSV) or structured (JSON)',
        expected: 'tabular or structured content, or a .csv/.tsv/.json filename',
        actual: filename ?? null,
      }),
    ],
    filename ? { filename } : {},
  );
}
