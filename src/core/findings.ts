import type { Finding, Severity } from '../types/validation.js';

export interface FindingInput {
  severity: Severity;
  rule: string;
  message: string;
  expected?: string | null;
  actual?: string | null;
  field?: string | null;
  count?: number;
}

export function createFinding(input: FindingInput): Finding {
  return Object.freeze({
    severity: input.severity,
    rule: input.rule,
    message: input.message,
    expected: input.expected ?? null,
    actual: input.actual ?? null,
    field: input.field ?? null,
    count: input.count ?? 1,
  });
}

/** Render a list for expected/actual columns: `a, b, c`. */
export function formatList(values: readonly string[]): string {
  return values.join(', ');
}
