import type { CanonicalField } from './canonical-fields.js';
import type { ColumnMapping } from './column-mapper.js';
import type { LayoutClassification, PayerGroup, TabularLayout } from './layout-classifier.js';
import type { Preamble } from './preamble-parser.js';
import { RULE_TABLES } from './rule-tables.js';
import type { MetadataLabelPolicy, ValueSets } from './rule-tables.js';
import type { Finding } from '../types/validation.js';

export interface TabularContext {
  layout: TabularLayout;
  preamble: Preamble;
  columns: readonly ColumnMapping[];
  payerGroups: readonly PayerGroup[];
  /** Column indices per canonical field, in header order. */
  fieldColumns: ReadonlyMap<CanonicalField, readonly number[]>;
  metadataLabels: MetadataLabelPolicy;
  valueSets: ValueSets;
}

export interface RowSummary {
  /** Rows that violated the rule. */
  count: number;
  /** Data rows inspected. */
  scanned: number;
  /** Description of the first violation, from `inspect`. */
  firstViolation: string;
  /** 1-based data row of the first violation. */
  firstRow: number;
  /** The first violating data rows, up to the evaluation's sample limit. */
  rows: readonly number[];
}

export interface RowCheck {
  /** Describe the violation in this row, or return null when the row passes. */
  inspect(row: readonly string[]): string | null;
  summarize(summary: RowSummary): Finding;
}

export interface TabularRule {
  code: string;
  /** Layouts the rule runs for; all when omitted. */
  layouts?: readonly TabularLayout[];
  checkHeaders?(ctx: TabularContext): Finding | null;
  /** Row check to run during the scan, or null when the headers make it inapplicable. */
  rowCheck?(ctx: TabularContext): RowCheck | null;
}

export function createTabularContext(
  columns: readonly ColumnMapping[],
  classification: LayoutClassification,
  preamble: Preamble,
  metadataLabels: MetadataLabelPolicy,
  valueSets: ValueSets = RULE_TABLES.valueSets,
): TabularContext {
  const fieldColumns = new Map<CanonicalField, number[]>();
  columns.forEach((column, i) => {
    if (!column.field) return;
    const indices = fieldColumns.get(column.field);
    if (indices) indices.push(i);
    else fieldColumns.set(column.field, [i]);
  });

  return {
    layout: classification.layout,
    payerGroups: classification.payerGroups,
    preamble,
    columns,
    fieldColumns,
    metadataLabels,
    valueSets,
  };
}

interface ActiveCheck {
  code: string;
  check: RowCheck;
  count: number;
  firstViolation: string;
  firstRow: number;
  rows: number[];
}

export const DEFAULT_FAILING_ROW_SAMPLES = 5;

/**
 * Two-phase evaluation: header checks run up front and row checks only tally
 * violations while rows stream through `push`. `finish` then emits findings in
 * rule registration order, one summary per violated row check.
 */
export class RuleEvaluation {
  private readonly headerFindings: (Finding | null)[];
  private readonly active: (ActiveCheck | null)[];
  private scanned = 0;

  constructor(
    private readonly rules: readonly TabularRule[],
    ctx: TabularContext,
    private readonly sampleLimit = DEFAULT_FAILING_ROW_SAMPLES,
  ) {
    const applicable = (rule: TabularRule) => !rule.layouts || rule.layouts.includes(ctx.layout);

    this.headerFindings = rules.map((rule) =>
      applicable(rule) && rule.checkHeaders ? rule.checkHeaders(ctx) : null,
    );
    this.active = rules.map((rule) => {
      const check = applicable(rule) && rule.rowCheck ? rule.rowCheck(ctx) : null;
      return check ? { code: rule.code, check, count: 0, firstViolation: '', firstRow: 0, rows: [] } : null;
    });
  }

  get rowsScanned(): number {
    return this.scanned;
  }

  push(row: readonly string[]): void {
    this.scanned++;
    for (const entry of this.active) {
      if (!entry) continue;
      const violation = entry.check.inspect(row);
      if (violation === null) continue;
      if (entry.count === 0) {
        entry.firstViolation = violation;
        entry.firstRow = this.scanned;
      }
      if (entry.rows.length < this.sampleLimit) entry.rows.push(this.scanned);
      entry.count++;
    }
  }

  finish(): Finding[] {
    const findings: Finding[] = [];
    this.rules.forEach((_rule, i) => {
      const headerFinding = this.headerFindings[i];
      if (headerFinding) findings.push(headerFinding);

      const entry = this.active[i];
      if (entry && entry.count > 0) {
        findings.push(
          entry.check.summarize({
            count: entry.count,
            scanned: this.scanned,
            firstViolation: entry.firstViolation,
            firstRow: entry.firstRow,
            rows: [...entry.rows],
          }),
        );
      }
    });
    return findings;
  }

  /** Sampled violating data rows per violated row rule, keyed by rule code. */
  failingRows(): Record<string, number[]> {
    const rows: Record<string, number[]> = {};
    for (const entry of this.active) {
      if (entry && entry.count > 0) rows[entry.code] = [...entry.rows];
    }
    return rows;
  }
}

export function cellValue(row: readonly string[], index: number): string {
  return (row[index] ?? '').trim();
}

export function hasValue(row: readonly string[], indices: readonly number[] | undefined): boolean {
  return (indices ?? []).some((i) => cellValue(row, i) !== '');
}
