import { Readable } from 'node:stream';
import Papa from 'papaparse';
import type { ParseError } from 'papaparse';
import { mapHeaders } from './column-mapper.js';
import type { ColumnMapping } from './column-mapper.js';
import type { EngineConfig } from './engine-config.js';
import type { Delimiter } from './file-detector.js';
import { createFinding } from './findings.js';
import { FatalParseError, createStrictDecoder } from './input-decoder.js';
import { classifyLayout } from './layout-classifier.js';
import type { LayoutClassification } from './layout-classifier.js';
import { EMPTY_PREAMBLE, isHeaderRow, parsePreamble } from './preamble-parser.js';
import type { Preamble } from './preamble-parser.js';
import { assembleResult } from './result.js';
import { RuleEvaluation, createTabularContext } from './rule-evaluator.js';
import { TABULAR_RULES } from './tabular-rules.js';
import type { Finding, TabularFileType, ValidationResult } from '../types/validation.js';

type ScanState = 'start' | 'values' | 'headers' | 'data';

interface Tally {
  count: number;
  firstRow: number;
  detail: string;
}

function bump(tally: Tally | null, row: number, detail: string): Tally {
  if (!tally) return { count: 1, firstRow: row, detail };
  tally.count++;
  return tally;
}

/**
 * Consumes parsed rows one at a time: preamble labels, preamble values, the
 * header row, then data. Data rows past `maxSampledRows` are counted but not
 * evaluated.
 */
export class TabularScanner {
  private state: ScanState = 'start';
  private labelRow: string[] = [];
  private preamble: Preamble = EMPTY_PREAMBLE;
  private headerRow = 0;
  private columns: ColumnMapping[] = [];
  private classification: LayoutClassification | null = null;
  private evaluation: RuleEvaluation | null = null;
  private rowsSeen = 0;
  private rowsTotal = 0;
  private ragged: Tally | null = null;
  private malformed: Tally | null = null;

  constructor(private readonly config: EngineConfig) {}

  push(row: string[], errors: readonly ParseError[] = []): void {
    this.rowsSeen++;
    if (errors.length > 0) {
      this.malformed = bump(this.malformed, this.rowsSeen, errors[0].message);
    }

    switch (this.state) {
      case 'start':
        if (isHeaderRow(row)) {
          this.beginData(row);
        } else {
          this.labelRow = row;
          this.state = 'values';
        }
        return;
      case 'values':
        this.preamble = parsePreamble(this.labelRow, row);
        this.state = 'headers';
        return;
      case 'headers':
        this.beginData(row);
        return;
      case 'data':
        this.pushData(row);
        return;
    }
  }

  private beginData(headers: string[]): void {
    this.headerRow = this.rowsSeen;
    this.columns = mapHeaders(headers);
    this.classification = classifyLayout(this.columns);
    const ctx = createTabularContext(
      this.columns,
      this.classification,
      this.preamble,
      this.config.metadataLabels,
    );
    this.evaluation = new RuleEvaluation(TABULAR_RULES, ctx, this.config.maxFailingRowsPerRule);
    this.state = 'data';
  }

  private pushData(row: string[]): void {
    this.rowsTotal++;
    const { evaluation } = this;
    if (!evaluation) return;
    const cap = this.config.maxSampledRows;
    if (cap !== null && evaluation.rowsScanned >= cap) return;

    evaluation.push(row);
    if (row.length !== this.columns.length) {
      this.ragged = bump(this.ragged, this.rowsTotal, `${row.length} cells for ${this.columns.length} columns`);
    }
  }

  finish(): ValidationResult {
    const { evaluation, classification } = this;
    if (!evaluation || !classification) {
      return assembleResult(
        'tabular-generic',
        [
          createFinding({
            severity: 'error',
            rule: 'table.header_missing',
            message: 'File ends before its column header row',
            expected: 'metadata labels, metadata values and a header row',
            actual: `${this.rowsSeen} non-blank row(s)`,
          }),
        ],
        { preamble: this.preamble.labels, rows_total: 0 },
      );
    }

    const findings: Finding[] = evaluation.finish();
    findings.push(...this.structureFindings(evaluation.rowsScanned));

    const fileType: TabularFileType = `tabular-${classification.layout}`;
    return assembleResult(fileType, findings, {
      preamble: this.preamble.labels,
      header_row: this.headerRow,
      layout: classification.layout,
      columns: this.columns.map((c) => ({ raw: c.raw, field: c.field, method: c.method })),
      payer_groups: classification.payerGroups.map((g) => ({
        payer: g.payer,
        plan: g.plan,
        columns: g.columns,
      })),
      rows_scanned: evaluation.rowsScanned,
      rows_total: this.rowsTotal,
      truncated: evaluation.rowsScanned < this.rowsTotal,
      failing_rows: evaluation.failingRows(),
    });
  }

  private structureFindings(scanned: number): Finding[] {
    const findings: Finding[] = [];
    if (this.rowsTotal === 0) {
      findings.push(
        createFinding({
          severity: 'warning',
          rule: 'table.no_data',
          message: 'Header row is not followed by any data rows',
          expected: 'at least one data row',
          actual: '0 rows',
        }),
      );
    }
    if (this.ragged) {
      findings.push(
        createFinding({
          severity: 'warning',
          rule: 'table.ragged_rows',
          message: `Rows whose cell count differs from the header (${this.ragged.count} of ${scanned} rows)`,
          expected: `${this.columns.length} cells per row`,
          actual: `${this.ragged.detail} (first at data row ${this.ragged.firstRow})`,
          count: this.ragged.count,
        }),
      );
    }
    if (this.malformed) {
      findings.push(
        createFinding({
          severity: 'warning',
          rule: 'table.malformed',
          message: `Rows the CSV parser could not read cleanly (${this.malformed.count})`,
          expected: 'well-formed quoting',
          actual: `${this.malformed.detail} (first at row ${this.malformed.firstRow})`,
          count: this.malformed.count,
        }),
      );
    }
    return findings;
  }
}

function parseConfig(delimiter: Delimiter) {
  return { delimiter, skipEmptyLines: 'greedy' as const };
}

/** Validate a decoded table held in memory. */
export function validateTabularText(text: string, delimiter: Delimiter, config: EngineConfig): ValidationResult {
  const scanner = new TabularScanner(config);
  Papa.parse<string[]>(text, {
    ...parseConfig(delimiter),
    step: (results) => scanner.push(results.data, results.errors),
  });
  return scanner.finish();
}

async function* decodeChunks(source: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = createStrictDecoder();
  try {
    for await (const chunk of source) {
      yield decoder.decode(chunk, { stream: true });
    }
    const tail = decoder.decode();
    if (tail) yield tail;
  } catch (err) {
    if (err instanceof TypeError) throw new FatalParseError('Input is not valid UTF-8', err);
    throw err;
  }
}

/** Validate a table streamed from `source` without holding it in memory. */
export function validateTabularStream(
  source: AsyncIterable<Uint8Array>,
  delimiter: Delimiter,
  config: EngineConfig,
): Promise<ValidationResult> {
  const scanner = new TabularScanner(config);
  const input = Readable.from(decodeChunks(source));

  return new Promise((resolve, reject) => {
    Papa.parse<string[]>(input, {
      ...parseConfig(delimiter),
      step: (results) => scanner.push(results.data, results.errors),
      complete: () => resolve(scanner.finish()),
      error: (err) => reject(err),
    });
  });
}
