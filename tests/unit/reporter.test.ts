import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { createFinding } from '../../src/core/findings.js';
import { isReportFormat, renderCsv, renderHuman, renderJson, renderReport } from '../../src/core/reporter.js';
import { assembleResult } from '../../src/core/result.js';

const result = assembleResult('tabular-tall', [
  createFinding({ severity: 'info', rule: 'columns.unmapped', message: 'unmapped', actual: 'Internal Ref', field: 'Internal Ref' }),
  createFinding({
    severity: 'error',
    rule: 'item.description.blank',
    message: 'Rows without an item description (2 of 5 rows)',
    expected: 'a non-empty description',
    actual: 'blank description (first at data row 4)',
    field: 'description',
    count: 2,
  }),
  createFinding({ severity: 'warning', rule: 'layout.generic', message: 'has "quotes", and commas' }),
]);

describe('renderJson', () => {
  it('serialises the result field for field', () => {
    const parsed: unknown = JSON.parse(renderJson(result));
    expect(parsed).toEqual({
      ok: false,
      file_type: 'tabular-tall',
      counts: { errors: 2, warnings: 1, info: 1 },
      findings: result.findings,
      metadata: {},
    });
    expect(renderJson(result).split('\n')[1]).toBe('  "ok": false,');
  });
});

describe('renderCsv', () => {
  it('writes one row per finding under a fixed header', () => {
    const lines = renderCsv(result).split('\r\n');
    expect(lines).toEqual([
      'severity,rule,field,message,expected,actual,count',
      'info,columns.unmapped,Internal Ref,unmapped,,Internal Ref,1',
      'error,item.description.blank,description,Rows without an item description (2 of 5 rows),a non-empty description,blank description (first at data row 4),2',
      'warning,layout.generic,,"has ""quotes"", and commas",,,1',
    ]);
  });

  it('writes only the header for a clean result', () => {
    expect(renderCsv(assembleResult('tabular-tall', []))).toBe('severity,rule,field,message,expected,actual,count');
  });
});

describe('renderHuman', () => {
  it('groups findings by severity after a summary line', () => {
    const lines = stripVTControlCharacters(renderHuman(result, 'prices.csv')).split('\n');
    expect(lines).toEqual([
      '✖ prices.csv failed as tabular-tall (2 error(s), 1 warning(s), 1 info)',
      '',
      'Errors',
      '  ✖ [item.description.blank] Rows without an item description (2 of 5 rows) (description)',
      '      expected: a non-empty description',
      '      actual:   blank description (first at data row 4)',
      '',
      'Warnings',
      '  ⚠ [layout.generic] has "quotes", and commas',
      '',
      'Info',
      '  ℹ [columns.unmapped] unmapped (Internal Ref)',
      '      actual:   Internal Ref',
    ]);
  });

  it('prints a single line for a clean result', () => {
    const clean = assembleResult('structured-allowed-amounts', []);
    expect(stripVTControlCharacters(renderHuman(clean))).toBe(
      '✔ passed as structured-allowed-amounts (0 error(s), 0 warning(s), 0 info)',
    );
  });
});

describe('renderReport', () => {
  it('dispatches on format', () => {
    expect(renderReport(result, 'json')).toBe(renderJson(result));
    expect(renderReport(result, 'csv')).toBe(renderCsv(result));
    expect(isReportFormat('xml')).toBe(false);
    expect(isReportFormat('csv')).toBe(true);
  });
});
