import { describe, it, expect } from 'vitest';
import { mapHeaders } from '../../src/core/column-mapper.js';
import { createFinding } from '../../src/core/findings.js';
import { classifyLayout } from '../../src/core/layout-classifier.js';
import { EMPTY_PREAMBLE } from '../../src/core/preamble-parser.js';
import { RULE_TABLES } from '../../src/core/rule-tables.js';
import { RuleEvaluation, createTabularContext, hasValue } from '../../src/core/rule-evaluator.js';
import type { TabularRule } from '../../src/core/rule-evaluator.js';

function context(headers: string[]) {
  const columns = mapHeaders(headers);
  return createTabularContext(columns, classifyLayout(columns), EMPTY_PREAMBLE, RULE_TABLES.metadataLabels);
}

const blankCell = (code: string, index: number): TabularRule => ({
  code,
  rowCheck: () => ({
    inspect: (row) => (hasValue(row, [index]) ? null : `blank ${index}`),
    summarize: (summary) =>
      createFinding({
        severity: 'error',
        rule: code,
        message: `${summary.count}/${summary.scanned}`,
        actual: `${summary.firstViolation}@${summary.firstRow}`,
        count: summary.count,
      }),
  }),
});

const headerOnly = (code: string): TabularRule => ({
  code,
  checkHeaders: () => createFinding({ severity: 'warning', rule: code, message: code }),
});

describe('createTabularContext', () => {
  it('indexes columns by canonical field', () => {
    const ctx = context(['code|1', 'description', 'code|2']);
    expect(ctx.fieldColumns.get('billing_code')).toEqual([0, 2]);
    expect(ctx.fieldColumns.get('description')).toEqual([1]);
    expect(ctx.layout).toBe('tall');
  });
});

describe('RuleEvaluation', () => {
  it('summarises each row check in one finding', () => {
    const evaluation = new RuleEvaluation([blankCell('a', 0)], context(['description']));
    evaluation.push(['x']);
    evaluation.push(['']);
    evaluation.push([' ']);
    evaluation.push(['y']);

    const findings = evaluation.finish();
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ rule: 'a', message: '2/4', actual: 'blank 0@2', count: 2 });
    expect(evaluation.rowsScanned).toBe(4);
  });

  it('emits findings in registration order regardless of when they occur', () => {
    const rules = [blankCell('late', 1), headerOnly('header'), blankCell('early', 0)];
    const evaluation = new RuleEvaluation(rules, context(['description', 'setting']));
    evaluation.push(['', 'x']);
    evaluation.push(['x', '']);

    expect(evaluation.finish().map((f) => f.rule)).toEqual(['late', 'header', 'early']);
  });

  it('skips rules whose layouts exclude the file', () => {
    const wideOnly: TabularRule = { ...headerOnly('wide-only'), layouts: ['wide'] };
    const evaluation = new RuleEvaluation([wideOnly, headerOnly('any')], context(['description']));
    expect(evaluation.finish().map((f) => f.rule)).toEqual(['any']);
  });

  it('samples the first failing rows of each violated rule', () => {
    const evaluation = new RuleEvaluation([blankCell('a', 0), blankCell('b', 1)], context(['description', 'setting']), 2);
    evaluation.push(['', 'x']);
    evaluation.push(['x', 'x']);
    evaluation.push(['', 'x']);
    evaluation.push(['', 'x']);

    expect(evaluation.failingRows()).toEqual({ a: [1, 3] });
    expect(evaluation.finish()[0]).toMatchObject({ rule: 'a', actual: 'blank 0@1', count: 3 });
  });

  it('reports nothing for clean rows', () => {
    const evaluation = new RuleEvaluation([blankCell('a', 0)], context(['description']));
    evaluation.push(['x']);
    expect(evaluation.finish()).toEqual([]);
  });
});
