import { describe, it, expect } from 'vitest';
import {
  RULE_TABLES,
  RuleTableError,
  createRuleTables,
  parseAliases,
  parseHeaderRules,
  parseMetadataLabelPolicy,
} from '../../src/core/rule-tables.js';

describe('RULE_TABLES', () => {
  it('loads the bundled registry', () => {
    expect(RULE_TABLES.aliasFor('standard_charge|gross')).toBe('gross_charge');
    expect(RULE_TABLES.aliasFor('mrf date')).toBe('last_updated_on');
    expect(RULE_TABLES.inVocabulary('negotiated')).toBe(true);
    expect(RULE_TABLES.inVocabulary('aetna')).toBe(false);
    expect(RULE_TABLES.metadataLabels.accepted.map((set) => set.name)).toEqual(['cms-template']);
  });

  it('is frozen and exposes no mutable collections', () => {
    expect(Object.isFrozen(RULE_TABLES)).toBe(true);
    expect(Object.isFrozen(RULE_TABLES.headerRules)).toBe(true);
    expect(Object.isFrozen(RULE_TABLES.metadataLabels.strict)).toBe(true);
    expect(Object.values(RULE_TABLES).some((value) => value instanceof Map || value instanceof Set)).toBe(false);
  });
});

describe('createRuleTables', () => {
  it('copies the alias map so later changes to it do not leak in', () => {
    const aliases = parseAliases({ gross: 'gross_charge' });
    const tables = createRuleTables(aliases, [], parseMetadataLabelPolicy({ strict: ['version'] }));
    aliases.set('cash', 'discounted_cash_charge');
    aliases.delete('gross');
    expect(tables.aliasFor('gross')).toBe('gross_charge');
    expect(tables.aliasFor('cash')).toBeUndefined();
  });

  it('builds the vocabulary from aliases and rule terms', () => {
    const tables = createRuleTables(
      parseAliases({ 'Item Description': 'description' }),
      parseHeaderRules([{ field: 'setting', terms: ['care/service', 'setting'], exclude: ['Notes'] }]),
      parseMetadataLabelPolicy({ strict: ['version'] }),
    );
    expect(['item', 'description', 'care', 'service', 'setting', 'notes'].every(tables.inVocabulary)).toBe(true);
    expect(tables.inVocabulary('payer')).toBe(false);
  });
});

describe('parseMetadataLabelPolicy', () => {
  it('normalises labels and defaults the optional parts', () => {
    expect(parseMetadataLabelPolicy({ strict: ['Hospital_Name ', 'VERSION'] })).toEqual({
      strict: ['hospital_name', 'version'],
      accepted: [],
      informal: [],
      informalSeverity: 'info',
    });
  });

  it('rejects malformed label sets', () => {
    expect(() => parseMetadataLabelPolicy({ strict: ['version'], accepted: [{ name: 'x', labels: [] }] })).toThrow(
      new RuleTableError('accepted label set 0 needs a "name" and a non-empty "labels" list'),
    );
    expect(() => parseMetadataLabelPolicy({ strict: ['version'], informal: {} })).toThrow(
      'metadata label policy "informal" must be an array',
    );
    expect(() => parseMetadataLabelPolicy({ strict: ['version'], informalSeverity: 'fatal' })).toThrow(
      'invalid informalSeverity "fatal"',
    );
  });
});

describe('parseAliases', () => {
  it('rejects aliases to unknown fields', () => {
    expect(() => parseAliases({ price: 'price' })).toThrow('alias "price" targets unknown field "price"');
  });
});
