import { readFileSync } from 'node:fs';
import { getRulesPath } from '../utils/paths.js';
import { isCanonicalField } from './canonical-fields.js';
import type { CanonicalField } from './canonical-fields.js';
import { normalizeHeader, tokenize } from './header-text.js';
import type { Severity } from '../types/validation.js';
import { SEVERITIES } from '../types/validation.js';
import { deepFreeze } from '../utils/freeze.js';

export interface HeaderRule {
  field: CanonicalField;
  /** Every term must match a header token; a term lists its accepted spellings. */
  terms: readonly (readonly string[])[];
  /** Any of these tokens vetoes the rule. */
  exclude: readonly string[];
}

export interface LabelSet {
  name: string;
  labels: readonly string[];
}

export interface MetadataLabelPolicy {
  strict: readonly string[];
  /** Alternate label sets that are just as compliant as `strict`. */
  accepted: readonly LabelSet[];
  informal: readonly LabelSet[];
  /** Severity reported when the preamble matches an informal set instead of the strict one. */
  informalSeverity: Severity;
}

/** Allowed cell values per field, compared case-insensitively. */
export type ValueSets = Readonly<Partial<Record<CanonicalField, readonly string[]>>>;

export interface RuleTables {
  /** Exact alias lookup by normalized header. */
  aliasFor(normalized: string): CanonicalField | undefined;
  headerRules: readonly HeaderRule[];
  /** Whether the registry knows the token; header segments made only of these name nothing else. */
  inVocabulary(token: string): boolean;
  metadataLabels: MetadataLabelPolicy;
  valueSets: ValueSets;
}

export class RuleTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuleTableError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some((severity) => severity === value);
}

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(getRulesPath(file), 'utf-8'));
}

export function parseAliases(value: unknown): Map<string, CanonicalField> {
  if (!isRecord(value)) throw new RuleTableError('column aliases must be an object');
  const aliases = new Map<string, CanonicalField>();
  for (const [raw, field] of Object.entries(value)) {
    if (typeof field !== 'string' || !isCanonicalField(field)) {
      throw new RuleTableError(`alias "${raw}" targets unknown field "${String(field)}"`);
    }
    aliases.set(normalizeHeader(raw), field);
  }
  return aliases;
}

export function parseHeaderRules(value: unknown): HeaderRule[] {
  if (!Array.isArray(value)) throw new RuleTableError('header rules must be an array');
  return value.map((entry, i) => {
    if (!isRecord(entry)) throw new RuleTableError(`header rule ${i} must be an object`);
    const { field, terms, exclude = [] } = entry;
    if (typeof field !== 'string' || !isCanonicalField(field)) {
      throw new RuleTableError(`header rule ${i} targets unknown field "${String(field)}"`);
    }
    if (!isStringArray(terms) || terms.length === 0) {
      throw new RuleTableError(`header rule ${i} needs a non-empty "terms" list`);
    }
    if (!isStringArray(exclude)) {
      throw new RuleTableError(`header rule ${i} has an invalid "exclude" list`);
    }
    return {
      field,
      terms: terms.map((term) => term.split('/').map((t) => t.trim().toLowerCase())),
      exclude: exclude.map((t) => t.toLowerCase()),
    };
  });
}

function parseLabelSets(value: unknown, kind: string): LabelSet[] {
  if (!Array.isArray(value)) {
    throw new RuleTableError(`metadata label policy "${kind}" must be an array`);
  }
  return value.map((set, i): LabelSet => {
    if (!isRecord(set) || typeof set.name !== 'string' || !isStringArray(set.labels) || set.labels.length === 0) {
      throw new RuleTableError(`${kind} label set ${i} needs a "name" and a non-empty "labels" list`);
    }
    return { name: set.name, labels: set.labels.map(normalizeHeader) };
  });
}

export function parseMetadataLabelPolicy(value: unknown): MetadataLabelPolicy {
  if (!isRecord(value)) throw new RuleTableError('metadata label policy must be an object');
  const { strict, accepted = [], informal = [], informalSeverity = 'info' } = value;
  if (!isStringArray(strict) || strict.length === 0) {
    throw new RuleTableError('metadata label policy needs a non-empty "strict" list');
  }
  if (!isSeverity(informalSeverity)) {
    throw new RuleTableError(`invalid informalSeverity "${String(informalSeverity)}"`);
  }
  return {
    strict: strict.map(normalizeHeader),
    accepted: parseLabelSets(accepted, 'accepted'),
    informal: parseLabelSets(informal, 'informal'),
    informalSeverity,
  };
}

export function parseValueSets(value: unknown): ValueSets {
  if (!isRecord(value)) throw new RuleTableError('value sets must be an object');
  const sets: Partial<Record<CanonicalField, readonly string[]>> = {};
  for (const [field, allowed] of Object.entries(value)) {
    if (!isCanonicalField(field)) throw new RuleTableError(`value set for unknown field "${field}"`);
    if (!isStringArray(allowed) || allowed.length === 0) {
      throw new RuleTableError(`value set "${field}" needs a non-empty list of strings`);
    }
    sets[field] = allowed;
  }
  return sets;
}

function buildVocabulary(aliases: ReadonlyMap<string, CanonicalField>, rules: readonly HeaderRule[]): Set<string> {
  const vocabulary = new Set<string>();
  for (const key of aliases.keys()) {
    for (const token of tokenize(key)) vocabulary.add(token);
  }
  for (const rule of rules) {
    for (const term of rule.terms) for (const token of term) vocabulary.add(token);
    for (const token of rule.exclude) vocabulary.add(token);
  }
  return vocabulary;
}

/** The alias map and vocabulary are copied and only reachable through the lookups. */
export function createRuleTables(
  aliases: ReadonlyMap<string, CanonicalField>,
  headerRules: readonly HeaderRule[],
  metadataLabels: MetadataLabelPolicy,
  valueSets: ValueSets = {},
): RuleTables {
  const lookup = new Map(aliases);
  const vocabulary = buildVocabulary(lookup, headerRules);
  return Object.freeze({
    aliasFor: (normalized: string) => lookup.get(normalized),
    headerRules: deepFreeze([...headerRules]),
    inVocabulary: (token: string) => vocabulary.has(token),
    metadataLabels: deepFreeze(metadataLabels),
    valueSets: deepFreeze({ ...valueSets }),
  });
}

function loadRuleTables(): RuleTables {
  return createRuleTables(
    parseAliases(readJson('column-aliases.json')),
    parseHeaderRules(readJson('header-rules.json')),
    parseMetadataLabelPolicy(readJson('metadata-labels.json')),
    parseValueSets(readJson('value-sets.json')),
  );
}

/** Built once at module load; never mutated afterwards. */
export const RULE_TABLES: RuleTables = loadRuleTables();
