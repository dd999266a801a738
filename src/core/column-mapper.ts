import type { CanonicalField } from './canonical-fields.js';
import { METADATA_FIELDS, PAYER_SPECIFIC_FIELDS } from './canonical-fields.js';
import { isNumericToken, normalizeHeader, splitSegments, tokenize } from './header-text.js';
import { RULE_TABLES } from './rule-tables.js';
import type { HeaderRule, RuleTables } from './rule-tables.js';

export type MappingMethod = 'exact' | 'heuristic' | 'none';

export interface ColumnMapping {
  readonly raw: string;
  readonly normalized: string;
  readonly field: CanonicalField | null;
  readonly method: MappingMethod;
  /**
   * Pipe segments that name something besides the field: payer and plan in wide
   * headers, the state in `license_number|CA`. Index segments are dropped.
   */
  readonly qualifiers: readonly string[];
}

export interface MapOptions {
  /** Only map to these fields; anything else is reported as unmapped. */
  restrictTo?: readonly CanonicalField[];
  tables?: RuleTables;
}

function scoreRule(rule: HeaderRule, tokens: ReadonlySet<string>): number {
  if (rule.exclude.some((token) => tokens.has(token))) return 0;
  const matched = rule.terms.every((spellings) => spellings.some((s) => tokens.has(s)));
  return matched ? rule.terms.length : 0;
}

function bestRule(
  tokens: ReadonlySet<string>,
  tables: RuleTables,
  allowed: (field: CanonicalField) => boolean,
): HeaderRule | null {
  let best: HeaderRule | null = null;
  let bestScore = 0;
  for (const rule of tables.headerRules) {
    if (!allowed(rule.field)) continue;
    const score = scoreRule(rule, tokens);
    // strictly greater: ties stay with the earliest registered rule
    if (score > bestScore) {
      best = rule;
      bestScore = score;
    }
  }
  return best;
}

function qualifierSegments(raw: string): string[] {
  return raw
    .split('|')
    .map((segment) => segment.replace(/\s+/g, ' ').trim())
    .filter((segment) => !tokenize(segment).every(isNumericToken));
}

function namesField(segment: string, tables: RuleTables): boolean {
  if (tables.aliasFor(normalizeHeader(segment))) return true;
  return bestRule(new Set(tokenize(segment)), tables, () => true) !== null;
}

/**
 * Payer-specific headers read `<prefix>|<payer>|<plan>|<type>`, or
 * `<prefix>|<payer>|<plan>` when the prefix names the field by itself
 * (`estimated_amount|Aetna|PPO`). Position decides, so a plan called
 * "Standard" or "Gross" is still a plan.
 */
function payerQualifiers(raw: string, tables: RuleTables): string[] {
  const segments = qualifierSegments(raw);
  if (segments.length < 2) return [];
  const [prefix, ...rest] = segments;
  return namesField(prefix, tables) ? rest : rest.slice(0, -1);
}

function vocabularyQualifiers(raw: string, tables: RuleTables): string[] {
  return qualifierSegments(raw).filter((segment) =>
    tokenize(segment).some((token) => !isNumericToken(token) && !tables.inVocabulary(token)),
  );
}

function freezeMapping(mapping: ColumnMapping): ColumnMapping {
  Object.freeze(mapping.qualifiers);
  return Object.freeze(mapping);
}

export function mapHeader(raw: string, options: MapOptions = {}): ColumnMapping {
  const tables = options.tables ?? RULE_TABLES;
  const allowed = (field: CanonicalField) => !options.restrictTo || options.restrictTo.includes(field);
  const normalized = normalizeHeader(raw);

  const exact = tables.aliasFor(normalized);
  if (exact && allowed(exact)) {
    return freezeMapping({ raw, normalized, field: exact, method: 'exact', qualifiers: [] });
  }

  const best = bestRule(new Set(splitSegments(raw).flatMap(tokenize)), tables, allowed);
  if (!best) {
    return freezeMapping({ raw, normalized, field: null, method: 'none', qualifiers: [] });
  }
  return freezeMapping({
    raw,
    normalized,
    field: best.field,
    method: 'heuristic',
    qualifiers: PAYER_SPECIFIC_FIELDS.includes(best.field)
      ? payerQualifiers(raw, tables)
      : vocabularyQualifiers(raw, tables),
  });
}

export function mapHeaders(headers: readonly string[], options: MapOptions = {}): ColumnMapping[] {
  return headers.map((header) => mapHeader(header, options));
}

/** Canonicalise a preamble label against the metadata subset of the vocabulary. */
export function mapMetadataLabel(label: string, tables?: RuleTables): ColumnMapping {
  return mapHeader(label, { restrictTo: METADATA_FIELDS, tables });
}
