import { getDescriptor, validateDocument } from '@mrfcheck/schema';
import type { SchemaViolation, StructuredVariant } from '@mrfcheck/schema';
import type { EngineConfig } from './engine-config.js';
import { createFinding, formatList } from './findings.js';
import { assembleResult } from './result.js';
import { matchSchema, topLevelKeys } from './schema-matcher.js';
import type { Finding, ValidationResult } from '../types/validation.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** JSON pointer to `$`-rooted path: `/in_network/0/name` → `$.in_network[0].name`. */
export function toDocumentPath(pointer: string, property?: string): string {
  const segments = pointer === '' ? [] : pointer.slice(1).split('/');
  if (property !== undefined) segments.push(property);

  let path = '$';
  for (const raw of segments) {
    const segment = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (/^\d+$/.test(segment)) path += `[${segment}]`;
    else if (IDENTIFIER.test(segment)) path += `.${segment}`;
    else path += `[${JSON.stringify(segment)}]`;
  }
  return path;
}

export function describeValue(value: unknown): string {
  if (value === undefined) return 'missing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array (${value.length} item${value.length === 1 ? '' : 's'})`;
  if (typeof value === 'object') return 'object';
  if (typeof value === 'string') return JSON.stringify(value.length > 60 ? `${value.slice(0, 57)}...` : value);
  return String(value);
}

function paramString(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

function describeConstraint(violation: SchemaViolation): string {
  const { keyword, params, constraint } = violation;
  switch (keyword) {
    case 'required':
      return `property "${paramString(params, 'missingProperty') ?? ''}"`;
    case 'type':
      return Array.isArray(constraint) ? constraint.join(' | ') : String(constraint);
    case 'enum':
      return Array.isArray(constraint) ? `one of ${formatList(constraint.map((v) => JSON.stringify(v)))}` : String(constraint);
    case 'const':
      return JSON.stringify(constraint);
    case 'format':
      return `${String(constraint)} format`;
    case 'minimum':
      return `>= ${String(constraint)}`;
    case 'exclusiveMinimum':
      return `> ${String(constraint)}`;
    case 'maximum':
      return `<= ${String(constraint)}`;
    case 'minItems':
      return `at least ${String(constraint)} item(s)`;
    case 'minLength':
      return `at least ${String(constraint)} character(s)`;
    case 'pattern':
      return `match /${String(constraint)}/`;
    default:
      return typeof constraint === 'object' ? JSON.stringify(constraint) : String(constraint);
  }
}

export function violationToFinding(violation: SchemaViolation): Finding {
  if (violation.keyword === 'required') {
    const property = paramString(violation.params, 'missingProperty') ?? '';
    const field = toDocumentPath(violation.instancePath, property);
    return createFinding({
      severity: 'error',
      rule: 'schema.required',
      message: `Missing required property ${field}`,
      expected: describeConstraint(violation),
      actual: 'missing',
      field,
    });
  }

  const field = toDocumentPath(violation.instancePath);
  return createFinding({
    severity: 'error',
    rule: `schema.${violation.keyword}`,
    message: `${field} ${violation.message}`,
    expected: describeConstraint(violation),
    actual: describeValue(violation.data),
    field,
  });
}

function structuredFileType(variant: StructuredVariant) {
  return `structured-${variant}` as const;
}

export function validateStructuredDocument(document: unknown, config: EngineConfig): ValidationResult {
  const keys = topLevelKeys(document);

  let variant: StructuredVariant;
  const forced = config.schemaOverride;
  if (forced) {
    variant = forced;
  } else {
    const match = matchSchema(document);
    if (!match.matched) {
      const warning = createFinding({
        severity: 'warning',
        rule: 'schema.unknown',
        message: match.closest
          ? `Document does not match any known schema; closest is ${match.closest.label}`
          : 'Document does not match any known schema',
        expected: match.closest ? formatList(match.closest.signature) : null,
        actual: keys.length > 0 ? formatList(keys) : describeValue(document),
      });
      // best effort: hold the document to the closest variant's schema
      const findings = match.closest
        ? validateDocument(match.closest.id, document).map(violationToFinding)
        : [];
      return assembleResult('structured-unknown', [warning, ...findings], {
        schema: null,
        closest_schema: match.closest?.id ?? null,
        top_level_keys: keys,
      });
    }
    variant = match.descriptor.id;
  }

  const findings = validateDocument(variant, document).map(violationToFinding);
  return assembleResult(structuredFileType(variant), findings, {
    schema: variant,
    schema_label: getDescriptor(variant).label,
    schema_forced: forced !== null,
    top_level_keys: keys,
  });
}
