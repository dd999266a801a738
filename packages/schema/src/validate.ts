import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import ajvModule from 'ajv/dist/2020.js';
import formatsModule from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { SCHEMA_DESCRIPTORS } from './variants.js';
import type { StructuredVariant } from './variants.js';

export interface SchemaViolation {
  keyword: string;
  /** JSON pointer to the offending node ('' for the document root). */
  instancePath: string;
  message: string;
  params: Record<string, unknown>;
  /** Constraint value from the schema (e.g. the enum list or the expected type). */
  constraint: unknown;
  /** Value found at instancePath. */
  data: unknown;
}

function getSchemasDir(): string {
  const currentFile = fileURLToPath(import.meta.url);
  return resolve(dirname(currentFile), '..', 'schemas');
}

// CJS packages: the constructor sits on .default under both Node and Vitest interop
const Ajv2020 = ajvModule.default;
const addFormats = formatsModule.default;

function buildRegistry(): ReadonlyMap<StructuredVariant, { schema: object; validate: ValidateFunction }> {
  const ajv = new Ajv2020({ allErrors: true, strict: false, verbose: true });
  addFormats(ajv);

  const registry = new Map<StructuredVariant, { schema: object; validate: ValidateFunction }>();
  for (const descriptor of SCHEMA_DESCRIPTORS) {
    const schemaPath = resolve(getSchemasDir(), descriptor.schemaFile);
    const schema: object = JSON.parse(readFileSync(schemaPath, 'utf-8'));
    registry.set(descriptor.id, Object.freeze({ schema, validate: ajv.compile(schema) }));
  }
  return registry;
}

const registry = buildRegistry();

function toViolation(err: ErrorObject): SchemaViolation {
  return {
    keyword: err.keyword,
    instancePath: err.instancePath,
    message: err.message ?? 'unknown error',
    params: { ...err.params },
    constraint: err.schema,
    data: err.data,
  };
}

export function getSchema(variant: StructuredVariant): object {
  const entry = registry.get(variant);
  if (!entry) throw new Error(`No schema registered for ${variant}`);
  return entry.schema;
}

export function validateDocument(variant: StructuredVariant, data: unknown): SchemaViolation[] {
  const entry = registry.get(variant);
  if (!entry) throw new Error(`No schema registered for ${variant}`);

  if (entry.validate(data)) {
    return [];
  }
  return (entry.validate.errors ?? []).map(toViolation);
}
