import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import {
  SCHEMA_DESCRIPTORS,
  getDescriptor,
  getSchema,
  isStructuredVariant,
  validateDocument,
} from '@mrfcheck/schema';

describe('schema registry', () => {
  it('registers the three structured variants in order', () => {
    expect(SCHEMA_DESCRIPTORS.map((d) => d.id)).toEqual(['negotiated-rates', 'allowed-amounts', 'provider-reference']);
    expect(Object.isFrozen(SCHEMA_DESCRIPTORS)).toBe(true);
    expect(Object.isFrozen(SCHEMA_DESCRIPTORS[0].signature)).toBe(true);
  });

  it('loads a draft 2020-12 schema per variant', () => {
    for (const descriptor of SCHEMA_DESCRIPTORS) {
      expect(getSchema(descriptor.id)).toMatchObject({
        $schema: 'https://json-schema.org/draft/2020-12/schema',
        type: 'object',
      });
    }
  });

  it('recognises variant names', () => {
    expect(isStructuredVariant('allowed-amounts')).toBe(true);
    expect(isStructuredVariant('claims')).toBe(false);
    expect(getDescriptor('provider-reference').signature).toEqual(['provider_group_id', 'provider_groups']);
  });
});

describe('validateDocument', () => {
  it('returns no violations for a valid document', () => {
    const document = {
      provider_group_id: 7,
      provider_groups: [{ npi: [1234567890], tin: { type: 'ein', value: '00-0000000' } }],
    };
    expect(validateDocument('provider-reference', document)).toEqual([]);
  });

  it('reports every violation with its constraint and data', () => {
    const document = {
      provider_group_id: 7,
      provider_groups: [{ npi: [], tin: { type: 'ssn', value: '00-0000000' } }],
    };
    expect(validateDocument('provider-reference', document)).toEqual([
      {
        keyword: 'minItems',
        instancePath: '/provider_groups/0/npi',
        message: 'must NOT have fewer than 1 items',
        params: { limit: 1 },
        constraint: 1,
        data: [],
      },
      {
        keyword: 'enum',
        instancePath: '/provider_groups/0/tin/type',
        message: 'must be equal to one of the allowed values',
        params: { allowedValues: ['ein', 'npi'] },
        constraint: ['ein', 'npi'],
        data: 'ssn',
      },
    ]);
  });

  it('rejects a non-object document', () => {
    expect(validateDocument('negotiated-rates', []).map((v) => v.keyword)).toEqual(['type']);
  });
});

describe('schema package manifest', () => {
  const packageDir = fileURLToPath(new URL('../../packages/schema/', import.meta.url));
  const manifest: unknown = JSON.parse(readFileSync(resolve(packageDir, 'package.json'), 'utf-8'));

  it('gives the type checker the sources and Node the build output', () => {
    expect(manifest).toMatchObject({
      exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
    });
  });

  it('keeps the schemas one level above the compiled entry point', () => {
    const compiledDir = dirname(resolve(packageDir, 'dist/index.js'));
    for (const descriptor of SCHEMA_DESCRIPTORS) {
      expect(existsSync(resolve(compiledDir, '..', 'schemas', descriptor.schemaFile))).toBe(true);
    }
  });
});
