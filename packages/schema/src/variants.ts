export type StructuredVariant = 'negotiated-rates' | 'allowed-amounts' | 'provider-reference';

export interface SchemaDescriptor {
  id: StructuredVariant;
  label: string;
  /** Top-level keys that must all be present for the document to be detected as this variant. */
  signature: readonly string[];
  /** Schema file under schemas/. */
  schemaFile: string;
}

const descriptors: SchemaDescriptor[] = [
  {
    id: 'negotiated-rates',
    label: 'Negotiated rates (in-network)',
    signature: ['reporting_entity_name', 'in_network'],
    schemaFile: 'negotiated-rates.schema.json',
  },
  {
    id: 'allowed-amounts',
    label: 'Allowed amounts (out-of-network)',
    signature: ['reporting_entity_name', 'out_of_network'],
    schemaFile: 'allowed-amounts.schema.json',
  },
  {
    id: 'provider-reference',
    label: 'Provider reference',
    signature: ['provider_group_id', 'provider_groups'],
    schemaFile: 'provider-reference.schema.json',
  },
];

export const SCHEMA_DESCRIPTORS: readonly SchemaDescriptor[] = Object.freeze(
  descriptors.map((d) => Object.freeze({ ...d, signature: Object.freeze([...d.signature]) })),
);

export function isStructuredVariant(value: string): value is StructuredVariant {
  return SCHEMA_DESCRIPTORS.some((d) => d.id === value);
}

export function getDescriptor(variant: StructuredVariant): SchemaDescriptor {
  const descriptor = SCHEMA_DESCRIPTORS.find((d) => d.id === variant);
  if (!descriptor) {
    throw new Error(`Unknown structured variant: ${variant}`);
  }
  return descriptor;
}
