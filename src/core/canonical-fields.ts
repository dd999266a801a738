export const CANONICAL_FIELDS = [
  'hospital_name',
  'last_updated_on',
  'version',
  'hospital_location',
  'hospital_address',
  'license_number',
  'description',
  'setting',
  'billing_code',
  'billing_code_type',
  'modifiers',
  'drug_unit_of_measurement',
  'drug_type_of_measurement',
  'gross_charge',
  'discounted_cash_charge',
  'payer_name',
  'plan_name',
  'negotiated_dollar',
  'negotiated_percentage',
  'negotiated_algorithm',
  'estimated_amount',
  'methodology',
  'min_charge',
  'max_charge',
  'additional_notes',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.some((field) => field === value);
}

/** Preamble labels the mapper recognises. */
export const METADATA_FIELDS: readonly CanonicalField[] = [
  'hospital_name',
  'last_updated_on',
  'version',
  'hospital_location',
  'hospital_address',
  'license_number',
];

/** Fields that describe the file's publisher. */
export const ENTITY_FIELDS: readonly CanonicalField[] = [
  'hospital_name',
  'hospital_location',
  'hospital_address',
  'license_number',
];

/** Fields repeated per payer/plan in wide files. */
export const PAYER_SPECIFIC_FIELDS: readonly CanonicalField[] = [
  'negotiated_dollar',
  'negotiated_percentage',
  'negotiated_algorithm',
  'methodology',
  'estimated_amount',
  'additional_notes',
];

/** Fields that carry a charge value for an item. */
export const CHARGE_FIELDS: readonly CanonicalField[] = [
  'gross_charge',
  'discounted_cash_charge',
  'negotiated_dollar',
  'negotiated_percentage',
  'negotiated_algorithm',
];

/** Fields whose cells hold a dollar amount. */
export const DOLLAR_FIELDS: readonly CanonicalField[] = [
  'gross_charge',
  'discounted_cash_charge',
  'negotiated_dollar',
  'min_charge',
  'max_charge',
  'estimated_amount',
];
