import { TextEncoder } from 'node:util';

/** Inline CSV builders for tabular tests. */

export const STRICT_LABELS = [
  'hospital_name',
  'last_updated_on',
  'version',
  'hospital_location',
  'hospital_address',
  'license_number|CA',
];

export const INFORMAL_LABELS = [
  'Hospital Name',
  'Last Updated',
  'Version',
  'Hospital Location',
  'Hospital Address',
  'License Number|CA',
];

export const CMS_TEMPLATE_LABELS = [
  'hospital_name',
  'MRF Date',
  'CMS Template Version',
  'hospital_location',
  'hospital_address',
  'license_number|CA',
];

export const PREAMBLE_VALUES = [
  'Test General Hospital',
  '2024-07-01',
  '2.0.0',
  'Springfield',
  '1 Main St, Springfield',
  '12345',
];

export const TALL_HEADERS = [
  'description',
  'code|1',
  'code|1|type',
  'modifiers',
  'setting',
  'drug_unit_of_measurement',
  'drug_type_of_measurement',
  'standard_charge|gross',
  'standard_charge|discounted_cash',
  'payer_name',
  'plan_name',
  'standard_charge|negotiated_dollar',
  'standard_charge|negotiated_percentage',
  'standard_charge|negotiated_algorithm',
  'estimated_amount',
  'standard_charge|methodology',
  'standard_charge|min',
  'standard_charge|max',
  'additional_generic_notes',
];

export type TallRow = Record<string, string | undefined>;

const BASE_TALL_ROW: Readonly<Record<string, string>> = {
  description: 'Office visit',
  'code|1': '99213',
  'code|1|type': 'CPT',
  setting: 'outpatient',
  'standard_charge|gross': '150.00',
  'standard_charge|discounted_cash': '120.00',
  payer_name: 'Acme Health',
  plan_name: 'Gold PPO',
  'standard_charge|negotiated_dollar': '95.00',
  'standard_charge|methodology': 'fee schedule',
  'standard_charge|min': '80.00',
  'standard_charge|max': '110.00',
};

/** A valid tall data row with `overrides` applied, in TALL_HEADERS order. */
export function tallRow(overrides: TallRow = {}): string[] {
  const merged: Record<string, string> = { ...BASE_TALL_ROW };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return TALL_HEADERS.map((header) => merged[header] ?? '');
}

function quote(cell: string, delimiter: string): string {
  return /["\r\n]/.test(cell) || cell.includes(delimiter) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function toCsv(rows: readonly (readonly string[])[], delimiter = ','): string {
  return rows.map((row) => row.map((cell) => quote(cell, delimiter)).join(delimiter)).join('\n') + '\n';
}

export function tallCsv(rows: readonly (readonly string[])[], labels: readonly string[] = STRICT_LABELS): string {
  return toCsv([labels, PREAMBLE_VALUES, TALL_HEADERS, ...rows]);
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function negotiatedRatesDocument(): Record<string, unknown> {
  return {
    reporting_entity_name: 'Test Insurer',
    reporting_entity_type: 'health insurance issuer',
    last_updated_on: '2024-07-01',
    version: '1.0.0',
    in_network: [
      {
        negotiation_arrangement: 'ffs',
        name: 'Office visit',
        billing_code_type: 'CPT',
        billing_code_type_version: '2024',
        billing_code: '99213',
        description: 'Established patient office visit',
        negotiated_rates: [
          {
            provider_groups: [{ npi: [1234567890], tin: { type: 'ein', value: '00-0000000' } }],
            negotiated_prices: [
              {
                negotiated_type: 'negotiated',
                negotiated_rate: 95.5,
                expiration_date: '9999-12-31',
                billing_class: 'professional',
              },
            ],
          },
        ],
      },
    ],
  };
}
