import { CHARGE_FIELDS, PAYER_SPECIFIC_FIELDS } from './canonical-fields.js';
import type { CanonicalField } from './canonical-fields.js';
import type { ColumnMapping } from './column-mapper.js';

export type TabularLayout = 'tall' | 'wide' | 'generic';

export interface PayerGroup {
  key: string;
  payer: string;
  plan: string | null;
  /** Raw headers belonging to this payer/plan. */
  columns: readonly string[];
}

export interface LayoutClassification {
  layout: TabularLayout;
  payerGroups: readonly PayerGroup[];
}

const TALL_INDICATORS: readonly CanonicalField[] = [...CHARGE_FIELDS, 'billing_code', 'payer_name', 'plan_name'];

export function findPayerGroups(columns: readonly ColumnMapping[]): PayerGroup[] {
  const groups = new Map<string, { payer: string; plan: string | null; columns: string[] }>();

  for (const column of columns) {
    if (!column.field || !PAYER_SPECIFIC_FIELDS.includes(column.field)) continue;
    if (column.qualifiers.length === 0) continue;

    const [payer, plan = null] = column.qualifiers;
    const key = [payer, plan ?? ''].map((part) => part.toLowerCase()).join('|');
    const group = groups.get(key);
    if (group) {
      group.columns.push(column.raw);
    } else {
      groups.set(key, { payer, plan, columns: [column.raw] });
    }
  }

  return [...groups].map(([key, group]) => ({ key, ...group }));
}

/**
 * Wide needs at least two distinct payer/plan column groups; a single group is
 * ambiguous and reads as tall. Files with no charge, code or payer column are generic.
 */
export function classifyLayout(columns: readonly ColumnMapping[]): LayoutClassification {
  const payerGroups = findPayerGroups(columns);
  if (payerGroups.length >= 2) {
    return { layout: 'wide', payerGroups };
  }

  const mapped = new Set(columns.map((c) => c.field));
  const tall = TALL_INDICATORS.some((field) => mapped.has(field));
  return { layout: tall ? 'tall' : 'generic', payerGroups };
}
