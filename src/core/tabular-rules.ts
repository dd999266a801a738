import { CHARGE_FIELDS, DOLLAR_FIELDS, ENTITY_FIELDS, PAYER_SPECIFIC_FIELDS } from './canonical-fields.js';
import type { CanonicalField } from './canonical-fields.js';
import { createFinding, formatList } from './findings.js';
import { normalizeHeader } from './header-text.js';
import type { TabularLayout } from './layout-classifier.js';
import { cellValue, hasValue } from './rule-evaluator.js';
import type { RowSummary, TabularContext, TabularRule } from './rule-evaluator.js';
import type { Finding } from '../types/validation.js';

export const REQUIRED_CHARGE_FIELDS: Readonly<Record<TabularLayout, readonly CanonicalField[]>> = {
  tall: ['gross_charge', 'discounted_cash_charge', 'negotiated_dollar', 'min_charge', 'max_charge', 'methodology'],
  wide: ['gross_charge', 'discounted_cash_charge', 'negotiated_dollar', 'min_charge', 'max_charge', 'methodology'],
  generic: ['gross_charge', 'discounted_cash_charge'],
};

export const ITEM_FIELDS: readonly CanonicalField[] = ['description', 'setting'];
export const CODING_FIELDS: readonly CanonicalField[] = ['billing_code', 'billing_code_type', 'modifiers'];

function isMapped(ctx: TabularContext, field: CanonicalField): boolean {
  return ctx.fieldColumns.has(field);
}

/** Report every unmapped field of `required` in one finding. */
function missingFieldsFinding(
  ctx: TabularContext,
  rule: string,
  what: string,
  required: readonly CanonicalField[],
  isPresent: (field: CanonicalField) => boolean = (field) => isMapped(ctx, field),
): Finding | null {
  const missing = required.filter((field) => !isPresent(field));
  if (missing.length === 0) return null;

  const found = required.filter(isPresent);
  return createFinding({
    severity: 'error',
    rule,
    message: `Missing ${what}: ${formatList(missing)}`,
    expected: formatList(required),
    actual: found.length > 0 ? formatList(found) : '(none)',
    field: formatList(missing),
  });
}

function rowSummary(
  rule: string,
  message: string,
  expected: string,
  field: string | null,
  severity: 'error' | 'warning' = 'error',
) {
  return (summary: RowSummary): Finding =>
    createFinding({
      severity,
      rule,
      message: `${message} (${summary.count} of ${summary.scanned} rows)`,
      expected,
      actual: `${summary.firstViolation} (first at data row ${summary.firstRow})`,
      field,
      count: summary.count,
    });
}

function labelKey(label: string): string {
  return normalizeHeader(label).split('|')[0];
}

const metadataLabels: TabularRule = {
  code: 'metadata.labels',
  checkHeaders(ctx) {
    const present = new Set(Object.keys(ctx.preamble.labels).map(labelKey));
    const { strict, accepted, informal, informalSeverity } = ctx.metadataLabels;
    const complete = (labels: readonly string[]) => labels.every((label) => present.has(label));

    if (complete(strict) || accepted.some((set) => complete(set.labels))) return null;

    const alternate = informal.find((set) => complete(set.labels));
    if (alternate) {
      return createFinding({
        severity: informalSeverity,
        rule: 'metadata.labels',
        message: `Preamble uses the informal "${alternate.name}" labels; use the canonical labels instead`,
        expected: formatList(strict),
        actual: formatList(alternate.labels),
      });
    }

    return createFinding({
      severity: 'error',
      rule: 'metadata.labels',
      message: ctx.preamble.present
        ? 'Preamble does not carry the required metadata labels'
        : 'File has no metadata preamble before its header row',
      expected: formatList(strict),
      actual: present.size > 0 ? formatList([...present]) : '(none)',
    });
  },
};

const entityIdentity: TabularRule = {
  code: 'entity.identity',
  checkHeaders(ctx) {
    return missingFieldsFinding(
      ctx,
      'entity.identity',
      'hospital identity fields',
      ENTITY_FIELDS,
      (field) => Object.hasOwn(ctx.preamble.fields, field) || isMapped(ctx, field),
    );
  },
};

const requiredChargeFields: TabularRule = {
  code: 'charges.required_fields',
  checkHeaders(ctx) {
    return missingFieldsFinding(
      ctx,
      'charges.required_fields',
      'required charge columns',
      REQUIRED_CHARGE_FIELDS[ctx.layout],
    );
  },
};

const itemFields: TabularRule = {
  code: 'item.fields',
  checkHeaders(ctx) {
    return missingFieldsFinding(ctx, 'item.fields', 'item/service columns', ITEM_FIELDS);
  },
};

const descriptionBlank: TabularRule = {
  code: 'item.description.blank',
  rowCheck(ctx) {
    const columns = ctx.fieldColumns.get('description');
    if (!columns) return null;
    return {
      inspect: (row) => (hasValue(row, columns) ? null : 'blank description'),
      summarize: rowSummary(
        'item.description.blank',
        'Rows without an item description',
        'a non-empty description',
        'description',
      ),
    };
  },
};

/** Cells of `field` must hold one of the registry's allowed values; blanks are left to other rules. */
function allowedValuesRule(code: string, field: CanonicalField, what: string): TabularRule {
  return {
    code,
    rowCheck(ctx) {
      const columns = ctx.fieldColumns.get(field);
      const allowed = ctx.valueSets[field];
      if (!columns || !allowed) return null;
      const accepted = new Set(allowed.map((value) => value.toUpperCase()));
      return {
        inspect(row) {
          for (const i of columns) {
            const value = cellValue(row, i);
            if (value !== '' && !accepted.has(value.toUpperCase())) {
              return `"${value}" in ${ctx.columns[i].raw}`;
            }
          }
          return null;
        },
        summarize: rowSummary(code, `Rows with an unrecognised ${what}`, `one of ${formatList(allowed)}`, field),
      };
    },
  };
}

const settingValues = allowedValuesRule('item.setting.enum', 'setting', 'setting');

const codingFields: TabularRule = {
  code: 'coding.fields',
  checkHeaders(ctx) {
    return missingFieldsFinding(ctx, 'coding.fields', 'coding columns', CODING_FIELDS);
  },
};

const codingPresent: TabularRule = {
  code: 'coding.present',
  rowCheck(ctx) {
    const codes = ctx.fieldColumns.get('billing_code');
    const types = ctx.fieldColumns.get('billing_code_type');
    if (!codes || !types) return null;
    return {
      inspect(row) {
        const code = hasValue(row, codes);
        const type = hasValue(row, types);
        if (code && type) return null;
        if (!code && !type) return 'blank code and code type';
        return code ? 'blank code type' : 'blank code';
      },
      summarize: rowSummary(
        'coding.present',
        'Rows without a billing code and code type',
        'billing_code and billing_code_type on every row',
        'billing_code, billing_code_type',
      ),
    };
  },
};

const codeTypeValues = allowedValuesRule('coding.type.enum', 'billing_code_type', 'billing code type');

const genericLayout: TabularRule = {
  code: 'layout.generic',
  layouts: ['generic'],
  checkHeaders() {
    return createFinding({
      severity: 'warning',
      rule: 'layout.generic',
      message: 'Could not classify the layout as tall or wide; evaluated under the generic profile',
      expected: 'tall (payer_name/plan_name columns) or wide (payer|plan column groups)',
      actual: 'no charge, code or payer columns recognised',
    });
  },
};

const tallPayerPlan: TabularRule = {
  code: 'layout.tall.payer_plan',
  layouts: ['tall'],
  checkHeaders(ctx) {
    // a single payer-specific column group already names its payer and plan
    if (ctx.payerGroups.length > 0) return null;
    return missingFieldsFinding(ctx, 'layout.tall.payer_plan', 'tall-layout payer columns', [
      'payer_name',
      'plan_name',
    ]);
  },
};

const tallChargePerRow: TabularRule = {
  code: 'layout.tall.charge_per_row',
  layouts: ['tall'],
  rowCheck(ctx) {
    const columns = CHARGE_FIELDS.flatMap((field) => ctx.fieldColumns.get(field) ?? []);
    if (columns.length === 0) return null;
    return {
      inspect: (row) => (hasValue(row, columns) ? null : 'no charge value'),
      summarize: rowSummary(
        'layout.tall.charge_per_row',
        'Rows without any standard charge',
        `one of ${formatList(CHARGE_FIELDS)} on every row`,
        null,
      ),
    };
  },
};

const widePayerPlan: TabularRule = {
  code: 'layout.wide.payer_plan',
  layouts: ['wide'],
  checkHeaders(ctx) {
    const incomplete = ctx.columns.filter(
      (column) =>
        column.field !== null &&
        PAYER_SPECIFIC_FIELDS.includes(column.field) &&
        column.qualifiers.length === 1,
    );
    if (incomplete.length === 0) return null;

    const headers = incomplete.map((column) => column.raw);
    return createFinding({
      severity: 'error',
      rule: 'layout.wide.payer_plan',
      message: `Payer-specific columns must name both payer and plan: ${formatList(headers)}`,
      expected: 'standard_charge|<payer>|<plan>|<type>',
      actual: formatList(headers),
      field: formatList(headers),
    });
  },
};

const drugMeasurementPair: TabularRule = {
  code: 'pairs.drug_measurement',
  checkHeaders(ctx) {
    const unit = isMapped(ctx, 'drug_unit_of_measurement');
    const type = isMapped(ctx, 'drug_type_of_measurement');
    if (unit === type) return null;

    return createFinding({
      severity: 'error',
      rule: 'pairs.drug_measurement',
      message: 'drug_unit_of_measurement and drug_type_of_measurement must appear together',
      expected: 'drug_unit_of_measurement, drug_type_of_measurement',
      actual: unit ? 'drug_unit_of_measurement' : 'drug_type_of_measurement',
      field: 'drug_unit_of_measurement, drug_type_of_measurement',
    });
  },
};

const drugMeasurementRows: TabularRule = {
  code: 'pairs.drug_measurement.rows',
  rowCheck(ctx) {
    const units = ctx.fieldColumns.get('drug_unit_of_measurement');
    const types = ctx.fieldColumns.get('drug_type_of_measurement');
    if (!units || !types) return null;
    return {
      inspect(row) {
        const unit = hasValue(row, units);
        const type = hasValue(row, types);
        if (unit === type) return null;
        return unit ? 'unit without type' : 'type without unit';
      },
      summarize: rowSummary(
        'pairs.drug_measurement.rows',
        'Rows with only one of drug unit and drug type of measurement',
        'both filled or both blank',
        'drug_unit_of_measurement, drug_type_of_measurement',
      ),
    };
  },
};

const estimatedAmount: TabularRule = {
  code: 'charges.estimated_amount',
  layouts: ['tall'],
  rowCheck(ctx) {
    const estimated = ctx.fieldColumns.get('estimated_amount');
    const triggers = [
      ...(ctx.fieldColumns.get('negotiated_percentage') ?? []),
      ...(ctx.fieldColumns.get('negotiated_algorithm') ?? []),
    ];
    if (!estimated || triggers.length === 0) return null;
    return {
      inspect: (row) =>
        hasValue(row, triggers) && !hasValue(row, estimated)
          ? 'percentage or algorithm without estimated amount'
          : null,
      summarize: rowSummary(
        'charges.estimated_amount',
        'Rows with a negotiated percentage or algorithm but no estimated amount',
        'estimated_amount when a percentage or algorithm is given',
        'estimated_amount',
        'warning',
      ),
    };
  },
};

const AMOUNT_PATTERN = /^(\d+(\.\d+)?|\.\d+)$/;

export function isDollarAmount(value: string): boolean {
  return AMOUNT_PATTERN.test(value.replace(/[$,\s]/g, ''));
}

const numericCharges: TabularRule = {
  code: 'charges.numeric',
  rowCheck(ctx) {
    const columns = DOLLAR_FIELDS.flatMap((field) => ctx.fieldColumns.get(field) ?? []);
    if (columns.length === 0) return null;
    return {
      inspect(row) {
        for (const i of columns) {
          const value = cellValue(row, i);
          if (value !== '' && !isDollarAmount(value)) {
            return `"${value}" in ${ctx.columns[i].raw}`;
          }
        }
        return null;
      },
      summarize: rowSummary(
        'charges.numeric',
        'Rows with a dollar charge that is not a non-negative number',
        'non-negative dollar amount',
        null,
      ),
    };
  },
};

function amountOf(value: string): number | null {
  return value !== '' && isDollarAmount(value) ? Number(value.replace(/[$,\s]/g, '')) : null;
}

const cashWithinGross: TabularRule = {
  code: 'charges.cash_leq_gross',
  rowCheck(ctx) {
    const [gross] = ctx.fieldColumns.get('gross_charge') ?? [];
    const [cash] = ctx.fieldColumns.get('discounted_cash_charge') ?? [];
    if (gross === undefined || cash === undefined) return null;
    return {
      inspect(row) {
        const grossValue = cellValue(row, gross);
        const cashValue = cellValue(row, cash);
        const grossAmount = amountOf(grossValue);
        const cashAmount = amountOf(cashValue);
        if (grossAmount === null || cashAmount === null || cashAmount <= grossAmount) return null;
        return `cash "${cashValue}" above gross "${grossValue}"`;
      },
      summarize: rowSummary(
        'charges.cash_leq_gross',
        'Rows whose discounted cash price exceeds the gross charge',
        'discounted_cash_charge <= gross_charge',
        'discounted_cash_charge, gross_charge',
      ),
    };
  },
};

const unmappedColumns: TabularRule = {
  code: 'columns.unmapped',
  checkHeaders(ctx) {
    const unmapped = ctx.columns
      .filter((column) => column.method === 'none' && column.raw.trim() !== '')
      .map((column) => column.raw);
    if (unmapped.length === 0) return null;

    return createFinding({
      severity: 'info',
      rule: 'columns.unmapped',
      message: `${unmapped.length} column(s) present but not mapped to a canonical field`,
      expected: null,
      actual: formatList(unmapped),
      field: formatList(unmapped),
    });
  },
};

/** Registration order is the order findings are reported in. */
export const TABULAR_RULES: readonly TabularRule[] = Object.freeze([
  metadataLabels,
  entityIdentity,
  requiredChargeFields,
  itemFields,
  descriptionBlank,
  settingValues,
  codingFields,
  codingPresent,
  codeTypeValues,
  genericLayout,
  tallPayerPlan,
  tallChargePerRow,
  widePayerPlan,
  drugMeasurementPair,
  drugMeasurementRows,
  estimatedAmount,
  numericCharges,
  cashWithinGross,
  unmappedColumns,
]);
