import { METADATA_FIELDS } from './canonical-fields.js';
import { mapHeader, mapMetadataLabel } from './column-mapper.js';

export interface Preamble {
  /** Whether the file carried the label/value rows before its header row. */
  present: boolean;
  /** Row-1 label → row-2 value, as written; pairs with an empty side are dropped. */
  labels: Readonly<Record<string, string>>;
  /** Canonical metadata field → value, for labels the mapper recognises. */
  fields: Readonly<Record<string, string>>;
}

export const EMPTY_PREAMBLE: Preamble = Object.freeze({
  present: false,
  labels: Object.freeze({}),
  fields: Object.freeze({}),
});

/**
 * A first row with at least two data columns and fewer than two metadata labels
 * is the header row itself: the file has no preamble.
 */
export function isHeaderRow(row: readonly string[]): boolean {
  let labelHits = 0;
  let dataHits = 0;
  for (const cell of row) {
    if (mapMetadataLabel(cell).field) labelHits++;
    const field = mapHeader(cell).field;
    if (field && !METADATA_FIELDS.includes(field)) dataHits++;
  }
  return dataHits >= 2 && labelHits < 2;
}

export function parsePreamble(labelRow: readonly string[], valueRow: readonly string[]): Preamble {
  const labels: Record<string, string> = {};
  const fields: Record<string, string> = {};

  labelRow.forEach((rawLabel, i) => {
    const label = rawLabel.trim();
    const value = (valueRow[i] ?? '').trim();
    if (!label || !value || Object.hasOwn(labels, label)) return;
    labels[label] = value;

    const field = mapMetadataLabel(label).field;
    if (field && !Object.hasOwn(fields, field)) fields[field] = value;
  });

  return Object.freeze({ present: true, labels: Object.freeze(labels), fields: Object.freeze(fields) });
}
