import { extname } from 'node:path';

export type DetectedKind = 'tabular' | 'structured' | 'unknown';
export type Delimiter = ',' | '\t';

export interface Detection {
  kind: DetectedKind;
  /** Set for tabular input. */
  delimiter: Delimiter | null;
  /** What decided the outcome. */
  basis: 'content' | 'extension' | 'none';
}

export const SNIFF_BYTES = 4096;

const BOM = [0xef, 0xbb, 0xbf];
const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d]);
const OPEN_BRACE = 0x7b;
const OPEN_BRACKET = 0x5b;
const COMMA = 0x2c;
const TAB = 0x09;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

const EXTENSIONS: Readonly<Record<string, { kind: DetectedKind; delimiter: Delimiter | null }>> = {
  '.json': { kind: 'structured', delimiter: null },
  '.csv': { kind: 'tabular', delimiter: ',' },
  '.txt': { kind: 'tabular', delimiter: ',' },
  '.tsv': { kind: 'tabular', delimiter: '\t' },
};

function skipPrefix(bytes: Uint8Array): number {
  let i = 0;
  if (BOM.every((b, j) => bytes[j] === b)) i = BOM.length;
  while (i < bytes.length && WHITESPACE.has(bytes[i])) i++;
  return i;
}

/** Comma or tab on the first line, whichever comes first. */
function firstLineDelimiter(bytes: Uint8Array, start: number): Delimiter | null {
  for (let i = start; i < bytes.length; i++) {
    const b = bytes[i];
    if (b === NEWLINE || b === CARRIAGE_RETURN) return null;
    if (b === COMMA) return ',';
    if (b === TAB) return '\t';
  }
  return null;
}

/**
 * Classify input from its first bytes, falling back to the filename extension
 * when the content is inconclusive.
 */
export function detectFileType(head: Uint8Array, filename?: string): Detection {
  const sample = head.subarray(0, SNIFF_BYTES);
  const start = skipPrefix(sample);

  if (start < sample.length) {
    const first = sample[start];
    if (first === OPEN_BRACE || first === OPEN_BRACKET) {
      return { kind: 'structured', delimiter: null, basis: 'content' };
    }
    const delimiter = firstLineDelimiter(sample, start);
    if (delimiter) {
      return { kind: 'tabular', delimiter, basis: 'content' };
    }
  }

  const byExtension = filename ? EXTENSIONS[extname(filename).toLowerCase()] : undefined;
  if (byExtension) {
    return { ...byExtension, basis: 'extension' };
  }
  return { kind: 'unknown', delimiter: null, basis: 'none' };
}
