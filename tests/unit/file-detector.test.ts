import { describe, it, expect } from 'vitest';
import { detectFileType } from '../../src/core/file-detector.js';
import { bytes } from '../helpers/fixtures.js';

describe('detectFileType', () => {
  it('detects a JSON object by content', () => {
    expect(detectFileType(bytes('  \n{"a": 1}'), 'upload.bin')).toEqual({
      kind: 'structured',
      delimiter: null,
      basis: 'content',
    });
  });

  it('detects a JSON array after a UTF-8 BOM', () => {
    expect(detectFileType(bytes('\uFEFF[1, 2]')).kind).toBe('structured');
  });

  it('detects comma-separated text', () => {
    expect(detectFileType(bytes('a,b,c\n1,2,3\n'))).toEqual({
      kind: 'tabular',
      delimiter: ',',
      basis: 'content',
    });
  });

  it('detects tab-separated text', () => {
    expect(detectFileType(bytes('a\tb\n1\t2\n')).delimiter).toBe('\t');
  });

  it('takes whichever delimiter comes first on the line', () => {
    expect(detectFileType(bytes('a\tb,c\n')).delimiter).toBe('\t');
  });

  it('ignores delimiters after the first line', () => {
    expect(detectFileType(bytes('single\nx,y\n'))).toEqual({ kind: 'unknown', delimiter: null, basis: 'none' });
  });

  it('falls back to the extension when content is inconclusive', () => {
    expect(detectFileType(bytes('<xml/>'), 'prices.json')).toEqual({
      kind: 'structured',
      delimiter: null,
      basis: 'extension',
    });
    expect(detectFileType(bytes('single'), 'PRICES.TSV')).toEqual({
      kind: 'tabular',
      delimiter: '\t',
      basis: 'extension',
    });
  });

  it('reports unknown for empty input without a known extension', () => {
    expect(detectFileType(new Uint8Array(0), 'prices.xml').kind).toBe('unknown');
    expect(detectFileType(new Uint8Array(0)).kind).toBe('unknown');
  });
});
