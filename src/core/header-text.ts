/** Lowercase, trim, collapse whitespace and trim around pipe separators. */
export function normalizeHeader(raw: string): string {
  return splitSegments(raw).join('|');
}

export function splitSegments(raw: string): string[] {
  return raw
    .replace(/^\uFEFF/, '')
    .toLowerCase()
    .split('|')
    .map((segment) => segment.replace(/\s+/g, ' ').trim());
}

export function tokenize(segment: string): string[] {
  return segment
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

export function isNumericToken(token: string): boolean {
  return /^\d+$/.test(token);
}
