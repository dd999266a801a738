import { TextDecoder } from 'node:util';

export class FatalParseError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FatalParseError';
  }
}

/** Strict UTF-8: an invalid byte sequence aborts validation. The BOM is dropped. */
export function createStrictDecoder(): TextDecoder {
  return new TextDecoder('utf-8', { fatal: true });
}

export function decodeText(bytes: Uint8Array): string {
  try {
    return createStrictDecoder().decode(bytes);
  } catch (err) {
    throw new FatalParseError('Input is not valid UTF-8', err);
  }
}

export function parseStructured(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? `: ${err.message}` : '';
    throw new FatalParseError(`Input is not valid JSON${detail}`, err);
  }
}
