import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import { DEFAULT_ENGINE_CONFIG } from './engine-config.js';
import type { EngineConfig } from './engine-config.js';
import { SNIFF_BYTES, detectFileType } from './file-detector.js';
import { decodeText, parseStructured } from './input-decoder.js';
import { unknownTypeResult } from './result.js';
import { validateStructuredDocument } from './structured-validator.js';
import { validateTabularStream, validateTabularText } from './tabular-validator.js';
import type { ValidationResult } from '../types/validation.js';

/**
 * Validate an in-memory file. Pure and synchronous; throws FatalParseError when
 * the bytes are not UTF-8 or a structured file is not JSON.
 */
export function validateBuffer(
  bytes: Uint8Array,
  filename?: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): ValidationResult {
  const detection = detectFileType(bytes, filename);
  switch (detection.kind) {
    case 'unknown':
      return unknownTypeResult(filename);
    case 'structured':
      return validateStructuredDocument(parseStructured(decodeText(bytes)), config);
    case 'tabular':
      return validateTabularText(decodeText(bytes), detection.delimiter ?? ',', config);
  }
}

interface SniffedSource {
  head: Uint8Array;
  /** Every byte of the source, the buffered head included. */
  bytes: AsyncGenerator<Uint8Array>;
  /** Release the source without reading the rest of it. */
  discard(): Promise<void>;
}

/** Buffer at least SNIFF_BYTES (or the whole source, if shorter) for detection. */
async function sniff(source: AsyncIterable<Uint8Array>): Promise<SniffedSource> {
  const iterator = source[Symbol.asyncIterator]();
  const buffered: Uint8Array[] = [];
  let size = 0;
  let exhausted = false;
  while (size < SNIFF_BYTES) {
    const next = await iterator.next();
    if (next.done) {
      exhausted = true;
      break;
    }
    buffered.push(next.value);
    size += next.value.length;
  }

  async function* bytes(): AsyncGenerator<Uint8Array> {
    try {
      yield* buffered;
      while (!exhausted) {
        const next = await iterator.next();
        if (next.done) exhausted = true;
        else yield next.value;
      }
    } finally {
      if (!exhausted) await iterator.return?.();
    }
  }

  return {
    head: Buffer.concat(buffered),
    bytes: bytes(),
    discard: async () => {
      if (!exhausted) await iterator.return?.();
    },
  };
}

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  for await (const chunk of chunks) parts.push(chunk);
  return Buffer.concat(parts);
}

/**
 * Validate a byte stream. Detection reads the first SNIFF_BYTES; tabular input
 * is then parsed row by row as it arrives, structured input is read whole.
 */
export async function validateStream(
  source: AsyncIterable<Uint8Array>,
  filename?: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): Promise<ValidationResult> {
  const sniffed = await sniff(source);
  const detection = detectFileType(sniffed.head, filename);
  switch (detection.kind) {
    case 'unknown':
      await sniffed.discard();
      return unknownTypeResult(filename);
    case 'structured':
      return validateStructuredDocument(parseStructured(decodeText(await collect(sniffed.bytes))), config);
    case 'tabular':
      return validateTabularStream(sniffed.bytes, detection.delimiter ?? ',', config);
  }
}

/** Validate a file on disk, streaming tabular input row by row. */
export function validateFile(path: string, config: EngineConfig = DEFAULT_ENGINE_CONFIG): Promise<ValidationResult> {
  return validateStream(createReadStream(path), basename(path), config);
}
