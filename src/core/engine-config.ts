import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import JSON5 from 'json5';
import { isStructuredVariant } from '@mrfcheck/schema';
import type { StructuredVariant } from '@mrfcheck/schema';
import { RULE_TABLES, parseMetadataLabelPolicy } from './rule-tables.js';
import type { MetadataLabelPolicy } from './rule-tables.js';
import { deepFreeze } from '../utils/freeze.js';

export interface EngineConfig {
  /** Upper bound on data rows fed to row rules; null scans every row. */
  readonly maxSampledRows: number | null;
  /** Violating data row numbers kept per row rule, in `failing_rows`. */
  readonly maxFailingRowsPerRule: number;
  readonly metadataLabels: MetadataLabelPolicy;
  /** Validate structured documents against this variant instead of detecting one. */
  readonly schemaOverride: StructuredVariant | null;
}

export interface EngineConfigInput {
  maxSampledRows?: number | string | null;
  maxFailingRowsPerRule?: number | string;
  metadataLabels?: unknown;
  schemaOverride?: string | null;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = deepFreeze({
  maxSampledRows: null,
  maxFailingRowsPerRule: 5,
  metadataLabels: RULE_TABLES.metadataLabels,
  schemaOverride: null,
});

export const ENV_MAX_ROWS = 'MRFCHECK_MAX_ROWS';
export const ENV_SCHEMA = 'MRFCHECK_SCHEMA';
export const ENV_MAX_FAILING_ROWS = 'MRFCHECK_MAX_FAILING_ROWS';
export const DEFAULT_CONFIG_FILE = 'mrfcheck.json5';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseMaxRows(value: number | string | null): number | null {
  if (value === null || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`maxSampledRows must be a positive integer, got "${value}"`);
  }
  return n;
}

function parseFailingRows(value: number | string): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`maxFailingRowsPerRule must be a non-negative integer, got "${value}"`);
  }
  return n;
}

function parseSchemaOverride(value: string | null): StructuredVariant | null {
  if (value === null || value === '') return null;
  if (!isStructuredVariant(value)) {
    throw new ConfigError(
      `Unknown schema "${value}" (expected negotiated-rates, allowed-amounts or provider-reference)`,
    );
  }
  return value;
}

/** Apply `layers` over the defaults, later layers winning. */
export function defineEngineConfig(...layers: EngineConfigInput[]): EngineConfig {
  let config: EngineConfig = DEFAULT_ENGINE_CONFIG;
  for (const layer of layers) {
    let metadataLabels = config.metadataLabels;
    if (layer.metadataLabels !== undefined) {
      try {
        metadataLabels = parseMetadataLabelPolicy(layer.metadataLabels);
      } catch (err) {
        throw new ConfigError(`Invalid metadataLabels: ${err instanceof Error ? err.message : String(err)}`, err);
      }
    }
    config = {
      maxSampledRows:
        layer.maxSampledRows !== undefined ? parseMaxRows(layer.maxSampledRows) : config.maxSampledRows,
      maxFailingRowsPerRule:
        layer.maxFailingRowsPerRule !== undefined
          ? parseFailingRows(layer.maxFailingRowsPerRule)
          : config.maxFailingRowsPerRule,
      metadataLabels,
      schemaOverride:
        layer.schemaOverride !== undefined ? parseSchemaOverride(layer.schemaOverride) : config.schemaOverride,
    };
  }
  return deepFreeze(config);
}

function fromConfigFile(data: unknown, path: string): EngineConfigInput {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError(`Config file must hold an object: ${path}`);
  }
  const input: EngineConfigInput = {};
  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'maxSampledRows':
        if (value !== null && typeof value !== 'number') {
          throw new ConfigError(`maxSampledRows must be a number in ${path}`);
        }
        input.maxSampledRows = value;
        break;
      case 'maxFailingRowsPerRule':
        if (typeof value !== 'number') {
          throw new ConfigError(`maxFailingRowsPerRule must be a number in ${path}`);
        }
        input.maxFailingRowsPerRule = value;
        break;
      case 'schema':
      case 'schemaOverride':
        if (value !== null && typeof value !== 'string') {
          throw new ConfigError(`${key} must be a string in ${path}`);
        }
        input.schemaOverride = value;
        break;
      case 'metadataLabels':
        input.metadataLabels = value;
        break;
      default:
        throw new ConfigError(`Unknown config key "${key}" in ${path}`);
    }
  }
  return input;
}

function fromEnv(vars: Record<string, string | undefined>): EngineConfigInput {
  const input: EngineConfigInput = {};
  if (vars[ENV_MAX_ROWS] !== undefined) input.maxSampledRows = vars[ENV_MAX_ROWS];
  if (vars[ENV_MAX_FAILING_ROWS] !== undefined) input.maxFailingRowsPerRule = vars[ENV_MAX_FAILING_ROWS];
  if (vars[ENV_SCHEMA] !== undefined) input.schemaOverride = vars[ENV_SCHEMA];
  return input;
}

export interface ResolveConfigOptions {
  cwd?: string;
  /** Explicit config file; a missing explicit file is an error. */
  configPath?: string;
  /** Skip the .env file. */
  noEnv?: boolean;
  /** Environment snapshot. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** CLI flags, highest precedence. */
  overrides?: EngineConfigInput;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readConfigFile(path: string, required: boolean): Promise<EngineConfigInput> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (!required && isMissingFile(err)) return {};
    throw new ConfigError(`Cannot read config file: ${path}`, err);
  }

  let data: unknown;
  try {
    data = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON5 in config file: ${path}`, err);
  }
  return fromConfigFile(data, path);
}

/** Precedence: CLI > config file > .env > environment > defaults. */
export async function resolveEngineConfig(options: ResolveConfigOptions = {}): Promise<EngineConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let envFileVars: Record<string, string> = {};
  if (!options.noEnv) {
    try {
      envFileVars = parseDotenv(await readFile(join(cwd, '.env'), 'utf-8'));
    } catch (err) {
      if (!isMissingFile(err)) throw new ConfigError(`Cannot read ${join(cwd, '.env')}`, err);
    }
  }

  const fileInput = options.configPath
    ? await readConfigFile(resolve(cwd, options.configPath), true)
    : await readConfigFile(join(cwd, DEFAULT_CONFIG_FILE), false);

  return defineEngineConfig(fromEnv(env), fromEnv(envFileVars), fileInput, options.overrides ?? {});
}
