import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import ora from 'ora';
import { ConfigError, resolveEngineConfig } from '../core/engine-config.js';
import type { EngineConfigInput } from '../core/engine-config.js';
import { validateFile } from '../core/engine.js';
import { FatalParseError } from '../core/input-decoder.js';
import { isReportFormat, renderReport } from '../core/reporter.js';
import { icons } from '../utils/output.js';

export interface ValidateOptions {
  format?: string;
  out?: string;
  schema?: string;
  maxRows?: string;
  config?: string;
  noEnv?: boolean;
  /** Directory config and .env are resolved against. Defaults to process.cwd(). */
  cwd?: string;
}

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FATAL = 2;

function isFsError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/** Run one validation and print the report. Resolves to the process exit code. */
export async function runValidate(path: string, options: ValidateOptions = {}): Promise<number> {
  const format = options.format ?? 'human';
  if (!isReportFormat(format)) {
    console.error(`${icons.error} Unknown format "${format}" (expected human, json or csv)`);
    return EXIT_FATAL;
  }

  const cwd = options.cwd ?? process.cwd();
  const filePath = resolve(cwd, path);
  const spinner = format === 'human' ? ora({ text: `Validating ${path}...`, stream: process.stderr }).start() : null;

  try {
    const overrides: EngineConfigInput = {};
    if (options.maxRows !== undefined) overrides.maxSampledRows = options.maxRows;
    if (options.schema !== undefined) overrides.schemaOverride = options.schema;

    const config = await resolveEngineConfig({
      cwd,
      configPath: options.config,
      noEnv: options.noEnv,
      overrides,
    });

    const result = await validateFile(filePath, config);
    spinner?.stop();

    const report = renderReport(result, format, path);
    if (options.out) {
      await writeFile(resolve(cwd, options.out), report.endsWith('\n') ? report : `${report}\n`, 'utf-8');
      console.error(`${icons.info} Report written to ${options.out}`);
    } else {
      console.log(report);
    }
    return result.ok ? EXIT_OK : EXIT_FINDINGS;
  } catch (err) {
    spinner?.stop();
    if (err instanceof FatalParseError || err instanceof ConfigError) {
      console.error(`${icons.error} ${err.message}`);
      return EXIT_FATAL;
    }
    if (isFsError(err)) {
      console.error(`${icons.error} ${err.code}: ${err.path ?? path}`);
      return EXIT_FATAL;
    }
    throw err;
  }
}
