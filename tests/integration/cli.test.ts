import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildProgram } from '../../src/index.js';

vi.mock('../../src/commands/validate.js', () => ({
  runValidate: vi.fn(async () => 1),
}));

import { runValidate } from '../../src/commands/validate.js';

describe('mrfcheck program', () => {
  beforeEach(() => {
    vi.mocked(runValidate).mockClear();
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('maps validate flags to runValidate options', async () => {
    const program = buildProgram();
    program.exitOverride();
    await program.parseAsync([
      'node',
      'mrfcheck',
      'validate',
      'prices.csv',
      '--format',
      'csv',
      '--out',
      'report.csv',
      '--schema',
      'allowed-amounts',
      '--max-rows',
      '50',
      '--config',
      'ci.json5',
      '--no-env',
    ]);

    expect(runValidate).toHaveBeenCalledOnce();
    const [path, opts] = vi.mocked(runValidate).mock.calls[0];
    expect(path).toBe('prices.csv');
    expect(opts).toMatchObject({
      format: 'csv',
      out: 'report.csv',
      schema: 'allowed-amounts',
      maxRows: '50',
      config: 'ci.json5',
      noEnv: true,
    });
    expect(process.exitCode).toBe(1);
  });

  it('defaults to the human format and loads .env', async () => {
    const program = buildProgram();
    program.exitOverride();
    await program.parseAsync(['node', 'mrfcheck', 'validate', 'prices.csv']);

    const opts = vi.mocked(runValidate).mock.calls[0][1];
    expect(opts?.format).toBe('human');
    expect(opts?.noEnv).toBe(false);
  });
});
