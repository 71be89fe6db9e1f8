/**
 * @fileoverview End-to-end tests for the CLI workflow against fixture files.
 * @module tests/cli/run.test
 */
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { USAGE } from '@/cli/args.js';
import { runCli } from '@/cli/run.js';
import type { AppConfig } from '@/config/index.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const appConfig: AppConfig = {
  environment: 'test',
  logLevel: 'silent',
  systemhcMinProbability: 0.99,
  includeIedbQualitative: true,
};

const EXPECTED_CSV = [
  'allele,peptide,measurement_value,measurement_inequality,measurement_type,measurement_source,original_allele',
  'HLA-A*02:01,KLVALGINAV,100.0,<,qualitative,Sidney - purified MHC/direct/fluorescence,HLA-A*02:01',
  'HLA-A*02:01,LLFGYPVYV,30.0,=,quantitative,Sidney - purified MHC/competitive/radioactivity,HLA-A*02:01',
  'HLA-A*02:01,SLLMWITQC,12.3,=,quantitative,kim2014,HLA-A*02:01',
  'HLA-A*02:01,SLLMWITQC,500.0,<,qualitative,abelin-mass-spec,HLA-A*02:01',
  'HLA-B*07:02,RPPIFIRRL,500.0,<,qualitative,systemhc-atlas,HLA-B*07:02',
  '',
].join('\n');

const captureStderr = () =>
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

describe('runCli', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mhc-curate-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('curates every source into one CSV and a JSON report', async () => {
    const outCsv = join(dir, 'curated.csv');
    const reportJson = join(dir, 'report.json');
    const stderr = captureStderr();

    const code = await runCli(
      [
        '--data-abelin-mass-spec',
        fixture('abelin.csv'),
        '--data-kim2014',
        fixture('kim2014.txt'),
        '--data-iedb',
        fixture('iedb.csv'),
        '--data-systemhc-atlas',
        fixture('systemhc-atlas.csv'),
        '--out-csv',
        outCsv,
        '--report-json',
        reportJson,
      ],
      appConfig,
    );

    expect(code).toBe(0);
    expect(stderr).not.toHaveBeenCalled();
    expect(await readFile(outCsv, 'utf8')).toBe(EXPECTED_CSV);

    const report: unknown = JSON.parse(await readFile(reportJson, 'utf8'));
    expect(report).toMatchObject({
      merge: {
        suppressedByPrecedence: 1,
        combined: 6,
        duplicatesRemoved: 1,
        droppedIncomplete: 0,
        droppedNonCanonicalPeptide: 0,
        final: 5,
      },
      outputRows: 5,
    });
  });

  it('prints usage for --help without writing anything', async () => {
    const stdout = vi
      .spyOn(process.stdout, 'write')
      .mockImplementation(() => true);

    expect(await runCli(['--help'], appConfig)).toBe(0);
    expect(stdout).toHaveBeenCalledWith(USAGE);
  });

  it('exits with 1 and writes no output when an input is missing', async () => {
    const outCsv = join(dir, 'curated.csv');
    const missing = join(dir, 'absent.csv');
    const stderr = captureStderr();

    const code = await runCli(
      ['--data-iedb', missing, '--out-csv', outCsv],
      appConfig,
    );

    expect(code).toBe(1);
    expect(existsSync(outCsv)).toBe(false);
    expect(stderr).toHaveBeenCalledWith(
      expect.stringContaining(`mhc-curate: Cannot read input file ${missing}`),
    );
  });

  it('exits with 1 on invalid arguments', async () => {
    const stderr = captureStderr();
    const code = await runCli(['--data-iedb', fixture('iedb.csv')], appConfig);

    expect(code).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      'mhc-curate: --out-csv: a result path is required\n',
    );
  });
});
