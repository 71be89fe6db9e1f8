/**
 * @fileoverview Tests for command-line parsing and validation.
 * @module tests/cli/args.test
 */
import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '@/cli/args.js';
import type { AppConfig } from '@/config/index.js';
import { ErrorCode } from '@/types-global/errors.js';

const appConfig: AppConfig = {
  environment: 'test',
  logLevel: 'silent',
  systemhcMinProbability: 0.95,
  includeIedbQualitative: false,
};

describe('parseCliArgs', () => {
  it('applies defaults when only the output path is given', () => {
    expect(parseCliArgs(['--out-csv', 'out.csv'], appConfig)).toEqual({
      kind: 'curate',
      inputs: { iedb: [], kim2014: [], systemhcAtlas: [], abelinMassSpec: [] },
      options: {
        includeIedbMassSpec: false,
        includeIedbQualitative: false,
        systemhcMinProbability: 0.95,
      },
      outCsv: 'out.csv',
    });
  });

  it('collects repeated data flags in order', () => {
    const command = parseCliArgs(
      [
        '--data-iedb',
        'b.csv',
        '--data-iedb',
        'a.csv',
        '--data-kim2014',
        'kim.txt',
        '--include-iedb-mass-spec',
        '--systemhc-min-probability',
        '0.5',
        '--out-csv',
        'out.csv',
        '--report-json',
        'report.json',
      ],
      appConfig,
    );

    expect(command).toMatchObject({
      kind: 'curate',
      inputs: { iedb: ['b.csv', 'a.csv'], kim2014: ['kim.txt'] },
      options: { includeIedbMassSpec: true, systemhcMinProbability: 0.5 },
      reportJson: 'report.json',
    });
  });

  it('returns help regardless of other flags', () => {
    expect(parseCliArgs(['-h'], appConfig)).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--data-iedb', 'x', '--help'], appConfig)).toEqual({
      kind: 'help',
    });
  });

  it('requires an output path', () => {
    expect(() => parseCliArgs(['--data-iedb', 'x.csv'], appConfig)).toThrow(
      '--out-csv: a result path is required',
    );
  });

  it('rejects an empty output path', () => {
    expect(() => parseCliArgs(['--out-csv='], appConfig)).toThrow(
      '--out-csv: must not be empty',
    );
  });

  it('rejects unknown flags as invalid arguments', () => {
    expect(() =>
      parseCliArgs(['--data-bogus', 'x', '--out-csv', 'o.csv'], appConfig),
    ).toThrow(expect.objectContaining({ code: ErrorCode.InvalidArguments }));
  });

  it('rejects probabilities outside [0, 1]', () => {
    expect(() =>
      parseCliArgs(
        ['--systemhc-min-probability', '2', '--out-csv', 'o.csv'],
        appConfig,
      ),
    ).toThrow(
      expect.objectContaining({
        code: ErrorCode.InvalidArguments,
        message:
          '--systemhc-min-probability: Number must be less than or equal to 1',
      }),
    );
  });
});
