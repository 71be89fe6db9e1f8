/**
 * @fileoverview Command-line argument parsing and validation.
 * @module src/cli/args
 */
import { parseArgs } from 'node:util';
import { z } from 'zod';

import type { AppConfig } from '@/config/index.js';
import type { CurationInputs, LoadOptions } from '@/services/curation/types.js';
import { ErrorCode, PipelineError } from '@/types-global/errors.js';

export const USAGE = `Usage: mhc-curate [options] --out-csv PATH

Filter and combine peptide/MHC binding datasets into one training table,
optionally including eluted peptides identified by mass-spec.

Options:
  --data-kim2014 PATH             Kim 2014-style affinity data (repeatable)
  --data-iedb PATH                IEDB-style affinity data, e.g. mhc_ligand_full.csv (repeatable)
  --data-systemhc-atlas PATH      SystemHC-Atlas-style mass-spec data (repeatable)
  --data-abelin-mass-spec PATH    Abelin 2017 mass-spec hits (repeatable)
  --include-iedb-mass-spec        Include mass-spec observations in IEDB
  --systemhc-min-probability N    Lowest SystemHC-Atlas probability kept (0-1)
  --out-csv PATH                  Result file (required)
  --report-json PATH              Also write the run diagnostics as JSON
  -h, --help                      Show this message
`;

const ARG_OPTIONS = {
  'data-kim2014': { type: 'string', multiple: true },
  'data-iedb': { type: 'string', multiple: true },
  'data-systemhc-atlas': { type: 'string', multiple: true },
  'data-abelin-mass-spec': { type: 'string', multiple: true },
  'include-iedb-mass-spec': { type: 'boolean' },
  'systemhc-min-probability': { type: 'string' },
  'out-csv': { type: 'string' },
  'report-json': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const pathList = z.array(z.string().min(1)).default([]);

const CliArgsSchema = z.object({
  'data-kim2014': pathList,
  'data-iedb': pathList,
  'data-systemhc-atlas': pathList,
  'data-abelin-mass-spec': pathList,
  'include-iedb-mass-spec': z.boolean().default(false),
  'systemhc-min-probability': z.coerce.number().min(0).max(1).optional(),
  'out-csv': z
    .string({ required_error: 'a result path is required' })
    .min(1, 'must not be empty'),
  'report-json': z.string().min(1).optional(),
});

export type CliCommand =
  | { kind: 'help' }
  | {
      kind: 'curate';
      inputs: CurationInputs;
      options: LoadOptions;
      outCsv: string;
      reportJson?: string;
    };

/**
 * Parses `argv` (without the node and script entries). Defaults not given on
 * the command line come from `config`.
 *
 * @throws {PipelineError} `InvalidArguments` on unknown flags, missing values
 *   or failed validation.
 */
export function parseCliArgs(
  argv: readonly string[],
  config: AppConfig,
): CliCommand {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: ARG_OPTIONS,
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new PipelineError(
      ErrorCode.InvalidArguments,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (values.help === true) return { kind: 'help' };

  const parsed = CliArgsSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `--${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    throw new PipelineError(ErrorCode.InvalidArguments, issues.join('; '), {
      issues,
    });
  }

  const args = parsed.data;
  return {
    kind: 'curate',
    inputs: {
      iedb: args['data-iedb'],
      kim2014: args['data-kim2014'],
      systemhcAtlas: args['data-systemhc-atlas'],
      abelinMassSpec: args['data-abelin-mass-spec'],
    },
    options: {
      includeIedbMassSpec: args['include-iedb-mass-spec'],
      includeIedbQualitative: config.includeIedbQualitative,
      systemhcMinProbability:
        args['systemhc-min-probability'] ?? config.systemhcMinProbability,
    },
    outCsv: args['out-csv'],
    ...(args['report-json'] ? { reportJson: args['report-json'] } : {}),
  };
}
