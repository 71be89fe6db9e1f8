/**
 * @fileoverview Building blocks shared by the source loaders: stage bookkeeping,
 * column checks, allele resolution, cell parsing and keep-first deduplication.
 * @module src/services/curation/core/stages
 */
import type { AlleleNormalizer } from '../alleles/alleleNormalizer.js';
import {
  MEASUREMENT_INEQUALITIES,
  type MeasurementInequality,
  type SourceName,
  type StageCount,
  type StagedRecord,
} from '../types.js';
import { ErrorCode, PipelineError } from '@/types-global/errors.js';
import {
  logger,
  type RequestContext,
  type Table,
  type TableRow,
} from '@/utils/index.js';

/**
 * Runs ordered filter/transform steps and records row counts around each.
 * Steps receive and return fresh arrays; nothing is mutated in place.
 */
export class StageRecorder {
  private readonly counts: StageCount[] = [];

  constructor(
    private readonly source: SourceName,
    private readonly context: RequestContext,
  ) {}

  get stages(): StageCount[] {
    return [...this.counts];
  }

  apply<T, U>(
    stage: string,
    input: readonly T[],
    step: (rows: readonly T[]) => readonly U[],
  ): readonly U[] {
    const output = step(input);
    this.record(stage, input.length, output.length);
    return output;
  }

  record(stage: string, before: number, after: number): void {
    this.counts.push({ stage, before, after });

    logger.debug(`${this.source}: ${stage}`, {
      ...this.context,
      source: this.source,
      stage,
      before,
      after,
    });
  }
}

/**
 * Throws `MissingColumn` unless every name in `required` is a header column.
 */
export function requireColumns(
  table: Table,
  required: readonly string[],
  path: string,
  source: SourceName,
  context: RequestContext,
): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new PipelineError(
      ErrorCode.MissingColumn,
      `${source} input ${path} is missing column(s): ${missing.join(', ')}`,
      { requestId: context.requestId, path, source, missing },
    );
  }
}

/**
 * Cell text, with an absent cell read as the empty string.
 */
export function cell(row: TableRow, column: string): string {
  return row[column] ?? '';
}

export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseInequality(text: string): MeasurementInequality | null {
  const trimmed = text.trim();
  return MEASUREMENT_INEQUALITIES.find((symbol) => symbol === trimmed) ?? null;
}

export interface ResolvedRow<T> {
  row: T;
  allele: string;
}

/**
 * Canonicalizes each row's allele, dropping rows whose name cannot be parsed.
 * Distinct unparseable names are returned in first-seen order.
 */
export function resolveAlleles<T>(
  rows: readonly T[],
  rawAllele: (row: T) => string,
  normalizer: AlleleNormalizer,
): { resolved: ResolvedRow<T>[]; unparseable: string[] } {
  const resolved: ResolvedRow<T>[] = [];
  const unparseable = new Set<string>();

  for (const row of rows) {
    const result = normalizer.classify(rawAllele(row));
    if (result.kind === 'canonical') {
      resolved.push({ row, allele: result.name });
    } else {
      unparseable.add(result.raw);
    }
  }

  return { resolved, unparseable: [...unparseable] };
}

export function reportUnparseable(
  source: SourceName,
  unparseable: readonly string[],
  context: RequestContext,
): void {
  if (unparseable.length === 0) return;

  logger.warning(`${source}: dropping un-parseable alleles`, {
    ...context,
    source,
    alleles: unparseable,
  });
}

/**
 * Keeps the first row for each key, preserving input order.
 */
export function dedupeBy<T>(
  rows: readonly T[],
  keyOf: (row: T) => string,
): T[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = keyOf(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function allelePeptideKey(record: StagedRecord): string {
  return JSON.stringify([record.allele, record.peptide]);
}

export function countByAllele(
  records: readonly { allele: string }[],
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const { allele } of records) {
    counts[allele] = (counts[allele] ?? 0) + 1;
  }
  return counts;
}
