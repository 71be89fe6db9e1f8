/**
 * @fileoverview Cross-source merge: precedence ordering, suppression of
 * lower-precedence duplicates, global deduplication and final cleaning.
 * @module src/services/curation/core/merger
 */

import {
  CANONICAL_PEPTIDE_REGEX,
  SourceName,
  type MeasurementRecord,
  type MergeDiagnostics,
  type StagedRecord,
} from '../types.js';
import { allelePeptideKey, dedupeBy } from './stages.js';

/**
 * Sources in precedence order. Earlier sources win every keep-first
 * tie-break below.
 */
export const SOURCE_PRECEDENCE: readonly SourceName[] = [
  SourceName.IEDB,
  SourceName.KIM2014,
  SourceName.SYSTEMHC_ATLAS,
  SourceName.ABELIN_MASS_SPEC,
];

export interface SuppressionRule {
  /** Source whose records are removed. */
  source: SourceName;
  /** Source whose (allele, peptide) pairs take precedence. */
  suppressedBy: SourceName;
}

/**
 * Kim2014 benchmark rows are largely derived from IEDB; the IEDB reading wins
 * for any pair present in both.
 */
export const CROSS_SOURCE_SUPPRESSION: readonly SuppressionRule[] = [
  { source: SourceName.KIM2014, suppressedBy: SourceName.IEDB },
];

export interface SourceOutput {
  source: SourceName;
  records: readonly StagedRecord[];
}

/**
 * Stable sort of loader outputs by {@link SOURCE_PRECEDENCE}; outputs of the
 * same source keep their input (file) order.
 */
export function orderByPrecedence(
  outputs: readonly SourceOutput[],
): SourceOutput[] {
  return [...outputs].sort(
    (a, b) =>
      SOURCE_PRECEDENCE.indexOf(a.source) - SOURCE_PRECEDENCE.indexOf(b.source),
  );
}

/**
 * Applies every {@link CROSS_SOURCE_SUPPRESSION} rule. Pairs are collected from
 * the union of the winning source's outputs before anything is removed.
 */
export function applySuppression(outputs: readonly SourceOutput[]): {
  outputs: SourceOutput[];
  suppressed: number;
} {
  let suppressed = 0;
  let current = [...outputs];

  for (const rule of CROSS_SOURCE_SUPPRESSION) {
    const winningPairs = new Set(
      current
        .filter((output) => output.source === rule.suppressedBy)
        .flatMap((output) => output.records.map(allelePeptideKey)),
    );
    if (winningPairs.size === 0) continue;

    current = current.map((output) => {
      if (output.source !== rule.source) return output;
      const records = output.records.filter(
        (record) => !winningPairs.has(allelePeptideKey(record)),
      );
      suppressed += output.records.length - records.length;
      return { ...output, records };
    });
  }

  return { outputs: current, suppressed };
}

function measurementKey(record: StagedRecord): string {
  return JSON.stringify([
    record.allele,
    record.peptide,
    record.measurementValue,
  ]);
}

/**
 * Removes later records repeating an earlier (allele, peptide, value) triple.
 */
export function dropDuplicateMeasurements(
  records: readonly StagedRecord[],
): StagedRecord[] {
  return dedupeBy(records, measurementKey);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareByAllelePeptide(
  a: StagedRecord,
  b: StagedRecord,
): number {
  return compareText(a.allele, b.allele) || compareText(a.peptide, b.peptide);
}

/**
 * True when no output column is null or empty.
 */
export function isComplete(record: StagedRecord): record is MeasurementRecord {
  return (
    record.measurementValue !== null &&
    record.measurementInequality !== null &&
    record.allele !== '' &&
    record.peptide !== '' &&
    record.measurementSource !== '' &&
    record.originalAllele !== ''
  );
}

function selectOutputColumns(record: StagedRecord): StagedRecord {
  return {
    allele: record.allele,
    peptide: record.peptide,
    measurementValue: record.measurementValue,
    measurementInequality: record.measurementInequality,
    measurementType: record.measurementType,
    measurementSource: record.measurementSource,
    originalAllele: record.originalAllele,
  };
}

/**
 * Selects the output columns, sorts by (allele, peptide) and drops incomplete
 * rows and rows whose peptide leaves the canonical alphabet.
 */
export function finalizeRecords(records: readonly StagedRecord[]): {
  records: MeasurementRecord[];
  droppedIncomplete: number;
  droppedNonCanonicalPeptide: number;
} {
  const sorted = records.map(selectOutputColumns).sort(compareByAllelePeptide);
  const complete = sorted.filter(isComplete);
  const canonical = complete.filter((record) =>
    CANONICAL_PEPTIDE_REGEX.test(record.peptide),
  );

  return {
    records: canonical,
    droppedIncomplete: sorted.length - complete.length,
    droppedNonCanonicalPeptide: complete.length - canonical.length,
  };
}

/**
 * Full merge of loader outputs into the curated table.
 */
export function mergeSources(outputs: readonly SourceOutput[]): {
  records: MeasurementRecord[];
  diagnostics: MergeDiagnostics;
} {
  const { outputs: filtered, suppressed } = applySuppression(
    orderByPrecedence(outputs),
  );
  const combined = filtered.flatMap((output) => output.records);
  const unique = dropDuplicateMeasurements(combined);
  const finalized = finalizeRecords(unique);

  return {
    records: finalized.records,
    diagnostics: {
      suppressedByPrecedence: suppressed,
      combined: combined.length,
      duplicatesRemoved: combined.length - unique.length,
      droppedIncomplete: finalized.droppedIncomplete,
      droppedNonCanonicalPeptide: finalized.droppedNonCanonicalPeptide,
      final: finalized.records.length,
    },
  };
}
