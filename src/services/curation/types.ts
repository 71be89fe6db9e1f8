/**
 * @fileoverview Type definitions for the curation domain.
 * Defines the standardized measurement record, loader options, and the
 * diagnostics report returned alongside curated data.
 * @module src/services/curation/types
 */

/**
 * Sentinel produced by the allele normalizer for names it cannot parse.
 */
export const UNKNOWN_ALLELE = 'UNKNOWN';

/**
 * The 20 standard one-letter amino-acid codes, nothing else.
 */
export const CANONICAL_PEPTIDE_REGEX = /^[ACDEFGHIKLMNPQRSTVWY]+$/;

/**
 * Censoring direction of a measurement value.
 * `<` true affinity at most the value, `=` exact, `>` at least the value.
 */
export type MeasurementInequality = '<' | '=' | '>';

export const MEASUREMENT_INEQUALITIES: readonly MeasurementInequality[] = [
  '<',
  '=',
  '>',
];

export enum MeasurementType {
  QUANTITATIVE = 'quantitative',
  QUALITATIVE = 'qualitative',
}

/**
 * Loader identifiers, also used as `measurement_source` for every loader
 * except IEDB.
 */
export enum SourceName {
  IEDB = 'iedb',
  KIM2014 = 'kim2014',
  SYSTEMHC_ATLAS = 'systemhc-atlas',
  ABELIN_MASS_SPEC = 'abelin-mass-spec',
}

/**
 * A record as produced inside a loader. Value and inequality stay nullable
 * until the merger's final cleaning step narrows them.
 */
export interface StagedRecord {
  readonly allele: string;
  readonly peptide: string;
  readonly measurementValue: number | null;
  readonly measurementInequality: MeasurementInequality | null;
  readonly measurementType: MeasurementType;
  readonly measurementSource: string;
  readonly originalAllele: string;
}

/**
 * A fully populated row of the curated output table.
 */
export interface MeasurementRecord extends StagedRecord {
  readonly measurementValue: number;
  readonly measurementInequality: MeasurementInequality;
}

/**
 * Output columns in file order.
 */
export const OUTPUT_COLUMNS = [
  { key: 'allele', header: 'allele' },
  { key: 'peptide', header: 'peptide' },
  { key: 'measurementValue', header: 'measurement_value' },
  { key: 'measurementInequality', header: 'measurement_inequality' },
  { key: 'measurementType', header: 'measurement_type' },
  { key: 'measurementSource', header: 'measurement_source' },
  { key: 'originalAllele', header: 'original_allele' },
] as const satisfies readonly {
  key: keyof MeasurementRecord;
  header: string;
}[];

/**
 * Switches read by the loaders. Each loader consults only the fields that
 * concern it.
 */
export interface LoadOptions {
  /** Keep IEDB qualitative rows measured by mass spectrometry. */
  includeIedbMassSpec: boolean;
  /** Keep IEDB qualitative (non-nM) rows at all. */
  includeIedbQualitative: boolean;
  /** Lowest SystemHC-Atlas `prob` that is kept. */
  systemhcMinProbability: number;
}

/**
 * Row counts around one filter or transform step.
 */
export interface StageCount {
  stage: string;
  before: number;
  after: number;
}

export interface LoaderDiagnostics {
  source: SourceName;
  path: string;
  rowsRead: number;
  stages: StageCount[];
  /** Distinct raw allele names that could not be canonicalized, in first-seen order. */
  unparseableAlleles: string[];
  /** Measurement count per canonical allele, keyed by checkpoint name. */
  perAlleleCounts?: Record<string, Record<string, number>>;
}

export interface LoaderResult {
  records: readonly StagedRecord[];
  diagnostics: LoaderDiagnostics;
}

export interface MergeDiagnostics {
  /** Records removed because a higher-precedence source had the same pair. */
  suppressedByPrecedence: number;
  combined: number;
  duplicatesRemoved: number;
  droppedIncomplete: number;
  droppedNonCanonicalPeptide: number;
  final: number;
}

export interface CurationReport {
  requestId: string;
  sources: LoaderDiagnostics[];
  merge: MergeDiagnostics;
  outputRows: number;
}

export interface CurationResult {
  records: readonly MeasurementRecord[];
  report: CurationReport;
}

/**
 * Input files per source, each list in command-line order.
 */
export interface CurationInputs {
  iedb: readonly string[];
  kim2014: readonly string[];
  systemhcAtlas: readonly string[];
  abelinMassSpec: readonly string[];
}
