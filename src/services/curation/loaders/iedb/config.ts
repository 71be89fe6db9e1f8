/**
 * @fileoverview IEDB MHC ligand export constants.
 * @module src/services/curation/loaders/iedb/config
 */

/**
 * Export columns read by the loader (second header line of the export).
 */
export const IEDB_COLUMNS = {
  alleleClass: 'MHC allele class',
  alleleName: 'Allele Name',
  units: 'Units',
  qualitativeMeasure: 'Qualitative Measure',
  quantitativeMeasurement: 'Quantitative measurement',
  method: 'Method/Technique',
  description: 'Description',
  authors: 'Authors',
} as const;

/**
 * The export starts with a grouping header line above the column names.
 */
export const IEDB_SKIP_LINES = 1;

export const MHC_CLASS_I = 'I';

/**
 * Class-level placeholders that name no specific allele.
 */
export const EXCLUDED_ALLELE_NAMES: readonly string[] = [
  'HLA class I',
  'HLA class II',
];

/**
 * Allele-name substrings marking engineered or non-classical molecules.
 */
export const EXCLUDED_ALLELE_SUBSTRINGS: readonly string[] = ['mutant', 'CD1'];

export const NANOMOLAR_UNITS = 'nM';

export const MASS_SPEC_METHOD_MARKER = 'mass spec';

/**
 * Checkpoints at which per-allele measurement counts are reported.
 */
export const ALLELE_COUNT_CHECKPOINTS = {
  afterAlleleFilter: 'after allele filter',
  afterPeptideFilter: 'after peptide filter',
} as const;
