/**
 * @fileoverview Loader for IEDB MHC ligand exports (e.g. mhc_ligand_full.csv).
 * Applies the class I / allele / peptide filters, splits quantitative and
 * qualitative assays, and tags each record with a "last author - method"
 * provenance category.
 * @module src/services/curation/loaders/iedb.loader
 */

import { inject, injectable } from 'tsyringe';

import type { AlleleNormalizer as AlleleNormalizerClass } from '../alleles/alleleNormalizer.js';
import { QUALITATIVE_TO_AFFINITY } from '../constants.js';
import type { ISourceLoader } from '../core/ISourceLoader.js';
import {
  StageRecorder,
  cell,
  countByAllele,
  dedupeBy,
  parseNumber,
  reportUnparseable,
  requireColumns,
  resolveAlleles,
} from '../core/stages.js';
import {
  CANONICAL_PEPTIDE_REGEX,
  MeasurementType,
  SourceName,
  type LoadOptions,
  type LoaderResult,
  type MeasurementInequality,
  type StagedRecord,
} from '../types.js';
import {
  ALLELE_COUNT_CHECKPOINTS,
  EXCLUDED_ALLELE_NAMES,
  EXCLUDED_ALLELE_SUBSTRINGS,
  IEDB_COLUMNS,
  IEDB_SKIP_LINES,
  MASS_SPEC_METHOD_MARKER,
  MHC_CLASS_I,
  NANOMOLAR_UNITS,
} from './iedb/config.js';
import { AlleleNormalizer, TableReader } from '@/container/tokens.js';
import {
  logger,
  type ITableReader,
  type RequestContext,
  type TableRow,
} from '@/utils/index.js';

/**
 * An IEDB row with its measurement fields derived but no peptide yet.
 */
interface IedbMeasurement {
  row: TableRow;
  allele: string;
  measurementType: MeasurementType;
  measurementValue: number | null;
  measurementInequality: MeasurementInequality | null;
}

/**
 * Last author's surname from an IEDB author list such as
 * "Alessandro Sette; John Sidney*".
 */
export function lastAuthor(authors: string): string {
  const lastEntry = authors.split(';').at(-1) ?? '';
  const lastPart = lastEntry.split(',').at(-1) ?? '';
  const lastToken = lastPart.split(' ').at(-1) ?? '';
  return lastToken.trim().replaceAll('*', '');
}

function isClassI(row: TableRow): boolean {
  return cell(row, IEDB_COLUMNS.alleleClass).trim().toUpperCase() === MHC_CLASS_I;
}

function isUsableAlleleName(row: TableRow): boolean {
  const name = cell(row, IEDB_COLUMNS.alleleName);
  return !EXCLUDED_ALLELE_SUBSTRINGS.some((marker) => name.includes(marker));
}

function toQualitative(measurement: IedbMeasurement): IedbMeasurement {
  const affinity = QUALITATIVE_TO_AFFINITY.get(
    cell(measurement.row, IEDB_COLUMNS.qualitativeMeasure),
  );
  return {
    ...measurement,
    measurementValue: affinity?.value ?? null,
    measurementInequality: affinity?.inequality ?? null,
  };
}

function toRecord(
  measurement: IedbMeasurement,
  peptide: string,
): StagedRecord {
  const { row } = measurement;
  return {
    allele: measurement.allele,
    peptide,
    measurementValue: measurement.measurementValue,
    measurementInequality: measurement.measurementInequality,
    measurementType: measurement.measurementType,
    measurementSource: `${lastAuthor(cell(row, IEDB_COLUMNS.authors))} - ${cell(row, IEDB_COLUMNS.method)}`,
    originalAllele: cell(row, IEDB_COLUMNS.alleleName),
  };
}

function fullRecordKey(record: StagedRecord): string {
  return JSON.stringify([
    record.allele,
    record.peptide,
    record.measurementValue,
    record.measurementInequality,
    record.measurementType,
    record.measurementSource,
    record.originalAllele,
  ]);
}

/**
 * IEDB loader. The filter order is significant: the qualitative mapping only
 * applies to rows already split off as non-nM, and the peptide filter runs on
 * the recombined set.
 */
@injectable()
export class IedbLoader implements ISourceLoader {
  public readonly name = SourceName.IEDB;

  constructor(
    @inject(AlleleNormalizer) private normalizer: AlleleNormalizerClass,
    @inject(TableReader) private reader: ITableReader,
  ) {}

  async load(
    path: string,
    options: LoadOptions,
    context: RequestContext,
  ): Promise<LoaderResult> {
    const table = await this.reader.readTable(
      path,
      { skipLines: IEDB_SKIP_LINES },
      context,
    );
    requireColumns(
      table,
      Object.values(IEDB_COLUMNS),
      path,
      this.name,
      context,
    );

    logger.debug('Loaded iedb data', {
      ...context,
      path,
      rows: table.rows.length,
    });

    const stages = new StageRecorder(this.name, context);

    const classI = stages.apply('select class I', table.rows, (rows) =>
      rows.filter(isClassI),
    );
    const namedAlleles = stages.apply(
      'drop class-level allele names',
      classI,
      (rows) =>
        rows.filter(
          (row) =>
            !EXCLUDED_ALLELE_NAMES.includes(
              cell(row, IEDB_COLUMNS.alleleName),
            ),
        ),
    );
    const usableAlleles = stages.apply(
      'drop mutant and CD1 alleles',
      namedAlleles,
      (rows) => rows.filter(isUsableAlleleName),
    );

    const { resolved, unparseable } = resolveAlleles(
      usableAlleles,
      (row) => cell(row, IEDB_COLUMNS.alleleName),
      this.normalizer,
    );
    stages.record(
      'drop unparseable alleles',
      usableAlleles.length,
      resolved.length,
    );
    reportUnparseable(this.name, unparseable, context);

    const perAlleleCounts: Record<string, Record<string, number>> = {
      [ALLELE_COUNT_CHECKPOINTS.afterAlleleFilter]: countByAllele(resolved),
    };

    const quantitative = stages.apply(
      'quantitative (nM) subset',
      resolved,
      (rows) =>
        rows
          .filter(({ row }) => cell(row, IEDB_COLUMNS.units) === NANOMOLAR_UNITS)
          .map(
            ({ row, allele }): IedbMeasurement => ({
              row,
              allele,
              measurementType: MeasurementType.QUANTITATIVE,
              measurementValue: parseNumber(
                cell(row, IEDB_COLUMNS.quantitativeMeasurement),
              ),
              measurementInequality: '=',
            }),
          ),
    );

    let qualitative = stages.apply(
      'qualitative subset',
      resolved,
      (rows) =>
        rows
          .filter(({ row }) => cell(row, IEDB_COLUMNS.units) !== NANOMOLAR_UNITS)
          .map(
            ({ row, allele }): IedbMeasurement => ({
              row,
              allele,
              measurementType: MeasurementType.QUALITATIVE,
              measurementValue: null,
              measurementInequality: null,
            }),
          ),
    );

    if (!options.includeIedbMassSpec) {
      qualitative = stages.apply(
        'drop mass-spec qualitative',
        qualitative,
        (rows) =>
          rows.filter(
            ({ row }) =>
              !cell(row, IEDB_COLUMNS.method).includes(MASS_SPEC_METHOD_MARKER),
          ),
      );
    }

    qualitative = stages.apply('map qualitative measures', qualitative, (rows) =>
      rows.map(toQualitative),
    );

    const combined = [
      ...quantitative,
      ...(options.includeIedbQualitative ? qualitative : []),
    ];
    stages.record(
      'combine quantitative and qualitative',
      quantitative.length + qualitative.length,
      combined.length,
    );

    const withPeptides = stages.apply(
      'select canonical peptides',
      combined,
      (rows) =>
        rows.flatMap((measurement) => {
          const peptide = cell(measurement.row, IEDB_COLUMNS.description).trim();
          return CANONICAL_PEPTIDE_REGEX.test(peptide)
            ? [toRecord(measurement, peptide)]
            : [];
        }),
    );
    perAlleleCounts[ALLELE_COUNT_CHECKPOINTS.afterPeptideFilter] =
      countByAllele(withPeptides);

    const records = stages.apply('drop duplicate rows', withPeptides, (rows) =>
      dedupeBy(rows, fullRecordKey),
    );

    logger.info('IEDB data standardized', {
      ...context,
      path,
      records: records.length,
      quantitative: quantitative.length,
      qualitative: options.includeIedbQualitative ? qualitative.length : 0,
    });

    return {
      records,
      diagnostics: {
        source: this.name,
        path,
        rowsRead: table.rows.length,
        stages: stages.stages,
        unparseableAlleles: unparseable,
        perAlleleCounts,
      },
    };
  }
}
