/**
 * @fileoverview Loader for the Abelin et al. 2017 mass-spec hit list.
 * @module src/services/curation/loaders/abelinMassSpec.loader
 */

import { inject, injectable } from 'tsyringe';

import type { AlleleNormalizer as AlleleNormalizerClass } from '../alleles/alleleNormalizer.js';
import { POSITIVE_AFFINITY } from '../constants.js';
import type { ISourceLoader } from '../core/ISourceLoader.js';
import {
  StageRecorder,
  allelePeptideKey,
  cell,
  dedupeBy,
  reportUnparseable,
  requireColumns,
  resolveAlleles,
} from '../core/stages.js';
import {
  MeasurementType,
  SourceName,
  type LoadOptions,
  type LoaderResult,
  type StagedRecord,
} from '../types.js';
import { AlleleNormalizer, TableReader } from '@/container/tokens.js';
import {
  logger,
  type ITableReader,
  type RequestContext,
} from '@/utils/index.js';

const COLUMNS = {
  allele: 'allele',
  peptide: 'peptide',
} as const;

@injectable()
export class AbelinMassSpecLoader implements ISourceLoader {
  public readonly name = SourceName.ABELIN_MASS_SPEC;

  constructor(
    @inject(AlleleNormalizer) private normalizer: AlleleNormalizerClass,
    @inject(TableReader) private reader: ITableReader,
  ) {}

  async load(
    path: string,
    _options: LoadOptions,
    context: RequestContext,
  ): Promise<LoaderResult> {
    const table = await this.reader.readTable(path, {}, context);
    requireColumns(table, Object.values(COLUMNS), path, this.name, context);

    logger.debug('Loaded Abelin mass-spec data', {
      ...context,
      path,
      rows: table.rows.length,
    });

    const stages = new StageRecorder(this.name, context);

    const { resolved, unparseable } = resolveAlleles(
      table.rows,
      (row) => cell(row, COLUMNS.allele),
      this.normalizer,
    );
    stages.record(
      'drop unparseable alleles',
      table.rows.length,
      resolved.length,
    );
    reportUnparseable(this.name, unparseable, context);

    const standardized = resolved.map(
      ({ row, allele }): StagedRecord => ({
        allele,
        peptide: cell(row, COLUMNS.peptide),
        measurementValue: POSITIVE_AFFINITY.value,
        measurementInequality: POSITIVE_AFFINITY.inequality,
        measurementType: MeasurementType.QUALITATIVE,
        measurementSource: SourceName.ABELIN_MASS_SPEC,
        originalAllele: cell(row, COLUMNS.allele),
      }),
    );

    const records = stages.apply(
      'drop duplicate allele/peptide pairs',
      standardized,
      (rows) => dedupeBy(rows, allelePeptideKey),
    );

    logger.info('Abelin mass-spec data standardized', {
      ...context,
      path,
      records: records.length,
    });

    return {
      records,
      diagnostics: {
        source: this.name,
        path,
        rowsRead: table.rows.length,
        stages: stages.stages,
        unparseableAlleles: unparseable,
      },
    };
  }
}
