/**
 * @fileoverview Loader for SystemHC-Atlas mass-spec peptide identifications.
 * @module src/services/curation/loaders/systemhcAtlas.loader
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
  parseNumber,
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
  allele: 'top_allele',
  peptide: 'search_hit',
  probability: 'prob',
} as const;

/**
 * Every confident identification becomes a qualitative positive.
 */
@injectable()
export class SystemhcAtlasLoader implements ISourceLoader {
  public readonly name = SourceName.SYSTEMHC_ATLAS;

  constructor(
    @inject(AlleleNormalizer) private normalizer: AlleleNormalizerClass,
    @inject(TableReader) private reader: ITableReader,
  ) {}

  async load(
    path: string,
    options: LoadOptions,
    context: RequestContext,
  ): Promise<LoaderResult> {
    const table = await this.reader.readTable(path, {}, context);
    requireColumns(table, Object.values(COLUMNS), path, this.name, context);

    logger.debug('Loaded systemhc atlas data', {
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

    const minProbability = options.systemhcMinProbability;
    const confident = stages.apply(
      `drop probability < ${minProbability}`,
      resolved,
      (rows) =>
        rows.filter(({ row }) => {
          const probability = parseNumber(cell(row, COLUMNS.probability));
          return probability !== null && probability >= minProbability;
        }),
    );

    const standardized = confident.map(
      ({ row, allele }): StagedRecord => ({
        allele,
        peptide: cell(row, COLUMNS.peptide),
        measurementValue: POSITIVE_AFFINITY.value,
        measurementInequality: POSITIVE_AFFINITY.inequality,
        measurementType: MeasurementType.QUALITATIVE,
        measurementSource: SourceName.SYSTEMHC_ATLAS,
        originalAllele: cell(row, COLUMNS.allele),
      }),
    );

    const records = stages.apply(
      'drop duplicate allele/peptide pairs',
      standardized,
      (rows) => dedupeBy(rows, allelePeptideKey),
    );

    logger.info('SystemHC-Atlas data standardized', {
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
