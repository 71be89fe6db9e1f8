/**
 * @fileoverview Loader for Kim et al. 2014 benchmark binding data (tab-separated).
 * @module src/services/curation/loaders/kim2014.loader
 */

import { inject, injectable } from 'tsyringe';

import type { AlleleNormalizer as AlleleNormalizerClass } from '../alleles/alleleNormalizer.js';
import type { ISourceLoader } from '../core/ISourceLoader.js';
import {
  StageRecorder,
  cell,
  parseInequality,
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
  allele: 'mhc',
  peptide: 'sequence',
  value: 'meas',
  inequality: 'inequality',
} as const;

/**
 * Kim2014 rows are quantitative only when the inequality is `=`; censored
 * rows keep their inequality and are typed qualitative.
 */
@injectable()
export class Kim2014Loader implements ISourceLoader {
  public readonly name = SourceName.KIM2014;

  constructor(
    @inject(AlleleNormalizer) private normalizer: AlleleNormalizerClass,
    @inject(TableReader) private reader: ITableReader,
  ) {}

  async load(
    path: string,
    _options: LoadOptions,
    context: RequestContext,
  ): Promise<LoaderResult> {
    const table = await this.reader.readTable(
      path,
      { delimiter: '\t' },
      context,
    );
    requireColumns(table, Object.values(COLUMNS), path, this.name, context);

    logger.debug('Loaded kim2014 data', {
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

    const records = resolved.map(({ row, allele }): StagedRecord => {
      const inequality = parseInequality(cell(row, COLUMNS.inequality));
      return {
        allele,
        peptide: cell(row, COLUMNS.peptide),
        measurementValue: parseNumber(cell(row, COLUMNS.value)),
        measurementInequality: inequality,
        measurementType:
          inequality === '='
            ? MeasurementType.QUANTITATIVE
            : MeasurementType.QUALITATIVE,
        measurementSource: SourceName.KIM2014,
        originalAllele: cell(row, COLUMNS.allele),
      };
    });

    logger.info('Kim2014 data standardized', {
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
