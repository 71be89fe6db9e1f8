/**
 * @fileoverview Writes record lists as CSV (csv-stringify) and run reports as JSON.
 * @module src/utils/io/tableWriter
 */
import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import { injectable } from 'tsyringe';

import { ErrorCode, PipelineError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export interface ColumnSpec<T> {
  key: keyof T & string;
  header: string;
}

export interface ITableWriter {
  writeTable<T extends object>(
    path: string,
    columns: readonly ColumnSpec<T>[],
    rows: readonly T[],
    context: RequestContext,
  ): Promise<void>;

  writeJson(path: string, value: unknown, context: RequestContext): Promise<void>;
}

/**
 * Renders numbers the way float columns conventionally appear in CSV:
 * integral values keep one decimal (`500.0`), others use the shortest
 * round-trip form (`12.3`).
 */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Serializes rows to CSV text with a header line and no index column.
 */
export function renderCsv<T extends object>(
  columns: readonly ColumnSpec<T>[],
  rows: readonly T[],
): string {
  return stringify([...rows], {
    header: true,
    columns: columns.map(({ key, header }) => ({ key, header })),
    cast: {
      number: formatNumber,
    },
  });
}

@injectable()
export class CsvTableWriter implements ITableWriter {
  async writeTable<T extends object>(
    path: string,
    columns: readonly ColumnSpec<T>[],
    rows: readonly T[],
    context: RequestContext,
  ): Promise<void> {
    await this.write(path, renderCsv(columns, rows), context);

    logger.info('Wrote table', { ...context, path, rowCount: rows.length });
  }

  async writeJson(
    path: string,
    value: unknown,
    context: RequestContext,
  ): Promise<void> {
    await this.write(path, `${JSON.stringify(value, null, 2)}\n`, context);

    logger.debug('Wrote JSON document', { ...context, path });
  }

  private async write(
    path: string,
    content: string,
    context: RequestContext,
  ): Promise<void> {
    try {
      await writeFile(path, content, 'utf8');
    } catch (error) {
      throw new PipelineError(
        ErrorCode.OutputWriteFailed,
        `Cannot write ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId, path },
      );
    }
  }
}
