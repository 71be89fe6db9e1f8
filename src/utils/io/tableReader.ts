/**
 * @fileoverview Reads delimited text tables (CSV/TSV, optionally gzip- or
 * bzip2-compressed) into string-valued rows using csv-parse.
 * @module src/utils/io/tableReader
 */
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { parse } from 'csv-parse/sync';
import { injectable } from 'tsyringe';
import unbzip2 from 'unbzip2-stream';

import { ErrorCode, PipelineError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

const gunzipAsync = promisify(gunzip);

function bunzip2(data: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const decoder = unbzip2();
    decoder.on('data', (chunk: Buffer) => chunks.push(chunk));
    decoder.on('end', () => resolve(Buffer.concat(chunks)));
    decoder.on('error', reject);
    decoder.end(data);
  });
}

/**
 * Decompresses by file extension; anything else is returned as is.
 */
async function decompress(path: string, data: Buffer): Promise<Buffer> {
  if (path.endsWith('.gz')) return gunzipAsync(data);
  if (path.endsWith('.bz2')) return bunzip2(data);
  return data;
}

/**
 * A parsed row keyed by header name. Empty cells are the empty string.
 */
export type TableRow = Readonly<Record<string, string>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export interface ReadTableOptions {
  /** Field separator; `','` unless stated. */
  delimiter?: string;
  /** Leading lines discarded before the header line. */
  skipLines?: number;
}

/**
 * Source of tabular input. The loaders depend only on this contract, so tests
 * substitute an in-memory implementation.
 */
export interface ITableReader {
  readTable(
    path: string,
    options: ReadTableOptions,
    context: RequestContext,
  ): Promise<Table>;
}

/**
 * Makes repeated header names unique: the first keeps its name, later ones
 * become `name.1`, `name.2`, ...
 */
export function dedupeHeader(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((name) => {
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}.${count}`;
  });
}

/**
 * Parses already-decoded text into a {@link Table}.
 */
export function parseTable(text: string, options: ReadTableOptions): Table {
  let columns: string[] = [];
  const rows: Record<string, string>[] = parse(text, {
    delimiter: options.delimiter ?? ',',
    from_line: (options.skipLines ?? 0) + 1,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    columns: (header: string[]) => {
      columns = dedupeHeader(header);
      return columns;
    },
  });

  return { columns, rows };
}

/**
 * Filesystem-backed reader. Paths ending in `.gz` or `.bz2` are decompressed
 * first, and the text must be valid UTF-8.
 */
@injectable()
export class CsvTableReader implements ITableReader {
  async readTable(
    path: string,
    options: ReadTableOptions,
    context: RequestContext,
  ): Promise<Table> {
    logger.debug('Reading table', { ...context, path, options });

    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      const code =
        error instanceof Error && 'code' in error && error.code === 'ENOENT'
          ? ErrorCode.InputNotFound
          : ErrorCode.InputUnreadable;
      throw new PipelineError(
        code,
        `Cannot read input file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId, path },
      );
    }

    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(
        await decompress(path, buffer),
      );
      const table = parseTable(text, options);

      logger.debug('Table parsed', {
        ...context,
        path,
        columnCount: table.columns.length,
        rowCount: table.rows.length,
      });

      return table;
    } catch (error) {
      throw new PipelineError(
        ErrorCode.InputUnreadable,
        `Malformed input file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId, path },
      );
    }
  }
}
