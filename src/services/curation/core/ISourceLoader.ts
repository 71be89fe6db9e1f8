/**
 * @fileoverview Loader interface for measurement data sources.
 * All concrete loaders (Kim2014, IEDB, SystemHC-Atlas, Abelin) implement this contract.
 * @module src/services/curation/core/ISourceLoader
 */

import type { RequestContext } from '@/utils/index.js';
import type { LoadOptions, LoaderResult, SourceName } from '../types.js';

/**
 * Converts one raw source file into standardized records.
 * Loaders hold no state between calls.
 */
export interface ISourceLoader {
  /**
   * Source identifier, also the precedence key used by the merger
   */
  readonly name: SourceName;

  /**
   * Read, filter and standardize one input file
   * @param path - Input file path (`.gz` allowed)
   * @param options - Run-wide loader switches
   * @param context - Request context for tracing and logging
   * @returns Records plus per-stage diagnostics
   * @throws {PipelineError} with InputNotFound, InputUnreadable or MissingColumn
   */
  load(
    path: string,
    options: LoadOptions,
    context: RequestContext,
  ): Promise<LoaderResult>;
}
