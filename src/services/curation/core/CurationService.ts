/**
 * @fileoverview Orchestrates a curation run: loads every input file with its
 * source loader in precedence order, then merges the outputs.
 * @module src/services/curation/core/CurationService
 */

import { inject, injectable } from 'tsyringe';

import type { ISourceLoader } from './ISourceLoader.js';
import { SOURCE_PRECEDENCE, mergeSources, type SourceOutput } from './merger.js';
import {
  SourceName,
  type CurationInputs,
  type CurationResult,
  type LoadOptions,
  type LoaderDiagnostics,
} from '../types.js';
import { ErrorCode, toPipelineError } from '@/types-global/errors.js';
import {
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';

import {
  AbelinMassSpecSourceLoader,
  IedbSourceLoader,
  Kim2014SourceLoader,
  SystemhcAtlasSourceLoader,
} from '@/container/tokens.js';

const INPUT_FIELDS: Record<SourceName, keyof CurationInputs> = {
  [SourceName.IEDB]: 'iedb',
  [SourceName.KIM2014]: 'kim2014',
  [SourceName.SYSTEMHC_ATLAS]: 'systemhcAtlas',
  [SourceName.ABELIN_MASS_SPEC]: 'abelinMassSpec',
};

/**
 * Runs loaders one file at a time. Loaders share no state; only the merge
 * step reads across their outputs, after all of them have finished.
 */
@injectable()
export class CurationService {
  private readonly loaders: Record<SourceName, ISourceLoader>;

  constructor(
    @inject(IedbSourceLoader) iedbLoader: ISourceLoader,
    @inject(Kim2014SourceLoader) kim2014Loader: ISourceLoader,
    @inject(SystemhcAtlasSourceLoader) systemhcAtlasLoader: ISourceLoader,
    @inject(AbelinMassSpecSourceLoader) abelinMassSpecLoader: ISourceLoader,
  ) {
    this.loaders = {
      [SourceName.IEDB]: iedbLoader,
      [SourceName.KIM2014]: kim2014Loader,
      [SourceName.SYSTEMHC_ATLAS]: systemhcAtlasLoader,
      [SourceName.ABELIN_MASS_SPEC]: abelinMassSpecLoader,
    };
  }

  async curate(
    inputs: CurationInputs,
    options: LoadOptions,
    context: RequestContext,
  ): Promise<CurationResult> {
    logger.debug('CurationService: starting run', {
      ...context,
      inputs,
      options,
    });

    const outputs: SourceOutput[] = [];
    const sources: LoaderDiagnostics[] = [];

    for (const source of SOURCE_PRECEDENCE) {
      const loader = this.loaders[source];
      for (const path of inputs[INPUT_FIELDS[source]]) {
        const loadContext = requestContextService.forOperation(
          context,
          `load:${source}`,
          { path },
        );

        try {
          const result = await loader.load(path, options, loadContext);
          outputs.push({ source, records: result.records });
          sources.push(result.diagnostics);
        } catch (error) {
          throw toPipelineError(
            error,
            ErrorCode.InternalError,
            `Loading ${source} input ${path} failed`,
            { requestId: context.requestId, path, source },
          );
        }
      }
    }

    const { records, diagnostics } = mergeSources(outputs);

    logger.info('Curation complete', {
      ...context,
      ...diagnostics,
    });

    return {
      records,
      report: {
        requestId: context.requestId,
        sources,
        merge: diagnostics,
        outputRows: records.length,
      },
    };
  }
}
