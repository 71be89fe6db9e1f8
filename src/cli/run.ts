/**
 * @fileoverview CLI workflow: parse arguments, run the curation service and
 * write the curated table (plus the optional JSON report).
 * @module src/cli/run
 */
import { parseCliArgs, USAGE } from './args.js';
import { config as defaultConfig, type AppConfig } from '@/config/index.js';
import { container, registerDependencies } from '@/container/index.js';
import { CurationService, TableWriter } from '@/container/tokens.js';
import type { CurationService as CurationServiceClass } from '@/services/curation/core/CurationService.js';
import {
  OUTPUT_COLUMNS,
  type MeasurementRecord,
} from '@/services/curation/types.js';
import { PipelineError } from '@/types-global/errors.js';
import {
  logger,
  requestContextService,
  type ITableWriter,
} from '@/utils/index.js';

/**
 * Runs one curation and resolves to the process exit code. Nothing is written
 * unless every input loaded and merged successfully.
 */
export async function runCli(
  argv: readonly string[],
  appConfig: AppConfig = defaultConfig,
): Promise<number> {
  const context = requestContextService.createRequestContext('curate');

  try {
    const command = parseCliArgs(argv, appConfig);
    if (command.kind === 'help') {
      process.stdout.write(USAGE);
      return 0;
    }

    registerDependencies();
    const service = container.resolve<CurationServiceClass>(CurationService);
    const writer = container.resolve<ITableWriter>(TableWriter);

    const { records, report } = await service.curate(
      command.inputs,
      command.options,
      context,
    );

    await writer.writeTable<MeasurementRecord>(
      command.outCsv,
      OUTPUT_COLUMNS,
      records,
      context,
    );
    if (command.reportJson) {
      await writer.writeJson(command.reportJson, report, context);
    }

    logger.notice('Wrote curated table', {
      ...context,
      path: command.outCsv,
      rows: records.length,
    });
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Curation failed', {
      ...context,
      error,
      code: error instanceof PipelineError ? error.code : undefined,
    });
    process.stderr.write(`mhc-curate: ${message}\n`);
    return 1;
  }
}
