/**
 * @fileoverview Registers the curation services with the tsyringe container.
 * @module src/container/index
 */
import 'reflect-metadata';
import { container, type DependencyContainer } from 'tsyringe';

import {
  AbelinMassSpecSourceLoader,
  AlleleNormalizer,
  CurationService,
  IedbSourceLoader,
  Kim2014SourceLoader,
  SystemhcAtlasSourceLoader,
  TableReader,
  TableWriter,
} from './tokens.js';
import { AlleleNormalizer as AlleleNormalizerClass } from '@/services/curation/alleles/alleleNormalizer.js';
import { CurationService as CurationServiceClass } from '@/services/curation/core/CurationService.js';
import { AbelinMassSpecLoader } from '@/services/curation/loaders/abelinMassSpec.loader.js';
import { IedbLoader } from '@/services/curation/loaders/iedb.loader.js';
import { Kim2014Loader } from '@/services/curation/loaders/kim2014.loader.js';
import { SystemhcAtlasLoader } from '@/services/curation/loaders/systemhcAtlas.loader.js';
import { CsvTableReader } from '@/utils/io/tableReader.js';
import { CsvTableWriter } from '@/utils/io/tableWriter.js';

let registered = false;

/**
 * Binds every token once. Safe to call repeatedly.
 */
export function registerDependencies(
  target: DependencyContainer = container,
): DependencyContainer {
  if (registered && target === container) return target;

  target.registerSingleton(AlleleNormalizer, AlleleNormalizerClass);
  target.registerSingleton(TableReader, CsvTableReader);
  target.registerSingleton(TableWriter, CsvTableWriter);

  target.registerSingleton(IedbSourceLoader, IedbLoader);
  target.registerSingleton(Kim2014SourceLoader, Kim2014Loader);
  target.registerSingleton(SystemhcAtlasSourceLoader, SystemhcAtlasLoader);
  target.registerSingleton(AbelinMassSpecSourceLoader, AbelinMassSpecLoader);

  target.registerSingleton(CurationService, CurationServiceClass);

  if (target === container) registered = true;
  return target;
}

export { container };
