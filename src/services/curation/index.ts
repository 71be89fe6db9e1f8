/**
 * @fileoverview Barrel export for the curation service domain.
 * @module src/services/curation/index
 */

// Core
export type { ISourceLoader } from './core/ISourceLoader.js';
export { CurationService } from './core/CurationService.js';
export * from './core/merger.js';

// Alleles
export {
  AlleleNormalizer,
  type AlleleNormalization,
} from './alleles/alleleNormalizer.js';
export { AlleleParseError, formatAllele, parseAlleleName } from './alleles/alleleNames.js';

// Loaders
export { AbelinMassSpecLoader } from './loaders/abelinMassSpec.loader.js';
export { IedbLoader } from './loaders/iedb.loader.js';
export { Kim2014Loader } from './loaders/kim2014.loader.js';
export { SystemhcAtlasLoader } from './loaders/systemhcAtlas.loader.js';

// Types
export * from './types.js';
