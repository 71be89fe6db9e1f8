/**
 * @fileoverview Injection tokens for the dependency container.
 * @module src/container/tokens
 */

export const AlleleNormalizer = Symbol('AlleleNormalizer');
export const TableReader = Symbol('TableReader');
export const TableWriter = Symbol('TableWriter');

export const IedbSourceLoader = Symbol('IedbSourceLoader');
export const Kim2014SourceLoader = Symbol('Kim2014SourceLoader');
export const SystemhcAtlasSourceLoader = Symbol('SystemhcAtlasSourceLoader');
export const AbelinMassSpecSourceLoader = Symbol('AbelinMassSpecSourceLoader');

export const CurationService = Symbol('CurationService');
