/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export * from './internal/logger.js';
export * from './internal/requestContext.js';
export * from './io/tableReader.js';
export * from './io/tableWriter.js';
