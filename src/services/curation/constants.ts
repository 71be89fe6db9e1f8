/**
 * @fileoverview Affinity constants shared by the source loaders.
 * @module src/services/curation/constants
 */
import type { MeasurementInequality } from './types.js';

export interface CensoredAffinity {
  /** Affinity in nM. */
  value: number;
  inequality: MeasurementInequality;
}

/**
 * Categorical binding calls mapped to censored nM affinities.
 */
export const QUALITATIVE_TO_AFFINITY: ReadonlyMap<string, CensoredAffinity> =
  new Map([
    ['Negative', { value: 5000.0, inequality: '>' }],
    ['Positive', { value: 500.0, inequality: '<' }],
    ['Positive-High', { value: 100.0, inequality: '<' }],
    ['Positive-Intermediate', { value: 1000.0, inequality: '<' }],
    ['Positive-Low', { value: 5000.0, inequality: '<' }],
  ]);

/**
 * Affinity assigned to every mass-spec hit.
 */
export const POSITIVE_AFFINITY: CensoredAffinity = {
  value: 500.0,
  inequality: '<',
};
