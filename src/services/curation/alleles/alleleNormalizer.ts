/**
 * @fileoverview Injectable allele normalizer returning an explicit
 * canonical/unparseable result instead of a sentinel string.
 * @module src/services/curation/alleles/alleleNormalizer
 */
import { injectable } from 'tsyringe';

import { UNKNOWN_ALLELE } from '../types.js';
import { formatAllele, parseAlleleName } from './alleleNames.js';

export type AlleleNormalization =
  | { readonly kind: 'canonical'; readonly name: string }
  | { readonly kind: 'unparseable'; readonly raw: string; readonly reason: string };

/**
 * Canonicalizes allele names, memoizing per raw spelling since source files
 * repeat the same handful of names across thousands of rows.
 */
@injectable()
export class AlleleNormalizer {
  private readonly cache = new Map<string, AlleleNormalization>();

  classify(raw: string): AlleleNormalization {
    const cached = this.cache.get(raw);
    if (cached) return cached;

    let result: AlleleNormalization;
    try {
      result = { kind: 'canonical', name: formatAllele(parseAlleleName(raw)) };
    } catch (error) {
      result = {
        kind: 'unparseable',
        raw,
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    this.cache.set(raw, result);
    return result;
  }

  /**
   * Sentinel form of {@link classify}: the canonical name, or `"UNKNOWN"`.
   */
  normalize(raw: string): string {
    const result = this.classify(raw);
    return result.kind === 'canonical' ? result.name : UNKNOWN_ALLELE;
  }
}
