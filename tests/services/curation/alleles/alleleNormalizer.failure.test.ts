/**
 * @fileoverview AlleleNormalizer behaviour when the parser fails with
 * something other than an AlleleParseError.
 * @module tests/services/curation/alleles/alleleNormalizer.failure.test
 */
import { describe, expect, it, vi } from 'vitest';

import { AlleleNormalizer } from '@/services/curation/alleles/alleleNormalizer.js';

vi.mock('@/services/curation/alleles/alleleNames.js', async (importOriginal) => {
  const actual =
    await importOriginal<
      typeof import('@/services/curation/alleles/alleleNames.js')
    >();
  return {
    ...actual,
    parseAlleleName: (raw: string) => {
      if (raw === 'HLA-A*99:99') throw new RangeError('lookup failed');
      if (raw === 'HLA-A*99:98') throw 'bare failure';
      return actual.parseAlleleName(raw);
    },
  };
});

describe('AlleleNormalizer with unexpected parser failures', () => {
  it('classifies any thrown error as unparseable', () => {
    const normalizer = new AlleleNormalizer();

    expect(normalizer.classify('HLA-A*99:99')).toEqual({
      kind: 'unparseable',
      raw: 'HLA-A*99:99',
      reason: 'lookup failed',
    });
    expect(normalizer.classify('HLA-A*99:98')).toEqual({
      kind: 'unparseable',
      raw: 'HLA-A*99:98',
      reason: 'bare failure',
    });
  });

  it('maps them to the UNKNOWN sentinel without throwing', () => {
    const normalizer = new AlleleNormalizer();

    expect(normalizer.normalize('HLA-A*99:99')).toBe('UNKNOWN');
    expect(normalizer.normalize('HLA-A0201')).toBe('HLA-A*02:01');
  });
});
