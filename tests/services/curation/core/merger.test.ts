/**
 * @fileoverview Unit tests for the cross-source merge.
 * @module tests/services/curation/core/merger.test
 */
import { describe, expect, it } from 'vitest';

import {
  applySuppression,
  dropDuplicateMeasurements,
  finalizeRecords,
  mergeSources,
  orderByPrecedence,
  type SourceOutput,
} from '@/services/curation/core/merger.js';
import {
  MeasurementType,
  SourceName,
  type StagedRecord,
} from '@/services/curation/types.js';

function record(overrides: Partial<StagedRecord> = {}): StagedRecord {
  return {
    allele: 'HLA-A*02:01',
    peptide: 'SLLMWITQC',
    measurementValue: 500,
    measurementInequality: '<',
    measurementType: MeasurementType.QUALITATIVE,
    measurementSource: 'test',
    originalAllele: 'HLA-A*02:01',
    ...overrides,
  };
}

function output(source: SourceName, records: StagedRecord[]): SourceOutput {
  return { source, records };
}

describe('orderByPrecedence', () => {
  it('orders outputs IEDB, Kim2014, SystemHC-Atlas, Abelin and keeps file order within a source', () => {
    const ordered = orderByPrecedence([
      output(SourceName.ABELIN_MASS_SPEC, []),
      output(SourceName.KIM2014, [record({ peptide: 'AAAAAAAAA' })]),
      output(SourceName.SYSTEMHC_ATLAS, []),
      output(SourceName.KIM2014, [record({ peptide: 'CCCCCCCCC' })]),
      output(SourceName.IEDB, []),
    ]);

    expect(ordered.map((entry) => entry.source)).toEqual([
      SourceName.IEDB,
      SourceName.KIM2014,
      SourceName.KIM2014,
      SourceName.SYSTEMHC_ATLAS,
      SourceName.ABELIN_MASS_SPEC,
    ]);
    expect(ordered[1]?.records[0]?.peptide).toBe('AAAAAAAAA');
    expect(ordered[2]?.records[0]?.peptide).toBe('CCCCCCCCC');
  });
});

describe('applySuppression', () => {
  it('drops Kim2014 pairs already measured by any IEDB file', () => {
    const { outputs, suppressed } = applySuppression([
      output(SourceName.IEDB, [record({ measurementValue: 30 })]),
      output(SourceName.IEDB, [record({ peptide: 'GILGFVFTL' })]),
      output(SourceName.KIM2014, [
        record({ measurementValue: 12.3 }),
        record({ peptide: 'LLFGYPVYV' }),
        record({ peptide: 'GILGFVFTL', measurementValue: 7 }),
      ]),
    ]);

    expect(suppressed).toBe(2);
    expect(outputs[2]?.records.map((entry) => entry.peptide)).toEqual([
      'LLFGYPVYV',
    ]);
  });

  it('leaves Kim2014 untouched without IEDB data', () => {
    const kim = output(SourceName.KIM2014, [record()]);
    const { outputs, suppressed } = applySuppression([kim]);

    expect(suppressed).toBe(0);
    expect(outputs).toEqual([kim]);
  });

  it('does not suppress mass-spec sources', () => {
    const { suppressed } = applySuppression([
      output(SourceName.IEDB, [record()]),
      output(SourceName.ABELIN_MASS_SPEC, [record()]),
    ]);

    expect(suppressed).toBe(0);
  });
});

describe('dropDuplicateMeasurements', () => {
  it('keeps the first record per (allele, peptide, value)', () => {
    const first = record({ measurementSource: 'first' });
    const unique = dropDuplicateMeasurements([
      first,
      record({ measurementSource: 'second' }),
      record({ measurementValue: 100 }),
    ]);

    expect(unique).toHaveLength(2);
    expect(unique[0]).toBe(first);
  });

  it('treats missing values as equal', () => {
    const unique = dropDuplicateMeasurements([
      record({ measurementValue: null }),
      record({ measurementValue: null }),
    ]);

    expect(unique).toHaveLength(1);
  });
});

describe('finalizeRecords', () => {
  it('sorts by allele then peptide using code-unit order', () => {
    const { records } = finalizeRecords([
      record({ allele: 'HLA-B*07:02', peptide: 'AAAAAAAAA' }),
      record({ allele: 'HLA-A*02:01', peptide: 'YLLPAIVHI' }),
      record({ allele: 'H-2-Kb', peptide: 'SIINFEKL' }),
      record({ allele: 'HLA-A*02:01', peptide: 'GILGFVFTL' }),
    ]);

    expect(records.map((entry) => `${entry.allele} ${entry.peptide}`)).toEqual([
      'H-2-Kb SIINFEKL',
      'HLA-A*02:01 GILGFVFTL',
      'HLA-A*02:01 YLLPAIVHI',
      'HLA-B*07:02 AAAAAAAAA',
    ]);
  });

  it('drops incomplete rows and non-canonical peptides', () => {
    const result = finalizeRecords([
      record(),
      record({ peptide: 'GILGFVFTL', measurementValue: null }),
      record({ peptide: 'LLFGYPVYV', measurementInequality: null }),
      record({ peptide: 'NLVPMVATV', measurementSource: '' }),
      record({ peptide: 'SLLM(ox)WITQC' }),
    ]);

    expect(result.records).toEqual([record()]);
    expect(result.droppedIncomplete).toBe(3);
    expect(result.droppedNonCanonicalPeptide).toBe(1);
  });

  it('emits exactly the seven output fields', () => {
    const extended = { ...record(), scratch: 'ignored' };
    const { records } = finalizeRecords([extended]);

    expect(Object.keys(records[0] ?? {})).toEqual([
      'allele',
      'peptide',
      'measurementValue',
      'measurementInequality',
      'measurementType',
      'measurementSource',
      'originalAllele',
    ]);
  });
});

describe('mergeSources', () => {
  it('lets an earlier source win a tie on (allele, peptide, value)', () => {
    const { records, diagnostics } = mergeSources([
      output(SourceName.ABELIN_MASS_SPEC, [
        record({ measurementSource: 'abelin-mass-spec' }),
      ]),
      output(SourceName.IEDB, [record({ measurementSource: 'Sidney - assay' })]),
    ]);

    expect(records).toEqual([record({ measurementSource: 'Sidney - assay' })]);
    expect(diagnostics).toEqual({
      suppressedByPrecedence: 0,
      combined: 2,
      duplicatesRemoved: 1,
      droppedIncomplete: 0,
      droppedNonCanonicalPeptide: 0,
      final: 1,
    });
  });

  it('keeps a Kim2014 reading and a mass-spec hit for the same pair when values differ', () => {
    const { records } = mergeSources([
      output(SourceName.KIM2014, [
        record({
          measurementValue: 12.3,
          measurementInequality: '=',
          measurementType: MeasurementType.QUANTITATIVE,
          measurementSource: 'kim2014',
        }),
      ]),
      output(SourceName.SYSTEMHC_ATLAS, [
        record({ measurementSource: 'systemhc-atlas' }),
      ]),
    ]);

    expect(
      records.map((entry) => [entry.measurementSource, entry.measurementValue]),
    ).toEqual([
      ['kim2014', 12.3],
      ['systemhc-atlas', 500],
    ]);
  });
});
