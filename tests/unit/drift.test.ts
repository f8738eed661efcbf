import { describe, expect, it } from 'vitest';
import {
  detectDrift,
  kolmogorovTail,
  ksTwoSample,
  populationStabilityIndex,
  profileBatch,
} from '../../services/drift.service';
import type { DatasetRow } from '../../services/drift.service';
import { DriftInputError } from '../../utils/app-error';
import { FEATURE_NAMES } from '../../types';
import { fixedClock } from '../helpers/fixtures';

/** 100 rows where every feature takes the values offset..offset+99. */
const rows = (incomeOffset = 0): DatasetRow[] =>
  Array.from({ length: 100 }, (_, i) => {
    const row: Record<string, number> = {};
    for (const feature of FEATURE_NAMES) row[feature] = i;
    row.annual_income = i + incomeOffset;
    return row;
  });

describe('ksTwoSample', () => {
  it('gives D = 0 and p = 1 for identical samples', () => {
    const sample = [3, 1, 2, 2, 5, 4];
    expect(ksTwoSample(sample, [...sample])).toEqual({ statistic: 0, pValue: 1 });
  });

  it('measures the largest gap between the empirical CDFs', () => {
    const reference = Array.from({ length: 100 }, (_, i) => i);
    const shifted = reference.map((v) => v + 50);
    const { statistic, pValue } = ksTwoSample(reference, shifted);
    expect(statistic).toBe(0.5);
    expect(pValue).toBeLessThan(1e-6);
  });

  it('handles ties across samples', () => {
    expect(ksTwoSample([1, 1, 2, 2], [1, 2, 2, 2]).statistic).toBe(0.25);
  });
});

describe('kolmogorovTail', () => {
  it('is 1 at zero and falls towards 0', () => {
    expect(kolmogorovTail(0)).toBe(1);
    expect(kolmogorovTail(1)).toBeCloseTo(0.27, 2);
    expect(kolmogorovTail(3)).toBeLessThan(1e-6);
  });
});

describe('populationStabilityIndex', () => {
  it('is 0 for identical samples and large for a shifted one', () => {
    const reference = Array.from({ length: 200 }, (_, i) => i);
    expect(populationStabilityIndex(reference, reference)).toBe(0);
    expect(populationStabilityIndex(reference, reference.map((v) => v + 150))).toBeGreaterThan(0.2);
  });

  it('copes with a constant feature', () => {
    expect(populationStabilityIndex([1, 1, 1], [1, 1])).toBe(0);
  });
});

describe('detectDrift', () => {
  it('reports no drift for identical distributions', () => {
    const summary = detectDrift(rows(), rows(), { now: fixedClock() });
    expect(summary).toMatchObject({
      timestamp: '2024-01-30T10:00:00.000Z',
      referenceSize: 100,
      currentSize: 100,
      driftDetected: false,
      driftedFeatures: 0,
      featureCount: 9,
      method: 'ks',
    });
    expect(summary.report?.features.every((feature) => !feature.drifted)).toBe(true);
  });

  it('flags the one feature whose mean moved', () => {
    const summary = detectDrift(rows(), rows(50));
    expect(summary.driftDetected).toBe(true);
    expect(summary.driftedFeatures).toBe(1);
    const income = summary.report?.features.find((feature) => feature.feature === 'annual_income');
    expect(income).toMatchObject({ drifted: true, statistic: 0.5, referenceMean: 49.5, currentMean: 99.5, threshold: 0.05 });
  });

  it('agrees under PSI', () => {
    expect(detectDrift(rows(), rows(), { method: 'psi' }).driftDetected).toBe(false);
    const shifted = detectDrift(rows(), rows(80), { method: 'psi' });
    expect(shifted.driftDetected).toBe(true);
    expect(shifted.report?.threshold).toBe(0.2);
    expect(shifted.report?.features.find((f) => f.feature === 'annual_income')?.pValue).toBeNull();
  });

  it('needs the configured share of features before flagging the dataset', () => {
    expect(detectDrift(rows(), rows(50), { driftShare: 0.5 }).driftDetected).toBe(false);
    expect(detectDrift(rows(), rows(50), { driftShare: 0.1 }).driftDetected).toBe(true);
  });

  it('omits the report on request', () => {
    expect(detectDrift(rows(), rows(), { includeReport: false }).report).toBeUndefined();
  });

  it('rejects empty and mismatched inputs', () => {
    expect(() => detectDrift([], rows())).toThrow(DriftInputError);
    expect(() => detectDrift(rows(), [])).toThrow(/Current dataset is empty/);

    const missing = rows().map(({ age: _age, ...rest }) => rest);
    expect(() => detectDrift(rows(), missing)).toThrow(/missing feature "age"/);

    const nonNumeric = rows();
    nonNumeric[3] = { ...nonNumeric[3], credit_utilization: 'high' };
    expect(() => detectDrift(rows(), nonNumeric)).toThrow(/row 3 has a non-numeric value for "credit_utilization"/);

    expect(() => detectDrift(rows(), rows(), { driftShare: 2 })).toThrow(DriftInputError);
  });
});

describe('profileBatch', () => {
  it('profiles monitored features and other numeric columns', () => {
    const batch: DatasetRow[] = [
      { applicant_id: 'A', age: 20, default_risk: 1 },
      { applicant_id: 'B', age: 30, default_risk: Number.NaN },
      { applicant_id: 'C', age: 40, default_risk: 3 },
    ];

    expect(profileBatch(batch, ['age'])).toEqual([
      { column: 'age', count: 3, missing: 0, min: 20, max: 40, mean: 30, std: 10 },
      { column: 'default_risk', count: 3, missing: 1, min: 1, max: 3, mean: 2, std: 1.414214 },
    ]);
  });

  it('reports a column without numeric cells as all missing', () => {
    expect(profileBatch([{ age: 'n/a' }, {}], ['age'])).toEqual([
      { column: 'age', count: 2, missing: 2, min: null, max: null, mean: null, std: null },
    ]);
  });

  it('leaves the spread empty below two values', () => {
    expect(profileBatch([{ age: 42 }], ['age'])[0]).toMatchObject({ mean: 42, std: null });
  });

  it('is part of the drift report for both batches', () => {
    const summary = detectDrift(rows(), rows(50));
    expect(summary.report?.quality.reference.map((column) => column.column)).toEqual([...FEATURE_NAMES]);
    expect(summary.report?.quality.current.find((column) => column.column === 'annual_income')).toMatchObject({
      count: 100,
      missing: 0,
      min: 50,
      max: 149,
      mean: 99.5,
    });
  });
});
