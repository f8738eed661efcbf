import { FEATURE_NAMES } from '../types';
import type { DriftMethod } from '../config/env';
import { DriftInputError } from '../utils/app-error';
import { roundTo } from './decision-policy.service';

export type DatasetRow = Readonly<Record<string, unknown>>;

export interface FeatureDrift {
  feature: string;
  method: DriftMethod;
  statistic: number;
  /** Only the KS test yields a p-value. */
  pValue: number | null;
  threshold: number;
  drifted: boolean;
  referenceMean: number;
  currentMean: number;
}

/** Data-quality profile of one column of a batch; statistics are null without numeric cells. */
export interface ColumnQuality {
  column: string;
  count: number;
  /** Cells that are absent, blank or not a finite number. */
  missing: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  /** Sample standard deviation; null below two numeric cells. */
  std: number | null;
}

export interface DriftReport {
  method: DriftMethod;
  threshold: number;
  features: FeatureDrift[];
  quality: {
    reference: ColumnQuality[];
    current: ColumnQuality[];
  };
}

export interface DriftSummary {
  timestamp: string;
  referenceSize: number;
  currentSize: number;
  driftDetected: boolean;
  driftedFeatures: number;
  featureCount: number;
  /** Share of features that must drift before the dataset is flagged; 0 means any one. */
  driftShare: number;
  method: DriftMethod;
  report?: DriftReport;
}

export interface DriftOptions {
  method?: DriftMethod;
  /** p-value cut-off for ks, PSI floor for psi */
  threshold?: number;
  driftShare?: number;
  features?: readonly string[];
  includeReport?: boolean;
  now?: () => Date;
}

export const DEFAULT_THRESHOLDS: Record<DriftMethod, number> = {
  ks: 0.05,
  psi: 0.2,
};

const PSI_BINS = 10;
const PSI_EPSILON = 1e-4;

const ascending = (a: number, b: number) => a - b;

const mean = (values: readonly number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Kolmogorov distribution tail Q_KS(λ) = 2 Σ (-1)^(k-1) exp(-2k²λ²).
 * Returns 1 when the series does not settle (λ near 0).
 */
export function kolmogorovTail(lambda: number): number {
  const a2 = -2 * lambda * lambda;
  let fac = 2;
  let sum = 0;
  let previous = 0;
  for (let k = 1; k <= 100; k += 1) {
    const term = fac * Math.exp(a2 * k * k);
    sum += term;
    if (Math.abs(term) <= 0.001 * previous || Math.abs(term) <= 1e-8 * sum) {
      return Math.min(1, Math.max(0, sum));
    }
    fac = -fac;
    previous = Math.abs(term);
  }
  return 1;
}

/**
 * Two-sample Kolmogorov–Smirnov test with the asymptotic p-value.
 */
export function ksTwoSample(reference: readonly number[], current: readonly number[]): { statistic: number; pValue: number } {
  const a = [...reference].sort(ascending);
  const b = [...current].sort(ascending);
  const n = a.length;
  const m = b.length;

  let i = 0;
  let j = 0;
  let d = 0;
  while (i < n && j < m) {
    const value = Math.min(a[i], b[j]);
    // step past every tie so both empirical CDFs are evaluated at the same point
    while (i < n && a[i] === value) i += 1;
    while (j < m && b[j] === value) j += 1;
    d = Math.max(d, Math.abs(i / n - j / m));
  }

  const en = Math.sqrt((n * m) / (n + m));
  const pValue = kolmogorovTail((en + 0.12 + 0.11 / en) * d);
  return { statistic: d, pValue };
}

/** Bin edges at reference quantiles, deduplicated so constant features collapse to one bin. */
const quantileEdges = (sorted: readonly number[], bins: number): number[] => {
  const edges: number[] = [];
  for (let k = 1; k < bins; k += 1) {
    const edge = sorted[Math.min(sorted.length - 1, Math.floor((k * sorted.length) / bins))];
    if (edges[edges.length - 1] !== edge) edges.push(edge);
  }
  return edges;
};

const binShares = (values: readonly number[], edges: readonly number[]): number[] => {
  const counts = new Array<number>(edges.length + 1).fill(0);
  for (const value of values) {
    let bin = 0;
    while (bin < edges.length && value >= edges[bin]) bin += 1;
    counts[bin] += 1;
  }
  return counts.map((count) => count / values.length);
};

/**
 * Population stability index over reference-quantile bins.
 */
export function populationStabilityIndex(reference: readonly number[], current: readonly number[], bins = PSI_BINS): number {
  const edges = quantileEdges([...reference].sort(ascending), bins);
  const expected = binShares(reference, edges);
  const actual = binShares(current, edges);
  return expected.reduce((psi, e, k) => {
    const p = Math.max(e, PSI_EPSILON);
    const q = Math.max(actual[k], PSI_EPSILON);
    return psi + (q - p) * Math.log(q / p);
  }, 0);
}

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const profileColumn = (column: string, rows: readonly DatasetRow[]): ColumnQuality => {
  const values = rows.map((row) => row[column]).filter(isFiniteNumber);
  if (values.length === 0) {
    return { column, count: rows.length, missing: rows.length, min: null, max: null, mean: null, std: null };
  }
  const avg = mean(values);
  const variance = values.length > 1 ? values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1) : null;
  return {
    column,
    count: rows.length,
    missing: rows.length - values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    mean: roundTo(avg, 6),
    std: variance === null ? null : roundTo(Math.sqrt(variance), 6),
  };
};

/**
 * Per-column quality profile: the monitored features first, then any other column
 * holding at least one numeric cell (identifiers and free text are left out).
 */
export function profileBatch(rows: readonly DatasetRow[], features: readonly string[] = FEATURE_NAMES): ColumnQuality[] {
  const extra = new Set<string>();
  for (const row of rows) {
    for (const [column, value] of Object.entries(row)) {
      if (!features.includes(column) && isFiniteNumber(value)) extra.add(column);
    }
  }
  return [...features, ...extra].map((column) => profileColumn(column, rows));
}

const extractColumns = (label: string, rows: readonly DatasetRow[], features: readonly string[]): Map<string, number[]> => {
  if (rows.length === 0) {
    throw new DriftInputError(`${label} dataset is empty`);
  }
  const columns = new Map<string, number[]>(features.map((feature) => [feature, []]));
  rows.forEach((row, index) => {
    for (const feature of features) {
      if (!(feature in row)) {
        throw new DriftInputError(`${label} row ${index} is missing feature "${feature}"`);
      }
      const value = row[feature];
      if (!isFiniteNumber(value)) {
        throw new DriftInputError(`${label} row ${index} has a non-numeric value for "${feature}"`);
      }
      columns.get(feature)?.push(value);
    }
  });
  return columns;
};

const compareFeature = (
  feature: string,
  reference: readonly number[],
  current: readonly number[],
  method: DriftMethod,
  threshold: number
): FeatureDrift => {
  const base = {
    feature,
    method,
    threshold,
    referenceMean: roundTo(mean(reference), 6),
    currentMean: roundTo(mean(current), 6),
  };
  if (method === 'psi') {
    const statistic = populationStabilityIndex(reference, current);
    return { ...base, statistic: roundTo(statistic, 6), pValue: null, drifted: statistic >= threshold };
  }
  const { statistic, pValue } = ksTwoSample(reference, current);
  return { ...base, statistic: roundTo(statistic, 6), pValue, drifted: pValue < threshold };
};

/**
 * Compares every numeric feature of the current batch against the reference batch.
 * Empty batches, missing features and non-numeric cells raise DriftInputError.
 */
export function detectDrift(reference: readonly DatasetRow[], current: readonly DatasetRow[], options: DriftOptions = {}): DriftSummary {
  const method = options.method ?? 'ks';
  const threshold = options.threshold ?? DEFAULT_THRESHOLDS[method];
  const driftShare = options.driftShare ?? 0;
  const features = options.features ?? FEATURE_NAMES;

  if (features.length === 0) {
    throw new DriftInputError('No features selected for drift detection');
  }
  if (!(driftShare >= 0 && driftShare <= 1)) {
    throw new DriftInputError(`Drift share must be within [0, 1], got ${driftShare}`);
  }

  const referenceColumns = extractColumns('Reference', reference, features);
  const currentColumns = extractColumns('Current', current, features);

  const results = features.map((feature) =>
    compareFeature(feature, referenceColumns.get(feature) ?? [], currentColumns.get(feature) ?? [], method, threshold)
  );

  const driftedFeatures = results.filter((result) => result.drifted).length;
  const required = Math.max(1, Math.ceil(driftShare * features.length));

  return {
    timestamp: (options.now ?? (() => new Date()))().toISOString(),
    referenceSize: reference.length,
    currentSize: current.length,
    driftDetected: driftedFeatures >= required,
    driftedFeatures,
    featureCount: features.length,
    driftShare,
    method,
    ...(options.includeReport === false
      ? {}
      : {
          report: {
            method,
            threshold,
            features: results,
            quality: { reference: profileBatch(reference, features), current: profileBatch(current, features) },
          },
        }),
  };
}
