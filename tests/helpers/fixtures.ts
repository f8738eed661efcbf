import type { ScoringModel } from '../../services/scoring.service';
import type { ModelArtifact } from '../../services/scoring.service';
import { FEATURE_NAMES } from '../../types';
import type { Application } from '../../types';

export const baseApplication: Application = {
  applicant_id: 'APP_TEST_001',
  age: 35,
  annual_income: 65000,
  debt_to_income_ratio: 0.35,
  num_credit_lines: 5,
  num_late_payments: 1,
  credit_utilization: 0.45,
  months_since_last_delinquency: 24,
  num_credit_inquiries: 2,
  purchase_amount: 3500,
};

export const withFields = (overrides: Partial<Application>): Application => ({ ...baseApplication, ...overrides });

/** Model that ignores its input and always answers the same probability. */
export const fixedProbabilityModel = (probability: number, version = 'test-model'): ScoringModel => ({
  version,
  predictDefaultProbability: () => probability,
});

export const testArtifact: ModelArtifact = {
  type: 'logistic_regression',
  version: '2.0.0-test',
  features: [...FEATURE_NAMES],
  intercept: -1.6,
  coefficients: [-0.3, -0.5, 0.8, -0.1, 0.9, 0.7, -0.3, 0.4, 0.2],
  means: [42, 60000, 0.35, 6, 1, 0.4, 30, 2, 2500],
  scales: [12, 25000, 0.2, 3, 1.5, 0.25, 20, 1.5, 1500],
};

export const fixedClock = (iso = '2024-01-30T10:00:00.000Z') => () => new Date(iso);

/** Clock that advances one second per call. */
export const tickingClock = (startIso = '2024-01-30T10:00:00.000Z') => {
  let current = new Date(startIso).getTime();
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
};
