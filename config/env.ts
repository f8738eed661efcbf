import dotenv from 'dotenv';
import { logger } from '../utils/logger';

dotenv.config();

export type ExplanationMode = 'heuristic' | 'attribution';
export type ConfidencePolicy = 'distance' | 'approval';
export type DriftMethod = 'ks' | 'psi';

const pickEnum = <T extends string>(key: string, allowed: readonly T[], fallback: T): T => {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find((value) => value === raw.toLowerCase());
  if (!match) {
    logger.warn(`${key}="${raw}" is not one of ${allowed.join(', ')}; using "${fallback}"`);
    return fallback;
  }
  return match;
};

const pickNumber = (key: string, fallback: number): number => {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`${key}="${raw}" is not a number; using ${fallback}`);
    return fallback;
  }
  return value;
};

const env = {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: pickNumber('PORT', 5000),
    MONGO_URI: process.env.MONGO_URI || '',
    MODEL_PATH: process.env.MODEL_PATH || 'artifacts/credit_model.json',
    // Overrides the version tag stored in the artifact
    MODEL_VERSION: process.env.MODEL_VERSION || '',
    EXPLANATION_MODE: pickEnum<ExplanationMode>('EXPLANATION_MODE', ['heuristic', 'attribution'], 'heuristic'),
    ATTRIBUTION_MIN_CONTRIBUTION: pickNumber('ATTRIBUTION_MIN_CONTRIBUTION', 0.05),
    CONFIDENCE_POLICY: pickEnum<ConfidencePolicy>('CONFIDENCE_POLICY', ['distance', 'approval'], 'distance'),
    RECORD_QUEUE_LIMIT: pickNumber('RECORD_QUEUE_LIMIT', 1000),
    drift: {
        METHOD: pickEnum<DriftMethod>('DRIFT_METHOD', ['ks', 'psi'], 'ks'),
        // Unset means the method's own default (0.05 p-value for ks, 0.2 for psi)
        THRESHOLD: process.env.DRIFT_THRESHOLD ? pickNumber('DRIFT_THRESHOLD', 0.05) : undefined,
        SHARE: pickNumber('DRIFT_SHARE', 0),
        REFERENCE_PATH: process.env.DRIFT_REFERENCE_PATH || 'data/train_reference.csv',
        CURRENT_PATH: process.env.DRIFT_CURRENT_PATH || 'data/current.csv',
        OUTPUT_DIR: process.env.DRIFT_OUTPUT_DIR || 'monitoring',
    },
}

export type Env = typeof env;

export default env;
