import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { FEATURE_NAMES } from '../types';
import type { FeatureVector } from '../types';
import { ModelUnavailableError } from '../utils/app-error';
import { logger } from '../utils/logger';

/**
 * The only capability the decision pipeline needs from a trained model.
 * `featureContributions` is optional; attribution explanations require it.
 */
export interface ScoringModel {
  readonly version: string;
  predictDefaultProbability(features: FeatureVector): number;
  featureContributions?(features: FeatureVector): number[];
}

const featureCount = FEATURE_NAMES.length;

const weights = z.array(z.number().finite()).length(featureCount);

export const modelArtifactSchema = z.object({
  type: z.literal('logistic_regression'),
  version: z.string().min(1),
  features: z.array(z.string()).length(featureCount),
  intercept: z.number().finite(),
  coefficients: weights,
  means: weights,
  scales: z.array(z.number().finite().positive()).length(featureCount),
});

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;

const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

/**
 * Standardised logistic model: p = sigmoid(b0 + Σ b_i · (x_i − μ_i) / σ_i).
 * Contributions are the per-feature log-odds terms of that sum.
 */
export class LogisticScoringModel implements ScoringModel {
  readonly version: string;
  private readonly artifact: ModelArtifact;

  constructor(artifact: ModelArtifact, versionOverride?: string) {
    const mismatch = artifact.features.findIndex((name, i) => name !== FEATURE_NAMES[i]);
    if (mismatch !== -1) {
      throw new ModelUnavailableError(
        `Model feature order mismatch at position ${mismatch}: expected "${FEATURE_NAMES[mismatch]}", got "${artifact.features[mismatch]}"`
      );
    }
    this.artifact = artifact;
    this.version = versionOverride || artifact.version;
  }

  featureContributions(features: FeatureVector): number[] {
    const { coefficients, means, scales } = this.artifact;
    return coefficients.map((coef, i) => (coef * (features[i] - means[i])) / scales[i]);
  }

  predictDefaultProbability(features: FeatureVector): number {
    const logit = this.featureContributions(features).reduce((sum, c) => sum + c, this.artifact.intercept);
    return sigmoid(logit);
  }
}

/**
 * Reads and validates a model artifact. Any failure is a ModelUnavailableError.
 */
export async function loadModelArtifact(modelPath: string, versionOverride?: string): Promise<ScoringModel> {
  const resolved = path.resolve(modelPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelUnavailableError(`Could not read model artifact at ${resolved}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ModelUnavailableError(`Model artifact at ${resolved} is not valid JSON`);
  }

  const parsed = modelArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ModelUnavailableError(
      `Model artifact at ${resolved} is malformed: ${first ? `${first.path.join('.')} ${first.message}` : 'unknown shape'}`
    );
  }

  const model = new LogisticScoringModel(parsed.data, versionOverride);
  logger.success(`Model ${model.version} loaded from ${resolved}`);
  return model;
}

/**
 * Holds the model loaded at startup. A null model makes every prediction fail with ModelUnavailableError.
 */
export class ScoringAdapter {
  constructor(private readonly model: ScoringModel | null) {}

  get isLoaded(): boolean {
    return this.model !== null;
  }

  get modelVersion(): string | null {
    return this.model?.version ?? null;
  }

  /** The loaded model; throws when none is loaded. */
  requireModel(): ScoringModel {
    if (!this.model) {
      throw new ModelUnavailableError();
    }
    return this.model;
  }

  predict(features: FeatureVector): number {
    const probability = this.requireModel().predictDefaultProbability(features);
    if (Number.isNaN(probability)) {
      throw new ModelUnavailableError('Model returned a non-numeric probability');
    }
    return Math.min(1, Math.max(0, probability));
  }
}
