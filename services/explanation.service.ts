import { FEATURE_NAMES } from '../types';
import type { ExplanationFactor, FeatureName, FeatureVector } from '../types';
import type { ScoringModel } from './scoring.service';

export const MAX_FACTORS = 3;

export interface Explainer {
  readonly mode: 'heuristic' | 'attribution';
  explain(features: FeatureVector): ExplanationFactor[];
}

const featureIndex = (name: FeatureName) => FEATURE_NAMES.indexOf(name);

interface BandRule {
  feature: FeatureName;
  /** Triggers the negative factor when the value is above this. */
  high: { above: number; factor: string };
  /** Triggers the positive factor; checked only when the negative one did not fire. */
  low: { matches: (value: number) => boolean; factor: string };
}

/** Priority order: earlier rules win the limited slots. */
const HEURISTIC_RULES: readonly BandRule[] = [
  {
    feature: 'debt_to_income_ratio',
    high: { above: 0.5, factor: 'High debt-to-income ratio' },
    low: { matches: (v) => v < 0.3, factor: 'Low debt-to-income ratio' },
  },
  {
    feature: 'num_late_payments',
    high: { above: 2, factor: 'Multiple late payments' },
    low: { matches: (v) => v === 0, factor: 'No late payments' },
  },
  {
    feature: 'credit_utilization',
    high: { above: 0.7, factor: 'High credit utilization' },
    low: { matches: (v) => v < 0.3, factor: 'Low credit utilization' },
  },
];

/**
 * Fixed rule checks on debt-to-income, late payments and utilization.
 */
export class HeuristicExplainer implements Explainer {
  readonly mode = 'heuristic' as const;

  explain(features: FeatureVector): ExplanationFactor[] {
    const factors: ExplanationFactor[] = [];
    for (const rule of HEURISTIC_RULES) {
      const value = features[featureIndex(rule.feature)];
      if (value > rule.high.above) {
        factors.push({ factor: rule.high.factor, feature: rule.feature, value, impact: 'negative' });
      } else if (rule.low.matches(value)) {
        factors.push({ factor: rule.low.factor, feature: rule.feature, value, impact: 'positive' });
      }
    }
    return factors.slice(0, MAX_FACTORS);
  }
}

export const FEATURE_LABELS: Record<FeatureName, string> = {
  age: 'Age',
  annual_income: 'Annual income',
  debt_to_income_ratio: 'Debt-to-income ratio',
  num_credit_lines: 'Number of credit lines',
  num_late_payments: 'Late payments',
  credit_utilization: 'Credit utilization',
  months_since_last_delinquency: 'Months since last delinquency',
  num_credit_inquiries: 'Credit inquiries',
  purchase_amount: 'Purchase amount',
};

const round4 = (value: number) => Math.round(value * 10000) / 10000;

/**
 * Ranks features by the absolute size of their contribution to the model's log-odds.
 * A positive contribution pushes the default probability up, so its impact is negative for the applicant.
 */
export class AttributionExplainer implements Explainer {
  readonly mode = 'attribution' as const;
  private readonly contributions: (features: FeatureVector) => number[];

  constructor(model: ScoringModel, private readonly minContribution = 0.05) {
    const contribute = model.featureContributions?.bind(model);
    if (!contribute) {
      throw new Error(`Model ${model.version} does not expose feature contributions; use heuristic explanations`);
    }
    this.contributions = contribute;
  }

  explain(features: FeatureVector): ExplanationFactor[] {
    return this.contributions(features)
      .map((contribution, index) => ({ contribution, index }))
      .filter(({ contribution }) => Math.abs(contribution) >= this.minContribution)
      .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution) || a.index - b.index)
      .slice(0, MAX_FACTORS)
      .map(({ contribution, index }): ExplanationFactor => {
        const feature = FEATURE_NAMES[index];
        const increases = contribution > 0;
        return {
          factor: `${FEATURE_LABELS[feature]} ${increases ? 'increases' : 'decreases'} risk`,
          feature,
          value: features[index],
          impact: increases ? 'negative' : 'positive',
          contribution: round4(contribution),
        };
      });
  }
}

/**
 * Attribution needs a loaded model that exposes contributions; otherwise the heuristic rules are used.
 */
export function createExplainer(
  mode: Explainer['mode'],
  model: ScoringModel | null,
  minContribution?: number
): Explainer {
  if (mode === 'attribution' && model?.featureContributions) {
    return new AttributionExplainer(model, minContribution);
  }
  return new HeuristicExplainer();
}
