import { DECLINE_REASON, MAX_CREDIT_SCORE, TIER_BANDS } from '../config/credit-policy';
import type { LoanTerms, Tier } from '../types';

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

/**
 * Integer score on the 0-850 scale, non-increasing in the default probability.
 */
export function toCreditScore(defaultProbability: number): number {
  if (Number.isNaN(defaultProbability) || defaultProbability < 0 || defaultProbability > 1) {
    throw new RangeError(`Default probability must be within [0, 1], got ${defaultProbability}`);
  }
  const score = Math.round((1 - defaultProbability) * MAX_CREDIT_SCORE);
  return Math.min(MAX_CREDIT_SCORE, Math.max(0, score));
}

const findBand = (creditScore: number) => TIER_BANDS.find((band) => creditScore >= band.minScore);

export function classifyTier(creditScore: number): Tier {
  return findBand(creditScore)?.tier ?? 'High Risk';
}

/**
 * Loan terms for a score. The purchase amount only scales the monthly payment.
 */
export function assignTerms(creditScore: number, purchaseAmount: number): LoanTerms {
  const band = findBand(creditScore);
  if (!band) {
    return { approved: false, tier: 'High Risk', reason: DECLINE_REASON };
  }
  return {
    approved: true,
    tier: band.tier,
    termMonths: band.termMonths,
    apr: band.apr,
    monthlyPayment: roundTo((purchaseAmount * (1 + band.apr / 100)) / band.termMonths, 2),
  };
}

export interface PolicyOutcome {
  creditScore: number;
  tier: Tier;
  terms: LoanTerms;
}

export function applyPolicy(defaultProbability: number, purchaseAmount: number): PolicyOutcome {
  const creditScore = toCreditScore(defaultProbability);
  const terms = assignTerms(creditScore, purchaseAmount);
  return { creditScore, tier: terms.tier, terms };
}
