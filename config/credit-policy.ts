import type { ApprovedTier } from '../types';

/** Top of the credit score scale; a zero default probability maps here. */
export const MAX_CREDIT_SCORE = 850;

/** Scores below this are declined. */
export const MIN_APPROVAL_SCORE = 550;

export const DECLINE_REASON = `Credit score below minimum threshold (${MIN_APPROVAL_SCORE})`;

export interface TierBand {
  tier: ApprovedTier;
  minScore: number;
  termMonths: number;
  /** Annual percentage rate, in percent. */
  apr: number;
}

/**
 * Approved bands, highest first. The first band whose minScore the score reaches wins.
 * Total repayment is purchase × (1 + apr / 100) spread evenly over termMonths.
 */
export const TIER_BANDS: readonly TierBand[] = [
  { tier: 'Prime', minScore: 750, termMonths: 12, apr: 8.99 },
  { tier: 'Near-Prime', minScore: 650, termMonths: 6, apr: 14.99 },
  { tier: 'Subprime', minScore: MIN_APPROVAL_SCORE, termMonths: 4, apr: 22.99 },
];
