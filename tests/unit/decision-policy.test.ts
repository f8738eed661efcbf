import { describe, expect, it } from 'vitest';
import { applyPolicy, assignTerms, classifyTier, toCreditScore } from '../../services/decision-policy.service';

describe('toCreditScore', () => {
  it('maps the probability range onto 850..0', () => {
    expect(toCreditScore(0)).toBe(850);
    expect(toCreditScore(1)).toBe(0);
    expect(toCreditScore(0.1059)).toBe(760);
    expect(toCreditScore(0.55)).toBe(382);
  });

  it('never increases as the probability rises', () => {
    let previous = toCreditScore(0);
    for (let step = 1; step <= 1000; step += 1) {
      const score = toCreditScore(step / 1000);
      expect(score).toBeLessThanOrEqual(previous);
      expect(score).toBeGreaterThanOrEqual(0);
      previous = score;
    }
  });

  it('rejects probabilities outside [0, 1]', () => {
    expect(() => toCreditScore(-0.01)).toThrow(RangeError);
    expect(() => toCreditScore(1.01)).toThrow(RangeError);
    expect(() => toCreditScore(Number.NaN)).toThrow(RangeError);
  });
});

describe('classifyTier', () => {
  it('assigns exactly one tier to every score', () => {
    const tiers = new Set<string>();
    for (let score = 0; score <= 850; score += 1) {
      tiers.add(classifyTier(score));
    }
    expect([...tiers]).toEqual(['High Risk', 'Subprime', 'Near-Prime', 'Prime']);
  });

  it('switches tiers at 550, 650 and 750', () => {
    expect(classifyTier(549)).toBe('High Risk');
    expect(classifyTier(550)).toBe('Subprime');
    expect(classifyTier(649)).toBe('Subprime');
    expect(classifyTier(650)).toBe('Near-Prime');
    expect(classifyTier(749)).toBe('Near-Prime');
    expect(classifyTier(750)).toBe('Prime');
  });
});

describe('assignTerms', () => {
  it('gives Prime applicants 12 months at 8.99%', () => {
    expect(assignTerms(760, 3500)).toEqual({
      approved: true,
      tier: 'Prime',
      termMonths: 12,
      apr: 8.99,
      monthlyPayment: 317.89,
    });
  });

  it('gives Near-Prime applicants 6 months at 14.99%', () => {
    expect(assignTerms(680, 1000)).toEqual({
      approved: true,
      tier: 'Near-Prime',
      termMonths: 6,
      apr: 14.99,
      monthlyPayment: 191.65,
    });
  });

  it('gives Subprime applicants 4 months at 22.99%', () => {
    expect(assignTerms(600, 2000)).toEqual({
      approved: true,
      tier: 'Subprime',
      termMonths: 4,
      apr: 22.99,
      monthlyPayment: 614.95,
    });
  });

  it('declines below 550 with the threshold reason', () => {
    expect(assignTerms(549, 3500)).toEqual({
      approved: false,
      tier: 'High Risk',
      reason: 'Credit score below minimum threshold (550)',
    });
  });

  it('lets the purchase amount change the payment but not the tier', () => {
    const small = assignTerms(700, 100);
    const large = assignTerms(700, 100000);
    expect(small.tier).toBe(large.tier);
    expect(small.approved && large.approved && small.monthlyPayment < large.monthlyPayment).toBe(true);
  });

  it('never gives a higher score worse terms', () => {
    const rank = { 'High Risk': 0, Subprime: 1, 'Near-Prime': 2, Prime: 3 };
    for (let score = 1; score <= 850; score += 1) {
      expect(rank[classifyTier(score)]).toBeGreaterThanOrEqual(rank[classifyTier(score - 1)]);
    }
  });
});

describe('applyPolicy', () => {
  it('runs probability 0.55 through to a decline', () => {
    const outcome = applyPolicy(0.55, 3500);
    expect(outcome.creditScore).toBe(382);
    expect(outcome.tier).toBe('High Risk');
    expect(outcome.terms.approved).toBe(false);
  });
});
