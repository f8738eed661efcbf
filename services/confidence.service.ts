import type { ConfidencePolicy } from '../config/env';
import type { Confidence } from '../types';

/** Canonical rule: distance of the probability from the 0.5 decision boundary. */
export function confidenceFromDistance(defaultProbability: number): Confidence {
  const distance = Math.abs(defaultProbability - 0.5);
  if (distance > 0.3) return 'HIGH';
  if (distance > 0.15) return 'MEDIUM';
  return 'LOW';
}

/**
 * Approval-conditioned variant: declines are always HIGH, approvals are HIGH only below 0.2.
 * Never yields LOW.
 */
export function confidenceFromApproval(defaultProbability: number, approved: boolean): Confidence {
  if (!approved) return 'HIGH';
  return defaultProbability < 0.2 ? 'HIGH' : 'MEDIUM';
}

export type ConfidenceClassifier = (defaultProbability: number, approved: boolean) => Confidence;

export function createConfidenceClassifier(policy: ConfidencePolicy = 'distance'): ConfidenceClassifier {
  return policy === 'approval' ? confidenceFromApproval : (p) => confidenceFromDistance(p);
}
