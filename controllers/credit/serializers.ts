import type { AggregateStats, Decision, DecisionRecord, LoanTerms } from '../../types';

export const serializeTerms = (terms: LoanTerms) =>
  terms.approved
    ? {
        approved: true,
        term_months: terms.termMonths,
        apr: terms.apr,
        monthly_payment: terms.monthlyPayment,
        risk_tier: terms.tier,
      }
    : {
        approved: false,
        reason: terms.reason,
        risk_tier: terms.tier,
      };

export const serializeDecision = (decision: Decision) => ({
  applicant_id: decision.applicantId,
  credit_score: decision.creditScore,
  default_probability: decision.defaultProbability,
  approval_recommendation: decision.recommendation,
  risk_tier: decision.tier,
  recommended_terms: serializeTerms(decision.terms),
  explanation: decision.explanation,
  confidence: decision.confidence,
  model_version: decision.modelVersion,
  created_at: decision.createdAt,
});

export const serializeRecord = (record: DecisionRecord) => ({
  record_id: record.recordId,
  timestamp: record.timestamp,
  model_version: record.modelVersion,
  application: record.application,
  decision: serializeDecision(record.decision),
});

export const serializeStats = (stats: AggregateStats) => {
  if (!stats.connected) {
    return { connected: false, message: stats.message };
  }
  if ('error' in stats) {
    return { connected: true, error: stats.error };
  }
  if (stats.empty) {
    return {
      connected: true,
      total_predictions: 0,
      approval_rate: 0,
      average_credit_score: null,
      no_data: true,
      message: stats.message,
    };
  }
  return {
    connected: true,
    total_predictions: stats.totalDecisions,
    approval_rate: stats.approvalRate,
    average_credit_score: stats.averageCreditScore,
    no_data: false,
  };
};
