/**
 * Positional feature order shared by the validator, the scoring model and the explainers.
 * Changing it invalidates every model artifact.
 */
export const FEATURE_NAMES = [
  'age',
  'annual_income',
  'debt_to_income_ratio',
  'num_credit_lines',
  'num_late_payments',
  'credit_utilization',
  'months_since_last_delinquency',
  'num_credit_inquiries',
  'purchase_amount',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = readonly number[];

export type ApplicationFeatures = Record<FeatureName, number>;

export type Application = ApplicationFeatures & {
  applicant_id: string;
};

export interface ValidatedApplication {
  application: Readonly<Application>;
  features: FeatureVector;
}

export type Tier = 'Prime' | 'Near-Prime' | 'Subprime' | 'High Risk';

export type ApprovedTier = Exclude<Tier, 'High Risk'>;

export interface ApprovedTerms {
  approved: true;
  tier: ApprovedTier;
  termMonths: number;
  apr: number;
  monthlyPayment: number;
}

export interface DeclinedTerms {
  approved: false;
  tier: 'High Risk';
  reason: string;
}

export type LoanTerms = ApprovedTerms | DeclinedTerms;

export type Impact = 'positive' | 'negative';

export interface ExplanationFactor {
  factor: string;
  feature: FeatureName;
  value: number;
  impact: Impact;
  /** Signed log-odds contribution; only present in attribution mode. */
  contribution?: number;
}

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export type Recommendation = 'APPROVED' | 'DECLINED';

export interface Decision {
  applicantId: string;
  defaultProbability: number;
  creditScore: number;
  approved: boolean;
  recommendation: Recommendation;
  tier: Tier;
  terms: LoanTerms;
  explanation: ExplanationFactor[];
  confidence: Confidence;
  modelVersion: string;
  createdAt: string;
}

export interface DecisionRecord {
  recordId: string;
  timestamp: string;
  application: Application;
  decision: Decision;
  modelVersion: string;
}

export type AggregateStats =
  | { connected: false; message: string }
  | {
      connected: true;
      empty: true;
      totalDecisions: 0;
      approvalRate: 0;
      averageCreditScore: null;
      message: string;
    }
  | {
      connected: true;
      empty: false;
      totalDecisions: number;
      approvalRate: number;
      averageCreditScore: number;
    }
  | { connected: true; error: string };
