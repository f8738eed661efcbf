import { validateApplication } from './feature-validator.service';
import { applyPolicy, roundTo } from './decision-policy.service';
import type { ScoringAdapter } from './scoring.service';
import type { Explainer } from './explanation.service';
import type { ConfidenceClassifier } from './confidence.service';
import type { DecisionRecorder } from './decision-recorder.service';
import type { Application, Decision } from '../types';

export interface CreditDecisionDeps {
  scoring: ScoringAdapter;
  explainer: Explainer;
  classifyConfidence: ConfidenceClassifier;
  recorder: DecisionRecorder;
  now?: () => Date;
}

export interface PredictResult {
  decision: Decision;
  application: Application;
  /** null when the decision was not queued for recording */
  recordId: string | null;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  modelLoaded: boolean;
  storeConnected: boolean;
  modelVersion: string | null;
}

/**
 * validate → score → policy → explain → confidence → record.
 * Validation and scoring failures propagate; recording never changes the outcome.
 */
export class CreditDecisionService {
  private readonly now: () => Date;

  constructor(private readonly deps: CreditDecisionDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Pure part of the pipeline: no recording. */
  decide(raw: unknown): { application: Application; decision: Decision } {
    const { application, features } = validateApplication(raw);
    const model = this.deps.scoring.requireModel();
    const probability = this.deps.scoring.predict(features);
    const { creditScore, tier, terms } = applyPolicy(probability, application.purchase_amount);

    const decision: Decision = {
      applicantId: application.applicant_id,
      defaultProbability: roundTo(probability, 4),
      creditScore,
      approved: terms.approved,
      recommendation: terms.approved ? 'APPROVED' : 'DECLINED',
      tier,
      terms,
      explanation: this.deps.explainer.explain(features),
      confidence: this.deps.classifyConfidence(probability, terms.approved),
      modelVersion: model.version,
      createdAt: this.now().toISOString(),
    };

    return { application, decision: Object.freeze(decision) };
  }

  predict(raw: unknown): PredictResult {
    const { application, decision } = this.decide(raw);
    const recordId = this.deps.recorder.record(application, decision);
    return { application, decision, recordId };
  }

  health(): HealthReport {
    const modelLoaded = this.deps.scoring.isLoaded;
    const storeConnected = this.deps.recorder.isConnected();
    return {
      status: modelLoaded ? 'healthy' : 'degraded',
      modelLoaded,
      storeConnected,
      modelVersion: this.deps.scoring.modelVersion,
    };
  }
}
