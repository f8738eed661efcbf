import type { Env } from '../config/env';
import { CreditDecisionService } from './credit-decision.service';
import { DecisionRecorder } from './decision-recorder.service';
import type { DecisionStore } from './decision-store.service';
import { createConfidenceClassifier } from './confidence.service';
import { createExplainer } from './explanation.service';
import { ScoringAdapter } from './scoring.service';
import type { ScoringModel } from './scoring.service';
import { loggingService } from './logging.service';

export interface AppServices {
  decisions: CreditDecisionService;
  recorder: DecisionRecorder;
  driftOutputDir: string;
}

type ServiceConfig = Pick<Env, 'EXPLANATION_MODE' | 'ATTRIBUTION_MIN_CONTRIBUTION' | 'CONFIDENCE_POLICY' | 'RECORD_QUEUE_LIMIT'> & {
  drift: Pick<Env['drift'], 'OUTPUT_DIR'>;
};

/**
 * Wires the pipeline from the model and store loaded at startup.
 * Both are passed in explicitly; nothing here reaches for process-wide handles.
 */
export function createServices(
  config: ServiceConfig,
  model: ScoringModel | null,
  store: DecisionStore | null,
  now?: () => Date
): AppServices {
  const explainer = createExplainer(config.EXPLANATION_MODE, model, config.ATTRIBUTION_MIN_CONTRIBUTION);
  if (explainer.mode !== config.EXPLANATION_MODE) {
    loggingService
      .scope('startup')
      .warn(`Explanation mode "${config.EXPLANATION_MODE}" unavailable without a model exposing contributions; using "${explainer.mode}"`);
  }

  const recorder = new DecisionRecorder(store, { queueLimit: config.RECORD_QUEUE_LIMIT });
  const decisions = new CreditDecisionService({
    scoring: new ScoringAdapter(model),
    explainer,
    classifyConfidence: createConfidenceClassifier(config.CONFIDENCE_POLICY),
    recorder,
    now,
  });

  return { decisions, recorder, driftOutputDir: config.drift.OUTPUT_DIR };
}
