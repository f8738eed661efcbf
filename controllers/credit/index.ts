import type { Request, Response, NextFunction } from 'express';
import type { CreditDecisionService } from '../../services/credit-decision.service';
import { DEFAULT_RECENT_LIMIT, MAX_RECENT_LIMIT } from '../../services/decision-recorder.service';
import type { DecisionRecorder } from '../../services/decision-recorder.service';
import { ValidationError } from '../../utils/app-error';
import { serializeDecision, serializeRecord, serializeStats } from './serializers';

export const APP_VERSION = '1.0.0';

const parseLimit = (raw: unknown): number => {
  if (raw === undefined || raw === '') return DEFAULT_RECENT_LIMIT;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RECENT_LIMIT) {
    throw new ValidationError([{ field: 'limit', constraint: `must be an integer between 1 and ${MAX_RECENT_LIMIT}` }]);
  }
  return limit;
};

export const createCreditController = (decisions: CreditDecisionService, recorder: DecisionRecorder) => ({
  predict: (req: Request, res: Response, next: NextFunction) => {
    try {
      const { decision, recordId } = decisions.predict(req.body);
      res.status(200).json({
        ...serializeDecision(decision),
        record_id: recordId,
        recorded: recordId !== null,
      });
    } catch (error) {
      next(error);
    }
  },

  health: (req: Request, res: Response) => {
    const report = decisions.health();
    res.status(200).json({
      status: report.status,
      model_loaded: report.modelLoaded,
      model_version: report.modelVersion,
      store_connected: report.storeConnected,
      recorder: recorder.status(),
      version: APP_VERSION,
    });
  },

  stats: async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(serializeStats(await recorder.stats()));
    } catch (error) {
      next(error);
    }
  },

  recent: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const records = await recorder.recent(parseLimit(req.query.limit));
      res.status(200).json({ count: records.length, decisions: records.map(serializeRecord) });
    } catch (error) {
      next(error);
    }
  },
});

export type CreditController = ReturnType<typeof createCreditController>;
