import type { Request, Response, NextFunction } from 'express';
import { readLatestSummary } from '../../services/drift-job.service';

export const createMonitoringController = (driftOutputDir: string) => ({
  latestDrift: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await readLatestSummary(driftOutputDir);
      if (!summary) {
        return res.status(404).json({
          success: false,
          message: 'No drift run has completed yet.',
          code: 'NOT_FOUND',
          suggestion: 'Run `npm run drift` first.',
        });
      }
      return res.status(200).json(summary);
    } catch (error) {
      return next(error);
    }
  },
});

export type MonitoringController = ReturnType<typeof createMonitoringController>;
