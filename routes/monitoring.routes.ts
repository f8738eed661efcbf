import { Router } from 'express';
import type { MonitoringController } from '../controllers/monitoring';

export const monitoringRoutes = (controller: MonitoringController) => {
  const router = Router();

  router.get('/drift', controller.latestDrift);

  return router;
};
