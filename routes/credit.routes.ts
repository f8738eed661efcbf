import { Router } from 'express';
import type { CreditController } from '../controllers/credit';

export const creditRoutes = (controller: CreditController) => {
  const router = Router();

  router.post('/predict', controller.predict);
  router.get('/health', controller.health);
  router.get('/stats', controller.stats);
  router.get('/recent', controller.recent);

  return router;
};
