import { Router } from 'express';
import type { CreditController } from '../controllers/credit';
import type { MonitoringController } from '../controllers/monitoring';
import { creditRoutes } from './credit.routes';
import { monitoringRoutes } from './monitoring.routes';

export interface AppControllers {
  credit: CreditController;
  monitoring: MonitoringController;
}

export const appRoutes = (controllers: AppControllers) => {
  const routes = Router();

  routes.use('/', creditRoutes(controllers.credit));
  routes.use('/monitoring', monitoringRoutes(controllers.monitoring));

  return routes;
};
