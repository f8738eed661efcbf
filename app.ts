import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestContext } from './middlewares/request-context';
import { requestLogger } from './middlewares/logger-middleware';
import { errorHandler, notFoundHandler } from './middlewares/error-handler';
import { setupSwagger } from './config/swagger';
import { appRoutes } from './routes';
import { APP_VERSION, createCreditController } from './controllers/credit';
import { createMonitoringController } from './controllers/monitoring';
import type { AppServices } from './services';

export const createApp = (services: AppServices) => {
  const app = express();
  app.use(helmet());
  app.use(cors());

  // Trust proxy for accurate client IPs in logs
  app.set('trust proxy', 1);

  app.use(express.json({ limit: '100kb' }));
  app.use(requestContext);

  // Only use request logger outside production (reduces overhead)
  if (process.env.NODE_ENV !== 'production') {
    app.use(requestLogger);
  }

  setupSwagger(app);

  const credit = createCreditController(services.decisions, services.recorder);
  const monitoring = createMonitoringController(services.driftOutputDir);

  app.get('/', (req, res) => {
    res.send({
      message: 'Point-of-sale credit decisioning API',
      version: APP_VERSION,
      endpoints: {
        health: '/v1/health',
        predict: '/v1/predict',
        stats: '/v1/stats',
        recent: '/v1/recent',
        drift: '/v1/monitoring/drift',
        docs: '/api-docs',
      },
      store_connected: services.recorder.isConnected(),
    });
  });

  app.get('/health', credit.health);
  app.use('/v1', appRoutes({ credit, monitoring }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
