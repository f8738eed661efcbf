import swaggerUi from 'swagger-ui-express';
import type { Express } from 'express';
import { swaggerDocs } from '../documentation';

export const setupSwagger = (app: Express) => {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocs));
};
