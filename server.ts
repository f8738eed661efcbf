import type { Server } from 'http';
import env from './config/env';
import { connectDB, disconnectDB } from './config/db';
import { createApp } from './app';
import { createServices } from './services';
import { MongoDecisionStore } from './services/decision-store.service';
import { loadModelArtifact } from './services/scoring.service';
import type { ScoringModel } from './services/scoring.service';
import { logger } from './utils/logger';

const loadModel = async (): Promise<ScoringModel | null> => {
  try {
    return await loadModelArtifact(env.MODEL_PATH, env.MODEL_VERSION || undefined);
  } catch (error) {
    // Serve anyway: /v1/predict answers 503 until the artifact is fixed
    logger.error('❌ Error loading model:', error);
    return null;
  }
};

const startServer = async () => {
  const model = await loadModel();
  const connected = await connectDB(env.MONGO_URI);
  const services = createServices(env, model, connected ? new MongoDecisionStore() : null);
  const app = createApp(services);

  const server: Server = app.listen(env.PORT, () => {
    logger.success(`🚀 Credit decisioning API running on port ${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.warn(`${signal} received, shutting down`);
    server.close(() => {
      services.recorder
        .flush()
        .then(disconnectDB)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

startServer().catch((error: unknown) => {
  logger.error('❌ Failed to start server:', error);
  process.exit(1);
});
