import mongoose from 'mongoose';
import env from '../config/env';
import { logger } from '../utils/logger';
import { DecisionRecordModel } from '../models/DecisionRecord';
import Log from '../models/Log';

/**
 * Database initialization script
 * Ensures the decision and log collections exist with their indexes
 */
export const initializeDatabase = async () => {
  const mongoURI = env.MONGO_URI;
  if (!mongoURI) {
    throw new Error('MONGO_URI is not defined in environment variables');
  }

  try {
    await mongoose.connect(mongoURI, { dbName: 'credit_scoring' });
    logger.info('Connected to MongoDB for initialization');

    await DecisionRecordModel.createCollection();
    await DecisionRecordModel.createIndexes();
    const decisionIndexes = await DecisionRecordModel.collection.indexes();
    logger.success(`Decision indexes created/verified (${decisionIndexes.length})`);

    await Log.createIndexes();
    logger.success('Log indexes created/verified');

    logger.success('Database initialization completed');
  } finally {
    await mongoose.disconnect();
  }
};

// Run if called directly
if (require.main === module) {
  initializeDatabase()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Database initialization script failed:', error);
      process.exit(1);
    });
}
