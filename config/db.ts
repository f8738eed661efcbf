import mongoose from 'mongoose';
import { logger } from '../utils/logger';

/**
 * Connects mongoose for decision logging. Never throws: a missing URI or a failed
 * connection leaves the service running with recording disabled.
 */
export const connectDB = async (mongoURI: string): Promise<boolean> => {
  if (!mongoURI) {
    logger.info('No MONGO_URI configured - decisions will not be recorded');
    return false;
  }

  try {
    await mongoose.connect(mongoURI, {
      dbName: 'credit_scoring',
      maxPoolSize: 20, // Maximum number of connections in the pool
      minPoolSize: 2, // Minimum number of connections to maintain
      maxIdleTimeMS: 30000, // Close connections after 30s of inactivity
      serverSelectionTimeoutMS: 5000, // How long to wait for server selection
      socketTimeoutMS: 45000, // How long to wait for socket operations
      connectTimeoutMS: 10000, // How long to wait for initial connection
    });
    logger.success('MongoDB connected');
    return true;
  } catch (error) {
    logger.error('MongoDB connection failed; decision recording disabled', error);
    return false;
  }
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState !== mongoose.ConnectionStates.disconnected) {
    await mongoose.disconnect();
  }
};
