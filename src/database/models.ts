import { connectDatabase } from './connection.js';
import { logger } from '../lib/logger.js';
import { StoredRecordModel } from '../models/index.js';

/**
 * Connect and build the indexes for the record collection
 */
export async function initializeModels(): Promise<void> {
  logger.info('Initializing database models and indexes...');

  try {
    await connectDatabase();
    await StoredRecordModel.createIndexes();

    logger.info('Database models and indexes initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize database models');
    throw error;
  }
}

export { StoredRecordModel } from '../models/index.js';
