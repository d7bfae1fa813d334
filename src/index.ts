import { encryptionSettingsFromEnv, env } from './config/index.js';
import { EncryptionEngine, type EngineOptions } from './crypto/engine.js';
import { createEncryptionConfig } from './crypto/keys.js';
import { checkDatabaseHealth, connectDatabase, initializeModels } from './database/index.js';
import { logger } from './lib/logger.js';

export * from './crypto/index.js';
export * from './records/index.js';
export {
  MongoRecordStore,
  checkDatabaseHealth,
  connectDatabase,
  disconnectDatabase,
  getDatabaseClient,
  initializeModels,
  parseStoredFields,
  type RecordStore,
  type StoredFields
} from './database/index.js';
export { StoredRecordModel, rejectConcealed, type IStoredRecord } from './models/index.js';
export { encryptionSettingsFromEnv, env, type AppEnvironment } from './config/index.js';
export { createLogger, logger } from './lib/logger.js';
export type { EngineOptions } from './crypto/engine.js';

/**
 * Build an engine from ENCRYPTION_* variables and fail fast when the key
 * configuration is unusable.
 */
export function createEngineFromEnv(options: EngineOptions = {}): EncryptionEngine {
  const engine = new EncryptionEngine(createEncryptionConfig(encryptionSettingsFromEnv()), options);
  engine.validateConfiguration();
  return engine;
}

export async function bootstrap(): Promise<EncryptionEngine> {
  logger.info({ env: env.NODE_ENV }, 'Bootstrapping sealed-fields');

  try {
    const engine = createEngineFromEnv();
    const info = engine.info();
    logger.info(
      { algorithm: info.algorithm, keyVersion: engine.config.currentKeyVersion },
      'Encryption engine configured'
    );

    await connectDatabase();

    const isHealthy = await checkDatabaseHealth();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }

    await initializeModels();
    logger.info('sealed-fields bootstrap completed successfully');

    return engine;
  } catch (error) {
    logger.error({ error }, 'Bootstrap failed');
    throw error;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch(error => {
    logger.error(error, 'Fatal error during bootstrap');
    process.exitCode = 1;
  });
}
