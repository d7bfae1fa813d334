export {
  connectDatabase,
  disconnectDatabase,
  getDatabaseClient,
  checkDatabaseHealth
} from './connection.js';

export { initializeModels, StoredRecordModel } from './models.js';

export {
  MongoRecordStore,
  parseStoredFields,
  type RecordStore,
  type StoredFields
} from './record-store.js';
