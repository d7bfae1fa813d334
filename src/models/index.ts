export { StoredRecordModel, rejectConcealed, type IStoredRecord } from './StoredRecord.js';
