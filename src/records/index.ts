export {
  CONCEALED_PLACEHOLDER,
  ConcealedString,
  type ConcealedMetadata
} from './concealed-string.js';
export {
  EncryptedFieldType,
  type EncryptedFieldOptions,
  type EncryptionSubject
} from './field-type.js';
export {
  RecordModel,
  SecureRecord,
  defineRecordModel,
  type EncryptedFieldStatus,
  type FieldInput,
  type RecordModelDefinition,
  type RecordValues
} from './record.js';
export { RecordRepository } from './repository.js';
