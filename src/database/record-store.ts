import { EncryptionError } from '../crypto/errors.js';
import { StoredRecordModel } from '../models/index.js';
import { StoredFieldsSchema } from '../lib/validation.js';
import { logger } from '../lib/logger.js';

export type StoredFields = Readonly<Record<string, string>>;

/**
 * Persistence seam for secure records. Values are plain strings; encrypted
 * fields arrive as envelope JSON and are stored as-is.
 */
export interface RecordStore {
  save(modelType: string, identifier: string, fields: StoredFields): Promise<void>;
  load(modelType: string, identifier: string): Promise<Record<string, string> | null>;
  delete(modelType: string, identifier: string): Promise<boolean>;
}

/** Validate a field map read back from storage; every value must be a string. */
export function parseStoredFields(
  modelType: string,
  identifier: string,
  raw: unknown
): Record<string, string> {
  const parsed = StoredFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error(
      { modelType, identifier, issues: parsed.error.issues },
      'Stored record failed validation'
    );
    throw new EncryptionError(`Stored record ${modelType}:${identifier} is malformed`);
  }

  return parsed.data;
}

export class MongoRecordStore implements RecordStore {
  async save(modelType: string, identifier: string, fields: StoredFields): Promise<void> {
    await StoredRecordModel.updateOne(
      { modelType, identifier },
      { $set: { fields: StoredFieldsSchema.parse(fields) } },
      { upsert: true, runValidators: true }
    ).exec();

    logger.debug({ modelType, identifier }, 'Stored record saved');
  }

  async load(modelType: string, identifier: string): Promise<Record<string, string> | null> {
    const document = await StoredRecordModel.findOne({ modelType, identifier }).exec();
    if (!document) {
      return null;
    }

    return parseStoredFields(modelType, identifier, Object.fromEntries(document.fields));
  }

  async delete(modelType: string, identifier: string): Promise<boolean> {
    const result = await StoredRecordModel.deleteOne({ modelType, identifier }).exec();
    return result.deletedCount > 0;
  }
}
