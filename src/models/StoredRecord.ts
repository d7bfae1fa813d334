import { Schema, model, type Document } from 'mongoose';

import { SerializerError } from '../crypto/errors.js';
import { ConcealedString } from '../records/concealed-string.js';

export interface IStoredRecord extends Document {
  modelType: string;
  identifier: string;
  fields: Map<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Setter on every stored field value. Mongoose would otherwise cast a
 * ConcealedString through toString() and persist the placeholder.
 */
export function rejectConcealed(value: unknown): unknown {
  if (value instanceof ConcealedString) {
    throw new SerializerError(
      'ConcealedString cannot be stored directly; persist its encryptedValue'
    );
  }
  return value;
}

const StoredRecordSchema = new Schema<IStoredRecord>(
  {
    modelType: {
      type: String,
      required: true,
      index: true
    },
    identifier: {
      type: String,
      required: true
    },
    fields: {
      type: Map,
      of: {
        type: String,
        set: rejectConcealed
      },
      default: () => new Map()
    }
  },
  {
    timestamps: true,
    collection: 'records'
  }
);

StoredRecordSchema.index({ modelType: 1, identifier: 1 }, { unique: true });

export const StoredRecordModel = model<IStoredRecord>('StoredRecord', StoredRecordSchema);
