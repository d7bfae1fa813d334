import type { RecordStore } from '../database/record-store.js';
import { EncryptionError } from '../crypto/errors.js';
import { logger } from '../lib/logger.js';
import type { RecordModel, SecureRecord } from './record.js';

/**
 * Loads and saves records of one model through a RecordStore. Only
 * envelope JSON crosses this boundary; nothing is decrypted on load.
 */
export class RecordRepository<F extends string, E extends string> {
  constructor(
    private readonly model: RecordModel<F, E>,
    private readonly store: RecordStore
  ) {}

  async save(record: SecureRecord<F, E>): Promise<void> {
    const identifier = record.identifier;
    if (!identifier) {
      throw new EncryptionError(`Cannot save a ${this.model.name} without an identifier`);
    }

    await this.store.save(this.model.name, identifier, record.toStorage());
    logger.debug({ model: this.model.name, identifier }, 'Record saved');
  }

  async find(identifier: string): Promise<SecureRecord<F, E> | null> {
    const stored = await this.store.load(this.model.name, identifier);
    return stored ? this.model.fromStorage(stored) : null;
  }

  async delete(identifier: string): Promise<boolean> {
    const deleted = await this.store.delete(this.model.name, identifier);
    logger.debug({ model: this.model.name, identifier, deleted }, 'Record delete requested');
    return deleted;
  }
}
