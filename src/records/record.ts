/**
 * Secure records
 *
 * A record model declares plain fields, one identifier field and a set of
 * encrypted fields. Plain fields hold strings; encrypted fields only ever
 * hold a ConcealedString (or null). Assigning a string to an encrypted
 * field encrypts it immediately against the record's current identity.
 *
 *   const User = defineRecordModel({
 *     name: 'User',
 *     identifierField: 'id',
 *     fields: ['id', 'email'],
 *     encryptedFields: { ssn: { aadFields: ['email'] } },
 *     engine
 *   });
 *
 *   const user = User.create({ id: 'u-42', email: 'a@example.test' });
 *   user.set('ssn', '123-45-6789');
 *   user.concealed('ssn')?.reveal(ssn => ssn.slice(-4));
 */

import { inspect } from 'node:util';

import type { AlgorithmName } from '../crypto/algorithms.js';
import type { AlgorithmInfo, EncryptionEngine } from '../crypto/engine.js';
import { EncryptionError, SecurityError } from '../crypto/errors.js';
import { logger } from '../lib/logger.js';
import { ConcealedString } from './concealed-string.js';
import {
  EncryptedFieldType,
  type EncryptedFieldOptions,
  type EncryptionSubject
} from './field-type.js';

export interface RecordModelDefinition<F extends string, E extends string> {
  name: string;
  identifierField: F;
  fields: readonly F[];
  encryptedFields: Readonly<Record<E, EncryptedFieldOptions<F>>>;
  engine: EncryptionEngine;
}

export type FieldInput = string | ConcealedString | null | undefined;

export type RecordValues<F extends string, E extends string> = Partial<Record<F | E, FieldInput>>;

export type EncryptedFieldStatus =
  | { encrypted: false }
  | { encrypted: true; cleared: true }
  | { encrypted: true; cleared: false; algorithm: AlgorithmName; keyVersion: string };

export class RecordModel<F extends string, E extends string> {
  readonly name: string;
  readonly identifierField: F;
  readonly fields: readonly F[];
  readonly encryptedFieldNames: readonly E[];
  readonly engine: EncryptionEngine;
  private readonly fieldTypes = new Map<string, EncryptedFieldType>();

  constructor(definition: RecordModelDefinition<F, E>) {
    this.name = definition.name;
    this.identifierField = definition.identifierField;
    this.fields = Object.freeze([...definition.fields]);
    this.engine = definition.engine;

    if (!this.fields.includes(this.identifierField)) {
      throw new EncryptionError(
        `Identifier field ${this.identifierField} is not a field of ${this.name}`
      );
    }

    const encryptedFields = definition.encryptedFields;
    const names = Object.keys(encryptedFields).filter(
      (key): key is E => Object.prototype.hasOwnProperty.call(encryptedFields, key)
    );

    for (const name of names) {
      if (this.isPlainField(name)) {
        throw new EncryptionError(`Field ${name} cannot be both plain and encrypted`);
      }

      const options = encryptedFields[name];
      for (const aadField of options.aadFields ?? []) {
        if (!this.isPlainField(aadField)) {
          throw new EncryptionError(`Unknown AAD field ${aadField} for ${this.name}.${name}`);
        }
      }

      this.fieldTypes.set(name, new EncryptedFieldType(name, this.engine, options));
    }

    this.encryptedFieldNames = Object.freeze(names);
  }

  create(values: RecordValues<F, E> = {}): SecureRecord<F, E> {
    const record = new SecureRecord(this);
    // Plain fields first so the identity and AAD are in place before encryption
    for (const field of this.fields) {
      const value = values[field];
      if (value !== undefined) {
        record.set(field, value);
      }
    }
    for (const field of this.encryptedFieldNames) {
      const value = values[field];
      if (value !== undefined) {
        record.set(field, value);
      }
    }
    return record;
  }

  /**
   * Rebuild a record from persisted strings. Encrypted columns hold
   * envelope JSON and are wrapped as they are, without decrypting.
   */
  fromStorage(stored: Readonly<Record<string, string>>): SecureRecord<F, E> {
    const record = new SecureRecord(this);

    for (const [field, value] of Object.entries(stored)) {
      if (this.isPlainField(field)) {
        record.set(field, value);
      } else if (this.isEncryptedField(field)) {
        record.restore(field, value);
      } else {
        logger.debug({ model: this.name, field }, 'Ignoring unknown stored field');
      }
    }

    return record;
  }

  isPlainField(name: string): name is F {
    return this.fields.some(field => field === name);
  }

  isEncryptedField(name: string): name is E {
    return this.fieldTypes.has(name);
  }

  fieldType(name: E): EncryptedFieldType {
    const fieldType = this.fieldTypes.get(name);
    if (!fieldType) {
      throw new EncryptionError(`${name} is not an encrypted field of ${this.name}`);
    }
    return fieldType;
  }

  /**
   * Algorithm parameters used for new encryptions, for one field (honoring
   * its override) or for the model default.
   */
  encryptionInfo(field?: E): AlgorithmInfo {
    const algorithm = field === undefined ? null : this.fieldType(field).algorithm;
    return this.engine.info(algorithm);
  }
}

export function defineRecordModel<F extends string, E extends string>(
  definition: RecordModelDefinition<F, E>
): RecordModel<F, E> {
  return new RecordModel(definition);
}

export class SecureRecord<F extends string, E extends string> implements EncryptionSubject {
  private readonly plain = new Map<string, string>();
  private readonly encrypted = new Map<string, ConcealedString>();

  constructor(readonly model: RecordModel<F, E>) {}

  get modelName(): string {
    return this.model.name;
  }

  get identifier(): string | null {
    return this.plain.get(this.model.identifierField) ?? null;
  }

  fieldValue(name: string): string | null {
    return this.plain.get(name) ?? null;
  }

  get(name: F): string | null {
    return this.plain.get(name) ?? null;
  }

  concealed(name: E): ConcealedString | null {
    return this.encrypted.get(name) ?? null;
  }

  set(name: F | E, value: FieldInput): void {
    if (this.model.isEncryptedField(name)) {
      this.setEncrypted(name, value);
      return;
    }

    if (value instanceof ConcealedString) {
      throw new SecurityError(`Cannot assign a concealed value to plain field ${name}`);
    }

    if (value === null || value === undefined || value === '') {
      this.plain.delete(name);
    } else {
      this.plain.set(name, value);
    }
  }

  /** Attach already-encrypted envelope JSON loaded from storage. */
  restore(name: E, encrypted: string): void {
    if (encrypted === '') {
      this.encrypted.delete(name);
      return;
    }
    this.encrypted.set(name, new ConcealedString(encrypted, this, this.model.fieldType(name)));
  }

  hasEncryptedData(): boolean {
    return this.model.encryptedFieldNames.some(name => this.encrypted.has(name));
  }

  clearEncryptedFields(): void {
    for (const handle of this.encrypted.values()) {
      handle.clear();
    }
  }

  /** True when no encrypted field still holds a live handle. */
  encryptedFieldsCleared(): boolean {
    return [...this.encrypted.values()].every(handle => handle.cleared);
  }

  /**
   * Decrypt every encrypted field and encrypt it again with the current
   * key version and default algorithm. Old handles are cleared.
   */
  reEncryptFields(): void {
    for (const name of this.model.encryptedFieldNames) {
      const handle = this.encrypted.get(name);
      if (!handle || handle.cleared) {
        continue;
      }
      handle.reveal(plaintext => this.setEncrypted(name, plaintext));
      handle.clear();
    }

    logger.debug(
      { model: this.modelName, fields: this.model.encryptedFieldNames },
      'Re-encrypted record fields'
    );
  }

  encryptedFieldsStatus(): Record<string, EncryptedFieldStatus> {
    const status: Record<string, EncryptedFieldStatus> = {};

    for (const name of this.model.encryptedFieldNames) {
      const handle = this.encrypted.get(name);
      const metadata = handle?.metadata();

      if (!handle) {
        status[name] = { encrypted: false };
      } else if (!metadata) {
        status[name] = { encrypted: true, cleared: true };
      } else {
        status[name] = {
          encrypted: true,
          cleared: false,
          algorithm: metadata.algorithm,
          keyVersion: metadata.keyVersion
        };
      }
    }

    return status;
  }

  /** Flat string map for persistence; encrypted fields carry envelope JSON. */
  toStorage(): Record<string, string> {
    const stored: Record<string, string> = Object.fromEntries(this.plain);

    for (const [name, handle] of this.encrypted) {
      const value = handle.encryptedValue;
      if (value === null) {
        throw new SecurityError(`Cannot persist cleared encrypted field ${name}`);
      }
      stored[name] = value;
    }

    return stored;
  }

  toJSON(): Record<string, string | null> {
    const json: Record<string, string | null> = {};
    for (const field of this.model.fields) {
      json[field] = this.plain.get(field) ?? null;
    }
    for (const field of this.model.encryptedFieldNames) {
      const handle = this.encrypted.get(field);
      json[field] = handle ? handle.toJSON() : null;
    }
    return json;
  }

  [inspect.custom](): string {
    return `${this.modelName} ${inspect(this.toJSON())}`;
  }

  private setEncrypted(name: E, value: FieldInput): void {
    if (value === null || value === undefined || value === '') {
      this.encrypted.delete(name);
      return;
    }

    if (value instanceof ConcealedString) {
      if (!value.belongsToContext(this, name)) {
        throw new SecurityError(
          `ConcealedString for ${name} belongs to a different record or field`
        );
      }
      this.encrypted.set(name, value);
      return;
    }

    const fieldType = this.model.fieldType(name);
    this.encrypted.set(name, new ConcealedString(fieldType.encryptValue(this, value), this, fieldType));
  }
}
