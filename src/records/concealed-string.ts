/**
 * ConcealedString
 *
 * The only value callers ever get back for an encrypted field. It wraps the
 * envelope JSON (never plaintext) and hands out plaintext solely through
 * `reveal`, which derives a fresh key and decrypts against the owning
 * record's current identity and AAD on every call.
 *
 *   user.concealed('ssn')?.toString();               // '[CONCEALED]'
 *   JSON.stringify({ ssn: user.concealed('ssn') });  // '{"ssn":"[CONCEALED]"}'
 *   user.concealed('ssn')?.reveal(ssn => verify(ssn));
 *
 * Implicit conversion throws: `'' + handle` and template
 * literals throw a TypeError instead of producing the placeholder. State is
 * kept in private fields so spreads, `Object.keys` and structured cloning
 * see nothing.
 */

import { inspect } from 'node:util';

import type { AlgorithmName } from '../crypto/algorithms.js';
import { isEnvelopeJson, parseEnvelope } from '../crypto/envelope.js';
import { ArgumentError, SecurityError, SerializerError } from '../crypto/errors.js';
import type { EncryptedFieldType, EncryptionSubject } from './field-type.js';

export const CONCEALED_PLACEHOLDER = '[CONCEALED]';

// Same for every instance, so hashing reveals nothing about the contents
const CONCEALED_HASH = 0x5ea1ed;

export interface ConcealedMetadata {
  algorithm: AlgorithmName;
  keyVersion: string;
}

export class ConcealedString {
  #encryptedData: string | null;
  #record: EncryptionSubject | null;
  #fieldType: EncryptedFieldType | null;
  #cleared = false;

  constructor(encryptedData: string, record: EncryptionSubject, fieldType: EncryptedFieldType) {
    if (!isEnvelopeJson(encryptedData)) {
      throw new ArgumentError('ConcealedString requires encrypted JSON data');
    }

    this.#encryptedData = encryptedData;
    this.#record = record;
    this.#fieldType = fieldType;
  }

  /**
   * Decrypt and pass the plaintext to `callback`. The plaintext is not kept
   * after the callback returns; avoid copying it out of the callback.
   */
  reveal<T>(callback: (plaintext: string) => T): T {
    if (typeof callback !== 'function') {
      throw new ArgumentError('Block required for reveal');
    }
    if (this.#cleared) {
      throw new SecurityError('Encrypted data already cleared');
    }

    const encrypted = this.#encryptedData;
    const record = this.#record;
    const fieldType = this.#fieldType;
    if (encrypted === null || record === null || fieldType === null) {
      throw new SecurityError('No encrypted data to reveal');
    }

    return callback(fieldType.decryptValue(record, encrypted));
  }

  /** True when this handle was created for `fieldName` on a record with the same model and identifier. */
  belongsToContext(record: EncryptionSubject, fieldName: string): boolean {
    if (this.#record === null || this.#fieldType === null) {
      return false;
    }

    return (
      this.#record.modelName === record.modelName &&
      this.#record.identifier === record.identifier &&
      this.#fieldType.name === fieldName
    );
  }

  clear(): void {
    if (this.#cleared) {
      return;
    }

    this.#encryptedData = null;
    this.#record = null;
    this.#fieldType = null;
    this.#cleared = true;
  }

  get cleared(): boolean {
    return this.#cleared;
  }

  /** Envelope JSON for persistence; `null` once cleared. */
  get encryptedValue(): string | null {
    return this.#encryptedData;
  }

  /** Algorithm and key version from the envelope, without decrypting. */
  metadata(): ConcealedMetadata | null {
    if (this.#encryptedData === null) {
      return null;
    }
    const envelope = parseEnvelope(this.#encryptedData);
    return { algorithm: envelope.algorithm, keyVersion: envelope.keyVersion };
  }

  toString(): string {
    return CONCEALED_PLACEHOLDER;
  }

  toLocaleString(): string {
    return CONCEALED_PLACEHOLDER;
  }

  toJSON(): string {
    return CONCEALED_PLACEHOLDER;
  }

  [inspect.custom](): string {
    return CONCEALED_PLACEHOLDER;
  }

  [Symbol.toPrimitive](hint: string): never {
    throw new TypeError(
      `ConcealedString cannot be implicitly converted (${hint}); call toString() or reveal()`
    );
  }

  /**
   * BSON encoders would otherwise cast this through toString() and store
   * the placeholder in place of the envelope.
   */
  toBSON(): never {
    throw new SerializerError(
      'ConcealedString cannot be BSON-encoded; persist encryptedValue instead'
    );
  }

  get [Symbol.toStringTag](): string {
    return 'ConcealedString';
  }

  equals(other: unknown): boolean {
    return this === other;
  }

  hashCode(): number {
    return CONCEALED_HASH;
  }

  /** Length of the placeholder, not of the plaintext. */
  get length(): number {
    return CONCEALED_PLACEHOLDER.length;
  }

  isEmpty(): boolean {
    return false;
  }

  isPresent(): boolean {
    return true;
  }
}
