import type { AlgorithmName } from '../crypto/algorithms.js';
import { buildAad, type DerivationContext } from '../crypto/aad.js';
import type { EncryptionEngine } from '../crypto/engine.js';

/**
 * What an encrypted field needs to know about the record that owns it.
 */
export interface EncryptionSubject {
  readonly modelName: string;
  readonly identifier: string | null;
  fieldValue(name: string): string | null;
}

export interface EncryptedFieldOptions<F extends string = string> {
  /** Plain fields whose current values are bound into the AAD. */
  aadFields?: readonly F[];
  /** Forces this field onto one provider instead of the ranked default. */
  algorithm?: AlgorithmName;
}

/**
 * Declaration of one encrypted field: builds its derivation context and
 * AAD from the owning record and routes through the engine.
 */
export class EncryptedFieldType {
  readonly aadFields: readonly string[];
  readonly algorithm: AlgorithmName | null;

  constructor(
    readonly name: string,
    private readonly engine: EncryptionEngine,
    options: EncryptedFieldOptions = {}
  ) {
    this.aadFields = Object.freeze([...(options.aadFields ?? [])]);
    this.algorithm = options.algorithm ?? null;
  }

  context(subject: EncryptionSubject): DerivationContext {
    return {
      modelType: subject.modelName,
      field: this.name,
      identifier: subject.identifier
    };
  }

  aad(subject: EncryptionSubject): Buffer | null {
    return buildAad(
      subject.identifier,
      this.aadFields.map(field => subject.fieldValue(field))
    );
  }

  encryptValue(subject: EncryptionSubject, plaintext: string): string {
    return this.engine.encryptToJson(this.context(subject), plaintext, this.aad(subject), {
      algorithm: this.algorithm
    });
  }

  decryptValue(subject: EncryptionSubject, encrypted: string): string {
    return this.engine.decryptJson(this.context(subject), encrypted, this.aad(subject));
  }
}
