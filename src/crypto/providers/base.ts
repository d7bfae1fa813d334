import { randomBytes } from 'node:crypto';

import { ALGORITHM_SPECS, type AlgorithmName } from '../algorithms.js';
import { KeyError } from '../errors.js';
import { zeroizeKey } from '../memory.js';
import type { CipherProvider, SealedPayload } from './types.js';

export const MASTER_KEY_MIN_BYTES = 32;
/** BLAKE2b takes keys of at most 64 bytes. */
export const MASTER_KEY_MAX_BYTES = 64;
export const DEFAULT_PERSONALIZATION = 'SealedFields';

/**
 * Shared checks and sizes for the concrete providers. Subclasses supply
 * the cipher and the KDF; everything else is common.
 */
export abstract class BaseCipherProvider implements CipherProvider {
  abstract readonly algorithm: AlgorithmName;
  abstract readonly priority: number;

  get keySize(): number {
    return ALGORITHM_SPECS[this.algorithm].keySize;
  }

  get nonceSize(): number {
    return ALGORITHM_SPECS[this.algorithm].nonceSize;
  }

  get authTagSize(): number {
    return ALGORITHM_SPECS[this.algorithm].authTagSize;
  }

  abstract isAvailable(): boolean;

  abstract deriveKey(
    masterKey: Uint8Array | null | undefined,
    context: string,
    personalization?: string | null
  ): Buffer;

  abstract encrypt(plaintext: Uint8Array, key: Uint8Array, aad?: Uint8Array | null): SealedPayload;

  abstract decrypt(
    ciphertext: Uint8Array,
    key: Uint8Array,
    nonce: Uint8Array,
    authTag: Uint8Array,
    aad?: Uint8Array | null
  ): Buffer;

  generateNonce(): Buffer {
    return randomBytes(this.nonceSize);
  }

  secureWipe(key: Uint8Array | null | undefined): void {
    zeroizeKey(key);
  }

  protected assertMasterKey(masterKey: Uint8Array | null | undefined): Uint8Array {
    if (!masterKey) {
      throw new KeyError('Key cannot be nil');
    }
    if (masterKey.length < MASTER_KEY_MIN_BYTES) {
      throw new KeyError(`Key must be at least ${MASTER_KEY_MIN_BYTES} bytes`);
    }
    return masterKey;
  }

  protected assertCipherKey(key: Uint8Array): void {
    if (key.length !== this.keySize) {
      throw new KeyError(`Key must be exactly ${this.keySize} bytes for ${this.algorithm}`);
    }
  }

  protected resolvePersonalization(personalization?: string | null): string {
    const value = personalization ?? DEFAULT_PERSONALIZATION;
    if (value.includes('\0')) {
      throw new KeyError('Personalization string must not contain null bytes');
    }
    return value;
  }
}
