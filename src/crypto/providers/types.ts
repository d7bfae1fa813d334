import type { AlgorithmName } from '../algorithms.js';

/**
 * Output of one authenticated encryption call. The nonce is generated by
 * the provider and handed back so it can be stored with the ciphertext.
 */
export interface SealedPayload {
  nonce: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

/**
 * One AEAD algorithm plus the key derivation that goes with it.
 * Implementations hold no per-call state; every input is an argument.
 */
export interface CipherProvider {
  readonly algorithm: AlgorithmName;
  readonly keySize: number;
  readonly nonceSize: number;
  readonly authTagSize: number;
  /** Higher wins when no algorithm is forced. */
  readonly priority: number;

  isAvailable(): boolean;
  generateNonce(): Buffer;
  deriveKey(
    masterKey: Uint8Array | null | undefined,
    context: string,
    personalization?: string | null
  ): Buffer;
  encrypt(plaintext: Uint8Array, key: Uint8Array, aad?: Uint8Array | null): SealedPayload;
  decrypt(
    ciphertext: Uint8Array,
    key: Uint8Array,
    nonce: Uint8Array,
    authTag: Uint8Array,
    aad?: Uint8Array | null
  ): Buffer;
  secureWipe(key: Uint8Array | null | undefined): void;
}
