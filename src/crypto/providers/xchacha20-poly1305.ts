import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { blake2b } from '@noble/hashes/blake2b';

import { XCHACHA20_POLY1305 } from '../algorithms.js';
import { DecryptionError, KeyError } from '../errors.js';
import { BaseCipherProvider, MASTER_KEY_MAX_BYTES } from './base.js';
import type { SealedPayload } from './types.js';

const BLAKE2B_PERSONAL_BYTES = 16;

/**
 * XChaCha20-Poly1305 with keyed BLAKE2b key derivation.
 *
 * The 24-byte nonce leaves enough room for random generation on every
 * call. Personalization is zero-padded to the 16 bytes BLAKE2b takes.
 */
export class XChaCha20Poly1305Provider extends BaseCipherProvider {
  readonly algorithm = XCHACHA20_POLY1305;
  readonly priority = 100;

  isAvailable(): boolean {
    return typeof xchacha20poly1305 === 'function' && typeof blake2b === 'function';
  }

  deriveKey(
    masterKey: Uint8Array | null | undefined,
    context: string,
    personalization?: string | null
  ): Buffer {
    const key = this.assertMasterKey(masterKey);
    if (key.length > MASTER_KEY_MAX_BYTES) {
      throw new KeyError(`Key must be at most ${MASTER_KEY_MAX_BYTES} bytes`);
    }

    const personal = Buffer.from(this.resolvePersonalization(personalization), 'utf-8');

    if (personal.length > BLAKE2B_PERSONAL_BYTES) {
      throw new KeyError(`Personalization string must be at most ${BLAKE2B_PERSONAL_BYTES} bytes`);
    }

    const padded = Buffer.alloc(BLAKE2B_PERSONAL_BYTES);
    personal.copy(padded);

    try {
      return Buffer.from(
        blake2b(Buffer.from(context, 'utf-8'), {
          key,
          dkLen: this.keySize,
          personalization: padded
        })
      );
    } finally {
      this.secureWipe(padded);
    }
  }

  encrypt(plaintext: Uint8Array, key: Uint8Array, aad?: Uint8Array | null): SealedPayload {
    this.assertCipherKey(key);
    const nonce = this.generateNonce();

    const sealed = xchacha20poly1305(key, nonce, aad ?? undefined).encrypt(plaintext);
    const tagOffset = sealed.length - this.authTagSize;

    return {
      nonce,
      ciphertext: Buffer.from(sealed.subarray(0, tagOffset)),
      authTag: Buffer.from(sealed.subarray(tagOffset))
    };
  }

  decrypt(
    ciphertext: Uint8Array,
    key: Uint8Array,
    nonce: Uint8Array,
    authTag: Uint8Array,
    aad?: Uint8Array | null
  ): Buffer {
    this.assertCipherKey(key);

    if (nonce.length !== this.nonceSize || authTag.length !== this.authTagSize) {
      throw new DecryptionError();
    }

    const sealed = Buffer.concat([ciphertext, authTag]);

    try {
      return Buffer.from(xchacha20poly1305(key, nonce, aad ?? undefined).decrypt(sealed));
    } catch {
      throw new DecryptionError();
    } finally {
      sealed.fill(0);
    }
  }
}
