import { createCipheriv, createDecipheriv, getCiphers, hkdfSync } from 'node:crypto';

import { AES_256_GCM } from '../algorithms.js';
import { DecryptionError } from '../errors.js';
import { BaseCipherProvider } from './base.js';
import type { SealedPayload } from './types.js';

const HKDF_DIGEST = 'sha256';
const HKDF_SALT = 'SealedFieldsEncryption';

/**
 * AES-256-GCM with HKDF-SHA256 key derivation, built only on node:crypto.
 * Lower priority than XChaCha20-Poly1305 because of the 96-bit nonce.
 */
export class AesGcmProvider extends BaseCipherProvider {
  readonly algorithm = AES_256_GCM;
  readonly priority = 50;

  isAvailable(): boolean {
    return getCiphers().includes(AES_256_GCM);
  }

  deriveKey(
    masterKey: Uint8Array | null | undefined,
    context: string,
    personalization?: string | null
  ): Buffer {
    const key = this.assertMasterKey(masterKey);
    const personal = this.resolvePersonalization(personalization);
    const info = personal ? `${context}:${personal}` : context;

    return Buffer.from(hkdfSync(HKDF_DIGEST, key, HKDF_SALT, info, this.keySize));
  }

  encrypt(plaintext: Uint8Array, key: Uint8Array, aad?: Uint8Array | null): SealedPayload {
    this.assertCipherKey(key);
    const nonce = this.generateNonce();

    const cipher = createCipheriv(AES_256_GCM, key, nonce, {
      authTagLength: this.authTagSize
    });

    if (aad) {
      cipher.setAAD(aad);
    }

    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    return {
      nonce,
      ciphertext,
      authTag: cipher.getAuthTag()
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

    // GCM accepts other IV lengths, so the size check has to be explicit
    if (nonce.length !== this.nonceSize || authTag.length !== this.authTagSize) {
      throw new DecryptionError();
    }

    try {
      const decipher = createDecipheriv(AES_256_GCM, key, nonce, {
        authTagLength: this.authTagSize
      });

      if (aad) {
        decipher.setAAD(aad);
      }

      decipher.setAuthTag(authTag);

      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      throw new DecryptionError();
    }
  }
}
