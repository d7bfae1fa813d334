import { ALGORITHM_SPECS, type AlgorithmName, type AlgorithmSpec } from './algorithms.js';
import {
  contextPersonalization,
  formatDerivationContext,
  type ContextInput
} from './aad.js';
import { KeyDerivationService, clearActiveKeyCache } from './derivation.js';
import { parseEnvelope, serializeEnvelope, type Envelope } from './envelope.js';
import { DecryptionError, EncryptionError } from './errors.js';
import { derivationCounter, type DerivationCounter } from './instrumentation.js';
import { validateConfiguration, type EncryptionConfig } from './keys.js';
import { zeroizeKey } from './memory.js';
import { ProviderRegistry } from './registry.js';
import { logger } from '../lib/logger.js';

export interface EngineOptions {
  registry?: ProviderRegistry;
  counter?: DerivationCounter;
}

export interface EncryptOptions {
  /** Per-field override; routes straight to that provider. */
  algorithm?: AlgorithmName | null;
}

export type AadInput = Uint8Array | string | null | undefined;

export interface AlgorithmInfo extends AlgorithmSpec {
  algorithm: AlgorithmName;
}

/**
 * Entry point for field encryption. Holds one configuration snapshot at a
 * time; `reload` replaces it wholesale. Every call derives a fresh key
 * (unless a `withKeyCache` scope is open) and wipes it before returning.
 */
export class EncryptionEngine {
  private snapshot: EncryptionConfig;
  readonly registry: ProviderRegistry;
  private readonly derivation: KeyDerivationService;

  constructor(config: EncryptionConfig, options: EngineOptions = {}) {
    this.snapshot = config;
    this.registry = options.registry ?? new ProviderRegistry();
    this.derivation = new KeyDerivationService(
      () => this.snapshot,
      options.counter ?? derivationCounter
    );
  }

  get config(): EncryptionConfig {
    return this.snapshot;
  }

  /** Replace the snapshot. Keys cached by an open `withKeyCache` scope are dropped. */
  reload(config: EncryptionConfig): void {
    const previousVersion = this.snapshot.currentKeyVersion;
    this.snapshot = config;
    clearActiveKeyCache();
    logger.info(
      {
        previousVersion,
        currentVersion: config.currentKeyVersion,
        versions: [...config.keys.keys()]
      },
      'Encryption configuration reloaded'
    );
  }

  validateConfiguration(): void {
    validateConfiguration(this.snapshot, this.registry);
  }

  info(algorithm?: AlgorithmName | null): AlgorithmInfo {
    const provider = this.registry.resolve(algorithm, this.snapshot.defaultAlgorithm);
    return { algorithm: provider.algorithm, ...ALGORITHM_SPECS[provider.algorithm] };
  }

  encryptFor(
    context: ContextInput,
    plaintext: string | Uint8Array,
    aad?: AadInput,
    options: EncryptOptions = {}
  ): Envelope {
    const provider = this.registry.resolve(options.algorithm, this.snapshot.defaultAlgorithm);
    const { key, version } = this.derivation.derive({
      provider,
      context: formatDerivationContext(context),
      personalization: contextPersonalization(context)
    });

    const data = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf-8') : plaintext;

    try {
      const sealed = provider.encrypt(data, key, toAadBytes(aad));
      return {
        algorithm: provider.algorithm,
        nonce: sealed.nonce,
        ciphertext: sealed.ciphertext,
        authTag: sealed.authTag,
        keyVersion: version
      };
    } finally {
      provider.secureWipe(key);
      if (typeof plaintext === 'string') {
        zeroizeKey(data);
      }
    }
  }

  /**
   * Decrypts with the provider named in the envelope, both for key
   * derivation and for the cipher, whatever the current default is.
   * The caller owns the returned buffer and wipes it.
   */
  decryptBytesFor(context: ContextInput, envelope: Envelope | string, aad?: AadInput): Buffer {
    const data = typeof envelope === 'string' ? parseEnvelope(envelope) : envelope;
    const provider = this.registry.get(data.algorithm);
    const derivationContext = formatDerivationContext(context);

    const { key } = this.derivation.derive({
      provider,
      context: derivationContext,
      version: data.keyVersion,
      personalization: contextPersonalization(context)
    });

    try {
      return provider.decrypt(data.ciphertext, key, data.nonce, data.authTag, toAadBytes(aad));
    } catch (error) {
      logger.warn(
        { context: derivationContext, algorithm: data.algorithm, keyVersion: data.keyVersion },
        'Field decryption failed'
      );
      if (error instanceof EncryptionError) {
        throw error;
      }
      throw new DecryptionError();
    } finally {
      provider.secureWipe(key);
    }
  }

  /** UTF-8 text view of `decryptBytesFor`; use that for binary plaintexts. */
  decryptFor(context: ContextInput, envelope: Envelope | string, aad?: AadInput): string {
    const plaintext = this.decryptBytesFor(context, envelope, aad);
    try {
      return plaintext.toString('utf-8');
    } finally {
      zeroizeKey(plaintext);
    }
  }

  encryptToJson(
    context: ContextInput,
    plaintext: string | Uint8Array,
    aad?: AadInput,
    options?: EncryptOptions
  ): string {
    return serializeEnvelope(this.encryptFor(context, plaintext, aad, options));
  }

  decryptJson(context: ContextInput, json: string, aad?: AadInput): string {
    return this.decryptFor(context, json, aad);
  }
}

function toAadBytes(aad: AadInput): Uint8Array | null {
  if (aad === null || aad === undefined) {
    return null;
  }
  return typeof aad === 'string' ? Buffer.from(aad, 'utf-8') : aad;
}
