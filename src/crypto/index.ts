/**
 * Crypto module - field-level authenticated encryption
 *
 * Providers, key registry, derivation, AAD and the envelope format. The
 * concealed handle that callers hold lives in ../records.
 */

export {
  AES_256_GCM,
  ALGORITHM_SPECS,
  SUPPORTED_ALGORITHMS,
  XCHACHA20_POLY1305,
  isSupportedAlgorithm,
  type AlgorithmName,
  type AlgorithmSpec
} from './algorithms.js';
export {
  ArgumentError,
  DecryptionError,
  EncryptionError,
  KeyError,
  SecurityError,
  SerializerError
} from './errors.js';
export {
  AesGcmProvider,
  BaseCipherProvider,
  DEFAULT_PERSONALIZATION,
  MASTER_KEY_MAX_BYTES,
  MASTER_KEY_MIN_BYTES,
  XChaCha20Poly1305Provider,
  type CipherProvider,
  type SealedPayload
} from './providers/index.js';
export { ProviderRegistry, defaultProviders, rankProviders, selectProvider } from './registry.js';
export {
  createEncryptionConfig,
  generateEncryptionKey,
  getMasterKey,
  resolveKeyVersion,
  validateConfiguration,
  withCurrentKeyVersion,
  withEncryptionKeys,
  type EncryptionConfig,
  type EncryptionSettings
} from './keys.js';
export {
  KeyDerivationService,
  activeKeyCacheSize,
  clearActiveKeyCache,
  isKeyCacheActive,
  withKeyCache,
  withKeyCacheAsync
} from './derivation.js';
export { DerivationCounter, derivationCounter } from './instrumentation.js';
export {
  buildAad,
  formatDerivationContext,
  type AadValue,
  type ContextInput,
  type DerivationContext
} from './aad.js';
export {
  isEnvelopeJson,
  parseEnvelope,
  serializeEnvelope,
  toSerializedEnvelope,
  validateEnvelope,
  type Envelope
} from './envelope.js';
export { EncryptionEngine, type AadInput, type AlgorithmInfo, type EncryptOptions } from './engine.js';
export { zeroizeKey } from './memory.js';
