export type { CipherProvider, SealedPayload } from './types.js';
export {
  BaseCipherProvider,
  DEFAULT_PERSONALIZATION,
  MASTER_KEY_MAX_BYTES,
  MASTER_KEY_MIN_BYTES
} from './base.js';
export { XChaCha20Poly1305Provider } from './xchacha20-poly1305.js';
export { AesGcmProvider } from './aes-gcm.js';
