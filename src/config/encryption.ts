import { env } from './env.js';
import type { EncryptionSettings } from '../crypto/keys.js';

/**
 * Map the validated environment onto engine settings.
 * Nothing is decoded here; `createEncryptionConfig` owns that.
 */
export function encryptionSettingsFromEnv(source: typeof env = env): EncryptionSettings {
  return {
    encryptionKeys: source.ENCRYPTION_KEYS,
    currentKeyVersion: source.CURRENT_KEY_VERSION ?? null,
    encryptionPersonalization: source.ENCRYPTION_PERSONALIZATION,
    defaultAlgorithm: source.ENCRYPTION_ALGORITHM ?? null
  };
}
