export { env } from './env.js';
export type { AppEnvironment } from './env.js';
export { encryptionSettingsFromEnv } from './encryption.js';
