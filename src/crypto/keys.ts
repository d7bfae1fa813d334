/**
 * Master key registry
 *
 * Versioned master keys plus the "current version" pointer, held in an
 * immutable snapshot. Rotation never edits a snapshot: it builds a new one
 * (`withCurrentKeyVersion`, `withEncryptionKeys`) and the engine swaps it in
 * wholesale. Older versions stay in the map so existing envelopes still
 * decrypt; new encryptions use the current version.
 */

import { randomBytes } from 'node:crypto';

import type { AlgorithmName } from './algorithms.js';
import { EncryptionError, KeyError } from './errors.js';
import {
  DEFAULT_PERSONALIZATION,
  MASTER_KEY_MAX_BYTES,
  MASTER_KEY_MIN_BYTES
} from './providers/base.js';
import type { ProviderRegistry } from './registry.js';
import { logger } from '../lib/logger.js';
import { PersonalizationSchema, isStrictBase64 } from '../lib/validation.js';

/** Raw settings as they arrive from configuration (keys still base64). */
export interface EncryptionSettings {
  encryptionKeys: Readonly<Record<string, string>>;
  currentKeyVersion?: string | null;
  encryptionPersonalization?: string | null;
  defaultAlgorithm?: AlgorithmName | null;
}

export interface EncryptionConfig {
  readonly keys: ReadonlyMap<string, Buffer>;
  readonly currentKeyVersion: string | null;
  readonly personalization: string;
  readonly defaultAlgorithm: AlgorithmName | null;
  /** The base64 form, kept so a new snapshot can be derived from this one. */
  readonly settings: Readonly<EncryptionSettings>;
}

export function createEncryptionConfig(settings: EncryptionSettings): EncryptionConfig {
  const personalization = settings.encryptionPersonalization ?? DEFAULT_PERSONALIZATION;
  const personalizationCheck = PersonalizationSchema.safeParse(personalization);
  if (!personalizationCheck.success) {
    const [issue] = personalizationCheck.error.issues;
    throw new KeyError(issue?.message ?? 'Invalid personalization string');
  }

  const keys = new Map<string, Buffer>();
  for (const [version, encoded] of Object.entries(settings.encryptionKeys)) {
    if (!isStrictBase64(encoded)) {
      throw new EncryptionError(`Invalid Base64 encoding for key version: ${version}`);
    }
    keys.set(version, Buffer.from(encoded, 'base64'));
  }

  return Object.freeze({
    keys,
    currentKeyVersion: settings.currentKeyVersion ?? null,
    personalization,
    defaultAlgorithm: settings.defaultAlgorithm ?? null,
    settings: Object.freeze({
      ...settings,
      encryptionKeys: Object.freeze({ ...settings.encryptionKeys })
    })
  });
}

export function withCurrentKeyVersion(config: EncryptionConfig, version: string): EncryptionConfig {
  return createEncryptionConfig({ ...config.settings, currentKeyVersion: version });
}

export function withEncryptionKeys(
  config: EncryptionConfig,
  encryptionKeys: Readonly<Record<string, string>>,
  currentKeyVersion?: string
): EncryptionConfig {
  return createEncryptionConfig({
    ...config.settings,
    encryptionKeys: { ...config.settings.encryptionKeys, ...encryptionKeys },
    currentKeyVersion: currentKeyVersion ?? config.currentKeyVersion
  });
}

/**
 * Resolve which version an operation uses. `undefined` means "current";
 * an explicit empty version (for example from a damaged envelope) is
 * rejected rather than silently replaced by the current one.
 */
export function resolveKeyVersion(config: EncryptionConfig, requested?: string | null): string {
  if (config.keys.size === 0) {
    throw new EncryptionError('No encryption keys configured');
  }

  if (requested === undefined) {
    if (!config.currentKeyVersion) {
      throw new EncryptionError('No current key version set');
    }
    return config.currentKeyVersion;
  }

  if (!requested) {
    throw new EncryptionError('Key version cannot be nil');
  }

  return requested;
}

/**
 * Copy of the master key for `version`. The caller owns the copy and
 * wipes it; the snapshot's own buffer is never handed out.
 */
export function getMasterKey(config: EncryptionConfig, version: string): Buffer {
  const key = config.keys.get(version);
  if (!key) {
    throw new EncryptionError(`No key for version: ${version}`);
  }
  return Buffer.from(key);
}

export function validateConfiguration(config: EncryptionConfig, registry?: ProviderRegistry): void {
  if (config.keys.size === 0) {
    throw new EncryptionError('No encryption keys configured');
  }

  if (!config.currentKeyVersion) {
    throw new EncryptionError('No current key version set');
  }

  const currentKey = config.keys.get(config.currentKeyVersion);
  if (!currentKey) {
    throw new EncryptionError(`Current key version not found: ${config.currentKeyVersion}`);
  }

  if (currentKey.length < MASTER_KEY_MIN_BYTES) {
    throw new KeyError(`Key must be at least ${MASTER_KEY_MIN_BYTES} bytes`);
  }

  if (currentKey.length > MASTER_KEY_MAX_BYTES) {
    throw new KeyError(`Key must be at most ${MASTER_KEY_MAX_BYTES} bytes`);
  }

  if (registry) {
    const [preferred] = [...registry.list()].sort((a, b) => b.priority - a.priority);
    if (preferred && !preferred.isAvailable()) {
      logger.warn(
        { algorithm: preferred.algorithm },
        'Preferred encryption provider unavailable; falling back to a lower-priority provider'
      );
    }
    registry.resolve(null, config.defaultAlgorithm);
  }
}

export function generateEncryptionKey(bytes = MASTER_KEY_MIN_BYTES): string {
  return randomBytes(bytes).toString('base64');
}
