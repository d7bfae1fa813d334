import { AsyncLocalStorage } from 'node:async_hooks';

import type { AlgorithmName } from './algorithms.js';
import { derivationCounter, type DerivationCounter } from './instrumentation.js';
import { getMasterKey, resolveKeyVersion, type EncryptionConfig } from './keys.js';
import { zeroizeKey } from './memory.js';
import type { CipherProvider } from './providers/index.js';

/**
 * Derived keys kept for the length of one scope. Owned by the async
 * context that opened it and wiped when that scope ends.
 */
class KeyCache {
  private readonly entries = new Map<string, Buffer>();

  get(cacheKey: string): Buffer | undefined {
    const key = this.entries.get(cacheKey);
    return key ? Buffer.from(key) : undefined;
  }

  set(cacheKey: string, key: Buffer): void {
    this.entries.set(cacheKey, Buffer.from(key));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    for (const key of this.entries.values()) {
      zeroizeKey(key);
    }
    this.entries.clear();
  }
}

const keyCacheStorage = new AsyncLocalStorage<KeyCache>();

/**
 * Run `fn` with a scoped derived-key cache. Nested calls share the outer
 * scope's cache. The cache is wiped when `fn` returns or throws, so a
 * promise returned from `fn` runs uncached after that point; use
 * `withKeyCacheAsync` for async work.
 */
export function withKeyCache<T>(fn: () => T): T {
  if (keyCacheStorage.getStore()) {
    return fn();
  }

  const cache = new KeyCache();
  try {
    return keyCacheStorage.run(cache, fn);
  } finally {
    cache.clear();
  }
}

export async function withKeyCacheAsync<T>(fn: () => Promise<T>): Promise<T> {
  if (keyCacheStorage.getStore()) {
    return fn();
  }

  const cache = new KeyCache();
  try {
    return await keyCacheStorage.run(cache, fn);
  } finally {
    cache.clear();
  }
}

export function isKeyCacheActive(): boolean {
  return keyCacheStorage.getStore() !== undefined;
}

/** Wipe the keys held by the active scope; the scope itself stays open. */
export function clearActiveKeyCache(): void {
  keyCacheStorage.getStore()?.clear();
}

/** Number of keys held by the active scope, 0 outside any scope. */
export function activeKeyCacheSize(): number {
  return keyCacheStorage.getStore()?.size ?? 0;
}

// Snapshots are immutable, so one id per snapshot pins a cached key to the
// exact master key bytes it was derived from.
const snapshotIds = new WeakMap<EncryptionConfig, number>();
let nextSnapshotId = 0;

function snapshotId(config: EncryptionConfig): number {
  let id = snapshotIds.get(config);
  if (id === undefined) {
    id = nextSnapshotId++;
    snapshotIds.set(config, id);
  }
  return id;
}

export interface DerivedKey {
  key: Buffer;
  version: string;
}

export interface DerivationRequest {
  provider: CipherProvider;
  context: string;
  /** Omit to use the current key version. */
  version?: string;
  personalization?: string | null;
}

/**
 * Turns (master key, version, context) into a per-slot key. No caching
 * unless the caller opened a `withKeyCache` scope; every call otherwise
 * performs, and counts, a fresh derivation.
 */
export class KeyDerivationService {
  constructor(
    private readonly getConfig: () => EncryptionConfig,
    private readonly counter: DerivationCounter = derivationCounter
  ) {}

  derive(request: DerivationRequest): DerivedKey {
    const config = this.getConfig();
    const version = resolveKeyVersion(config, request.version);
    const personalization = request.personalization ?? config.personalization;

    const cache = keyCacheStorage.getStore();
    const cacheKey = cache
      ? buildCacheKey(
          snapshotId(config),
          request.provider.algorithm,
          version,
          request.context,
          personalization
        )
      : undefined;

    if (cache && cacheKey) {
      const cached = cache.get(cacheKey);
      if (cached) {
        return { key: cached, version };
      }
    }

    this.counter.increment();

    const masterKey = getMasterKey(config, version);
    try {
      const key = request.provider.deriveKey(masterKey, request.context, personalization);
      if (cache && cacheKey) {
        cache.set(cacheKey, key);
      }
      return { key, version };
    } finally {
      request.provider.secureWipe(masterKey);
    }
  }
}

function buildCacheKey(
  snapshot: number,
  algorithm: AlgorithmName,
  version: string,
  context: string,
  personalization: string
): string {
  return JSON.stringify([snapshot, algorithm, version, context, personalization]);
}
