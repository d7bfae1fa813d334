import type { AlgorithmName } from './algorithms.js';
import { EncryptionError } from './errors.js';
import { AesGcmProvider, XChaCha20Poly1305Provider, type CipherProvider } from './providers/index.js';
import { logger } from '../lib/logger.js';

export interface ProviderSelection {
  /** Forces a provider, bypassing priority ranking. */
  algorithm?: AlgorithmName | null;
}

/**
 * Pure selection rule: a forced algorithm wins outright (and must be
 * available); otherwise the available provider with the highest priority.
 */
export function selectProvider(
  providers: readonly CipherProvider[],
  selection: ProviderSelection = {}
): CipherProvider {
  if (selection.algorithm) {
    const forced = providers.find(provider => provider.algorithm === selection.algorithm);
    if (!forced) {
      throw new EncryptionError(`Unsupported algorithm: ${selection.algorithm}`);
    }
    if (!forced.isAvailable()) {
      throw new EncryptionError(`Algorithm not available: ${selection.algorithm}`);
    }
    return forced;
  }

  const [best] = rankProviders(providers);
  if (!best) {
    throw new EncryptionError('No encryption provider available');
  }
  return best;
}

export function rankProviders(providers: readonly CipherProvider[]): CipherProvider[] {
  return providers
    .filter(provider => provider.isAvailable())
    .sort((a, b) => b.priority - a.priority);
}

export function defaultProviders(): CipherProvider[] {
  return [new XChaCha20Poly1305Provider(), new AesGcmProvider()];
}

export class ProviderRegistry {
  private readonly providers: ReadonlyMap<AlgorithmName, CipherProvider>;

  constructor(providers: readonly CipherProvider[] = defaultProviders()) {
    const byAlgorithm = new Map<AlgorithmName, CipherProvider>();
    for (const provider of providers) {
      if (byAlgorithm.has(provider.algorithm)) {
        throw new EncryptionError(`Duplicate provider for algorithm: ${provider.algorithm}`);
      }
      byAlgorithm.set(provider.algorithm, provider);
    }
    this.providers = byAlgorithm;
  }

  has(algorithm: AlgorithmName): boolean {
    return this.providers.has(algorithm);
  }

  get(algorithm: AlgorithmName): CipherProvider {
    return selectProvider(this.list(), { algorithm });
  }

  list(): CipherProvider[] {
    return [...this.providers.values()];
  }

  ranked(): CipherProvider[] {
    return rankProviders(this.list());
  }

  defaultProvider(): CipherProvider {
    return selectProvider(this.list());
  }

  /**
   * Provider for one operation: the forced algorithm if given, else the
   * configured default, else the highest-ranked available provider.
   */
  resolve(algorithm?: AlgorithmName | null, fallback?: AlgorithmName | null): CipherProvider {
    const provider = selectProvider(this.list(), { algorithm: algorithm ?? fallback });
    logger.debug(
      { algorithm: provider.algorithm, forced: Boolean(algorithm) },
      'Resolved encryption provider'
    );
    return provider;
  }
}
