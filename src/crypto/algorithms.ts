/**
 * Algorithm identifiers as they appear in serialized envelopes, with the
 * fixed sizes each one implies. Envelope validation relies on this table
 * alone so it never needs a provider instance.
 */

export const XCHACHA20_POLY1305 = 'xchacha20poly1305';
export const AES_256_GCM = 'aes-256-gcm';

export const SUPPORTED_ALGORITHMS = [XCHACHA20_POLY1305, AES_256_GCM] as const;

export type AlgorithmName = (typeof SUPPORTED_ALGORITHMS)[number];

export interface AlgorithmSpec {
  keySize: number;
  nonceSize: number;
  authTagSize: number;
}

export const ALGORITHM_SPECS: Readonly<Record<AlgorithmName, AlgorithmSpec>> = Object.freeze({
  [XCHACHA20_POLY1305]: { keySize: 32, nonceSize: 24, authTagSize: 16 },
  [AES_256_GCM]: { keySize: 32, nonceSize: 12, authTagSize: 16 }
});

export function isSupportedAlgorithm(value: string): value is AlgorithmName {
  return SUPPORTED_ALGORITHMS.some(algorithm => algorithm === value);
}
