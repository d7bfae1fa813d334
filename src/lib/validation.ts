import { z } from 'zod';

import { SUPPORTED_ALGORITHMS } from '../crypto/algorithms.js';

/**
 * Validation schemas shared by configuration loading and envelope parsing
 */

// Padded and whitespace-free; Buffer.from(value, 'base64') would silently skip anything else
const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const PERSONALIZATION_MAX_BYTES = 16;

export const KeyVersionSchema = z.string().min(1, 'Key version cannot be empty');

export const AlgorithmNameSchema = z.enum(SUPPORTED_ALGORITHMS);

export const PersonalizationSchema = z
  .string()
  .refine(value => !value.includes('\0'), {
    message: 'Personalization string must not contain null bytes'
  })
  .refine(value => Buffer.byteLength(value, 'utf-8') <= PERSONALIZATION_MAX_BYTES, {
    message: `Personalization string must be at most ${PERSONALIZATION_MAX_BYTES} bytes`
  });

export const EncryptionKeysSchema = z.record(KeyVersionSchema, z.string());

/**
 * Shape of a persisted envelope. Binary fields stay as strings here; base64
 * and size checks need the algorithm and run in the envelope parser.
 */
export const SerializedEnvelopeSchema = z.object({
  algorithm: z.string(),
  nonce: z.string(),
  ciphertext: z.string(),
  auth_tag: z.string(),
  key_version: z.string()
});

export type SerializedEnvelope = z.infer<typeof SerializedEnvelopeSchema>;

export const StoredFieldsSchema = z.record(z.string(), z.string());

export function isStrictBase64(value: string): boolean {
  return STRICT_BASE64.test(value);
}
