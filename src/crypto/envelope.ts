/**
 * Encryption envelope
 *
 * The versioned, self-describing result of one encryption:
 *
 *   {
 *     "algorithm": "xchacha20poly1305",
 *     "nonce": "<base64>",
 *     "ciphertext": "<base64>",
 *     "auth_tag": "<base64>",
 *     "key_version": "v1"
 *   }
 *
 * The JSON string is what the persistence layer stores. Parsing checks the
 * structure, the algorithm, the base64 of every binary field and the exact
 * nonce and tag sizes, all before a decrypt is attempted.
 */

import { ZodIssueCode } from 'zod';

import { ALGORITHM_SPECS, isSupportedAlgorithm, type AlgorithmName } from './algorithms.js';
import { EncryptionError } from './errors.js';
import { SerializedEnvelopeSchema, isStrictBase64, type SerializedEnvelope } from '../lib/validation.js';

export interface Envelope {
  algorithm: AlgorithmName;
  nonce: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
  keyVersion: string;
}

const REQUIRED_FIELDS = ['algorithm', 'nonce', 'ciphertext', 'auth_tag', 'key_version'] as const;

export function toSerializedEnvelope(envelope: Envelope): SerializedEnvelope {
  return {
    algorithm: envelope.algorithm,
    nonce: envelope.nonce.toString('base64'),
    ciphertext: envelope.ciphertext.toString('base64'),
    auth_tag: envelope.authTag.toString('base64'),
    key_version: envelope.keyVersion
  };
}

export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify(toSerializedEnvelope(envelope));
}

export function parseEnvelope(json: string): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new EncryptionError(
      `Invalid JSON structure: ${error instanceof Error ? error.message : 'unparseable input'}`
    );
  }

  return validateEnvelope(parsed);
}

export function validateEnvelope(value: unknown): Envelope {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new EncryptionError('Invalid JSON structure: expected an object');
  }

  const result = SerializedEnvelopeSchema.safeParse(value);
  if (!result.success) {
    const missing = result.error.issues
      .filter(issue => issue.code === ZodIssueCode.invalid_type && issue.received === 'undefined')
      .map(issue => issue.path.join('.'));

    if (missing.length > 0) {
      throw new EncryptionError(`Missing required fields: ${missing.join(', ')}`);
    }

    const fields = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new EncryptionError(`Invalid field types: ${fields}`);
  }

  const data = result.data;

  if (!isSupportedAlgorithm(data.algorithm)) {
    throw new EncryptionError(`Unsupported algorithm: ${data.algorithm}`);
  }

  const spec = ALGORITHM_SPECS[data.algorithm];
  const nonce = decodeField(data.nonce, 'nonce');
  const ciphertext = decodeField(data.ciphertext, 'ciphertext');
  const authTag = decodeField(data.auth_tag, 'auth_tag');

  if (nonce.length !== spec.nonceSize) {
    throw new EncryptionError('Invalid nonce size');
  }

  if (authTag.length !== spec.authTagSize) {
    throw new EncryptionError('Invalid auth_tag size');
  }

  return {
    algorithm: data.algorithm,
    nonce,
    ciphertext,
    authTag,
    keyVersion: data.key_version
  };
}

/** Cheap structural check, no decoding. */
export function isEnvelopeJson(value: string): boolean {
  try {
    const parsed: unknown = JSON.parse(value);
    return (
      typeof parsed === 'object' &&
      parsed !== null &&
      !Array.isArray(parsed) &&
      REQUIRED_FIELDS.every(field => field in parsed)
    );
  } catch {
    return false;
  }
}

function decodeField(encoded: string, field: (typeof REQUIRED_FIELDS)[number]): Buffer {
  if (!isStrictBase64(encoded)) {
    throw new EncryptionError(`Invalid Base64 encoding in ${field} field`);
  }
  return Buffer.from(encoded, 'base64');
}
