import { describe, it, expect } from 'vitest';

import { EncryptionError } from '../../src/crypto/errors.js';
import {
  isEnvelopeJson,
  parseEnvelope,
  serializeEnvelope,
  toSerializedEnvelope,
  validateEnvelope,
  type Envelope
} from '../../src/crypto/envelope.js';

const envelope: Envelope = {
  algorithm: 'xchacha20poly1305',
  nonce: Buffer.alloc(24, 1),
  ciphertext: Buffer.from('sealed'),
  authTag: Buffer.alloc(16, 2),
  keyVersion: 'v1'
};

function serialized(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...toSerializedEnvelope(envelope), ...overrides });
}

describe('Envelope serialization', () => {
  it('should write snake_case fields with base64 binary values', () => {
    expect(JSON.parse(serializeEnvelope(envelope))).toEqual({
      algorithm: 'xchacha20poly1305',
      nonce: Buffer.alloc(24, 1).toString('base64'),
      ciphertext: Buffer.from('sealed').toString('base64'),
      auth_tag: Buffer.alloc(16, 2).toString('base64'),
      key_version: 'v1'
    });
  });

  it('should parse what it serializes', () => {
    const parsed = parseEnvelope(serializeEnvelope(envelope));

    expect(parsed.algorithm).toBe('xchacha20poly1305');
    expect(parsed.keyVersion).toBe('v1');
    expect(parsed.nonce.equals(envelope.nonce)).toBe(true);
    expect(parsed.ciphertext.toString()).toBe('sealed');
    expect(parsed.authTag.equals(envelope.authTag)).toBe(true);
  });

  it('should accept AES-256-GCM sizes', () => {
    const parsed = parseEnvelope(
      serialized({ algorithm: 'aes-256-gcm', nonce: Buffer.alloc(12).toString('base64') })
    );
    expect(parsed.nonce).toHaveLength(12);
  });
});

describe('Envelope validation', () => {
  it('should reject malformed JSON', () => {
    expect(() => parseEnvelope('{not json')).toThrow(EncryptionError);
    expect(() => parseEnvelope('{not json')).toThrow(/^Invalid JSON structure/);
  });

  it('should reject JSON that is not an object', () => {
    expect(() => parseEnvelope('[]')).toThrow('Invalid JSON structure: expected an object');
    expect(() => validateEnvelope(null)).toThrow('Invalid JSON structure: expected an object');
  });

  it('should list missing fields', () => {
    const partial = JSON.stringify({ algorithm: 'xchacha20poly1305', nonce: 'AAAA' });
    expect(() => parseEnvelope(partial)).toThrow(
      'Missing required fields: ciphertext, auth_tag, key_version'
    );
  });

  it('should reject fields of the wrong type', () => {
    expect(() => parseEnvelope(serialized({ key_version: 1 }))).toThrow(
      'Invalid field types: key_version'
    );
  });

  it('should reject an unsupported algorithm', () => {
    expect(() => parseEnvelope(serialized({ algorithm: 'rot13' }))).toThrow(
      'Unsupported algorithm: rot13'
    );
  });

  it('should reject invalid base64 in any binary field', () => {
    expect(() => parseEnvelope(serialized({ nonce: 'not base64!' }))).toThrow(
      'Invalid Base64 encoding in nonce field'
    );
    expect(() => parseEnvelope(serialized({ ciphertext: 'c2VhbGVk\n' }))).toThrow(
      'Invalid Base64 encoding in ciphertext field'
    );
    expect(() => parseEnvelope(serialized({ auth_tag: 'AAA' }))).toThrow(
      'Invalid Base64 encoding in auth_tag field'
    );
  });

  it('should reject a nonce of the wrong size for the algorithm', () => {
    expect(() => parseEnvelope(serialized({ nonce: Buffer.alloc(12).toString('base64') }))).toThrow(
      'Invalid nonce size'
    );
  });

  it('should reject an auth tag of the wrong size', () => {
    expect(() => parseEnvelope(serialized({ auth_tag: Buffer.alloc(15).toString('base64') }))).toThrow(
      'Invalid auth_tag size'
    );
  });
});

describe('isEnvelopeJson', () => {
  it('should recognize envelope-shaped JSON', () => {
    expect(isEnvelopeJson(serializeEnvelope(envelope))).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isEnvelopeJson('123-45-6789')).toBe(false);
    expect(isEnvelopeJson('{"algorithm":"xchacha20poly1305"}')).toBe(false);
    expect(isEnvelopeJson('null')).toBe(false);
  });
});
