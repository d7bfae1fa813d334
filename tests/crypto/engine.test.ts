import { describe, it, expect, vi, afterEach } from 'vitest';

import { activeKeyCacheSize, withKeyCache } from '../../src/crypto/derivation.js';
import { EncryptionEngine } from '../../src/crypto/engine.js';
import {
  parseEnvelope,
  toSerializedEnvelope,
  type Envelope
} from '../../src/crypto/envelope.js';
import { DecryptionError, EncryptionError } from '../../src/crypto/errors.js';
import { derivationCounter } from '../../src/crypto/instrumentation.js';
import { createEncryptionConfig, withEncryptionKeys } from '../../src/crypto/keys.js';
import { logger } from '../../src/lib/logger.js';
import { KEY_V2, createTestEngine, flipByte, testConfig } from '../helpers/fixtures.js';

const context = { modelType: 'User', field: 'ssn', identifier: 'u-42' };

describe('EncryptionEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should encrypt the reference value with the primary cipher', () => {
    const { engine } = createTestEngine();

    const envelope = engine.encryptFor('User:ssn:u-42', '123-45-6789');

    expect(envelope.algorithm).toBe('xchacha20poly1305');
    expect(envelope.nonce).toHaveLength(24);
    expect(envelope.authTag).toHaveLength(16);
    expect(envelope.keyVersion).toBe('v1');
    expect(engine.decryptFor('User:ssn:u-42', envelope)).toBe('123-45-6789');
  });

  it('should treat a structured context like its string form', () => {
    const { engine } = createTestEngine();

    const envelope = engine.encryptFor(context, '123-45-6789');
    expect(engine.decryptFor('User:ssn:u-42', envelope)).toBe('123-45-6789');
  });

  it('should round-trip through envelope JSON', () => {
    const { engine } = createTestEngine();

    const json = engine.encryptToJson(context, 'multi-byte ✓ value', 'u-42');

    expect(parseEnvelope(json).keyVersion).toBe('v1');
    expect(engine.decryptJson(context, json, 'u-42')).toBe('multi-byte ✓ value');
  });

  it('should round-trip an empty plaintext', () => {
    const { engine } = createTestEngine();
    const envelope = engine.encryptFor(context, '');

    expect(envelope.ciphertext).toHaveLength(0);
    expect(engine.decryptFor(context, envelope)).toBe('');
  });

  it('should round-trip binary plaintext that is not valid UTF-8', () => {
    const { engine } = createTestEngine();
    const bytes = Buffer.from([0xff, 0xfe, 0x00, 0x80]);

    const json = engine.encryptToJson(context, bytes, 'u-42');
    const opened = engine.decryptBytesFor(context, json, 'u-42');

    expect(opened.toString('hex')).toBe('fffe0080');
  });

  it('should never repeat a nonce for the same plaintext', () => {
    const { engine } = createTestEngine();

    const envelopes = Array.from({ length: 12 }, () => engine.encryptFor(context, '123-45-6789'));

    expect(new Set(envelopes.map(envelope => envelope.nonce.toString('hex'))).size).toBe(12);
    expect(new Set(envelopes.map(envelope => envelope.ciphertext.toString('hex'))).size).toBe(12);
  });

  describe('tamper detection', () => {
    const { engine } = createTestEngine();
    const envelope = engine.encryptFor(context, '123-45-6789', 'u-42');
    const tampered = (changes: Partial<Envelope>): Envelope => ({ ...envelope, ...changes });

    it('should reject a modified nonce', () => {
      expect(() => engine.decryptFor(context, tampered({ nonce: flipByte(envelope.nonce) }), 'u-42')).toThrow(
        DecryptionError
      );
    });

    it('should reject a modified ciphertext', () => {
      expect(() =>
        engine.decryptFor(context, tampered({ ciphertext: flipByte(envelope.ciphertext) }), 'u-42')
      ).toThrow(DecryptionError);
    });

    it('should reject a modified auth tag', () => {
      expect(() =>
        engine.decryptFor(context, tampered({ authTag: flipByte(envelope.authTag) }), 'u-42')
      ).toThrow(DecryptionError);
    });

    it('should reject a different AAD', () => {
      expect(() => engine.decryptFor(context, envelope, 'u-43')).toThrow(DecryptionError);
      expect(() => engine.decryptFor(context, envelope)).toThrow(DecryptionError);
    });

    it('should reject a different context', () => {
      expect(() =>
        engine.decryptFor({ ...context, identifier: 'u-43' }, envelope, 'u-42')
      ).toThrow('Decryption failed');
    });

    it('should log the failure without the plaintext', () => {
      const warn = vi.spyOn(logger, 'warn');

      expect(() => engine.decryptFor(context, envelope, 'u-43')).toThrow(DecryptionError);
      expect(warn).toHaveBeenCalledWith(
        { context: 'User:ssn:u-42', algorithm: 'xchacha20poly1305', keyVersion: 'v1' },
        'Field decryption failed'
      );
    });
  });

  describe('key rotation', () => {
    it('should keep old envelopes readable and encrypt new ones under the new version', () => {
      const { engine } = createTestEngine();
      const before = engine.encryptFor(context, '123-45-6789');

      engine.reload(withEncryptionKeys(engine.config, { v2: KEY_V2 }, 'v2'));
      const after = engine.encryptFor(context, '123-45-6789');

      expect(before.keyVersion).toBe('v1');
      expect(after.keyVersion).toBe('v2');
      expect(engine.decryptFor(context, before)).toBe('123-45-6789');
      expect(engine.decryptFor(context, after)).toBe('123-45-6789');
    });

    it('should fail once the old key is removed', () => {
      const { engine } = createTestEngine();
      const before = engine.encryptFor(context, '123-45-6789');

      engine.reload(createEncryptionConfig({ encryptionKeys: { v2: KEY_V2 }, currentKeyVersion: 'v2' }));

      expect(() => engine.decryptFor(context, before)).toThrow('No key for version: v1');
    });

    it('should drop cached keys when reloaded inside a key cache scope', () => {
      const { engine, counter } = createTestEngine();

      withKeyCache(() => {
        const before = engine.encryptFor(context, '123-45-6789');

        engine.reload(testConfig({ encryptionKeys: { v1: KEY_V2 } }));

        expect(() => engine.decryptFor(context, before)).toThrow(DecryptionError);
        expect(activeKeyCacheSize()).toBe(1);
      });

      expect(counter.value).toBe(2);
    });
  });

  describe('algorithm selection', () => {
    it('should honor a per-call algorithm override', () => {
      const { engine } = createTestEngine();

      const envelope = engine.encryptFor(context, '123-45-6789', null, { algorithm: 'aes-256-gcm' });

      expect(envelope.algorithm).toBe('aes-256-gcm');
      expect(envelope.nonce).toHaveLength(12);
      expect(engine.decryptFor(context, envelope)).toBe('123-45-6789');
    });

    it('should use the configured default algorithm', () => {
      const { engine } = createTestEngine({ defaultAlgorithm: 'aes-256-gcm' });

      expect(engine.encryptFor(context, '123-45-6789').algorithm).toBe('aes-256-gcm');
      expect(engine.info()).toEqual({
        algorithm: 'aes-256-gcm',
        keySize: 32,
        nonceSize: 12,
        authTagSize: 16
      });
    });

    it('should decrypt with the algorithm named in the envelope', () => {
      const { engine } = createTestEngine();
      const envelope = engine.encryptFor(context, '123-45-6789');

      engine.reload(testConfig({ defaultAlgorithm: 'aes-256-gcm' }));

      expect(engine.decryptFor(context, envelope)).toBe('123-45-6789');
    });

    it('should report the primary algorithm by default', () => {
      const { engine } = createTestEngine();
      expect(engine.info()).toEqual({
        algorithm: 'xchacha20poly1305',
        keySize: 32,
        nonceSize: 24,
        authTagSize: 16
      });
    });
  });

  describe('derivation counting', () => {
    it('should derive 2N keys for N encryptions and N decryptions', () => {
      const { engine, counter } = createTestEngine();

      const envelopes = Array.from({ length: 5 }, () => engine.encryptFor(context, '123-45-6789'));
      for (const envelope of envelopes) {
        engine.decryptFor(context, envelope);
      }

      expect(counter.value).toBe(10);
    });

    it('should derive once per slot inside a key cache scope', () => {
      const { engine, counter } = createTestEngine();

      withKeyCache(() => {
        const envelopes = Array.from({ length: 5 }, () => engine.encryptFor(context, '123-45-6789'));
        for (const envelope of envelopes) {
          expect(engine.decryptFor(context, envelope)).toBe('123-45-6789');
        }
      });

      expect(counter.value).toBe(1);
    });

    it('should use the process-wide counter by default', () => {
      const engine = new EncryptionEngine(testConfig());

      engine.encryptFor(context, '123-45-6789');

      expect(derivationCounter.value).toBe(1);
    });
  });

  describe('configuration errors', () => {
    it('should fail every operation without keys', () => {
      const { engine } = createTestEngine({ encryptionKeys: {}, currentKeyVersion: null });

      expect(() => engine.validateConfiguration()).toThrow('No encryption keys configured');
      expect(() => engine.encryptFor(context, '123-45-6789')).toThrow(EncryptionError);
    });

    it('should fail without a current version', () => {
      const { engine } = createTestEngine({ currentKeyVersion: null });
      expect(() => engine.encryptFor(context, '123-45-6789')).toThrow('No current key version set');
    });

    it('should reject malformed envelope JSON before decrypting', () => {
      const { engine, counter } = createTestEngine();

      expect(() => engine.decryptJson(context, '{"algorithm":"rot13"}')).toThrow(
        'Missing required fields: nonce, ciphertext, auth_tag, key_version'
      );
      expect(counter.value).toBe(0);
    });
  });

  it('should reject an empty key version before deriving', () => {
    const { engine, counter } = createTestEngine();
    const serialized = toSerializedEnvelope(engine.encryptFor(context, '123-45-6789'));
    counter.reset();

    const json = JSON.stringify({ ...serialized, key_version: '' });

    expect(() => engine.decryptJson(context, json)).toThrow('Key version cannot be nil');
    expect(counter.value).toBe(0);
  });

  it('should use a per-context personalization override', () => {
    const { engine } = createTestEngine();
    const envelope = engine.encryptFor({ ...context, personalization: 'OtherApp' }, '123-45-6789');

    expect(() => engine.decryptFor(context, envelope)).toThrow(DecryptionError);
    expect(engine.decryptFor({ ...context, personalization: 'OtherApp' }, envelope)).toBe(
      '123-45-6789'
    );
  });
});
