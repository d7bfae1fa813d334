import { EncryptionEngine } from '../../src/crypto/engine.js';
import { DerivationCounter } from '../../src/crypto/instrumentation.js';
import {
  createEncryptionConfig,
  type EncryptionConfig,
  type EncryptionSettings
} from '../../src/crypto/keys.js';
import { defineRecordModel } from '../../src/records/record.js';

/** 'a' * 32 and 'b' * 32, base64-encoded. */
export const KEY_V1 = Buffer.alloc(32, 'a').toString('base64');
export const KEY_V2 = Buffer.alloc(32, 'b').toString('base64');

export function testConfig(overrides: Partial<EncryptionSettings> = {}): EncryptionConfig {
  return createEncryptionConfig({
    encryptionKeys: { v1: KEY_V1 },
    currentKeyVersion: 'v1',
    ...overrides
  });
}

export interface TestEngine {
  engine: EncryptionEngine;
  counter: DerivationCounter;
}

export function createTestEngine(overrides: Partial<EncryptionSettings> = {}): TestEngine {
  const counter = new DerivationCounter();
  const engine = new EncryptionEngine(testConfig(overrides), { counter });
  return { engine, counter };
}

export function defineUserModel(engine: EncryptionEngine) {
  return defineRecordModel({
    name: 'User',
    identifierField: 'id',
    fields: ['id', 'email'],
    encryptedFields: {
      ssn: { aadFields: ['email'] },
      notes: {}
    },
    engine
  });
}

/** Copy of `buffer` with one bit flipped at `index`. */
export function flipByte(buffer: Buffer, index = 0): Buffer {
  const copy = Buffer.from(buffer);
  copy[index] ^= 0x01;
  return copy;
}
