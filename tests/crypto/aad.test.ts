import { createHash } from 'node:crypto';

import { describe, it, expect } from 'vitest';

import { buildAad, formatDerivationContext } from '../../src/crypto/aad.js';

const sha256Hex = (value: string) => createHash('sha256').update(value).digest('hex');

describe('buildAad', () => {
  it('should return null for records without an identifier', () => {
    expect(buildAad(null)).toBeNull();
    expect(buildAad(undefined, ['a@example.test'])).toBeNull();
    expect(buildAad('')).toBeNull();
  });

  it('should use the identifier alone when no fields are bound', () => {
    expect(buildAad('u-42')?.toString('utf-8')).toBe('u-42');
  });

  it('should hash the identifier with the bound field values', () => {
    expect(buildAad('u-42', ['a@example.test'])?.toString('utf-8')).toBe(
      sha256Hex('u-42:a@example.test')
    );
  });

  it('should skip null values and stringify the rest', () => {
    expect(buildAad('u-42', ['a@example.test', null, 7, undefined, true])?.toString('utf-8')).toBe(
      sha256Hex('u-42:a@example.test:7:true')
    );
  });

  it('should differ between records that share field values', () => {
    const first = buildAad('A', ['a@x.com']);
    const second = buildAad('B', ['a@x.com']);

    expect(first?.equals(second ?? Buffer.alloc(0))).toBe(false);
  });
});

describe('formatDerivationContext', () => {
  it('should join model, field and identifier', () => {
    expect(formatDerivationContext({ modelType: 'User', field: 'ssn', identifier: 'u-42' })).toBe(
      'User:ssn:u-42'
    );
  });

  it('should leave the identifier slot empty for unsaved records', () => {
    expect(formatDerivationContext({ modelType: 'User', field: 'ssn', identifier: null })).toBe(
      'User:ssn:'
    );
  });

  it('should pass preformatted strings through', () => {
    expect(formatDerivationContext('User:ssn:u-42')).toBe('User:ssn:u-42');
  });
});
