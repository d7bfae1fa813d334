/**
 * Error taxonomy for the encryption engine. Every failure is raised to the
 * caller; nothing here degrades to plaintext or a silent no-op.
 */

export class EncryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncryptionError';
  }
}

/** Missing or undersized key material, or an unusable personalization string. */
export class KeyError extends EncryptionError {
  constructor(message: string) {
    super(message);
    this.name = 'KeyError';
  }
}

/**
 * Authentication failure. The message never says which of ciphertext,
 * nonce, tag or AAD was wrong.
 */
export class DecryptionError extends EncryptionError {
  constructor() {
    super('Decryption failed');
    this.name = 'DecryptionError';
  }
}

export class SecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SecurityError';
  }
}

export class SerializerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerializerError';
  }
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}
