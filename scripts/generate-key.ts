#!/usr/bin/env tsx
/**
 * Generate Key Script
 * Prints a fresh base64 master key and an ENCRYPTION_KEYS line for it
 *
 *   npm run generate-key -- v2
 */

import { generateEncryptionKey } from '../src/crypto/keys.js';

function generateKey(version = 'v1'): void {
  const key = generateEncryptionKey();

  console.log('🔑 New master key (32 bytes, base64):\n');
  console.log(`   ${key}\n`);
  console.log('Add it to your environment:');
  console.log(`   ENCRYPTION_KEYS='${JSON.stringify({ [version]: key })}'`);
  console.log(`   CURRENT_KEY_VERSION=${version}\n`);
  console.log('When rotating, keep the previous versions in ENCRYPTION_KEYS so');
  console.log('existing values still decrypt.');
}

if (import.meta.url === `file://${process.argv[1]}`) {
  generateKey(process.argv[2]);
}

export { generateKey };
