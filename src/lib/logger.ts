import { pino, type DestinationStream, type LoggerOptions } from 'pino';

import { env } from '../config/index.js';

// Key material and plaintext never reach a log line, even when a caller
// passes them in by mistake.
export const redactPaths: string[] = [
  'password',
  'authorization',
  'headers.authorization',
  '*.password',
  '*.secret',
  'plaintext',
  '*.plaintext',
  'masterKey',
  '*.masterKey',
  '*.key',
  'encryptionKeys',
  '*.encryptionKeys'
];

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

function baseOptions(): LoggerOptions {
  return {
    level: env.LOG_LEVEL,
    base: {
      app: 'sealed-fields',
      env: env.NODE_ENV
    },
    redact: {
      paths: redactPaths,
      remove: true
    }
  };
}

export const logger = pino({ ...baseOptions(), transport });

/**
 * Same settings as `logger`, written to `destination` at `level`. Used by
 * tests to inspect what would have been logged.
 */
export function createLogger(destination: DestinationStream, level = 'trace') {
  return pino({ ...baseOptions(), level }, destination);
}
