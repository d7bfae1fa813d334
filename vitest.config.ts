import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MONGO_URI: 'mongodb://localhost:27017/sealed_fields_test',
      // 'a' * 32, base64-encoded
      ENCRYPTION_KEYS: '{"v1":"YWFhYWFhYWFhYWFhYWFhYWFhYWFhYWFhYWFhYWFhYWE="}',
      CURRENT_KEY_VERSION: 'v1',
      ENCRYPTION_PERSONALIZATION: 'SealedFieldsTest'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.config.ts', '**/*.d.ts', 'tests/**', 'scripts/**']
    },
    include: ['tests/**/*.{test,spec}.ts']
  }
});
