import { defineConfig } from 'vitest/config';
import { join } from 'path';
import { tmpdir } from 'os';

const testHome = join(tmpdir(), `gridpaint-test-${process.pid}`);

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    env: {
      // Keep conf and the file logger away from the real home directory
      GRIDPAINT_CONFIG_DIR: join(testHome, 'config'),
      GRIDPAINT_LOG_DIR: join(testHome, 'logs'),
      GRIDPAINT_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/*.spec.ts'],
    },
  },
});
