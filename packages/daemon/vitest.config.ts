import { defineConfig } from 'vitest/config';
import { dirname } from 'path';
import { fileURLToPath } from 'url';

const packageDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    root: packageDir,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    // Debounce and scheduler tests drive fake timers; real-timer tests stay short
    testTimeout: 10000,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
