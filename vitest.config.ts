import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup/vitest.setup.ts'],
    // los dispositivos de prueba son archivos reales en el tmp del sistema
    pool: 'forks',
    testTimeout: 20_000,
  },
});
