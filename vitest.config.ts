import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@mac-enroll/core': pkg('core'),
      '@mac-enroll/connector-file': pkg('connector-file'),
      '@mac-enroll/reconcile': pkg('reconcile'),
      '@mac-enroll/transport': pkg('transport'),
      '@mac-enroll/cli': pkg('cli'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
