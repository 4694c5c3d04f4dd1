import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (dir: string) => fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
  resolve: {
    alias: {
      '@canopy/types': source('packages/types'),
      '@canopy/kernel-vm': source('packages/kernel-vm'),
      '@canopy/tool-gateway': source('packages/tool-gateway'),
    },
  },
});
