import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Keep tests independent from prebuilt package artifacts in clean checkouts.
      '@tessellate/shared': packageEntry('shared'),
      '@tessellate/core': packageEntry('core'),
      '@tessellate/db': packageEntry('db'),
      '@tessellate/cli': packageEntry('cli'),
    },
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/dist/**', '**/node_modules/**', '**/*.d.ts'],
    },
  },
});
