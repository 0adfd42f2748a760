import { defineConfig } from 'vitest/config';
import { readdirSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Resolve @narrator/* straight to each package's src/index.ts so tests run
// without a build step.
const root = dirname(fileURLToPath(import.meta.url));
const packagesDir = resolve(root, 'packages');
const alias: Record<string, string> = {};
for (const name of readdirSync(packagesDir)) {
  alias[`@narrator/${name}`] = resolve(packagesDir, name, 'src', 'index.ts');
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/*.d.ts', '**/index.ts'],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
