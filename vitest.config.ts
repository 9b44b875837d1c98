import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packages = ['types', 'crypto', 'runtime', 'ownership', 'revenue', 'licensing', 'governance', 'core'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@koinon/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
});
