import * as path from 'node:path';
import { defineConfig } from 'vitest/config';

const packages = ['types', 'core', 'syntax', 'reorder', 'formatter', 'cli'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      packages.map(name => [`@gdfmt/${name}`, path.resolve(__dirname, `packages/${name}/src/index.ts`)])
    ),
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    // tree-sitter is a native addon; keep each test file in its own process
    pool: 'forks',
  },
});
