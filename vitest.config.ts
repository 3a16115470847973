import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

const PACKAGES = ['utils', 'core', 'backtest', 'trading', 'workflows', 'cli'];

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    // Workspace packages load from source so tests never need a build
    alias: Object.fromEntries(
      PACKAGES.map((name) => [`@stratgate/${name}`, resolveFromRoot(`packages/${name}/src/index.ts`)])
    ),
  },
});
