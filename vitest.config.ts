import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@jobscout/agents': path.resolve(root, 'agents/src'),
      '@jobscout/core': path.resolve(root, 'packages/core/src'),
      '@jobscout/db': path.resolve(root, 'packages/db/src'),
      '@jobscout/llm': path.resolve(root, 'packages/llm/src'),
      '@jobscout/schemas': path.resolve(root, 'packages/schemas/src'),
      '@/lib': path.resolve(root, 'apps/cli/lib'),
    },
  },
});
