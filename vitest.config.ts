import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**'],
      exclude: ['**/index.ts', '**/types.ts'],
    },
  },
  resolve: {
    alias: {
      // Workspace packages resolve to their sources in tests
      '@agentloom/agents-node': fileURLToPath(
        new URL('./packages/loom-agents-node/src/index.ts', import.meta.url)
      ),
      '@agentloom/agents': fileURLToPath(
        new URL('./packages/loom-agents/src/index.ts', import.meta.url)
      ),
    },
  },
});
