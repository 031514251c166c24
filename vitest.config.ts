import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 15_000,
  },
  resolve: {
    alias: {
      '@toolpilot/core': pkg('core'),
      '@toolpilot/tools': pkg('tools'),
      '@toolpilot/agent-runtime': pkg('agent-runtime'),
      '@toolpilot/orchestrator': pkg('orchestrator'),
      '@toolpilot/app': pkg('app'),
    },
  },
});
