import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const sharedSrc = fileURLToPath(new URL('./apps/ts/packages/shared/src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@keymirror\/shared$/, replacement: `${sharedSrc}/index.ts` }],
  },
  test: {
    environment: 'node',
    env: { FORCE_COLOR: '0' },
    include: ['apps/ts/packages/*/src/**/*.test.ts'],
    restoreMocks: true,
  },
});
