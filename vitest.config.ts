import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // 워크스페이스 패키지는 빌드 없이 소스로 실행
      '@netconfig/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts', 'cli/src/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      NO_COLOR: '1',
    },
  },
});
