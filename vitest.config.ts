import path from 'node:path';
import { defineConfig } from 'vitest/config';

const repoRoot = path.resolve(__dirname);
const alias = {
  '@qbit-kit/resilient-http-core': path.resolve(repoRoot, 'libs/resilient-http-core/src/index.ts'),
  '@qbit-kit/qbittorrent-client': path.resolve(repoRoot, 'libs/qbittorrent-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
