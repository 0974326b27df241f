import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('.', import.meta.url));
const coreSrc = resolve(rootDir, 'packages', 'core', 'src');
const protocolSrc = resolve(rootDir, 'packages', 'protocol', 'src');

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
  },
  resolve: {
    alias: [
      { find: /^@stakegov\/core$/, replacement: resolve(coreSrc, 'index.ts') },
      { find: /^@stakegov\/core\/(.*)$/, replacement: `${coreSrc}/$1/index.ts` },
      { find: /^@stakegov\/protocol$/, replacement: resolve(protocolSrc, 'index.ts') },
      { find: /^@stakegov\/protocol\/(.*)$/, replacement: `${protocolSrc}/$1/index.ts` },
    ],
  },
});
