import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';

export default defineConfig({
  test: {
    watch: false,
    fileParallelism: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules'],
    testTimeout: 20000,
    fakeTimers: {
      // The fake socket simulates I/O completion with setImmediate; keep it real
      toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
    },
  },
  resolve: {
    alias: {
      'oneshot-tcp': resolve(__dirname, './packages/core/src'),
      '@oneshot-tcp/responder': resolve(__dirname, './packages/responder/src'),
    },
  },
});
