import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // Use node environment
    globals: true, // Enable globals like describe, it, expect
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    isolate: true, // Run tests in separate worker processes
    testTimeout: 30000, // pglite boots a WASM database per suite
  },
});
