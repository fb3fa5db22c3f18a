import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // Test timeout (increase for integration tests)
    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    restoreMocks: true,     // Restore original implementations
    clearMocks: true,       // Clear mock history
    unstubGlobals: true,    // Undo vi.stubGlobal between tests
    unstubEnvs: true,       // Undo vi.stubEnv between tests

    watch: false,
  },
});
