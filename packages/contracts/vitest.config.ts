/**
 * Vitest Configuration: @satkit/contracts
 *
 * Pure TypeScript tests. No network, no filesystem.
 * These tests validate field descriptors and their Zod schemas.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
