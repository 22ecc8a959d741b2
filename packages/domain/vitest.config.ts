/**
 * Vitest Configuration: @satkit/domain
 *
 * Tests for the entity catalogue: paths, payload quirks and the
 * per-entity helpers, against a fake transport.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
