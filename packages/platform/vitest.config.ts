/**
 * Vitest Configuration: @satkit/platform
 *
 * Unit tests for the client engine. HTTP goes through an in-process fake
 * transport; configuration files live in temporary directories.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
