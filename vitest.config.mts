// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for the core package and the collector service.
 * Scope: Unit tests only; no database, no network.
 * Invariants: Coverage disabled by default; TZ pinned to UTC by the setup file.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: Uses vite-tsconfig-paths so workspace imports resolve to TypeScript sources.
 * Links: tests/setup.ts
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist", "**/dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: ["**/tests/**", "**/*.config.*", "**/index.ts"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
});
