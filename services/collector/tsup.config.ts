// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/tsup.config`
 * Purpose: Build configuration for the collector service.
 * Scope: Defines tsup bundler settings for the deployable service. Does not contain runtime code.
 * Invariants: ESM format only; the workspace core package is bundled in, npm dependencies stay external.
 * Side-effects: none
 * Links: services/collector/src/main.ts
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: ["@lp-reporting/reporting-core"],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
