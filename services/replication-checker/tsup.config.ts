// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/tsup.config`
 * Purpose: Build configuration for the runnable replication checker.
 * Scope: Defines tsup bundler settings for `dist/main.js`. Does not contain runtime code.
 * Invariants: ESM format only; the core workspace package is bundled because it ships TypeScript sources.
 * Side-effects: none
 * Links: package.json (bin, start)
 * @internal
 */

import { defineConfig, type Options } from "tsup";

export const buildOptions = {
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: ["@replication-monitor/core"], // npm packages stay in node_modules
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
  banner: { js: "#!/usr/bin/env node" },
} satisfies Options;

export default defineConfig(buildOptions);
