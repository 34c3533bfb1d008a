// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/cli`
 * Purpose: Command-line flags for the checker, merged over the environment before validation.
 * Scope: Flag parsing and settings resolution. Does not construct adapters.
 * Invariants:
 * - Flags win over env vars; both pass through the same zod schema
 * - Unknown flags and positionals are rejected
 * Side-effects: none
 * Links: src/bootstrap/env.ts, src/main.ts
 * @public
 */

import { parseArgs } from "node:util";

import { type Env, parseEnv } from "./bootstrap/env.js";

export const USAGE = `Usage: replication-checker [options]

Checks the number of HAProxy backends reported by Synapse against the number
of instances Marathon is expected to run, and reports each namespace to Sensu.

Options:
  -s, --synapse-host-port HOST:PORT  Synapse stats listener (env SYNAPSE_HOST_PORT, default localhost:3212)
  -w, --warn PERCENTAGE              WARNING at or below this ratio (env WARN_PCT, default 75)
  -c, --crit PERCENTAGE              CRITICAL at or below this ratio (env CRIT_PCT, default 90)
  -d, --soa-dir SOA_DIR              SOA configuration directory (env SOA_DIR)
      --cluster CLUSTER              Cluster whose marathon-<cluster>.yaml is read (env CLUSTER)
      --dry-run                      Evaluate and log, never send alerts
  -v, --verbose                      Log every namespace (log level info)
  -h, --help                         Show this help

PERCENTAGE is an integer value representing the percentage of available to expected instances.
`;

export interface CliOptions {
  help: boolean;
  dryRun: boolean;
  /** Env-keyed values taken from flags */
  overrides: Record<string, string>;
}

export interface CheckerSettings extends Env {
  dryRun: boolean;
}

export type SettingsResolution =
  | { kind: "help" }
  | { kind: "run"; settings: CheckerSettings };

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      "synapse-host-port": { type: "string", short: "s" },
      warn: { type: "string", short: "w" },
      crit: { type: "string", short: "c" },
      "soa-dir": { type: "string", short: "d" },
      cluster: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const overrides: Record<string, string> = {};
  if (values["synapse-host-port"] !== undefined) {
    overrides.SYNAPSE_HOST_PORT = values["synapse-host-port"];
  }
  if (values.warn !== undefined) overrides.WARN_PCT = values.warn;
  if (values.crit !== undefined) overrides.CRIT_PCT = values.crit;
  if (values["soa-dir"] !== undefined) overrides.SOA_DIR = values["soa-dir"];
  if (values.cluster !== undefined) overrides.CLUSTER = values.cluster;
  if (values.verbose) overrides.LOG_LEVEL = "info";

  return {
    help: values.help === true,
    dryRun: values["dry-run"] === true,
    overrides,
  };
}

/**
 * Parses flags and validates them together with the environment.
 * Throws on unknown flags or invalid values.
 */
export function resolveSettings(
  argv: readonly string[],
  source: Record<string, string | undefined>
): SettingsResolution {
  const cli = parseCliArgs(argv);
  if (cli.help) return { kind: "help" };

  const env = parseEnv({ ...source, ...cli.overrides });
  return { kind: "run", settings: { ...env, dryRun: cli.dryRun } };
}
