// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/bootstrap/env`
 * Purpose: Environment configuration with Zod validation.
 * Scope: Config parsing only. No client construction. Callers pass process.env merged with CLI overrides.
 * Invariants:
 * - CLUSTER required (selects marathon-<cluster>.yaml)
 * - Threshold percentages are non-negative integers
 * - Fails fast with every invalid key listed
 * Side-effects: none
 * Links: src/cli.ts, src/bootstrap/container.ts
 * @internal
 */

import {
  DEFAULT_CHECK_CONCURRENCY,
  DEFAULT_CHECK_NAME_PREFIX,
  DEFAULT_CRIT_PCT,
  DEFAULT_WARN_PCT,
} from "@replication-monitor/core";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  /** Root of the per-service SOA configuration tree */
  SOA_DIR: z.string().min(1).default("/nail/etc/services"),

  /** Cluster whose marathon-<cluster>.yaml files declare instances (required) */
  CLUSTER: z.string().min(1, "CLUSTER is required"),

  /** host:port of the local Synapse HAProxy stats endpoint */
  SYNAPSE_HOST_PORT: z.string().min(1).default("localhost:3212"),

  /** Base URL of the Sensu client socket HTTP API */
  SENSU_URL: z.string().url("SENSU_URL must be a valid URL").default("http://localhost:3031"),

  /** Ratio (percent) at or below which WARNING is raised */
  WARN_PCT: z.coerce.number().int().nonnegative().default(DEFAULT_WARN_PCT),

  /** Ratio (percent) at or below which CRITICAL is raised */
  CRIT_PCT: z.coerce.number().int().nonnegative().default(DEFAULT_CRIT_PCT),

  /** Max concurrent routing/alert calls per run */
  CHECK_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CHECK_CONCURRENCY),

  /** HTTP timeout for Synapse and Sensu calls */
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  /** Log level (default: warn; -v raises it to info) */
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),

  /** Service name for logging */
  SERVICE_NAME: z.string().default("replication-checker"),

  /** Prefix of every emitted check name */
  CHECK_NAME_PREFIX: z
    .string()
    .min(1)
    .default(DEFAULT_CHECK_NAME_PREFIX)
    .or(z.literal("").transform(() => DEFAULT_CHECK_NAME_PREFIX)),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record.
 * Throws with one line per invalid key.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}
