// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/check`
 * Purpose: One replication check run: list the namespace universe, then evaluate and alert every namespace.
 * Scope: Glue between the container and runReplicationCheck. Does not parse flags or exit the process.
 * Invariants: The universe is listed once per run, before either snapshot is taken.
 * Side-effects: IO (via container adapters)
 * Links: src/bootstrap/container.ts, src/main.ts
 * @public
 */

import {
  type ReplicationCheckReport,
  runReplicationCheck,
} from "@replication-monitor/core";

import type { CheckerContainer } from "./bootstrap/container.js";

export type { CheckerContainer } from "./bootstrap/container.js";
export { createContainer } from "./bootstrap/container.js";
export { type CheckerSettings, resolveSettings, USAGE } from "./cli.js";

export async function runCheck(
  container: CheckerContainer
): Promise<ReplicationCheckReport> {
  const { universe, deps, settings, logger } = container;

  const namespaces = await universe.listNamespaces();
  logger.info(
    {
      namespaces: namespaces.length,
      cluster: settings.CLUSTER,
      dryRun: settings.dryRun,
    },
    "Starting replication check"
  );

  return runReplicationCheck(deps, {
    namespaces,
    warnPct: settings.WARN_PCT,
    critPct: settings.CRIT_PCT,
    concurrency: settings.CHECK_CONCURRENCY,
    checkNamePrefix: settings.CHECK_NAME_PREFIX,
  });
}
