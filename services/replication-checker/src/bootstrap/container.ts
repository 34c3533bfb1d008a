// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/bootstrap/container`
 * Purpose: Composition root. Wires concrete adapters to the core's port interfaces.
 * Scope: All adapter construction lives here. Returns a typed container against port interfaces.
 * Invariants:
 * - Only file that instantiates adapters
 * - One SOA adapter instance serves universe, declarations and routing for a run
 * - dryRun swaps the Sensu transport for the logging one
 * Side-effects: none (adapters perform IO lazily)
 * Links: src/check.ts, @replication-monitor/core ports
 * @internal
 */

import type {
  NamespaceUniversePort,
  ReplicationCheckDeps,
} from "@replication-monitor/core";

import { DryRunAlertAdapter } from "../adapters/dry-run/dry-run.adapter.js";
import { SensuAlertAdapter } from "../adapters/sensu/sensu.adapter.js";
import { SoaConfigAdapter } from "../adapters/soa/soa-config.adapter.js";
import { SynapseAvailabilityAdapter } from "../adapters/synapse/synapse.adapter.js";
import type { CheckerSettings } from "../cli.js";
import type { Logger } from "../observability/logger.js";

export interface CheckerContainer {
  universe: NamespaceUniversePort;
  deps: ReplicationCheckDeps;
  settings: CheckerSettings;
  logger: Logger;
}

/**
 * Build the checker container from validated settings and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(
  settings: CheckerSettings,
  logger: Logger
): CheckerContainer {
  const soa = new SoaConfigAdapter(
    { soaDir: settings.SOA_DIR, cluster: settings.CLUSTER },
    logger.child({ component: "soa-config" })
  );

  const transport = settings.dryRun
    ? new DryRunAlertAdapter(logger.child({ component: "dry-run" }))
    : new SensuAlertAdapter({
        url: settings.SENSU_URL,
        timeoutMs: settings.FETCH_TIMEOUT_MS,
      });

  return {
    universe: soa,
    deps: {
      instanceConfig: soa,
      availability: new SynapseAvailabilityAdapter({
        hostPort: settings.SYNAPSE_HOST_PORT,
        timeoutMs: settings.FETCH_TIMEOUT_MS,
      }),
      routing: soa,
      transport,
      logger,
    },
    settings,
    logger,
  };
}
