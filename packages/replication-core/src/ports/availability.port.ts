// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/ports/availability`
 * Purpose: Discovery port returning live backend counts per namespace.
 * Scope: Defines contract for the availability snapshot. Does not contain implementations.
 * Invariants:
 * - Single snapshot call per run
 * - A namespace the discovery layer has no entry for is absent from the map (not 0)
 * Side-effects: none (interface definition only)
 * Links: services/runReplicationCheck.ts, SynapseAvailabilityAdapter
 * @public
 */

import type { AvailabilityMap } from "../types.js";

export interface AvailabilityPort {
  getAvailableBackendCounts(
    namespaceIds: readonly string[]
  ): Promise<AvailabilityMap>;
}
