// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/ports`
 * Purpose: Port barrel, the canonical import surface for replication-check ports.
 * Scope: Re-exports only. No implementations, no runtime objects.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Links: Consumed by the orchestrator and by service adapters
 * @public
 */

export type { AlertRoutingPort, AlertTransportPort } from "./alerting.port.js";
export type { AvailabilityPort } from "./availability.port.js";
export type {
  InstanceConfigPort,
  NamespaceUniversePort,
} from "./instance-config.port.js";
