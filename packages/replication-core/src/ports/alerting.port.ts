// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/ports/alerting`
 * Purpose: Alert routing and alert transport ports.
 * Scope: Defines contracts for per-service routing lookup and event delivery. Does not contain implementations.
 * Invariants:
 * - resolveRouting returns null when no team is configured (unmanaged → suppressed)
 * - emit rejects on delivery failure; the core logs and does not retry
 * - emit must tolerate concurrent, unordered calls for independent events
 * Side-effects: none (interface definition only)
 * Links: services/runReplicationCheck.ts, SensuAlertAdapter
 * @public
 */

import type { AlertRoute, ReplicationAlertEvent } from "../types.js";

export interface AlertRoutingPort {
  resolveRouting(serviceName: string): Promise<AlertRoute | null>;
}

export interface AlertTransportPort {
  emit(event: ReplicationAlertEvent): Promise<void>;
}
