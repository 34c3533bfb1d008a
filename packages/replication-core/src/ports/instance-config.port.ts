// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/ports/instance-config`
 * Purpose: Config-store port for orchestrator instance declarations and the namespace universe.
 * Scope: Defines contract for reading declarations. Does not contain implementations.
 * Invariants:
 * - listInstanceDeclarations returns one materialized snapshot per call
 * - Per-item structural failures are reported in snapshot.failures, never thrown
 * - A rejected promise means the whole snapshot is unavailable
 * Side-effects: none (interface definition only)
 * Links: services/runReplicationCheck.ts, SoaConfigAdapter
 * @public
 */

import type { DeclarationSnapshot } from "../types.js";

export interface InstanceConfigPort {
  listInstanceDeclarations(): Promise<DeclarationSnapshot>;
}

/** Source of every encoded namespace id known to discovery configuration. */
export interface NamespaceUniversePort {
  listNamespaces(): Promise<readonly string[]>;
}
