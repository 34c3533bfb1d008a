// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/types`
 * Purpose: Shared replication-check type definitions and constants (logic-free).
 * Scope: Defines declarations, snapshots, verdicts, alert routes, outcomes and the run report. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, and interfaces
 * - All snapshot types are readonly; a run never mutates its inputs
 * Side-effects: none (constants and types only)
 * Links: namespace-id.ts, services/runReplicationCheck.ts
 * @public
 */

import type { AlertRoutingError, AlertTransportError, ConfigResolutionError } from "./errors.js";
import type { NamespaceId } from "./namespace-id.js";

export const VERDICT_STATUSES = ["OK", "WARNING", "CRITICAL"] as const;

export type VerdictStatus = (typeof VERDICT_STATUSES)[number];

/**
 * One orchestrator instance definition (e.g. `main`, `canary`) of a service.
 * `declaredNamespace` absent means the instance registers under its own name.
 */
export interface InstanceDeclaration {
  readonly owningService: string;
  readonly instanceName: string;
  readonly declaredNamespace?: string;
  readonly instanceCount: number;
}

/** A declaration the config store could not read. */
export interface DeclarationFailure {
  readonly owningService: string;
  /** null when the whole service file was unreadable */
  readonly instanceName: string | null;
  readonly error: ConfigResolutionError;
}

/** Immutable per-run view of every declared instance. */
export interface DeclarationSnapshot {
  readonly declarations: readonly InstanceDeclaration[];
  readonly failures: readonly DeclarationFailure[];
  /** Services whose orchestrator configuration was discoverable in this cluster */
  readonly services: ReadonlySet<string>;
}

/** Encoded namespace id → available backend count. Absent key means no data. */
export type AvailabilityMap = ReadonlyMap<string, number>;

export interface Verdict {
  readonly status: VerdictStatus;
  /** available / expected * 100; 0 for the no-data path */
  readonly ratio: number;
  readonly message: string;
}

export interface AlertRoute {
  readonly team: string;
  readonly runbook: string;
  readonly tip: string | null;
  readonly notificationEmail: string | null;
  readonly page: boolean;
}

/** Event handed to the alert transport. One per namespace per run at most. */
export interface ReplicationAlertEvent {
  readonly checkId: string;
  readonly runbook: string;
  readonly verdict: Verdict;
  readonly message: string;
  readonly route: AlertRoute;
}

export type ExpectedResolution =
  | { readonly kind: "resolved"; readonly count: number }
  | { readonly kind: "unmanaged"; readonly reason: string };

export const DELIVERY_STATUSES = ["emitted", "suppressed", "failed"] as const;

export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

export type Delivery =
  | { readonly status: "emitted" }
  | { readonly status: "suppressed" }
  | {
      readonly status: "failed";
      readonly error: AlertTransportError | AlertRoutingError;
    };

export interface SkippedNotManagedOutcome {
  readonly state: "skipped_not_managed";
  readonly rawId: string;
  readonly reason: string;
}

export interface SkippedNotInScopeOutcome {
  readonly state: "skipped_not_in_scope";
  readonly rawId: string;
  readonly namespaceId: NamespaceId;
}

export interface EvaluatedOutcome {
  readonly state: "evaluated";
  readonly rawId: string;
  readonly namespaceId: NamespaceId;
  readonly checkId: string;
  readonly expected: number;
  /** null when the namespace was absent from the availability map */
  readonly available: number | null;
  readonly noData: boolean;
  readonly verdict: Verdict;
  readonly delivery: Delivery;
}

export type ReplicationOutcome =
  | SkippedNotManagedOutcome
  | SkippedNotInScopeOutcome
  | EvaluatedOutcome;

export type OutcomeState = ReplicationOutcome["state"];

export interface ReplicationCheckSummary {
  readonly total: number;
  readonly skippedNotManaged: number;
  readonly skippedNotInScope: number;
  readonly byStatus: Readonly<Record<VerdictStatus, number>>;
  readonly noData: number;
  readonly byDelivery: Readonly<Record<DeliveryStatus, number>>;
}

export interface ReplicationCheckReport {
  readonly outcomes: readonly ReplicationOutcome[];
  readonly summary: ReplicationCheckSummary;
}
