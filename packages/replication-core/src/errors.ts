// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/errors`
 * Purpose: Domain error classes for replication checks.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: services/runReplicationCheck.ts
 * @public
 */

export class NamespaceIdParseError extends Error {
  public readonly code = "NAMESPACE_ID_INVALID" as const;
  constructor(
    public readonly rawId: string,
    detail: string
  ) {
    super(`Invalid namespace id "${rawId}": ${detail}`);
    this.name = "NamespaceIdParseError";
  }
}

/**
 * A service's orchestrator configuration could not be read structurally:
 * missing key, wrong type, unreadable or unparsable file.
 */
export class ConfigResolutionError extends Error {
  public readonly code = "CONFIG_RESOLUTION_FAILED" as const;
  constructor(
    public readonly serviceName: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Config for service ${serviceName} unresolvable: ${detail}`, options);
    this.name = "ConfigResolutionError";
  }
}

export type SnapshotKind = "declarations" | "availability";

/** One of the two per-run input snapshots could not be obtained. Fatal for the run. */
export class SnapshotUnavailableError extends Error {
  public readonly code = "SNAPSHOT_UNAVAILABLE" as const;
  constructor(
    public readonly snapshot: SnapshotKind,
    options?: { cause?: unknown }
  ) {
    super(`Failed to obtain ${snapshot} snapshot`, options);
    this.name = "SnapshotUnavailableError";
  }
}

export class AlertTransportError extends Error {
  public readonly code = "ALERT_TRANSPORT_FAILED" as const;
  constructor(
    public readonly checkId: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Alert ${checkId} not delivered: ${detail}`, options);
    this.name = "AlertTransportError";
  }
}

export class AlertRoutingError extends Error {
  public readonly code = "ALERT_ROUTING_FAILED" as const;
  constructor(
    public readonly serviceName: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Alert routing for service ${serviceName} unresolvable: ${detail}`, options);
    this.name = "AlertRoutingError";
  }
}

// Type guards

export function isNamespaceIdParseError(
  error: unknown
): error is NamespaceIdParseError {
  return error instanceof Error && error.name === "NamespaceIdParseError";
}

export function isConfigResolutionError(
  error: unknown
): error is ConfigResolutionError {
  return error instanceof Error && error.name === "ConfigResolutionError";
}

export function isSnapshotUnavailableError(
  error: unknown
): error is SnapshotUnavailableError {
  return error instanceof Error && error.name === "SnapshotUnavailableError";
}

export function isAlertTransportError(
  error: unknown
): error is AlertTransportError {
  return error instanceof Error && error.name === "AlertTransportError";
}

export function isAlertRoutingError(error: unknown): error is AlertRoutingError {
  return error instanceof Error && error.name === "AlertRoutingError";
}

/** Best-effort human-readable message for an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
