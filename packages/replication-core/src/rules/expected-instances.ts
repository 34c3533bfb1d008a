// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/rules/expected-instances`
 * Purpose: Expected instance count per namespace, summed from orchestrator declarations.
 * Scope: Pure functions over a declaration snapshot. Does not read configuration or decide alerts.
 * Invariants:
 * - Effective namespace = declaredNamespace ?? instanceName
 * - Result is order-independent and 0 when nothing matches
 * - Failures of other services never change the count for a target namespace
 * Side-effects: none
 * Links: services/runReplicationCheck.ts, ports/instance-config.port.ts
 * @public
 */

import type { NamespaceId } from "../namespace-id.js";
import type {
  DeclarationSnapshot,
  ExpectedResolution,
  InstanceDeclaration,
} from "../types.js";

export function effectiveNamespace(declaration: InstanceDeclaration): string {
  return declaration.declaredNamespace ?? declaration.instanceName;
}

/**
 * Sums instanceCount over declarations resolving to (serviceName, namespace).
 */
export function expectedCount(
  target: NamespaceId,
  declarations: readonly InstanceDeclaration[]
): number {
  let total = 0;
  for (const declaration of declarations) {
    if (
      declaration.owningService === target.serviceName &&
      effectiveNamespace(declaration) === target.namespace
    ) {
      total += declaration.instanceCount;
    }
  }
  return total;
}

/**
 * Typed resolution step used by the orchestrator.
 * Unmanaged when the owning service has no discoverable configuration, or when
 * one of its declarations failed (its contribution to the target is unknown).
 */
export function resolveExpectedInstances(
  target: NamespaceId,
  snapshot: DeclarationSnapshot
): ExpectedResolution {
  if (!snapshot.services.has(target.serviceName)) {
    return {
      kind: "unmanaged",
      reason: `no orchestrator configuration for service ${target.serviceName}`,
    };
  }

  const failure = snapshot.failures.find(
    (f) => f.owningService === target.serviceName
  );
  if (failure) {
    return { kind: "unmanaged", reason: failure.error.message };
  }

  return {
    kind: "resolved",
    count: expectedCount(target, snapshot.declarations),
  };
}
