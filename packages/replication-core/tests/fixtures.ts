// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/tests/fixtures`
 * Purpose: Reusable builders and in-memory port fakes for core unit tests.
 * Scope: Provides declarations, snapshots, routes and recording fakes. Does not perform I/O.
 * Invariants: Fakes record every call; builders are pure.
 * Side-effects: none (pure functions)
 * Links: tests/*.test.ts
 * @internal
 */

import { vi } from "vitest";

import {
  type AlertRoute,
  ConfigResolutionError,
  type DeclarationSnapshot,
  type InstanceDeclaration,
  type ReplicationAlertEvent,
  type ReplicationCheckDeps,
} from "../src/index.js";

export function createDeclaration(
  overrides?: Partial<InstanceDeclaration>
): InstanceDeclaration {
  return {
    owningService: overrides?.owningService ?? "mumble",
    instanceName: overrides?.instanceName ?? "main",
    declaredNamespace: overrides?.declaredNamespace,
    instanceCount: overrides?.instanceCount ?? 3,
  };
}

export function createSnapshot(
  declarations: readonly InstanceDeclaration[],
  options?: {
    failures?: DeclarationSnapshot["failures"];
    extraServices?: readonly string[];
  }
): DeclarationSnapshot {
  const failures = options?.failures ?? [];
  return {
    declarations,
    failures,
    services: new Set([
      ...declarations.map((d) => d.owningService),
      ...failures.map((f) => f.owningService),
      ...(options?.extraServices ?? []),
    ]),
  };
}

export function createFailure(
  owningService: string,
  instanceName: string | null = "broken"
): DeclarationSnapshot["failures"][number] {
  return {
    owningService,
    instanceName,
    error: new ConfigResolutionError(owningService, "instances must be a number"),
  };
}

export function createRoute(overrides?: Partial<AlertRoute>): AlertRoute {
  return {
    team: overrides?.team ?? "search-infra",
    runbook: overrides?.runbook ?? "y/rb-mumble",
    tip: overrides?.tip ?? null,
    notificationEmail: overrides?.notificationEmail ?? null,
    page: overrides?.page ?? true,
  };
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * Builds orchestrator deps backed by in-memory snapshots.
 * `routes` maps service name → route; services not listed are unmanaged.
 */
export function createFakeDeps(options: {
  snapshot: DeclarationSnapshot;
  availability: Record<string, number>;
  routes?: Record<string, AlertRoute>;
}) {
  const emitted: ReplicationAlertEvent[] = [];
  const routes = options.routes ?? {};

  const deps = {
    instanceConfig: {
      listInstanceDeclarations: vi.fn(async () => options.snapshot),
    },
    availability: {
      getAvailableBackendCounts: vi.fn(
        async (_ids: readonly string[]) =>
          new Map(Object.entries(options.availability))
      ),
    },
    routing: {
      resolveRouting: vi.fn(
        async (serviceName: string): Promise<AlertRoute | null> =>
          routes[serviceName] ?? null
      ),
    },
    transport: {
      emit: vi.fn(async (event: ReplicationAlertEvent) => {
        emitted.push(event);
      }),
    },
    logger: createMockLogger(),
  } satisfies ReplicationCheckDeps;

  return { deps, emitted };
}
