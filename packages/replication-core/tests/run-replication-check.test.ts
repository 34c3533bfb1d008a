// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/tests/run-replication-check`
 * Purpose: Unit tests for the replication check orchestrator.
 * Scope: Tests per-namespace state machine, isolation, suppression and snapshot handling with in-memory ports. Does not require network or files.
 * Invariants: All ports are fakes; every assertion is on outcomes or recorded port calls.
 * Side-effects: none
 * Links: src/services/runReplicationCheck.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  AlertTransportError,
  type EvaluatedOutcome,
  isSnapshotUnavailableError,
  type ReplicationOutcome,
  runReplicationCheck,
  SnapshotUnavailableError,
} from "../src/index.js";
import {
  createDeclaration,
  createFailure,
  createFakeDeps,
  createRoute,
  createSnapshot,
} from "./fixtures.js";

function evaluated(outcome: ReplicationOutcome | undefined): EvaluatedOutcome {
  if (outcome?.state !== "evaluated") {
    throw new Error(`expected evaluated outcome, got ${outcome?.state}`);
  }
  return outcome;
}

describe("runReplicationCheck", () => {
  describe("verdicts", () => {
    it("emits CRITICAL when 9/10 are up with warn 75 / crit 90", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 10 })]),
        availability: { "mumble.main": 9 },
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
        warnPct: 75,
        critPct: 90,
      });

      const outcome = evaluated(report.outcomes[0]);
      expect(outcome.verdict.status).toBe("CRITICAL");
      expect(outcome.verdict.ratio).toBe(90);
      expect(outcome.delivery).toEqual({ status: "emitted" });
      expect(emitted).toEqual([
        {
          checkId: "check_marathon_services_replication.mumble.main",
          runbook: "y/rb-mumble",
          verdict: outcome.verdict,
          message:
            "Service namespace mumble.main has 9/10 instances available, thresholds are WARN @ 75, CRITICAL @ 90",
          route: createRoute(),
        },
      ]);
    });

    it("emits OK when 8/10 are up with warn 75 / crit 50", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 10 })]),
        availability: { "mumble.main": 8 },
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
        warnPct: 75,
        critPct: 50,
      });

      expect(evaluated(report.outcomes[0]).verdict.status).toBe("OK");
      expect(emitted).toHaveLength(1);
      expect(emitted[0]?.verdict.status).toBe("OK");
    });

    it("emits CRITICAL no-data when the namespace is absent from the availability map", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 4 })]),
        availability: {},
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
        warnPct: 10,
        critPct: 0,
      });

      const outcome = evaluated(report.outcomes[0]);
      expect(outcome.noData).toBe(true);
      expect(outcome.available).toBeNull();
      expect(outcome.expected).toBe(4);
      expect(outcome.verdict).toEqual({
        status: "CRITICAL",
        ratio: 0,
        message:
          "Service namespace entry mumble.main not found! No instances available!",
      });
      expect(emitted[0]?.message).toContain("not found");
    });

    it("evaluates a zero count present in the map normally, not as no-data", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 4 })]),
        availability: { "mumble.main": 0 },
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
        warnPct: 75,
        critPct: 50,
      });

      const outcome = evaluated(report.outcomes[0]);
      expect(outcome.noData).toBe(false);
      expect(outcome.available).toBe(0);
      expect(outcome.verdict.message).toBe(
        "Service namespace mumble.main has 0/4 instances available, thresholds are WARN @ 75, CRITICAL @ 50"
      );
    });
  });

  describe("skips", () => {
    it("skips a namespace with zero expected instances without emitting", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 0 })]),
        availability: { "mumble.main": 3 },
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
      });

      expect(report.outcomes).toEqual([
        {
          state: "skipped_not_in_scope",
          rawId: "mumble.main",
          namespaceId: { serviceName: "mumble", namespace: "main" },
        },
      ]);
      expect(emitted).toEqual([]);
      expect(deps.routing.resolveRouting).not.toHaveBeenCalled();
    });

    it("skips a malformed id as not managed", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([]),
        availability: {},
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["no-separator"],
      });

      expect(report.outcomes).toEqual([
        {
          state: "skipped_not_managed",
          rawId: "no-separator",
          reason:
            'Invalid namespace id "no-separator": expected exactly one "." separator, found 0',
        },
      ]);
    });

    it("isolates one malformed declaration among 100 unrelated ones", async () => {
      const healthy = Array.from({ length: 99 }, (_, i) =>
        createDeclaration({ owningService: `svc${i}`, instanceCount: 2 })
      );
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot(healthy, {
          failures: [createFailure("broken")],
        }),
        availability: Object.fromEntries(
          healthy.map((d) => [`${d.owningService}.main`, 2])
        ),
        routes: Object.fromEntries(
          healthy.map((d) => [d.owningService, createRoute()])
        ),
      });

      const report = await runReplicationCheck(deps, {
        namespaces: [
          ...healthy.map((d) => `${d.owningService}.main`),
          "broken.main",
        ],
        warnPct: 75,
        critPct: 50,
      });

      expect(report.outcomes).toHaveLength(100);
      expect(report.outcomes[99]).toEqual({
        state: "skipped_not_managed",
        rawId: "broken.main",
        reason: "Config for service broken unresolvable: instances must be a number",
      });
      expect(report.summary.byStatus.OK).toBe(99);
      expect(report.summary.skippedNotManaged).toBe(1);
      expect(emitted).toHaveLength(99);
    });

    it("skips a service with no orchestrator configuration as not managed", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ owningService: "fortune" })]),
        availability: { "mumble.main": 1 },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
      });

      expect(report.outcomes[0]?.state).toBe("skipped_not_managed");
    });
  });

  describe("routing", () => {
    it("suppresses alerts for services without a team, whatever the verdict", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 4 })]),
        availability: {},
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
      });

      const outcome = evaluated(report.outcomes[0]);
      expect(outcome.verdict.status).toBe("CRITICAL");
      expect(outcome.delivery).toEqual({ status: "suppressed" });
      expect(emitted).toEqual([]);
      expect(deps.transport.emit).not.toHaveBeenCalled();
    });

    it("records a routing lookup failure without aborting other namespaces", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([
          createDeclaration({ instanceCount: 2 }),
          createDeclaration({ owningService: "fortune", instanceCount: 2 }),
        ]),
        availability: { "mumble.main": 2, "fortune.main": 2 },
        routes: { fortune: createRoute({ team: "fortune-team" }) },
      });
      deps.routing.resolveRouting.mockImplementation(async (service: string) => {
        if (service === "mumble") throw new Error("monitoring.yaml: bad YAML");
        return createRoute({ team: "fortune-team" });
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main", "fortune.main"],
        warnPct: 75,
        critPct: 50,
      });

      const failed = evaluated(report.outcomes[0]);
      expect(failed.delivery.status).toBe("failed");
      if (failed.delivery.status === "failed") {
        expect(failed.delivery.error.code).toBe("ALERT_ROUTING_FAILED");
        expect(failed.delivery.error.message).toBe(
          "Alert routing for service mumble unresolvable: monitoring.yaml: bad YAML"
        );
      }
      expect(evaluated(report.outcomes[1]).delivery).toEqual({ status: "emitted" });
      expect(emitted.map((e) => e.checkId)).toEqual([
        "check_marathon_services_replication.fortune.main",
      ]);
    });
  });

  describe("transport failures", () => {
    it("reports a failed emission per namespace and keeps going", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([
          createDeclaration({ instanceCount: 2 }),
          createDeclaration({ owningService: "fortune", instanceCount: 2 }),
        ]),
        availability: { "mumble.main": 2, "fortune.main": 1 },
        routes: { mumble: createRoute(), fortune: createRoute() },
      });
      deps.transport.emit.mockImplementation(async (event) => {
        if (event.checkId.endsWith("mumble.main")) {
          throw new Error("connect ECONNREFUSED 127.0.0.1:3031");
        }
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main", "fortune.main"],
        warnPct: 75,
        critPct: 50,
      });

      const failed = evaluated(report.outcomes[0]);
      expect(failed.delivery.status).toBe("failed");
      if (failed.delivery.status === "failed") {
        expect(failed.delivery.error).toBeInstanceOf(AlertTransportError);
        expect(failed.delivery.error.message).toBe(
          "Alert check_marathon_services_replication.mumble.main not delivered: connect ECONNREFUSED 127.0.0.1:3031"
        );
      }
      expect(evaluated(report.outcomes[1]).delivery).toEqual({ status: "emitted" });
      expect(report.summary.byDelivery).toEqual({
        emitted: 1,
        suppressed: 0,
        failed: 1,
      });
      expect(deps.logger.error).toHaveBeenCalledWith(
        expect.objectContaining({
          checkId: "check_marathon_services_replication.mumble.main",
        }),
        "Alert emission failed"
      );
    });

    it("passes a transport's own AlertTransportError through unchanged", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 2 })]),
        availability: { "mumble.main": 2 },
        routes: { mumble: createRoute() },
      });
      const transportError = new AlertTransportError(
        "check_marathon_services_replication.mumble.main",
        "HTTP 500"
      );
      deps.transport.emit.mockRejectedValue(transportError);

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
      });

      const outcome = evaluated(report.outcomes[0]);
      expect(outcome.delivery).toEqual({ status: "failed", error: transportError });
    });
  });

  describe("snapshots", () => {
    it("fails the whole run when declarations cannot be loaded", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([]),
        availability: {},
      });
      deps.instanceConfig.listInstanceDeclarations.mockRejectedValue(
        new Error("EACCES: permission denied, scandir '/nail/etc/services'")
      );

      const run = runReplicationCheck(deps, { namespaces: ["mumble.main"] });

      await expect(run).rejects.toBeInstanceOf(SnapshotUnavailableError);
      await expect(run).rejects.toMatchObject({ snapshot: "declarations" });
      expect(emitted).toEqual([]);
    });

    it("fails the whole run when availability cannot be loaded", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration()]),
        availability: {},
      });
      deps.availability.getAvailableBackendCounts.mockRejectedValue(
        new Error("Synapse request timeout after 10000ms")
      );

      let caught: unknown;
      try {
        await runReplicationCheck(deps, { namespaces: ["mumble.main"] });
      } catch (error) {
        caught = error;
      }

      expect(isSnapshotUnavailableError(caught)).toBe(true);
      if (isSnapshotUnavailableError(caught)) {
        expect(caught.snapshot).toBe("availability");
        expect(caught.message).toBe("Failed to obtain availability snapshot");
      }
      expect(deps.routing.resolveRouting).not.toHaveBeenCalled();
    });

    it("fetches each snapshot exactly once and queries availability for the de-duplicated universe", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 1 })]),
        availability: { "mumble.main": 1 },
        routes: { mumble: createRoute() },
      });

      const report = await runReplicationCheck(deps, {
        namespaces: ["mumble.main", "mumble.canary", "mumble.main"],
      });

      expect(deps.instanceConfig.listInstanceDeclarations).toHaveBeenCalledTimes(1);
      expect(deps.availability.getAvailableBackendCounts).toHaveBeenCalledTimes(1);
      expect(deps.availability.getAvailableBackendCounts).toHaveBeenCalledWith([
        "mumble.main",
        "mumble.canary",
      ]);
      expect(report.outcomes.map((o) => o.rawId)).toEqual([
        "mumble.main",
        "mumble.canary",
      ]);
      expect(deps.transport.emit).toHaveBeenCalledTimes(1);
    });
  });

  describe("configuration", () => {
    it("defaults to warn 75 / crit 90 and warns that crit is above warn", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 10 })]),
        availability: { "mumble.main": 8 },
        routes: { mumble: createRoute() },
      });

      await runReplicationCheck(deps, { namespaces: ["mumble.main"] });

      expect(emitted[0]?.message).toBe(
        "Service namespace mumble.main has 8/10 instances available, thresholds are WARN @ 75, CRITICAL @ 90"
      );
      expect(emitted[0]?.verdict.status).toBe("CRITICAL");
      expect(deps.logger.warn).toHaveBeenCalledWith(
        { code: "CRIT_ABOVE_WARN", warnPct: 75, critPct: 90 },
        "crit threshold 90 is above warn threshold 75; WARNING can never be reported"
      );
    });

    it("uses a custom check name prefix", async () => {
      const { deps, emitted } = createFakeDeps({
        snapshot: createSnapshot([createDeclaration({ instanceCount: 1 })]),
        availability: { "mumble.main": 1 },
        routes: { mumble: createRoute() },
      });

      await runReplicationCheck(deps, {
        namespaces: ["mumble.main"],
        checkNamePrefix: "check_replication",
      });

      expect(emitted[0]?.checkId).toBe("check_replication.mumble.main");
    });

    it("never runs more emissions at once than the concurrency limit", async () => {
      const declarations = Array.from({ length: 12 }, (_, i) =>
        createDeclaration({ owningService: `svc${i}`, instanceCount: 1 })
      );
      const { deps } = createFakeDeps({
        snapshot: createSnapshot(declarations),
        availability: Object.fromEntries(
          declarations.map((d) => [`${d.owningService}.main`, 1])
        ),
        routes: Object.fromEntries(
          declarations.map((d) => [d.owningService, createRoute()])
        ),
      });
      let inFlight = 0;
      let peak = 0;
      deps.transport.emit.mockImplementation(async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight -= 1;
      });

      const report = await runReplicationCheck(deps, {
        namespaces: declarations.map((d) => `${d.owningService}.main`),
        concurrency: 3,
      });

      expect(peak).toBe(3);
      expect(report.summary.byDelivery.emitted).toBe(12);
    });

    it.each([0, -2, Number.NaN])(
      "delivers one alert at a time for concurrency %s",
      async (concurrency) => {
        const declarations = Array.from({ length: 4 }, (_, i) =>
          createDeclaration({ owningService: `svc${i}`, instanceCount: 1 })
        );
        const { deps } = createFakeDeps({
          snapshot: createSnapshot(declarations),
          availability: Object.fromEntries(
            declarations.map((d) => [`${d.owningService}.main`, 1])
          ),
          routes: Object.fromEntries(
            declarations.map((d) => [d.owningService, createRoute()])
          ),
        });
        let inFlight = 0;
        let peak = 0;
        deps.transport.emit.mockImplementation(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 1));
          inFlight -= 1;
        });

        const report = await runReplicationCheck(deps, {
          namespaces: declarations.map((d) => `${d.owningService}.main`),
          concurrency,
        });

        expect(peak).toBe(1);
        expect(report.summary.byDelivery.emitted).toBe(4);
      }
    );
  });

  describe("idempotence", () => {
    it("produces identical outcomes for identical snapshots", async () => {
      const { deps } = createFakeDeps({
        snapshot: createSnapshot([
          createDeclaration({ instanceCount: 4 }),
          createDeclaration({ owningService: "fortune", instanceCount: 0 }),
        ]),
        availability: { "mumble.main": 3 },
        routes: { mumble: createRoute() },
      });
      const params = {
        namespaces: ["mumble.main", "fortune.main", "ghost.main"],
        warnPct: 80,
        critPct: 50,
      };

      const first = await runReplicationCheck(deps, params);
      const second = await runReplicationCheck(deps, params);

      expect(second).toEqual(first);
      expect(first.summary).toEqual({
        total: 3,
        skippedNotManaged: 1,
        skippedNotInScope: 1,
        byStatus: { OK: 0, WARNING: 1, CRITICAL: 0 },
        noData: 0,
        byDelivery: { emitted: 1, suppressed: 0, failed: 0 },
      });
    });
  });

  it("logs each verdict at a level matching its severity", async () => {
    const { deps } = createFakeDeps({
      snapshot: createSnapshot([
        createDeclaration({ instanceCount: 4 }),
        createDeclaration({ owningService: "fortune", instanceCount: 4 }),
      ]),
      availability: { "mumble.main": 1, "fortune.main": 3 },
    });

    await runReplicationCheck(deps, {
      namespaces: ["mumble.main", "fortune.main"],
      warnPct: 75,
      critPct: 50,
    });

    expect(deps.logger.error).toHaveBeenCalledWith(
      { namespace: "mumble.main", status: "CRITICAL", ratio: 25 },
      "Service namespace mumble.main has 1/4 instances available, thresholds are WARN @ 75, CRITICAL @ 50"
    );
    expect(deps.logger.warn).toHaveBeenCalledWith(
      { namespace: "fortune.main", status: "WARNING", ratio: 75 },
      "Service namespace fortune.main has 3/4 instances available, thresholds are WARN @ 75, CRITICAL @ 50"
    );
  });

  it("treats zero expected as out of scope even when availability is missing", async () => {
    const emitSpy = vi.fn();
    const { deps } = createFakeDeps({
      snapshot: createSnapshot([createDeclaration({ instanceCount: 0 })]),
      availability: {},
      routes: { mumble: createRoute() },
    });
    deps.transport.emit.mockImplementation(emitSpy);

    const report = await runReplicationCheck(deps, {
      namespaces: ["mumble.main"],
    });

    expect(report.summary.noData).toBe(0);
    expect(emitSpy).not.toHaveBeenCalled();
  });
});
