// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/services/runReplicationCheck`
 * Purpose: Drives every namespace through resolve → filter → evaluate → route and emits at most one alert each.
 * Scope: Pure orchestration over ports. Fetches both snapshots once, then fans out per namespace. Does not read files, query HTTP or format transport payloads.
 * Invariants:
 *   - SNAPSHOTS_FIRST: declarations and availability are fully materialized before any namespace is processed
 *   - ONE_OUTCOME_PER_NAMESPACE: duplicate ids in the universe are processed once; each namespace emits at most once
 *   - NAMESPACE_ISOLATION: no per-namespace failure (bad id, bad config, routing, transport) aborts another namespace
 *   - NO_DATA_PRECEDENCE: expected > 0 and absent from the map → CRITICAL no-data, evaluator not called
 *   - UNMANAGED_IS_SILENT: a service without a team never emits, whatever the verdict
 *   - Only a failed snapshot fetch is fatal (SnapshotUnavailableError, no outcomes)
 * Side-effects: IO (via injected ports only)
 * Links: rules/expected-instances.ts, rules/thresholds.ts, ports/index.ts
 * @public
 */

import pLimit from "p-limit";

import {
  AlertRoutingError,
  AlertTransportError,
  describeError,
  isAlertRoutingError,
  isAlertTransportError,
  type SnapshotKind,
  SnapshotUnavailableError,
} from "../errors.js";
import { ID_SPACER, type NamespaceId, parseNamespaceId } from "../namespace-id.js";
import type {
  AlertRoutingPort,
  AlertTransportPort,
  AvailabilityPort,
  InstanceConfigPort,
} from "../ports/index.js";
import { resolveExpectedInstances } from "../rules/expected-instances.js";
import {
  evaluateReplication,
  noDataVerdict,
  validateThresholds,
} from "../rules/thresholds.js";
import { DEFAULT_CRIT_PCT, DEFAULT_WARN_PCT } from "../schemas.js";
import type {
  AlertRoute,
  AvailabilityMap,
  DeclarationSnapshot,
  Delivery,
  DeliveryStatus,
  EvaluatedOutcome,
  ReplicationCheckReport,
  ReplicationCheckSummary,
  ReplicationOutcome,
  Verdict,
  VerdictStatus,
} from "../types.js";

/**
 * Logger interface expected by the orchestrator.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}

export interface ReplicationCheckDeps {
  instanceConfig: InstanceConfigPort;
  availability: AvailabilityPort;
  routing: AlertRoutingPort;
  transport: AlertTransportPort;
  logger: LoggerLike;
}

export interface ReplicationCheckParams {
  /** Encoded namespace ids (`service.namespace`) to check */
  namespaces: readonly string[];
  /** Ratio (percent) at or below which WARNING is raised (default: 75) */
  warnPct?: number;
  /** Ratio (percent) at or below which CRITICAL is raised (default: 90) */
  critPct?: number;
  /** Max concurrent route/emit calls (default: 8) */
  concurrency?: number;
  /** Check name prefix for the alert id (default: check_marathon_services_replication) */
  checkNamePrefix?: string;
}

export const DEFAULT_CHECK_CONCURRENCY = 8;
export const DEFAULT_CHECK_NAME_PREFIX = "check_marathon_services_replication";

/** Namespace that survived the filters and needs a routing decision. */
interface PendingAlert {
  readonly rawId: string;
  readonly namespaceId: NamespaceId;
  readonly checkId: string;
  readonly expected: number;
  readonly available: number | null;
  readonly verdict: Verdict;
}

type PlannedNamespace =
  | { readonly kind: "done"; readonly outcome: ReplicationOutcome }
  | { readonly kind: "pending"; readonly pending: PendingAlert };

export function buildCheckId(
  prefix: string,
  namespaceId: NamespaceId
): string {
  return [prefix, namespaceId.serviceName, namespaceId.namespace].join(
    ID_SPACER
  );
}

/** Non-positive or non-finite limits run one delivery at a time */
function concurrencyLimit(requested: number): number {
  return Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : 1;
}

async function loadSnapshot<T>(
  kind: SnapshotKind,
  load: () => Promise<T>
): Promise<T> {
  try {
    return await load();
  } catch (error) {
    throw new SnapshotUnavailableError(kind, { cause: error });
  }
}

function logVerdict(
  logger: LoggerLike,
  rawId: string,
  verdict: Verdict
): void {
  const fields = { namespace: rawId, status: verdict.status, ratio: verdict.ratio };
  if (verdict.status === "CRITICAL") {
    logger.error(fields, verdict.message);
  } else if (verdict.status === "WARNING") {
    logger.warn(fields, verdict.message);
  } else {
    logger.info(fields, verdict.message);
  }
}

function planNamespace(
  rawId: string,
  declarations: DeclarationSnapshot,
  availability: AvailabilityMap,
  thresholds: { warnPct: number; critPct: number; checkNamePrefix: string },
  logger: LoggerLike
): PlannedNamespace {
  logger.info({ namespace: rawId }, "Checking namespace");

  let namespaceId: NamespaceId;
  try {
    namespaceId = parseNamespaceId(rawId);
  } catch (error) {
    const reason = describeError(error);
    logger.info({ namespace: rawId, reason }, "Namespace is not managed");
    return {
      kind: "done",
      outcome: { state: "skipped_not_managed", rawId, reason },
    };
  }

  const resolution = resolveExpectedInstances(namespaceId, declarations);
  if (resolution.kind === "unmanaged") {
    logger.info(
      { namespace: rawId, reason: resolution.reason },
      "Namespace is not managed"
    );
    return {
      kind: "done",
      outcome: { state: "skipped_not_managed", rawId, reason: resolution.reason },
    };
  }

  const expected = resolution.count;
  if (expected === 0) {
    logger.info({ namespace: rawId }, "Namespace has no expected instances");
    return {
      kind: "done",
      outcome: { state: "skipped_not_in_scope", rawId, namespaceId },
    };
  }

  const checkId = buildCheckId(thresholds.checkNamePrefix, namespaceId);
  const available = availability.get(rawId);

  const verdict =
    available === undefined
      ? noDataVerdict(rawId)
      : evaluateReplication({
          namespaceId: rawId,
          expected,
          available,
          warnPct: thresholds.warnPct,
          critPct: thresholds.critPct,
        });
  logVerdict(logger, rawId, verdict);

  return {
    kind: "pending",
    pending: {
      rawId,
      namespaceId,
      checkId,
      expected,
      available: available ?? null,
      verdict,
    },
  };
}

async function deliver(
  pending: PendingAlert,
  deps: ReplicationCheckDeps
): Promise<Delivery> {
  const { logger } = deps;
  const { serviceName } = pending.namespaceId;

  let route: AlertRoute | null;
  try {
    route = await deps.routing.resolveRouting(serviceName);
  } catch (error) {
    const routingError = isAlertRoutingError(error)
      ? error
      : new AlertRoutingError(serviceName, describeError(error), {
          cause: error,
        });
    logger.error(
      { err: routingError, checkId: pending.checkId },
      "Alert routing lookup failed"
    );
    return { status: "failed", error: routingError };
  }

  if (route === null) {
    logger.debug?.(
      { checkId: pending.checkId, status: pending.verdict.status },
      "No team configured, alert suppressed"
    );
    return { status: "suppressed" };
  }

  try {
    await deps.transport.emit({
      checkId: pending.checkId,
      runbook: route.runbook,
      verdict: pending.verdict,
      message: pending.verdict.message,
      route,
    });
    return { status: "emitted" };
  } catch (error) {
    const transportError = isAlertTransportError(error)
      ? error
      : new AlertTransportError(pending.checkId, describeError(error), {
          cause: error,
        });
    logger.error(
      { err: transportError, checkId: pending.checkId },
      "Alert emission failed"
    );
    return { status: "failed", error: transportError };
  }
}

export function summarizeOutcomes(
  outcomes: readonly ReplicationOutcome[]
): ReplicationCheckSummary {
  const byStatus: Record<VerdictStatus, number> = {
    OK: 0,
    WARNING: 0,
    CRITICAL: 0,
  };
  const byDelivery: Record<DeliveryStatus, number> = {
    emitted: 0,
    suppressed: 0,
    failed: 0,
  };
  let skippedNotManaged = 0;
  let skippedNotInScope = 0;
  let noData = 0;

  for (const outcome of outcomes) {
    switch (outcome.state) {
      case "skipped_not_managed":
        skippedNotManaged += 1;
        break;
      case "skipped_not_in_scope":
        skippedNotInScope += 1;
        break;
      case "evaluated":
        byStatus[outcome.verdict.status] += 1;
        byDelivery[outcome.delivery.status] += 1;
        if (outcome.noData) noData += 1;
        break;
    }
  }

  return {
    total: outcomes.length,
    skippedNotManaged,
    skippedNotInScope,
    byStatus,
    noData,
    byDelivery,
  };
}

/**
 * Runs one replication check over the namespace universe.
 * @throws SnapshotUnavailableError when either input snapshot cannot be fetched
 */
export async function runReplicationCheck(
  deps: ReplicationCheckDeps,
  params: ReplicationCheckParams
): Promise<ReplicationCheckReport> {
  const { logger } = deps;
  const warnPct = params.warnPct ?? DEFAULT_WARN_PCT;
  const critPct = params.critPct ?? DEFAULT_CRIT_PCT;
  const concurrency = params.concurrency ?? DEFAULT_CHECK_CONCURRENCY;
  const checkNamePrefix = params.checkNamePrefix ?? DEFAULT_CHECK_NAME_PREFIX;

  for (const issue of validateThresholds(warnPct, critPct)) {
    logger.warn({ code: issue.code, warnPct, critPct }, issue.message);
  }

  const universe = [...new Set(params.namespaces)];

  const [declarations, availability] = await Promise.all([
    loadSnapshot("declarations", () =>
      deps.instanceConfig.listInstanceDeclarations()
    ),
    loadSnapshot("availability", () =>
      deps.availability.getAvailableBackendCounts(universe)
    ),
  ]);

  for (const failure of declarations.failures) {
    logger.warn(
      {
        service: failure.owningService,
        instance: failure.instanceName,
        err: failure.error,
      },
      "Skipping malformed instance declaration"
    );
  }

  const planned = universe.map((rawId) =>
    planNamespace(
      rawId,
      declarations,
      availability,
      { warnPct, critPct, checkNamePrefix },
      logger
    )
  );

  const limit = pLimit(concurrencyLimit(concurrency));
  const outcomes = await Promise.all(
    planned.map(async (plan): Promise<ReplicationOutcome> => {
      if (plan.kind === "done") return plan.outcome;
      const delivery = await limit(() => deliver(plan.pending, deps));
      const outcome: EvaluatedOutcome = {
        state: "evaluated",
        ...plan.pending,
        noData: plan.pending.available === null,
        delivery,
      };
      return outcome;
    })
  );

  const summary = summarizeOutcomes(outcomes);
  logger.info({ ...summary, warnPct, critPct }, "Replication check complete");

  return { outcomes, summary };
}
