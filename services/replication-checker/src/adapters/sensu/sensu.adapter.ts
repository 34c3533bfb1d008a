// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/adapters/sensu/sensu.adapter`
 * Purpose: Sensu adapter posting replication check results to the local client socket API.
 * Scope: Implements AlertTransportPort; maps events to Sensu check results, handles timeout and error mapping. Does not retry.
 * Invariants:
 * - Every failure surfaces as AlertTransportError carrying the check id
 * - Status codes follow Nagios conventions (OK 0, WARNING 1, CRITICAL 2)
 * Side-effects: IO (HTTP requests to Sensu)
 * Links: src/bootstrap/container.ts, src/adapters/dry-run/dry-run.adapter.ts
 * @internal
 */

import {
  AlertTransportError,
  type AlertTransportPort,
  describeError,
  isAlertTransportError,
  type ReplicationAlertEvent,
  type VerdictStatus,
} from "@replication-monitor/core";

export interface SensuAdapterConfig {
  url: string; // Sensu client API base, e.g. http://localhost:3031
  timeoutMs: number;
}

export const SENSU_STATUS = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
} as const satisfies Record<VerdictStatus, number>;

export interface SensuCheckResult {
  name: string;
  status: (typeof SENSU_STATUS)[VerdictStatus];
  output: string;
  handler: "default";
  team: string;
  runbook: string;
  tip: string | null;
  notification_email: string | null;
  page: boolean;
  alert_after: string;
  check_every: string;
  realert_every: number;
}

export function toSensuCheckResult(
  event: ReplicationAlertEvent
): SensuCheckResult {
  return {
    name: event.checkId,
    status: SENSU_STATUS[event.verdict.status],
    output: event.message,
    handler: "default",
    team: event.route.team,
    runbook: event.runbook,
    tip: event.route.tip,
    notification_email: event.route.notificationEmail,
    page: event.route.page,
    alert_after: "2m",
    check_every: "1m",
    // Alert once per state change
    realert_every: -1,
  };
}

export class SensuAlertAdapter implements AlertTransportPort {
  constructor(private readonly config: SensuAdapterConfig) {}

  async emit(event: ReplicationAlertEvent): Promise<void> {
    const url = new URL("/results", this.config.url);

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.timeoutMs
    );

    try {
      const response = await fetch(url.toString(), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(toSensuCheckResult(event)),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new AlertTransportError(
          event.checkId,
          `Sensu responded ${response.status} ${response.statusText}`
        );
      }
    } catch (error) {
      if (isAlertTransportError(error)) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new AlertTransportError(
          event.checkId,
          `Sensu timeout after ${this.config.timeoutMs}ms`,
          { cause: error }
        );
      }
      throw new AlertTransportError(event.checkId, describeError(error), {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
