// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/adapters/dry-run/dry-run.adapter`
 * Purpose: Alert transport that logs the Sensu payload instead of sending it (`--dry-run`).
 * Scope: Implements AlertTransportPort. Never performs network IO.
 * Invariants: Always resolves; payload identical to what SensuAlertAdapter would post.
 * Side-effects: Logging only
 * Links: src/adapters/sensu/sensu.adapter.ts
 * @internal
 */

import type {
  AlertTransportPort,
  LoggerLike,
  ReplicationAlertEvent,
} from "@replication-monitor/core";

import { toSensuCheckResult } from "../sensu/sensu.adapter.js";

export class DryRunAlertAdapter implements AlertTransportPort {
  constructor(private readonly logger: LoggerLike) {}

  async emit(event: ReplicationAlertEvent): Promise<void> {
    this.logger.info(
      { event: toSensuCheckResult(event) },
      "Dry run: alert not sent"
    );
  }
}
