// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/tests/fixtures`
 * Purpose: Reusable fixtures for checker tests: temporary SOA trees, HAProxy CSV, alert events.
 * Scope: Builds test inputs. Does not import adapters.
 * Invariants: Temp trees live under os.tmpdir() and are removed by the caller.
 * Side-effects: IO (temp directory writes in writeSoaTree)
 * Links: tests/*.test.ts
 * @internal
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import type { ReplicationAlertEvent } from "@replication-monitor/core";
import { vi } from "vitest";

export const TEST_CLUSTER = "testcluster";
export const MARATHON_FILE = `marathon-${TEST_CLUSTER}.yaml`;

/** service name → file name → YAML text */
export type SoaTree = Record<string, Record<string, string>>;

export function writeSoaTree(tree: SoaTree): string {
  const root = mkdtempSync(path.join(os.tmpdir(), "soa-"));
  for (const [service, files] of Object.entries(tree)) {
    mkdirSync(path.join(root, service));
    for (const [fileName, text] of Object.entries(files)) {
      writeFileSync(path.join(root, service, fileName), text);
    }
  }
  return root;
}

export const CSV_HEADER = "# pxname,svname,qcur,status,weight";

/** HAProxy stats CSV with a trailing newline, as Synapse serves it. */
export function haproxyCsv(rows: ReadonlyArray<[string, string, string]>): string {
  const body = rows.map(([pxname, svname, status]) =>
    [pxname, svname, "0", status, "1"].join(",")
  );
  return `${[CSV_HEADER, ...body].join("\n")}\n`;
}

export function createAlertEvent(
  overrides?: Partial<ReplicationAlertEvent>
): ReplicationAlertEvent {
  const message =
    "Service namespace mumble.main has 3/4 instances available, thresholds are WARN @ 75, CRITICAL @ 50";
  return {
    checkId: overrides?.checkId ?? "check_marathon_services_replication.mumble.main",
    runbook: overrides?.runbook ?? "y/rb-mumble",
    verdict: overrides?.verdict ?? { status: "WARNING", ratio: 75, message },
    message: overrides?.message ?? message,
    route: overrides?.route ?? {
      team: "search-infra",
      runbook: "y/rb-mumble",
      tip: null,
      notificationEmail: "search@example.com",
      page: true,
    },
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

export function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

/** fetch stand-in that never settles until its signal aborts. */
export function hangingFetch(_url: string, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(abortError()));
  });
}
