// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/adapters/synapse/synapse.adapter`
 * Purpose: Synapse adapter reading live backend counts from the local HAProxy stats CSV.
 * Scope: Implements AvailabilityPort; HTTP GET, CSV parsing, timeout and error mapping. Does not decide what counts as healthy beyond the HAProxy status column.
 * Invariants:
 * - Respects timeout via AbortSignal; converts HTTP errors to exceptions
 * - FRONTEND/BACKEND aggregate rows are never counted
 * - A namespace with no server rows is absent from the result (no data), not 0
 * Side-effects: IO (HTTP request to Synapse)
 * Links: src/bootstrap/container.ts, @replication-monitor/core AvailabilityPort
 * @internal
 */

import type {
  AvailabilityMap,
  AvailabilityPort,
} from "@replication-monitor/core";

export interface SynapseAdapterConfig {
  hostPort: string; // host:port of the HAProxy stats listener
  timeoutMs: number;
}

/** HAProxy aggregate rows; every other svname is a real server. */
const AGGREGATE_ROWS: ReadonlySet<string> = new Set(["FRONTEND", "BACKEND"]);

export interface HaproxyRow {
  pxname: string;
  svname: string;
  status: string;
}

/**
 * Parses the `;csv` stats export. The header line starts with `# `.
 * Rows with fewer columns than the header are skipped.
 */
export function parseHaproxyCsv(text: string): HaproxyRow[] {
  const lines = text.split("\n").filter((line) => line.trim().length > 0);
  const [header, ...body] = lines;
  if (!header) return [];

  const columns = header.replace(/^#\s*/, "").split(",");
  const pxIdx = columns.indexOf("pxname");
  const svIdx = columns.indexOf("svname");
  const statusIdx = columns.indexOf("status");
  if (pxIdx < 0 || svIdx < 0 || statusIdx < 0) {
    throw new Error("Synapse stats CSV is missing pxname/svname/status columns");
  }

  const rows: HaproxyRow[] = [];
  for (const line of body) {
    const cells = line.split(",");
    const pxname = cells[pxIdx];
    const svname = cells[svIdx];
    const status = cells[statusIdx];
    if (pxname === undefined || svname === undefined || status === undefined) {
      continue;
    }
    rows.push({ pxname, svname, status });
  }
  return rows;
}

export function countAvailableBackends(
  rows: readonly HaproxyRow[],
  namespaceIds: readonly string[]
): Map<string, number> {
  const wanted = new Set(namespaceIds);
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (!wanted.has(row.pxname) || AGGREGATE_ROWS.has(row.svname)) continue;
    const up = row.status.startsWith("UP") ? 1 : 0;
    counts.set(row.pxname, (counts.get(row.pxname) ?? 0) + up);
  }
  return counts;
}

export class SynapseAvailabilityAdapter implements AvailabilityPort {
  constructor(private readonly config: SynapseAdapterConfig) {}

  async getAvailableBackendCounts(
    namespaceIds: readonly string[]
  ): Promise<AvailabilityMap> {
    const csv = await this.fetchStats();
    return countAvailableBackends(parseHaproxyCsv(csv), namespaceIds);
  }

  /**
   * Internal fetch with timeout and error handling.
   */
  private async fetchStats(): Promise<string> {
    const url = `http://${this.config.hostPort}/;csv;norefresh`;

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.timeoutMs
    );

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "text/csv" },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(
          `Synapse query failed: ${response.status} ${response.statusText}`
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(
          `Synapse query timeout after ${this.config.timeoutMs}ms`
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
