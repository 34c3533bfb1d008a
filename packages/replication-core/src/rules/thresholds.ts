// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/rules/thresholds`
 * Purpose: Classifies available vs expected backends into OK / WARNING / CRITICAL.
 * Scope: Pure verdict computation and threshold validation. Does not emit alerts or log.
 * Invariants:
 * - Classification is ordered and inclusive: ratio <= crit → CRITICAL, else ratio <= warn → WARNING, else OK
 * - expected must be > 0 (callers short-circuit the zero case)
 * - Message formats are stable (namespace, available/expected, both thresholds)
 * Side-effects: none
 * Links: services/runReplicationCheck.ts, schemas.ts
 * @public
 */

import { ThresholdPctSchema } from "../schemas.js";
import type { Verdict, VerdictStatus } from "../types.js";

export interface ReplicationEvaluationInput {
  /** Encoded namespace id, used in the message */
  namespaceId: string;
  expected: number;
  available: number;
  warnPct: number;
  critPct: number;
}

export function classifyRatio(
  ratio: number,
  warnPct: number,
  critPct: number
): VerdictStatus {
  if (ratio <= critPct) return "CRITICAL";
  if (ratio <= warnPct) return "WARNING";
  return "OK";
}

export function formatReplicationMessage(
  input: ReplicationEvaluationInput
): string {
  return (
    `Service namespace ${input.namespaceId} has ${input.available}/${input.expected} instances available, ` +
    `thresholds are WARN @ ${input.warnPct}, CRITICAL @ ${input.critPct}`
  );
}

/**
 * @throws RangeError when expected is not a positive number
 */
export function evaluateReplication(input: ReplicationEvaluationInput): Verdict {
  if (!(input.expected > 0)) {
    throw new RangeError(
      `evaluateReplication requires expected > 0 (got ${input.expected} for ${input.namespaceId})`
    );
  }

  const ratio = (input.available / input.expected) * 100;
  return {
    status: classifyRatio(ratio, input.warnPct, input.critPct),
    ratio,
    message: formatReplicationMessage(input),
  };
}

/** Verdict for a namespace with expected instances but no availability entry. */
export function noDataVerdict(namespaceId: string): Verdict {
  return {
    status: "CRITICAL",
    ratio: 0,
    message: `Service namespace entry ${namespaceId} not found! No instances available!`,
  };
}

export type ThresholdIssueCode = "CRIT_ABOVE_WARN" | "OUT_OF_RANGE";

export interface ThresholdIssue {
  code: ThresholdIssueCode;
  message: string;
}

/**
 * Reports suspicious threshold configuration. Issues are advisory:
 * evaluation still uses the supplied values.
 */
export function validateThresholds(
  warnPct: number,
  critPct: number
): ThresholdIssue[] {
  const issues: ThresholdIssue[] = [];

  for (const [label, value] of [
    ["warn", warnPct],
    ["crit", critPct],
  ] as const) {
    if (!ThresholdPctSchema.safeParse(value).success) {
      issues.push({
        code: "OUT_OF_RANGE",
        message: `${label} threshold ${value} is not a non-negative percentage`,
      });
    }
  }

  if (critPct > warnPct) {
    issues.push({
      code: "CRIT_ABOVE_WARN",
      message: `crit threshold ${critPct} is above warn threshold ${warnPct}; WARNING can never be reported`,
    });
  }

  return issues;
}
