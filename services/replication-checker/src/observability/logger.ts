// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/observability/logger`
 * Purpose: Pino logger factory for the checker. JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not format output (pipe to pino-pretty if desired).
 * Invariants: Always emits JSON to stdout; silenced under Vitest; safe to call before env() validation.
 * Side-effects: none
 * Links: src/observability/redact.ts, src/main.ts
 * @public
 */

import pino, { type Logger } from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface MakeLoggerOptions {
  level?: string;
  serviceName?: string;
  bindings?: Record<string, unknown>;
}

const destination = pino.destination({
  dest: 1,
  sync: process.env.NODE_ENV !== "production",
});

export function makeLogger(options: MakeLoggerOptions = {}): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino(
    {
      level: options.level ?? "warn",
      enabled: !isTestTooling,
      base: {
        ...options.bindings,
        service: options.serviceName ?? "replication-checker",
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Flushes buffered output before process.exit. */
export function flushLogger(): void {
  destination.flushSync();
}
