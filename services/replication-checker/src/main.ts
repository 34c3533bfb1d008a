// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/main`
 * Purpose: Service entry point. Runs one replication check and exits.
 * Scope: Entry point that resolves settings, builds the container and calls runCheck. Does not contain business logic.
 * Invariants:
 *   - Exit 1 only on fatal errors (invalid config, unreadable SOA dir, unavailable snapshot)
 *   - Alert delivery failures are logged by the run and do not change the exit code
 *   - Leader gating is the caller's job (cron wrapper)
 * Side-effects: IO (filesystem, HTTP, stdout, process exit)
 * Links: src/check.ts, src/cli.ts
 * @public
 */

import { createContainer } from "./bootstrap/container.js";
import { runCheck } from "./check.js";
import { resolveSettings, USAGE } from "./cli.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const resolution = resolveSettings(process.argv.slice(2), process.env);
  if (resolution.kind === "help") {
    process.stdout.write(USAGE);
    return;
  }
  const { settings } = resolution;

  // Composition root owns logger creation
  const logger = makeLogger({
    level: settings.LOG_LEVEL,
    serviceName: settings.SERVICE_NAME,
  });

  await runCheck(createContainer(settings, logger));
  flushLogger();
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main().catch((err) => {
  bootLogger.fatal({ err }, "Fatal error during replication check");
  flushLogger();
  process.exit(1);
});
