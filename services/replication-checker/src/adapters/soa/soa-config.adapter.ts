// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/replication-checker/adapters/soa/soa-config.adapter`
 * Purpose: Reads the per-service SOA configuration tree: discovery namespaces, Marathon instance declarations and monitoring routing.
 * Scope: Implements NamespaceUniversePort, InstanceConfigPort and AlertRoutingPort over `<soaDir>/<service>/*.yaml`. Does not evaluate replication or send alerts.
 * Invariants:
 * - A service without marathon-<cluster>.yaml is not part of the declaration snapshot
 * - A malformed Marathon file or entry becomes a failure record, never a thrown error
 * - An unreadable SOA root rejects (snapshot unavailable)
 * - Routing is resolved at most once per service per adapter instance
 * Side-effects: IO (filesystem reads)
 * Links: src/bootstrap/container.ts, @replication-monitor/core ports
 * @internal
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import {
  type AlertRoute,
  AlertRoutingError,
  type AlertRoutingPort,
  ConfigResolutionError,
  type DeclarationFailure,
  type DeclarationSnapshot,
  describeError,
  ID_SPACER,
  type InstanceConfigPort,
  type InstanceDeclaration,
  InstanceDeclarationSchema,
  type LoggerLike,
  type NamespaceUniversePort,
} from "@replication-monitor/core";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const SMARTSTACK_FILE = "smartstack.yaml";
export const MONITORING_FILE = "monitoring.yaml";
export const DEFAULT_RUNBOOK = "Please set a runbook!";
/** Marathon runs one instance when `instances` is omitted */
export const DEFAULT_INSTANCE_COUNT = 1;

export interface SoaConfigAdapterConfig {
  soaDir: string;
  cluster: string;
}

const TopLevelMappingSchema = z.record(z.string(), z.unknown());

/** Quoted counts (`instances: "3"`) are read as numbers */
const InstanceCountSchema = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim() !== "" ? Number(value) : value,
  z.number().int().nonnegative()
);

const MarathonInstanceSchema = z
  .object({
    instances: InstanceCountSchema.default(DEFAULT_INSTANCE_COUNT),
    nerve_ns: z.string().min(1).optional(),
  })
  .passthrough();

// A key left empty in YAML (`tip:`) parses to null and counts as unset
const MonitoringFieldsSchema = z.object({
  team: z.string().nullish(),
  runbook: z.string().nullish(),
  tip: z.string().nullish(),
  notification_email: z.string().nullish(),
  page: z.boolean().nullish(),
});

type MonitoringFields = z.infer<typeof MonitoringFieldsSchema>;

const MonitoringConfigSchema = MonitoringFieldsSchema.extend({
  marathon: MonitoringFieldsSchema.nullish(),
}).passthrough();

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join("; ");
}

export function marathonFileName(cluster: string): string {
  return `marathon-${cluster}.yaml`;
}

export class SoaConfigAdapter
  implements NamespaceUniversePort, InstanceConfigPort, AlertRoutingPort
{
  private readonly routes = new Map<string, Promise<AlertRoute | null>>();

  constructor(
    private readonly config: SoaConfigAdapterConfig,
    private readonly logger: LoggerLike
  ) {}

  async listNamespaces(): Promise<readonly string[]> {
    const ids: string[] = [];
    for (const service of await this.listServices()) {
      let document: unknown;
      try {
        document = await this.readYaml(service, SMARTSTACK_FILE);
      } catch (error) {
        this.logger.warn(
          { service, file: SMARTSTACK_FILE, err: error },
          "Skipping unreadable discovery config"
        );
        continue;
      }
      if (document === null) continue;

      const parsed = TopLevelMappingSchema.safeParse(document);
      if (!parsed.success) {
        this.logger.warn(
          { service, file: SMARTSTACK_FILE },
          "Skipping discovery config that is not a mapping"
        );
        continue;
      }
      for (const namespace of Object.keys(parsed.data)) {
        ids.push(`${service}${ID_SPACER}${namespace}`);
      }
    }
    return ids;
  }

  async listInstanceDeclarations(): Promise<DeclarationSnapshot> {
    const fileName = marathonFileName(this.config.cluster);
    const declarations: InstanceDeclaration[] = [];
    const failures: DeclarationFailure[] = [];
    const services = new Set<string>();

    const fail = (
      service: string,
      instanceName: string | null,
      detail: string,
      cause?: unknown
    ) => {
      failures.push({
        owningService: service,
        instanceName,
        error: new ConfigResolutionError(service, `${fileName}: ${detail}`, {
          cause,
        }),
      });
    };

    for (const service of await this.listServices()) {
      let document: unknown;
      try {
        document = await this.readYaml(service, fileName);
      } catch (error) {
        services.add(service);
        fail(service, null, describeError(error), error);
        continue;
      }
      if (document === null) continue;
      services.add(service);

      const instances = TopLevelMappingSchema.safeParse(document);
      if (!instances.success) {
        fail(service, null, "top level is not a mapping of instances");
        continue;
      }

      for (const [instanceName, raw] of Object.entries(instances.data)) {
        const entry = MarathonInstanceSchema.safeParse(raw ?? {});
        if (!entry.success) {
          fail(
            service,
            instanceName,
            `instance ${instanceName}: ${formatIssues(entry.error)}`
          );
          continue;
        }
        const declaration = InstanceDeclarationSchema.safeParse({
          owningService: service,
          instanceName,
          declaredNamespace: entry.data.nerve_ns,
          instanceCount: entry.data.instances,
        });
        if (!declaration.success) {
          fail(
            service,
            instanceName,
            `instance ${instanceName}: ${formatIssues(declaration.error)}`
          );
          continue;
        }
        declarations.push(declaration.data);
      }
    }

    return { declarations, failures, services };
  }

  resolveRouting(serviceName: string): Promise<AlertRoute | null> {
    let route = this.routes.get(serviceName);
    if (!route) {
      route = this.loadRouting(serviceName);
      this.routes.set(serviceName, route);
    }
    return route;
  }

  private async loadRouting(serviceName: string): Promise<AlertRoute | null> {
    let document: unknown;
    try {
      document = await this.readYaml(serviceName, MONITORING_FILE);
    } catch (error) {
      throw new AlertRoutingError(
        serviceName,
        `${MONITORING_FILE}: ${describeError(error)}`,
        { cause: error }
      );
    }
    if (document === null) return null;

    const parsed = MonitoringConfigSchema.safeParse(document);
    if (!parsed.success) {
      throw new AlertRoutingError(
        serviceName,
        `${MONITORING_FILE}: ${formatIssues(parsed.error)}`
      );
    }

    // Framework-specific keys win over the service-wide ones
    const shared: MonitoringFields = parsed.data;
    const override: MonitoringFields = parsed.data.marathon ?? {};
    const field = <K extends keyof MonitoringFields>(
      key: K
    ): NonNullable<MonitoringFields[K]> | undefined =>
      override[key] ?? shared[key] ?? undefined;

    const team = field("team");
    if (!team) return null;

    return {
      team,
      runbook: field("runbook") ?? DEFAULT_RUNBOOK,
      tip: field("tip") ?? null,
      notificationEmail: field("notification_email") ?? null,
      page: field("page") ?? true,
    };
  }

  private async listServices(): Promise<string[]> {
    const entries = await readdir(this.config.soaDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  /** Parsed YAML document, or null when the file does not exist. */
  private async readYaml(service: string, fileName: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(
        path.join(this.config.soaDir, service, fileName),
        "utf8"
      );
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return parseYaml(text) ?? {};
  }
}
