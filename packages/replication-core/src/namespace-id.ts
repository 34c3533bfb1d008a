// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/namespace-id`
 * Purpose: Compound (service, namespace) key with a fixed string encoding.
 * Scope: Format, parse and compare namespace ids. Does not look up configuration.
 * Invariants:
 * - Encoding is `<serviceName><ID_SPACER><namespace>`
 * - Neither component is empty or contains ID_SPACER
 * - Malformed input throws NamespaceIdParseError, never a partial result
 * Side-effects: none
 * Links: types.ts
 * @public
 */

import { NamespaceIdParseError } from "./errors.js";

/** Separator between service name and namespace in an encoded id. */
export const ID_SPACER = ".";

export interface NamespaceId {
  readonly serviceName: string;
  readonly namespace: string;
}

function assertComponent(
  rawId: string,
  label: "serviceName" | "namespace",
  value: string
): void {
  if (value.length === 0) {
    throw new NamespaceIdParseError(rawId, `${label} is empty`);
  }
  if (value.includes(ID_SPACER)) {
    throw new NamespaceIdParseError(
      rawId,
      `${label} contains separator "${ID_SPACER}"`
    );
  }
}

export function formatNamespaceId(id: NamespaceId): string {
  const encoded = `${id.serviceName}${ID_SPACER}${id.namespace}`;
  assertComponent(encoded, "serviceName", id.serviceName);
  assertComponent(encoded, "namespace", id.namespace);
  return encoded;
}

/**
 * Parses `service.namespace` into its components.
 * @throws NamespaceIdParseError when the separator count is not exactly one or a part is empty
 */
export function parseNamespaceId(rawId: string): NamespaceId {
  const parts = rawId.split(ID_SPACER);
  if (parts.length !== 2) {
    throw new NamespaceIdParseError(
      rawId,
      `expected exactly one "${ID_SPACER}" separator, found ${parts.length - 1}`
    );
  }
  const [serviceName = "", namespace = ""] = parts;
  assertComponent(rawId, "serviceName", serviceName);
  assertComponent(rawId, "namespace", namespace);
  return { serviceName, namespace };
}

/** Tuple form of parseNamespaceId. */
export function splitNamespaceId(rawId: string): [string, string] {
  const { serviceName, namespace } = parseNamespaceId(rawId);
  return [serviceName, namespace];
}

export function namespaceIdEquals(a: NamespaceId, b: NamespaceId): boolean {
  return a.serviceName === b.serviceName && a.namespace === b.namespace;
}
