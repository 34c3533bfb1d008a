// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core`
 * Purpose: Replication evaluation and alerting engine: types, rules, ports and the check orchestrator.
 * Scope: Pure domain logic over injected ports. Does not contain adapters or I/O.
 * Invariants:
 * - FORBIDDEN: node:fs, fetch, YAML parsing, any direct I/O
 * - ALLOWED: zod schemas, pure functions, port interfaces
 * Side-effects: none
 * Links: src/services/runReplicationCheck.ts, services/replication-checker/src/bootstrap/container.ts
 * @public
 */

// Errors
export {
  AlertRoutingError,
  AlertTransportError,
  ConfigResolutionError,
  describeError,
  isAlertRoutingError,
  isAlertTransportError,
  isConfigResolutionError,
  isNamespaceIdParseError,
  isSnapshotUnavailableError,
  NamespaceIdParseError,
  type SnapshotKind,
  SnapshotUnavailableError,
} from "./errors.js";
// Namespace ids
export {
  formatNamespaceId,
  ID_SPACER,
  type NamespaceId,
  namespaceIdEquals,
  parseNamespaceId,
  splitNamespaceId,
} from "./namespace-id.js";
// Ports
export type {
  AlertRoutingPort,
  AlertTransportPort,
  AvailabilityPort,
  InstanceConfigPort,
  NamespaceUniversePort,
} from "./ports/index.js";
// Rules
export {
  effectiveNamespace,
  expectedCount,
  resolveExpectedInstances,
} from "./rules/expected-instances.js";
export {
  classifyRatio,
  evaluateReplication,
  formatReplicationMessage,
  noDataVerdict,
  type ReplicationEvaluationInput,
  type ThresholdIssue,
  type ThresholdIssueCode,
  validateThresholds,
} from "./rules/thresholds.js";
// Schemas
export {
  DEFAULT_CRIT_PCT,
  DEFAULT_WARN_PCT,
  InstanceDeclarationSchema,
  ThresholdPctSchema,
} from "./schemas.js";
// Orchestrator
export {
  buildCheckId,
  DEFAULT_CHECK_CONCURRENCY,
  DEFAULT_CHECK_NAME_PREFIX,
  type LoggerLike,
  type ReplicationCheckDeps,
  type ReplicationCheckParams,
  runReplicationCheck,
  summarizeOutcomes,
} from "./services/runReplicationCheck.js";
// Types
export {
  type AlertRoute,
  type AvailabilityMap,
  type DeclarationFailure,
  type DeclarationSnapshot,
  type Delivery,
  DELIVERY_STATUSES,
  type DeliveryStatus,
  type EvaluatedOutcome,
  type ExpectedResolution,
  type InstanceDeclaration,
  type OutcomeState,
  type ReplicationAlertEvent,
  type ReplicationCheckReport,
  type ReplicationCheckSummary,
  type ReplicationOutcome,
  type SkippedNotInScopeOutcome,
  type SkippedNotManagedOutcome,
  type Verdict,
  VERDICT_STATUSES,
  type VerdictStatus,
} from "./types.js";
// Utilities
