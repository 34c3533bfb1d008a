// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@replication-monitor/core/schemas`
 * Purpose: Zod schemas for declarations and threshold parameters.
 * Scope: Validates data at the config-store and entry-point boundaries. Does not read files.
 * Invariants:
 * - Adapters call InstanceDeclarationSchema.safeParse before handing declarations to the core
 * - No `as InstanceDeclaration` casts on raw config data
 * Side-effects: none
 * Links: types.ts
 * @public
 */

import { z } from "zod";

export const InstanceDeclarationSchema = z.object({
  owningService: z.string().min(1),
  instanceName: z.string().min(1),
  declaredNamespace: z.string().min(1).optional(),
  instanceCount: z.number().int().nonnegative(),
});

/** Percentage of available to expected instances. */
export const ThresholdPctSchema = z.number().finite().nonnegative();

export const DEFAULT_WARN_PCT = 75;
export const DEFAULT_CRIT_PCT = 90;
