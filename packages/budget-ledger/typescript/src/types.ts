// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

// ─── Usage record ────────────────────────────────────────────────────────────

export const UsageRecordSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  costUsd: z.number().finite().nonnegative(),
  requestCount: z.number().int().nonnegative(),
});

/** Usage consumed by one provider call (or estimated for one). Immutable. */
export type UsageRecord = Readonly<z.infer<typeof UsageRecordSchema>>;

/** Component-wise sum of recorded usage. */
export interface UsageTotals {
  readonly promptTokens: number;
  readonly completionTokens: number;
  /** promptTokens + completionTokens; the figure the tokens limit applies to. */
  readonly totalTokens: number;
  readonly costUsd: number;
  readonly requestCount: number;
}

// ─── Limits ──────────────────────────────────────────────────────────────────

export const BudgetLimitsSchema = z.object({
  maxTokens: z.number().int().positive().optional(),
  maxCostUsd: z.number().finite().positive().optional(),
  maxRequests: z.number().int().positive().optional(),
});

/** Operator-defined caps. An unset field means that dimension is unbounded. */
export type BudgetLimits = Readonly<z.infer<typeof BudgetLimitsSchema>>;

export const BUDGET_DIMENSIONS = ['tokens', 'cost', 'requests'] as const;
export type BudgetDimension = (typeof BUDGET_DIMENSIONS)[number];

// ─── Decision ────────────────────────────────────────────────────────────────

export interface BudgetViolation {
  readonly dimension: BudgetDimension;
  /** Exposure before this request. */
  readonly current: number;
  /** What this request would add. */
  readonly requested: number;
  /** current + requested. */
  readonly attempted: number;
  readonly limit: number;
  /** attempted - limit. Always positive. */
  readonly excess: number;
}

export type BudgetDecision =
  | { readonly allowed: true }
  | BudgetDenial;

export interface BudgetDenial {
  readonly allowed: false;
  /** First violated dimension, in the order tokens, cost, requests. */
  readonly violation: BudgetViolation;
  readonly violations: readonly BudgetViolation[];
}

// ─── Reservations ────────────────────────────────────────────────────────────

export interface Reservation {
  readonly id: string;
  readonly estimate: UsageRecord;
  readonly createdAt: Date;
  readonly description?: string;
}

export type ReserveResult =
  | {
      readonly granted: true;
      readonly reservationId: string;
      /** Exposure including the new reservation. */
      readonly exposure: UsageTotals;
    }
  | {
      readonly granted: false;
      readonly denial: BudgetDenial;
      /** Exposure at the time of the denied check (unchanged). */
      readonly exposure: UsageTotals;
    };

// ─── History ─────────────────────────────────────────────────────────────────

export interface UsageEntry {
  readonly id: string;
  readonly usage: UsageRecord;
  readonly timestamp: Date;
  readonly description?: string;
  readonly reservationId?: string;
}

export const UsageFilterSchema = z.object({
  since: z.date().optional(),
  until: z.date().optional(),
  description: z.string().optional(),
}).optional();
export type UsageFilter = z.infer<typeof UsageFilterSchema>;

// ─── Utilization ─────────────────────────────────────────────────────────────

export interface DimensionUtilization {
  readonly dimension: BudgetDimension;
  readonly used: number;
  readonly reserved: number;
  /** null when the dimension is unbounded. */
  readonly limit: number | null;
  readonly available: number | null;
  readonly utilizationPercent: number | null;
}

export interface LedgerUtilization {
  readonly tokens: DimensionUtilization;
  readonly cost: DimensionUtilization;
  readonly requests: DimensionUtilization;
}

// ─── Ledger config ───────────────────────────────────────────────────────────

export const UsageLedgerConfigSchema = z.object({
  /** Oldest history entries are evicted past this size. Totals are unaffected. */
  maxHistoryEntries: z.number().int().positive().default(10_000),
});
export type UsageLedgerConfig = z.input<typeof UsageLedgerConfigSchema>;
