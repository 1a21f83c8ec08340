// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { BudgetLimitsSchema } from './types.js';
import type {
  BudgetDecision,
  BudgetDimension,
  BudgetLimits,
  BudgetViolation,
  UsageRecord,
  UsageTotals,
} from './types.js';
import { fromPicos, toPicos, totalTokensOf } from './usage.js';
import { LedgerError } from './errors.js';

const ALLOW: BudgetDecision = Object.freeze({ allowed: true });

/**
 * Decide whether `estimate` fits on top of `current` under `limits`.
 *
 * Pure: no state, no side effects. Each dimension is checked independently
 * and a dimension is violated when `current + estimate > limit`, so landing
 * exactly on the limit is allowed. Every violated dimension is reported;
 * `violation` is the first in the order tokens, cost, requests.
 *
 * Cost is compared in integer pico-dollars.
 */
export function checkBudget(
  current: UsageTotals,
  estimate: UsageRecord,
  limits: BudgetLimits,
): BudgetDecision {
  const violations: BudgetViolation[] = [];

  if (limits.maxTokens !== undefined) {
    const violation = compare('tokens', current.totalTokens, totalTokensOf(estimate), limits.maxTokens);
    if (violation !== null) violations.push(violation);
  }

  if (limits.maxCostUsd !== undefined) {
    const violation = compareCost(
      toPicos(current.costUsd),
      toPicos(estimate.costUsd),
      toPicos(limits.maxCostUsd),
    );
    if (violation !== null) violations.push(violation);
  }

  if (limits.maxRequests !== undefined) {
    const violation = compare('requests', current.requestCount, estimate.requestCount, limits.maxRequests);
    if (violation !== null) violations.push(violation);
  }

  const [first] = violations;
  if (first === undefined) return ALLOW;
  return { allowed: false, violation: first, violations };
}

/** True when no dimension is bounded. */
export function isUnbounded(limits: BudgetLimits): boolean {
  return (
    limits.maxTokens === undefined &&
    limits.maxCostUsd === undefined &&
    limits.maxRequests === undefined
  );
}

/**
 * Validate a raw limits object. Throws LedgerError('INVALID_LIMITS') listing
 * every problem.
 */
export function parseBudgetLimits(raw: unknown): BudgetLimits {
  const result = BudgetLimitsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new LedgerError('INVALID_LIMITS', `Invalid budget limits: ${details.join('; ')}`);
  }
  return Object.freeze(result.data);
}

/** Describe a violation for logs and error messages. */
export function describeViolation(violation: BudgetViolation): string {
  const unit = violation.dimension === 'cost' ? ' USD' : '';
  return (
    `${violation.dimension} budget exceeded: attempted ${violation.attempted}${unit}, ` +
    `limit ${violation.limit}${unit} (current ${violation.current}, requested ${violation.requested})`
  );
}

function compare(
  dimension: BudgetDimension,
  current: number,
  requested: number,
  limit: number,
): BudgetViolation | null {
  const attempted = current + requested;
  if (attempted <= limit) return null;
  return { dimension, current, requested, attempted, limit, excess: attempted - limit };
}

function compareCost(current: bigint, requested: bigint, limit: bigint): BudgetViolation | null {
  const attempted = current + requested;
  if (attempted <= limit) return null;
  return {
    dimension: 'cost',
    current: fromPicos(current),
    requested: fromPicos(requested),
    attempted: fromPicos(attempted),
    limit: fromPicos(limit),
    excess: fromPicos(attempted - limit),
  };
}
