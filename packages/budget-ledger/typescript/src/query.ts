// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  BudgetDimension,
  BudgetLimits,
  DimensionUtilization,
  LedgerUtilization,
  UsageTotals,
} from './types.js';

/**
 * Derive a per-dimension utilization snapshot from recorded and reserved
 * totals. `utilizationPercent` counts reservations as used, matching what
 * the policy checks against, and may exceed 100 when actuals overran their
 * estimates.
 */
export function buildUtilization(
  recorded: UsageTotals,
  reserved: UsageTotals,
  limits: BudgetLimits,
): LedgerUtilization {
  return {
    tokens: dimension('tokens', recorded.totalTokens, reserved.totalTokens, limits.maxTokens),
    cost: dimension('cost', recorded.costUsd, reserved.costUsd, limits.maxCostUsd),
    requests: dimension('requests', recorded.requestCount, reserved.requestCount, limits.maxRequests),
  };
}

/**
 * Flatten a LedgerUtilization, most constrained dimension first.
 * Unbounded dimensions sort last.
 */
export function rankUtilization(utilization: LedgerUtilization): readonly DimensionUtilization[] {
  return [utilization.tokens, utilization.cost, utilization.requests].sort(
    (a, b) => (b.utilizationPercent ?? -1) - (a.utilizationPercent ?? -1),
  );
}

function dimension(
  name: BudgetDimension,
  used: number,
  reserved: number,
  limit: number | undefined,
): DimensionUtilization {
  if (limit === undefined) {
    return { dimension: name, used, reserved, limit: null, available: null, utilizationPercent: null };
  }
  return {
    dimension: name,
    used,
    reserved,
    limit,
    available: Math.max(0, limit - used - reserved),
    utilizationPercent: ((used + reserved) / limit) * 100,
  };
}
