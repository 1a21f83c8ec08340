// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { checkBudget, describeViolation, isUnbounded, parseBudgetLimits } from '../src/policy.js';
import { createUsageRecord, sumUsage } from '../src/usage.js';
import { LedgerError } from '../src/errors.js';
import type { UsageTotals } from '../src/types.js';

function totals(overrides: Partial<UsageTotals> = {}): UsageTotals {
  const promptTokens = overrides.promptTokens ?? 0;
  const completionTokens = overrides.completionTokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
    costUsd: overrides.costUsd ?? 0,
    requestCount: overrides.requestCount ?? 0,
  };
}

describe('checkBudget', () => {
  describe('unbounded limits', () => {
    it('allows any estimate when every limit is unset', () => {
      const decision = checkBudget(
        totals({ promptTokens: 9_000_000, costUsd: 50_000, requestCount: 1_000_000 }),
        createUsageRecord({ promptTokens: 1_000_000_000, costUsd: 1_000_000, requestCount: 1 }),
        {},
      );
      expect(decision).toEqual({ allowed: true });
    });

    it('isUnbounded reports true only when no dimension is set', () => {
      expect(isUnbounded({})).toBe(true);
      expect(isUnbounded({ maxRequests: 1 })).toBe(false);
    });
  });

  describe('tokens dimension', () => {
    it('denies when current + estimate exceeds maxTokens, citing tokens', () => {
      const decision = checkBudget(
        totals({ promptTokens: 60, completionTokens: 30 }),
        createUsageRecord({ promptTokens: 20 }),
        { maxTokens: 100, maxCostUsd: 1_000, maxRequests: 1_000 },
      );
      expect(decision.allowed).toBe(false);
      if (decision.allowed) return;
      expect(decision.violation).toEqual({
        dimension: 'tokens',
        current: 90,
        requested: 20,
        attempted: 110,
        limit: 100,
        excess: 10,
      });
      expect(decision.violations).toHaveLength(1);
    });

    it('allows an estimate that lands exactly on the limit', () => {
      const decision = checkBudget(
        totals({ promptTokens: 80 }),
        createUsageRecord({ promptTokens: 10, completionTokens: 10 }),
        { maxTokens: 100 },
      );
      expect(decision.allowed).toBe(true);
    });
  });

  describe('cost dimension', () => {
    it('denies 0.30 on top of 0.80 under a 1.00 cap', () => {
      const decision = checkBudget(
        totals({ costUsd: 0.8 }),
        createUsageRecord({ costUsd: 0.3 }),
        { maxCostUsd: 1 },
      );
      expect(decision.allowed).toBe(false);
      if (decision.allowed) return;
      expect(decision.violation.dimension).toBe('cost');
      expect(decision.violation.attempted).toBe(1.1);
      expect(decision.violation.limit).toBe(1);
      expect(decision.violation.excess).toBe(0.1);
    });

    it('compares in pico-dollars so 0.1 + 0.2 fits a 0.3 cap', () => {
      const current = sumUsage([
        createUsageRecord({ costUsd: 0.1 }),
        createUsageRecord({ costUsd: 0.2 }),
      ]);
      const decision = checkBudget(current, createUsageRecord(), { maxCostUsd: 0.3 });
      expect(decision.allowed).toBe(true);
    });
  });

  describe('requests dimension', () => {
    it('reports attempted=3, limit=2 for a third request', () => {
      const decision = checkBudget(
        totals({ requestCount: 2 }),
        createUsageRecord({ requestCount: 1 }),
        { maxRequests: 2 },
      );
      expect(decision.allowed).toBe(false);
      if (decision.allowed) return;
      expect(decision.violation.dimension).toBe('requests');
      expect(decision.violation.attempted).toBe(3);
      expect(decision.violation.limit).toBe(2);
    });
  });

  describe('multiple violations', () => {
    it('lists every violated dimension in the order tokens, cost, requests', () => {
      const decision = checkBudget(
        totals({ promptTokens: 100, costUsd: 1, requestCount: 1 }),
        createUsageRecord({ promptTokens: 1, costUsd: 1, requestCount: 1 }),
        { maxTokens: 100, maxCostUsd: 1, maxRequests: 1 },
      );
      expect(decision.allowed).toBe(false);
      if (decision.allowed) return;
      expect(decision.violations.map((v) => v.dimension)).toEqual(['tokens', 'cost', 'requests']);
      expect(decision.violation.dimension).toBe('tokens');
    });
  });

  it('does not depend on hidden state', () => {
    const current = totals({ promptTokens: 50 });
    const estimate = createUsageRecord({ promptTokens: 60 });
    const first = checkBudget(current, estimate, { maxTokens: 100 });
    const second = checkBudget(current, estimate, { maxTokens: 100 });
    expect(second).toEqual(first);
  });
});

describe('parseBudgetLimits', () => {
  it('accepts an empty object as fully unbounded', () => {
    expect(parseBudgetLimits({})).toEqual({});
  });

  it('rejects a zero limit', () => {
    expect(() => parseBudgetLimits({ maxTokens: 0 })).toThrow(LedgerError);
  });

  it('rejects a fractional request limit with code INVALID_LIMITS', () => {
    try {
      parseBudgetLimits({ maxRequests: 1.5 });
      expect.unreachable('parseBudgetLimits should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerError);
      expect((error as LedgerError).code).toBe('INVALID_LIMITS');
    }
  });
});

describe('describeViolation', () => {
  it('renders attempted and limit with the dimension name', () => {
    expect(
      describeViolation({
        dimension: 'tokens',
        current: 90,
        requested: 20,
        attempted: 110,
        limit: 100,
        excess: 10,
      }),
    ).toBe('tokens budget exceeded: attempted 110, limit 100 (current 90, requested 20)');
  });
});
