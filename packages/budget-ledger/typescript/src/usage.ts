// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { UsageRecordSchema } from './types.js';
import type { UsageRecord, UsageTotals } from './types.js';
import { LedgerError } from './errors.js';

/** Cost is accumulated as a bigint count of pico-dollars; per-token prices fall below a micro-dollar. */
export const PICOS_PER_USD = 1_000_000_000_000;

export function toPicos(usd: number): bigint {
  return BigInt(Math.round(usd * PICOS_PER_USD));
}

export function fromPicos(picos: bigint): number {
  return Number(picos) / PICOS_PER_USD;
}

export const ZERO_USAGE: UsageRecord = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  costUsd: 0,
  requestCount: 0,
});

/**
 * Build a validated, frozen UsageRecord. Missing fields default to zero.
 * Throws LedgerError('INVALID_USAGE') on negative, fractional or non-finite input.
 */
export function createUsageRecord(input: Partial<UsageRecord> = {}): UsageRecord {
  const result = UsageRecordSchema.safeParse({ ...ZERO_USAGE, ...input });
  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new LedgerError('INVALID_USAGE', `Invalid usage record: ${details.join('; ')}`);
  }
  return Object.freeze(result.data);
}

/**
 * Mutable running sum. Internal to the ledger; callers only ever see
 * UsageTotals copies.
 */
export interface Accumulator {
  promptTokens: number;
  completionTokens: number;
  costPicos: bigint;
  requestCount: number;
}

export function emptyAccumulator(): Accumulator {
  return { promptTokens: 0, completionTokens: 0, costPicos: 0n, requestCount: 0 };
}

/** Mutates `target` in place. `sign` of -1 subtracts. */
export function accumulate(target: Accumulator, usage: UsageRecord, sign: 1 | -1 = 1): void {
  target.promptTokens += sign * usage.promptTokens;
  target.completionTokens += sign * usage.completionTokens;
  target.costPicos += BigInt(sign) * toPicos(usage.costUsd);
  target.requestCount += sign * usage.requestCount;
}

export function toTotals(...parts: readonly Accumulator[]): UsageTotals {
  let promptTokens = 0;
  let completionTokens = 0;
  let costPicos = 0n;
  let requestCount = 0;
  for (const part of parts) {
    promptTokens += part.promptTokens;
    completionTokens += part.completionTokens;
    costPicos += part.costPicos;
    requestCount += part.requestCount;
  }
  return {
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
    costUsd: fromPicos(costPicos),
    requestCount,
  };
}

/** Component-wise sum of any number of records. */
export function sumUsage(records: readonly UsageRecord[]): UsageTotals {
  const acc = emptyAccumulator();
  for (const record of records) {
    accumulate(acc, record);
  }
  return toTotals(acc);
}

/** Tokens a record counts against the tokens limit. */
export function totalTokensOf(usage: UsageRecord): number {
  return usage.promptTokens + usage.completionTokens;
}
