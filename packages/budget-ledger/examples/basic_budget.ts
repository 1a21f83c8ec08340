// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic_budget.ts
 *
 * Demonstrates the reserve → call → settle loop for budget-gated LLM calls:
 *   1. Create a ledger and a set of limits.
 *   2. Reserve an estimate before each call.
 *   3. Settle with the actual usage once the call returns (or release it).
 *   4. Inspect utilization at the end.
 *
 * Run with:  npx tsx examples/basic_budget.ts
 */

import { UsageLedger, parseBudgetLimits, describeViolation } from '../typescript/src/index.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const ledger = new UsageLedger();
const limits = parseBudgetLimits({ maxCostUsd: 0.05, maxRequests: 5 });

// ─── Simulate a sequence of LLM calls ─────────────────────────────────────────

const estimates = [1_200, 800, 2_500, 4_000, 900, 600];
const PRICE_PER_TOKEN_USD = 0.000_005;
let callNumber = 0;

for (const tokens of estimates) {
  callNumber += 1;

  const reservation = ledger.reserve(
    { promptTokens: tokens, costUsd: tokens * PRICE_PER_TOKEN_USD, requestCount: 1 },
    limits,
    `call ${callNumber}`,
  );

  if (!reservation.granted) {
    console.log(`Call ${callNumber}: DENIED  ${describeViolation(reservation.denial.violation)}`);
    continue;
  }

  // Simulate the provider call here; real usage is usually below the estimate.
  const promptTokens = Math.round(tokens * 0.7);
  const completionTokens = 150;
  ledger.settle(reservation.reservationId, {
    promptTokens,
    completionTokens,
    costUsd: (promptTokens + completionTokens) * PRICE_PER_TOKEN_USD,
    requestCount: 1,
  });

  const totals = ledger.snapshot();
  console.log(
    `Call ${callNumber}: SETTLED ${promptTokens + completionTokens} tokens  ` +
    `spent_so_far=$${totals.costUsd.toFixed(6)}`,
  );
}

// ─── Final utilization snapshot ───────────────────────────────────────────────

const utilization = ledger.utilization(limits);

console.log('\n── Budget summary ────────────────────────────────────');
for (const dim of [utilization.tokens, utilization.cost, utilization.requests]) {
  const limit = dim.limit === null ? 'unbounded' : String(dim.limit);
  const percent = dim.utilizationPercent === null ? '-' : `${dim.utilizationPercent.toFixed(1)}%`;
  console.log(`  ${dim.dimension.padEnd(9)}: used ${dim.used}  limit ${limit}  (${percent})`);
}
console.log('──────────────────────────────────────────────────────');

// ─── History ──────────────────────────────────────────────────────────────────

const entries = ledger.history();
console.log(`\n${entries.length} entries recorded:`);
for (const entry of entries) {
  console.log(`  [${entry.id.slice(0, 8)}] $${entry.usage.costUsd.toFixed(6)}  ${entry.description ?? ''}`);
}
