// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// ─── Core class ──────────────────────────────────────────────────────────────
export { UsageLedger } from './ledger.js';

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  UsageRecord,
  UsageTotals,
  BudgetLimits,
  BudgetDimension,
  BudgetDecision,
  BudgetDenial,
  BudgetViolation,
  Reservation,
  ReserveResult,
  UsageEntry,
  UsageFilter,
  DimensionUtilization,
  LedgerUtilization,
  UsageLedgerConfig,
} from './types.js';

// ─── Zod schemas (for downstream validation) ─────────────────────────────────
export {
  UsageRecordSchema,
  BudgetLimitsSchema,
  UsageFilterSchema,
  UsageLedgerConfigSchema,
  BUDGET_DIMENSIONS,
} from './types.js';

// ─── Policy ──────────────────────────────────────────────────────────────────
export { checkBudget, isUnbounded, parseBudgetLimits, describeViolation } from './policy.js';

// ─── Errors ──────────────────────────────────────────────────────────────────
export { LedgerError } from './errors.js';
export type { LedgerErrorCode } from './errors.js';

// ─── Utilities ───────────────────────────────────────────────────────────────
export {
  PICOS_PER_USD,
  ZERO_USAGE,
  createUsageRecord,
  sumUsage,
  totalTokensOf,
  toPicos,
  fromPicos,
} from './usage.js';

export { filterHistory } from './history.js';
export { buildUtilization, rankUtilization } from './query.js';
