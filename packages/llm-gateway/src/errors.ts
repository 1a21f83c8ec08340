// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describeViolation } from '@lintai/budget-ledger';
import type {
  BudgetDenial,
  BudgetDimension,
  BudgetViolation,
  UsageRecord,
} from '@lintai/budget-ledger';
import type { ProviderKind } from './types.js';

/**
 * Base class for all gateway errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class GatewayError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown at startup when provider or budget configuration is invalid.
 *
 * `issues` carries one entry per problem, formatted `KEY: message`, so every
 * mistake in an environment file is reported at once.
 */
export class ConfigurationError extends GatewayError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIGURATION_ERROR', `Gateway configuration is invalid: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Returned (not thrown) by `Gateway.submit()` when a request would push
 * aggregate usage past a configured limit. No provider call was made.
 */
export class BudgetExceededError extends GatewayError {
  /** First violated dimension, in the order tokens, cost, requests. */
  readonly dimension: BudgetDimension;
  /** Exposure plus this request's estimate on `dimension`. */
  readonly attempted: number;
  readonly limit: number;
  readonly violations: readonly BudgetViolation[];

  constructor(denial: BudgetDenial) {
    super('BUDGET_EXCEEDED', describeViolation(denial.violation));
    this.name = 'BudgetExceededError';
    this.dimension = denial.violation.dimension;
    this.attempted = denial.violation.attempted;
    this.limit = denial.violation.limit;
    this.violations = denial.violations;
  }
}

export type ProviderErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'network'
  | 'server'
  | 'authentication'
  | 'invalid_request'
  | 'content_filtered'
  | 'cancelled'
  | 'unknown';

export interface ProviderErrorInit {
  readonly provider: ProviderKind;
  readonly kind: ProviderErrorKind;
  readonly message: string;
  readonly retryable?: boolean;
  readonly status?: number;
  /** Usage the provider billed even though the call failed. */
  readonly usage?: UsageRecord;
  readonly cause?: unknown;
}

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  'rate_limited',
  'timeout',
  'network',
  'server',
]);

/**
 * A provider call failed. The gateway never retries on its own; callers
 * decide based on `retryable`.
 */
export class ProviderError extends GatewayError {
  readonly provider: ProviderKind;
  readonly kind: ProviderErrorKind;
  readonly retryable: boolean;
  readonly status: number | undefined;
  readonly usage: UsageRecord | undefined;

  constructor(init: ProviderErrorInit) {
    super('PROVIDER_ERROR', `${init.provider}: ${init.message}`, { cause: init.cause });
    this.name = 'ProviderError';
    this.provider = init.provider;
    this.kind = init.kind;
    this.retryable = init.retryable ?? RETRYABLE_KINDS.has(init.kind);
    this.status = init.status;
    this.usage = init.usage;
  }
}

/**
 * Raised when a reservation had to be released without knowing what the
 * provider actually billed. Never thrown: the gateway logs it at `warn` and
 * emits it on `gateway:reconciliation:warning`.
 */
export class UsageReconciliationWarning extends GatewayError {
  readonly requestId: string;
  readonly reservationId: string;
  /** The estimate that was rolled back. */
  readonly estimate: UsageRecord;

  constructor(requestId: string, reservationId: string, estimate: UsageRecord, cause: unknown) {
    super(
      'USAGE_RECONCILIATION',
      `Request "${requestId}" ended without usage data; released its reservation. ` +
        'Actual provider usage may be unaccounted.',
      { cause },
    );
    this.name = 'UsageReconciliationWarning';
    this.requestId = requestId;
    this.reservationId = reservationId;
    this.estimate = estimate;
  }
}

/** Thrown by `Gateway.submit()` for a structurally invalid AnalysisRequest. */
export class InvalidRequestError extends GatewayError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_REQUEST', `Analysis request is invalid: ${details.join('; ')}`);
    this.name = 'InvalidRequestError';
    this.details = details;
  }
}
