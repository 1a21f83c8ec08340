// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  BudgetLimitsSchema,
  UsageLedger,
  createUsageRecord,
} from '@lintai/budget-ledger';
import type {
  BudgetDimension,
  BudgetLimits,
  LedgerUtilization,
  UsageRecord,
} from '@lintai/budget-ledger';
import type { Logger } from 'pino';
import {
  BudgetExceededError,
  ConfigurationError,
  InvalidRequestError,
  ProviderError,
  UsageReconciliationWarning,
} from './errors.js';
import {
  EVENT_BUDGET_WARNING,
  EVENT_DECISION,
  EVENT_RECONCILIATION_WARNING,
  EVENT_USAGE_RECORDED,
  GatewayEventEmitter,
} from './events.js';
import { createSilentLogger } from './logging/logger.js';
import { ModelPricingRegistry } from './pricing/registry.js';
import { classifyFailure } from './providers/classify.js';
import type { ProviderAdapter } from './providers/types.js';
import { AnalysisRequestSchema } from './types.js';
import type { AnalysisRequest, AnalysisResult, ProviderResponse } from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

const GatewaySettingsSchema = z.object({
  /** Utilization percentage at which `gateway:budget:warning` fires. */
  budgetWarningThresholdPercent: z.number().positive().max(100).default(80),
  /** Applied to every submit that does not pass its own `timeoutMs`. */
  defaultTimeoutMs: z.number().int().positive().optional(),
});

export interface GatewayOptions extends z.input<typeof GatewaySettingsSchema> {
  readonly provider: ProviderAdapter;
  /** Unset dimensions are unbounded. Defaults to no limits at all. */
  readonly limits?: BudgetLimits;
  /** Share a ledger to enforce one budget across several gateways. */
  readonly ledger?: UsageLedger;
  /** Must be the registry the adapter prices with, or estimates and actuals disagree. */
  readonly pricing?: ModelPricingRegistry;
  readonly logger?: Logger;
  readonly events?: GatewayEventEmitter;
}

export interface SubmitOptions {
  /** Give up waiting after this many milliseconds and return a `cancelled` error. */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

type RequestLogger = Logger;

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

/**
 * Gateway routes analysis requests to the configured provider while keeping
 * aggregate usage within the configured limits.
 *
 * Per request:
 *   1. Estimate:   tokens from `estimatedTokens`, one request, cost at the
 *                  model's most expensive per-token rate.
 *   2. Reserve:    one synchronous ledger call: check against exposure and
 *                  hold the estimate. Concurrent submits cannot interleave
 *                  here.
 *   3. Deny:       return BudgetExceededError; no provider call is made and
 *                  the ledger is unchanged.
 *   4. Dispatch:   call the adapter outside any critical section.
 *   5. Reconcile:  settle the reservation with the billed usage, or release
 *                  it and emit a UsageReconciliationWarning when usage is
 *                  unknown. The ledger is updated at most once per submit.
 *
 * Nothing is retried. If a timeout or the caller's signal fires first,
 * `submit()` returns a `cancelled` ProviderError at once and reconciliation
 * happens when the provider call settles; `drain()` waits for that.
 */
export class Gateway {
  readonly #provider: ProviderAdapter;
  readonly #ledger: UsageLedger;
  readonly #limits: BudgetLimits;
  readonly #pricing: ModelPricingRegistry;
  readonly #logger: Logger;
  readonly #events: GatewayEventEmitter;
  readonly #thresholdPercent: number;
  readonly #defaultTimeoutMs: number | undefined;

  readonly #inFlight = new Set<Promise<void>>();
  readonly #warnedDimensions = new Set<BudgetDimension>();

  constructor(options: GatewayOptions) {
    const settings = GatewaySettingsSchema.safeParse({
      budgetWarningThresholdPercent: options.budgetWarningThresholdPercent,
      defaultTimeoutMs: options.defaultTimeoutMs,
    });
    const limits = BudgetLimitsSchema.safeParse(options.limits ?? {});
    if (!settings.success || !limits.success) {
      const issues = [
        ...(settings.success ? [] : settings.error.issues).map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
        ...(limits.success ? [] : limits.error.issues).map(
          (issue) => `limits.${issue.path.join('.')}: ${issue.message}`,
        ),
      ];
      throw new ConfigurationError(issues);
    }

    this.#provider = options.provider;
    this.#limits = Object.freeze(limits.data);
    this.#ledger = options.ledger ?? new UsageLedger();
    this.#pricing = options.pricing ?? new ModelPricingRegistry();
    this.#logger = options.logger ?? createSilentLogger();
    this.#events = options.events ?? new GatewayEventEmitter();
    this.#thresholdPercent = settings.data.budgetWarningThresholdPercent;
    this.#defaultTimeoutMs = settings.data.defaultTimeoutMs;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get ledger(): UsageLedger {
    return this.#ledger;
  }

  get limits(): BudgetLimits {
    return this.#limits;
  }

  get provider(): ProviderAdapter {
    return this.#provider;
  }

  get events(): GatewayEventEmitter {
    return this.#events;
  }

  utilization(): LedgerUtilization {
    return this.#ledger.utilization(this.#limits);
  }

  /** Number of provider calls whose usage is not yet reconciled. */
  get inFlight(): number {
    return this.#inFlight.size;
  }

  // ---------------------------------------------------------------------------
  // Submit
  // ---------------------------------------------------------------------------

  /**
   * The usage a request is checked and reserved with. Non-billable
   * providers reserve one request and nothing else.
   */
  estimate(request: AnalysisRequest): UsageRecord {
    if (!this.#provider.billable) {
      return createUsageRecord({ requestCount: 1 });
    }
    const { kind, model } = this.#provider;
    const costUsd = this.#pricing.estimateCost(kind, model, request.estimatedTokens) ?? 0;
    return createUsageRecord({
      promptTokens: request.estimatedTokens,
      costUsd,
      requestCount: 1,
    });
  }

  /**
   * Check the request against the budget and, if it fits, send it.
   *
   * Resolves with a result for every outcome except a malformed request,
   * which throws InvalidRequestError. An error thrown by a
   * `gateway:decision` listener is rethrown after the reservation is
   * released.
   */
  async submit(request: AnalysisRequest, options: SubmitOptions = {}): Promise<AnalysisResult> {
    const parsed = AnalysisRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const requestId = randomUUID();
    const { kind: provider, model } = this.#provider;
    const log = this.#logger.child({ ...parsed.data.metadata, requestId, provider, model });

    if (options.signal?.aborted === true) {
      log.info('Request cancelled before dispatch');
      return {
        ok: false,
        error: new ProviderError({
          provider,
          kind: 'cancelled',
          message: 'request was cancelled before dispatch',
          cause: options.signal.reason,
        }),
        requestId,
      };
    }

    const estimate = this.estimate(parsed.data);
    const reservation = this.#ledger.reserve(estimate, this.#limits, requestId);

    if (!reservation.granted) {
      const error = new BudgetExceededError(reservation.denial);
      log.warn(
        { dimension: error.dimension, attempted: error.attempted, limit: error.limit },
        'Budget exceeded; request denied',
      );
      this.#events.emit(EVENT_DECISION, {
        requestId,
        provider,
        model,
        timestamp: new Date().toISOString(),
        allowed: false,
        estimate,
        violations: reservation.denial.violations,
      });
      return { ok: false, error, requestId };
    }

    log.debug({ estimate }, 'Budget reserved; dispatching');
    try {
      this.#events.emit(EVENT_DECISION, {
        requestId,
        provider,
        model,
        timestamp: new Date().toISOString(),
        allowed: true,
        estimate,
      });
    } catch (error) {
      // Nothing was dispatched, so the hold must not outlive this submit.
      this.#ledger.release(reservation.reservationId);
      throw error;
    }

    const controller = new AbortController();
    const outcome = this.#dispatch(
      parsed.data,
      controller.signal,
      reservation.reservationId,
      estimate,
      requestId,
      log,
    );
    this.#track(outcome, log);

    const timeoutMs = options.timeoutMs ?? this.#defaultTimeoutMs;
    if (timeoutMs === undefined && options.signal === undefined) {
      return outcome;
    }
    return this.#raceInterruption(outcome, controller, timeoutMs, options.signal, requestId, log);
  }

  /** Resolves once every dispatched call has been reconciled into the ledger. */
  async drain(): Promise<void> {
    while (this.#inFlight.size > 0) {
      await Promise.all(this.#inFlight);
    }
  }

  /**
   * Zero the ledger and re-arm budget warnings. Refused by the ledger while
   * calls are in flight.
   */
  reset(): void {
    this.#ledger.reset();
    this.#warnedDimensions.clear();
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #dispatch(
    request: AnalysisRequest,
    signal: AbortSignal,
    reservationId: string,
    estimate: UsageRecord,
    requestId: string,
    log: RequestLogger,
  ): Promise<AnalysisResult> {
    const { kind: provider, model } = this.#provider;

    let response: ProviderResponse;
    try {
      response = await this.#provider.call(request, { signal });
    } catch (thrown) {
      const error = classifyFailure(provider, thrown, signal);
      if (error.usage !== undefined) {
        this.#settle(reservationId, error.usage, 'failure', requestId, log);
      } else {
        this.#ledger.release(reservationId);
        const warning = new UsageReconciliationWarning(requestId, reservationId, estimate, error);
        log.warn({ code: warning.code, estimate }, warning.message);
        this.#events.emit(EVENT_RECONCILIATION_WARNING, {
          requestId,
          provider,
          model,
          timestamp: new Date().toISOString(),
          warning,
        });
      }
      log.error(
        { kind: error.kind, status: error.status, retryable: error.retryable },
        `Provider call failed: ${error.message}`,
      );
      return { ok: false, error, requestId };
    }

    this.#settle(reservationId, response.usage, 'success', requestId, log);
    log.info({ usage: response.usage, finishReason: response.finishReason }, 'Request completed');
    return { ok: true, response, usage: response.usage, requestId };
  }

  #settle(
    reservationId: string,
    usage: UsageRecord,
    outcome: 'success' | 'failure',
    requestId: string,
    log: RequestLogger,
  ): void {
    const totals = this.#ledger.settle(reservationId, usage, requestId);
    this.#events.emit(EVENT_USAGE_RECORDED, {
      requestId,
      provider: this.#provider.kind,
      model: this.#provider.model,
      timestamp: new Date().toISOString(),
      outcome,
      usage,
      totals,
    });
    this.#checkThresholds(log);
  }

  #checkThresholds(log: RequestLogger): void {
    const utilization = this.#ledger.utilization(this.#limits);
    for (const dimension of [utilization.tokens, utilization.cost, utilization.requests]) {
      if (dimension.limit === null || this.#warnedDimensions.has(dimension.dimension)) continue;

      const utilizationPercent = (dimension.used / dimension.limit) * 100;
      if (utilizationPercent < this.#thresholdPercent) continue;

      this.#warnedDimensions.add(dimension.dimension);
      log.warn(
        { dimension: dimension.dimension, used: dimension.used, limit: dimension.limit },
        `Budget ${dimension.dimension} utilization at ${utilizationPercent.toFixed(1)}%`,
      );
      this.#events.emit(EVENT_BUDGET_WARNING, {
        dimension: dimension.dimension,
        used: dimension.used,
        limit: dimension.limit,
        utilizationPercent,
        thresholdPercent: this.#thresholdPercent,
        timestamp: new Date().toISOString(),
      });
    }
  }

  #track(outcome: Promise<AnalysisResult>, log: RequestLogger): void {
    const tracked: Promise<void> = outcome
      .then(
        () => undefined,
        (error: unknown) => {
          log.error({ err: error }, 'Usage reconciliation failed');
        },
      )
      .finally(() => {
        this.#inFlight.delete(tracked);
      });
    this.#inFlight.add(tracked);
  }

  #raceInterruption(
    outcome: Promise<AnalysisResult>,
    controller: AbortController,
    timeoutMs: number | undefined,
    signal: AbortSignal | undefined,
    requestId: string,
    log: RequestLogger,
  ): Promise<AnalysisResult> {
    const provider = this.#provider.kind;

    return new Promise<AnalysisResult>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const interrupt = (message: string, retryable: boolean, cause: unknown): void => {
        cleanup();
        controller.abort(cause);
        log.warn({ retryable }, `Request interrupted: ${message}; usage will reconcile when the call settles`);
        resolve({
          ok: false,
          error: new ProviderError({ provider, kind: 'cancelled', message, retryable, cause }),
          requestId,
        });
      };

      const onAbort = (): void => {
        interrupt('request was cancelled by the caller', false, signal?.reason);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          interrupt(`request timed out after ${timeoutMs}ms`, true, undefined);
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      void outcome.then(
        (result) => {
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
    });
  }
}
