// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Gateway Event Emitter
 *
 * `GatewayEventEmitter` provides a typed publish-subscribe bus for request
 * lifecycle events. Listeners run synchronously inside `Gateway.submit()`,
 * so keep them short.
 *
 * Supported events (see EVENT_* constants below):
 *   - gateway:decision:                after every budget check, allowed or denied
 *   - gateway:usage:recorded:          after usage is settled into the ledger
 *   - gateway:reconciliation:warning:  when a reservation is released with usage unknown
 *   - gateway:budget:warning:          once per dimension, when utilization crosses the threshold
 *
 * Usage:
 * ```ts
 * gateway.events.on(EVENT_BUDGET_WARNING, (payload) => {
 *   console.log(`${payload.dimension} at ${payload.utilizationPercent.toFixed(0)}%`);
 * });
 * ```
 */

import type {
  BudgetDimension,
  BudgetViolation,
  UsageRecord,
  UsageTotals,
} from '@lintai/budget-ledger';
import type { ProviderKind } from './types.js';
import type { UsageReconciliationWarning } from './errors.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

export const EVENT_DECISION = 'gateway:decision' as const;
export const EVENT_USAGE_RECORDED = 'gateway:usage:recorded' as const;
export const EVENT_RECONCILIATION_WARNING = 'gateway:reconciliation:warning' as const;
export const EVENT_BUDGET_WARNING = 'gateway:budget:warning' as const;

export type GatewayEventName =
  | typeof EVENT_DECISION
  | typeof EVENT_USAGE_RECORDED
  | typeof EVENT_RECONCILIATION_WARNING
  | typeof EVENT_BUDGET_WARNING;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

interface RequestScope {
  readonly requestId: string;
  readonly provider: ProviderKind;
  readonly model: string;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}

export interface DecisionEventPayload extends RequestScope {
  readonly allowed: boolean;
  /** The usage the request was checked with. */
  readonly estimate: UsageRecord;
  /** Present when `allowed` is false. */
  readonly violations?: readonly BudgetViolation[];
}

export interface UsageRecordedEventPayload extends RequestScope {
  readonly outcome: 'success' | 'failure';
  readonly usage: UsageRecord;
  /** Ledger totals after recording. */
  readonly totals: UsageTotals;
}

export interface ReconciliationWarningEventPayload extends RequestScope {
  readonly warning: UsageReconciliationWarning;
}

export interface BudgetWarningEventPayload {
  readonly dimension: BudgetDimension;
  readonly used: number;
  readonly limit: number;
  readonly utilizationPercent: number;
  readonly thresholdPercent: number;
  readonly timestamp: string;
}

/**
 * Maps each event name to its corresponding payload interface.
 *
 * Used to drive the generic overloads on `on()`, `off()`, and `emit()`.
 */
export interface GatewayEventPayloadMap {
  [EVENT_DECISION]: DecisionEventPayload;
  [EVENT_USAGE_RECORDED]: UsageRecordedEventPayload;
  [EVENT_RECONCILIATION_WARNING]: ReconciliationWarningEventPayload;
  [EVENT_BUDGET_WARNING]: BudgetWarningEventPayload;
}

export type GatewayEventListener<E extends GatewayEventName> = (
  payload: GatewayEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// GatewayEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe event emitter. Supports multiple listeners per
 * event, ordered registration, and once-only listeners. All operations are
 * synchronous.
 */
export class GatewayEventEmitter {
  readonly #listeners: Map<
    GatewayEventName,
    Array<{ listener: (payload: unknown) => void; once: boolean }>
  > = new Map();

  /** Registers a persistent listener. Returns `this` for chaining. */
  on<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, false);
    return this;
  }

  /** Registers a listener that is removed after its first invocation. */
  once<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, true);
    return this;
  }

  /**
   * Removes a previously registered listener. If it was registered more
   * than once, only the first matching entry is removed.
   */
  off<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex(
      (entry) => entry.listener === (listener as (payload: unknown) => void),
    );
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invokes all listeners for `event` in registration order.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends GatewayEventName>(event: E, payload: GatewayEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];

    // Drop once-listeners before invoking them so a re-entrant emit cannot double-fire.
    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    for (const { listener } of snapshot) {
      listener(payload);
    }

    return true;
  }

  removeAllListeners(event?: GatewayEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  listenerCount(event: GatewayEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  #addListener(
    event: GatewayEventName,
    listener: (payload: unknown) => void,
    once: boolean,
  ): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
