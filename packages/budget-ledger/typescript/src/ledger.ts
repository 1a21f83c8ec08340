// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import {
  UsageLedgerConfigSchema,
  type BudgetLimits,
  type LedgerUtilization,
  type Reservation,
  type ReserveResult,
  type UsageEntry,
  type UsageFilter,
  type UsageLedgerConfig,
  type UsageRecord,
  type UsageTotals,
} from './types.js';
import {
  accumulate,
  createUsageRecord,
  emptyAccumulator,
  toTotals,
  type Accumulator,
} from './usage.js';
import { checkBudget } from './policy.js';
import { buildEntry, filterHistory } from './history.js';
import { buildUtilization } from './query.js';
import { LedgerError } from './errors.js';

/**
 * UsageLedger holds recorded usage and outstanding reservations.
 *
 * Design contract:
 *  - Every mutating method is synchronous. On a single JavaScript thread a
 *    synchronous method cannot interleave with another caller, so each one
 *    is its own critical section. Never add an `await` inside these methods.
 *  - `record()` and `settle()` only ever add. Recorded totals never decrease
 *    until an explicit `reset()`.
 *  - `reserve()` is check-and-act in one step: policy runs against
 *    exposure (recorded + reserved) and the estimate is held on success.
 *  - `settle()` confirms a reservation with actual usage; `release()` rolls
 *    it back. Exactly one of the two should be called per reservation.
 *
 * The ledger holds no limits of its own; callers pass the BudgetLimits to
 * `reserve()` so one ledger can be shared by gateways with different caps.
 */
export class UsageLedger {
  readonly #config: { readonly maxHistoryEntries: number };

  readonly #recorded: Accumulator = emptyAccumulator();
  readonly #reserved: Accumulator = emptyAccumulator();
  readonly #reservations = new Map<string, Reservation>();
  readonly #history: UsageEntry[] = [];

  constructor(config: UsageLedgerConfig = {}) {
    this.#config = UsageLedgerConfigSchema.parse(config);
  }

  // ─── Reads ────────────────────────────────────────────────────────────────

  /** Recorded totals as of this call. Reservations are not included. */
  snapshot(): UsageTotals {
    return toTotals(this.#recorded);
  }

  /** Recorded totals plus every outstanding reservation. */
  exposure(): UsageTotals {
    return toTotals(this.#recorded, this.#reserved);
  }

  /** Per-dimension used / reserved / remaining against `limits`. */
  utilization(limits: BudgetLimits): LedgerUtilization {
    return buildUtilization(this.snapshot(), toTotals(this.#reserved), limits);
  }

  pendingReservations(): readonly Reservation[] {
    return Array.from(this.#reservations.values());
  }

  /**
   * Recorded usage entries, oldest first. All filter fields are AND-ed.
   * History is capped; totals always reflect every record ever made.
   */
  history(filter?: UsageFilter): readonly UsageEntry[] {
    return filterHistory(this.#history, filter);
  }

  // ─── Record ───────────────────────────────────────────────────────────────

  /**
   * Add actual usage to the running totals and return the updated totals.
   * Accepts partial input; missing fields count as zero.
   */
  record(actual: Partial<UsageRecord>, description?: string): UsageTotals {
    const usage = createUsageRecord(actual);
    this.#apply(usage, description, undefined);
    return this.snapshot();
  }

  // ─── Reserve / Settle / Release ───────────────────────────────────────────

  /**
   * Atomically check `estimate` against `limits` and, if it fits, hold it.
   *
   * A denied reservation leaves the ledger exactly as it was.
   */
  reserve(
    estimate: Partial<UsageRecord>,
    limits: BudgetLimits = {},
    description?: string,
  ): ReserveResult {
    const usage = createUsageRecord(estimate);
    const decision = checkBudget(this.exposure(), usage, limits);

    if (!decision.allowed) {
      return { granted: false, denial: decision, exposure: this.exposure() };
    }

    const reservation: Reservation = {
      id: randomUUID(),
      estimate: usage,
      createdAt: new Date(),
      ...(description !== undefined && { description }),
    };
    this.#reservations.set(reservation.id, reservation);
    accumulate(this.#reserved, usage);

    return { granted: true, reservationId: reservation.id, exposure: this.exposure() };
  }

  /**
   * Confirm a reservation: drop the provisional estimate and record the
   * actual usage in its place. The actual may be larger or smaller than the
   * estimate.
   *
   * Throws LedgerError('UNKNOWN_RESERVATION') if the id is not outstanding,
   * and LedgerError('INVALID_USAGE') without consuming the reservation if
   * `actual` is invalid.
   */
  settle(reservationId: string, actual: Partial<UsageRecord>, description?: string): UsageTotals {
    // Invalid usage throws before the reservation is touched, so it stays outstanding.
    const usage = createUsageRecord(actual);
    const reservation = this.#takeReservation(reservationId);
    if (reservation === undefined) {
      throw new LedgerError(
        'UNKNOWN_RESERVATION',
        `No outstanding reservation "${reservationId}". It was already settled or released.`,
      );
    }
    this.#apply(usage, description ?? reservation.description, reservation.id);
    return this.snapshot();
  }

  /**
   * Roll a reservation back without recording anything.
   * Returns false if the id was not outstanding.
   */
  release(reservationId: string): boolean {
    return this.#takeReservation(reservationId) !== undefined;
  }

  // ─── Operator actions ─────────────────────────────────────────────────────

  /**
   * Zero all totals and history. This is the only way totals go down.
   * Refused while reservations are outstanding, since settling them later
   * would record usage from before the reset.
   */
  reset(): void {
    if (this.#reservations.size > 0) {
      throw new LedgerError(
        'RESERVATIONS_OUTSTANDING',
        `Cannot reset ledger with ${this.#reservations.size} outstanding reservation(s).`,
      );
    }
    Object.assign(this.#recorded, emptyAccumulator());
    Object.assign(this.#reserved, emptyAccumulator());
    this.#history.length = 0;
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  #takeReservation(reservationId: string): Reservation | undefined {
    const reservation = this.#reservations.get(reservationId);
    if (reservation === undefined) return undefined;
    this.#reservations.delete(reservationId);
    accumulate(this.#reserved, reservation.estimate, -1);
    return reservation;
  }

  #apply(usage: UsageRecord, description: string | undefined, reservationId: string | undefined): void {
    accumulate(this.#recorded, usage);
    if (this.#history.length >= this.#config.maxHistoryEntries) {
      this.#history.shift();
    }
    this.#history.push(buildEntry({ usage, description, reservationId }));
  }
}
