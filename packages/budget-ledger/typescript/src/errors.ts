// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type LedgerErrorCode =
  | 'INVALID_USAGE'
  | 'INVALID_LIMITS'
  | 'UNKNOWN_RESERVATION'
  | 'RESERVATIONS_OUTSTANDING';

/**
 * Raised for misuse of the ledger API. Budget denials are never errors at
 * this layer; they come back as values from `reserve()` and `checkBudget()`.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
