// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { UsageRecord } from '@lintai/budget-ledger';
import { ProviderError } from '../errors.js';
import type { ProviderErrorKind } from '../errors.js';
import type { ProviderKind } from '../types.js';

/** Map an HTTP status to a failure kind. */
export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limited';
  if (status === 409 || status >= 500) return 'server';
  if (status === 401 || status === 403) return 'authentication';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

/** Build the error for a non-2xx response from a REST provider. */
export function httpFailure(
  provider: ProviderKind,
  status: number,
  detail: string,
  usage?: UsageRecord,
): ProviderError {
  return new ProviderError({
    provider,
    kind: kindForStatus(status),
    message: `HTTP ${status}: ${detail}`,
    status,
    ...(usage !== undefined && { usage }),
  });
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function nameOf(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything a provider call threw into a ProviderError.
 *
 * Works on SDK errors structurally (a numeric `status`, or the SDKs' error
 * class names) so neither SDK's error classes need to be imported here.
 * When `signal` has been aborted the failure is reported as `cancelled`
 * whatever the underlying client threw.
 */
export function classifyFailure(
  provider: ProviderKind,
  error: unknown,
  signal?: AbortSignal,
): ProviderError {
  if (error instanceof ProviderError) return error;

  if (signal?.aborted === true) {
    return new ProviderError({ provider, kind: 'cancelled', message: 'request was cancelled', cause: error });
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return new ProviderError({
      provider,
      kind: kindForStatus(status),
      message: messageOf(error),
      status,
      cause: error,
    });
  }

  const name = nameOf(error);
  let kind: ProviderErrorKind = 'unknown';
  if (name === 'AbortError' || name === 'APIUserAbortError') {
    kind = 'cancelled';
  } else if (name.includes('Timeout')) {
    kind = 'timeout';
  } else if (name === 'APIConnectionError' || error instanceof TypeError) {
    // fetch rejects with a TypeError on DNS, TLS and socket failures.
    kind = 'network';
  }
  return new ProviderError({ provider, kind, message: messageOf(error), cause: error });
}
