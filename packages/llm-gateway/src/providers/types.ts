// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Logger } from 'pino';
import type { ModelPricingRegistry } from '../pricing/registry.js';
import type { AnalysisRequest, ProviderKind, ProviderResponse } from '../types.js';

export interface ProviderCallOptions {
  /** Aborts the in-flight HTTP request. */
  readonly signal?: AbortSignal;
}

/**
 * Translates a normalized AnalysisRequest into one vendor API call.
 *
 * `call()` resolves with the response and its billed usage, or rejects with
 * a ProviderError. It never retries.
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  readonly model: string;
  /** False when calls cost nothing and use no tokens (the dummy backend). */
  readonly billable: boolean;
  call(request: AnalysisRequest, options?: ProviderCallOptions): Promise<ProviderResponse>;
}

/** The subset of `fetch` the REST adapters use. The global `fetch` satisfies it. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AdapterDependencies {
  readonly pricing?: ModelPricingRegistry;
  readonly logger?: Logger;
}
