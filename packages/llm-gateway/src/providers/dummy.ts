// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { createUsageRecord } from '@lintai/budget-ledger';
import type { AnalysisRequest, ProviderResponse } from '../types.js';
import type { ProviderAdapter, ProviderCallOptions } from './types.js';
import { classifyFailure } from './classify.js';

export const DUMMY_RESPONSE_TEXT = 'No analysis performed: the dummy provider is configured.';

/**
 * No-op backend for dry runs and CI. Returns a canned response, uses no
 * tokens and costs nothing, but still counts as one request.
 */
export class DummyAdapter implements ProviderAdapter {
  readonly kind = 'dummy' as const;
  readonly model: string;
  readonly billable = false;
  readonly #text: string;

  constructor(model = 'dummy', text: string = DUMMY_RESPONSE_TEXT) {
    this.model = model;
    this.#text = text;
  }

  async call(_request: AnalysisRequest, options: ProviderCallOptions = {}): Promise<ProviderResponse> {
    if (options.signal?.aborted === true) {
      throw classifyFailure(this.kind, options.signal.reason, options.signal);
    }
    return {
      text: this.#text,
      finishReason: 'stop',
      usage: createUsageRecord({ requestCount: 1 }),
      raw: null,
    };
  }
}
