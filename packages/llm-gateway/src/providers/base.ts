// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { createUsageRecord } from '@lintai/budget-ledger';
import type { UsageRecord } from '@lintai/budget-ledger';
import type { Logger } from 'pino';
import { ModelPricingRegistry } from '../pricing/registry.js';
import { createSilentLogger } from '../logging/logger.js';
import type { AnalysisRequest, ProviderKind, ProviderResponse } from '../types.js';
import { classifyFailure } from './classify.js';
import type { AdapterDependencies, ProviderAdapter, ProviderCallOptions } from './types.js';

/**
 * Shared plumbing for billable adapters: pricing lookups and failure
 * normalization. Subclasses implement `invoke()` against their vendor API
 * and throw whatever their client throws.
 */
export abstract class BaseProviderAdapter implements ProviderAdapter {
  abstract readonly kind: ProviderKind;
  readonly model: string;
  readonly billable: boolean = true;

  protected readonly logger: Logger;
  readonly #pricing: ModelPricingRegistry;
  #warnedUnpriced = false;

  constructor(model: string, deps: AdapterDependencies = {}) {
    this.model = model;
    this.#pricing = deps.pricing ?? new ModelPricingRegistry();
    this.logger = deps.logger ?? createSilentLogger();
  }

  async call(request: AnalysisRequest, options: ProviderCallOptions = {}): Promise<ProviderResponse> {
    try {
      return await this.invoke(request, options.signal);
    } catch (error) {
      throw classifyFailure(this.kind, error, options.signal);
    }
  }

  protected abstract invoke(
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
  ): Promise<ProviderResponse>;

  /** Usage for one call; cost is zero when the model has no registered price. */
  protected usageFor(inputTokens: number, outputTokens: number): UsageRecord {
    let costUsd = this.#pricing.computeCost(this.kind, this.model, inputTokens, outputTokens);
    if (costUsd === undefined) {
      if (!this.#warnedUnpriced) {
        this.#warnedUnpriced = true;
        this.logger.warn(
          { provider: this.kind, model: this.model },
          'No pricing registered for model; recording cost as 0',
        );
      }
      costUsd = 0;
    }
    return createUsageRecord({
      promptTokens: inputTokens,
      completionTokens: outputTokens,
      costUsd,
      requestCount: 1,
    });
  }
}
