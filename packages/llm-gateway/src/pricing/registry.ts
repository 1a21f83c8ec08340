// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Model Pricing Registry
 *
 * `ModelPricingRegistry` maintains a lookup table of per-model pricing,
 * pre-seeded with built-in defaults. Pricing data is static and must be
 * updated manually when providers change their rates.
 */

import type { ProviderKind } from '../types.js';
import { BUILTIN_PRICING } from './builtin.js';
import { ModelPricingSchema } from './types.js';
import type { ModelPricing, PricedProvider } from './types.js';
import { ConfigurationError } from '../errors.js';

function registryKey(provider: PricedProvider, modelId: string): string {
  return `${provider}::${modelId}`;
}

/** Azure deployments are billed at OpenAI's rates; dummy is never billed. */
function priceListFor(provider: ProviderKind): PricedProvider | undefined {
  switch (provider) {
    case 'azure':
      return 'openai';
    case 'dummy':
      return undefined;
    default:
      return provider;
  }
}

/**
 * Registry for model pricing data.
 *
 * Lookups match the exact model id first and then the longest registered id
 * that prefixes it at a `-` boundary, so `gpt-4o-2024-08-06` is priced as
 * `gpt-4o`.
 *
 * @example
 * ```ts
 * const registry = new ModelPricingRegistry();
 * registry.register({
 *   provider: 'openai',
 *   modelId: 'ft:gpt-4o-mini:lint-rules',
 *   inputCostPer1kTokens: 0.0003,
 *   outputCostPer1kTokens: 0.0012,
 * });
 * ```
 */
export class ModelPricingRegistry {
  readonly #entries = new Map<string, ModelPricing>();

  constructor(pricing: readonly ModelPricing[] = BUILTIN_PRICING) {
    this.registerAll(pricing);
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Registers or replaces pricing for a model.
   * Throws ConfigurationError when the record is malformed.
   */
  register(pricing: ModelPricing): void {
    const result = ModelPricingSchema.safeParse(pricing);
    if (!result.success) {
      throw new ConfigurationError(
        result.error.issues.map((issue) => `pricing.${issue.path.join('.')}: ${issue.message}`),
      );
    }
    this.#entries.set(registryKey(result.data.provider, result.data.modelId), result.data);
  }

  registerAll(pricingList: readonly ModelPricing[]): void {
    for (const pricing of pricingList) {
      this.register(pricing);
    }
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  /** Returns `undefined` when no pricing applies to the provider + model. */
  lookup(provider: ProviderKind, modelId: string): ModelPricing | undefined {
    const list = priceListFor(provider);
    if (list === undefined) return undefined;

    const exact = this.#entries.get(registryKey(list, modelId));
    if (exact !== undefined) return exact;

    let best: ModelPricing | undefined;
    for (const entry of this.#entries.values()) {
      if (entry.provider !== list || !modelId.startsWith(`${entry.modelId}-`)) continue;
      if (best === undefined || entry.modelId.length > best.modelId.length) {
        best = entry;
      }
    }
    return best;
  }

  has(provider: ProviderKind, modelId: string): boolean {
    return this.lookup(provider, modelId) !== undefined;
  }

  listAll(): readonly ModelPricing[] {
    return Array.from(this.#entries.values());
  }

  // ---------------------------------------------------------------------------
  // Cost computation
  // ---------------------------------------------------------------------------

  /**
   * USD cost of a completed call. Returns `undefined` when the model has no
   * registered pricing.
   */
  computeCost(
    provider: ProviderKind,
    modelId: string,
    inputTokens: number,
    outputTokens: number,
  ): number | undefined {
    const pricing = this.lookup(provider, modelId);
    if (pricing === undefined) return undefined;
    return (
      (inputTokens / 1000) * pricing.inputCostPer1kTokens +
      (outputTokens / 1000) * pricing.outputCostPer1kTokens
    );
  }

  /**
   * Upper-bound USD cost for `tokens` whose split between input and output
   * is not yet known: every token is priced at the higher of the two rates.
   */
  estimateCost(provider: ProviderKind, modelId: string, tokens: number): number | undefined {
    const pricing = this.lookup(provider, modelId);
    if (pricing === undefined) return undefined;
    return (tokens / 1000) * Math.max(pricing.inputCostPer1kTokens, pricing.outputCostPer1kTokens);
  }
}
