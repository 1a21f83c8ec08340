// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ModelPricing } from './types.js';

/**
 * Built-in model pricing, USD per 1,000 tokens.
 *
 * These are best-effort approximations and should be overridden with
 * `ModelPricingRegistry.register()` if precision is required. Azure
 * deployments are priced from the `openai` entries by model name.
 */
export const BUILTIN_PRICING: readonly ModelPricing[] = [
  // --- OpenAI ---
  { provider: 'openai', modelId: 'gpt-4o', inputCostPer1kTokens: 0.0025, outputCostPer1kTokens: 0.01 },
  { provider: 'openai', modelId: 'gpt-4o-mini', inputCostPer1kTokens: 0.00015, outputCostPer1kTokens: 0.0006 },
  { provider: 'openai', modelId: 'gpt-4-turbo', inputCostPer1kTokens: 0.01, outputCostPer1kTokens: 0.03 },
  { provider: 'openai', modelId: 'gpt-3.5-turbo', inputCostPer1kTokens: 0.0005, outputCostPer1kTokens: 0.0015 },
  { provider: 'openai', modelId: 'o1', inputCostPer1kTokens: 0.015, outputCostPer1kTokens: 0.06 },
  { provider: 'openai', modelId: 'o1-mini', inputCostPer1kTokens: 0.003, outputCostPer1kTokens: 0.012 },
  { provider: 'openai', modelId: 'o3-mini', inputCostPer1kTokens: 0.0011, outputCostPer1kTokens: 0.0044 },

  // --- Anthropic ---
  { provider: 'anthropic', modelId: 'claude-3-5-sonnet-20241022', inputCostPer1kTokens: 0.003, outputCostPer1kTokens: 0.015 },
  { provider: 'anthropic', modelId: 'claude-3-5-haiku-20241022', inputCostPer1kTokens: 0.0008, outputCostPer1kTokens: 0.004 },
  { provider: 'anthropic', modelId: 'claude-3-opus-20240229', inputCostPer1kTokens: 0.015, outputCostPer1kTokens: 0.075 },
  { provider: 'anthropic', modelId: 'claude-3-haiku-20240307', inputCostPer1kTokens: 0.00025, outputCostPer1kTokens: 0.00125 },

  // --- Gemini ---
  { provider: 'gemini', modelId: 'gemini-1.5-pro', inputCostPer1kTokens: 0.00125, outputCostPer1kTokens: 0.005 },
  { provider: 'gemini', modelId: 'gemini-1.5-flash', inputCostPer1kTokens: 0.000075, outputCostPer1kTokens: 0.0003 },
  { provider: 'gemini', modelId: 'gemini-2.0-flash', inputCostPer1kTokens: 0.0001, outputCostPer1kTokens: 0.0004 },

  // --- Cohere ---
  { provider: 'cohere', modelId: 'command-r-plus', inputCostPer1kTokens: 0.0025, outputCostPer1kTokens: 0.01 },
  { provider: 'cohere', modelId: 'command-r', inputCostPer1kTokens: 0.00015, outputCostPer1kTokens: 0.0006 },
];
