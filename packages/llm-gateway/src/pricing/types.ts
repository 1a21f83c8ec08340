// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

/** Providers with their own price list. Azure reuses `openai`. */
export const PRICED_PROVIDERS = ['openai', 'anthropic', 'gemini', 'cohere'] as const;
export type PricedProvider = (typeof PRICED_PROVIDERS)[number];

export const ModelPricingSchema = z.object({
  provider: z.enum(PRICED_PROVIDERS),
  /** Provider-specific model identifier (e.g. "gpt-4o", "claude-3-5-haiku-20241022"). */
  modelId: z.string().min(1),
  inputCostPer1kTokens: z.number().finite().nonnegative(),
  outputCostPer1kTokens: z.number().finite().nonnegative(),
});

/** Token-level pricing for one model, in USD per 1,000 tokens. */
export type ModelPricing = Readonly<z.infer<typeof ModelPricingSchema>>;
