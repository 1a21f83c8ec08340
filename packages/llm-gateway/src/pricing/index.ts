// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { ModelPricingRegistry } from './registry.js';
export { BUILTIN_PRICING } from './builtin.js';
export { ModelPricingSchema, PRICED_PROVIDERS } from './types.js';
export type { ModelPricing, PricedProvider } from './types.js';
