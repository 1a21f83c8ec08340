// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { UsageLedger } from '@lintai/budget-ledger';
import type { Logger } from 'pino';
import { parseGatewayConfig } from './config.js';
import type { Env } from './config.js';
import type { GatewayEventEmitter } from './events.js';
import { Gateway } from './gateway.js';
import { createLogger } from './logging/logger.js';
import { ModelPricingRegistry } from './pricing/registry.js';
import { createProviderAdapter } from './providers/factory.js';
import type { ProviderFactoryDependencies } from './providers/factory.js';

export interface GatewayFromEnvOptions extends ProviderFactoryDependencies {
  readonly ledger?: UsageLedger;
  readonly events?: GatewayEventEmitter;
  readonly defaultTimeoutMs?: number;
  readonly budgetWarningThresholdPercent?: number;
}

/**
 * Wire configuration, pricing, the provider adapter, ledger and logger from
 * environment variables. Throws ConfigurationError listing every problem
 * before any request can be made.
 *
 * @example
 * ```ts
 * const gateway = createGatewayFromEnv(loadEnvFile('.env'));
 * const result = await gateway.submit({ prompt, estimatedTokens: 2_000 });
 * ```
 */
export function createGatewayFromEnv(
  env: Env = process.env,
  options: GatewayFromEnvOptions = {},
): Gateway {
  const config = parseGatewayConfig(env);
  const logger: Logger = options.logger ?? createLogger({ level: config.logLevel });
  const pricing = options.pricing ?? new ModelPricingRegistry();

  const provider = createProviderAdapter(config.provider, { ...options, logger, pricing });

  logger.info(
    { provider: provider.kind, model: provider.model, limits: config.limits },
    'LLM gateway configured',
  );

  return new Gateway({
    provider,
    limits: config.limits,
    pricing,
    logger,
    ...(options.ledger !== undefined && { ledger: options.ledger }),
    ...(options.events !== undefined && { events: options.events }),
    ...(options.defaultTimeoutMs !== undefined && { defaultTimeoutMs: options.defaultTimeoutMs }),
    ...(options.budgetWarningThresholdPercent !== undefined && {
      budgetWarningThresholdPercent: options.budgetWarningThresholdPercent,
    }),
  });
}
