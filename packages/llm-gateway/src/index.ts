// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @lintai/llm-gateway: route analysis requests to an LLM provider within a
 * token, cost and request budget.
 *
 * Public API surface:
 *
 * Gateway
 *   Gateway:                budget-checked submit, reconciliation, drain
 *   createGatewayFromEnv:   build a Gateway from environment variables
 *
 * Configuration
 *   parseGatewayConfig, loadEnvFile, DEFAULT_MODELS
 *
 * Providers
 *   createProviderAdapter:  select one adapter from a ProviderConfig
 *   OpenAIAdapter, AzureOpenAIAdapter, AnthropicAdapter, GeminiAdapter,
 *   CohereAdapter, DummyAdapter
 *
 * Pricing
 *   ModelPricingRegistry, BUILTIN_PRICING
 *
 * Events and logging
 *   GatewayEventEmitter, EVENT_* constants, createLogger
 *
 * Errors
 *   GatewayError, ConfigurationError, BudgetExceededError, ProviderError,
 *   UsageReconciliationWarning, InvalidRequestError
 *
 * The ledger and policy live in @lintai/budget-ledger and are re-exported
 * for convenience.
 */

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------
export { Gateway } from './gateway.js';
export type { GatewayOptions, SubmitOptions } from './gateway.js';
export { createGatewayFromEnv } from './from-env.js';
export type { GatewayFromEnvOptions } from './from-env.js';

// ---------------------------------------------------------------------------
// Requests and results
// ---------------------------------------------------------------------------
export { AnalysisRequestSchema, AnalysisMessageSchema, PROVIDER_KINDS, toMessages } from './types.js';
export type {
  AnalysisRequest,
  AnalysisMessage,
  AnalysisResult,
  ProviderResponse,
  ProviderConfig,
  ProviderKind,
} from './types.js';
export { estimatePromptTokens } from './estimate.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------
export { parseGatewayConfig, loadEnvFile, DEFAULT_MODELS } from './config.js';
export type { Env, GatewayConfig } from './config.js';

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------
export * from './providers/index.js';

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------
export * from './pricing/index.js';

// ---------------------------------------------------------------------------
// Events and logging
// ---------------------------------------------------------------------------
export {
  GatewayEventEmitter,
  EVENT_DECISION,
  EVENT_USAGE_RECORDED,
  EVENT_RECONCILIATION_WARNING,
  EVENT_BUDGET_WARNING,
} from './events.js';
export type {
  GatewayEventName,
  GatewayEventListener,
  GatewayEventPayloadMap,
  DecisionEventPayload,
  UsageRecordedEventPayload,
  ReconciliationWarningEventPayload,
  BudgetWarningEventPayload,
} from './events.js';
export { createLogger, createSilentLogger, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LoggingConfig } from './logging/logger.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
export {
  GatewayError,
  ConfigurationError,
  BudgetExceededError,
  ProviderError,
  UsageReconciliationWarning,
  InvalidRequestError,
} from './errors.js';
export type { ProviderErrorKind, ProviderErrorInit } from './errors.js';

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------
export { UsageLedger, checkBudget, describeViolation, LedgerError } from '@lintai/budget-ledger';
export type {
  BudgetLimits,
  BudgetDimension,
  BudgetViolation,
  UsageRecord,
  UsageTotals,
  LedgerUtilization,
} from '@lintai/budget-ledger';
