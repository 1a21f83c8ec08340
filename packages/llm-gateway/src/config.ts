// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { BudgetLimits } from '@lintai/budget-ledger';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logging/logger.js';
import type { LogLevel } from './logging/logger.js';
import { PROVIDER_KINDS } from './types.js';
import type { ProviderConfig, ProviderKind } from './types.js';

/** An environment-shaped map: `process.env` or the result of `loadEnvFile()`. */
export type Env = Readonly<Record<string, string | undefined>>;

export interface GatewayConfig {
  readonly provider: ProviderConfig;
  readonly limits: BudgetLimits;
  readonly logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// Key tables
// ---------------------------------------------------------------------------

/**
 * Provider-specific keys consulted after the generic `LLM_*` key. The first
 * non-empty value wins.
 */
const FALLBACK_KEYS: Readonly<
  Record<ProviderKind, { apiKey: readonly string[]; model: readonly string[]; endpoint: readonly string[] }>
> = {
  openai: { apiKey: ['OPENAI_API_KEY'], model: ['OPENAI_MODEL'], endpoint: ['OPENAI_ENDPOINT'] },
  azure: {
    apiKey: ['AZURE_OPENAI_API_KEY'],
    model: ['AZURE_OPENAI_DEPLOYMENT', 'OPENAI_MODEL'],
    endpoint: ['AZURE_OPENAI_ENDPOINT'],
  },
  anthropic: { apiKey: ['ANTHROPIC_API_KEY'], model: ['ANTHROPIC_MODEL'], endpoint: ['ANTHROPIC_ENDPOINT'] },
  gemini: {
    apiKey: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
    model: ['GEMINI_MODEL'],
    endpoint: ['GEMINI_ENDPOINT'],
  },
  cohere: { apiKey: ['COHERE_API_KEY'], model: ['COHERE_MODEL'], endpoint: ['COHERE_ENDPOINT'] },
  dummy: { apiKey: [], model: [], endpoint: [] },
};

const API_VERSION_FALLBACK_KEYS = ['AZURE_OPENAI_API_VERSION', 'OPENAI_API_VERSION'] as const;

export const DEFAULT_MODELS: Readonly<Record<ProviderKind, string | undefined>> = {
  openai: 'gpt-4o-mini',
  azure: undefined,
  anthropic: 'claude-3-5-haiku-20241022',
  gemini: 'gemini-1.5-flash',
  cohere: 'command-r',
  dummy: 'dummy',
};

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Empty strings in an env file mean "unset". */
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
}

function firstPresent(env: Env, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = present(env[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Zod schema over the resolved keys. Issue paths are the canonical env key
 * names so messages point at what the operator has to fix.
 */
const ResolvedEnvSchema = z.object({
  LINTAI_LLM_PROVIDER: z.enum(PROVIDER_KINDS, {
    errorMap: (issue) => ({
      message:
        issue.code === 'invalid_type'
          ? 'is required'
          : `must be one of ${PROVIDER_KINDS.join(', ')}`,
    }),
  }),
  LLM_API_KEY: z.string().regex(/^\S+$/, 'must not contain whitespace').optional(),
  LLM_MODEL_NAME: z.string().optional(),
  LLM_ENDPOINT_URL: z.string().url('must be a URL').optional(),
  LLM_API_VERSION: z.string().optional(),
  LINTAI_MAX_LLM_TOKENS: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .positive('must be positive')
    .max(Number.MAX_SAFE_INTEGER)
    .optional(),
  LINTAI_MAX_LLM_COST_USD: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .finite('must be finite')
    .positive('must be positive')
    .optional(),
  LINTAI_MAX_LLM_REQUESTS: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .positive('must be positive')
    .max(Number.MAX_SAFE_INTEGER)
    .optional(),
  LINTAI_LOG_LEVEL: z
    .enum(LOG_LEVELS, {
      errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(', ')}` }),
    })
    .default('info'),
});

interface ResolvedKeys {
  readonly LLM_API_KEY: string | undefined;
  readonly LLM_MODEL_NAME: string | undefined;
  readonly LLM_ENDPOINT_URL: string | undefined;
  readonly LLM_API_VERSION: string | undefined;
}

/** Per-provider required keys, checked alongside the schema so all issues surface together. */
function requirementIssues(kind: ProviderKind, keys: ResolvedKeys): string[] {
  const issues: string[] = [];
  if (kind !== 'dummy' && keys.LLM_API_KEY === undefined) {
    const names = ['LLM_API_KEY', ...FALLBACK_KEYS[kind].apiKey].join(' or ');
    issues.push(`LLM_API_KEY: is required for provider "${kind}" (set ${names})`);
  }
  if (kind === 'azure') {
    if (keys.LLM_ENDPOINT_URL === undefined) {
      const names = ['LLM_ENDPOINT_URL', ...FALLBACK_KEYS.azure.endpoint].join(' or ');
      issues.push(`LLM_ENDPOINT_URL: is required for provider "azure" (set ${names})`);
    }
    if (keys.LLM_API_VERSION === undefined) {
      issues.push(
        `LLM_API_VERSION: is required for provider "azure" (set LLM_API_VERSION or ${API_VERSION_FALLBACK_KEYS.join(' or ')})`,
      );
    }
    if (keys.LLM_MODEL_NAME === undefined) {
      const names = ['LLM_MODEL_NAME', ...FALLBACK_KEYS.azure.model].join(' or ');
      issues.push(`LLM_MODEL_NAME: is required for provider "azure" (set ${names})`);
    }
  }
  return issues;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Read provider and budget configuration from environment-style keys.
 *
 * Every problem is collected and reported in one ConfigurationError, so an
 * operator fixes the whole file in one pass. Credentials never appear in
 * the error.
 */
export function parseGatewayConfig(env: Env = process.env): GatewayConfig {
  const rawKind = present(env['LINTAI_LLM_PROVIDER'])?.toLowerCase();
  const kind = PROVIDER_KINDS.find((k) => k === rawKind);
  const fallbacks = kind !== undefined ? FALLBACK_KEYS[kind] : undefined;

  const resolved = {
    LINTAI_LLM_PROVIDER: rawKind,
    LLM_API_KEY: firstPresent(env, ['LLM_API_KEY', ...(fallbacks?.apiKey ?? [])]),
    LLM_MODEL_NAME: firstPresent(env, ['LLM_MODEL_NAME', ...(fallbacks?.model ?? [])]),
    LLM_ENDPOINT_URL: firstPresent(env, ['LLM_ENDPOINT_URL', ...(fallbacks?.endpoint ?? [])]),
    LLM_API_VERSION: firstPresent(env, ['LLM_API_VERSION', ...API_VERSION_FALLBACK_KEYS]),
    LINTAI_MAX_LLM_TOKENS: present(env['LINTAI_MAX_LLM_TOKENS']),
    LINTAI_MAX_LLM_COST_USD: present(env['LINTAI_MAX_LLM_COST_USD']),
    LINTAI_MAX_LLM_REQUESTS: present(env['LINTAI_MAX_LLM_REQUESTS']),
    LINTAI_LOG_LEVEL: present(env['LINTAI_LOG_LEVEL'])?.toLowerCase(),
  };

  const result = ResolvedEnvSchema.safeParse(resolved);
  const issues = result.success
    ? []
    : result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (kind !== undefined) {
    issues.push(...requirementIssues(kind, resolved));
  }
  if (!result.success || issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const data = result.data;
  const provider = data.LINTAI_LLM_PROVIDER;
  const modelName = data.LLM_MODEL_NAME ?? DEFAULT_MODELS[provider];
  if (modelName === undefined) {
    // Only azure lacks a default, and the schema already requires it there.
    throw new ConfigurationError([`LLM_MODEL_NAME: is required for provider "${provider}"`]);
  }

  return {
    provider: {
      kind: provider,
      apiKey: provider === 'dummy' ? undefined : data.LLM_API_KEY,
      modelName,
      endpointUrl: data.LLM_ENDPOINT_URL,
      apiVersion: data.LLM_API_VERSION,
    },
    limits: Object.freeze({
      ...(data.LINTAI_MAX_LLM_TOKENS !== undefined && { maxTokens: data.LINTAI_MAX_LLM_TOKENS }),
      ...(data.LINTAI_MAX_LLM_COST_USD !== undefined && { maxCostUsd: data.LINTAI_MAX_LLM_COST_USD }),
      ...(data.LINTAI_MAX_LLM_REQUESTS !== undefined && { maxRequests: data.LINTAI_MAX_LLM_REQUESTS }),
    }),
    logLevel: data.LINTAI_LOG_LEVEL,
  };
}

/**
 * Read a dotenv-format file and merge it under `base`: keys already set in
 * `base` win over the file. Neither input is mutated.
 *
 * Throws ConfigurationError when the file cannot be read.
 */
export function loadEnvFile(path: string, base: Env = process.env): Env {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`envFile: cannot read "${path}": ${reason}`]);
  }
  const parsed = dotenv.parse(contents);
  const merged: Record<string, string | undefined> = { ...parsed };
  for (const [key, value] of Object.entries(base)) {
    if (present(value) !== undefined || !(key in merged)) {
      merged[key] = value;
    }
  }
  return merged;
}
