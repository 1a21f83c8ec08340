// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { UsageRecord } from '@lintai/budget-ledger';
import type { BudgetExceededError, ProviderError } from './errors.js';

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export const PROVIDER_KINDS = ['openai', 'azure', 'anthropic', 'gemini', 'cohere', 'dummy'] as const;

/** The closed set of supported LLM backends. */
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

/** One active provider configuration per Gateway. */
export interface ProviderConfig {
  readonly kind: ProviderKind;
  /** Absent only for `dummy`. Never logged. */
  readonly apiKey: string | undefined;
  /** Model name, or the deployment name for Azure. */
  readonly modelName: string;
  readonly endpointUrl: string | undefined;
  readonly apiVersion: string | undefined;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const AnalysisMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type AnalysisMessage = z.infer<typeof AnalysisMessageSchema>;

export const AnalysisRequestSchema = z.object({
  /** A single user prompt, or a conversation ending in a user turn. */
  prompt: z.union([z.string(), z.array(AnalysisMessageSchema).min(1)]),
  system: z.string().optional(),
  /** Caller's upper-bound estimate of total tokens for this call. */
  estimatedTokens: z.number().int().nonnegative(),
  maxOutputTokens: z.number().int().positive().optional(),
  /** Opaque caller data, echoed into log lines. */
  metadata: z.record(z.string(), z.string()).optional(),
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export interface ProviderResponse {
  readonly text: string;
  /** Provider's finish / stop reason, unnormalized. */
  readonly finishReason: string;
  readonly usage: UsageRecord;
  /** The provider's response body, for callers that need more than text. */
  readonly raw: unknown;
}

export type AnalysisResult =
  | {
      readonly ok: true;
      readonly response: ProviderResponse;
      readonly usage: UsageRecord;
      readonly requestId: string;
    }
  | {
      readonly ok: false;
      readonly error: BudgetExceededError | ProviderError;
      readonly requestId: string;
    };

/** Flatten a request's prompt into an ordered message list. */
export function toMessages(request: AnalysisRequest): readonly AnalysisMessage[] {
  return typeof request.prompt === 'string'
    ? [{ role: 'user', content: request.prompt }]
    : request.prompt;
}
