// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Anthropic adapter (messages API).
 *
 * Accepts the client through a structural interface; the `Anthropic` class
 * from `@anthropic-ai/sdk` satisfies it.
 */

import { ProviderError } from '../errors.js';
import { toMessages } from '../types.js';
import type { AnalysisRequest, ProviderResponse } from '../types.js';
import { BaseProviderAdapter } from './base.js';
import type { AdapterDependencies } from './types.js';

/** The messages API requires an explicit output cap. */
export const DEFAULT_MAX_OUTPUT_TOKENS = 1024;

// ---------------------------------------------------------------------------
// Structural interfaces
// ---------------------------------------------------------------------------

export interface AnthropicMessageParams {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
}

export interface AnthropicMessage {
  readonly id: string;
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
  readonly stop_reason: string | null;
  readonly usage: { readonly input_tokens: number; readonly output_tokens: number };
}

export interface AnthropicClientLike {
  readonly messages: {
    create(params: AnthropicMessageParams, options?: { signal?: AbortSignal }): Promise<AnthropicMessage>;
  };
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class AnthropicAdapter extends BaseProviderAdapter {
  readonly kind = 'anthropic' as const;
  readonly #client: AnthropicClientLike;

  constructor(client: AnthropicClientLike, model: string, deps?: AdapterDependencies) {
    super(model, deps);
    this.#client = client;
  }

  protected async invoke(
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
  ): Promise<ProviderResponse> {
    const message = await this.#client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        ...(request.system !== undefined && { system: request.system }),
        messages: toMessages(request).map((m) => ({ role: m.role, content: m.content })),
      },
      signal !== undefined ? { signal } : {},
    );

    const usage = this.usageFor(message.usage.input_tokens, message.usage.output_tokens);
    const finishReason = message.stop_reason ?? 'unknown';

    if (finishReason === 'refusal') {
      throw new ProviderError({
        provider: this.kind,
        kind: 'content_filtered',
        message: 'model declined to respond',
        usage,
      });
    }

    const text = message.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    return { text, finishReason, usage, raw: message };
  }
}
