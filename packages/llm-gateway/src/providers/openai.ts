// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * OpenAI and Azure OpenAI adapters (chat completions).
 *
 * The adapters accept the client through a structural interface so tests can
 * pass a fake. The `OpenAI` and `AzureOpenAI` classes from the `openai`
 * package satisfy it; `createProviderAdapter()` constructs them.
 */

import { ProviderError } from '../errors.js';
import { toMessages } from '../types.js';
import type { AnalysisRequest, ProviderResponse } from '../types.js';
import { BaseProviderAdapter } from './base.js';
import type { AdapterDependencies } from './types.js';

// ---------------------------------------------------------------------------
// Structural interfaces
// ---------------------------------------------------------------------------

export type OpenAIChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface OpenAIChatParams {
  model: string;
  messages: OpenAIChatMessage[];
  max_tokens?: number;
}

export interface OpenAIChatCompletion {
  readonly id: string;
  readonly choices: ReadonlyArray<{
    readonly message: { readonly content: string | null };
    readonly finish_reason: string | null;
  }>;
  readonly usage?: { readonly prompt_tokens: number; readonly completion_tokens: number } | null;
}

export interface OpenAIClientLike {
  readonly chat: {
    readonly completions: {
      create(params: OpenAIChatParams, options?: { signal?: AbortSignal }): Promise<OpenAIChatCompletion>;
    };
  };
}

// ---------------------------------------------------------------------------
// Adapters
// ---------------------------------------------------------------------------

export class OpenAIAdapter extends BaseProviderAdapter {
  readonly kind: 'openai' | 'azure' = 'openai';
  readonly #client: OpenAIClientLike;

  constructor(client: OpenAIClientLike, model: string, deps?: AdapterDependencies) {
    super(model, deps);
    this.#client = client;
  }

  protected async invoke(
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
  ): Promise<ProviderResponse> {
    const messages: OpenAIChatMessage[] = [];
    if (request.system !== undefined) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const message of toMessages(request)) {
      messages.push(
        message.role === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content },
      );
    }

    const completion = await this.#client.chat.completions.create(
      {
        model: this.model,
        messages,
        ...(request.maxOutputTokens !== undefined && { max_tokens: request.maxOutputTokens }),
      },
      signal !== undefined ? { signal } : {},
    );

    if (completion.usage === undefined || completion.usage === null) {
      this.logger.warn({ provider: this.kind, model: this.model }, 'Completion carried no usage block');
    }
    const usage = this.usageFor(
      completion.usage?.prompt_tokens ?? 0,
      completion.usage?.completion_tokens ?? 0,
    );

    const choice = completion.choices[0];
    const finishReason = choice?.finish_reason ?? 'unknown';
    if (finishReason === 'content_filter') {
      throw new ProviderError({
        provider: this.kind,
        kind: 'content_filtered',
        message: 'completion was stopped by the content filter',
        usage,
      });
    }

    return {
      text: choice?.message.content ?? '',
      finishReason,
      usage,
      raw: completion,
    };
  }
}

/**
 * Azure OpenAI. `model` is the deployment name; pricing is looked up under
 * OpenAI's model names, so name deployments after their model or register
 * a price for the deployment name.
 */
export class AzureOpenAIAdapter extends OpenAIAdapter {
  override readonly kind = 'azure' as const;
}
