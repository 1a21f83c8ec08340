// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Cohere adapter over the REST v2 `chat` endpoint.
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { toMessages } from '../types.js';
import type { AnalysisRequest, ProviderResponse } from '../types.js';
import { BaseProviderAdapter } from './base.js';
import { httpFailure } from './classify.js';
import type { AdapterDependencies, FetchLike } from './types.js';

export const COHERE_DEFAULT_ENDPOINT = 'https://api.cohere.com';

const ChatResponseSchema = z.object({
  id: z.string().optional(),
  finish_reason: z.string().optional(),
  message: z
    .object({
      content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
    })
    .optional(),
  usage: z
    .object({
      billed_units: z
        .object({
          input_tokens: z.number().nonnegative().default(0),
          output_tokens: z.number().nonnegative().default(0),
        })
        .optional(),
    })
    .optional(),
});

export interface CohereAdapterOptions extends AdapterDependencies {
  readonly apiKey: string;
  readonly endpointUrl?: string;
  readonly fetch?: FetchLike;
}

export class CohereAdapter extends BaseProviderAdapter {
  readonly kind = 'cohere' as const;
  readonly #apiKey: string;
  readonly #endpoint: string;
  readonly #fetch: FetchLike;

  constructor(model: string, options: CohereAdapterOptions) {
    super(model, options);
    this.#apiKey = options.apiKey;
    this.#endpoint = (options.endpointUrl ?? COHERE_DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.#fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  protected async invoke(
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
  ): Promise<ProviderResponse> {
    const messages = [
      ...(request.system !== undefined ? [{ role: 'system', content: request.system }] : []),
      ...toMessages(request).map((m) => ({ role: m.role, content: m.content })),
    ];

    const response = await this.#fetch(`${this.#endpoint}/v2/chat`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.#apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        stream: false,
        ...(request.maxOutputTokens !== undefined && { max_tokens: request.maxOutputTokens }),
      }),
      ...(signal !== undefined && { signal }),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => 'unknown error');
      throw httpFailure(this.kind, response.status, detail);
    }

    const data = ChatResponseSchema.parse(await response.json());
    // Billed units may be fractional for some SKUs; the ledger counts whole tokens.
    const usage = this.usageFor(
      Math.ceil(data.usage?.billed_units?.input_tokens ?? 0),
      Math.ceil(data.usage?.billed_units?.output_tokens ?? 0),
    );

    const finishReason = data.finish_reason ?? 'unknown';
    if (finishReason === 'ERROR') {
      throw new ProviderError({
        provider: this.kind,
        kind: 'server',
        message: 'generation ended with finish_reason ERROR',
        usage,
      });
    }

    const text = (data.message?.content ?? [])
      .filter((part) => part.type === 'text')
      .map((part) => part.text ?? '')
      .join('');
    return { text, finishReason, usage, raw: data };
  }
}
