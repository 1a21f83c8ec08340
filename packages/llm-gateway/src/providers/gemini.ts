// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Gemini adapter over the REST `generateContent` endpoint.
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { toMessages } from '../types.js';
import type { AnalysisRequest, ProviderResponse } from '../types.js';
import { BaseProviderAdapter } from './base.js';
import { httpFailure } from './classify.js';
import type { AdapterDependencies, FetchLike } from './types.js';

export const GEMINI_DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com';

/** Finish reasons for a candidate the safety system withheld. Tokens are still billed. */
const BLOCKED_FINISH_REASONS: ReadonlySet<string> = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().int().nonnegative().default(0),
      candidatesTokenCount: z.number().int().nonnegative().default(0),
    })
    .optional(),
});

export interface GeminiAdapterOptions extends AdapterDependencies {
  readonly apiKey: string;
  readonly endpointUrl?: string;
  readonly fetch?: FetchLike;
}

export class GeminiAdapter extends BaseProviderAdapter {
  readonly kind = 'gemini' as const;
  readonly #apiKey: string;
  readonly #endpoint: string;
  readonly #fetch: FetchLike;

  constructor(model: string, options: GeminiAdapterOptions) {
    super(model, options);
    this.#apiKey = options.apiKey;
    this.#endpoint = (options.endpointUrl ?? GEMINI_DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.#fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  protected async invoke(
    request: AnalysisRequest,
    signal: AbortSignal | undefined,
  ): Promise<ProviderResponse> {
    const body = {
      contents: toMessages(request).map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      })),
      ...(request.system !== undefined && {
        systemInstruction: { parts: [{ text: request.system }] },
      }),
      ...(request.maxOutputTokens !== undefined && {
        generationConfig: { maxOutputTokens: request.maxOutputTokens },
      }),
    };

    const url = `${this.#endpoint}/v1beta/models/${encodeURIComponent(this.model)}:generateContent`;
    const response = await this.#fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.#apiKey,
      },
      body: JSON.stringify(body),
      ...(signal !== undefined && { signal }),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => 'unknown error');
      throw httpFailure(this.kind, response.status, detail);
    }

    const data = GenerateContentResponseSchema.parse(await response.json());
    const usage = this.usageFor(
      data.usageMetadata?.promptTokenCount ?? 0,
      data.usageMetadata?.candidatesTokenCount ?? 0,
    );

    const blockReason = data.promptFeedback?.blockReason;
    const candidate = data.candidates[0];
    if (candidate === undefined) {
      throw new ProviderError({
        provider: this.kind,
        kind: blockReason !== undefined ? 'content_filtered' : 'unknown',
        message: blockReason !== undefined ? `prompt blocked: ${blockReason}` : 'response had no candidates',
        usage,
      });
    }

    const finishReason = candidate.finishReason ?? 'unknown';
    if (BLOCKED_FINISH_REASONS.has(finishReason)) {
      throw new ProviderError({
        provider: this.kind,
        kind: 'content_filtered',
        message: `candidate withheld: ${finishReason}`,
        usage,
      });
    }

    const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
    return { text, finishReason, usage, raw: data };
  }
}
