// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, ProviderError } from '../src/errors.js';
import { ModelPricingRegistry } from '../src/pricing/registry.js';
import { AnthropicAdapter, DEFAULT_MAX_OUTPUT_TOKENS } from '../src/providers/anthropic.js';
import type { AnthropicClientLike, AnthropicMessage } from '../src/providers/anthropic.js';
import { classifyFailure, kindForStatus } from '../src/providers/classify.js';
import { CohereAdapter } from '../src/providers/cohere.js';
import { DummyAdapter, DUMMY_RESPONSE_TEXT } from '../src/providers/dummy.js';
import { createProviderAdapter } from '../src/providers/factory.js';
import { GeminiAdapter } from '../src/providers/gemini.js';
import { AzureOpenAIAdapter, OpenAIAdapter } from '../src/providers/openai.js';
import type { OpenAIChatCompletion, OpenAIClientLike } from '../src/providers/openai.js';
import type { FetchLike } from '../src/providers/types.js';
import type { AnalysisRequest, ProviderConfig } from '../src/types.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Round numbers: input tokens cost 1 USD per 1k, output tokens 2 USD per 1k. */
function testPricing(): ModelPricingRegistry {
  return new ModelPricingRegistry(
    (['openai', 'anthropic', 'gemini', 'cohere'] as const).map((provider) => ({
      provider,
      modelId: 'test-model',
      inputCostPer1kTokens: 1,
      outputCostPer1kTokens: 2,
    })),
  );
}

const REQUEST: AnalysisRequest = {
  prompt: 'Review this diff.',
  system: 'You are a linter.',
  estimatedTokens: 100,
  maxOutputTokens: 256,
};

async function rejectionOf(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProviderError) return error;
    throw error;
  }
  throw new Error('expected the call to reject');
}

function fakeOpenAI(completion: OpenAIChatCompletion) {
  const create = vi.fn<OpenAIClientLike['chat']['completions']['create']>(async () => completion);
  const client: OpenAIClientLike = { chat: { completions: { create } } };
  return { client, create };
}

function fakeAnthropic(message: AnthropicMessage) {
  const create = vi.fn<AnthropicClientLike['messages']['create']>(async () => message);
  const client: AnthropicClientLike = { messages: { create } };
  return { client, create };
}

function jsonFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } }),
  );
}

function sentBody(fetchMock: ReturnType<typeof jsonFetch>): unknown {
  const [, init] = fetchMock.mock.calls[0];
  return JSON.parse(String(init.body));
}

function config(overrides: Partial<ProviderConfig>): ProviderConfig {
  return {
    kind: 'openai',
    apiKey: 'test-secret',
    modelName: 'test-model',
    endpointUrl: undefined,
    apiVersion: undefined,
    ...overrides,
  };
}

// ── classify ──────────────────────────────────────────────────────────────────

describe('kindForStatus', () => {
  it.each([
    [408, 'timeout'],
    [429, 'rate_limited'],
    [409, 'server'],
    [500, 'server'],
    [503, 'server'],
    [401, 'authentication'],
    [403, 'authentication'],
    [400, 'invalid_request'],
    [404, 'invalid_request'],
  ] as const)('maps %i to %s', (status, kind) => {
    expect(kindForStatus(status)).toBe(kind);
  });
});

describe('classifyFailure', () => {
  it('passes a ProviderError through unchanged', () => {
    const error = new ProviderError({ provider: 'openai', kind: 'server', message: 'down' });
    expect(classifyFailure('openai', error)).toBe(error);
  });

  it('reports cancelled whenever the signal was aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const error = classifyFailure('anthropic', Object.assign(new Error('x'), { status: 500 }), controller.signal);
    expect(error.kind).toBe('cancelled');
    expect(error.retryable).toBe(false);
  });

  it('reads the status of SDK-style errors', () => {
    const error = classifyFailure('openai', Object.assign(new Error('Unauthorized'), { status: 401 }));
    expect(error.kind).toBe('authentication');
    expect(error.status).toBe(401);
    expect(error.message).toBe('openai: Unauthorized');
  });

  it('classifies by error name when there is no status', () => {
    const named = (name: string): Error => Object.assign(new Error(name), { name });
    expect(classifyFailure('openai', named('APIConnectionTimeoutError')).kind).toBe('timeout');
    expect(classifyFailure('openai', named('APIConnectionError')).kind).toBe('network');
    expect(classifyFailure('openai', named('AbortError')).kind).toBe('cancelled');
    expect(classifyFailure('gemini', new TypeError('fetch failed')).kind).toBe('network');
    expect(classifyFailure('gemini', 'weird').kind).toBe('unknown');
  });

  it('marks transient kinds retryable', () => {
    expect(classifyFailure('openai', Object.assign(new Error('busy'), { status: 429 })).retryable).toBe(true);
    expect(classifyFailure('openai', Object.assign(new Error('bad'), { status: 400 })).retryable).toBe(false);
  });
});

// ── OpenAI / Azure ────────────────────────────────────────────────────────────

describe('OpenAIAdapter', () => {
  const completion: OpenAIChatCompletion = {
    id: 'chatcmpl-1',
    choices: [{ message: { content: 'No issues found.' }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 1000, completion_tokens: 500 },
  };

  it('sends the system prompt first and prices the billed usage', async () => {
    const { client, create } = fakeOpenAI(completion);
    const adapter = new OpenAIAdapter(client, 'test-model', { pricing: testPricing() });

    const response = await adapter.call(REQUEST);

    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'You are a linter.' },
          { role: 'user', content: 'Review this diff.' },
        ],
        max_tokens: 256,
      },
      {},
    );
    expect(response.text).toBe('No issues found.');
    expect(response.finishReason).toBe('stop');
    expect(response.usage).toEqual({ promptTokens: 1000, completionTokens: 500, costUsd: 2, requestCount: 1 });
  });

  it('forwards the abort signal', async () => {
    const { client, create } = fakeOpenAI(completion);
    const adapter = new OpenAIAdapter(client, 'test-model');
    const controller = new AbortController();

    await adapter.call(REQUEST, { signal: controller.signal });

    expect(create.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it('records zero usage when the usage block is missing', async () => {
    const { client } = fakeOpenAI({ ...completion, usage: null });
    const adapter = new OpenAIAdapter(client, 'test-model', { pricing: testPricing() });

    const response = await adapter.call(REQUEST);

    expect(response.usage).toEqual({ promptTokens: 0, completionTokens: 0, costUsd: 0, requestCount: 1 });
  });

  it('records zero cost for an unpriced model', async () => {
    const { client } = fakeOpenAI(completion);
    const adapter = new OpenAIAdapter(client, 'unpriced-model', { pricing: testPricing() });

    const response = await adapter.call(REQUEST);

    expect(response.usage.costUsd).toBe(0);
    expect(response.usage.promptTokens).toBe(1000);
  });

  it('fails a content-filtered completion but keeps its usage', async () => {
    const { client } = fakeOpenAI({
      ...completion,
      choices: [{ message: { content: null }, finish_reason: 'content_filter' }],
    });
    const adapter = new OpenAIAdapter(client, 'test-model', { pricing: testPricing() });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('content_filtered');
    expect(error.provider).toBe('openai');
    expect(error.usage?.completionTokens).toBe(500);
  });

  it('normalizes client errors', async () => {
    const create = vi.fn<OpenAIClientLike['chat']['completions']['create']>(async () => {
      throw Object.assign(new Error('Rate limit reached'), { status: 429 });
    });
    const adapter = new OpenAIAdapter({ chat: { completions: { create } } }, 'test-model');

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('rate_limited');
    expect(error.usage).toBeUndefined();
  });

  it('reports azure as its own provider and prices deployments from the openai list', async () => {
    const { client } = fakeOpenAI(completion);
    const adapter = new AzureOpenAIAdapter(client, 'test-model', { pricing: testPricing() });

    const response = await adapter.call(REQUEST);

    expect(adapter.kind).toBe('azure');
    expect(response.usage.costUsd).toBe(2);
  });
});

// ── Anthropic ─────────────────────────────────────────────────────────────────

describe('AnthropicAdapter', () => {
  const message: AnthropicMessage = {
    id: 'msg_1',
    content: [
      { type: 'text', text: 'Line 3: ' },
      { type: 'text', text: 'unused variable.' },
    ],
    stop_reason: 'end_turn',
    usage: { input_tokens: 500, output_tokens: 250 },
  };

  it('passes system separately and joins the text blocks', async () => {
    const { client, create } = fakeAnthropic(message);
    const adapter = new AnthropicAdapter(client, 'test-model', { pricing: testPricing() });

    const response = await adapter.call(REQUEST);

    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        max_tokens: 256,
        system: 'You are a linter.',
        messages: [{ role: 'user', content: 'Review this diff.' }],
      },
      {},
    );
    expect(response.text).toBe('Line 3: unused variable.');
    expect(response.finishReason).toBe('end_turn');
    expect(response.usage).toEqual({ promptTokens: 500, completionTokens: 250, costUsd: 1, requestCount: 1 });
  });

  it('applies the default output cap', async () => {
    const { client, create } = fakeAnthropic(message);
    const adapter = new AnthropicAdapter(client, 'test-model');

    await adapter.call({ prompt: 'hi', estimatedTokens: 1 });

    expect(create.mock.calls[0][0].max_tokens).toBe(DEFAULT_MAX_OUTPUT_TOKENS);
  });

  it('fails a refusal but keeps its usage', async () => {
    const { client } = fakeAnthropic({ ...message, content: [], stop_reason: 'refusal' });
    const adapter = new AnthropicAdapter(client, 'test-model', { pricing: testPricing() });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('content_filtered');
    expect(error.usage?.promptTokens).toBe(500);
  });
});

// ── Gemini ────────────────────────────────────────────────────────────────────

describe('GeminiAdapter', () => {
  const body = {
    candidates: [{ content: { parts: [{ text: 'All ' }, { text: 'good.' }] }, finishReason: 'STOP' }],
    usageMetadata: { promptTokenCount: 1000, candidatesTokenCount: 500 },
  };

  it('posts generateContent with the key header and maps roles', async () => {
    const fetchMock = jsonFetch(body);
    const adapter = new GeminiAdapter('test-model', {
      apiKey: 'test-secret',
      endpointUrl: 'https://gemini.test/',
      fetch: fetchMock,
      pricing: testPricing(),
    });

    const response = await adapter.call({
      ...REQUEST,
      prompt: [
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'reply' },
      ],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gemini.test/v1beta/models/test-model:generateContent');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', 'x-goog-api-key': 'test-secret' });
    expect(sentBody(fetchMock)).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'first' }] },
        { role: 'model', parts: [{ text: 'reply' }] },
      ],
      systemInstruction: { parts: [{ text: 'You are a linter.' }] },
      generationConfig: { maxOutputTokens: 256 },
    });
    expect(response.text).toBe('All good.');
    expect(response.finishReason).toBe('STOP');
    expect(response.usage).toEqual({ promptTokens: 1000, completionTokens: 500, costUsd: 2, requestCount: 1 });
  });

  it('maps a non-2xx response to a classified error', async () => {
    const fetchMock = jsonFetch({ error: { message: 'quota' } }, 429);
    const adapter = new GeminiAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('rate_limited');
    expect(error.status).toBe(429);
    expect(error.message).toBe('gemini: HTTP 429: {"error":{"message":"quota"}}');
  });

  it('fails a blocked prompt with its usage', async () => {
    const fetchMock = jsonFetch({
      promptFeedback: { blockReason: 'SAFETY' },
      usageMetadata: { promptTokenCount: 12 },
    });
    const adapter = new GeminiAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('content_filtered');
    expect(error.message).toBe('gemini: prompt blocked: SAFETY');
    expect(error.usage?.promptTokens).toBe(12);
  });

  it('fails a withheld candidate', async () => {
    const fetchMock = jsonFetch({ ...body, candidates: [{ finishReason: 'RECITATION' }] });
    const adapter = new GeminiAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('content_filtered');
    expect(error.message).toBe('gemini: candidate withheld: RECITATION');
  });

  it('reports a network failure', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const adapter = new GeminiAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('network');
    expect(error.retryable).toBe(true);
  });
});

// ── Cohere ────────────────────────────────────────────────────────────────────

describe('CohereAdapter', () => {
  const body = {
    id: 'chat-1',
    finish_reason: 'COMPLETE',
    message: { content: [{ type: 'text', text: 'Looks correct.' }] },
    usage: { billed_units: { input_tokens: 999.5, output_tokens: 500 } },
  };

  it('posts v2 chat with a bearer token and rounds billed units up', async () => {
    const fetchMock = jsonFetch(body);
    const adapter = new CohereAdapter('test-model', {
      apiKey: 'test-secret',
      fetch: fetchMock,
      pricing: testPricing(),
    });

    const response = await adapter.call(REQUEST);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.cohere.com/v2/chat');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(sentBody(fetchMock)).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You are a linter.' },
        { role: 'user', content: 'Review this diff.' },
      ],
      stream: false,
      max_tokens: 256,
    });
    expect(response.text).toBe('Looks correct.');
    expect(response.usage).toEqual({ promptTokens: 1000, completionTokens: 500, costUsd: 2, requestCount: 1 });
  });

  it('treats finish_reason ERROR as a server failure with usage', async () => {
    const fetchMock = jsonFetch({ ...body, finish_reason: 'ERROR' });
    const adapter = new CohereAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('server');
    expect(error.usage?.completionTokens).toBe(500);
  });

  it('maps 401 to authentication', async () => {
    const fetchMock = jsonFetch({ message: 'invalid api token' }, 401);
    const adapter = new CohereAdapter('test-model', { apiKey: 'test-secret', fetch: fetchMock });

    const error = await rejectionOf(adapter.call(REQUEST));

    expect(error.kind).toBe('authentication');
    expect(error.retryable).toBe(false);
  });
});

// ── Dummy ─────────────────────────────────────────────────────────────────────

describe('DummyAdapter', () => {
  it('returns the canned response with one request and no tokens', async () => {
    const adapter = new DummyAdapter();

    const response = await adapter.call(REQUEST);

    expect(adapter.billable).toBe(false);
    expect(response.text).toBe(DUMMY_RESPONSE_TEXT);
    expect(response.usage).toEqual({ promptTokens: 0, completionTokens: 0, costUsd: 0, requestCount: 1 });
  });

  it('honours an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await rejectionOf(new DummyAdapter().call(REQUEST, { signal: controller.signal }));

    expect(error.kind).toBe('cancelled');
  });
});

// ── Factory ───────────────────────────────────────────────────────────────────

describe('createProviderAdapter', () => {
  it('builds each provider kind', () => {
    const { client: openaiClient } = fakeOpenAI({ id: 'x', choices: [] });
    expect(createProviderAdapter(config({ kind: 'openai' }), { openaiClient })).toBeInstanceOf(OpenAIAdapter);
    expect(
      createProviderAdapter(
        config({ kind: 'azure', endpointUrl: 'https://lint.example.azure.com', apiVersion: '2024-06-01' }),
        { openaiClient },
      ).kind,
    ).toBe('azure');
    expect(createProviderAdapter(config({ kind: 'gemini' })).kind).toBe('gemini');
    expect(createProviderAdapter(config({ kind: 'cohere' })).kind).toBe('cohere');
    expect(createProviderAdapter(config({ kind: 'dummy', apiKey: undefined, modelName: 'dummy' }))).toBeInstanceOf(
      DummyAdapter,
    );
  });

  it('constructs the SDK clients without making requests', () => {
    expect(createProviderAdapter(config({ kind: 'openai' })).model).toBe('test-model');
    expect(createProviderAdapter(config({ kind: 'anthropic' })).kind).toBe('anthropic');
  });

  it('requires an API key for billable providers', () => {
    expect(() => createProviderAdapter(config({ kind: 'cohere', apiKey: undefined }))).toThrow(ConfigurationError);
  });

  it('requires an endpoint and version for azure', () => {
    expect(() => createProviderAdapter(config({ kind: 'azure' }))).toThrow(
      'Gateway configuration is invalid: azure: endpointUrl and apiVersion are required',
    );
  });

  it('wires the fetch dependency into REST adapters', async () => {
    const fetchMock = jsonFetch({ candidates: [{ content: { parts: [{ text: 'ok' }] }, finishReason: 'STOP' }] });
    const adapter = createProviderAdapter(config({ kind: 'gemini' }), { fetch: fetchMock });

    const response = await adapter.call(REQUEST);

    expect(response.text).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
