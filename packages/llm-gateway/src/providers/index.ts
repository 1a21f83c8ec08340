// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { createProviderAdapter } from './factory.js';
export type { ProviderFactoryDependencies } from './factory.js';
export { BaseProviderAdapter } from './base.js';
export { classifyFailure, httpFailure, kindForStatus } from './classify.js';
export { OpenAIAdapter, AzureOpenAIAdapter } from './openai.js';
export type {
  OpenAIClientLike,
  OpenAIChatParams,
  OpenAIChatMessage,
  OpenAIChatCompletion,
} from './openai.js';
export { AnthropicAdapter, DEFAULT_MAX_OUTPUT_TOKENS } from './anthropic.js';
export type { AnthropicClientLike, AnthropicMessageParams, AnthropicMessage } from './anthropic.js';
export { GeminiAdapter, GEMINI_DEFAULT_ENDPOINT } from './gemini.js';
export type { GeminiAdapterOptions } from './gemini.js';
export { CohereAdapter, COHERE_DEFAULT_ENDPOINT } from './cohere.js';
export type { CohereAdapterOptions } from './cohere.js';
export { DummyAdapter, DUMMY_RESPONSE_TEXT } from './dummy.js';
export type {
  ProviderAdapter,
  ProviderCallOptions,
  AdapterDependencies,
  FetchLike,
} from './types.js';
