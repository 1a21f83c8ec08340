// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import OpenAI, { AzureOpenAI } from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { ConfigurationError } from '../errors.js';
import type { ProviderConfig } from '../types.js';
import { AnthropicAdapter } from './anthropic.js';
import type { AnthropicClientLike } from './anthropic.js';
import { CohereAdapter } from './cohere.js';
import { DummyAdapter } from './dummy.js';
import { GeminiAdapter } from './gemini.js';
import { AzureOpenAIAdapter, OpenAIAdapter } from './openai.js';
import type { OpenAIClientLike } from './openai.js';
import type { AdapterDependencies, FetchLike, ProviderAdapter } from './types.js';

export interface ProviderFactoryDependencies extends AdapterDependencies {
  /** Used by the REST adapters (Gemini, Cohere). Defaults to the global fetch. */
  readonly fetch?: FetchLike;
  /** Replaces the SDK client for `openai` and `azure`. */
  readonly openaiClient?: OpenAIClientLike;
  readonly anthropicClient?: AnthropicClientLike;
}

function requireApiKey(config: ProviderConfig): string {
  if (config.apiKey === undefined || config.apiKey === '') {
    throw new ConfigurationError([`apiKey: required for provider "${config.kind}"`]);
  }
  return config.apiKey;
}

/**
 * Build the adapter for the configured backend. The selection is made once;
 * a Gateway never switches providers.
 *
 * SDK clients are created with retries disabled: the gateway never retries
 * on its own, and a hidden retry would spend budget nobody reserved.
 */
export function createProviderAdapter(
  config: ProviderConfig,
  deps: ProviderFactoryDependencies = {},
): ProviderAdapter {
  const adapterDeps: AdapterDependencies = {
    ...(deps.pricing !== undefined && { pricing: deps.pricing }),
    ...(deps.logger !== undefined && { logger: deps.logger }),
  };

  switch (config.kind) {
    case 'openai': {
      const client =
        deps.openaiClient ??
        new OpenAI({
          apiKey: requireApiKey(config),
          maxRetries: 0,
          ...(config.endpointUrl !== undefined && { baseURL: config.endpointUrl }),
        });
      return new OpenAIAdapter(client, config.modelName, adapterDeps);
    }

    case 'azure': {
      if (config.endpointUrl === undefined || config.apiVersion === undefined) {
        throw new ConfigurationError(['azure: endpointUrl and apiVersion are required']);
      }
      const client =
        deps.openaiClient ??
        new AzureOpenAI({
          apiKey: requireApiKey(config),
          endpoint: config.endpointUrl,
          apiVersion: config.apiVersion,
          deployment: config.modelName,
          maxRetries: 0,
        });
      return new AzureOpenAIAdapter(client, config.modelName, adapterDeps);
    }

    case 'anthropic': {
      const client =
        deps.anthropicClient ??
        new Anthropic({
          apiKey: requireApiKey(config),
          maxRetries: 0,
          ...(config.endpointUrl !== undefined && { baseURL: config.endpointUrl }),
        });
      return new AnthropicAdapter(client, config.modelName, adapterDeps);
    }

    case 'gemini':
      return new GeminiAdapter(config.modelName, {
        ...adapterDeps,
        apiKey: requireApiKey(config),
        ...(config.endpointUrl !== undefined && { endpointUrl: config.endpointUrl }),
        ...(deps.fetch !== undefined && { fetch: deps.fetch }),
      });

    case 'cohere':
      return new CohereAdapter(config.modelName, {
        ...adapterDeps,
        apiKey: requireApiKey(config),
        ...(config.endpointUrl !== undefined && { endpointUrl: config.endpointUrl }),
        ...(deps.fetch !== undefined && { fetch: deps.fetch }),
      });

    case 'dummy':
      return new DummyAdapter(config.modelName);

    default: {
      // Reachable only from untyped callers.
      const unsupported: never = config.kind;
      throw new ConfigurationError([`kind: unsupported provider "${String(unsupported)}"`]);
    }
  }
}
