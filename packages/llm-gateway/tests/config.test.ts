// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnvFile, parseGatewayConfig } from '../src/config.js';
import type { Env } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function configIssues(env: Env): readonly string[] {
  try {
    parseGatewayConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected parseGatewayConfig to throw ConfigurationError');
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe('parseGatewayConfig', () => {
  describe('provider selection', () => {
    it('accepts the dummy provider without a credential', () => {
      const config = parseGatewayConfig({ LINTAI_LLM_PROVIDER: 'dummy' });
      expect(config).toEqual({
        provider: {
          kind: 'dummy',
          apiKey: undefined,
          modelName: 'dummy',
          endpointUrl: undefined,
          apiVersion: undefined,
        },
        limits: {},
        logLevel: 'info',
      });
    });

    it('matches the provider name case-insensitively and applies the default model', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'OpenAI',
        OPENAI_API_KEY: 'test-secret',
      });
      expect(config.provider.kind).toBe('openai');
      expect(config.provider.apiKey).toBe('test-secret');
      expect(config.provider.modelName).toBe('gpt-4o-mini');
    });

    it('reports a missing provider', () => {
      expect(configIssues({})).toEqual(['LINTAI_LLM_PROVIDER: is required']);
    });

    it('reports an unsupported provider', () => {
      expect(configIssues({ LINTAI_LLM_PROVIDER: 'mistral' })).toEqual([
        'LINTAI_LLM_PROVIDER: must be one of openai, azure, anthropic, gemini, cohere, dummy',
      ]);
    });
  });

  describe('credential fallbacks', () => {
    it('prefers LLM_API_KEY over the provider-specific key', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'anthropic',
        LLM_API_KEY: 'generic-key',
        ANTHROPIC_API_KEY: 'specific-key',
      });
      expect(config.provider.apiKey).toBe('generic-key');
      expect(config.provider.modelName).toBe('claude-3-5-haiku-20241022');
    });

    it('treats an empty LLM_API_KEY as unset', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'anthropic',
        LLM_API_KEY: '',
        ANTHROPIC_API_KEY: 'specific-key',
      });
      expect(config.provider.apiKey).toBe('specific-key');
    });

    it('accepts GEMINI_API_KEY for gemini', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'gemini',
        GEMINI_API_KEY: 'test-secret',
      });
      expect(config.provider.apiKey).toBe('test-secret');
      expect(config.provider.modelName).toBe('gemini-1.5-flash');
    });

    it('uses the provider-specific model key when LLM_MODEL_NAME is unset', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'cohere',
        COHERE_API_KEY: 'test-secret',
        COHERE_MODEL: 'command-r-plus',
      });
      expect(config.provider.modelName).toBe('command-r-plus');
    });

    it('rejects a credential containing whitespace without echoing it', () => {
      try {
        parseGatewayConfig({ LINTAI_LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test secret' });
        expect.unreachable('parseGatewayConfig should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect((error as ConfigurationError).issues).toEqual(['LLM_API_KEY: must not contain whitespace']);
        expect((error as ConfigurationError).message).not.toContain('test secret');
      }
    });
  });

  describe('azure', () => {
    it('requires an endpoint, an API version and a deployment', () => {
      expect(
        configIssues({ LINTAI_LLM_PROVIDER: 'azure', AZURE_OPENAI_API_KEY: 'test-secret' }),
      ).toEqual([
        'LLM_ENDPOINT_URL: is required for provider "azure" (set LLM_ENDPOINT_URL or AZURE_OPENAI_ENDPOINT)',
        'LLM_API_VERSION: is required for provider "azure" (set LLM_API_VERSION or AZURE_OPENAI_API_VERSION or OPENAI_API_VERSION)',
        'LLM_MODEL_NAME: is required for provider "azure" (set LLM_MODEL_NAME or AZURE_OPENAI_DEPLOYMENT or OPENAI_MODEL)',
      ]);
    });

    it('reads the azure-specific keys', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'azure',
        AZURE_OPENAI_API_KEY: 'test-secret',
        AZURE_OPENAI_ENDPOINT: 'https://lint.example.azure.com',
        AZURE_OPENAI_API_VERSION: '2024-06-01',
        AZURE_OPENAI_DEPLOYMENT: 'gpt-4o',
      });
      expect(config.provider).toEqual({
        kind: 'azure',
        apiKey: 'test-secret',
        modelName: 'gpt-4o',
        endpointUrl: 'https://lint.example.azure.com',
        apiVersion: '2024-06-01',
      });
    });

    it('falls back to OPENAI_MODEL for the deployment', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'azure',
        AZURE_OPENAI_API_KEY: 'test-secret',
        AZURE_OPENAI_ENDPOINT: 'https://lint.example.azure.com',
        AZURE_OPENAI_API_VERSION: '2024-06-01',
        OPENAI_MODEL: 'gpt-4o-mini',
      });
      expect(config.provider.modelName).toBe('gpt-4o-mini');
    });

    it('prefers AZURE_OPENAI_DEPLOYMENT over OPENAI_MODEL', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'azure',
        AZURE_OPENAI_API_KEY: 'test-secret',
        AZURE_OPENAI_ENDPOINT: 'https://lint.example.azure.com',
        AZURE_OPENAI_API_VERSION: '2024-06-01',
        AZURE_OPENAI_DEPLOYMENT: 'lint-deployment',
        OPENAI_MODEL: 'gpt-4o-mini',
      });
      expect(config.provider.modelName).toBe('lint-deployment');
    });
  });

  describe('limits', () => {
    it('parses all three limits', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'dummy',
        LINTAI_MAX_LLM_TOKENS: '5000',
        LINTAI_MAX_LLM_COST_USD: '1.50',
        LINTAI_MAX_LLM_REQUESTS: '10',
      });
      expect(config.limits).toEqual({ maxTokens: 5000, maxCostUsd: 1.5, maxRequests: 10 });
    });

    it('treats empty limit values as unbounded', () => {
      const config = parseGatewayConfig({
        LINTAI_LLM_PROVIDER: 'dummy',
        LINTAI_MAX_LLM_TOKENS: '',
        LINTAI_MAX_LLM_COST_USD: '  ',
      });
      expect(config.limits).toEqual({});
    });

    it('rejects a non-numeric cost limit', () => {
      expect(
        configIssues({ LINTAI_LLM_PROVIDER: 'dummy', LINTAI_MAX_LLM_COST_USD: 'lots' }),
      ).toEqual(['LINTAI_MAX_LLM_COST_USD: must be a number']);
    });

    it('collects every problem into one error', () => {
      expect(
        configIssues({
          LINTAI_LLM_PROVIDER: 'openai',
          LINTAI_MAX_LLM_TOKENS: '1.5',
          LINTAI_MAX_LLM_REQUESTS: '0',
        }),
      ).toEqual([
        'LINTAI_MAX_LLM_TOKENS: must be an integer',
        'LINTAI_MAX_LLM_REQUESTS: must be positive',
        'LLM_API_KEY: is required for provider "openai" (set LLM_API_KEY or OPENAI_API_KEY)',
      ]);
    });
  });

  describe('other keys', () => {
    it('rejects an endpoint that is not a URL', () => {
      expect(
        configIssues({ LINTAI_LLM_PROVIDER: 'dummy', LLM_ENDPOINT_URL: 'not a url' }),
      ).toEqual(['LLM_ENDPOINT_URL: must be a URL']);
    });

    it('normalizes the log level', () => {
      const config = parseGatewayConfig({ LINTAI_LLM_PROVIDER: 'dummy', LINTAI_LOG_LEVEL: 'DEBUG' });
      expect(config.logLevel).toBe('debug');
    });

    it('rejects an unknown log level', () => {
      expect(
        configIssues({ LINTAI_LLM_PROVIDER: 'dummy', LINTAI_LOG_LEVEL: 'verbose' }),
      ).toEqual(['LINTAI_LOG_LEVEL: must be one of trace, debug, info, warn, error, fatal, silent']);
    });
  });
});

describe('loadEnvFile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeEnv(contents: string): string {
    dir = mkdtempSync(join(tmpdir(), 'llm-gateway-config-'));
    const path = join(dir, '.env');
    writeFileSync(path, contents);
    return path;
  }

  it('merges the file under the base environment', () => {
    const path = writeEnv(
      'LINTAI_LLM_PROVIDER=dummy\nLLM_MODEL_NAME=from-file\nLINTAI_MAX_LLM_REQUESTS=3\n',
    );

    const env = loadEnvFile(path, { LLM_MODEL_NAME: 'from-env', LINTAI_MAX_LLM_REQUESTS: '' });

    expect(env['LINTAI_LLM_PROVIDER']).toBe('dummy');
    expect(env['LLM_MODEL_NAME']).toBe('from-env');
    expect(env['LINTAI_MAX_LLM_REQUESTS']).toBe('3');
    expect(parseGatewayConfig(env).limits).toEqual({ maxRequests: 3 });
  });

  it('throws ConfigurationError for a missing file', () => {
    expect(() => loadEnvFile('/nonexistent/lintai/.env', {})).toThrow(ConfigurationError);
  });
});
