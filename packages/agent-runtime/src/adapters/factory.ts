import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { ModelConfig, ModelProtocolAdapter, ProviderKind } from '@toolpilot/core';
import { ConfigError, ProviderError } from '@toolpilot/core';
import { AnthropicAdapter } from './anthropic.js';
import { OpenAIAdapter, OpenAICompatibleAdapter } from './openai.js';

type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_KEY_ENV: Record<ProviderKind, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  'openai-compatible': 'OPENAI_COMPATIBLE_API_KEY',
};

const BASE_URL_ENV: Record<ProviderKind, string> = {
  openai: 'OPENAI_BASE_URL',
  anthropic: 'ANTHROPIC_BASE_URL',
  'openai-compatible': 'OPENAI_COMPATIBLE_BASE_URL',
};

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the adapter for the configured provider. The API key comes from the
 * environment only; a missing key fails here with an `auth` ProviderError.
 * SDK retries are disabled because ModelClient owns the retry policy.
 */
export function createModelAdapter(config: ModelConfig, env: Env = process.env): ModelProtocolAdapter {
  const keyEnv = config.apiKeyEnv ?? DEFAULT_KEY_ENV[config.provider];
  const apiKey = readEnv(env, keyEnv);
  if (!apiKey) {
    throw new ProviderError('auth', `${keyEnv} is required for provider=${config.provider}`);
  }
  const baseURL = config.baseUrl ?? readEnv(env, BASE_URL_ENV[config.provider]);

  switch (config.provider) {
    case 'anthropic': {
      const client = new Anthropic({ apiKey, baseURL, timeout: config.timeoutMs, maxRetries: 0 });
      return new AnthropicAdapter({
        model: config.name,
        create: (body, options) => client.messages.create(body, options),
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        thinkingBudgetTokens: config.thinkingBudgetTokens,
      });
    }
    case 'openai': {
      const client = new OpenAI({ apiKey, baseURL, timeout: config.timeoutMs, maxRetries: 0 });
      return new OpenAIAdapter({
        model: config.name,
        create: (body, options) => client.chat.completions.create(body, options),
        temperature: config.temperature,
        maxTokens: config.maxTokens,
      });
    }
    case 'openai-compatible': {
      if (!baseURL) {
        throw new ConfigError([
          {
            path: 'model.baseUrl',
            message: `is required for provider openai-compatible (or set ${BASE_URL_ENV['openai-compatible']})`,
          },
        ]);
      }
      const client = new OpenAI({ apiKey, baseURL, timeout: config.timeoutMs, maxRetries: 0 });
      return new OpenAICompatibleAdapter({
        model: config.name,
        create: (body, options) => client.chat.completions.create(body, options),
        temperature: config.temperature,
        maxTokens: config.maxTokens,
      });
    }
  }
}
