/**
 * LLM provider endpoint and credential resolution.
 */

import { DEFAULT_LLM_BASE_URLS } from '../constants.js';
import type { ILlmConfig, LlmProvider } from '../types.js';

export interface IResolvedLlmConfig extends ILlmConfig {
  baseUrl: string;
  apiKey: string;
}

/**
 * Join a base URL with a route path, handling trailing slashes.
 */
export function joinBaseUrl(baseUrl: string, route: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${route}`;
}

export function providerRoute(provider: LlmProvider): string {
  return provider === 'anthropic' ? '/v1/messages' : '/v1/chat/completions';
}

/**
 * Fill the base URL and API key from config, then the provider's environment variables
 */
export function resolveLlmConfig(
  config: ILlmConfig,
  env: NodeJS.ProcessEnv = process.env,
): IResolvedLlmConfig {
  if (config.provider === 'anthropic') {
    return {
      ...config,
      baseUrl: config.baseUrl || env.ANTHROPIC_BASE_URL || DEFAULT_LLM_BASE_URLS.anthropic,
      apiKey: env.ANTHROPIC_API_KEY ?? env.ANTHROPIC_AUTH_TOKEN ?? '',
    };
  }
  return {
    ...config,
    baseUrl: config.baseUrl || env.OPENAI_BASE_URL || DEFAULT_LLM_BASE_URLS.openai,
    apiKey: env.OPENAI_API_KEY ?? '',
  };
}
