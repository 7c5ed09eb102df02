/**
 * Criteria extractor backed by a hosted LLM (Anthropic or OpenAI).
 */

import { z } from 'zod';

import { LLM_RETRY_DELAYS_MS } from '../constants.js';
import { CRITERIA_FIELDS, CRITERIA_VOCABULARY, validateCriteria } from '../criteria/criteria.js';
import { ParseError, SchemaError } from '../errors.js';
import type { ICriteria } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { type IResolvedLlmConfig, joinBaseUrl, providerRoute } from './provider.js';
import type { ICriteriaExtractor } from './types.js';

const log = createLogger('llm-extractor');

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ILlmExtractorOptions {
  fetch?: FetchLike;
  retryDelaysMs?: readonly number[];
  sleep?: (ms: number) => Promise<void>;
}

const AnthropicReplySchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

const OpenAiReplySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
});

const FEW_SHOT_EXAMPLES: Array<{ request: string; criteria: ICriteria }> = [
  {
    request: 'Remember that my favourite colour is green',
    criteria: { storage_intent: 'memory', access_pattern: 'crud', analytic_intent: false, data_type: 'text', search_intensity: 'none' },
  },
  {
    request: 'Log every workout I do',
    criteria: { storage_intent: 'database', access_pattern: 'crud', analytic_intent: false, data_type: 'structured', search_intensity: 'none' },
  },
  {
    request: 'Summarize quarterly sales by region',
    criteria: { storage_intent: 'database', access_pattern: 'query', analytic_intent: true, data_type: 'structured', search_intensity: 'none' },
  },
  {
    request: 'Find my notes about the onboarding process',
    criteria: { storage_intent: 'vector', access_pattern: 'search', analytic_intent: false, data_type: 'text', search_intensity: 'high' },
  },
  {
    request: 'Save the invoice as a PDF',
    criteria: { storage_intent: 'file', access_pattern: 'crud', analytic_intent: false, data_type: 'binary', search_intensity: 'none' },
  },
];

/**
 * Few-shot classification prompt. The reply must be a bare JSON object.
 */
export function buildClassificationPrompt(request: string): { system: string; user: string } {
  const vocabulary = CRITERIA_FIELDS.map((field) => {
    const values: readonly unknown[] = CRITERIA_VOCABULARY[field];
    return `- ${field}: ${values.map((value) => JSON.stringify(value)).join(' | ')}`;
  }).join('\n');
  const examples = FEW_SHOT_EXAMPLES.map(
    (example) => `Request: "${example.request}"\n${JSON.stringify(example.criteria)}`,
  ).join('\n\n');

  const system = [
    'You classify storage requests. Extract the storage decision criteria from the user request.',
    'Every field is required and must use one of these values:',
    vocabulary,
    '',
    'Classify by where the data should live, not by what it talks about.',
    '"track", "keep" and "maintain" describe CRUD, not analytics; analytic_intent is true only when',
    'analysis, aggregation, comparison, trends, joins or ranking are asked for explicitly.',
    '',
    'Examples:',
    examples,
    '',
    'Reply with ONLY the JSON object, no markdown and no explanation.',
  ].join('\n');

  return { system, user: `Request: "${request}"` };
}

/**
 * Unwrap a ```json fenced block if the model added one
 */
export function stripCodeFences(reply: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(reply);
  return (fenced ? fenced[1] : reply).trim();
}

/**
 * Turn a raw model reply into Criteria. Anything unusable is a ParseError carrying the reply.
 */
export function parseCriteriaReply(request: string, reply: string): ICriteria {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(reply));
  } catch (error) {
    throw new ParseError(request, 'Extractor reply is not valid JSON', { rawOutput: reply, cause: error });
  }
  try {
    return validateCriteria(parsed);
  } catch (error) {
    if (error instanceof SchemaError) {
      throw new ParseError(request, `Extractor reply is not valid criteria: ${error.message}`, {
        rawOutput: reply,
        cause: error,
      });
    }
    throw error;
  }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class LlmExtractor implements ICriteriaExtractor {
  readonly name: string;
  private readonly fetchFn: FetchLike;
  private readonly retryDelaysMs: readonly number[];
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: IResolvedLlmConfig,
    options: ILlmExtractorOptions = {},
  ) {
    this.name = `llm:${config.provider}/${config.model}`;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.retryDelaysMs = options.retryDelaysMs ?? LLM_RETRY_DELAYS_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async extract(request: string): Promise<ICriteria> {
    const reply = await this.complete(buildClassificationPrompt(request));
    return parseCriteriaReply(request, reply);
  }

  /**
   * Fetch with automatic retry on network errors and transient server errors (5xx, 429).
   */
  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    let lastErr: unknown;
    let lastResponse: Response | undefined;
    for (let attempt = 0; attempt <= this.retryDelaysMs.length; attempt++) {
      const delay = this.retryDelaysMs[attempt];
      try {
        const response = await this.fetchFn(url, init);
        const transient = response.status >= 500 || response.status === 429;
        if (transient && delay !== undefined) {
          log.warn('API server error, retrying', { status: response.status, attempt: attempt + 1, delayMs: delay });
          lastResponse = response;
          await this.sleep(delay);
          continue;
        }
        return response;
      } catch (err) {
        lastErr = err;
        if (delay !== undefined) {
          log.warn('fetch failed, retrying', { url, attempt: attempt + 1, delayMs: delay, error: String(err) });
          await this.sleep(delay);
        }
      }
    }
    if (lastResponse) return lastResponse;
    throw lastErr;
  }

  private async complete(prompt: { system: string; user: string }): Promise<string> {
    const { provider, model, maxTokens, temperature, baseUrl, apiKey } = this.config;
    const url = joinBaseUrl(baseUrl, providerRoute(provider));

    if (provider === 'anthropic') {
      const response = await this.fetchWithRetry(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': apiKey,
          'anthropic-version': '2023-06-01',
        },
        body: JSON.stringify({
          model,
          max_tokens: maxTokens,
          temperature,
          system: prompt.system,
          messages: [{ role: 'user', content: prompt.user }],
        }),
      });

      if (!response.ok) {
        throw new Error(`Anthropic API error: ${response.status} ${await response.text()}`);
      }

      const data = AnthropicReplySchema.parse(await response.json());
      return data.content.find((block) => block.type === 'text')?.text?.trim() ?? '';
    }

    const response = await this.fetchWithRetry(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(`OpenAI API error: ${response.status} ${await response.text()}`);
    }

    const data = OpenAiReplySchema.parse(await response.json());
    return data.choices[0]?.message.content?.trim() ?? '';
  }
}
