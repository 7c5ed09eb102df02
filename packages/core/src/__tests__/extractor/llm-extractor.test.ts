/**
 * Tests for the LLM-backed extractor, using an in-process fetch stand-in
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_LLM } from '../../constants.js';
import { ParseError } from '../../errors.js';
import { createExtractor } from '../../extractor/factory.js';
import { KeywordExtractor } from '../../extractor/keyword-extractor.js';
import {
  type FetchLike,
  LlmExtractor,
  buildClassificationPrompt,
  parseCriteriaReply,
  stripCodeFences,
} from '../../extractor/llm-extractor.js';
import { type IResolvedLlmConfig, joinBaseUrl, resolveLlmConfig } from '../../extractor/provider.js';
import { makeCriteria } from '../fixtures.js';

const MEMORY_REPLY = JSON.stringify(makeCriteria({ storage_intent: 'memory', data_type: 'text' }));

interface IRecordedRequest {
  url: string;
  init: RequestInit;
}

function fakeFetch(responses: Array<() => Response>): { fetch: FetchLike; requests: IRecordedRequest[] } {
  const requests: IRecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    const next = responses[Math.min(requests.length, responses.length - 1)];
    requests.push({ url, init });
    return next();
  };
  return { fetch, requests };
}

function anthropicReply(text: string): () => Response {
  return () => new Response(JSON.stringify({ content: [{ type: 'text', text }] }), { status: 200 });
}

function openAiReply(text: string): () => Response {
  return () => new Response(JSON.stringify({ choices: [{ message: { content: text } }] }), { status: 200 });
}

function anthropicConfig(overrides: Partial<IResolvedLlmConfig> = {}): IResolvedLlmConfig {
  return {
    ...DEFAULT_LLM,
    baseUrl: 'https://api.anthropic.com',
    apiKey: 'test-secret',
    ...overrides,
  };
}

describe('prompt and reply parsing', () => {
  it('should put the request in the user message and the vocabulary in the system prompt', () => {
    const prompt = buildClassificationPrompt('Save my notes');

    expect(prompt.user).toBe('Request: "Save my notes"');
    expect(prompt.system).toContain('- data_type: "structured" | "numeric" | "text" | "binary"');
    expect(prompt.system).toContain('- analytic_intent: true | false');
  });

  it('should strip markdown code fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('  {"a":1} ')).toBe('{"a":1}');
  });

  it('should raise ParseError for a reply that is not JSON', () => {
    try {
      parseCriteriaReply('Save my notes', 'I think this is a file');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError && error.rawOutput).toBe('I think this is a file');
      expect(error instanceof ParseError && error.request).toBe('Save my notes');
    }
  });

  it('should raise ParseError for JSON that is not valid criteria', () => {
    const reply = JSON.stringify({ ...makeCriteria(), data_type: 'pdf' });

    expect(() => parseCriteriaReply('Save a pdf', reply)).toThrow(
      'Extractor reply is not valid criteria: Criteria field "data_type" has undeclared value "pdf"',
    );
  });
});

describe('LlmExtractor', () => {
  it('should call the Anthropic messages API', async () => {
    const { fetch, requests } = fakeFetch([anthropicReply(MEMORY_REPLY)]);
    const extractor = new LlmExtractor(anthropicConfig(), { fetch });

    const criteria = await extractor.extract('Remember that I prefer dark mode');

    expect(extractor.name).toBe('llm:anthropic/claude-3-5-haiku-latest');
    expect(criteria).toEqual(makeCriteria({ storage_intent: 'memory', data_type: 'text' }));
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.anthropic.com/v1/messages');
    expect(requests[0].init.headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
    expect(JSON.parse(String(requests[0].init.body))).toMatchObject({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 256,
      temperature: 0,
      messages: [{ role: 'user', content: 'Request: "Remember that I prefer dark mode"' }],
    });
  });

  it('should accept a fenced reply', async () => {
    const { fetch } = fakeFetch([anthropicReply('```json\n' + MEMORY_REPLY + '\n```')]);
    const extractor = new LlmExtractor(anthropicConfig(), { fetch });

    expect((await extractor.extract('Remember my birthday')).storage_intent).toBe('memory');
  });

  it('should call the OpenAI chat completions API', async () => {
    const { fetch, requests } = fakeFetch([openAiReply(MEMORY_REPLY)]);
    const extractor = new LlmExtractor(
      anthropicConfig({ provider: 'openai', model: 'gpt-4o-mini', baseUrl: 'http://localhost:8080/' }),
      { fetch },
    );

    await extractor.extract('Remember my birthday');

    expect(extractor.name).toBe('llm:openai/gpt-4o-mini');
    expect(requests[0].url).toBe('http://localhost:8080/v1/chat/completions');
    expect(requests[0].init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
  });

  it('should retry transient server errors', async () => {
    const delays: number[] = [];
    const { fetch, requests } = fakeFetch([
      () => new Response('overloaded', { status: 503 }),
      anthropicReply(MEMORY_REPLY),
    ]);
    const extractor = new LlmExtractor(anthropicConfig(), {
      fetch,
      retryDelaysMs: [5, 10],
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    await extractor.extract('Remember my birthday');

    expect(requests).toHaveLength(2);
    expect(delays).toEqual([5]);
  });

  it('should give up after the last retry', async () => {
    const { fetch, requests } = fakeFetch([() => new Response('overloaded', { status: 500 })]);
    const extractor = new LlmExtractor(anthropicConfig(), { fetch, retryDelaysMs: [1], sleep: async () => {} });

    await expect(extractor.extract('Remember my birthday')).rejects.toThrow('Anthropic API error: 500 overloaded');
    expect(requests).toHaveLength(2);
  });

  it('should not retry client errors', async () => {
    const { fetch, requests } = fakeFetch([() => new Response('bad key', { status: 401 })]);
    const extractor = new LlmExtractor(anthropicConfig(), { fetch, retryDelaysMs: [1], sleep: async () => {} });

    await expect(extractor.extract('Remember my birthday')).rejects.toThrow('Anthropic API error: 401 bad key');
    expect(requests).toHaveLength(1);
  });

  it('should retry network failures and rethrow the last one', async () => {
    let calls = 0;
    const fetch: FetchLike = async () => {
      calls += 1;
      throw new Error('connection refused');
    };
    const extractor = new LlmExtractor(anthropicConfig(), { fetch, retryDelaysMs: [1, 1], sleep: async () => {} });

    await expect(extractor.extract('Remember my birthday')).rejects.toThrow('connection refused');
    expect(calls).toBe(3);
  });
});

describe('provider resolution', () => {
  it('should join base URLs without doubling slashes', () => {
    expect(joinBaseUrl('https://proxy.test/', '/v1/messages')).toBe('https://proxy.test/v1/messages');
  });

  it('should read credentials and endpoints from the environment', () => {
    const resolved = resolveLlmConfig(DEFAULT_LLM, {
      ANTHROPIC_API_KEY: 'test-secret',
      ANTHROPIC_BASE_URL: 'https://proxy.test',
    });

    expect(resolved.apiKey).toBe('test-secret');
    expect(resolved.baseUrl).toBe('https://proxy.test');
  });

  it('should prefer a configured base URL', () => {
    const resolved = resolveLlmConfig(
      { ...DEFAULT_LLM, provider: 'openai', baseUrl: 'http://localhost:8080' },
      { OPENAI_API_KEY: 'test-secret', OPENAI_BASE_URL: 'https://ignored.test' },
    );

    expect(resolved.baseUrl).toBe('http://localhost:8080');
    expect(resolved.apiKey).toBe('test-secret');
  });

  it('should fall back to the public endpoint', () => {
    expect(resolveLlmConfig({ ...DEFAULT_LLM, provider: 'openai' }, {}).baseUrl).toBe('https://api.openai.com');
  });
});

describe('createExtractor', () => {
  it('should build the extractor the config selects', () => {
    const config = { extractor: 'keyword' as const, llm: DEFAULT_LLM };

    expect(createExtractor(config)).toBeInstanceOf(KeywordExtractor);
    expect(createExtractor(config, 'llm').name).toBe('llm:anthropic/claude-3-5-haiku-latest');
  });
});
