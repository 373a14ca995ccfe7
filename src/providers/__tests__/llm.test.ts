/**
 * Provider factory and response normalization tests.
 *
 * Clients are constructed but never called; no network is touched.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  createEmbeddingProvider,
  createGenerationProvider,
  createLLMProvider,
  DEFAULT_MODELS,
} from '../llm.js';
import { AnthropicGenerationProvider, normalizeAnthropicMessage } from '../anthropic.js';
import { OpenAIEmbeddingProvider, OpenAIGenerationProvider, normalizeOpenAICompletion } from '../openai.js';
import { ProviderError, isAbortError } from '../errors.js';
import { _clearEnvCache } from '../../config/env.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { APIKeyError } from '../../errors/index.js';

beforeEach(() => {
  vi.stubEnv('ANTHROPIC_API_KEY', '');
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('OPENAI_BASE_URL', '');
  _clearEnvCache();
});

afterEach(() => {
  vi.unstubAllEnvs();
  _clearEnvCache();
});

describe('createGenerationProvider', () => {
  it('throws APIKeyError when the key is missing', () => {
    expect(() => createGenerationProvider('anthropic')).toThrow(APIKeyError);
    expect(() => createGenerationProvider('openai')).toThrow(APIKeyError);
  });

  it('builds the Anthropic adapter with the default model', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    const provider = createGenerationProvider('anthropic');

    expect(provider).toBeInstanceOf(AnthropicGenerationProvider);
    expect(provider.model).toBe(DEFAULT_MODELS.anthropic);
  });

  it('builds the OpenAI adapter with a model override', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    const provider = createGenerationProvider('openai', { model: 'gpt-4o-mini' });

    expect(provider).toBeInstanceOf(OpenAIGenerationProvider);
    expect(provider.name).toBe('openai');
    expect(provider.model).toBe('gpt-4o-mini');
  });
});

describe('createLLMProvider', () => {
  it('uses default_model when it belongs to the provider', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    expect(createLLMProvider(DEFAULT_CONFIG).model).toBe(DEFAULT_CONFIG.default_model);
  });

  it("falls back to the provider's default for another vendor's model", () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    const provider = createLLMProvider({ ...DEFAULT_CONFIG, default_provider: 'openai' });

    expect(provider.model).toBe('gpt-4o');
  });
});

describe('createEmbeddingProvider', () => {
  it('carries the embedding section into the adapter', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    const embedder = createEmbeddingProvider(DEFAULT_CONFIG);

    expect(embedder).toBeInstanceOf(OpenAIEmbeddingProvider);
    expect(embedder.model).toBe('text-embedding-3-small');
    expect(embedder.dimensions).toBe(1536);
  });
});

describe('normalizeAnthropicMessage', () => {
  it('returns the joined text as a final answer', () => {
    expect(
      normalizeAnthropicMessage({
        stop_reason: 'end_turn',
        content: [
          { type: 'text', text: 'Hello ' },
          { type: 'text', text: 'there' },
        ],
      })
    ).toEqual({ type: 'final_answer', text: 'Hello there' });
  });

  it('returns tool calls with their preamble text', () => {
    expect(
      normalizeAnthropicMessage({
        stop_reason: 'tool_use',
        content: [
          { type: 'text', text: 'Let me check.' },
          { type: 'tool_use', id: 'toolu_1', name: 'echo', input: { x: 1 } },
        ],
      })
    ).toEqual({
      type: 'tool_use',
      calls: [{ id: 'toolu_1', name: 'echo', input: { x: 1 } }],
      text: 'Let me check.',
    });
  });

  it('replaces a non-object tool input with {}', () => {
    const outcome = normalizeAnthropicMessage({
      stop_reason: 'tool_use',
      content: [{ type: 'tool_use', id: 'toolu_2', name: 'list', input: 'oops' }],
    });

    expect(outcome).toEqual({ type: 'tool_use', calls: [{ id: 'toolu_2', name: 'list', input: {} }] });
  });

  it('throws when stop_reason claims tool use without a block', () => {
    expect(() => normalizeAnthropicMessage({ stop_reason: 'tool_use', content: [] })).toThrow(
      ProviderError
    );
  });
});

describe('normalizeOpenAICompletion', () => {
  it('returns message content as a final answer', () => {
    expect(
      normalizeOpenAICompletion({
        choices: [{ finish_reason: 'stop', message: { content: 'Hi' } }],
      })
    ).toEqual({ type: 'final_answer', text: 'Hi' });
  });

  it('parses tool call arguments', () => {
    expect(
      normalizeOpenAICompletion({
        choices: [
          {
            finish_reason: 'tool_calls',
            message: {
              content: null,
              tool_calls: [
                { id: 'call_1', function: { name: 'echo', arguments: '{"x":1}' } },
                { id: 'call_2', function: { name: 'now', arguments: '' } },
              ],
            },
          },
        ],
      })
    ).toEqual({
      type: 'tool_use',
      calls: [
        { id: 'call_1', name: 'echo', input: { x: 1 } },
        { id: 'call_2', name: 'now', input: {} },
      ],
    });
  });

  it('throws ProviderError for malformed arguments', () => {
    const completion = {
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: 'call_1', function: { name: 'echo', arguments: '{x:' } }],
          },
        },
      ],
    };

    expect(() => normalizeOpenAICompletion(completion)).toThrow(
      'openai tools failed: arguments for tool "echo" are not valid JSON'
    );
  });

  it('throws ProviderError when there are no choices', () => {
    expect(() => normalizeOpenAICompletion({ choices: [] })).toThrow(ProviderError);
  });
});

describe('ProviderError', () => {
  it('wraps errors once, keeping the cause', () => {
    const cause = new Error('socket hang up');
    const wrapped = ProviderError.wrap('anthropic', 'generate', cause);

    expect(wrapped.message).toBe('anthropic generate failed: socket hang up');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.code).toBe(8);
    expect(ProviderError.wrap('anthropic', 'generate', wrapped)).toBe(wrapped);
  });

  it('recognizes abort errors', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('other'))).toBe(false);
  });
});
