/**
 * API Key Validation Tests
 *
 * Tests for src/providers/validation.ts
 * Verifies key format validation and error messages.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateAnthropicKey,
  validateOpenAIKey,
  validateProviderKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
} from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';

function resetEnv(): void {
  vi.unstubAllEnvs();
  vi.stubEnv('ANTHROPIC_API_KEY', '');
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('OPENAI_BASE_URL', '');
  _clearEnvCache();
}

beforeEach(resetEnv);

afterEach(() => {
  vi.unstubAllEnvs();
  _clearEnvCache();
});

describe('Anthropic Key Validation', () => {
  it('accepts a key with the sk-ant- prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    expect(validateAnthropicKey()).toEqual({ valid: true });
  });

  it('rejects a key without the sk-ant- prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'wrong-prefix-key');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Anthropic API key format (should start with "sk-ant-")');
      expect(result.setupInstructions).toContain('console.anthropic.com');
    }
  });

  it('returns setup instructions when the key is missing', () => {
    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
      expect(result.setupInstructions).toContain('export ANTHROPIC_API_KEY');
    }
  });
});

describe('OpenAI Key Validation', () => {
  it.each(['sk-test-secret', 'sk-proj-test-secret', 'sk-svcacct-test-secret'])(
    'accepts %s',
    (key) => {
      vi.stubEnv('OPENAI_API_KEY', key);

      expect(validateOpenAIKey().valid).toBe(true);
    }
  );

  it('rejects a key without the sk- prefix', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const result = validateOpenAIKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toContain('sk-');
    }
  });

  it('only checks presence when a compatible base URL is configured', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:8000/v1');

    expect(validateOpenAIKey().valid).toBe(true);
  });
});

describe('validateProviderKey()', () => {
  it('dispatches by provider', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    expect(validateProviderKey('anthropic').valid).toBe(true);
    expect(validateProviderKey('openai').valid).toBe(false);
  });
});

describe('getProviderKey()', () => {
  it('returns the key when valid', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    expect(getProviderKey('openai')).toBe('sk-test-secret');
  });

  it('throws APIKeyError when the key is missing', () => {
    expect(() => getProviderKey('anthropic')).toThrow(APIKeyError);
  });

  it('throws APIKeyError with the format problem when the key is malformed', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    expect(() => getProviderKey('anthropic')).toThrow(
      'Invalid Anthropic API key format (should start with "sk-ant-")'
    );
  });
});

describe('Schema Validation (unit tests)', () => {
  it('AnthropicKeySchema', () => {
    expect(AnthropicKeySchema.safeParse('sk-ant-x').success).toBe(true);
    expect(AnthropicKeySchema.safeParse('').success).toBe(false);
    expect(AnthropicKeySchema.safeParse('sk-x').success).toBe(false);
  });

  it('OpenAIKeySchema', () => {
    expect(OpenAIKeySchema.safeParse('sk-proj-x').success).toBe(true);
    expect(OpenAIKeySchema.safeParse('pk-x').success).toBe(false);
  });
});

describe('Security', () => {
  it('error messages never contain the actual key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'invalid-test-secret');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).not.toContain('invalid-test-secret');
      expect(result.setupInstructions).not.toContain('invalid-test-secret');
    }
  });
});
