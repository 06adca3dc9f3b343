/**
 * Provider Credential Validation Tests
 *
 * Tests for src/providers/validation.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateAnthropicKey,
  validateOpenAIKey,
  validateOpenAICompatible,
  validateOllamaHostUrl,
  validateProviderKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  HttpUrlSchema,
} from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';

function resetEnv(): void {
  _clearEnvCache();
  vi.unstubAllEnvs();
  for (const key of [
    'ANTHROPIC_API_KEY',
    'OPENAI_API_KEY',
    'GROQ_API_KEY',
    'OPENAI_COMPATIBLE_API_KEY',
    'OPENAI_COMPATIBLE_BASE_URL',
    'OLLAMA_HOST',
  ]) {
    vi.stubEnv(key, '');
  }
}

beforeEach(resetEnv);

afterEach(() => {
  _clearEnvCache();
  vi.unstubAllEnvs();
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
      expect(result.error).toContain('sk-ant-');
      expect(result.setupInstructions).toContain('console.anthropic.com');
    }
  });

  it('returns setup instructions when the key is missing', () => {
    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
      expect(result.setupInstructions).toContain('ANTHROPIC_API_KEY');
    }
  });
});

describe('OpenAI Key Validation', () => {
  it('accepts project-scoped keys', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-proj-test-secret');

    expect(validateOpenAIKey().valid).toBe(true);
  });

  it('rejects a key without the sk- prefix', () => {
    vi.stubEnv('OPENAI_API_KEY', 'not-an-openai-key');

    const result = validateOpenAIKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toContain('sk-');
    }
  });
});

describe('OpenAI-compatible Validation', () => {
  it('accepts a Groq key alone', () => {
    vi.stubEnv('GROQ_API_KEY', 'test-secret');

    expect(validateOpenAICompatible()).toEqual({ valid: true });
  });

  it('requires a base URL when only OPENAI_COMPATIBLE_API_KEY is set', () => {
    vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-secret');

    const result = validateOpenAICompatible();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('OPENAI_COMPATIBLE_BASE_URL environment variable is not set');
    }
  });

  it('rejects a non-HTTP base URL', () => {
    vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-secret');
    vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', 'ftp://llm.example.com');

    const result = validateOpenAICompatible();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('OPENAI_COMPATIBLE_BASE_URL: URL must use http:// or https://');
    }
  });

  it('reports a missing key', () => {
    const result = validateOpenAICompatible();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.setupInstructions).toContain('GROQ_API_KEY');
    }
  });
});

describe('Ollama Host Validation', () => {
  it('accepts the default host', () => {
    expect(validateProviderKey('ollama')).toEqual({ valid: true });
  });

  it('rejects a malformed host', () => {
    const result = validateOllamaHostUrl('not a url');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toContain('Invalid Ollama host URL');
      expect(result.setupInstructions).toContain('ollama serve');
    }
  });
});

describe('validateProviderKey()', () => {
  it('dispatches to the provider validator', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    expect(validateProviderKey('openai').valid).toBe(true);
    expect(validateProviderKey('anthropic').valid).toBe(false);
  });
});

describe('getProviderKey()', () => {
  it('returns the key after validation', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    expect(getProviderKey('anthropic')).toBe('sk-ant-test-secret');
  });

  it('returns the Groq key for openai-compatible', () => {
    vi.stubEnv('GROQ_API_KEY', 'test-secret');

    expect(getProviderKey('openai-compatible')).toBe('test-secret');
  });

  it('throws with setup instructions when the key is invalid', () => {
    vi.stubEnv('OPENAI_API_KEY', 'bad-key');

    expect(() => getProviderKey('openai')).toThrow('Invalid OpenAI API key format');
  });
});

describe('Schemas', () => {
  it('validate formats directly', () => {
    expect(AnthropicKeySchema.safeParse('sk-ant-x').success).toBe(true);
    expect(OpenAIKeySchema.safeParse('').success).toBe(false);
    expect(HttpUrlSchema.safeParse('http://localhost:11434').success).toBe(true);
  });
});
