/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  getOpenAICompatibleConfig,
  isOpenAICompatibleConfigured,
  GROQ_BASE_URL,
  _clearEnvCache,
} from '../env.js';

/** Blank out every variable the schema reads so the host env cannot leak in */
function clearProviderEnv(): void {
  for (const key of [
    'GROQ_API_KEY',
    'ANTHROPIC_API_KEY',
    'OPENAI_API_KEY',
    'OLLAMA_HOST',
    'OPENAI_COMPATIBLE_API_KEY',
    'OPENAI_COMPATIBLE_BASE_URL',
    'OPENAI_COMPATIBLE_MODEL',
    'OPENWEATHER_API_KEY',
    'QDRANT_URL',
    'QDRANT_API_KEY',
  ]) {
    vi.stubEnv(key, '');
  }
}

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    clearProviderEnv();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads ANTHROPIC_API_KEY when set', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-key');

      expect(loadEnv().ANTHROPIC_API_KEY).toBe('sk-ant-test-key');
    });

    it('loads OPENWEATHER_API_KEY when set', () => {
      vi.stubEnv('OPENWEATHER_API_KEY', 'test-weather-key');

      expect(loadEnv().OPENWEATHER_API_KEY).toBe('test-weather-key');
    });

    it('treats empty strings as unset', () => {
      const env = loadEnv();

      expect(env.ANTHROPIC_API_KEY).toBeUndefined();
      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.QDRANT_URL).toBeUndefined();
    });

    it('trims surrounding whitespace', () => {
      vi.stubEnv('GROQ_API_KEY', '  test-groq-key  ');

      expect(loadEnv().GROQ_API_KEY).toBe('test-groq-key');
    });

    it('provides default OLLAMA_HOST when not set', () => {
      expect(loadEnv().OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('uses custom OLLAMA_HOST when set', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');

      expect(loadEnv().OLLAMA_HOST).toBe('http://192.168.1.100:11434');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'initial-value');
      loadEnv();

      vi.stubEnv('ANTHROPIC_API_KEY', 'changed-value');

      expect(loadEnv().ANTHROPIC_API_KEY).toBe('initial-value');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'initial-value');
      loadEnv();

      _clearEnvCache();
      vi.stubEnv('ANTHROPIC_API_KEY', 'new-value');

      expect(loadEnv().ANTHROPIC_API_KEY).toBe('new-value');
    });
  });

  describe('getEnv()', () => {
    it('returns the value for a specific key', () => {
      vi.stubEnv('QDRANT_URL', 'http://localhost:6333');

      expect(getEnv('QDRANT_URL')).toBe('http://localhost:6333');
    });

    it('returns default for OLLAMA_HOST when unset', () => {
      expect(getEnv('OLLAMA_HOST')).toBe('http://localhost:11434');
      expect(getOllamaHost()).toBe('http://localhost:11434');
    });
  });

  describe('hasApiKey()', () => {
    it('reports configured keys', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-test');
      vi.stubEnv('OPENWEATHER_API_KEY', 'test-weather-key');

      expect(hasApiKey('openai')).toBe(true);
      expect(hasApiKey('openweather')).toBe(true);
    });

    it('returns false when key is missing or blank', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', '   ');

      expect(hasApiKey('anthropic')).toBe(false);
      expect(hasApiKey('openai')).toBe(false);
      expect(hasApiKey('openweather')).toBe(false);
    });

    it('counts GROQ_API_KEY as an openai-compatible key', () => {
      vi.stubEnv('GROQ_API_KEY', 'test-groq-key');

      expect(hasApiKey('openai-compatible')).toBe(true);
    });
  });

  describe('getOpenAICompatibleConfig()', () => {
    it('falls back to Groq when only GROQ_API_KEY is set', () => {
      vi.stubEnv('GROQ_API_KEY', 'test-groq-key');

      expect(getOpenAICompatibleConfig()).toEqual({
        apiKey: 'test-groq-key',
        baseUrl: GROQ_BASE_URL,
        model: undefined,
      });
      expect(isOpenAICompatibleConfigured()).toBe(true);
    });

    it('prefers explicit OPENAI_COMPATIBLE_* variables', () => {
      vi.stubEnv('GROQ_API_KEY', 'test-groq-key');
      vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-compat-key');
      vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', 'https://llm.example.com/v1');
      vi.stubEnv('OPENAI_COMPATIBLE_MODEL', 'example-model');

      expect(getOpenAICompatibleConfig()).toEqual({
        apiKey: 'test-compat-key',
        baseUrl: 'https://llm.example.com/v1',
        model: 'example-model',
      });
    });

    it('is not configured without any key', () => {
      expect(isOpenAICompatibleConfigured()).toBe(false);
    });
  });
});

describe('Security', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('hasApiKey never exposes the actual key value', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-secret');

    const result = hasApiKey('anthropic');

    expect(result).toBe(true);
  });
});
