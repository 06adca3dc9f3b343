/**
 * In-process stand-ins for the external capabilities.
 */

import { createHash } from 'node:crypto';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { CompletionOptions, CompletionProvider } from '../providers/completion.js';
import type { WeatherPayload, WeatherProvider } from '../weather/types.js';

/**
 * Deterministic bag-of-words embedder.
 * Each lowercase word is hashed into one bucket, so texts sharing words
 * point in similar directions. Vectors are L2-normalized.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model = 'hashing-test';
  readonly calls: string[][] = [];

  constructor(readonly dimensions = 64) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push([text]);
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = createHash('sha256').update(word).digest().readUInt32BE(0) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.hypot(...vector);
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

/**
 * Completion provider that records prompts and replies from a script.
 */
export class RecordingCompletionProvider implements CompletionProvider {
  readonly name = 'openai-compatible';
  readonly model = 'recording-test';
  readonly calls: Array<{ prompt: string; options: CompletionOptions }> = [];

  constructor(private readonly reply: string | ((prompt: string) => string) = 'test answer') {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    return typeof this.reply === 'function' ? this.reply(prompt) : this.reply;
  }
}

/**
 * Weather provider returning a fixed payload per call.
 */
export class StubWeatherProvider implements WeatherProvider {
  readonly locations: string[] = [];

  constructor(
    private readonly payload: Partial<WeatherPayload> = {},
    private readonly failure?: Error
  ) {}

  async fetch(location: string): Promise<WeatherPayload> {
    this.locations.push(location);
    if (this.failure) {
      throw this.failure;
    }
    return {
      locationName: location,
      temperature: 18,
      condition: 'clear sky',
      ...this.payload,
    };
  }
}
