/**
 * Synthesizer
 *
 * Turns a query plus its fulfillment payload into the final answer.
 * The prompt carries the payload verbatim and instructs the model to use
 * nothing else. An empty retrieval never reaches the model.
 */

import { callCapability } from '../errors/index.js';
import type { CompletionProvider } from '../providers/completion.js';
import type { RetrievedContext } from '../search/types.js';
import type { WeatherPayload } from '../weather/types.js';
import type { SynthesisContext } from './types.js';

export const RAG_SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions using only the provided document context. ' +
  'If the answer is not in the context, say that you do not know. ' +
  'Do not add facts that are not stated in the context.';

export const WEATHER_SYSTEM_PROMPT =
  'You are a helpful weather assistant. Summarize the current weather for a non-technical user ' +
  'in 2-3 sentences, using only the supplied weather data.';

/**
 * Canned reply for a RAG query that retrieved nothing.
 */
export function insufficientContextAnswer(query: string): string {
  return `I could not find any relevant information in the indexed document for the query: '${query}'`;
}

export function buildRagPrompt(query: string, context: RetrievedContext): string {
  const contextText = context.map(({ chunk }) => chunk.text).join('\n\n');
  return `Question: ${query}\n\nContext:\n${contextText}`;
}

export function buildWeatherPrompt(query: string, weather: WeatherPayload): string {
  return `Question: ${query}\n\nWeather data:\n${JSON.stringify(weather, null, 2)}`;
}

/**
 * @example
 * ```typescript
 * const synthesizer = new Synthesizer(completionProvider);
 * const answer = await synthesizer.synthesize(query, retrievedContext);
 * ```
 */
export class Synthesizer {
  constructor(private readonly completion: CompletionProvider) {}

  /**
   * @throws UpstreamCapabilityError (capability 'completion') if the model call fails
   */
  async synthesize(query: string, context: SynthesisContext): Promise<string> {
    if (Array.isArray(context)) {
      if (context.length === 0) {
        return insufficientContextAnswer(query);
      }
      return this.complete(buildRagPrompt(query, context), RAG_SYSTEM_PROMPT);
    }
    return this.complete(buildWeatherPrompt(query, context), WEATHER_SYSTEM_PROMPT);
  }

  private complete(prompt: string, system: string): Promise<string> {
    return callCapability('completion', () => this.completion.complete(prompt, { system }));
  }
}
