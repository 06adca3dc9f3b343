/**
 * Agent Executor Tests
 *
 * State transitions and error capture.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AgentExecutor, toAnswerResult } from '../executor.js';
import { QueryRouter } from '../router.js';
import { Synthesizer } from '../synthesizer.js';
import { InMemoryVectorStore } from '../../search/memory-store.js';
import { Retriever } from '../../search/retriever.js';
import { VectorIndex } from '../../search/vector-index.js';
import { DocumentIndexer } from '../../indexer/document-indexer.js';
import { WeatherAPIError } from '../../weather/client.js';
import type { Logger } from '../../utils/index.js';
import {
  HashingEmbeddingProvider,
  RecordingCompletionProvider,
  StubWeatherProvider,
} from '../../test-utils/index.js';

interface Harness {
  executor: AgentExecutor;
  indexer: DocumentIndexer;
  completion: RecordingCompletionProvider;
  weather: StubWeatherProvider;
}

function createHarness(
  options: {
    completion?: RecordingCompletionProvider;
    weather?: StubWeatherProvider;
    logger?: Logger;
  } = {}
): Harness {
  const embedding = new HashingEmbeddingProvider(32);
  const vectorIndex = new VectorIndex(new InMemoryVectorStore());
  const completion = options.completion ?? new RecordingCompletionProvider('the answer');
  const weather = options.weather ?? new StubWeatherProvider();

  const executor = new AgentExecutor({
    router: new QueryRouter(),
    vectorIndex,
    retriever: new Retriever(vectorIndex, embedding),
    weather,
    synthesizer: new Synthesizer(completion),
    topK: 4,
    logger: options.logger,
  });

  return { executor, indexer: new DocumentIndexer(vectorIndex, embedding), completion, weather };
}

describe('AgentExecutor', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  it('walks START -> ROUTED -> FULFILLED -> ANSWERED', async () => {
    const debug = vi.fn();
    const { executor, indexer } = createHarness({ logger: { warn: vi.fn(), debug } });
    await indexer.index('s1', 'Some document text.');

    const state = await executor.run('What does it say?', 's1');

    expect(state.status).toBe('ANSWERED');
    expect(state.answer).toBe('the answer');
    expect(state.error).toBeUndefined();
    expect(debug.mock.calls.map(([message]) => message)).toEqual([
      '[agent] START -> ROUTED (RAG)',
      '[agent] ROUTED -> FULFILLED',
      '[agent] FULFILLED -> ANSWERED',
    ]);
  });

  it('records the retrieved context on the state', async () => {
    await harness.indexer.index('s1', 'Some document text.');

    const state = await harness.executor.run('What does it say?', 's1');

    expect(state.context?.map((c) => c.chunk.text)).toEqual(['Some document text.']);
    expect(state.weather).toBeUndefined();
  });

  it('fails with LocationNotFoundError when a weather query names no place', async () => {
    const state = await harness.executor.run('Is it going to rain?', 's1');

    expect(state.status).toBe('ERROR');
    expect(state.route?.route).toBe('WEATHER');
    expect(state.error).toEqual({
      kind: 'LocationNotFoundError',
      message: 'Could not find a location in: "Is it going to rain?"',
    });
    expect(harness.weather.locations).toEqual([]);
  });

  it('wraps weather failures as upstream errors', async () => {
    const { executor } = createHarness({
      weather: new StubWeatherProvider({}, new WeatherAPIError('OPENWEATHER_API_KEY is not set.')),
    });

    const state = await executor.run('Weather in Lisbon?', 's1');

    expect(state.error).toEqual({
      kind: 'UpstreamCapabilityError',
      message: 'weather call failed: OPENWEATHER_API_KEY is not set.',
    });
    expect(state.answer).toBe('');
  });

  it('leaves the answer empty when synthesis fails', async () => {
    const { executor, indexer } = createHarness({
      completion: new RecordingCompletionProvider(() => {
        throw new Error('timeout');
      }),
    });
    await indexer.index('s1', 'Some document text.');

    const state = await executor.run('What does it say?', 's1');

    expect(state.status).toBe('ERROR');
    expect(state.answer).toBe('');
    expect(state.error?.message).toBe('completion call failed: timeout');
    expect(state.context).toHaveLength(1);
  });

  it('rejects a blank query before routing', async () => {
    const state = await harness.executor.run('   ', 's1');

    expect(state.status).toBe('ERROR');
    expect(state.route).toBeUndefined();
    expect(state.error?.kind).toBe('UnroutableQueryError');
    expect(toAnswerResult(state).route).toBeUndefined();
  });

  it('creates a fresh state for every run', async () => {
    const first = await harness.executor.run('Weather in Rome?', 's1');
    const second = await harness.executor.run('Weather in Rome?', 's1');

    expect(first).not.toBe(second);
    expect(second.status).toBe('ANSWERED');
  });
});

describe('toAnswerResult', () => {
  it('summarizes the weather payload as context', async () => {
    const { executor } = createHarness({
      weather: new StubWeatherProvider({ temperature: 70, condition: 'sunny', country: 'US' }),
    });

    const state = await executor.run('Weather in Austin?', 's1');

    expect(toAnswerResult(state, 'imperial')).toEqual({
      route: 'WEATHER',
      answer: 'the answer',
      contextUsed: ['Austin, US: 70°F, sunny'],
      error: null,
    });
  });
});
