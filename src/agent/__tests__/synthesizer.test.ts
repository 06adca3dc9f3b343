/**
 * Synthesizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  Synthesizer,
  RAG_SYSTEM_PROMPT,
  WEATHER_SYSTEM_PROMPT,
  insufficientContextAnswer,
} from '../synthesizer.js';
import type { RetrievedContext } from '../../search/types.js';
import { UpstreamCapabilityError } from '../../errors/index.js';
import { RecordingCompletionProvider } from '../../test-utils/index.js';

function contextOf(...texts: string[]): RetrievedContext {
  return texts.map((text, position) => ({
    chunk: { id: `chunk-${position}`, text, position },
    score: 1 - position / 10,
  }));
}

describe('Synthesizer', () => {
  it('returns the canned answer for empty context without calling completion', async () => {
    const completion = new RecordingCompletionProvider();

    const answer = await new Synthesizer(completion).synthesize('What is X?', []);

    expect(answer).toBe(
      "I could not find any relevant information in the indexed document for the query: 'What is X?'"
    );
    expect(answer).toBe(insufficientContextAnswer('What is X?'));
    expect(completion.calls).toEqual([]);
  });

  it('sends retrieved chunks verbatim with the context-only instruction', async () => {
    const completion = new RecordingCompletionProvider('From the context: X is Y.');

    const answer = await new Synthesizer(completion).synthesize(
      'What is X?',
      contextOf('X is Y.', 'Z follows X.')
    );

    expect(answer).toBe('From the context: X is Y.');
    expect(completion.calls).toEqual([
      {
        prompt: 'Question: What is X?\n\nContext:\nX is Y.\n\nZ follows X.',
        options: { system: RAG_SYSTEM_PROMPT },
      },
    ]);
  });

  it('sends the weather payload as JSON', async () => {
    const completion = new RecordingCompletionProvider('Mild and rainy.');

    await new Synthesizer(completion).synthesize('Weather in Berlin?', {
      locationName: 'Berlin',
      temperature: 12.5,
      condition: 'light rain',
    });

    expect(completion.calls[0]?.prompt).toBe(
      'Question: Weather in Berlin?\n\nWeather data:\n' +
        '{\n  "locationName": "Berlin",\n  "temperature": 12.5,\n  "condition": "light rain"\n}'
    );
    expect(completion.calls[0]?.options.system).toBe(WEATHER_SYSTEM_PROMPT);
  });

  it('wraps completion failures', async () => {
    const completion = new RecordingCompletionProvider(() => {
      throw new Error('rate limited');
    });

    const error = await new Synthesizer(completion)
      .synthesize('q', contextOf('text'))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamCapabilityError);
    if (error instanceof UpstreamCapabilityError) {
      expect(error.capability).toBe('completion');
      expect(error.message).toBe('completion call failed: rate limited');
    }
  });
});
