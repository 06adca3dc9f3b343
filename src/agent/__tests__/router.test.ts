/**
 * Query Router Tests
 */

import { describe, it, expect } from 'vitest';
import { QueryRouter } from '../router.js';

describe('QueryRouter', () => {
  const router = new QueryRouter();

  describe('weather precedence', () => {
    it.each([
      'What is the weather in Paris?',
      'Current TEMPERATURE in Oslo',
      'Is it windy in Zürich today?',
      'What does the document say about the weather in Lisbon?',
    ])('routes "%s" to WEATHER with or without an index', (query) => {
      expect(router.classify(query, true).route).toBe('WEATHER');
      expect(router.classify(query, false).route).toBe('WEATHER');
    });
  });

  describe('weather terms without a place', () => {
    it.each([
      'How many degrees of freedom does the robot arm have?',
      'Who is Snow White?',
      'Will it rain tomorrow?',
      'What does the document say about the weather model?',
    ])('routes "%s" to RAG when an index exists', (query) => {
      expect(router.classify(query, true).route).toBe('RAG');
    });

    it('routes to WEATHER without an index so the missing place is reported', () => {
      const decision = router.classify('Will it rain tomorrow?', false);

      expect(decision).toEqual({
        route: 'WEATHER',
        signals: { matchedKeywords: ['rain'], hasLocation: false, indexAvailable: false },
      });
    });

    it('reports the matched term for a document question about degrees', () => {
      const decision = router.classify('How many degrees of freedom does the robot arm have?', true);

      expect(decision).toEqual({
        route: 'RAG',
        signals: { matchedKeywords: ['degrees'], hasLocation: false, indexAvailable: true },
      });
    });
  });

  describe('queries without weather signals', () => {
    it.each([
      'Summarize the second chapter',
      'What does the document say about transformers?',
      'Who wrote this?',
    ])('routes "%s" to RAG only when an index exists', (query) => {
      expect(router.classify(query, true).route).toBe('RAG');
      expect(router.classify(query, false).route).toBe('UNSUPPORTED');
    });
  });

  it('matches keywords on word boundaries', () => {
    expect(router.classify('Draw a rainbow over Windows', false).route).toBe('UNSUPPORTED');
  });

  it('reports matched keywords in configuration order', () => {
    const decision = router.classify('Will it rain or snow?', false);

    expect(decision.signals.matchedKeywords).toEqual(['rain', 'snow']);
  });

  it('ignores a place when no weather term is present', () => {
    const decision = router.classify('Summarize the results in Section 2', true);

    expect(decision).toEqual({
      route: 'RAG',
      signals: { matchedKeywords: [], hasLocation: true, indexAvailable: true },
    });
  });

  it('uses configured keywords, case-insensitively', () => {
    const custom = new QueryRouter({ weatherKeywords: ['Pollen', 'heat wave'] });

    expect(custom.classify('pollen count today', false).route).toBe('WEATHER');
    expect(custom.classify('Is there a heat  wave coming?', false).route).toBe('WEATHER');
    expect(custom.classify('How much heat does it produce?', false).route).toBe('UNSUPPORTED');
    expect(custom.classify('What is the weather?', false).route).toBe('UNSUPPORTED');
  });

  it('is deterministic', () => {
    const query = 'Forecast for Rome in the document?';

    expect(router.classify(query, true)).toEqual(router.classify(query, true));
  });
});
