/**
 * Location Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { extractLocation } from '../location.js';

describe('extractLocation', () => {
  it.each([
    ['What is the weather in Paris today?', 'Paris'],
    ['weather in New York right now', 'New York'],
    ['Temperature in Berlin, Germany.', 'Berlin, Germany'],
    ['Is it windy in Rome please', 'Rome'],
    ['forecast in san francisco tomorrow!', 'san francisco'],
    ['How humid is it IN Lagos now?', 'Lagos'],
  ])('extracts the place from %j', (query, expected) => {
    expect(extractLocation(query)).toBe(expected);
  });

  it.each([
    ['What is the temperature in Zürich?', 'Zürich'],
    ['Is it raining in São Paulo today?', 'São Paulo'],
    ['weather in Kraków, Polska', 'Kraków, Polska'],
  ])('keeps non-ASCII letters in %j', (query, expected) => {
    expect(extractLocation(query)).toBe(expected);
  });

  it('returns null without an "in <place>" phrase', () => {
    expect(extractLocation('Is it raining?')).toBeNull();
  });

  it('does not match "in" inside a word', () => {
    expect(extractLocation('weather information')).toBeNull();
  });

  it('returns null when only a time word follows "in"', () => {
    expect(extractLocation('What is the weather in today?')).toBeNull();
  });
});
