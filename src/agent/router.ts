/**
 * Query Router
 *
 * Chooses a fulfillment path from keyword signals, an "in <place>" phrase
 * and index availability. No LLM calls and no side effects: identical
 * inputs always give the identical decision.
 *
 * Precedence:
 * 1. A weather keyword together with a place -> WEATHER (even when an index exists)
 * 2. Otherwise an index for the session -> RAG
 * 3. Otherwise a weather keyword alone -> WEATHER (fails asking for a place)
 * 4. Otherwise -> UNSUPPORTED
 *
 * @example
 * ```typescript
 * const router = new QueryRouter({ weatherKeywords: config.router.weather_keywords });
 *
 * router.classify('Will it rain in Oslo tomorrow?', true);
 * // { route: 'WEATHER', signals: { matchedKeywords: ['rain'], hasLocation: true, indexAvailable: true } }
 *
 * router.classify('How many degrees of freedom does the arm have?', true);
 * // { route: 'RAG', signals: { matchedKeywords: ['degrees'], hasLocation: false, indexAvailable: true } }
 * ```
 */

import { DEFAULT_WEATHER_KEYWORDS } from '../config/defaults.js';
import { extractLocation } from '../weather/location.js';
import type { RouteDecision } from './types.js';

export interface QueryRouterConfig {
  /** Terms that select the weather path; multi-word terms match as phrases */
  weatherKeywords?: readonly string[];
}

export class QueryRouter {
  private readonly patterns: ReadonlyArray<{ keyword: string; pattern: RegExp }>;

  constructor(config: QueryRouterConfig = {}) {
    const keywords = new Set(
      (config.weatherKeywords ?? DEFAULT_WEATHER_KEYWORDS)
        .map((k) => k.trim().toLowerCase())
        .filter((k) => k.length > 0)
    );

    this.patterns = [...keywords].map((keyword) => ({
      keyword,
      // Word boundaries; inner whitespace of a phrase matches any run of spaces
      pattern: new RegExp(
        `\\b${keyword.split(/\s+/).map(escapeRegex).join('\\s+')}\\b`
      ),
    }));
  }

  classify(query: string, indexAvailable: boolean): RouteDecision {
    const normalized = query.toLowerCase();
    const matchedKeywords = this.patterns
      .filter(({ pattern }) => pattern.test(normalized))
      .map(({ keyword }) => keyword);

    const signals = {
      matchedKeywords,
      hasLocation: extractLocation(query) !== null,
      indexAvailable,
    };

    const weatherTerms = matchedKeywords.length > 0;

    if (weatherTerms && signals.hasLocation) {
      return { route: 'WEATHER', signals };
    }
    if (indexAvailable) {
      return { route: 'RAG', signals };
    }
    if (weatherTerms) {
      return { route: 'WEATHER', signals };
    }
    return { route: 'UNSUPPORTED', signals };
  }
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
