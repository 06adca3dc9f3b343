/**
 * Location Extraction
 *
 * Pulls a place name out of phrases like "weather in Paris today?".
 */

const LOCATION_PATTERN = /\bin\s+([\p{L}\p{N}\s,\-.]+)/iu;
const TRAILING_TIME_WORDS = /(?:\s+|^)(?:right now|today|tomorrow|now|please)\s*$/i;
const TRAILING_PUNCTUATION = /[\s.,!?;:\\/-]+$/;

/**
 * Extract the location that follows "in", or null when there is none.
 *
 * @example
 * ```typescript
 * extractLocation('What is the weather in Paris today?'); // 'Paris'
 * extractLocation('Is it raining?');                      // null
 * ```
 */
export function extractLocation(query: string): string | null {
  const match = LOCATION_PATTERN.exec(query);
  let location = match?.[1];
  if (location === undefined) {
    return null;
  }

  let previous: string;
  do {
    previous = location;
    location = location.replace(TRAILING_PUNCTUATION, '').replace(TRAILING_TIME_WORDS, '');
  } while (location !== previous);

  location = location.trim();
  return location.length > 0 ? location : null;
}
