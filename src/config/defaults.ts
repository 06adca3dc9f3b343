/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Terms that send a query to the weather lookup.
 * Matched case-insensitively on word boundaries.
 */
export const DEFAULT_WEATHER_KEYWORDS = [
  'weather',
  'temperature',
  'forecast',
  'rain',
  'raining',
  'snow',
  'snowing',
  'sunny',
  'humid',
  'humidity',
  'wind',
  'windy',
  'degrees',
  'celsius',
  'fahrenheit',
];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  // Groq's OpenAI-compatible endpoint with a small, fast Llama model
  default_provider: 'openai-compatible',
  default_model: 'llama-3.1-8b-instant',

  llm: {
    temperature: 0.2,
    max_tokens: 1024,
  },

  // Local embeddings through Ollama: no API cost, 768 dimensions
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    batch_size: 32,
    timeout_ms: 60000,
  },

  vector_store: {
    provider: 'memory',
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  retrieval: {
    top_k: 8,
  },

  router: {
    weather_keywords: DEFAULT_WEATHER_KEYWORDS,
  },

  weather: {
    base_url: 'https://api.openweathermap.org/data/2.5/weather',
    units: 'metric',
    timeout_ms: 10000,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.skydoc/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# SkyDoc Configuration
# Location: ~/.skydoc/config.toml
# API keys are read from the environment (or a .env file), never from here.

# LLM Settings
# Providers: "openai-compatible" (Groq by default), "anthropic", "openai", "ollama"
default_provider = "${DEFAULT_CONFIG.default_provider}"
default_model = "${DEFAULT_CONFIG.default_model}"

[llm]
temperature = ${DEFAULT_CONFIG.llm.temperature}
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
# fallback_providers = ["openai", "ollama"]

# Embedding Settings
# The same model must be used for indexing and querying.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
# dimensions = 768   # inferred from the model name when omitted
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Vector Store
# "memory" keeps indexes in-process; "qdrant" uses a Qdrant server (QDRANT_URL)
[vector_store]
provider = "${DEFAULT_CONFIG.vector_store.provider}"

# Chunking (characters)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

# Retrieval
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}

# Routing
# Queries containing any of these words go to the weather lookup
[router]
weather_keywords = [${DEFAULT_WEATHER_KEYWORDS.map((k) => `"${k}"`).join(', ')}]

# Weather (OpenWeatherMap, key in OPENWEATHER_API_KEY)
[weather]
base_url = "${DEFAULT_CONFIG.weather.base_url}"
units = "${DEFAULT_CONFIG.weather.units}"
timeout_ms = ${DEFAULT_CONFIG.weather.timeout_ms}
`;
