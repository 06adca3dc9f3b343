/**
 * Agent Module
 *
 * Routing, answer synthesis and the query state machine, plus the
 * pipeline facade that wires them to the indexer and retriever.
 *
 * @example
 * ```typescript
 * import { createPipeline } from './agent/index.js';
 *
 * const pipeline = createPipeline(config, { completion, embedding, weather });
 * await pipeline.indexDocument('s1', documentText);
 * const { route, answer, error } = await pipeline.answer('What is covered?', 's1');
 * ```
 */

export { QueryRouter, type QueryRouterConfig } from './router.js';
export {
  Synthesizer,
  RAG_SYSTEM_PROMPT,
  WEATHER_SYSTEM_PROMPT,
  buildRagPrompt,
  buildWeatherPrompt,
  insufficientContextAnswer,
} from './synthesizer.js';
export { AgentExecutor, toAnswerResult, type AgentExecutorDeps } from './executor.js';
export {
  AnswerPipeline,
  createPipeline,
  buildPipeline,
  type PipelineCapabilities,
  type BuildPipelineOptions,
  type BuiltPipeline,
} from './pipeline.js';
export type {
  Route,
  RouteSignals,
  RouteDecision,
  AgentStatus,
  AgentError,
  AgentState,
  AnswerResult,
  SynthesisContext,
} from './types.js';
