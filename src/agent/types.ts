/**
 * Agent Types
 *
 * Route decisions, the per-query AgentState and the public AnswerResult.
 */

import type { PipelineErrorKind } from '../errors/index.js';
import type { RetrievedContext } from '../search/types.js';
import type { WeatherPayload } from '../weather/types.js';

// ============================================================================
// ROUTING
// ============================================================================

/**
 * Fulfillment path for a query.
 *
 * - WEATHER: live weather lookup
 * - RAG: answer from the session's indexed document
 * - UNSUPPORTED: neither path applies
 */
export type Route = 'WEATHER' | 'RAG' | 'UNSUPPORTED';

/**
 * Signals the router looked at. Reported for diagnostics.
 */
export interface RouteSignals {
  /** Configured weather keywords found in the query */
  matchedKeywords: string[];
  /** Query contains an "in <place>" phrase (informational only) */
  hasLocation: boolean;
  /** The session had a published index when the query was routed */
  indexAvailable: boolean;
}

/**
 * Invariant: route is 'RAG' only when signals.indexAvailable is true.
 */
export interface RouteDecision {
  route: Route;
  signals: RouteSignals;
}

// ============================================================================
// AGENT STATE
// ============================================================================

export type AgentStatus = 'START' | 'ROUTED' | 'FULFILLED' | 'ANSWERED' | 'ERROR';

export interface AgentError {
  kind: PipelineErrorKind;
  message: string;
}

/**
 * What the synthesizer answers from.
 */
export type SynthesisContext = RetrievedContext | WeatherPayload;

/**
 * Record threaded through one query cycle.
 * Created fresh per query and owned by the executor until the cycle ends.
 */
export interface AgentState {
  readonly query: string;
  readonly sessionId: string;
  status: AgentStatus;
  route?: RouteDecision;
  context?: RetrievedContext;
  weather?: WeatherPayload;
  /** Empty unless status is ANSWERED */
  answer: string;
  error?: AgentError;
}

/**
 * Result of `answer(query, sessionId)`.
 */
export interface AnswerResult {
  /** Undefined only when the query failed before routing */
  route: Route | undefined;
  answer: string;
  /** Chunk texts (RAG), a one-line weather summary (WEATHER), or nothing */
  contextUsed: string[];
  error: AgentError | null;
}
