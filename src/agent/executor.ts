/**
 * Agent Executor
 *
 * Explicit state machine for one query cycle:
 *
 *   START -> ROUTED -> FULFILLED -> ANSWERED
 *     \________\__________\______-> ERROR
 *
 * Each transition runs at most once; there are no retries. Any failure
 * ends the cycle in ERROR with `answer` left empty.
 */

import {
  LocationNotFoundError,
  NoIndexError,
  PipelineError,
  UnroutableQueryError,
  UpstreamCapabilityError,
  callCapability,
  type Capability,
} from '../errors/index.js';
import type { Retriever } from '../search/retriever.js';
import type { VectorIndex } from '../search/vector-index.js';
import { summarizeWeather } from '../weather/client.js';
import { extractLocation } from '../weather/location.js';
import type { WeatherProvider, WeatherUnits } from '../weather/types.js';
import { silentLogger, withPrefix, type Logger } from '../utils/index.js';
import type { QueryRouter } from './router.js';
import type { Synthesizer } from './synthesizer.js';
import type { AgentState, AgentStatus, AnswerResult } from './types.js';

/** Allowed transitions; ERROR and ANSWERED are terminal */
const TRANSITIONS: Record<AgentStatus, readonly AgentStatus[]> = {
  START: ['ROUTED', 'ERROR'],
  ROUTED: ['FULFILLED', 'ERROR'],
  FULFILLED: ['ANSWERED', 'ERROR'],
  ANSWERED: [],
  ERROR: [],
};

export interface AgentExecutorDeps {
  router: QueryRouter;
  vectorIndex: VectorIndex;
  retriever: Retriever;
  weather: WeatherProvider;
  synthesizer: Synthesizer;
  /** Chunks retrieved per RAG query */
  topK: number;
  logger?: Logger;
}

export class AgentExecutor {
  private readonly logger: Logger;

  constructor(private readonly deps: AgentExecutorDeps) {
    this.logger = withPrefix('agent', deps.logger ?? silentLogger);
  }

  /**
   * Run one query cycle. Never throws: failures are recorded on the
   * returned state.
   */
  async run(query: string, sessionId: string): Promise<AgentState> {
    const state: AgentState = { query, sessionId, status: 'START', answer: '' };

    try {
      this.route(state);
      await this.fulfill(state);
      await this.synthesize(state);
    } catch (error) {
      const failure =
        error instanceof PipelineError
          ? error
          : UpstreamCapabilityError.wrap(capabilityAt(state), error);
      state.answer = '';
      state.error = { kind: failure.kind, message: failure.message };
      this.transition(state, 'ERROR');
    }

    return state;
  }

  /** START -> ROUTED */
  private route(state: AgentState): void {
    if (!state.query.trim()) {
      throw new UnroutableQueryError('the query is empty');
    }
    state.route = this.deps.router.classify(state.query, this.deps.vectorIndex.has(state.sessionId));
    this.transition(state, 'ROUTED');
  }

  /** ROUTED -> FULFILLED */
  private async fulfill(state: AgentState): Promise<void> {
    const decision = state.route;
    if (!decision) {
      throw new UnroutableQueryError('the query was not routed');
    }

    switch (decision.route) {
      case 'WEATHER': {
        const location = extractLocation(state.query);
        if (!location) {
          throw new LocationNotFoundError(state.query);
        }
        state.weather = await callCapability('weather', () => this.deps.weather.fetch(location));
        break;
      }
      case 'RAG':
        state.context = await this.deps.retriever.retrieve(
          state.query,
          state.sessionId,
          this.deps.topK
        );
        break;
      case 'UNSUPPORTED':
        if (!decision.signals.indexAvailable) {
          throw new NoIndexError(state.sessionId);
        }
        throw new UnroutableQueryError('no fulfillment path matches the query');
    }

    this.transition(state, 'FULFILLED');
  }

  /** FULFILLED -> ANSWERED */
  private async synthesize(state: AgentState): Promise<void> {
    const context = state.weather ?? state.context;
    if (!context) {
      throw new UnroutableQueryError('no context was gathered for the query');
    }
    state.answer = await this.deps.synthesizer.synthesize(state.query, context);
    this.transition(state, 'ANSWERED');
  }

  private transition(state: AgentState, to: AgentStatus): void {
    if (!TRANSITIONS[state.status].includes(to)) {
      throw new Error(`Invalid agent transition: ${state.status} -> ${to}`);
    }
    const detail = to === 'ROUTED' && state.route ? ` (${state.route.route})` : '';
    this.logger.debug?.(`${state.status} -> ${to}${detail}`);
    state.status = to;
  }
}

/** Capability blamed for an untyped failure, by the step that was running */
function capabilityAt(state: AgentState): Capability {
  if (state.status === 'ROUTED') {
    return state.route?.route === 'WEATHER' ? 'weather' : 'vector-store';
  }
  return 'completion';
}

/**
 * Project a finished state onto the public result.
 */
export function toAnswerResult(state: AgentState, units: WeatherUnits = 'metric'): AnswerResult {
  let contextUsed: string[] = [];
  if (state.context) {
    contextUsed = state.context.map(({ chunk }) => chunk.text);
  } else if (state.weather) {
    contextUsed = [summarizeWeather(state.weather, units)];
  }

  return {
    route: state.route?.route,
    answer: state.status === 'ANSWERED' ? state.answer : '',
    contextUsed,
    error: state.error ?? null,
  };
}
