/**
 * Pipeline Errors
 *
 * Typed failures of the routing, indexing and retrieval pipeline.
 * The agent executor records them on AgentState.error; the CLI renders
 * them through the shared CLIError formatting.
 */

import { CLIError } from './types.js';

// ============================================================================
// ERROR KINDS
// ============================================================================

/**
 * Failure kinds reported in AgentState.error.kind.
 */
export const PipelineErrorKinds = {
  /** Indexing was asked to process a document with no text */
  EMPTY_DOCUMENT: 'EmptyDocumentError',
  /** Retrieval was needed but the session has no index */
  NO_INDEX: 'NoIndexError',
  /** No fulfillment path could serve the query */
  UNROUTABLE_QUERY: 'UnroutableQueryError',
  /** Weather path could not find a location in the query */
  LOCATION_NOT_FOUND: 'LocationNotFoundError',
  /** Query and index vectors have different dimensions */
  EMBEDDING_DIMENSION_MISMATCH: 'EmbeddingDimensionMismatchError',
  /** An external collaborator call failed */
  UPSTREAM_CAPABILITY: 'UpstreamCapabilityError',
} as const;

export type PipelineErrorKind = (typeof PipelineErrorKinds)[keyof typeof PipelineErrorKinds];

/** External capabilities whose failures are wrapped in UpstreamCapabilityError */
export type Capability = 'embedding' | 'vector-store' | 'completion' | 'weather';

// ============================================================================
// BASE CLASS
// ============================================================================

/**
 * Base class for pipeline failures.
 *
 * `kind` identifies the failure for programmatic handling; `code` stays the
 * process exit code inherited from CLIError.
 */
export class PipelineError extends CLIError {
  public readonly kind: PipelineErrorKind;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    hint?: string,
    exitCode: number = 1,
    options?: ErrorOptions
  ) {
    super(message, hint, exitCode, options);
    this.name = kind;
    this.kind = kind;
  }
}

// ============================================================================
// ERROR KINDS
// ============================================================================

export class EmptyDocumentError extends PipelineError {
  constructor(source?: string) {
    super(
      PipelineErrorKinds.EMPTY_DOCUMENT,
      source ? `Document has no text content: ${source}` : 'Document has no text content',
      'Provide a document with extractable text (scanned PDFs need OCR first)'
    );
  }
}

/**
 * Exit code 6 is shared with dimension mismatches: both mean the index
 * cannot serve the query.
 */
export class NoIndexError extends PipelineError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(
      PipelineErrorKinds.NO_INDEX,
      `No document is indexed for session "${sessionId}"`,
      'Index a document first, e.g.: skydoc ask "..." --doc ./paper.pdf',
      6
    );
    this.sessionId = sessionId;
  }
}

export class UnroutableQueryError extends PipelineError {
  constructor(reason: string) {
    super(
      PipelineErrorKinds.UNROUTABLE_QUERY,
      `Cannot answer this query: ${reason}`,
      'Ask about the weather in a city, or index a document and ask about it'
    );
  }
}

export class LocationNotFoundError extends PipelineError {
  public readonly query: string;

  constructor(query: string) {
    super(
      PipelineErrorKinds.LOCATION_NOT_FOUND,
      `Could not find a location in: "${query}"`,
      'Name the place after "in", e.g.: What is the weather in Berlin?'
    );
    this.query = query;
  }
}

export class EmbeddingDimensionMismatchError extends PipelineError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      PipelineErrorKinds.EMBEDDING_DIMENSION_MISMATCH,
      `Embedding dimension mismatch: expected ${expected} but got ${actual}`,
      'Re-index the document with the embedding model currently configured\n' +
        'or set embedding.dimensions to match the model output.',
      6
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Wraps a failure from an external capability (embedding, vector store,
 * completion, weather). The original error is kept as `cause`.
 *
 * Exit code 7: Upstream service error
 */
export class UpstreamCapabilityError extends PipelineError {
  public readonly capability: Capability;

  constructor(capability: Capability, message: string, cause?: unknown) {
    super(
      PipelineErrorKinds.UPSTREAM_CAPABILITY,
      `${capability} call failed: ${message}`,
      UPSTREAM_HINTS[capability],
      7,
      cause === undefined ? undefined : { cause }
    );
    this.capability = capability;
  }

  /**
   * Wrap an unknown thrown value, passing PipelineErrors through untouched.
   */
  static wrap(capability: Capability, error: unknown): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamCapabilityError(capability, message, error);
  }
}

const UPSTREAM_HINTS: Record<Capability, string> = {
  embedding: 'Check the embedding provider settings: skydoc config get embedding',
  'vector-store': 'Check that the vector store is reachable (QDRANT_URL) or use vector_store.provider = "memory"',
  completion: 'Check your LLM API key and provider: skydoc config get default_provider',
  weather: 'Check OPENWEATHER_API_KEY and your network connection',
};

/**
 * Run an external call and convert any failure into a typed pipeline error.
 */
export async function callCapability<T>(
  capability: Capability,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw UpstreamCapabilityError.wrap(capability, error);
  }
}

/**
 * Exit code for a failure recorded on the agent state as `{ kind, message }`.
 * Matches the `code` of the corresponding error class.
 */
export function exitCodeForKind(kind: PipelineErrorKind): number {
  switch (kind) {
    case PipelineErrorKinds.NO_INDEX:
    case PipelineErrorKinds.EMBEDDING_DIMENSION_MISMATCH:
      return 6;
    case PipelineErrorKinds.UPSTREAM_CAPABILITY:
      return 7;
    default:
      return 1;
  }
}
