/**
 * Vector Index
 *
 * Owns the session -> IndexHandle mapping on top of a VectorStore.
 *
 * - Writers (replace, endSession) are serialized per session on a promise chain.
 * - Every re-index writes a brand-new generation collection and only then
 *   swaps the handle, so readers see exactly one complete generation.
 * - Readers hold a lease for the duration of their callback; a retired
 *   collection is deleted when its last lease is released.
 */

import { createHash } from 'node:crypto';

import {
  callCapability,
  EmbeddingDimensionMismatchError,
  NoIndexError,
  UpstreamCapabilityError,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type { IndexHandle, VectorMatch, VectorPoint, VectorStore } from './types.js';

function noop(): void {}

/**
 * Collection id for one generation of a session's index.
 *
 * The hash keeps ids distinct for session ids that sanitize to the same
 * string (e.g. "a b" and "a-b").
 */
export function collectionIdFor(sessionId: string, generation: number): string {
  const sanitized =
    sessionId
      .toLowerCase()
      .replace(/[^a-z0-9_-]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, 48) || 'anon';
  const hash = createHash('sha256').update(sessionId).digest('hex').slice(0, 8);
  return `session-${sanitized}-${hash}-g${generation}`;
}

/**
 * @example
 * ```typescript
 * const index = new VectorIndex(new InMemoryVectorStore(), logger);
 * await index.replace('session-1', points, 768);
 * const matches = await index.withHandle('session-1', (handle) =>
 *   index.search(handle, queryVector, 4)
 * );
 * ```
 */
export class VectorIndex {
  /** Published handle per session */
  private handles = new Map<string, IndexHandle>();

  /** Tail of each session's writer chain */
  private writers = new Map<string, Promise<void>>();

  /** Last generation number handed out per session (never reset) */
  private generations = new Map<string, number>();

  /** Active readers per collection id */
  private leases = new Map<string, number>();

  /** Collections swapped out while still leased */
  private retired = new Set<string>();

  constructor(
    private readonly store: VectorStore,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Name of the backing store, for status output */
  get storeName(): string {
    return this.store.name;
  }

  has(sessionId: string): boolean {
    return this.handles.has(sessionId);
  }

  getHandle(sessionId: string): IndexHandle | undefined {
    return this.handles.get(sessionId);
  }

  /**
   * Build a new generation from `points` and publish it for the session.
   *
   * Nothing is published if any store call fails or the stored point count
   * differs from `points.length`; the half-written collection is dropped and
   * the previous generation stays current.
   *
   * @throws EmbeddingDimensionMismatchError if a point has the wrong length
   * @throws UpstreamCapabilityError (capability 'vector-store') if the store fails
   */
  replace(
    sessionId: string,
    points: readonly VectorPoint[],
    dimensions: number
  ): Promise<IndexHandle> {
    return this.enqueue(sessionId, () => this.build(sessionId, points, dimensions));
  }

  /**
   * Run `fn` against the session's current handle, keeping its collection
   * alive until `fn` settles even if a re-index swaps it out meanwhile.
   *
   * @throws NoIndexError if the session has no published index
   */
  async withHandle<T>(sessionId: string, fn: (handle: IndexHandle) => Promise<T>): Promise<T> {
    const handle = this.handles.get(sessionId);
    if (!handle) {
      throw new NoIndexError(sessionId);
    }

    this.leases.set(handle.collectionId, (this.leases.get(handle.collectionId) ?? 0) + 1);
    try {
      return await fn(handle);
    } finally {
      await this.release(handle.collectionId);
    }
  }

  /**
   * Nearest neighbours in the handle's collection, best first.
   */
  search(handle: IndexHandle, vector: readonly number[], limit: number): Promise<VectorMatch[]> {
    return callCapability('vector-store', () =>
      this.store.search(handle.collectionId, vector, limit)
    );
  }

  /**
   * Unpublish the session's index. Its collection is dropped once idle.
   *
   * @returns true if the session had an index
   */
  endSession(sessionId: string): Promise<boolean> {
    return this.enqueue(sessionId, async () => {
      const handle = this.handles.get(sessionId);
      if (!handle) {
        return false;
      }
      this.handles.delete(sessionId);
      await this.retire(handle.collectionId);
      this.logger.debug?.(`Ended session ${sessionId} (${handle.collectionId})`);
      return true;
    });
  }

  /** Number of readers currently holding a collection */
  leaseCount(collectionId: string): number {
    return this.leases.get(collectionId) ?? 0;
  }

  /**
   * Chain `task` behind the session's previous writer.
   * A failed writer does not block the next one.
   */
  private enqueue<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writers.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    this.writers.set(sessionId, run.then(noop, noop));
    return run;
  }

  private async build(
    sessionId: string,
    points: readonly VectorPoint[],
    dimensions: number
  ): Promise<IndexHandle> {
    for (const point of points) {
      if (point.vector.length !== dimensions) {
        throw new EmbeddingDimensionMismatchError(dimensions, point.vector.length);
      }
    }

    const generation = (this.generations.get(sessionId) ?? 0) + 1;
    this.generations.set(sessionId, generation);
    const collectionId = collectionIdFor(sessionId, generation);

    await callCapability('vector-store', () =>
      this.store.createCollection(collectionId, dimensions)
    );
    try {
      await callCapability('vector-store', () => this.store.upsert(collectionId, points));
      const stored = await callCapability('vector-store', () => this.store.count(collectionId));
      if (stored !== points.length) {
        throw new UpstreamCapabilityError(
          'vector-store',
          `${collectionId} holds ${stored} points after upserting ${points.length}`
        );
      }
    } catch (error) {
      await this.drop(collectionId);
      throw error;
    }

    const handle: IndexHandle = Object.freeze({
      sessionId,
      collectionId,
      generation,
      chunkCount: points.length,
      dimensions,
      createdAt: new Date(),
    });

    const previous = this.handles.get(sessionId);
    this.handles.set(sessionId, handle);
    this.logger.debug?.(
      `Published ${collectionId} (${points.length} chunks, ${dimensions} dims)`
    );

    if (previous) {
      await this.retire(previous.collectionId);
    }
    return handle;
  }

  private async retire(collectionId: string): Promise<void> {
    if (this.leaseCount(collectionId) > 0) {
      this.retired.add(collectionId);
      return;
    }
    await this.drop(collectionId);
  }

  private async release(collectionId: string): Promise<void> {
    const remaining = this.leaseCount(collectionId) - 1;
    if (remaining > 0) {
      this.leases.set(collectionId, remaining);
      return;
    }
    this.leases.delete(collectionId);
    if (this.retired.delete(collectionId)) {
      await this.drop(collectionId);
    }
  }

  /** Delete a collection, logging instead of throwing on failure */
  private async drop(collectionId: string): Promise<void> {
    try {
      await this.store.deleteCollection(collectionId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to delete collection ${collectionId}: ${message}`);
    }
  }
}
