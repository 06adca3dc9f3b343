/**
 * Document Indexer Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DocumentIndexer } from '../document-indexer.js';
import { InMemoryVectorStore } from '../../search/memory-store.js';
import { VectorIndex } from '../../search/vector-index.js';
import {
  EmbeddingDimensionMismatchError,
  EmptyDocumentError,
  FileNotFoundError,
  UpstreamCapabilityError,
} from '../../errors/index.js';
import { HashingEmbeddingProvider } from '../../test-utils/index.js';

const DOC = 'aaaa\n\nbbbb\n\ncccc\n\ndddd\n\neeee';
const CHUNKING = { chunkSize: 6, chunkOverlap: 0 };

describe('DocumentIndexer', () => {
  let store: InMemoryVectorStore;
  let vectorIndex: VectorIndex;
  let embedder: HashingEmbeddingProvider;
  let indexer: DocumentIndexer;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    vectorIndex = new VectorIndex(store);
    embedder = new HashingEmbeddingProvider(16);
    indexer = new DocumentIndexer(vectorIndex, embedder, { chunking: CHUNKING, batchSize: 2 });
  });

  it('chunks, embeds and publishes a document', async () => {
    const handle = await indexer.index('s1', DOC);

    expect(handle).toMatchObject({ sessionId: 's1', generation: 1, chunkCount: 5, dimensions: 16 });
    expect(embedder.calls).toEqual([['aaaa', 'bbbb'], ['cccc', 'dddd'], ['eeee']]);
    expect(vectorIndex.getHandle('s1')).toBe(handle);
    expect(await store.count(handle.collectionId)).toBe(5);
  });

  it('stores chunk text and position as the payload', async () => {
    const handle = await indexer.index('s1', DOC);

    const [best] = await store.search(handle.collectionId, embedder.vectorFor('cccc'), 1);

    expect(best?.payload).toEqual({ text: 'cccc', position: 2 });
  });

  it('indexes short text as a single chunk', async () => {
    const handle = await new DocumentIndexer(vectorIndex, embedder).index('s1', 'Short note.');

    expect(handle.chunkCount).toBe(1);
  });

  it('reports embedding progress', async () => {
    const onProgress = vi.fn();

    await indexer.index('s1', DOC, { onProgress });

    expect(onProgress).toHaveBeenLastCalledWith(5, 5);
  });

  it('rejects blank text without embedding anything', async () => {
    await expect(indexer.index('s1', '  \n\t ')).rejects.toThrow(EmptyDocumentError);
    expect(embedder.calls).toEqual([]);
    expect(vectorIndex.has('s1')).toBe(false);
  });

  it('keeps the previous index when embedding fails', async () => {
    const first = await indexer.index('s1', DOC);
    vi.spyOn(embedder, 'embedBatch').mockRejectedValue(new Error('model not loaded'));

    await expect(indexer.index('s1', 'completely different text here')).rejects.toThrow(
      UpstreamCapabilityError
    );
    expect(vectorIndex.getHandle('s1')).toBe(first);
    expect(store.listCollections()).toEqual([first.collectionId]);
  });

  it('publishes nothing when vectors have the wrong length', async () => {
    const broken = new DocumentIndexer(vectorIndex, {
      name: 'broken',
      model: 'broken-test',
      dimensions: 8,
      embed: async () => [1, 0],
      embedBatch: async (texts) => texts.map(() => [1, 0]),
    });

    await expect(broken.index('s1', DOC)).rejects.toThrow(EmbeddingDimensionMismatchError);
    expect(vectorIndex.has('s1')).toBe(false);
    expect(store.listCollections()).toEqual([]);
  });

  it('replaces the previous generation on re-index', async () => {
    await indexer.index('s1', DOC);
    const second = await indexer.index('s1', 'zzzz');

    expect(second.generation).toBe(2);
    expect(store.listCollections()).toEqual([second.collectionId]);
  });

  describe('indexFile', () => {
    it('loads and indexes a text file', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'skydoc-indexer-'));
      try {
        const path = join(dir, 'notes.md');
        writeFileSync(path, DOC);

        const handle = await indexer.indexFile('s1', path);

        expect(handle.chunkCount).toBe(5);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('throws FileNotFoundError for a missing file', async () => {
      await expect(indexer.indexFile('s1', '/nonexistent/skydoc/doc.txt')).rejects.toThrow(
        FileNotFoundError
      );
    });
  });
});
