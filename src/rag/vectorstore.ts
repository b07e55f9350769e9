/**
 * Vector Store Module
 *
 * Stores message chunks with their embeddings in a named collection and
 * finds the chunks closest to a query.
 *
 * HOW IT WORKS:
 * -------------
 * 1. Store: embed each text, then upsert text + metadata + vector by id
 * 2. Search: embed the query and ask the collection for its nearest records
 * 3. Filter: keep only records whose metadata matches (channel, author, ...)
 *
 * FILTERING:
 * ----------
 * The collection cannot filter while it searches, so filtering happens on
 * the nearest `nResults` candidates. When too few of them match, the search
 * is repeated once over a wider candidate set (3x, capped at 50) and new
 * matches are appended. This is best effort: if matching records are rare,
 * fewer than `nResults` may come back.
 */

import { createModuleLogger } from '../utils/logger.js';
import { ArgumentMismatchError, StorageError, getErrorMessage } from '../utils/errors.js';
import type { EmbeddingProvider } from './embeddings.js';
import type { CollectionBackend, IndexRecord, QueryMatch, VectorCollection } from './collection-store.js';
import type { DocumentMetadata } from './processor.js';

const logger = createModuleLogger('vectorstore');

export const DEFAULT_COLLECTION_NAME = 'slack_knowledge';
export const WIDENED_CANDIDATE_CAP = 50;

/** Every listed key must equal the given value (compared as strings). */
export type MetadataFilter = Partial<Record<keyof DocumentMetadata, string>>;

export interface SearchResult {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  score: number;          // Cosine similarity
  distance: number;       // 1 - score
}

export interface CollectionStats {
  totalDocuments: number;
  collectionName: string;
}

export type EmbeddingProviderFactory = () => EmbeddingProvider | Promise<EmbeddingProvider>;

export type EmbedderState =
  | { status: 'uninitialized' }
  | { status: 'initializing'; ready: Promise<EmbeddingProvider> }
  | { status: 'ready'; provider: EmbeddingProvider };

export interface VectorStoreOptions {
  backend: CollectionBackend;
  embeddings: EmbeddingProviderFactory;
  collectionName?: string;
}

const METADATA_KEYS = [
  'messageId',
  'authorId',
  'authorName',
  'channelId',
  'channelName',
  'guildId',
  'guildName',
  'timestamp',
  'chunkIndex',
  'totalChunks',
] as const satisfies ReadonlyArray<keyof DocumentMetadata>;

export function matchesFilter(metadata: DocumentMetadata, filter: MetadataFilter): boolean {
  for (const key of METADATA_KEYS) {
    const expected = filter[key];
    if (expected === undefined) continue;
    if (String(metadata[key]) !== expected) return false;
  }
  return true;
}

function toSearchResult(match: QueryMatch): SearchResult {
  return {
    id: match.record.id,
    text: match.record.text,
    metadata: match.record.metadata,
    score: match.score,
    distance: 1 - match.score,
  };
}

export class VectorStore {
  readonly collectionName: string;
  private readonly backend: CollectionBackend;
  private readonly createEmbeddingProvider: EmbeddingProviderFactory;
  private embedder: EmbedderState = { status: 'uninitialized' };
  private collection: Promise<VectorCollection> | null = null;

  constructor(options: VectorStoreOptions) {
    this.backend = options.backend;
    this.createEmbeddingProvider = options.embeddings;
    this.collectionName = options.collectionName ?? DEFAULT_COLLECTION_NAME;
  }

  /**
   * Whether the embedding provider has been created yet. The first
   * add/search after construction or a clear pays for creating it.
   */
  get embedderStatus(): EmbedderState['status'] {
    return this.embedder.status;
  }

  /**
   * Embed and upsert documents. Records whose id already exists are
   * overwritten, so re-indexing the same message is idempotent.
   */
  async addDocuments(texts: string[], metadatas: DocumentMetadata[], ids: string[]): Promise<void> {
    if (texts.length !== metadatas.length || texts.length !== ids.length) {
      throw new ArgumentMismatchError({ texts: texts.length, metadatas: metadatas.length, ids: ids.length });
    }

    if (texts.length === 0) {
      logger.debug('No documents to add');
      return;
    }

    try {
      const provider = await this.getEmbeddingProvider();
      const embeddings = await provider.embed(texts);
      if (embeddings.length !== texts.length) {
        throw new Error(`Embedding provider returned ${embeddings.length} vectors for ${texts.length} texts`);
      }

      const records: IndexRecord[] = texts.map((text, i) => ({
        id: ids[i],
        text,
        metadata: metadatas[i],
        embedding: embeddings[i],
      }));

      const collection = await this.getCollection();
      await collection.upsert(records);
    } catch (error) {
      logger.error(`Failed to add documents: ${getErrorMessage(error)}`);
      throw new StorageError('addDocuments', error);
    }

    logger.info(`Added ${texts.length} documents to collection ${this.collectionName}`);
  }

  /**
   * Find the documents most similar to `query`, highest score first.
   * Errors propagate; an empty array always means "no matches".
   */
  async search(query: string, nResults: number = 5, filterMetadata?: MetadataFilter): Promise<SearchResult[]> {
    if (nResults < 1) return [];

    let matches: QueryMatch[];
    try {
      const provider = await this.getEmbeddingProvider();
      const [queryEmbedding] = await provider.embed([query]);
      if (!queryEmbedding) {
        throw new Error('Embedding provider returned no vector for the query');
      }

      const collection = await this.getCollection();
      matches = await collection.query(queryEmbedding, nResults);

      if (filterMetadata && Object.keys(filterMetadata).length > 0) {
        matches = await this.filterWithWidening(collection, queryEmbedding, matches, nResults, filterMetadata);
      }
    } catch (error) {
      logger.error(`Failed to search documents: ${getErrorMessage(error)}`);
      throw new StorageError('search', error);
    }

    logger.debug(`Search returned ${matches.length} results`);
    return matches.map(toSearchResult);
  }

  async getStats(): Promise<CollectionStats> {
    try {
      const collection = await this.getCollection();
      return {
        totalDocuments: await collection.count(),
        collectionName: this.collectionName,
      };
    } catch (error) {
      throw new StorageError('getStats', error);
    }
  }

  /**
   * Delete every record and recreate an empty collection under the same
   * name. The embedding provider is recreated on next use.
   */
  async clearCollection(): Promise<void> {
    this.collection = null;
    try {
      await this.backend.deleteCollection(this.collectionName);
      const created = this.backend.createCollection(this.collectionName);
      this.collection = created;
      await created;
    } catch (error) {
      this.collection = null;
      throw new StorageError('clearCollection', error);
    }

    this.embedder = { status: 'uninitialized' };
    logger.warn(`Cleared collection: ${this.collectionName}`);
  }

  private async filterWithWidening(
    collection: VectorCollection,
    queryEmbedding: number[],
    candidates: QueryMatch[],
    nResults: number,
    filter: MetadataFilter
  ): Promise<QueryMatch[]> {
    const filtered = candidates.filter((match) => matchesFilter(match.record.metadata, filter));

    if (filtered.length >= nResults || candidates.length <= filtered.length) {
      return filtered;
    }

    const widenedK = Math.min(nResults * 3, WIDENED_CANDIDATE_CAP);
    logger.debug(`Only ${filtered.length}/${nResults} candidates matched the filter, widening to ${widenedK}`);

    const seen = new Set(filtered.map((match) => match.record.id));
    const widened = await collection.query(queryEmbedding, widenedK);

    for (const match of widened) {
      if (filtered.length >= nResults) break;
      if (seen.has(match.record.id)) continue;
      if (!matchesFilter(match.record.metadata, filter)) continue;

      seen.add(match.record.id);
      filtered.push(match);
    }

    return filtered;
  }

  private async getCollection(): Promise<VectorCollection> {
    if (!this.collection) {
      this.collection = this.backend.getOrCreateCollection(this.collectionName);
    }

    const pending = this.collection;
    try {
      return await pending;
    } catch (error) {
      // A failed open is retried on the next call
      if (this.collection === pending) this.collection = null;
      throw error;
    }
  }

  private async getEmbeddingProvider(): Promise<EmbeddingProvider> {
    if (this.embedder.status === 'ready') {
      return this.embedder.provider;
    }
    if (this.embedder.status === 'initializing') {
      return this.embedder.ready;
    }

    logger.info('Initializing embedding provider');
    const ready = Promise.resolve().then(() => this.createEmbeddingProvider());
    this.embedder = { status: 'initializing', ready };

    try {
      const provider = await ready;
      if (this.embedder.status === 'initializing' && this.embedder.ready === ready) {
        this.embedder = { status: 'ready', provider };
      }
      return provider;
    } catch (error) {
      if (this.embedder.status === 'initializing' && this.embedder.ready === ready) {
        this.embedder = { status: 'uninitialized' };
      }
      throw error;
    }
  }
}
