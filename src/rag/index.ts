/**
 * RAG Module Index
 *
 * Exports the indexing and retrieval pipeline.
 *
 * QUICK START:
 * ------------
 *
 * 1. Index a workspace:
 *    ```typescript
 *    const result = await coordinator.start(teamId);
 *    if (result.status === 'busy') { ... } // another job is running
 *    ```
 *
 * 2. Search for relevant context:
 *    ```typescript
 *    const context = await retriever.buildContext(userQuery, channelId);
 *    const block = formatContext(context.relevantDocs);
 *    // Add block to LLM prompt
 *    ```
 */

// Embeddings - Convert text to vectors
export {
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  DEFAULT_EMBEDDING_MODEL,
  type EmbeddingProvider,
  type EmbeddingsClient,
  type OpenAIEmbeddingProviderOptions,
} from './embeddings.js';

// Collection Store - Named collections of embedded records
export {
  JsonFileCollectionBackend,
  type CollectionBackend,
  type VectorCollection,
  type IndexRecord,
  type QueryMatch,
} from './collection-store.js';

// Vector Store - Store and search documents
export {
  VectorStore,
  matchesFilter,
  DEFAULT_COLLECTION_NAME,
  WIDENED_CANDIDATE_CAP,
  type CollectionStats,
  type EmbedderState,
  type EmbeddingProviderFactory,
  type MetadataFilter,
  type SearchResult,
  type VectorStoreOptions,
} from './vectorstore.js';

// Collector - Paginated history reads
export {
  RateLimitedPaginator,
  filterTextItems,
  type PaginatorOptions,
} from './collector.js';

// Processor - Cleaning and chunking
export {
  DocumentProcessor,
  cleanText,
  chunkText,
  buildMetadata,
  DEFAULT_CHUNK_SIZE,
  type DocumentMetadata,
  type ProcessedDocument,
} from './processor.js';

// Indexer - Single-job indexing coordinator
export {
  IndexingCoordinator,
  INDEXING_BUSY_MESSAGE,
  INDEXING_CANCELLED_MESSAGE,
  INDEXING_SUCCESS_MESSAGE,
  type IndexingCoordinatorOptions,
  type IndexingProgress,
  type IndexingResult,
  type IndexingTally,
  type ProgressSnapshot,
  type StartOptions,
} from './indexer.js';

// Retriever - Scoped semantic search
export {
  RetrievalContextBuilder,
  formatContext,
  formatResult,
  DEFAULT_SEARCH_RESULTS,
  type RetrievalContext,
  type SearchScope,
} from './retriever.js';
