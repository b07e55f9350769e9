/**
 * Retriever Module
 *
 * Turns a user question into context for the language model: search the
 * vector store, scoped to one channel or to the whole server, and hand back
 * the hits together with what was searched.
 *
 * EXAMPLE FLOW:
 * -------------
 * User (in #engineering): "What was the decision about the new database?"
 *   ↓
 * buildContext(query, 'C042') → search filtered on { channelId: 'C042' }
 *   ↓
 * relevantDocs: [
 *   "We decided to go with PostgreSQL for its JSON support" (0.89)
 *   "The database migration will happen next quarter" (0.82)
 * ]
 */

import { createModuleLogger } from '../utils/logger.js';
import type { MetadataFilter, SearchResult, VectorStore } from './vectorstore.js';

const logger = createModuleLogger('retriever');

export const DEFAULT_SEARCH_RESULTS = 5;

export type SearchScope = 'channel' | 'server';

export interface RetrievalContext {
  query: string;
  relevantDocs: SearchResult[];
  // True whenever a search ran, even if it found nothing
  searchPerformed: boolean;
  searchScope: SearchScope;
}

export class RetrievalContextBuilder {
  private readonly vectorStore: Pick<VectorStore, 'search'>;
  private readonly defaultResults: number;

  constructor(vectorStore: Pick<VectorStore, 'search'>, options: { defaultResults?: number } = {}) {
    this.vectorStore = vectorStore;
    this.defaultResults = options.defaultResults ?? DEFAULT_SEARCH_RESULTS;
  }

  /**
   * Search for documents relevant to `query`. With a `channelId` only that
   * channel's messages are considered. Search errors propagate to the caller.
   */
  async buildContext(query: string, channelId?: string, nResults?: number): Promise<RetrievalContext> {
    const searchScope: SearchScope = channelId ? 'channel' : 'server';
    const filter: MetadataFilter | undefined = channelId ? { channelId } : undefined;

    const relevantDocs = await this.vectorStore.search(query, nResults ?? this.defaultResults, filter);
    logger.info(`Built ${searchScope} context with ${relevantDocs.length} relevant documents for query: "${query.substring(0, 50)}"`);

    return {
      query,
      relevantDocs,
      searchPerformed: true,
      searchScope,
    };
  }

  /**
   * One-line summary of what the context holds.
   */
  summarize(context: RetrievalContext): string {
    const where = context.searchScope === 'channel' ? 'this channel' : 'the server';

    if (context.relevantDocs.length === 0) {
      return `No relevant content found in ${where} for this query.`;
    }

    const count = context.relevantDocs.length;
    const noun = count === 1 ? 'message' : 'messages';
    return `Found ${count} relevant ${noun} from ${where} to help answer your question.`;
  }
}

/**
 * Format one search result as an attributed line.
 *
 * @example
 * formatResult(result) // "[2024-01-15 in #pricing] John: We decided to increase prices by 10%"
 */
export function formatResult(result: SearchResult): string {
  const date = result.metadata.timestamp.slice(0, 10);
  return `[${date} in #${result.metadata.channelName}] ${result.metadata.authorName}: ${result.text}`;
}

/**
 * Build a numbered block of search results for a prompt.
 * Returns an empty string when there is nothing to show.
 */
export function formatContext(docs: SearchResult[]): string {
  if (docs.length === 0) {
    return '';
  }

  return docs.map((doc, i) => `${i + 1}. ${formatResult(doc)}`).join('\n');
}
