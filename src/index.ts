/**
 * Slack Knowledge Bot
 *
 * Indexes Slack history into a vector collection and answers questions from
 * it. `KnowledgeBot` is the surface a command layer (slash commands, a CLI,
 * an HTTP endpoint) talks to; `createKnowledgeBot` wires it from config.
 */

import { LogLevel, WebClient } from '@slack/web-api';
import OpenAI from 'openai';
import type { Config } from './config/index.js';
import { createModuleLogger } from './utils/logger.js';
import { getErrorMessage } from './utils/errors.js';
import { SlackPlatformClient } from './channels/slack.js';
import {
  DocumentProcessor,
  IndexingCoordinator,
  JsonFileCollectionBackend,
  OpenAIEmbeddingProvider,
  RateLimitedPaginator,
  RetrievalContextBuilder,
  VectorStore,
  type CollectionStats,
  type IndexingResult,
  type MetadataFilter,
  type ProgressSnapshot,
  type RetrievalContext,
  type SearchResult,
} from './rag/index.js';
import { OpenAICompletionProvider, ResponseGenerator } from './agents/responder.js';

const logger = createModuleLogger('bot');

export interface KnowledgeBotComponents {
  coordinator: IndexingCoordinator;
  vectorStore: VectorStore;
  retriever: RetrievalContextBuilder;
  responder: ResponseGenerator;
}

export interface BotAnswer {
  text: string;
  context: RetrievalContext | null;
  // Set when the search itself failed, as opposed to finding nothing
  searchError?: string;
}

export class KnowledgeBot {
  private readonly coordinator: IndexingCoordinator;
  private readonly vectorStore: VectorStore;
  private readonly retriever: RetrievalContextBuilder;
  private readonly responder: ResponseGenerator;

  constructor(components: KnowledgeBotComponents) {
    this.coordinator = components.coordinator;
    this.vectorStore = components.vectorStore;
    this.retriever = components.retriever;
    this.responder = components.responder;
  }

  startIndexing(guildId: string, channelId?: string): Promise<IndexingResult> {
    return this.coordinator.start(guildId, channelId);
  }

  /**
   * Clear the whole index, then index the guild (or one channel) again.
   * The clear runs under the indexing lock, so a busy result means nothing
   * was cleared.
   */
  reindex(guildId: string, channelId?: string): Promise<IndexingResult> {
    return this.coordinator.start(guildId, channelId, { clearFirst: true });
  }

  cancelIndexing(): boolean {
    return this.coordinator.cancel();
  }

  isIndexingInProgress(): boolean {
    return this.coordinator.isRunning();
  }

  getIndexingProgress(): ProgressSnapshot {
    return this.coordinator.getProgress();
  }

  search(query: string, nResults: number = 5, filter?: MetadataFilter): Promise<SearchResult[]> {
    return this.vectorStore.search(query, nResults, filter);
  }

  buildContext(query: string, channelId?: string): Promise<RetrievalContext> {
    return this.retriever.buildContext(query, channelId);
  }

  summarizeContext(context: RetrievalContext): string {
    return this.retriever.summarize(context);
  }

  /**
   * Answer a question from indexed history. If the search fails the model
   * still answers from general knowledge, and `searchError` says why.
   */
  async answer(query: string, channelId?: string): Promise<BotAnswer> {
    let context: RetrievalContext | null = null;
    let searchError: string | undefined;

    try {
      context = await this.retriever.buildContext(query, channelId);
    } catch (error) {
      searchError = getErrorMessage(error);
      logger.error(`Search unavailable, answering without context: ${searchError}`);
    }

    const text = await this.responder.respond(query, context?.relevantDocs ?? []);
    return searchError === undefined ? { text, context } : { text, context, searchError };
  }

  clearIndex(): Promise<void> {
    return this.vectorStore.clearCollection();
  }

  getStats(): Promise<CollectionStats> {
    return this.vectorStore.getStats();
  }

  /**
   * Stop any running job and wait for it to let go of the index.
   */
  shutdown(): Promise<void> {
    return this.coordinator.shutdown();
  }
}

/**
 * Wire the bot against Slack, OpenAI and the JSON-file collection store.
 */
export function createKnowledgeBot(config: Config): KnowledgeBot {
  const slack = new WebClient(config.slack.botToken, {
    logLevel: config.app.logLevel === 'debug' ? LogLevel.DEBUG : LogLevel.INFO,
  });
  const openai = new OpenAI({ apiKey: config.ai.openaiApiKey });

  const platform = new SlackPlatformClient(slack);
  const vectorStore = new VectorStore({
    backend: new JsonFileCollectionBackend(config.rag.vectorDbPath),
    collectionName: config.rag.collectionName,
    embeddings: () => new OpenAIEmbeddingProvider({ client: openai, model: config.ai.embeddingModel }),
  });

  const coordinator = new IndexingCoordinator({
    platform,
    paginator: new RateLimitedPaginator(platform, {
      maxPerRequest: config.indexing.maxMessagesPerRequest,
      delayMs: config.indexing.rateLimitDelayMs,
    }),
    processor: new DocumentProcessor({ chunkSize: config.indexing.chunkSize }),
    vectorStore,
    batchSize: config.indexing.batchSize,
    batchDelayMs: config.indexing.batchDelayMs,
  });

  const responder = new ResponseGenerator(
    new OpenAICompletionProvider({
      client: openai,
      model: config.ai.chatModel,
      maxTokens: config.ai.maxTokens,
      temperature: config.ai.temperature,
    })
  );

  logger.info(`Knowledge bot configured with collection ${config.rag.collectionName}`);

  return new KnowledgeBot({
    coordinator,
    vectorStore,
    retriever: new RetrievalContextBuilder(vectorStore, { defaultResults: config.rag.maxResults }),
    responder,
  });
}

export { getConfig, loadConfig, type Config } from './config/index.js';
export * from './rag/index.js';
export * from './utils/errors.js';
export type { Channel, SourceItem, SourcePlatformClient, FetchHistoryOptions } from './channels/types.js';
export { SlackPlatformClient, normalizeSlackText } from './channels/slack.js';
export {
  ResponseGenerator,
  OpenAICompletionProvider,
  buildContextPrompt,
  formatSearchResults,
  type ChatCompletionsClient,
  type CompletionProvider,
} from './agents/responder.js';
