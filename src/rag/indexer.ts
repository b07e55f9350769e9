/**
 * Indexer Module
 *
 * Runs indexing jobs: collect a guild's (or one channel's) message history,
 * clean and chunk it, and store it in the vector store in batches.
 *
 * ONE JOB AT A TIME:
 * ------------------
 * A job holds the coordinator's mutex for its whole run. A second start()
 * while a job is running is answered immediately with a "busy" result; it
 * never waits for the lock. The lock is released on every exit path.
 *
 * PROGRESS:
 * ---------
 * Only the running job writes progress, and it always replaces the whole
 * object, so readers can poll getProgress() at any time.
 *
 * REINDEXING:
 * -----------
 * start(..., { clearFirst: true }) empties the collection inside the lock,
 * so a busy answer always means nothing was cleared.
 *
 * CANCELLATION:
 * -------------
 * cancel() is honoured at the next channel or batch boundary. Documents
 * stored before that point stay in the collection.
 */

import { Mutex } from 'async-mutex';
import { createModuleLogger } from '../utils/logger.js';
import { IndexingTargetError, getErrorMessage, logErrorWithContext } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';
import type { Channel, SourceItem, SourcePlatformClient } from '../channels/types.js';
import { filterTextItems, type RateLimitedPaginator } from './collector.js';
import type { DocumentProcessor } from './processor.js';
import type { VectorStore } from './vectorstore.js';

const logger = createModuleLogger('indexer');

// Indexing configuration
export const DEFAULT_BATCH_SIZE = 50;          // Messages per batch
export const DEFAULT_BATCH_DELAY_MS = 100;     // Pause between batches

export const INDEXING_BUSY_MESSAGE = 'Indexing already in progress';
export const INDEXING_SUCCESS_MESSAGE = 'Indexing completed successfully';
export const INDEXING_CANCELLED_MESSAGE = 'Indexing cancelled';

export interface IndexingProgress {
  status: string;
  processed: number;
  total: number;
}

/** Empty while no job is running. */
export type ProgressSnapshot = IndexingProgress | Record<string, never>;

export interface IndexingTally {
  indexedMessages: number;
  storedDocuments: number;
}

export type IndexingResult =
  | ({ status: 'completed'; success: true; message: string } & IndexingTally)
  | ({ status: 'cancelled'; success: false; message: string } & IndexingTally)
  | { status: 'busy'; success: false; message: string }
  | { status: 'failed'; success: false; message: string; error: unknown };

export interface StartOptions {
  // Empty the collection before collecting
  clearFirst?: boolean;
}

export interface IndexingCoordinatorOptions {
  platform: SourcePlatformClient;
  paginator: RateLimitedPaginator;
  processor: DocumentProcessor;
  vectorStore: Pick<VectorStore, 'addDocuments' | 'clearCollection'>;
  batchSize?: number;
  batchDelayMs?: number;
  // Cap on messages read per channel; unlimited by default
  limitPerChannel?: number;
  sleep?: Sleep;
}

class IndexingCancelledError extends Error {
  constructor() {
    super(INDEXING_CANCELLED_MESSAGE);
    this.name = 'IndexingCancelledError';
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new IndexingCancelledError();
  }
}

export class IndexingCoordinator {
  private readonly platform: SourcePlatformClient;
  private readonly paginator: RateLimitedPaginator;
  private readonly processor: DocumentProcessor;
  private readonly vectorStore: Pick<VectorStore, 'addDocuments' | 'clearCollection'>;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly limitPerChannel: number | undefined;
  private readonly sleep: Sleep;

  private readonly lock = new Mutex();
  private progress: ProgressSnapshot = {};
  private abortController: AbortController | null = null;

  constructor(options: IndexingCoordinatorOptions) {
    this.platform = options.platform;
    this.paginator = options.paginator;
    this.processor = options.processor;
    this.vectorStore = options.vectorStore;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.batchDelayMs = options.batchDelayMs ?? DEFAULT_BATCH_DELAY_MS;
    this.limitPerChannel = options.limitPerChannel;
    this.sleep = options.sleep ?? defaultSleep;
  }

  isRunning(): boolean {
    return this.lock.isLocked();
  }

  getProgress(): ProgressSnapshot {
    return { ...this.progress };
  }

  /**
   * Index every text channel of a guild, or only `channelId` when given.
   * Never throws: failures come back as a `failed` result.
   */
  async start(guildId: string, channelId?: string, options: StartOptions = {}): Promise<IndexingResult> {
    if (this.lock.isLocked()) {
      logger.warn(`Rejected indexing request for ${channelId ?? guildId}: a job is already running`);
      return { status: 'busy', success: false, message: INDEXING_BUSY_MESSAGE };
    }

    // Set before the lock resolves so cancel() works from the first moment
    const abortController = new AbortController();
    this.abortController = abortController;
    this.progress = { status: 'Starting...', processed: 0, total: 0 };
    return this.lock.runExclusive(() => this.runJob(abortController.signal, guildId, channelId, options));
  }

  /**
   * Ask the running job to stop at its next batch boundary.
   * Returns false when there is nothing to cancel.
   */
  cancel(): boolean {
    if (!this.abortController || this.abortController.signal.aborted) {
      return false;
    }
    logger.warn('Cancellation requested for running indexing job');
    this.abortController.abort();
    return true;
  }

  /**
   * Cancel any running job and wait until it has released the lock.
   */
  async shutdown(): Promise<void> {
    this.cancel();
    await this.lock.waitForUnlock();
  }

  private async runJob(
    signal: AbortSignal,
    guildId: string,
    channelId: string | undefined,
    options: StartOptions
  ): Promise<IndexingResult> {
    const tally: IndexingTally = { indexedMessages: 0, storedDocuments: 0 };
    const startTime = Date.now();

    try {
      if (options.clearFirst) {
        throwIfCancelled(signal);
        this.progress = { status: 'Clearing index...', processed: 0, total: 0 };
        await this.vectorStore.clearCollection();
      }

      const channels = await this.resolveChannels(guildId, channelId);
      const items = await this.collectItems(channels, signal);
      await this.storeInBatches(filterTextItems(items), tally, signal);

      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      logger.info(
        `Indexing complete in ${duration}s. Messages: ${tally.indexedMessages}, documents: ${tally.storedDocuments}`
      );
      return { status: 'completed', success: true, message: INDEXING_SUCCESS_MESSAGE, ...tally };
    } catch (error) {
      if (error instanceof IndexingCancelledError) {
        logger.warn(`Indexing cancelled after ${tally.indexedMessages} messages`);
        return { status: 'cancelled', success: false, message: INDEXING_CANCELLED_MESSAGE, ...tally };
      }

      logErrorWithContext(logger, error, 'indexing job', { guildId, channelId, ...tally });
      return { status: 'failed', success: false, message: `Indexing failed: ${getErrorMessage(error)}`, error };
    } finally {
      this.progress = {};
      this.abortController = null;
    }
  }

  private async resolveChannels(guildId: string, channelId?: string): Promise<Channel[]> {
    const channels = await this.platform.listChannels(guildId);

    if (channelId) {
      const channel = channels.find((c) => c.id === channelId);
      if (!channel) {
        throw new IndexingTargetError(`Channel ${channelId} not found in guild ${guildId}`);
      }
      logger.info(`Starting channel indexing for #${channel.name}`);
      return [channel];
    }

    const textChannels = channels.filter((c) => c.isText);
    logger.info(`Starting server indexing for ${guildId}: ${textChannels.length} text channels`);
    return textChannels;
  }

  private async collectItems(channels: Channel[], signal: AbortSignal): Promise<SourceItem[]> {
    const items: SourceItem[] = [];

    for (const [index, channel] of channels.entries()) {
      throwIfCancelled(signal);

      this.progress = {
        status: `Collecting messages from #${channel.name} (${index + 1}/${channels.length})`,
        processed: 0,
        total: 0,
      };

      const channelItems = await this.paginator.collect(channel, this.limitPerChannel);
      items.push(...channelItems);
      logger.info(`Collected ${channelItems.length} messages from #${channel.name}`);
    }

    logger.info(`Total messages collected: ${items.length}`);
    return items;
  }

  private async storeInBatches(items: SourceItem[], tally: IndexingTally, signal: AbortSignal): Promise<void> {
    const total = items.length;
    this.progress = { status: 'Processing messages...', processed: 0, total };

    for (let i = 0; i < total; i += this.batchSize) {
      throwIfCancelled(signal);

      const batch = items.slice(i, i + this.batchSize);
      const documents = this.processor.processBatch(batch);

      if (documents.length > 0) {
        await this.vectorStore.addDocuments(
          documents.map((doc) => doc.text),
          documents.map((doc) => doc.metadata),
          documents.map((doc) => doc.id)
        );
      }

      tally.indexedMessages += batch.length;
      tally.storedDocuments += documents.length;

      const processed = Math.min(i + this.batchSize, total);
      this.progress = { status: `Processed ${processed}/${total} messages`, processed, total };
      logger.debug(`Indexed batch of ${batch.length} messages (${documents.length} documents)`);

      if (processed < total) {
        await this.sleep(this.batchDelayMs);
      }
    }
  }
}
