/**
 * Collector Module
 *
 * Pages through a channel's message history, newest first, without
 * hammering the platform.
 *
 * PAGINATION:
 * -----------
 * 1. Ask for min(maxPerRequest, remaining) items
 * 2. Use the id of the last (oldest) item as the "before" cursor
 * 3. Stop on an empty page, a short page, or once `limit` is reached
 * 4. Wait `delayMs` before every follow-up request
 */

import { createModuleLogger } from '../utils/logger.js';
import { CollectionError, getErrorMessage } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';
import { parseSourceItem, type Channel, type SourceItem, type SourcePlatformClient } from '../channels/types.js';

const logger = createModuleLogger('collector');

export interface PaginatorOptions {
  maxPerRequest: number;
  delayMs: number;
  sleep?: Sleep;
}

export class RateLimitedPaginator {
  private readonly platform: SourcePlatformClient;
  private readonly maxPerRequest: number;
  private readonly delayMs: number;
  private readonly sleep: Sleep;

  constructor(platform: SourcePlatformClient, options: PaginatorOptions) {
    if (options.maxPerRequest < 1) {
      throw new RangeError('maxPerRequest must be at least 1');
    }
    this.platform = platform;
    this.maxPerRequest = options.maxPerRequest;
    this.delayMs = options.delayMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Collect a channel's history into one array, newest first.
   * If any page fails, nothing collected so far is returned.
   */
  async collect(channel: Channel, limit?: number): Promise<SourceItem[]> {
    const items: SourceItem[] = [];

    for await (const page of this.pages(channel, limit)) {
      items.push(...page);
      logger.info(`Collected ${page.length} messages from ${channel.name} (total: ${items.length})`);
    }

    return items;
  }

  /**
   * Yield a channel's history page by page. Each call starts again from the
   * most recent message.
   */
  async *pages(channel: Channel, limit?: number): AsyncGenerator<SourceItem[], void, undefined> {
    let before: string | undefined;
    let collected = 0;

    while (limit === undefined || collected < limit) {
      const pageSize = limit === undefined
        ? this.maxPerRequest
        : Math.min(this.maxPerRequest, limit - collected);

      const page = await this.fetchPage(channel, pageSize, before);
      if (page.length === 0) break;

      collected += page.length;
      before = page[page.length - 1].id;

      yield page;

      const exhausted = page.length < pageSize;
      const reachedLimit = limit !== undefined && collected >= limit;
      if (exhausted || reachedLimit) break;

      await this.sleep(this.delayMs);
    }
  }

  private async fetchPage(channel: Channel, limit: number, before?: string): Promise<SourceItem[]> {
    try {
      const raw = await this.platform.fetchHistory(channel, { limit, before });
      return raw.map(parseSourceItem);
    } catch (error) {
      logger.error(`Error collecting messages from ${channel.name}: ${getErrorMessage(error)}`);
      throw new CollectionError(channel.id, error);
    }
  }
}

/**
 * Keep only items that have text worth indexing.
 */
export function filterTextItems(items: readonly SourceItem[]): SourceItem[] {
  return items.filter((item) => item.content.trim().length > 0);
}
