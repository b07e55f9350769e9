/**
 * Boundary types between the indexing pipeline and a chat platform.
 */

import { z } from 'zod';
import { InvalidSourceItemError } from '../utils/errors.js';

/**
 * One message as read from the platform. Never mutated after it is fetched.
 */
export const SourceItemSchema = z.object({
  id: z.string().min(1),
  authorId: z.string().min(1),
  authorName: z.string(),
  channelId: z.string().min(1),
  channelName: z.string(),
  guildId: z.string(),
  guildName: z.string(),
  createdAt: z.date(),
  content: z.string(),
});

export type SourceItem = Readonly<z.infer<typeof SourceItemSchema>>;

export interface Channel {
  id: string;
  name: string;
  // Only text channels carry message history worth indexing
  isText: boolean;
}

export interface FetchHistoryOptions {
  limit: number;
  // Id of the oldest item already seen; omitted for the most recent page
  before?: string;
}

/**
 * What the pipeline needs from a chat platform.
 * `fetchHistory` returns at most `limit` items, most recent first.
 */
export interface SourcePlatformClient {
  listChannels(guildId: string): Promise<Channel[]>;
  fetchHistory(channel: Channel, options: FetchHistoryOptions): Promise<unknown[]>;
}

/**
 * Validate a raw item handed over by a platform client.
 * Throws InvalidSourceItemError listing every missing or mistyped field.
 */
export function parseSourceItem(raw: unknown): SourceItem {
  const result = SourceItemSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSourceItemError(
      result.error.errors.map((err) => `${err.path.join('.') || 'item'}: ${err.message}`)
    );
  }
  return result.data;
}
