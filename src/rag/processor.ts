/**
 * Processor Module
 *
 * Turns raw chat messages into documents ready for embedding: markup and
 * links are stripped, whitespace is normalized, and long messages are split
 * into word-aligned chunks that each keep the message's metadata.
 */

import type { SourceItem } from '../channels/types.js';

/**
 * Metadata stored alongside every chunk. A type alias (not an interface) so
 * it can be indexed by key when filtering.
 */
export type DocumentMetadata = {
  messageId: string;
  authorId: string;
  authorName: string;
  channelId: string;
  channelName: string;
  guildId: string;
  guildName: string;
  timestamp: string;      // ISO format
  chunkIndex: number;
  totalChunks: number;
};

export interface ProcessedDocument {
  id: string;             // `<messageId>_chunk_<chunkIndex>`
  text: string;
  metadata: DocumentMetadata;
}

export const DEFAULT_CHUNK_SIZE = 1000;

const URL_PATTERN = /https?:\/\/\S+/g;

/**
 * Strip chat markup and links, and collapse whitespace.
 *
 * @example
 * cleanText('**bold** and `code` http://x.com/y') // 'bold and code'
 */
export function cleanText(text: string): string {
  if (!text) return '';

  let cleaned = text;

  // Fenced code blocks keep their body, without the language tag
  cleaned = cleaned.replace(/```(?:[\w+-]*\n)?([\s\S]*?)```/g, '$1');

  cleaned = cleaned.replace(/\*\*(.*?)\*\*/g, '$1');  // Bold
  cleaned = cleaned.replace(/\*(.*?)\*/g, '$1');      // Italic
  cleaned = cleaned.replace(/`(.*?)`/g, '$1');        // Code
  cleaned = cleaned.replace(/~~(.*?)~~/g, '$1');      // Strikethrough
  cleaned = cleaned.replace(/__(.*?)__/g, '$1');      // Underline

  cleaned = cleaned.replace(URL_PATTERN, '');

  return cleaned.replace(/\s+/g, ' ').trim();
}

/**
 * Greedily pack whitespace-separated words into chunks of at most
 * `chunkSize` characters. Words are never split, so a single word longer
 * than `chunkSize` becomes a chunk of its own.
 *
 * @example
 * chunkText('a b c d e', 4) // ['a b', 'c d', 'e']
 */
export function chunkText(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/)) {
    if (!word) continue;

    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= chunkSize) {
      current += ` ${word}`;
    } else {
      chunks.push(current);
      current = word;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

export function buildMetadata(item: SourceItem, chunkIndex: number, totalChunks: number): DocumentMetadata {
  return {
    messageId: item.id,
    authorId: item.authorId,
    authorName: item.authorName,
    channelId: item.channelId,
    channelName: item.channelName,
    guildId: item.guildId,
    guildName: item.guildName,
    timestamp: item.createdAt.toISOString(),
    chunkIndex,
    totalChunks,
  };
}

export class DocumentProcessor {
  readonly chunkSize: number;

  constructor(options: { chunkSize?: number } = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;
  }

  /**
   * Process one message into zero or more documents.
   */
  process(item: SourceItem): ProcessedDocument[] {
    const text = cleanText(item.content);
    if (!text) return [];

    const chunks = chunkText(text, this.chunkSize);

    return chunks.map((chunk, chunkIndex) => ({
      id: `${item.id}_chunk_${chunkIndex}`,
      text: chunk,
      metadata: buildMetadata(item, chunkIndex, chunks.length),
    }));
  }

  /**
   * Process messages in order; each message's chunks stay together.
   */
  processBatch(items: readonly SourceItem[]): ProcessedDocument[] {
    return items.flatMap((item) => this.process(item));
  }
}
