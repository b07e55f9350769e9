import type { Channel, FetchHistoryOptions, SourceItem, SourcePlatformClient } from "../src/channels/types.js";
import type { EmbeddingProvider } from "../src/rag/embeddings.js";
import type { DocumentMetadata } from "../src/rag/processor.js";

export function makeItem(overrides: Partial<SourceItem> & { id: string }): SourceItem {
  return {
    authorId: "U1",
    authorName: "alice",
    channelId: "C1",
    channelName: "general",
    guildId: "T1",
    guildName: "acme",
    createdAt: new Date("2024-01-15T10:00:00.000Z"),
    content: `message ${overrides.id}`,
    ...overrides,
  };
}

export function makeMetadata(overrides: Partial<DocumentMetadata> = {}): DocumentMetadata {
  return {
    messageId: "m1",
    authorId: "U1",
    authorName: "alice",
    channelId: "C1",
    channelName: "general",
    guildId: "T1",
    guildName: "acme",
    timestamp: "2024-01-15T10:00:00.000Z",
    chunkIndex: 0,
    totalChunks: 1,
    ...overrides,
  };
}

/**
 * In-memory chat platform. History per channel is stored newest first and
 * paged by the `before` id, like the real client.
 */
export class FakePlatform implements SourcePlatformClient {
  readonly fetchCalls: Array<{ channelId: string } & FetchHistoryOptions> = [];
  failOnCall: number | null = null;

  constructor(
    private readonly channels: Channel[],
    private readonly history: Record<string, unknown[]>
  ) {}

  async listChannels(_guildId: string): Promise<Channel[]> {
    return this.channels;
  }

  async fetchHistory(channel: Channel, options: FetchHistoryOptions): Promise<unknown[]> {
    this.fetchCalls.push({ channelId: channel.id, ...options });
    if (this.failOnCall === this.fetchCalls.length) {
      throw new Error("rate limited");
    }

    const all = this.history[channel.id] ?? [];
    const start = options.before === undefined ? 0 : all.findIndex((item) => idOf(item) === options.before) + 1;
    return all.slice(start, start + options.limit);
  }
}

function idOf(item: unknown): unknown {
  return typeof item === "object" && item !== null && "id" in item ? item.id : undefined;
}

/**
 * Embeds each text by looking it up in a table; unknown texts get `fallback`.
 */
export class TableEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    private readonly table: Record<string, number[]>,
    private readonly fallback: number[] = [0, 0]
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((text) => this.table[text] ?? this.fallback);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
