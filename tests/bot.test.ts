import { describe, it, expect, vi } from "vitest";
import { KnowledgeBot } from "../src/index.js";
import { IndexingCoordinator } from "../src/rag/indexer.js";
import { RateLimitedPaginator } from "../src/rag/collector.js";
import { DocumentProcessor } from "../src/rag/processor.js";
import { VectorStore } from "../src/rag/vectorstore.js";
import { JsonFileCollectionBackend } from "../src/rag/collection-store.js";
import { RetrievalContextBuilder } from "../src/rag/retriever.js";
import { ResponseGenerator, buildContextPrompt } from "../src/agents/responder.js";
import type { EmbeddingProvider } from "../src/rag/embeddings.js";
import { FakePlatform, TableEmbeddingProvider, makeItem, makeMetadata } from "./helpers.js";

const general = { id: "C1", name: "general", isText: true };

function createBot(embeddings: EmbeddingProvider = new TableEmbeddingProvider({}, [1, 0])) {
  const platform = new FakePlatform([general], {
    C1: [
      makeItem({ id: "C1:3", content: "we moved standup to 10am" }),
      makeItem({ id: "C1:2", content: "the release is on Friday" }),
      makeItem({ id: "C1:1", content: "" }),
    ],
  });
  const vectorStore = new VectorStore({ backend: new JsonFileCollectionBackend(), embeddings: () => embeddings });
  const complete = vi.fn(async (_prompt: string) => "Friday.");

  const bot = new KnowledgeBot({
    coordinator: new IndexingCoordinator({
      platform,
      paginator: new RateLimitedPaginator(platform, { maxPerRequest: 10, delayMs: 0, sleep: async () => {} }),
      processor: new DocumentProcessor(),
      vectorStore,
      sleep: async () => {},
    }),
    vectorStore,
    retriever: new RetrievalContextBuilder(vectorStore),
    responder: new ResponseGenerator({ complete }),
  });

  return { bot, complete, vectorStore };
}

describe("KnowledgeBot", () => {
  it("indexes and then answers from the indexed messages", async () => {
    const { bot, complete } = createBot();

    const result = await bot.startIndexing("T1");
    expect(result).toMatchObject({ status: "completed", indexedMessages: 2, storedDocuments: 2 });
    expect(await bot.getStats()).toEqual({ totalDocuments: 2, collectionName: "slack_knowledge" });

    const answer = await bot.answer("when is the release?", "C1");

    expect(answer.text).toBe("Friday.");
    expect(answer.searchError).toBeUndefined();
    expect(answer.context?.searchScope).toBe("channel");
    expect(answer.context?.relevantDocs).toHaveLength(2);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("answers from general knowledge when the search fails", async () => {
    const failing: EmbeddingProvider = {
      embed: async () => {
        throw new Error("quota exceeded");
      },
    };
    const { bot, complete } = createBot(failing);

    const answer = await bot.answer("what is DNS?");

    expect(answer).toEqual({
      text: "Friday.",
      context: null,
      searchError: 'Storage operation "search" failed: quota exceeded',
    });
    expect(complete).toHaveBeenCalledWith(buildContextPrompt("what is DNS?", []), []);
  });

  it("clears the index before reindexing", async () => {
    const { bot, vectorStore } = createBot();
    await vectorStore.addDocuments(["stale"], [makeMetadata({ messageId: "old" })], ["old_chunk_0"]);

    const result = await bot.reindex("T1");

    expect(result.status).toBe("completed");
    expect((await bot.getStats()).totalDocuments).toBe(2);
    expect(bot.getIndexingProgress()).toEqual({});
  });

  it("does not clear the index while a job is running", async () => {
    const { bot, vectorStore } = createBot();
    await vectorStore.addDocuments(["stale"], [makeMetadata({ messageId: "old" })], ["old_chunk_0"]);
    const clear = vi.spyOn(vectorStore, "clearCollection");

    const running = bot.startIndexing("T1");
    const result = await bot.reindex("T1");

    expect(result.status).toBe("busy");
    expect(clear).not.toHaveBeenCalled();
    expect((await running).status).toBe("completed");
    expect((await bot.getStats()).totalDocuments).toBe(3);
  });

  it("holds the lock through the clear when reindex and indexing start together", async () => {
    const { bot, vectorStore } = createBot();
    await vectorStore.addDocuments(["stale"], [makeMetadata({ messageId: "old" })], ["old_chunk_0"]);

    const reindexing = bot.reindex("T1");
    const indexing = bot.startIndexing("T1", "C1");

    expect((await indexing).status).toBe("busy");
    expect((await reindexing).status).toBe("completed");
    expect((await bot.getStats()).totalDocuments).toBe(2);
  });
});
