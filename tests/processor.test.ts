import { describe, it, expect } from "vitest";
import { DocumentProcessor, buildMetadata, chunkText, cleanText } from "../src/rag/processor.js";
import { makeItem } from "./helpers.js";

describe("cleanText", () => {
  it("strips markup and links and collapses whitespace", () => {
    const raw = "**bold** and *italic* `code` ~~gone~~ __under__ see https://example.com/x   now";
    expect(cleanText(raw)).toBe("bold and italic code gone under see now");
  });

  it("keeps the body of fenced code blocks without the language tag", () => {
    expect(cleanText("look:\n```ts\nconst x = 1;\n```")).toBe("look: const x = 1;");
  });

  it("returns an empty string for empty or whitespace-only input", () => {
    expect(cleanText("")).toBe("");
    expect(cleanText("  \n\t ")).toBe("");
  });

  it("returns an empty string when only a link remains", () => {
    expect(cleanText("http://example.com/a?b=c")).toBe("");
  });
});

describe("chunkText", () => {
  it("packs words greedily up to the chunk size", () => {
    expect(chunkText("a b c d e", 4)).toEqual(["a b", "c d", "e"]);
  });

  it("puts a word longer than the chunk size in a chunk of its own", () => {
    expect(chunkText("tiny enormousword x", 5)).toEqual(["tiny", "enormousword", "x"]);
  });

  it("returns no chunks for empty text", () => {
    expect(chunkText("", 10)).toEqual([]);
  });

  it("keeps every chunk within the limit and loses no words", () => {
    const text = "the quick brown fox jumps over the lazy dog again and again";
    const chunks = chunkText(text, 12);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(12);
    }
    expect(chunks.join(" ")).toBe(text);
  });
});

describe("buildMetadata", () => {
  it("copies item fields and records the chunk position", () => {
    const item = makeItem({ id: "C1:100.1", authorName: "bob" });
    expect(buildMetadata(item, 1, 3)).toEqual({
      messageId: "C1:100.1",
      authorId: "U1",
      authorName: "bob",
      channelId: "C1",
      channelName: "general",
      guildId: "T1",
      guildName: "acme",
      timestamp: "2024-01-15T10:00:00.000Z",
      chunkIndex: 1,
      totalChunks: 3,
    });
  });
});

describe("DocumentProcessor", () => {
  it("splits a long message into numbered chunks", () => {
    const processor = new DocumentProcessor({ chunkSize: 9 });
    const docs = processor.process(makeItem({ id: "m1", content: "one two three four" }));

    expect(docs.map((d) => d.id)).toEqual(["m1_chunk_0", "m1_chunk_1", "m1_chunk_2"]);
    expect(docs.map((d) => d.text)).toEqual(["one two", "three", "four"]);
    expect(docs.map((d) => d.metadata.chunkIndex)).toEqual([0, 1, 2]);
    expect(docs.every((d) => d.metadata.totalChunks === 3)).toBe(true);
  });

  it("produces nothing for a message with no text after cleaning", () => {
    const processor = new DocumentProcessor();
    expect(processor.process(makeItem({ id: "m1", content: "https://example.com" }))).toEqual([]);
  });

  it("keeps batch order with each message's chunks together", () => {
    const processor = new DocumentProcessor({ chunkSize: 5 });
    const docs = processor.processBatch([
      makeItem({ id: "a", content: "aaa bbb" }),
      makeItem({ id: "b", content: "" }),
      makeItem({ id: "c", content: "ccc" }),
    ]);

    expect(docs.map((d) => d.id)).toEqual(["a_chunk_0", "a_chunk_1", "c_chunk_0"]);
  });

  it("rejects a chunk size below one", () => {
    expect(() => new DocumentProcessor({ chunkSize: 0 })).toThrow(RangeError);
  });
});
