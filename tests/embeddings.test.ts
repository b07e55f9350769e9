import { describe, it, expect, vi } from "vitest";
import { OpenAIEmbeddingProvider, cosineSimilarity } from "../src/rag/embeddings.js";

function fakeClient() {
  // Vectors come back in reverse order; each is [input length]
  const create = vi.fn(async (params: { model: string; input: string[] }) => ({
    data: params.input.map((text, index) => ({ embedding: [text.length], index })).reverse(),
  }));
  return { create, client: { embeddings: { create } } };
}

describe("OpenAIEmbeddingProvider", () => {
  it("embeds in batches and keeps input order", async () => {
    const { create, client } = fakeClient();
    const sleep = vi.fn(async (_ms: number) => {});
    const provider = new OpenAIEmbeddingProvider({ client, model: "test-embed", batchSize: 2, batchDelayMs: 30, sleep });

    const vectors = await provider.embed(["a", "bb", "ccc"]);

    expect(vectors).toEqual([[1], [2], [3]]);
    expect(create.mock.calls.map(([params]) => params)).toEqual([
      { model: "test-embed", input: ["a", "bb"] },
      { model: "test-embed", input: ["ccc"] },
    ]);
    expect(sleep.mock.calls).toEqual([[30]]);
  });

  it("skips the API for no input", async () => {
    const { create, client } = fakeClient();
    const provider = new OpenAIEmbeddingProvider({ client });

    expect(await provider.embed([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [1], index: 0 }] }));
    const provider = new OpenAIEmbeddingProvider({ client: { embeddings: { create } } });

    await expect(provider.embed(["a", "b"])).rejects.toThrow("Embedding API returned 1 vectors for 2 inputs");
  });
});

describe("cosineSimilarity", () => {
  it("is 1 for parallel and 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is 0 when either vector is all zeros", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow("Vectors must have the same length (1 vs 2)");
  });
});
