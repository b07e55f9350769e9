import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { JsonFileCollectionBackend, type IndexRecord } from "../src/rag/collection-store.js";
import { makeMetadata } from "./helpers.js";

function record(id: string, embedding: number[]): IndexRecord {
  return { id, text: `text ${id}`, metadata: makeMetadata({ messageId: id }), embedding };
}

describe("JsonFileCollectionBackend (memory only)", () => {
  it("returns null for a collection that was never created", async () => {
    const backend = new JsonFileCollectionBackend();
    expect(await backend.getCollection("missing")).toBeNull();
  });

  it("refuses to create a collection twice", async () => {
    const backend = new JsonFileCollectionBackend();
    await backend.createCollection("docs");
    await expect(backend.createCollection("docs")).rejects.toThrow("Collection docs already exists");
  });

  it("orders query results by cosine similarity and honours topK", async () => {
    const backend = new JsonFileCollectionBackend();
    const collection = await backend.getOrCreateCollection("docs");
    await collection.upsert([record("far", [0, 1]), record("near", [1, 0]), record("mid", [1, 1])]);

    const matches = await collection.query([1, 0], 2);

    expect(matches.map((m) => m.record.id)).toEqual(["near", "mid"]);
    expect(matches[0].score).toBeCloseTo(1);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2);
  });

  it("invalidates handles to a deleted collection", async () => {
    const backend = new JsonFileCollectionBackend();
    const collection = await backend.createCollection("docs");

    await backend.deleteCollection("docs");

    await expect(collection.count()).rejects.toThrow("Collection docs has been deleted");
    expect(await backend.getCollection("docs")).toBeNull();
  });
});

describe("JsonFileCollectionBackend (on disk)", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "collections-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reloads persisted records in a new backend", async () => {
    const first = new JsonFileCollectionBackend(dir);
    const collection = await first.getOrCreateCollection("docs");
    await collection.upsert([record("r1", [1, 0]), record("r2", [0, 1])]);

    const second = new JsonFileCollectionBackend(dir);
    const reloaded = await second.getCollection("docs");

    expect(reloaded).not.toBeNull();
    if (!reloaded) return;
    expect(await reloaded.count()).toBe(2);
    const [best] = await reloaded.query([0, 1], 1);
    expect(best.record).toEqual(record("r2", [0, 1]));
  });

  it("removes the collection file on delete", async () => {
    const backend = new JsonFileCollectionBackend(dir);
    await backend.createCollection("docs");
    expect(existsSync(join(dir, "docs.json"))).toBe(true);

    await backend.deleteCollection("docs");

    expect(existsSync(join(dir, "docs.json"))).toBe(false);
  });

  it("creates the directory when it does not exist", () => {
    const nested = join(dir, "a", "b");
    new JsonFileCollectionBackend(nested);
    expect(existsSync(nested)).toBe(true);
  });
});
