/**
 * Collection Store Module
 *
 * Named collections of embedded records with nearest-neighbour search.
 * The JSON-file backend keeps every collection in memory and writes it to
 * `<directory>/<name>.json` after each change, which is plenty for a single
 * workspace's history (< 1M records). Without a directory it is memory-only.
 *
 * The backend has no metadata filtering at query time; the vector store
 * filters results after the fact.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { createModuleLogger } from '../utils/logger.js';
import { cosineSimilarity } from './embeddings.js';
import type { DocumentMetadata } from './processor.js';

const logger = createModuleLogger('collection-store');

export interface IndexRecord {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  embedding: number[];
}

export interface QueryMatch {
  record: IndexRecord;
  score: number;          // Cosine similarity, highest first
}

export interface VectorCollection {
  readonly name: string;
  /** Insert records, replacing any with the same id. */
  upsert(records: IndexRecord[]): Promise<void>;
  query(embedding: number[], topK: number): Promise<QueryMatch[]>;
  count(): Promise<number>;
}

export interface CollectionBackend {
  createCollection(name: string): Promise<VectorCollection>;
  getCollection(name: string): Promise<VectorCollection | null>;
  getOrCreateCollection(name: string): Promise<VectorCollection>;
  deleteCollection(name: string): Promise<void>;
}

const IndexRecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: z.object({
    messageId: z.string(),
    authorId: z.string(),
    authorName: z.string(),
    channelId: z.string(),
    channelName: z.string(),
    guildId: z.string(),
    guildName: z.string(),
    timestamp: z.string(),
    chunkIndex: z.number().int().nonnegative(),
    totalChunks: z.number().int().positive(),
  }),
  embedding: z.array(z.number()),
});

const CollectionFileSchema = z.record(IndexRecordSchema);

class JsonFileCollection implements VectorCollection {
  readonly name: string;
  private readonly records: Map<string, IndexRecord>;
  private readonly persistPath: string | null;
  private deleted = false;

  constructor(name: string, records: Map<string, IndexRecord>, persistPath: string | null) {
    this.name = name;
    this.records = records;
    this.persistPath = persistPath;
  }

  markDeleted(): void {
    this.deleted = true;
  }

  persist(): void {
    if (!this.persistPath) return;
    const data = Object.fromEntries(this.records);
    writeFileSync(this.persistPath, JSON.stringify(data));
  }

  async upsert(records: IndexRecord[]): Promise<void> {
    this.assertLive();
    for (const record of records) {
      this.records.set(record.id, record);
    }
    this.persist();
  }

  async query(embedding: number[], topK: number): Promise<QueryMatch[]> {
    this.assertLive();
    const matches: QueryMatch[] = [];

    for (const record of this.records.values()) {
      matches.push({ record, score: cosineSimilarity(embedding, record.embedding) });
    }

    // Sort by score descending and return top results
    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, topK);
  }

  async count(): Promise<number> {
    this.assertLive();
    return this.records.size;
  }

  private assertLive(): void {
    if (this.deleted) {
      throw new Error(`Collection ${this.name} has been deleted`);
    }
  }
}

export class JsonFileCollectionBackend implements CollectionBackend {
  private readonly directory: string | null;
  private readonly collections = new Map<string, JsonFileCollection>();

  /**
   * @param directory - where collection files live; omit for memory-only
   */
  constructor(directory?: string) {
    this.directory = directory ?? null;

    if (this.directory && !existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }
  }

  async createCollection(name: string): Promise<VectorCollection> {
    if (this.collections.has(name) || this.fileExists(name)) {
      throw new Error(`Collection ${name} already exists`);
    }

    const collection = new JsonFileCollection(name, new Map(), this.pathFor(name));
    collection.persist();
    this.collections.set(name, collection);
    logger.info(`Created collection: ${name}`);
    return collection;
  }

  async getCollection(name: string): Promise<VectorCollection | null> {
    const open = this.collections.get(name);
    if (open) return open;

    const path = this.pathFor(name);
    if (!path || !existsSync(path)) return null;

    const parsed = CollectionFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    const collection = new JsonFileCollection(name, new Map(Object.entries(parsed)), path);
    this.collections.set(name, collection);
    logger.info(`Loaded ${Object.keys(parsed).length} records for collection ${name} from disk`);
    return collection;
  }

  async getOrCreateCollection(name: string): Promise<VectorCollection> {
    return (await this.getCollection(name)) ?? this.createCollection(name);
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.get(name)?.markDeleted();
    this.collections.delete(name);

    const path = this.pathFor(name);
    if (path && existsSync(path)) {
      rmSync(path);
    }
    logger.warn(`Deleted collection: ${name}`);
  }

  private pathFor(name: string): string | null {
    return this.directory ? join(this.directory, `${name}.json`) : null;
  }

  private fileExists(name: string): boolean {
    const path = this.pathFor(name);
    return path !== null && existsSync(path);
  }
}
