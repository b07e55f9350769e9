/**
 * Embeddings Module
 *
 * Converts text into vector embeddings using OpenAI's embedding API.
 * Similar texts get similar vectors, which is what lets "payment issues"
 * find a message about "billing problems".
 *
 * The vector store only depends on the EmbeddingProvider interface, so
 * another provider (or a test fake) can be dropped in.
 */

import { createModuleLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';

const logger = createModuleLogger('embeddings');

// text-embedding-3-small: Good balance of quality and cost
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

// Rate limiting configuration
const MAX_BATCH_SIZE = 100; // OpenAI allows up to 2048, but we stay conservative
const RATE_LIMIT_DELAY_MS = 100; // Small delay between batches

export interface EmbeddingProvider {
  /** Embed every text; the result has one vector per input, in order. */
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * The slice of the OpenAI client used here. An `OpenAI` instance satisfies it.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  client: EmbeddingsClient;
  model?: string;
  batchSize?: number;
  batchDelayMs?: number;
  sleep?: Sleep;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: EmbeddingsClient;
  private readonly model: string;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = options.batchSize ?? MAX_BATCH_SIZE;
    this.batchDelayMs = options.batchDelayMs ?? RATE_LIMIT_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Create embeddings for multiple texts in batches.
   *
   * @example
   * const [first, second] = await provider.embed(['First message', 'Second message']);
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const results: number[][] = [];
    const batchCount = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      logger.debug(`Processing embedding batch ${Math.floor(i / this.batchSize) + 1}/${batchCount}`);

      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
      });

      if (response.data.length !== batch.length) {
        throw new Error(`Embedding API returned ${response.data.length} vectors for ${batch.length} inputs`);
      }

      // The API reports each vector's input position; don't rely on response order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      results.push(...ordered.map((item) => item.embedding));

      // Small delay between batches to avoid rate limits
      if (i + this.batchSize < texts.length) {
        await this.sleep(this.batchDelayMs);
      }
    }

    logger.info(`Created ${results.length} embeddings`);
    return results;
  }
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * For text embeddings, scores typically range from 0.3 to 0.95:
 * - > 0.85 = Very similar content
 * - 0.70-0.85 = Related content
 * - < 0.70 = Probably different topics
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}
