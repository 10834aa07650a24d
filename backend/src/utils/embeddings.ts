import { withRetry } from './resilience.js';
import { createEmbeddings } from '../azure/openaiClient.js';
import { ProviderError } from './errors.js';

const DEFAULT_BATCH_SIZE = 16;
const MAX_CACHE_ENTRIES = 2000;

export interface EmbeddingClient {
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** Vectors keyed by text, owned by one session and dropped with it. */
export class EmbeddingCache {
  private readonly entries = new Map<string, number[]>();
  private readonly maxEntries: number;

  constructor(maxEntries: number = MAX_CACHE_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  get(text: string): number[] | undefined {
    return this.entries.get(text);
  }

  set(text: string, vector: number[]): void {
    this.entries.set(text, vector);
    this.prune();
  }

  get size(): number {
    return this.entries.size;
  }

  private prune() {
    if (this.entries.size <= this.maxEntries) {
      return;
    }
    const keys = Array.from(this.entries.keys());
    const keep = Math.floor(this.maxEntries * 0.8);
    for (let index = keep; index < keys.length; index += 1) {
      this.entries.delete(keys[index]);
    }
  }
}

export class AzureEmbeddingClient implements EmbeddingClient {
  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await withRetry(
      'embeddings.batch',
      async (retrySignal) => {
        const result = await createEmbeddings(texts, { signal: retrySignal });
        return [...result.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
      },
      { maxRetries: 2, signal }
    );
    return response;
  }
}

export interface EmbedOptions {
  batchSize?: number;
  cache?: EmbeddingCache;
  signal?: AbortSignal;
}

export async function embedTexts(client: EmbeddingClient, texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
  const { batchSize = DEFAULT_BATCH_SIZE, cache, signal } = options;
  const embeddings: number[][] = new Array(texts.length);
  const pending: Array<{ index: number; text: string }> = [];

  texts.forEach((text, index) => {
    const hit = cache?.get(text);
    if (hit) {
      embeddings[index] = hit;
    } else {
      pending.push({ index, text });
    }
  });

  for (let offset = 0; offset < pending.length; offset += batchSize) {
    const slice = pending.slice(offset, offset + batchSize);
    const response = await client.embed(
      slice.map((item) => item.text),
      signal
    );

    if (response.length !== slice.length) {
      throw new ProviderError('embeddings', `embedding mismatch: expected ${slice.length}, received ${response.length}`);
    }

    response.forEach((vector, index) => {
      const { text, index: originalIndex } = slice[index];
      embeddings[originalIndex] = vector;
      cache?.set(text, vector);
    });
  }

  return embeddings;
}
