import { describe, expect, it } from 'vitest';
import { HybridRetrievalTool, type HybridRetrievalOptions } from '../tools/hybridRetrieval.js';
import type { SearchDocument } from '../tools/webSearch.js';
import { EmbeddingCache } from '../utils/embeddings.js';
import { ProviderError } from '../utils/errors.js';
import { FailingEmbeddingClient, fixedClock, FIXED_NOW, KeywordEmbeddingClient, QueueSearchProvider } from './fixtures.js';

const options: Partial<HybridRetrievalOptions> = {
  maxResults: 5,
  topK: 3,
  chunkSize: 800,
  chunkOverlap: 100,
  k1: 1.2,
  b: 0.75,
  fusion: { method: 'rrf', semanticWeight: 0.5, lexicalWeight: 0.5, k: 60 },
  embeddingBatchSize: 16,
  defaultRecencyDays: undefined,
  stopwords: new Set<string>(),
  now: fixedClock
};

const documents: SearchDocument[] = [
  { title: 'Hospitais lotados', url: 'https://news.test/1', content: 'Hospital occupancy rises as influenza spreads.' },
  { title: 'Vacinação', url: 'https://news.test/2', content: 'Vaccination campaign reaches the interior.' },
  { title: 'Cópia', url: 'https://news.test/3', content: 'Hospital occupancy rises as influenza spreads.' }
];

const context = () => ({ signal: new AbortController().signal });

describe('HybridRetrievalTool', () => {
  it('ranks de-duplicated passages by fused semantic and lexical rank', async () => {
    const tool = new HybridRetrievalTool(
      new QueueSearchProvider([documents]),
      new KeywordEmbeddingClient(['influenza', 'vaccination']),
      options
    );

    const result = await tool.run({ topic: 'influenza occupancy' }, context());

    expect(result.kind).toBe('news_retrieval');
    expect(result.empty).toBe(false);
    expect(result.degraded).toEqual([]);
    expect(result.candidateCount).toBe(3);
    expect(result.passageCount).toBe(2);
    expect(result.passages.map((passage) => passage.id)).toEqual(['doc-1#1', 'doc-2#1']);
    expect(result.passages.map((passage) => passage.rank)).toEqual([1, 2]);

    const [top] = result.passages;
    expect(top).toMatchObject({
      documentId: 'doc-1',
      title: 'Hospitais lotados',
      url: 'https://news.test/1',
      fetchedAt: FIXED_NOW.toISOString(),
      text: 'Hospital occupancy rises as influenza spreads.'
    });
    expect(top.scores.semantic).toBeCloseTo(1);
    expect(top.scores.semanticRank).toBe(1);
    expect(top.scores.lexicalRank).toBe(1);
    expect(top.scores.fused).toBeCloseTo(1 / 61);
  });

  it('is deterministic for identical inputs', async () => {
    const run = () =>
      new HybridRetrievalTool(
        new QueueSearchProvider([documents]),
        new KeywordEmbeddingClient(['influenza', 'vaccination']),
        options
      ).run({ topic: 'influenza occupancy' }, context());

    expect(await run()).toEqual(await run());
  });

  it('falls back to lexical ranking when embeddings fail', async () => {
    const tool = new HybridRetrievalTool(new QueueSearchProvider([documents]), new FailingEmbeddingClient(), options);

    const result = await tool.run({ topic: 'vaccination campaign' }, context());

    expect(result.degraded).toEqual(['semantic']);
    expect(result.passages.map((passage) => passage.id)).toEqual(['doc-2#1', 'doc-1#1']);
    expect(result.passages.every((passage) => passage.scores.semantic === null && passage.scores.semanticRank === null)).toBe(true);
  });

  it('reports an empty result when nothing is found', async () => {
    const tool = new HybridRetrievalTool(new QueueSearchProvider([[]]), new KeywordEmbeddingClient(['srag']), options);

    const result = await tool.run({ topic: 'srag' }, context());

    expect(result).toEqual({
      kind: 'news_retrieval',
      topic: 'srag',
      candidateCount: 0,
      passageCount: 0,
      empty: true,
      degraded: [],
      passages: []
    });
  });

  it('treats documents without text as empty', async () => {
    const tool = new HybridRetrievalTool(
      new QueueSearchProvider([[{ title: 'Sem texto', url: 'https://news.test/empty', content: '  ' }]]),
      new KeywordEmbeddingClient(['srag']),
      options
    );

    const result = await tool.run({ topic: 'srag' }, context());

    expect(result.empty).toBe(true);
    expect(result.candidateCount).toBe(1);
  });

  it('passes the recency window to the provider', async () => {
    const search = new QueueSearchProvider([documents]);
    const tool = new HybridRetrievalTool(search, new KeywordEmbeddingClient(['influenza']), options);

    const result = await tool.run({ topic: 'influenza', recency_days: 14 }, context());

    expect(search.requests).toEqual([{ query: 'influenza', maxResults: 5, recencyDays: 14 }]);
    expect(result.recencyDays).toBe(14);
  });

  it('returns at most topK passages', async () => {
    const tool = new HybridRetrievalTool(new QueueSearchProvider([documents]), new KeywordEmbeddingClient(['influenza']), {
      ...options,
      topK: 1
    });

    const result = await tool.run({ topic: 'influenza' }, context());

    expect(result.passages).toHaveLength(1);
    expect(result.passageCount).toBe(2);
  });

  it('propagates provider errors', async () => {
    const failure = new ProviderError('static', 'static search failed: 401 Unauthorized', { status: 401 });
    const tool = new HybridRetrievalTool(new QueueSearchProvider([failure]), new KeywordEmbeddingClient([]), options);

    await expect(tool.run({ topic: 'srag' }, context())).rejects.toBe(failure);
  });

  it('wraps unexpected search failures as provider errors', async () => {
    const tool = new HybridRetrievalTool(
      new QueueSearchProvider([new Error('socket hang up')]),
      new KeywordEmbeddingClient([]),
      options
    );

    const run = tool.run({ topic: 'srag' }, context());
    await expect(run).rejects.toBeInstanceOf(ProviderError);
    await expect(run).rejects.toThrow('static search request failed');
  });

  it('reuses cached embeddings within a session', async () => {
    const embeddings = new KeywordEmbeddingClient(['influenza']);
    const cache = new EmbeddingCache();
    const tool = new HybridRetrievalTool(new QueueSearchProvider([documents, documents]), embeddings, options);

    await tool.run({ topic: 'influenza' }, { ...context(), embeddingCache: cache });
    await tool.run({ topic: 'influenza' }, { ...context(), embeddingCache: cache });

    expect(embeddings.batches).toEqual([['influenza', 'Hospital occupancy rises as influenza spreads.', 'Vaccination campaign reaches the interior.']]);
    expect(cache.size).toBe(3);
  });
});
