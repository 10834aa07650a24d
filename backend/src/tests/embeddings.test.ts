import { describe, expect, it } from 'vitest';
import { EmbeddingCache, embedTexts, type EmbeddingClient } from '../utils/embeddings.js';
import { KeywordEmbeddingClient } from './fixtures.js';

describe('embedTexts', () => {
  it('embeds in batches and keeps input order', async () => {
    const client = new KeywordEmbeddingClient(['uti', 'srag']);

    const vectors = await embedTexts(client, ['uti', 'srag', 'uti srag'], { batchSize: 2 });

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
      [1, 1]
    ]);
    expect(client.batches).toEqual([['uti', 'srag'], ['uti srag']]);
  });

  it('only embeds texts missing from the cache', async () => {
    const client = new KeywordEmbeddingClient(['uti', 'srag']);
    const cache = new EmbeddingCache();
    cache.set('uti', [9, 9]);

    const vectors = await embedTexts(client, ['uti', 'srag'], { cache });

    expect(vectors).toEqual([
      [9, 9],
      [0, 1]
    ]);
    expect(client.batches).toEqual([['srag']]);
    expect(cache.get('srag')).toEqual([0, 1]);
  });

  it('rejects responses of the wrong length', async () => {
    const client: EmbeddingClient = { embed: async () => [[1]] };

    await expect(embedTexts(client, ['a', 'b'])).rejects.toThrow('embedding mismatch: expected 2, received 1');
  });
});

describe('EmbeddingCache', () => {
  it('prunes to 80% of capacity once full', () => {
    const cache = new EmbeddingCache(5);
    for (let index = 0; index < 6; index += 1) {
      cache.set(`text-${index}`, [index]);
    }

    expect(cache.size).toBe(4);
    expect(cache.get('text-0')).toEqual([0]);
    expect(cache.get('text-5')).toBeUndefined();
  });

  it('keeps passages with a shared prefix apart', () => {
    const cache = new EmbeddingCache();
    const prefix = 'Boletim epidemiológico. '.repeat(120);
    cache.set(`${prefix}Casos em alta.`, [1, 0]);
    cache.set(`${prefix}Casos em queda.`, [0, 1]);

    expect(cache.size).toBe(2);
    expect(cache.get(`${prefix}Casos em alta.`)).toEqual([1, 0]);
    expect(cache.get(`${prefix}Casos em queda.`)).toEqual([0, 1]);
  });
});
