import { describe, expect, it } from 'vitest';
import { chunkText } from '../retrieval/chunking.js';

describe('chunkText', () => {
  it('keeps short text as a single chunk', () => {
    expect(chunkText('Casos em alta.', { chunkSize: 800, chunkOverlap: 100 })).toEqual(['Casos em alta.']);
  });

  it('returns nothing for blank text', () => {
    expect(chunkText('  \n\n ', { chunkSize: 800, chunkOverlap: 100 })).toEqual([]);
  });

  it('packs whole sentences up to the chunk size', () => {
    const text = 'Aaaa aaaa. Bbbb bbbb. Cccc cccc.';
    expect(chunkText(text, { chunkSize: 22, chunkOverlap: 0 })).toEqual(['Aaaa aaaa. Bbbb bbbb.', 'Cccc cccc.']);
  });

  it('carries trailing sentences into the next chunk as overlap', () => {
    const text = 'Aaaa aaaa. Bbbb bbbb. Cccc cccc.';
    expect(chunkText(text, { chunkSize: 22, chunkOverlap: 10 })).toEqual(['Aaaa aaaa. Bbbb bbbb.', 'Bbbb bbbb. Cccc cccc.']);
  });

  it('slices text without any break points', () => {
    const chunks = chunkText('x'.repeat(25), { chunkSize: 10, chunkOverlap: 0 });
    expect(chunks).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('never exceeds the chunk size', () => {
    const paragraph = 'Internações por SRAG aumentaram na capital. Hospitais ampliaram leitos de UTI. '.repeat(20);
    const chunks = chunkText(`${paragraph}\n\n${paragraph}`, { chunkSize: 200, chunkOverlap: 50 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(200);
    }
  });
});
