import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { config } from '../config/app.js';

const stopwordFileSchema = z.record(z.array(z.string()));

let defaultStopwords: ReadonlySet<string> | null = null;

export function foldText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

export function loadStopwords(path: string = config.STOPWORDS_PATH): ReadonlySet<string> {
  const parsed = stopwordFileSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  return new Set(Object.values(parsed).flat().map(foldText));
}

function getDefaultStopwords(): ReadonlySet<string> {
  defaultStopwords ??= loadStopwords();
  return defaultStopwords;
}

/** Accent-folded, lowercased terms of two or more characters, stopwords removed. */
export function tokenize(text: string, stopwords: ReadonlySet<string> = getDefaultStopwords()): string[] {
  return foldText(text)
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1 && !stopwords.has(token));
}

export interface Bm25Options {
  k1: number;
  b: number;
  stopwords?: ReadonlySet<string>;
}

/**
 * Okapi BM25 over a fixed set of passages. Built per retrieval call and
 * discarded with it.
 */
export class Bm25Index {
  private readonly termFrequencies: Array<Map<string, number>>;
  private readonly lengths: number[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly averageLength: number;
  private readonly options: Bm25Options;

  constructor(passages: readonly string[], options: Bm25Options) {
    this.options = options;
    this.termFrequencies = passages.map((passage) => {
      const counts = new Map<string, number>();
      for (const token of tokenize(passage, options.stopwords)) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
      }
      return counts;
    });
    this.lengths = this.termFrequencies.map((counts) => Array.from(counts.values()).reduce((sum, n) => sum + n, 0));
    for (const counts of this.termFrequencies) {
      for (const term of counts.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
    }
    const total = this.lengths.reduce((sum, length) => sum + length, 0);
    this.averageLength = passages.length > 0 ? total / passages.length : 0;
  }

  get size(): number {
    return this.termFrequencies.length;
  }

  idf(term: string): number {
    const n = this.termFrequencies.length;
    const df = this.documentFrequency.get(term) ?? 0;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /** Score of every passage against `query`, in passage order. */
  score(query: string): number[] {
    const { k1, b } = this.options;
    const terms = Array.from(new Set(tokenize(query, this.options.stopwords)));

    return this.termFrequencies.map((counts, index) => {
      const length = this.lengths[index];
      const norm = this.averageLength > 0 ? length / this.averageLength : 0;
      let total = 0;
      for (const term of terms) {
        const tf = counts.get(term) ?? 0;
        if (tf === 0) {
          continue;
        }
        total += this.idf(term) * ((tf * (k1 + 1)) / (tf + k1 * (1 - b + b * norm)));
      }
      return total;
    });
  }
}
