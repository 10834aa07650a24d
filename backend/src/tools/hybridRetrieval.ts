import type { NewsRetrievalResult, RetrievedPassage } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { fuseRankings, type FusionOptions } from '../orchestrator/reranker.js';
import { chunkText } from '../retrieval/chunking.js';
import { Bm25Index } from '../retrieval/lexical.js';
import { embedTexts, type EmbeddingCache, type EmbeddingClient } from '../utils/embeddings.js';
import { describeError, isToolError, ProviderError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { cosineScores } from '../utils/vector-ops.js';
import type { SearchDocument, SearchProvider } from './webSearch.js';

const log = moduleLogger('hybrid-retrieval');

export interface HybridRetrievalArgs {
  topic: string;
  recency_days?: number;
}

export interface HybridRetrievalContext {
  signal: AbortSignal;
  embeddingCache?: EmbeddingCache;
}

export interface HybridRetrievalOptions {
  maxResults: number;
  topK: number;
  chunkSize: number;
  chunkOverlap: number;
  k1: number;
  b: number;
  fusion: FusionOptions;
  embeddingBatchSize: number;
  defaultRecencyDays?: number;
  stopwords?: ReadonlySet<string>;
  now: () => Date;
}

export function defaultRetrievalOptions(): HybridRetrievalOptions {
  return {
    maxResults: config.WEB_RESULTS_MAX,
    topK: config.RETRIEVAL_TOP_K,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    k1: config.BM25_K1,
    b: config.BM25_B,
    fusion: {
      method: config.FUSION_METHOD,
      semanticWeight: config.FUSION_SEMANTIC_WEIGHT,
      lexicalWeight: config.FUSION_LEXICAL_WEIGHT,
      k: config.RRF_K_CONSTANT
    },
    embeddingBatchSize: config.WEB_EMBEDDING_BATCH_SIZE,
    defaultRecencyDays: config.WEB_DEFAULT_RECENCY_DAYS,
    now: () => new Date()
  };
}

interface Passage {
  id: string;
  documentId: string;
  order: number;
  text: string;
  document: SearchDocument;
}

/**
 * Fetches news for a topic and ranks passages of the fetched documents with a
 * per-call semantic ranking and a per-call BM25 index, fused deterministically.
 * Nothing built here outlives the call.
 */
export class HybridRetrievalTool {
  private readonly search: SearchProvider;
  private readonly embeddings: EmbeddingClient;
  private readonly options: HybridRetrievalOptions;

  constructor(search: SearchProvider, embeddings: EmbeddingClient, options: Partial<HybridRetrievalOptions> = {}) {
    this.search = search;
    this.embeddings = embeddings;
    this.options = { ...defaultRetrievalOptions(), ...options };
  }

  private async fetchDocuments(topic: string, recencyDays: number | undefined, signal: AbortSignal): Promise<SearchDocument[]> {
    try {
      return await this.search.search({ query: topic, maxResults: this.options.maxResults, recencyDays }, signal);
    } catch (error) {
      if (isToolError(error)) {
        throw error;
      }
      throw new ProviderError(this.search.name, `${this.search.name} search request failed`, { cause: error });
    }
  }

  private splitPassages(documents: SearchDocument[]): Passage[] {
    const passages: Passage[] = [];
    const seen = new Set<string>();

    documents.forEach((document, documentIndex) => {
      const documentId = `doc-${documentIndex + 1}`;
      const chunks = chunkText(document.content, {
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap
      });
      chunks.forEach((text, chunkIndex) => {
        if (seen.has(text)) {
          return;
        }
        seen.add(text);
        passages.push({ id: `${documentId}#${chunkIndex + 1}`, documentId, order: passages.length, text, document });
      });
    });

    return passages;
  }

  private async semanticScores(
    topic: string,
    passages: Passage[],
    context: HybridRetrievalContext
  ): Promise<number[] | null> {
    try {
      const [query, ...vectors] = await embedTexts(
        this.embeddings,
        [topic, ...passages.map((passage) => passage.text)],
        { batchSize: this.options.embeddingBatchSize, cache: context.embeddingCache, signal: context.signal }
      );
      return cosineScores(query, vectors);
    } catch (error) {
      log.warn({ err: describeError(error) }, 'embedding failed, ranking lexically only');
      return null;
    }
  }

  async run(args: HybridRetrievalArgs, context: HybridRetrievalContext): Promise<NewsRetrievalResult> {
    const recencyDays = args.recency_days ?? this.options.defaultRecencyDays;
    const documents = await this.fetchDocuments(args.topic, recencyDays, context.signal);
    const fetchedAt = this.options.now().toISOString();
    const passages = this.splitPassages(documents);

    const base = {
      kind: 'news_retrieval' as const,
      topic: args.topic,
      ...(recencyDays !== undefined ? { recencyDays } : {}),
      candidateCount: documents.length,
      passageCount: passages.length
    };

    if (passages.length === 0) {
      log.info({ topic: args.topic, candidates: documents.length }, 'no passages to rank');
      return { ...base, empty: true, degraded: [], passages: [] };
    }

    const lexical = new Bm25Index(
      passages.map((passage) => passage.text),
      { k1: this.options.k1, b: this.options.b, stopwords: this.options.stopwords }
    ).score(args.topic);
    const semantic = await this.semanticScores(args.topic, passages, context);

    const fused = fuseRankings(
      passages.map((passage, index) => ({
        id: passage.id,
        order: passage.order,
        semantic: semantic ? semantic[index] : null,
        lexical: lexical[index]
      })),
      this.options.fusion
    );

    const selected = fused.slice(0, this.options.topK).map((entry, index): RetrievedPassage => {
      const passage = passages[entry.order];
      return {
        id: passage.id,
        documentId: passage.documentId,
        title: passage.document.title,
        url: passage.document.url,
        fetchedAt,
        text: passage.text,
        rank: index + 1,
        scores: {
          semantic: entry.semantic,
          lexical: entry.lexical,
          semanticRank: entry.semanticRank,
          lexicalRank: entry.lexicalRank,
          fused: entry.fused
        }
      };
    });

    return {
      ...base,
      empty: false,
      degraded: semantic ? [] : ['semantic'],
      passages: selected
    };
  }
}
