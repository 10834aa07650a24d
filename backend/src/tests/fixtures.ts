import Database from 'better-sqlite3';
import type { AnalyticQueryResult, NewsRetrievalResult, ToolPayload } from '../../../shared/types.js';
import { loadAnalyticSchema } from '../config/analyticSchema.js';
import type {
  DecideRequest,
  GenerateRequest,
  RawModelOutput,
  ReasoningModel
} from '../orchestrator/reasoningModel.js';
import { foldText } from '../retrieval/lexical.js';
import { AnalyticStore, type AnalyticStoreOptions } from '../store/analyticStore.js';
import {
  defineTool,
  NEWS_TOOL,
  newsArgsSchema,
  QUERY_TOOL,
  queryArgsSchema,
  ToolRegistry,
  toolSchemas,
  type ToolContext
} from '../tools/index.js';
import type { SearchDocument, SearchProvider, SearchRequest } from '../tools/webSearch.js';
import type { EmbeddingClient } from '../utils/embeddings.js';
import { ProviderError } from '../utils/errors.js';

export const FIXED_NOW = new Date('2025-06-01T12:00:00.000Z');
export const fixedClock = () => new Date(FIXED_NOW.getTime());

// ---------------------------------------------------------------------------
// Reasoning model

type DecideStep = RawModelOutput | Error | ((request: DecideRequest, signal: AbortSignal) => Promise<RawModelOutput>);
type GenerateStep = string | Error | ((request: GenerateRequest) => string);

export function text(content: string): RawModelOutput {
  return { text: content, toolCalls: [] };
}

export function call(name: string, args: unknown, callId = 'call_1'): RawModelOutput {
  return { text: '', toolCalls: [{ callId, name, arguments: JSON.stringify(args) }] };
}

/** Replays a fixed script; an exhausted script fails the call like a provider would. */
export class ScriptedModel implements ReasoningModel {
  readonly decideRequests: DecideRequest[] = [];
  readonly generateRequests: GenerateRequest[] = [];
  private readonly steps: DecideStep[];
  private readonly generators: Record<GenerateRequest['stage'], GenerateStep[]>;

  constructor(steps: DecideStep[], generators: Partial<Record<GenerateRequest['stage'], GenerateStep[]>> = {}) {
    this.steps = [...steps];
    this.generators = { query: [...(generators.query ?? [])], synthesis: [...(generators.synthesis ?? [])] };
  }

  async decide(request: DecideRequest, signal: AbortSignal): Promise<RawModelOutput> {
    this.decideRequests.push(request);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new ProviderError('scripted-model', 'script exhausted', { status: 400, code: '400' });
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request, signal);
    }
    return step;
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.generateRequests.push(request);
    const step = this.generators[request.stage].shift();
    if (step === undefined) {
      throw new ProviderError('scripted-model', `no ${request.stage} output scripted`, { status: 400, code: '400' });
    }
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === 'function' ? step(request) : step;
  }
}

export interface ReportJsonOverrides {
  title?: string;
  metrics?: Array<{ name: string; value: string | null; citations: string[] }>;
  claims?: Array<{ statement: string; figures: string[]; citations: string[] }>;
}

export function reportJson(overrides: ReportJsonOverrides = {}): string {
  return JSON.stringify({
    title: overrides.title ?? 'Boletim de SRAG',
    executiveSummary: 'Resumo da situação.',
    situation: { trend: 'rising', explanation: 'Casos em alta nas últimas semanas.' },
    metrics: overrides.metrics ?? [],
    recentContext: 'Notícias recentes.',
    interpretation: 'Interpretação integrada.',
    limitations: 'Atraso de notificação.',
    recommendations: 'Manter vigilância.',
    claims: overrides.claims ?? []
  });
}

// ---------------------------------------------------------------------------
// Analytic store

export interface CaseRow {
  data_sintomas: string;
  uf?: string | null;
  sexo?: string | null;
  idade?: number | null;
  uti?: string | null;
  data_entrada_uti?: string | null;
  data_saida_uti?: string | null;
  evolucao?: string | null;
  vacina_covid?: string | null;
  data_dose1_covid?: string | null;
}

const CREATE_CASES = `
  CREATE TABLE casos_srag (
    data_sintomas TEXT,
    uf TEXT,
    sexo TEXT,
    idade INTEGER,
    uti TEXT,
    data_entrada_uti TEXT,
    data_saida_uti TEXT,
    evolucao TEXT,
    vacina_covid TEXT,
    data_dose1_covid TEXT
  )
`;

export function createCaseDatabase(rows: CaseRow[] = []): Database.Database {
  const db = new Database(':memory:');
  db.exec(CREATE_CASES);
  const insert = db.prepare(
    `INSERT INTO casos_srag VALUES (@data_sintomas, @uf, @sexo, @idade, @uti, @data_entrada_uti, @data_saida_uti, @evolucao, @vacina_covid, @data_dose1_covid)`
  );
  const insertAll = db.transaction((entries: CaseRow[]) => {
    for (const row of entries) {
      insert.run({
        uf: null,
        sexo: null,
        idade: null,
        uti: null,
        data_entrada_uti: null,
        data_saida_uti: null,
        evolucao: null,
        vacina_covid: null,
        data_dose1_covid: null,
        ...row
      });
    }
  });
  insertAll(rows);
  return db;
}

export function createTestStore(rows: CaseRow[] = [], options: AnalyticStoreOptions = {}): AnalyticStore {
  return new AnalyticStore(createCaseDatabase(rows), loadAnalyticSchema(), options);
}

/** Three ICU admissions and one ward case in late May 2025. */
export const icuCases: CaseRow[] = [
  { data_sintomas: '2025-05-20', uf: 'SP', uti: 'Sim', evolucao: 'Cura', vacina_covid: 'Sim' },
  { data_sintomas: '2025-05-24', uf: 'RJ', uti: 'Sim', evolucao: 'Óbito', vacina_covid: 'Não' },
  { data_sintomas: '2025-05-27', uf: 'SP', uti: 'Não', evolucao: 'Cura', vacina_covid: 'Sim' },
  { data_sintomas: '2025-05-30', uf: 'MG', uti: 'Sim', evolucao: null, vacina_covid: 'Sim' }
];

export const icuPlan = JSON.stringify({
  table: 'casos_srag',
  select: [{ column: 'uti' }, { column: '*', aggregate: 'count' }],
  orderBy: [{ alias: 'count_all', direction: 'desc' }]
});

// ---------------------------------------------------------------------------
// Search and embeddings

/** Answers searches from a queue; an empty queue returns no documents. */
export class QueueSearchProvider implements SearchProvider {
  readonly name = 'static';
  readonly requests: SearchRequest[] = [];
  private readonly responses: Array<SearchDocument[] | Error>;

  constructor(responses: Array<SearchDocument[] | Error> = []) {
    this.responses = [...responses];
  }

  async search(request: SearchRequest): Promise<SearchDocument[]> {
    this.requests.push(request);
    const next = this.responses.shift() ?? [];
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/** Term-count vectors over a fixed vocabulary. */
export class KeywordEmbeddingClient implements EmbeddingClient {
  readonly batches: string[][] = [];
  private readonly vocabulary: string[];

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    return texts.map((entry) => {
      const tokens = foldText(entry).split(/[^a-z0-9]+/);
      return this.vocabulary.map((word) => tokens.filter((token) => token === word).length);
    });
  }
}

export class FailingEmbeddingClient implements EmbeddingClient {
  async embed(): Promise<number[][]> {
    throw new ProviderError('embeddings', 'embedding service unavailable', { status: 401, code: '401' });
  }
}

export const newsDocuments: SearchDocument[] = [
  {
    title: 'Hospitais com UTI lotada',
    url: 'https://news.test/uti',
    content: 'Ocupação de UTI por SRAG chega a 80% em hospitais de São Paulo.'
  },
  {
    title: 'Campanha de vacinação',
    url: 'https://news.test/vacina',
    content: 'Campanha de vacinação contra influenza é ampliada no interior.'
  }
];

// ---------------------------------------------------------------------------
// Tool payloads

export function analyticPayload(overrides: Partial<AnalyticQueryResult> = {}): AnalyticQueryResult {
  return {
    kind: 'analytic_query',
    question: 'ICU admissions by status',
    sql: 'SELECT "uti" AS "uti", COUNT(*) AS "count_all" FROM "casos_srag" GROUP BY "uti" LIMIT ?',
    params: [51],
    columns: [
      { name: 'uti', type: 'text' },
      { name: 'count_all', type: 'integer' }
    ],
    rows: [
      ['Sim', 3],
      ['Não', 1]
    ],
    rowCount: 2,
    truncated: false,
    ...overrides
  };
}

export function newsPayload(overrides: Partial<NewsRetrievalResult> = {}): NewsRetrievalResult {
  return {
    kind: 'news_retrieval',
    topic: 'ocupação de UTI',
    candidateCount: 1,
    passageCount: 1,
    empty: false,
    degraded: [],
    passages: [
      {
        id: 'doc-1#1',
        documentId: 'doc-1',
        title: 'Hospitais com UTI lotada',
        url: 'https://news.test/uti',
        fetchedAt: FIXED_NOW.toISOString(),
        text: 'Ocupação de UTI por SRAG chega a 80%.',
        rank: 1,
        scores: { semantic: 1, lexical: 1, semanticRank: 1, lexicalRank: 1, fused: 1 / 61 }
      }
    ],
    ...overrides
  };
}

type ToolRun = (args: Record<string, unknown>, context: ToolContext) => Promise<ToolPayload>;

/** The real tool declarations backed by test doubles. */
export function fakeRegistry(runs: { query?: ToolRun; news?: ToolRun } = {}): ToolRegistry {
  return new ToolRegistry([
    defineTool({
      ...toolSchemas[QUERY_TOOL],
      schema: queryArgsSchema,
      run: runs.query ?? (async () => analyticPayload())
    }),
    defineTool({
      ...toolSchemas[NEWS_TOOL],
      schema: newsArgsSchema,
      run: runs.news ?? (async () => newsPayload())
    })
  ]);
}
