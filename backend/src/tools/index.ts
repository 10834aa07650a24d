import { z } from 'zod';
import type { ToolName, ToolPayload } from '../../../shared/types.js';
import type { ModelToolSpec } from '../orchestrator/reasoningModel.js';
import type { EmbeddingCache } from '../utils/embeddings.js';
import type { HybridRetrievalTool } from './hybridRetrieval.js';
import type { StructuredQueryTool } from './structuredQuery.js';

export const QUERY_TOOL: Extract<ToolName, 'query_surveillance_db'> = 'query_surveillance_db';
export const NEWS_TOOL: Extract<ToolName, 'search_news_context'> = 'search_news_context';

/** Per-invocation context handed to a tool by the dispatcher. */
export interface ToolContext {
  sessionId: string;
  dataDate: string | null;
  signal: AbortSignal;
  embeddingCache?: EmbeddingCache;
}

export type PreparedCall =
  | { ok: true; arguments: Record<string, unknown>; invoke: (context: ToolContext) => Promise<ToolPayload> }
  | { ok: false; issues: string[] };

export interface ToolDefinition {
  name: ToolName;
  description: string;
  /** JSON schema shown to the model. */
  parameters: Record<string, unknown>;
  /** Validates raw arguments; only a successful result can be invoked. */
  prepare(raw: unknown): PreparedCall;
}

interface ToolSpec<TArgs extends Record<string, unknown>> {
  name: ToolName;
  description: string;
  parameters: Record<string, unknown>;
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  run: (args: TArgs, context: ToolContext) => Promise<ToolPayload>;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export function defineTool<TArgs extends Record<string, unknown>>(spec: ToolSpec<TArgs>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
    prepare(raw: unknown): PreparedCall {
      const parsed = spec.schema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, issues: formatIssues(parsed.error) };
      }
      const args = parsed.data;
      return { ok: true, arguments: args, invoke: (context) => spec.run(args, context) };
    }
  };
}

export const queryArgsSchema = z
  .object({
    question: z.string().trim().min(3).max(1000)
  })
  .strict();

export const newsArgsSchema = z
  .object({
    topic: z.string().trim().min(2).max(300),
    recency_days: z.number().int().min(1).max(365).optional()
  })
  .strict();

export const toolSchemas = {
  [QUERY_TOOL]: {
    name: QUERY_TOOL,
    description:
      'Query the local SRAG case store for exact counts, rates and time series. Ask one precise analytic question in natural language; relative periods are resolved against the most recent data date.',
    parameters: {
      type: 'object',
      additionalProperties: false,
      properties: {
        question: { type: 'string', description: 'Analytic question, e.g. "daily new cases in the last 30 days".' }
      },
      required: ['question']
    }
  },
  [NEWS_TOOL]: {
    name: NEWS_TOOL,
    description:
      'Search recent news about SRAG, respiratory viruses, hospital capacity and vaccination to contextualize the numbers. Returns ranked passages with sources.',
    parameters: {
      type: 'object',
      additionalProperties: false,
      properties: {
        topic: { type: 'string', description: 'Search topic, in the language of the news sought.' },
        recency_days: { type: 'integer', minimum: 1, maximum: 365, description: 'Only news from the last N days.' }
      },
      required: ['topic']
    }
  }
} satisfies Record<ToolName, ModelToolSpec>;

export interface ToolDependencies {
  structuredQuery: StructuredQueryTool;
  newsRetrieval: HybridRetrievalTool;
}

/** The fixed set of tools the agent may call. */
export class ToolRegistry {
  private readonly tools: Map<string, ToolDefinition>;

  constructor(definitions: ToolDefinition[]) {
    this.tools = new Map(definitions.map((definition) => [definition.name, definition]));
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): ToolName[] {
    return Array.from(this.tools.values()).map((tool) => tool.name);
  }

  /** Specs offered to the model, minus any withdrawn tools. */
  specs(withdrawn: ReadonlySet<string> = new Set()): ModelToolSpec[] {
    return Array.from(this.tools.values())
      .filter((tool) => !withdrawn.has(tool.name))
      .map((tool) => ({ name: tool.name, description: tool.description, parameters: tool.parameters }));
  }
}

export function createToolRegistry(deps: ToolDependencies): ToolRegistry {
  return new ToolRegistry([
    defineTool({
      ...toolSchemas[QUERY_TOOL],
      schema: queryArgsSchema,
      run: (args, context) => deps.structuredQuery.run(args, { dataDate: context.dataDate, signal: context.signal })
    }),
    defineTool({
      ...toolSchemas[NEWS_TOOL],
      schema: newsArgsSchema,
      run: (args, context) =>
        deps.newsRetrieval.run(args, { signal: context.signal, embeddingCache: context.embeddingCache })
    })
  ]);
}
