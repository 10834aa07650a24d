import type { AnalyticQueryResult } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { describeAnalyticSchema } from '../config/analyticSchema.js';
import type { ReasoningModel } from '../orchestrator/reasoningModel.js';
import { QueryPlanSchema } from '../orchestrator/schemas.js';
import type { AnalyticStore, ResultLimits } from '../store/analyticStore.js';
import { ExecutionError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { parseJsonObject } from '../utils/openai.js';
import { formatIssues } from './index.js';
import { compileQueryPlan, queryPlanSchema, type QueryPlan } from './queryCompiler.js';

const log = moduleLogger('structured-query');

export interface StructuredQueryArgs {
  question: string;
}

export interface StructuredQueryContext {
  dataDate: string | null;
  signal: AbortSignal;
}

export interface StructuredQueryOptions {
  limits?: Partial<ResultLimits>;
}

function plannerPrompt(schemaDescription: string, dataDate: string | null): string {
  const reference = dataDate
    ? `The most recent date in the data is ${dataDate}. Treat it as "today": "last 30 days" means the 30 days ending on ${dataDate}. Never use the calendar date.`
    : 'The most recent data date is unknown; do not assume a calendar date, use explicit dates from the question only.';

  return [
    'You translate epidemiological questions into a JSON query plan over a read-only SQLite store.',
    reference,
    'Only the tables and columns below exist. Use column "*" only with aggregate "count" (output name count_all).',
    'Output column names are: the column name; <column>_<bucket> for bucketed dates; <aggregate>_<column> for aggregates.',
    'orderBy refers to those output names. Dates are YYYY-MM-DD strings. Categorical values must be written exactly as listed.',
    'Rates (mortality, ICU occupancy, vaccination) need both a numerator and a denominator: group by the categorical column and count.',
    '',
    schemaDescription
  ].join('\n');
}

/**
 * Answers an analytic question by having the model plan a query, compiling the
 * plan against the allow-list and executing it under the row and byte caps.
 */
export class StructuredQueryTool {
  private readonly store: AnalyticStore;
  private readonly model: ReasoningModel;
  private readonly limits: ResultLimits;

  constructor(store: AnalyticStore, model: ReasoningModel, options: StructuredQueryOptions = {}) {
    this.store = store;
    this.model = model;
    this.limits = {
      maxRows: options.limits?.maxRows ?? config.SQL_MAX_ROWS,
      maxBytes: options.limits?.maxBytes ?? config.SQL_MAX_BYTES,
      maxDurationMs: options.limits?.maxDurationMs ?? config.TOOL_TIMEOUT_MS
    };
  }

  async planQuery(question: string, context: StructuredQueryContext): Promise<QueryPlan> {
    const raw = await this.model.generate(
      {
        stage: 'query',
        system: plannerPrompt(describeAnalyticSchema(this.store.schema), context.dataDate),
        user: question,
        jsonSchema: QueryPlanSchema
      },
      context.signal
    );

    const candidate = parseJsonObject(raw);
    if (!candidate) {
      throw new ExecutionError('query plan was not a JSON object');
    }

    const parsed = queryPlanSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ExecutionError(`query plan did not match the expected shape: ${formatIssues(parsed.error).join('; ')}`);
    }
    return parsed.data;
  }

  async run(args: StructuredQueryArgs, context: StructuredQueryContext): Promise<AnalyticQueryResult> {
    const plan = await this.planQuery(args.question, context);
    const compiled = compileQueryPlan(plan, this.store.schema, this.limits.maxRows);
    log.debug({ sql: compiled.sql, params: compiled.params }, 'executing analytic query');

    const result = this.store.execute(compiled, this.limits);
    return {
      kind: 'analytic_query',
      question: args.question,
      sql: compiled.sql,
      params: compiled.params,
      ...result
    };
  }
}
