import { z } from 'zod';
import type { ResultColumn } from '../../../shared/types.js';
import {
  findTable,
  type AnalyticColumn,
  type AnalyticSchema,
  type ColumnType
} from '../config/analyticSchema.js';
import { SchemaViolationError } from '../utils/errors.js';

const aggregateSchema = z.enum(['count', 'count_distinct', 'sum', 'avg', 'min', 'max']);
const bucketSchema = z.enum(['day', 'week', 'month', 'year']);
const operatorSchema = z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'between', 'is_null', 'not_null']);
const scalarSchema = z.union([z.string(), z.number()]);

export const queryPlanSchema = z
  .object({
    table: z.string(),
    select: z
      .array(
        z
          .object({
            column: z.string(),
            aggregate: aggregateSchema.nullish(),
            bucket: bucketSchema.nullish()
          })
          .strict()
      )
      .min(1),
    filters: z
      .array(
        z
          .object({
            column: z.string(),
            op: operatorSchema,
            value: z.union([scalarSchema, z.array(scalarSchema)]).nullish()
          })
          .strict()
      )
      .nullish(),
    orderBy: z
      .array(
        z
          .object({
            alias: z.string(),
            direction: z.enum(['asc', 'desc']).nullish()
          })
          .strict()
      )
      .nullish(),
    limit: z.number().int().positive().nullish()
  })
  .strict();

export type QueryPlan = z.infer<typeof queryPlanSchema>;
export type Aggregate = z.infer<typeof aggregateSchema>;
export type DateBucket = z.infer<typeof bucketSchema>;
type SelectItem = QueryPlan['select'][number];
type Filter = NonNullable<QueryPlan['filters']>[number];
type Scalar = z.infer<typeof scalarSchema>;

export interface CompiledQuery {
  sql: string;
  params: Scalar[];
  columns: ResultColumn[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const comparisonSql: Record<'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte', string> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<='
};

const bucketSql: Record<DateBucket, (column: string) => string> = {
  day: (column) => `date(${column})`,
  week: (column) => `strftime('%Y-W%W', ${column})`,
  month: (column) => `strftime('%Y-%m', ${column})`,
  year: (column) => `strftime('%Y', ${column})`
};

function quote(identifier: string): string {
  return `"${identifier}"`;
}

function isNumeric(type: ColumnType): boolean {
  return type === 'integer' || type === 'real';
}

function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function checkValue(column: AnalyticColumn, value: Scalar, op: Filter['op']): Scalar {
  switch (column.type) {
    case 'date':
      if (typeof value !== 'string' || !isValidIsoDate(value)) {
        throw new SchemaViolationError(`filter on "${column.name}" needs a YYYY-MM-DD date`);
      }
      return value;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new SchemaViolationError(`filter on "${column.name}" needs an integer`);
      }
      return value;
    case 'real':
      if (typeof value !== 'number') {
        throw new SchemaViolationError(`filter on "${column.name}" needs a number`);
      }
      return value;
    case 'text':
      if (typeof value !== 'string') {
        throw new SchemaViolationError(`filter on "${column.name}" needs a string`);
      }
      if (column.values && (op === 'eq' || op === 'neq' || op === 'in') && !column.values.includes(value)) {
        throw new SchemaViolationError(
          `"${value}" is not a value of "${column.name}"; expected one of ${column.values.join(', ')}`
        );
      }
      return value;
  }
}

function compileSelect(item: SelectItem, columns: AnalyticColumn[]): { expression: string; output: ResultColumn; grouped: boolean } {
  const aggregate = item.aggregate ?? undefined;
  const bucket = item.bucket ?? undefined;

  if (item.column === '*') {
    if (aggregate !== 'count' || bucket) {
      throw new SchemaViolationError('"*" is only allowed as count(*)');
    }
    return { expression: 'COUNT(*)', output: { name: 'count_all', type: 'integer' }, grouped: false };
  }

  const column = columns.find((candidate) => candidate.name === item.column);
  if (!column) {
    throw new SchemaViolationError(`column "${item.column}" is not queryable`);
  }

  if (aggregate && bucket) {
    throw new SchemaViolationError(`"${column.name}" cannot be both aggregated and bucketed`);
  }

  if (bucket) {
    if (column.type !== 'date') {
      throw new SchemaViolationError(`bucket "${bucket}" needs a date column, "${column.name}" is ${column.type}`);
    }
    return {
      expression: bucketSql[bucket](quote(column.name)),
      output: { name: `${column.name}_${bucket}`, type: bucket === 'day' ? 'date' : 'text' },
      grouped: true
    };
  }

  if (!aggregate) {
    return { expression: quote(column.name), output: { name: column.name, type: column.type }, grouped: true };
  }

  if ((aggregate === 'sum' || aggregate === 'avg') && !isNumeric(column.type)) {
    throw new SchemaViolationError(`${aggregate} needs a numeric column, "${column.name}" is ${column.type}`);
  }

  const name = `${aggregate}_${column.name}`;
  switch (aggregate) {
    case 'count':
      return { expression: `COUNT(${quote(column.name)})`, output: { name, type: 'integer' }, grouped: false };
    case 'count_distinct':
      return { expression: `COUNT(DISTINCT ${quote(column.name)})`, output: { name, type: 'integer' }, grouped: false };
    case 'avg':
      return { expression: `AVG(${quote(column.name)})`, output: { name, type: 'real' }, grouped: false };
    case 'sum':
      return { expression: `SUM(${quote(column.name)})`, output: { name, type: column.type }, grouped: false };
    case 'min':
      return { expression: `MIN(${quote(column.name)})`, output: { name, type: column.type }, grouped: false };
    case 'max':
      return { expression: `MAX(${quote(column.name)})`, output: { name, type: column.type }, grouped: false };
  }
}

function compileFilter(filter: Filter, columns: AnalyticColumn[], params: Scalar[]): string {
  const column = columns.find((candidate) => candidate.name === filter.column);
  if (!column) {
    throw new SchemaViolationError(`column "${filter.column}" is not queryable`);
  }
  const target = quote(column.name);
  const value = filter.value ?? undefined;

  switch (filter.op) {
    case 'is_null':
    case 'not_null':
      if (value !== undefined) {
        throw new SchemaViolationError(`${filter.op} takes no value`);
      }
      return `${target} ${filter.op === 'is_null' ? 'IS NULL' : 'IS NOT NULL'}`;
    case 'in': {
      if (!Array.isArray(value) || value.length === 0) {
        throw new SchemaViolationError('in needs a non-empty list of values');
      }
      for (const entry of value) {
        params.push(checkValue(column, entry, filter.op));
      }
      return `${target} IN (${value.map(() => '?').join(', ')})`;
    }
    case 'between': {
      if (!Array.isArray(value) || value.length !== 2) {
        throw new SchemaViolationError('between needs exactly two values');
      }
      params.push(checkValue(column, value[0], filter.op), checkValue(column, value[1], filter.op));
      return `${target} BETWEEN ? AND ?`;
    }
    default: {
      if (value === undefined || Array.isArray(value)) {
        throw new SchemaViolationError(`${filter.op} needs a single value`);
      }
      params.push(checkValue(column, value, filter.op));
      return `${target} ${comparisonSql[filter.op]} ?`;
    }
  }
}

/**
 * Compiles a query plan to a parameterized read-only SELECT. Every identifier is
 * resolved against the allow-list; output column names are derived from it, so
 * no result can carry a column the schema does not declare.
 *
 * The LIMIT is at most `maxRows + 1` so the caller can tell an overflow apart
 * from a result that exactly fills the cap.
 */
export function compileQueryPlan(plan: QueryPlan, schema: AnalyticSchema, maxRows: number): CompiledQuery {
  const table = findTable(schema, plan.table);
  if (!table) {
    throw new SchemaViolationError(`table "${plan.table}" is not queryable`);
  }

  const params: Scalar[] = [];
  const selected = plan.select.map((item) => compileSelect(item, table.columns));

  const aliases = new Set<string>();
  for (const entry of selected) {
    if (aliases.has(entry.output.name)) {
      throw new SchemaViolationError(`output column "${entry.output.name}" is selected twice`);
    }
    aliases.add(entry.output.name);
  }

  const clauses = [
    `SELECT ${selected.map((entry) => `${entry.expression} AS ${quote(entry.output.name)}`).join(', ')}`,
    `FROM ${quote(table.name)}`
  ];

  const filters = plan.filters ?? [];
  if (filters.length > 0) {
    clauses.push(`WHERE ${filters.map((filter) => compileFilter(filter, table.columns, params)).join(' AND ')}`);
  }

  const hasAggregate = selected.some((entry) => !entry.grouped);
  const groupKeys = selected.filter((entry) => entry.grouped);
  if (hasAggregate && groupKeys.length > 0) {
    clauses.push(`GROUP BY ${groupKeys.map((entry) => entry.expression).join(', ')}`);
  }

  const orderBy = plan.orderBy ?? [];
  if (orderBy.length > 0) {
    const terms = orderBy.map((term) => {
      if (!aliases.has(term.alias)) {
        throw new SchemaViolationError(`cannot order by "${term.alias}", it is not a selected column`);
      }
      return `${quote(term.alias)} ${term.direction === 'desc' ? 'DESC' : 'ASC'}`;
    });
    clauses.push(`ORDER BY ${terms.join(', ')}`);
  }

  const limit = Math.min(plan.limit ?? Number.POSITIVE_INFINITY, maxRows + 1);
  clauses.push('LIMIT ?');
  params.push(limit);

  return { sql: clauses.join(' '), params, columns: selected.map((entry) => entry.output) };
}

/** Columns a compiled query may return, for checking results against the allow-list. */
export function allowedOutputNames(schema: AnalyticSchema): Set<string> {
  const names = new Set<string>(['count_all']);
  for (const table of schema.tables) {
    for (const column of table.columns) {
      names.add(column.name);
      for (const aggregate of aggregateSchema.options) {
        names.add(`${aggregate}_${column.name}`);
      }
      if (column.type === 'date') {
        for (const bucket of bucketSchema.options) {
          names.add(`${column.name}_${bucket}`);
        }
      }
    }
  }
  return names;
}
