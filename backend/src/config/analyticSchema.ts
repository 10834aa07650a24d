import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { config } from './app.js';

export const columnTypeSchema = z.enum(['text', 'integer', 'real', 'date']);

const columnSchema = z
  .object({
    name: z.string().regex(/^[a-z_][a-z0-9_]*$/),
    type: columnTypeSchema,
    description: z.string(),
    values: z.array(z.string()).optional()
  })
  .strict();

const tableSchema = z
  .object({
    name: z.string().regex(/^[a-z_][a-z0-9_]*$/),
    description: z.string(),
    referenceDateColumn: z.string().optional(),
    columns: z.array(columnSchema).min(1)
  })
  .strict()
  .refine((table) => !table.referenceDateColumn || table.columns.some((c) => c.name === table.referenceDateColumn && c.type === 'date'), {
    message: 'referenceDateColumn must name a date column of the table'
  });

export const analyticSchemaSchema = z.object({ tables: z.array(tableSchema).min(1) }).strict();

export type ColumnType = z.infer<typeof columnTypeSchema>;
export type AnalyticColumn = z.infer<typeof columnSchema>;
export type AnalyticTable = z.infer<typeof tableSchema>;
export type AnalyticSchema = z.infer<typeof analyticSchemaSchema>;

export function parseAnalyticSchema(raw: unknown): AnalyticSchema {
  return analyticSchemaSchema.parse(raw);
}

export function loadAnalyticSchema(path: string = config.ANALYTIC_SCHEMA_PATH): AnalyticSchema {
  return parseAnalyticSchema(JSON.parse(readFileSync(path, 'utf8')));
}

export function findTable(schema: AnalyticSchema, name: string): AnalyticTable | undefined {
  return schema.tables.find((table) => table.name === name);
}

export function findColumn(table: AnalyticTable, name: string): AnalyticColumn | undefined {
  return table.columns.find((column) => column.name === name);
}

/** The table whose reference date anchors relative periods. */
export function referenceTable(schema: AnalyticSchema): (AnalyticTable & { referenceDateColumn: string }) | undefined {
  for (const table of schema.tables) {
    if (table.referenceDateColumn) {
      return { ...table, referenceDateColumn: table.referenceDateColumn };
    }
  }
  return undefined;
}

/** Compact description handed to the model when it plans a query. */
export function describeAnalyticSchema(schema: AnalyticSchema): string {
  return schema.tables
    .map((table) => {
      const columns = table.columns.map((column) => {
        const values = column.values ? ` values: ${column.values.join(' | ')}` : '';
        return `  - ${column.name} (${column.type}): ${column.description}${values}`;
      });
      return [`table ${table.name}: ${table.description}`, ...columns].join('\n');
    })
    .join('\n\n');
}
