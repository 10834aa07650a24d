import type Database from 'better-sqlite3';
import type {
  AnalyticQueryResult,
  CellValue,
  DailyCount,
  MonthlyCount,
  StoreMetadataResponse
} from '../../../shared/types.js';
import { config } from '../config/app.js';
import { loadAnalyticSchema, referenceTable, type AnalyticSchema } from '../config/analyticSchema.js';
import type { CompiledQuery } from '../tools/queryCompiler.js';
import { ExecutionError, TimeoutError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { openReadonlyDatabase } from '../utils/sqlite-utils.js';

const log = moduleLogger('analytic-store');

export interface ResultLimits {
  maxRows: number;
  maxBytes: number;
  /** Queries run synchronously, so this is checked once the driver returns. */
  maxDurationMs?: number;
}

export interface AnalyticStoreOptions {
  /** Monotonic milliseconds. */
  clock?: () => number;
}

export type QueryRows = Pick<AnalyticQueryResult, 'columns' | 'rows' | 'rowCount' | 'truncated' | 'truncation'>;

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return String(value);
}

function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

function addMonths(month: string, months: number): string {
  const [year, monthIndex] = month.split('-').map(Number);
  const date = new Date(Date.UTC(year, monthIndex - 1 + months, 1));
  return date.toISOString().slice(0, 7);
}

/**
 * Read-only access to the ETL-produced store. Every query the agent runs goes
 * through `execute`, which enforces the row and byte caps.
 */
export class AnalyticStore {
  readonly schema: AnalyticSchema;
  private readonly db: Database.Database;
  private readonly clock: () => number;

  constructor(db: Database.Database, schema: AnalyticSchema, options: AnalyticStoreOptions = {}) {
    this.db = db;
    this.schema = schema;
    this.clock = options.clock ?? (() => performance.now());
  }

  static open(path: string = config.ANALYTIC_DB_PATH, schemaPath: string = config.ANALYTIC_SCHEMA_PATH): AnalyticStore {
    const store = new AnalyticStore(openReadonlyDatabase(path), loadAnalyticSchema(schemaPath));
    log.info({ path, latestDataDate: store.latestDataDate() }, 'analytic store opened');
    return store;
  }

  /** `MAX(reference date)`, or null when the table is empty or unreadable. */
  latestDataDate(): string | null {
    const table = referenceTable(this.schema);
    if (!table) {
      return null;
    }
    try {
      const value = this.db
        .prepare(`SELECT MAX("${table.referenceDateColumn}") FROM "${table.name}"`)
        .pluck()
        .get();
      return typeof value === 'string' && value.length > 0 ? value : null;
    } catch (error) {
      log.warn({ err: error }, 'could not read the latest data date');
      return null;
    }
  }

  metadata(): StoreMetadataResponse {
    return {
      latestDataDate: this.latestDataDate(),
      tables: this.schema.tables.map((table) => ({
        name: table.name,
        description: table.description,
        columns: table.columns.map((column) => column.name)
      }))
    };
  }

  /**
   * Runs a compiled query. Rows beyond `maxRows` are dropped first, then trailing
   * rows until the JSON-serialized rows fit `maxBytes`. Driver errors never
   * leave this method with their original text. A query that outlived
   * `maxDurationMs` is reported as a timeout even though it completed.
   */
  execute(query: CompiledQuery, limits: ResultLimits): QueryRows {
    let fetched: unknown[];
    const startedAt = this.clock();
    try {
      fetched = this.db.prepare(query.sql).raw(true).all(...query.params);
    } catch (error) {
      log.warn({ err: error, sql: query.sql }, 'analytic query failed');
      throw new ExecutionError('query execution failed', { cause: error });
    }

    const elapsedMs = this.clock() - startedAt;
    if (limits.maxDurationMs !== undefined && elapsedMs > limits.maxDurationMs) {
      log.warn({ sql: query.sql, elapsedMs, maxDurationMs: limits.maxDurationMs }, 'analytic query exceeded its time budget');
      throw new TimeoutError('analytic query', limits.maxDurationMs);
    }

    let rows: CellValue[][] = fetched.map((row) => (Array.isArray(row) ? row.map(toCell) : [toCell(row)]));
    let truncation: QueryRows['truncation'];

    if (rows.length > limits.maxRows) {
      rows = rows.slice(0, limits.maxRows);
      truncation = { reason: 'rows', maxRows: limits.maxRows, maxBytes: limits.maxBytes };
    }

    // "[" + rows joined by "," + "]"
    let bytes = 2;
    let fitting = 0;
    for (const row of rows) {
      const rowBytes = Buffer.byteLength(JSON.stringify(row)) + (fitting > 0 ? 1 : 0);
      if (bytes + rowBytes > limits.maxBytes) {
        break;
      }
      bytes += rowBytes;
      fitting += 1;
    }
    if (fitting < rows.length) {
      truncation = {
        reason: 'bytes',
        maxRows: limits.maxRows,
        maxBytes: limits.maxBytes,
        omittedRows: rows.length - fitting
      };
      rows = rows.slice(0, fitting);
    }

    return {
      columns: query.columns,
      rows,
      rowCount: rows.length,
      truncated: truncation !== undefined,
      ...(truncation ? { truncation } : {})
    };
  }

  /** One point per day for the `days` days ending at the latest data date, zero-filled. */
  dailyCounts(days: number): DailyCount[] {
    const table = referenceTable(this.schema);
    const latest = this.latestDataDate();
    if (!table || !latest) {
      return [];
    }
    const start = addDays(latest, -(days - 1));
    const column = `"${table.referenceDateColumn}"`;
    const rows = this.db
      .prepare(
        `SELECT ${column}, COUNT(*) FROM "${table.name}" WHERE ${column} BETWEEN ? AND ? GROUP BY ${column}`
      )
      .raw(true)
      .all(start, latest);

    const counts = new Map<string, number>();
    for (const row of rows) {
      if (Array.isArray(row) && typeof row[0] === 'string') {
        counts.set(row[0], Number(row[1]));
      }
    }

    return Array.from({ length: days }, (_, index) => {
      const date = addDays(start, index);
      return { date, cases: counts.get(date) ?? 0 };
    });
  }

  /** One point per calendar month for the `months` months ending at the latest data date's month. */
  monthlyCounts(months: number): MonthlyCount[] {
    const table = referenceTable(this.schema);
    const latest = this.latestDataDate();
    if (!table || !latest) {
      return [];
    }
    const lastMonth = latest.slice(0, 7);
    const firstMonth = addMonths(lastMonth, -(months - 1));
    const column = `"${table.referenceDateColumn}"`;
    const rows = this.db
      .prepare(
        `SELECT strftime('%Y-%m', ${column}) AS month, COUNT(*) FROM "${table.name}" WHERE ${column} BETWEEN ? AND ? GROUP BY month`
      )
      .raw(true)
      .all(`${firstMonth}-01`, latest);

    const counts = new Map<string, number>();
    for (const row of rows) {
      if (Array.isArray(row) && typeof row[0] === 'string') {
        counts.set(row[0], Number(row[1]));
      }
    }

    return Array.from({ length: months }, (_, index) => {
      const month = addMonths(firstMonth, index);
      return { month, cases: counts.get(month) ?? 0 };
    });
  }

  close(): void {
    this.db.close();
  }
}
