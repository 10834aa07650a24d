import { afterEach, describe, expect, it } from 'vitest';
import { loadAnalyticSchema } from '../config/analyticSchema.js';
import type { AnalyticStore } from '../store/analyticStore.js';
import { compileQueryPlan } from '../tools/queryCompiler.js';
import { ExecutionError, TimeoutError } from '../utils/errors.js';
import { openReadonlyDatabase } from '../utils/sqlite-utils.js';
import { createTestStore, icuCases, type CaseRow } from './fixtures.js';

const schema = loadAnalyticSchema();

const fiveDays: CaseRow[] = ['2025-05-26', '2025-05-27', '2025-05-28', '2025-05-29', '2025-05-30'].map((date) => ({
  data_sintomas: date
}));

function datesQuery(maxRows: number) {
  return compileQueryPlan(
    {
      table: 'casos_srag',
      select: [{ column: 'data_sintomas' }],
      orderBy: [{ alias: 'data_sintomas', direction: 'asc' }]
    },
    schema,
    maxRows
  );
}

describe('AnalyticStore', () => {
  let store: AnalyticStore | undefined;

  afterEach(() => {
    store?.close();
    store = undefined;
  });

  it('reports the latest symptom date', () => {
    store = createTestStore([{ data_sintomas: '2025-05-28' }, { data_sintomas: '2025-05-30' }, { data_sintomas: '2025-05-29' }]);
    expect(store.latestDataDate()).toBe('2025-05-30');
  });

  it('has no latest date when the table is empty', () => {
    store = createTestStore();
    expect(store.latestDataDate()).toBeNull();
  });

  it('executes a compiled query', () => {
    store = createTestStore(icuCases);
    const query = compileQueryPlan(
      {
        table: 'casos_srag',
        select: [{ column: 'uti' }, { column: '*', aggregate: 'count' }],
        orderBy: [{ alias: 'count_all', direction: 'desc' }]
      },
      schema,
      50
    );

    const result = store.execute(query, { maxRows: 50, maxBytes: 8000 });

    expect(result.columns).toEqual([
      { name: 'uti', type: 'text' },
      { name: 'count_all', type: 'integer' }
    ]);
    expect(result.rows).toEqual([
      ['Sim', 3],
      ['Não', 1]
    ]);
    expect(result.rowCount).toBe(2);
    expect(result.truncated).toBe(false);
    expect(result.truncation).toBeUndefined();
  });

  it('truncates to the row cap and says so', () => {
    store = createTestStore(fiveDays);
    const result = store.execute(datesQuery(2), { maxRows: 2, maxBytes: 8000 });

    expect(result.rows).toEqual([['2025-05-26'], ['2025-05-27']]);
    expect(result.rowCount).toBe(2);
    expect(result.truncated).toBe(true);
    expect(result.truncation).toEqual({ reason: 'rows', maxRows: 2, maxBytes: 8000 });
  });

  it('truncates to the byte cap and counts omitted rows', () => {
    store = createTestStore(fiveDays);
    // each row serializes to 14 bytes; 2 + 14 + 15 = 31 fits, a third row would need 46
    const result = store.execute(datesQuery(10), { maxRows: 10, maxBytes: 40 });

    expect(result.rows).toEqual([['2025-05-26'], ['2025-05-27']]);
    expect(result.truncation).toEqual({ reason: 'bytes', maxRows: 10, maxBytes: 40, omittedRows: 3 });
  });

  it('reports a query that outlived its time budget as a timeout', () => {
    let now = 0;
    store = createTestStore(fiveDays, { clock: () => (now += 3000) });
    const run = () => store?.execute(datesQuery(10), { maxRows: 10, maxBytes: 8000, maxDurationMs: 1000 });

    expect(run).toThrow(TimeoutError);
    expect(run).toThrow('analytic query timed out after 1000ms');
  });

  it('keeps queries that finish within their time budget', () => {
    let now = 0;
    store = createTestStore(fiveDays, { clock: () => (now += 500) });

    expect(store.execute(datesQuery(10), { maxRows: 10, maxBytes: 8000, maxDurationMs: 1000 }).rowCount).toBe(5);
  });

  it('hides driver errors behind an execution error', () => {
    store = createTestStore();
    const run = () => store?.execute({ sql: 'SELECT * FROM missing_table LIMIT ?', params: [1], columns: [] }, { maxRows: 5, maxBytes: 8000 });

    expect(run).toThrow(ExecutionError);
    expect(run).toThrow('query execution failed');
  });

  it('zero-fills daily counts up to the latest date', () => {
    store = createTestStore([{ data_sintomas: '2025-05-28' }, { data_sintomas: '2025-05-28' }, { data_sintomas: '2025-05-30' }]);
    expect(store.dailyCounts(3)).toEqual([
      { date: '2025-05-28', cases: 2 },
      { date: '2025-05-29', cases: 0 },
      { date: '2025-05-30', cases: 1 }
    ]);
  });

  it('zero-fills monthly counts up to the latest month', () => {
    store = createTestStore([
      { data_sintomas: '2025-03-15' },
      { data_sintomas: '2025-05-02' },
      { data_sintomas: '2025-05-20' },
      { data_sintomas: '2025-05-30' }
    ]);
    expect(store.monthlyCounts(3)).toEqual([
      { month: '2025-03', cases: 1 },
      { month: '2025-04', cases: 0 },
      { month: '2025-05', cases: 3 }
    ]);
  });

  it('returns no series for an empty store', () => {
    store = createTestStore();
    expect(store.dailyCounts(30)).toEqual([]);
    expect(store.monthlyCounts(12)).toEqual([]);
  });

  it('describes its tables', () => {
    store = createTestStore(icuCases);
    const metadata = store.metadata();

    expect(metadata.latestDataDate).toBe('2025-05-30');
    expect(metadata.tables).toHaveLength(1);
    expect(metadata.tables[0].name).toBe('casos_srag');
    expect(metadata.tables[0].columns).toEqual([
      'data_sintomas',
      'uf',
      'sexo',
      'idade',
      'uti',
      'data_entrada_uti',
      'data_saida_uti',
      'evolucao',
      'vacina_covid',
      'data_dose1_covid'
    ]);
  });
});

describe('openReadonlyDatabase', () => {
  it('refuses an in-memory path', () => {
    expect(() => openReadonlyDatabase(':memory:')).toThrow('an in-memory database cannot be opened read-only');
  });

  it('refuses a missing file', () => {
    expect(() => openReadonlyDatabase('./backend/data/does-not-exist.db')).toThrow('analytic store not found at');
  });
});
