export const QueryPlanSchema = {
  type: 'json_schema' as const,
  name: 'analytic_query_plan',
  strict: false,
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      table: { type: 'string' },
      select: {
        type: 'array',
        minItems: 1,
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            column: { type: 'string', description: 'Column name, or "*" with aggregate "count".' },
            aggregate: { enum: ['count', 'count_distinct', 'sum', 'avg', 'min', 'max'] },
            bucket: { enum: ['day', 'week', 'month', 'year'] }
          },
          required: ['column']
        }
      },
      filters: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            column: { type: 'string' },
            op: { enum: ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'between', 'is_null', 'not_null'] },
            value: {
              anyOf: [
                { type: 'string' },
                { type: 'number' },
                { type: 'array', items: { anyOf: [{ type: 'string' }, { type: 'number' }] } }
              ]
            }
          },
          required: ['column', 'op']
        }
      },
      orderBy: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            alias: { type: 'string' },
            direction: { enum: ['asc', 'desc'] }
          },
          required: ['alias']
        }
      },
      limit: { type: 'integer', minimum: 1 }
    },
    required: ['table', 'select']
  }
};

const citations = {
  type: 'array',
  items: { type: 'string' },
  description: 'Observation ids (obs-N) supporting the statement.'
};

export const ReportSchema = {
  type: 'json_schema' as const,
  name: 'surveillance_report',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      title: { type: 'string' },
      executiveSummary: { type: 'string' },
      situation: {
        type: 'object',
        additionalProperties: false,
        properties: {
          trend: { enum: ['rising', 'falling', 'stable', 'unknown'] },
          explanation: { type: 'string' }
        },
        required: ['trend', 'explanation']
      },
      metrics: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            name: { enum: ['case_growth_rate', 'mortality_rate', 'icu_occupancy_rate', 'vaccination_rate'] },
            value: { type: ['string', 'null'] },
            citations
          },
          required: ['name', 'value', 'citations']
        }
      },
      recentContext: { type: 'string' },
      interpretation: { type: 'string' },
      limitations: { type: 'string' },
      recommendations: { type: 'string' },
      claims: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            statement: { type: 'string' },
            figures: { type: 'array', items: { type: 'string' } },
            citations
          },
          required: ['statement', 'figures', 'citations']
        }
      }
    },
    required: [
      'title',
      'executiveSummary',
      'situation',
      'metrics',
      'recentContext',
      'interpretation',
      'limitations',
      'recommendations',
      'claims'
    ]
  }
};
