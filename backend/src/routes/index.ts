import type { FastifyInstance } from 'fastify';
import { config, isDevelopment } from '../config/app.js';
import type { OriginPolicy } from '../config/cors.js';
import type { ReportService } from '../services/reportService.js';
import type { AnalyticStore } from '../store/analyticStore.js';
import { describeError } from '../utils/errors.js';
import { setupReportStreamRoute } from './reportStream.js';
import { dailyQuerySchema, formatZodIssues, monthlyQuerySchema, reportRequestSchema } from './schemas.js';

export type StoreReader = Pick<AnalyticStore, 'metadata' | 'dailyCounts' | 'monthlyCounts'>;

export interface RouteDependencies {
  reportService: ReportService;
  store: StoreReader;
  originPolicy: OriginPolicy;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDependencies) {
  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      metadata: '/store/metadata',
      dailyAggregates: '/aggregates/daily',
      monthlyAggregates: '/aggregates/monthly',
      reports: '/reports',
      reportStream: '/reports/stream'
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString()
  }));

  app.get('/store/metadata', async () => deps.store.metadata());

  // Chart series for the dashboard; these never go through the agent.
  app.get('/aggregates/daily', async (request, reply) => {
    const parsed = dailyQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid query.', issues: formatZodIssues(parsed.error.issues) });
    }
    return { days: parsed.data.days, series: deps.store.dailyCounts(parsed.data.days) };
  });

  app.get('/aggregates/monthly', async (request, reply) => {
    const parsed = monthlyQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid query.', issues: formatZodIssues(parsed.error.issues) });
    }
    return { months: parsed.data.months, series: deps.store.monthlyCounts(parsed.data.months) };
  });

  app.post('/reports', async (request, reply) => {
    const parsed = reportRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid report request.', issues: formatZodIssues(parsed.error.issues) });
    }

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    try {
      const result = await deps.reportService.createReport(parsed.data, { signal: controller.signal });
      return reply.code(result.status === 'DONE' ? 200 : 502).send(result);
    } catch (error) {
      request.log.error({ err: error }, 'report request failed');
      const sanitizedMessage = isDevelopment ? describeError(error) : 'An unexpected error occurred';
      return reply.code(500).send({ error: 'Internal server error', message: sanitizedMessage });
    }
  });

  await setupReportStreamRoute(app, deps);
}
