import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from './config/app.js';
import { createOriginPolicy, type OriginPolicy } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes, type StoreReader } from './routes/index.js';
import type { ReportService } from './services/reportService.js';
import { loggerOptions } from './utils/logger.js';

export interface AppDependencies {
  reportService: ReportService;
  store: StoreReader;
  originPolicy?: OriginPolicy;
  rateLimitMax?: number;
  requestTimeoutMs?: number;
}

const STREAM_ROUTE = '/reports/stream';

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({ logger: loggerOptions });
  const originPolicy = deps.originPolicy ?? createOriginPolicy();

  await app.register(cors, {
    origin: (origin, cb) => {
      if (originPolicy.isAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins: originPolicy.allowed }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true
  });

  await app.register(rateLimit, {
    max: deps.rateLimitMax ?? config.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      error: 'Too many requests',
      message: 'Please try again later.'
    })
  });

  app.addHook('preHandler', sanitizeInput);

  const requestTimeoutMs = deps.requestTimeoutMs ?? config.REQUEST_TIMEOUT_MS;
  app.addHook('onRequest', async (request, reply) => {
    // SSE connections stay open for the whole session
    if (request.method === 'POST' && request.url === STREAM_ROUTE) {
      return;
    }

    const timer = setTimeout(() => {
      if (!reply.sent) {
        reply.code(408).send({ error: 'Request timeout' });
      }
    }, requestTimeoutMs);

    reply.raw.on('close', () => clearTimeout(timer));
    reply.raw.on('finish', () => clearTimeout(timer));
  });

  await registerRoutes(app, { reportService: deps.reportService, store: deps.store, originPolicy });

  return app;
}
