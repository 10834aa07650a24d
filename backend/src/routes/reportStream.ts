import type { FastifyInstance } from 'fastify';
import type { OriginPolicy } from '../config/cors.js';
import type { SessionEvent } from '../orchestrator/index.js';
import type { ReportService } from '../services/reportService.js';
import { isDevelopment } from '../config/app.js';
import { describeError } from '../utils/errors.js';
import { formatZodIssues, reportRequestSchema } from './schemas.js';

export interface StreamRouteDependencies {
  reportService: ReportService;
  originPolicy: OriginPolicy;
}

/** Streams session events as SSE, then the final result as a `result` event. */
export async function setupReportStreamRoute(app: FastifyInstance, deps: StreamRouteDependencies) {
  app.post('/reports/stream', async (request, reply) => {
    const parsed = reportRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'Invalid report request.',
        issues: formatZodIssues(parsed.error.issues)
      });
    }

    reply.hijack();
    const headers: Record<string, string> = {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    };
    const origin = request.headers.origin;
    if (origin && deps.originPolicy.isAllowed(origin)) {
      headers['Access-Control-Allow-Origin'] = origin;
      headers['Access-Control-Allow-Credentials'] = 'true';
      headers.Vary = 'Origin';
    }
    reply.raw.writeHead(200, headers);

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    const sendEvent = (event: string, data: unknown) => {
      if (reply.raw.writableEnded) {
        return;
      }
      reply.raw.write(`event: ${event}\n`);
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    try {
      const result = await deps.reportService.createReport(parsed.data, {
        signal: controller.signal,
        onEvent: (event: SessionEvent) => sendEvent(event.type, event)
      });
      sendEvent('result', result);
    } catch (error) {
      request.log.error({ err: error }, 'report stream failed');
      sendEvent('error', { message: isDevelopment ? describeError(error) : 'An unexpected error occurred' });
    } finally {
      reply.raw.end();
    }
  });
}
