import { trace, context, SpanStatusCode, type Attributes } from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import type { Observation, SessionResult } from '../../../shared/types.js';

const TRACER_NAME = 'surveillance-orchestrator';

/** Correlation keys shared by every span the agent opens. */
export interface SpanTags {
  sessionId?: string;
  toolName?: string;
  observationId?: string;
  iteration?: number;
}

let tracerInitialized = false;

function ensureTracer() {
  if (tracerInitialized) return;

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: process.env.OTEL_SERVICE_NAME || 'srag-surveillance-agent',
    'deployment.environment': process.env.NODE_ENV || 'development'
  });
  const provider = new NodeTracerProvider({ resource });

  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (endpoint) {
    provider.addSpanProcessor(new SimpleSpanProcessor(new OTLPTraceExporter({ url: endpoint })));
  }
  if (process.env.ENABLE_CONSOLE_TRACING?.toLowerCase() === 'true') {
    provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  provider.register();
  tracerInitialized = true;
}

export function getTracer() {
  ensureTracer();
  return trace.getTracer(TRACER_NAME);
}

export function spanAttributes(tags: SpanTags): Attributes {
  const attributes: Attributes = {};
  if (tags.sessionId !== undefined) attributes['session.id'] = tags.sessionId;
  if (tags.toolName !== undefined) attributes['tool.name'] = tags.toolName;
  if (tags.observationId !== undefined) attributes['observation.id'] = tags.observationId;
  if (tags.iteration !== undefined) attributes['agent.iteration'] = tags.iteration;
  return attributes;
}

export function observationAttributes(observation: Observation): Attributes {
  return {
    'tool.outcome': observation.ok ? 'ok' : observation.error.kind,
    'tool.duration_ms': observation.durationMs
  };
}

export function sessionAttributes(result: SessionResult): Attributes {
  return {
    'session.status': result.status,
    'session.iterations': result.iterations,
    'session.observations': result.observations.length,
    'session.iteration_limit_reached': result.iterationLimitReached,
    ...(result.report ? { 'report.completeness': result.report.completeness } : {}),
    ...(result.error ? { 'session.failure': result.error.kind } : {})
  };
}

/**
 * Runs `fn` inside a span tagged with the session correlation keys. `outcome`
 * annotates the span from the returned value, so failures that are returned
 * rather than thrown still show up on the trace.
 */
export async function traced<T>(
  name: string,
  fn: () => Promise<T>,
  tags: SpanTags = {},
  outcome?: (result: T) => Attributes
): Promise<T> {
  const span = getTracer().startSpan(name, { attributes: spanAttributes(tags) });
  try {
    const result = await context.with(trace.setSpan(context.active(), span), fn);
    if (outcome) {
      span.setAttributes(outcome(result));
    }
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    span.recordException(failure);
    span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
    throw error;
  } finally {
    span.end();
  }
}
