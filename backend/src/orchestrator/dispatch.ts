import type { Observation, ObservationError } from '../../../shared/types.js';
import { config } from '../config/app.js';
import type { ToolContext, ToolRegistry } from '../tools/index.js';
import { toObservationError } from '../utils/errors.js';
import { moduleLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/resilience.js';
import { deepFreeze } from './session.js';
import { observationAttributes, traced } from './telemetry.js';


export interface DispatchContext extends Omit<ToolContext, 'signal'> {
  observationId: string;
  callId?: string;
}

export interface DispatcherOptions {
  timeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

function argumentRecord(raw: unknown): Record<string, unknown> {
  if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
    return Object.fromEntries(Object.entries(raw));
  }
  return { value: raw };
}

/**
 * Validates and runs tool calls against the fixed registry. A call either runs
 * exactly once or, when it fails validation, not at all. Every attempt ends in
 * an observation; the dispatcher never touches session state.
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(registry: ToolRegistry, options: DispatcherOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? config.TOOL_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? moduleLogger('dispatch');
  }

  private failure(
    toolName: string,
    args: Record<string, unknown>,
    error: ObservationError,
    context: DispatchContext,
    startedAt: Date
  ): Observation {
    const observation: Observation = {
      id: context.observationId,
      source: toolName,
      ...(context.callId ? { callId: context.callId } : {}),
      arguments: args,
      timestamp: startedAt.toISOString(),
      durationMs: this.now().getTime() - startedAt.getTime(),
      ok: false,
      error
    };
    return deepFreeze(observation);
  }

  /** Produces a validation failure without running anything. */
  reject(toolName: string, rawArgs: unknown, reason: string, context: DispatchContext): Observation {
    const startedAt = this.now();
    this.log.info({ sessionId: context.sessionId, tool: toolName, arguments: rawArgs, reason }, 'tool call rejected');
    return this.failure(toolName, argumentRecord(rawArgs), { kind: 'validation', message: reason }, context, startedAt);
  }

  async dispatch(toolName: string, rawArgs: unknown, context: DispatchContext): Promise<Observation> {
    const startedAt = this.now();
    const tool = this.registry.get(toolName);

    if (!tool) {
      this.log.warn({ sessionId: context.sessionId, tool: toolName, arguments: rawArgs }, 'undeclared tool requested');
      return this.failure(
        toolName,
        argumentRecord(rawArgs),
        { kind: 'validation', message: `tool "${toolName}" is not declared; available: ${this.registry.names().join(', ')}` },
        context,
        startedAt
      );
    }

    const prepared = tool.prepare(rawArgs);
    if (!prepared.ok) {
      this.log.info(
        { sessionId: context.sessionId, tool: toolName, arguments: rawArgs, issues: prepared.issues },
        'tool arguments rejected'
      );
      return this.failure(
        toolName,
        argumentRecord(rawArgs),
        { kind: 'validation', message: `invalid arguments: ${prepared.issues.join('; ')}` },
        context,
        startedAt
      );
    }

    return traced(
      'tool.dispatch',
      async () => {
        try {
          const payload = await withTimeout(`tool:${toolName}`, this.timeoutMs, (signal) =>
            prepared.invoke({ ...context, signal })
          );
          const observation: Observation = {
            id: context.observationId,
            source: toolName,
            ...(context.callId ? { callId: context.callId } : {}),
            arguments: prepared.arguments,
            timestamp: startedAt.toISOString(),
            durationMs: this.now().getTime() - startedAt.getTime(),
            ok: true,
            payload
          };
          deepFreeze(observation);
          this.log.info(
            { sessionId: context.sessionId, tool: toolName, arguments: prepared.arguments, durationMs: observation.durationMs },
            'tool call succeeded'
          );
          return observation;
        } catch (error) {
          const observation = this.failure(toolName, prepared.arguments, toObservationError(error), context, startedAt);
          this.log.warn(
            {
              sessionId: context.sessionId,
              tool: toolName,
              arguments: prepared.arguments,
              durationMs: observation.durationMs,
              error: observation.ok ? undefined : observation.error
            },
            'tool call failed'
          );
          return observation;
        }
      },
      { sessionId: context.sessionId, toolName, observationId: context.observationId },
      observationAttributes
    );
  }
}
