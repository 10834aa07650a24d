import { randomUUID } from 'node:crypto';
import type {
  Observation,
  ObservationError,
  SessionFailureKind,
  SessionPhase,
  SessionReport,
  SessionResult
} from '../../../shared/types.js';
import { config } from '../config/app.js';
import { NEWS_TOOL, type ToolRegistry } from '../tools/index.js';
import { EmbeddingCache } from '../utils/embeddings.js';
import { describeError, IterationLimitExceeded, toObservationError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/resilience.js';
import { assembleSession, type StoreFacts } from './context.js';
import { decodeModelOutput } from './decoder.js';
import { ToolDispatcher } from './dispatch.js';
import type { RawModelOutput, ReasoningModel } from './reasoningModel.js';
import type { SessionState } from './session.js';
import { degradedReport, ReportSynthesizer } from './synthesis.js';
import { sessionAttributes, traced } from './telemetry.js';

const log = moduleLogger('controller');

export const MODEL_SOURCE = 'reasoning_model';

export type SessionEvent =
  | { type: 'state'; phase: SessionPhase; iteration: number }
  | { type: 'tool_call'; tool: string; arguments: unknown; iteration: number }
  | { type: 'observation'; observation: Observation }
  | { type: 'notice'; message: string }
  | { type: 'report'; report: SessionReport };

export interface ControllerLimits {
  maxIterations: number;
  modelMaxRetries: number;
  modelTimeoutMs: number;
  toolTimeoutMs: number;
  emptySearchRetryLimit: number;
  observationMaxTokens: number;
}

export function defaultControllerLimits(): ControllerLimits {
  return {
    maxIterations: config.AGENT_MAX_ITERATIONS,
    modelMaxRetries: config.MODEL_MAX_RETRIES,
    modelTimeoutMs: config.MODEL_TIMEOUT_MS,
    toolTimeoutMs: config.TOOL_TIMEOUT_MS,
    emptySearchRetryLimit: config.EMPTY_SEARCH_RETRY_LIMIT,
    observationMaxTokens: config.OBSERVATION_MAX_TOKENS
  };
}

export interface ControllerDependencies {
  model: ReasoningModel;
  registry: ToolRegistry;
  store: { latestDataDate(): string | null };
  /** Injected for deterministic timestamps and replays. */
  now?: () => Date;
}

export interface SessionRequest {
  question: string;
  sessionId?: string;
  locale?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: (event: SessionEvent) => void;
  /** Receives the state before the loop starts, e.g. to keep a handle for `terminate()`. */
  onStart?: (state: SessionState) => void;
}

class SessionFailure extends Error {
  readonly kind: SessionFailureKind;

  constructor(kind: SessionFailureKind, message: string) {
    super(message);
    this.name = 'SessionFailure';
    this.kind = kind;
  }
}

/**
 * Bounded ReAct loop. Each model call while PLANNING is one iteration and the
 * cap is checked before every call, so a session makes at most
 * `maxIterations` planning calls plus one synthesis call.
 */
export class AgentController {
  private readonly deps: ControllerDependencies;
  private readonly limits: ControllerLimits;
  private readonly now: () => Date;
  private readonly dispatcher: ToolDispatcher;
  private readonly synthesizer: ReportSynthesizer;

  constructor(deps: ControllerDependencies, limits: Partial<ControllerLimits> = {}) {
    this.deps = deps;
    this.limits = { ...defaultControllerLimits(), ...limits };
    this.now = deps.now ?? (() => new Date());
    this.dispatcher = new ToolDispatcher(deps.registry, { timeoutMs: this.limits.toolTimeoutMs, now: this.now });
    this.synthesizer = new ReportSynthesizer(deps.model, {
      timeoutMs: this.limits.modelTimeoutMs,
      observationMaxTokens: this.limits.observationMaxTokens
    });
  }

  async run(request: SessionRequest, options: RunOptions = {}): Promise<SessionResult> {
    const facts: StoreFacts = { latestDataDate: this.deps.store.latestDataDate() };
    const state = assembleSession(facts, {
      sessionId: request.sessionId ?? randomUUID(),
      question: request.question,
      locale: request.locale ?? config.SESSION_LOCALE,
      startedAt: this.now().toISOString()
    });
    options.onStart?.(state);

    return traced('agent.session', () => this.loop(state, options), { sessionId: state.facts.sessionId }, sessionAttributes);
  }

  private emit(options: RunOptions, event: SessionEvent) {
    if (!options.onEvent) {
      return;
    }
    try {
      options.onEvent(event);
    } catch (error) {
      log.warn({ err: describeError(error), event: event.type }, 'session event listener threw');
    }
  }

  private enter(state: SessionState, phase: SessionPhase, options: RunOptions) {
    state.enter(phase);
    this.emit(options, { type: 'state', phase, iteration: state.iterations });
  }

  private notice(state: SessionState, message: string, options: RunOptions) {
    state.append({ type: 'notice', content: message });
    this.emit(options, { type: 'notice', message });
  }

  private cancelled(state: SessionState, options: RunOptions): boolean {
    return state.isTerminated || options.signal?.aborted === true;
  }

  private recordModelFailure(state: SessionState, error: ObservationError, startedAt: Date, options: RunOptions) {
    const observation = state.appendObservation(
      {
        id: state.nextObservationId(),
        source: MODEL_SOURCE,
        arguments: { iteration: state.iterations },
        timestamp: startedAt.toISOString(),
        durationMs: this.now().getTime() - startedAt.getTime(),
        ok: false,
        error
      },
      this.limits.observationMaxTokens
    );
    this.emit(options, { type: 'observation', observation });
  }

  private result(
    state: SessionState,
    iterationLimitReached: boolean,
    outcome: { report: SessionReport } | { failure: SessionFailure }
  ): SessionResult {
    const base = {
      sessionId: state.facts.sessionId,
      phases: [...state.phases],
      iterations: state.iterations,
      iterationLimitReached,
      dataDate: state.facts.dataDate,
      observations: [...state.observations]
    };
    if ('report' in outcome) {
      return { ...base, status: 'DONE', report: outcome.report };
    }
    return { ...base, status: 'FAILED', error: { kind: outcome.failure.kind, message: outcome.failure.message } };
  }

  private async plan(state: SessionState, withdrawn: ReadonlySet<string>, options: RunOptions): Promise<RawModelOutput> {
    return withTimeout(
      'model.decide',
      this.limits.modelTimeoutMs,
      (signal) =>
        this.deps.model.decide(
          { system: state.system, transcript: state.transcript(), tools: this.deps.registry.specs(withdrawn) },
          signal
        ),
      options.signal
    );
  }

  private async loop(state: SessionState, options: RunOptions): Promise<SessionResult> {
    const { maxIterations, modelMaxRetries, emptySearchRetryLimit, observationMaxTokens } = this.limits;
    const sessionId = state.facts.sessionId;
    const withdrawn = new Set<string>();
    const embeddingCache = new EmbeddingCache();
    let consecutiveFailures = 0;
    let emptySearches = 0;
    let draft: string | null = null;
    let iterationLimitReached = false;

    const fail = (failure: SessionFailure): SessionResult => {
      this.enter(state, 'FAILED', options);
      log.warn({ sessionId, kind: failure.kind, iterations: state.iterations }, failure.message);
      return this.result(state, iterationLimitReached, { failure });
    };

    this.enter(state, 'PLANNING', options);

    for (;;) {
      if (this.cancelled(state, options)) {
        return fail(new SessionFailure('cancelled', 'session cancelled'));
      }

      if (state.iterations >= maxIterations) {
        const limit = new IterationLimitExceeded(maxIterations);
        iterationLimitReached = true;
        this.notice(state, limit.message, options);
        break;
      }

      state.iterations += 1;
      const startedAt = this.now();
      let output: RawModelOutput;
      try {
        output = await this.plan(state, withdrawn, options);
      } catch (error) {
        if (this.cancelled(state, options)) {
          return fail(new SessionFailure('cancelled', 'session cancelled'));
        }
        consecutiveFailures += 1;
        this.recordModelFailure(state, toObservationError(error), startedAt, options);
        log.warn({ sessionId, attempt: consecutiveFailures, err: describeError(error) }, 'reasoning model call failed');
        if (consecutiveFailures > modelMaxRetries) {
          return fail(new SessionFailure('provider_outage', `reasoning model unavailable after ${consecutiveFailures} attempts`));
        }
        continue;
      }

      const decision = decodeModelOutput(output, this.deps.registry);

      if (decision.kind === 'malformed') {
        consecutiveFailures += 1;
        log.warn({ sessionId, reason: decision.reason, attempt: consecutiveFailures }, 'malformed model output');
        if (consecutiveFailures > modelMaxRetries) {
          return fail(new SessionFailure('malformed_output', `model output could not be interpreted: ${decision.reason}`));
        }
        this.notice(
          state,
          `Your last reply could not be interpreted (${decision.reason}). Reply with one tool call or with your final answer.`,
          options
        );
        continue;
      }

      consecutiveFailures = 0;

      if (decision.kind === 'final_answer') {
        draft = decision.text;
        state.append({ type: 'message', role: 'assistant', content: decision.text });
        break;
      }

      this.enter(state, 'EXECUTING_TOOL', options);
      if (decision.dropped.length > 0) {
        log.info({ sessionId, executed: decision.name, dropped: decision.dropped }, 'extra tool calls dropped');
      }

      const serializedArgs = JSON.stringify(decision.arguments ?? {});
      if (decision.callId) {
        state.append({ type: 'tool_call', callId: decision.callId, name: decision.name, arguments: serializedArgs });
      } else {
        state.append({
          type: 'message',
          role: 'assistant',
          content: JSON.stringify({ tool: decision.name, arguments: decision.arguments })
        });
      }
      this.emit(options, { type: 'tool_call', tool: decision.name, arguments: decision.arguments, iteration: state.iterations });

      const context = {
        sessionId,
        dataDate: state.facts.dataDate,
        embeddingCache,
        observationId: state.nextObservationId(),
        ...(decision.callId ? { callId: decision.callId } : {})
      };
      const observation = withdrawn.has(decision.name)
        ? this.dispatcher.reject(
            decision.name,
            decision.arguments,
            `tool "${decision.name}" is no longer available in this session`,
            context
          )
        : await this.dispatcher.dispatch(decision.name, decision.arguments, context);

      state.appendObservation(observation, observationMaxTokens);
      this.emit(options, { type: 'observation', observation });

      if (decision.dropped.length > 0) {
        this.notice(state, `Only one tool runs per step; ignored: ${decision.dropped.join(', ')}.`, options);
      }

      if (
        observation.ok &&
        observation.source === NEWS_TOOL &&
        observation.payload.kind === 'news_retrieval' &&
        observation.payload.empty
      ) {
        emptySearches += 1;
        if (emptySearches > emptySearchRetryLimit) {
          withdrawn.add(NEWS_TOOL);
          this.notice(state, `${NEWS_TOOL} returned no results again and is withdrawn. Finish with the evidence you have.`, options);
        } else {
          this.notice(state, `${NEWS_TOOL} returned no results. You may reformulate the topic once.`, options);
        }
      }

      this.enter(state, 'PLANNING', options);
    }

    this.enter(state, 'FINALIZING', options);

    let report: SessionReport;
    try {
      report = await this.synthesizer.synthesize(
        { facts: state.facts, draft, observations: state.observations, iterationLimitReached },
        options.signal
      );
    } catch (error) {
      log.warn({ sessionId, err: describeError(error) }, 'report synthesis failed');
      if (this.cancelled(state, options)) {
        return fail(new SessionFailure('cancelled', 'session cancelled'));
      }
      if (iterationLimitReached) {
        return fail(new SessionFailure('synthesis_failed', 'iteration limit reached and report synthesis failed'));
      }
      report = degradedReport(draft ?? '', { observations: state.observations, iterationLimitReached }, 'Report synthesis failed.');
    }

    this.emit(options, { type: 'report', report });
    this.enter(state, 'DONE', options);
    log.info(
      { sessionId, iterations: state.iterations, observations: state.observations.length, status: report.status },
      'session finished'
    );
    return this.result(state, iterationLimitReached, { report });
  }
}

export async function runSession(
  deps: ControllerDependencies,
  request: SessionRequest,
  options: RunOptions & { limits?: Partial<ControllerLimits> } = {}
): Promise<SessionResult> {
  const { limits, ...runOptions } = options;
  return new AgentController(deps, limits).run(request, runOptions);
}
