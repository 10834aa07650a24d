import type { Observation, SessionPhase } from '../../../shared/types.js';
import { estimateTokens, truncateToTokens } from './contextBudget.js';
import type { TranscriptItem } from './reasoningModel.js';

export interface SessionFacts {
  sessionId: string;
  question: string;
  /** Latest date present in the store, or null when it could not be read. */
  dataDate: string | null;
  locale: string;
  startedAt: string;
}

export type SessionTurn =
  | { type: 'message'; role: 'user' | 'assistant'; content: string }
  | { type: 'tool_call'; callId: string; name: string; arguments: string }
  | { type: 'observation'; observation: Observation; rendered: string }
  | { type: 'notice'; content: string };

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function fitsBudget(body: Record<string, unknown>, maxTokens: number): boolean {
  return estimateTokens(JSON.stringify(body)) <= maxTokens;
}

/**
 * Keeps the longest prefix of `items` under `key` that fits the token budget.
 * A shortened list is labelled with `tokenLimit`, so the model can tell this
 * cut apart from the store's own row and byte caps.
 */
function fitList(body: Record<string, unknown>, key: string, items: unknown[], maxTokens: number): Record<string, unknown> {
  if (fitsBudget(body, maxTokens)) {
    return body;
  }
  const withPrefix = (shown: number) => ({
    ...body,
    [key]: items.slice(0, shown),
    tokenLimit: { maxTokens, shown, total: items.length }
  });

  let low = 0;
  let high = items.length - 1;
  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    if (fitsBudget(withPrefix(middle), maxTokens)) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }
  return withPrefix(low);
}

/** Compact JSON the model sees for an observation, capped at `maxTokens`. */
export function renderObservation(observation: Observation, maxTokens: number): string {
  let body: Record<string, unknown>;
  if (!observation.ok) {
    body = { id: observation.id, tool: observation.source, ok: false, error: observation.error };
  } else if (observation.payload.kind === 'analytic_query') {
    const { payload } = observation;
    const full = {
      id: observation.id,
      tool: observation.source,
      ok: true,
      sql: payload.sql,
      params: payload.params,
      columns: payload.columns.map((column) => column.name),
      rows: payload.rows,
      truncated: payload.truncated,
      ...(payload.truncation ? { truncation: payload.truncation } : {})
    };
    body = fitList(full, 'rows', payload.rows, maxTokens);
    if (body !== full) {
      body.truncated = true;
    }
  } else {
    const { payload } = observation;
    const passages = payload.passages.map((passage) => ({
      id: passage.id,
      title: passage.title,
      url: passage.url,
      text: passage.text
    }));
    body = fitList(
      {
        id: observation.id,
        tool: observation.source,
        ok: true,
        topic: payload.topic,
        empty: payload.empty,
        ...(payload.degraded.length > 0 ? { degraded: payload.degraded } : {}),
        passages
      },
      'passages',
      passages,
      maxTokens
    );
  }
  return truncateToTokens(JSON.stringify(body), maxTokens, `\n…[cut at the ${maxTokens}-token observation limit]`).text;
}

/**
 * Everything one controller run knows. Owned by that run and discarded with it;
 * observations are frozen once appended.
 */
export class SessionState {
  readonly facts: Readonly<SessionFacts>;
  readonly system: string;
  readonly phases: SessionPhase[] = [];
  iterations = 0;

  private readonly turns: SessionTurn[] = [];
  private readonly trail: Observation[] = [];
  private observationCounter = 0;
  private terminated = false;

  constructor(facts: SessionFacts, system: string) {
    this.facts = Object.freeze({ ...facts });
    this.system = system;
    this.turns.push({ type: 'message', role: 'user', content: facts.question });
  }

  get observations(): readonly Observation[] {
    return this.trail;
  }

  get history(): readonly SessionTurn[] {
    return this.turns;
  }

  get phase(): SessionPhase | undefined {
    return this.phases[this.phases.length - 1];
  }

  enter(phase: SessionPhase): void {
    this.phases.push(phase);
  }

  nextObservationId(): string {
    this.observationCounter += 1;
    return `obs-${this.observationCounter}`;
  }

  append(turn: SessionTurn): void {
    this.turns.push(turn);
  }

  appendObservation(observation: Observation, maxTokens: number): Observation {
    const frozen = deepFreeze(observation);
    this.trail.push(frozen);
    this.turns.push({ type: 'observation', observation: frozen, rendered: renderObservation(frozen, maxTokens) });
    return frozen;
  }

  /** Requests cancellation; honoured at the next planning step. */
  terminate(): void {
    this.terminated = true;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** The conversation as the reasoning model receives it. */
  transcript(): TranscriptItem[] {
    return this.turns.map((turn): TranscriptItem => {
      switch (turn.type) {
        case 'message':
          return { type: 'message', role: turn.role, content: turn.content };
        case 'tool_call':
          return { type: 'tool_call', callId: turn.callId, name: turn.name, arguments: turn.arguments };
        case 'observation':
          return turn.observation.callId
            ? { type: 'tool_result', callId: turn.observation.callId, output: turn.rendered }
            : { type: 'message', role: 'user', content: `Observation ${turn.observation.id}: ${turn.rendered}` };
        case 'notice':
          return { type: 'message', role: 'user', content: `[controller] ${turn.content}` };
      }
    });
  }
}
