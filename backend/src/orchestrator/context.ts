import { NEWS_TOOL, QUERY_TOOL } from '../tools/index.js';
import { SessionState, type SessionFacts } from './session.js';

export const UNKNOWN_DATA_DATE = 'unknown';

export interface StoreFacts {
  latestDataDate: string | null;
}

export interface SessionParameters {
  sessionId: string;
  question: string;
  locale: string;
  startedAt: string;
}

export function buildSystemPrompt(facts: SessionFacts): string {
  const date = facts.dataDate ?? UNKNOWN_DATA_DATE;
  const dateRule = facts.dataDate
    ? `The most recent date in the case store is ${date}. Treat ${date} as "today" for every relative period ("last 30 days", "this month", "recent news"). Never use the calendar date. Recent news means news from ${date.slice(0, 4)}.`
    : `The most recent date in the case store is ${UNKNOWN_DATA_DATE}. Do not assume a calendar date; state explicitly that the reference date could not be established.`;

  return [
    'You are an epidemiological surveillance analyst for severe acute respiratory syndrome (SRAG).',
    dateRule,
    `Use ${QUERY_TOOL} for exact counts and rates from the case store, one precise question per call.`,
    `Use ${NEWS_TOOL} for recent news that explains the numbers.`,
    'Call one tool at a time. Tool results carry an id such as obs-3; cite those ids for every figure you use.',
    'When you have enough evidence, answer with a short plain-text draft of your findings and no tool call.',
    'To call a tool without native function calling, reply with exactly {"tool": "<name>", "arguments": {...}}.',
    `Session ${facts.sessionId}, locale ${facts.locale}, started ${facts.startedAt}.`
  ].join('\n');
}

/**
 * Builds the initial state of a session. Pure: the same store facts and
 * parameters always give the same state.
 */
export function assembleSession(store: StoreFacts, params: SessionParameters): SessionState {
  const facts: SessionFacts = {
    sessionId: params.sessionId,
    question: params.question,
    dataDate: store.latestDataDate,
    locale: params.locale,
    startedAt: params.startedAt
  };
  return new SessionState(facts, buildSystemPrompt(facts));
}
