import type { AppConfig } from './app.js';
import { config } from './app.js';

export type ReasoningEffort = 'low' | 'medium' | 'high';

export interface ReasoningOptions {
  effort: ReasoningEffort;
}

export type ReasoningStage = 'controller' | 'query' | 'synthesis';

type EffortKey = 'REASONING_CONTROLLER_EFFORT' | 'REASONING_QUERY_EFFORT' | 'REASONING_SYNTHESIS_EFFORT';

const stageConfigKeys: Record<ReasoningStage, EffortKey> = {
  controller: 'REASONING_CONTROLLER_EFFORT',
  query: 'REASONING_QUERY_EFFORT',
  synthesis: 'REASONING_SYNTHESIS_EFFORT'
};

/**
 * Reasoning options are only sent to deployments that accept them, so an unset
 * stage and an unset default both resolve to `undefined`.
 */
export function getReasoningOptions(
  stage: ReasoningStage,
  source: Pick<AppConfig, EffortKey | 'REASONING_DEFAULT_EFFORT'> = config
): ReasoningOptions | undefined {
  const effort = source[stageConfigKeys[stage]] ?? source.REASONING_DEFAULT_EFFORT;
  return effort ? { effort } : undefined;
}
