import { get_encoding, type Tiktoken } from '@dqbd/tiktoken';

const ENCODING = 'o200k_base';
const TRUNCATION_MARKER = '\n…[truncated]';

let encoding: Tiktoken | null = null;
const decoder = new TextDecoder();

function getEncoding(): Tiktoken {
  encoding ??= get_encoding(ENCODING);
  return encoding;
}

export function estimateTokens(text: string): number {
  return getEncoding().encode(text ?? '').length;
}

/**
 * Cuts `text` to at most `maxTokens` tokens, marker included. Text already
 * within budget is returned unchanged.
 */
export function truncateToTokens(
  text: string,
  maxTokens: number,
  marker: string = TRUNCATION_MARKER
): { text: string; truncated: boolean } {
  const enc = getEncoding();
  const tokens = enc.encode(text);
  if (tokens.length <= maxTokens) {
    return { text, truncated: false };
  }
  const markerTokens = enc.encode(marker).length;
  const keep = Math.max(maxTokens - markerTokens, 0);
  const head = decoder.decode(enc.decode(tokens.slice(0, keep)));
  return { text: `${head}${marker}`, truncated: true };
}

export interface BudgetOptions {
  sections: Record<string, string>;
  caps: Record<string, number>;
}

/** Drops the oldest lines of each capped section until it fits its cap. */
export function budgetSections({ sections, caps }: BudgetOptions): Record<string, string> {
  const packed: Record<string, string> = {};

  for (const [key, value] of Object.entries(sections)) {
    const cap = caps[key] ?? 0;
    if (cap <= 0) {
      packed[key] = value;
      continue;
    }

    const lines = value.split('\n');
    while (lines.length > 1 && estimateTokens(lines.join('\n')) > cap) {
      lines.shift();
    }
    packed[key] = lines.join('\n');
  }

  return packed;
}
