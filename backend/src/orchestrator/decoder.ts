import type { ToolRegistry } from '../tools/index.js';
import { parseJsonObject } from '../utils/openai.js';
import type { RawModelOutput } from './reasoningModel.js';

export type Decision =
  | {
      kind: 'tool_call';
      name: string;
      arguments: unknown;
      /** Present for native function calls only. */
      callId?: string;
      /** Extra calls in the same output that will not run. */
      dropped: string[];
    }
  | { kind: 'final_answer'; text: string }
  | { kind: 'malformed'; reason: string };

function parseArguments(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/**
 * Classifies one model output. Native function calls are always tool calls
 * (validation is the dispatcher's job). Text is a tool call only when it is
 * exactly the `{"tool", "arguments"}` envelope naming a declared tool with
 * valid arguments; any other non-empty text is a final answer.
 */
export function decodeModelOutput(output: RawModelOutput, registry: ToolRegistry): Decision {
  const [first, ...rest] = output.toolCalls;
  if (first) {
    const parsed = parseArguments(first.arguments);
    if (!parsed.ok) {
      return { kind: 'malformed', reason: `arguments of ${first.name} are not valid JSON` };
    }
    return {
      kind: 'tool_call',
      name: first.name,
      arguments: parsed.value,
      callId: first.callId,
      dropped: rest.map((call) => call.name)
    };
  }

  const text = output.text.trim();
  if (!text) {
    return { kind: 'malformed', reason: 'empty output' };
  }

  const envelope = parseJsonObject(text);
  if (envelope) {
    const keys = Object.keys(envelope).sort();
    const tool = envelope.tool;
    if (keys.length === 2 && keys[0] === 'arguments' && keys[1] === 'tool' && typeof tool === 'string') {
      const definition = registry.get(tool);
      if (definition && definition.prepare(envelope.arguments).ok) {
        return { kind: 'tool_call', name: tool, arguments: envelope.arguments, dropped: [] };
      }
    }
  }

  return { kind: 'final_answer', text };
}
