import type { AzureResponseOutput, OutputItem } from '../azure/openaiClient.js';

type ResponseLike = Partial<Pick<AzureResponseOutput, 'output' | 'output_text'>>;

export interface FunctionCallItem {
  callId: string;
  name: string;
  arguments: string;
}

function collectText(item: OutputItem, buffer: string[]) {
  if (item.type !== 'message' || !Array.isArray(item.content)) {
    return;
  }
  for (const part of item.content) {
    if ((part.type === 'output_text' || part.type === 'text') && typeof part.text === 'string' && part.text.length > 0) {
      buffer.push(part.text);
    }
  }
}

export function extractOutputText(response: ResponseLike): string {
  if (typeof response.output_text === 'string' && response.output_text.length > 0) {
    return response.output_text;
  }

  const buffer: string[] = [];
  for (const item of response.output ?? []) {
    collectText(item, buffer);
  }
  return buffer.join('');
}

/** Native function calls in emission order. Items without a name are skipped. */
export function extractFunctionCalls(response: ResponseLike): FunctionCallItem[] {
  const calls: FunctionCallItem[] = [];
  (response.output ?? []).forEach((item, index) => {
    if (item.type !== 'function_call' || typeof item.name !== 'string' || item.name.length === 0) {
      return;
    }
    calls.push({
      callId: item.call_id ?? `call_${index}`,
      name: item.name,
      arguments: typeof item.arguments === 'string' ? item.arguments : ''
    });
  });
  return calls;
}

/** Removes a surrounding ```json fence, if any. */
export function stripJsonFence(text: string): string {
  const trimmed = text.trim();
  const match = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

export function parseJsonObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonFence(text));
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}
