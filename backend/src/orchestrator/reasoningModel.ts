import {
  createResponse,
  type FunctionToolDefinition,
  type ResponseInputItem,
  type ResponseTextFormat
} from '../azure/openaiClient.js';
import { config } from '../config/app.js';
import { getReasoningOptions, type ReasoningStage } from '../config/reasoning.js';
import { ProviderError } from '../utils/errors.js';
import { extractFunctionCalls, extractOutputText } from '../utils/openai.js';

export type TranscriptItem =
  | { type: 'message'; role: 'user' | 'assistant'; content: string }
  | { type: 'tool_call'; callId: string; name: string; arguments: string }
  | { type: 'tool_result'; callId: string; output: string };

export interface ModelToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface DecideRequest {
  system: string;
  transcript: TranscriptItem[];
  tools: ModelToolSpec[];
}

export interface RawToolCall {
  callId: string;
  name: string;
  arguments: string;
}

/** What the model emitted, before any interpretation. */
export interface RawModelOutput {
  text: string;
  toolCalls: RawToolCall[];
}

export interface GenerateRequest {
  stage: Exclude<ReasoningStage, 'controller'>;
  system: string;
  user: string;
  jsonSchema?: ResponseTextFormat;
}

/**
 * The reasoning capability the loop depends on. `decide` drives one planning
 * step; `generate` is a single prompt used for query planning and synthesis.
 */
export interface ReasoningModel {
  decide(request: DecideRequest, signal: AbortSignal): Promise<RawModelOutput>;
  generate(request: GenerateRequest, signal: AbortSignal): Promise<string>;
}

function toInputItems(transcript: TranscriptItem[]): ResponseInputItem[] {
  return transcript.map((item): ResponseInputItem => {
    switch (item.type) {
      case 'message':
        return { role: item.role, content: item.content };
      case 'tool_call':
        return { type: 'function_call', call_id: item.callId, name: item.name, arguments: item.arguments };
      case 'tool_result':
        return { type: 'function_call_output', call_id: item.callId, output: item.output };
    }
  });
}

export class AzureReasoningModel implements ReasoningModel {
  async decide(request: DecideRequest, signal: AbortSignal): Promise<RawModelOutput> {
    const tools: FunctionToolDefinition[] = request.tools.map((tool) => ({
      type: 'function',
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters
    }));

    const response = await createResponse(
      {
        instructions: request.system,
        input: toInputItems(request.transcript),
        tools: tools.length > 0 ? tools : undefined,
        tool_choice: tools.length > 0 ? 'auto' : undefined,
        parallel_tool_calls: tools.length > 0 ? false : undefined,
        temperature: config.MODEL_TEMPERATURE,
        reasoning: getReasoningOptions('controller')
      },
      { signal }
    );

    if (response.status === 'failed' && response.error) {
      throw new ProviderError('azure-openai', `model response failed: ${response.error.message}`, {
        code: response.error.code
      });
    }

    return { text: extractOutputText(response), toolCalls: extractFunctionCalls(response) };
  }

  async generate(request: GenerateRequest, signal: AbortSignal): Promise<string> {
    const response = await createResponse(
      {
        instructions: request.system,
        input: [{ role: 'user', content: request.user }],
        temperature: config.MODEL_TEMPERATURE,
        reasoning: getReasoningOptions(request.stage),
        textFormat: request.jsonSchema
      },
      { signal }
    );

    if (response.status === 'failed' && response.error) {
      throw new ProviderError('azure-openai', `model response failed: ${response.error.message}`, {
        code: response.error.code
      });
    }

    return extractOutputText(response);
  }
}
