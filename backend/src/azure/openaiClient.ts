import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { config, isDevelopment } from '../config/app.js';
import { ProviderError } from '../utils/errors.js';
import type { ReasoningOptions } from '../config/reasoning.js';

const scope = 'https://cognitiveservices.azure.com/.default';

/**
 * Sanitize Azure error messages to prevent information disclosure in production
 */
function sanitizeAzureError(status: number, statusText: string, body: string): string {
  if (isDevelopment) {
    return `${status} ${statusText} - ${body}`;
  }
  return `${status} ${statusText}`;
}

function requireEndpoint(value: string | undefined, name: string): string {
  if (!value) {
    throw new ProviderError('azure-openai', `${name} not configured.`);
  }
  return value.replace(/\/+$/, '');
}

function withQuery(base: string, path: string) {
  const normalizedQuery = config.AZURE_OPENAI_API_QUERY.replace(/^\?+/, '');
  if (!normalizedQuery) {
    return `${base}${path}`;
  }
  return `${base}${path}${path.includes('?') ? '&' : '?'}${normalizedQuery}`;
}

let credential: TokenCredential | null = null;
let cachedBearer: { token: string; expiresOnTimestamp: number } | null = null;
let tokenRefreshPromise: Promise<{ token: string; expiresOnTimestamp: number }> | null = null;

function isTokenExpiringSoon(cached: { expiresOnTimestamp: number }): boolean {
  return cached.expiresOnTimestamp - Date.now() <= 120000;
}

async function refreshToken(): Promise<{ token: string; expiresOnTimestamp: number }> {
  credential ??= new DefaultAzureCredential();
  const tokenResponse = await credential.getToken(scope);
  if (!tokenResponse?.token) {
    throw new ProviderError('azure-openai', 'Failed to obtain Azure AD token for Azure OpenAI.');
  }
  cachedBearer = {
    token: tokenResponse.token,
    expiresOnTimestamp: tokenResponse.expiresOnTimestamp ?? Date.now() + 15 * 60 * 1000
  };
  return cachedBearer;
}

async function authHeaders(apiKey: string | undefined): Promise<Record<string, string>> {
  if (apiKey) {
    return { 'api-key': apiKey };
  }

  if (cachedBearer && !isTokenExpiringSoon(cachedBearer)) {
    return { Authorization: `Bearer ${cachedBearer.token}` };
  }

  if (!tokenRefreshPromise) {
    tokenRefreshPromise = refreshToken().finally(() => {
      tokenRefreshPromise = null;
    });
  }

  const token = await tokenRefreshPromise;
  return { Authorization: `Bearer ${token.token}` };
}

async function postJson<T>(url: string, apiKey: string | undefined, body: unknown, signal?: AbortSignal): Promise<T> {
  const headers = await authHeaders(apiKey);
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...headers
    },
    body: JSON.stringify(body),
    signal
  });

  if (!response.ok) {
    const text = await response.text();
    throw new ProviderError('azure-openai', `Azure OpenAI request failed: ${sanitizeAzureError(response.status, response.statusText, text)}`, {
      status: response.status,
      code: String(response.status)
    });
  }

  return (await response.json()) as T;
}

export type ResponseTextFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | {
      type: 'json_schema';
      name: string;
      schema: Record<string, unknown>;
      description?: string;
      strict?: boolean;
    };

export interface FunctionToolDefinition {
  type: 'function';
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  strict?: boolean;
}

export type ResponseInputItem =
  | { role: 'system' | 'user' | 'assistant' | 'developer'; content: string }
  | { type: 'function_call'; call_id: string; name: string; arguments: string }
  | { type: 'function_call_output'; call_id: string; output: string };

export interface OutputContentPart {
  type: string;
  text?: string;
}

export interface OutputItem {
  type: string;
  role?: string;
  content?: OutputContentPart[];
  name?: string;
  arguments?: string;
  call_id?: string;
}

export interface ResponseUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface AzureResponseOutput {
  id: string;
  object: 'response';
  status: 'completed' | 'failed' | 'in_progress' | 'cancelled' | 'queued' | 'incomplete';
  model: string;
  output: OutputItem[];
  output_text?: string | null;
  usage?: ResponseUsage;
  error: { code: string; message: string } | null;
  incomplete_details: { reason: 'max_output_tokens' | 'content_filter' } | null;
}

export interface EmbeddingsResponse {
  object: 'list';
  data: Array<{
    object: 'embedding';
    embedding: number[];
    index: number;
  }>;
  model: string;
}

export interface ResponsePayload {
  model?: string;
  instructions?: string;
  input: ResponseInputItem[];
  tools?: FunctionToolDefinition[];
  tool_choice?: 'auto' | 'required' | 'none';
  parallel_tool_calls?: boolean;
  temperature?: number;
  max_output_tokens?: number;
  reasoning?: ReasoningOptions;
  textFormat?: ResponseTextFormat;
  user?: string;
}

function sanitizeRequest(body: Record<string, unknown>): Record<string, unknown> {
  const clone: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (value !== undefined && value !== null) {
      clone[key] = value;
    }
  }
  return clone;
}

export async function createResponse(
  payload: ResponsePayload,
  options: { signal?: AbortSignal } = {}
): Promise<AzureResponseOutput> {
  const endpoint = requireEndpoint(config.AZURE_OPENAI_ENDPOINT, 'AZURE_OPENAI_ENDPOINT');
  const baseUrl = `${endpoint}/openai/${config.AZURE_OPENAI_API_VERSION}`;

  const request = sanitizeRequest({
    model: payload.model ?? config.AZURE_OPENAI_GPT_DEPLOYMENT,
    // reasoning deployments reject temperature
    temperature: payload.reasoning ? undefined : payload.temperature,
    max_output_tokens: payload.max_output_tokens,
    reasoning: payload.reasoning,
    tools: payload.tools,
    tool_choice: payload.tool_choice,
    parallel_tool_calls: payload.parallel_tool_calls,
    instructions: payload.instructions,
    input: payload.input,
    user: payload.user,
    store: false,
    text: payload.textFormat ? { format: payload.textFormat } : undefined
  });

  return postJson<AzureResponseOutput>(withQuery(baseUrl, '/responses'), config.AZURE_OPENAI_API_KEY, request, options.signal);
}

export async function createEmbeddings(
  inputs: string[],
  options: { model?: string; signal?: AbortSignal } = {}
): Promise<EmbeddingsResponse> {
  const endpoint = requireEndpoint(
    config.AZURE_OPENAI_EMBEDDING_ENDPOINT ?? config.AZURE_OPENAI_ENDPOINT,
    'AZURE_OPENAI_EMBEDDING_ENDPOINT'
  );
  const baseUrl = `${endpoint}/openai/${config.AZURE_OPENAI_API_VERSION}`;
  const apiKey = config.AZURE_OPENAI_EMBEDDING_API_KEY ?? config.AZURE_OPENAI_API_KEY;

  return postJson<EmbeddingsResponse>(
    withQuery(baseUrl, '/embeddings'),
    apiKey,
    {
      model: options.model ?? config.AZURE_OPENAI_EMBEDDING_DEPLOYMENT,
      input: inputs
    },
    options.signal
  );
}
