import { existsSync, readFileSync } from 'fs';
import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { ModelArgValue, ModelArgs } from '../src/sim';
import { errorMessage } from './cli-args';
import { defaultDataPaths } from './config-files';

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = { role: string; content: string };

export type ChatCompletionRequest = {
  model: string;
  messages: Array<{ role: ChatRole; content: string }>;
  temperature: number;
  max_tokens: number;
  top_p: number;
  /** Model args beyond the four above, passed through untouched. */
  extra: Record<string, ModelArgValue>;
};

export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<string | null>;
}

export const DEFAULT_MODEL_ARGS = {
  model: 'gpt-4o-mini',
  temperature: 0.7,
  max_tokens: 1024,
  top_p: 0.95,
} as const;

const ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

// ─────────────────────────────────────────────────────────────
// Credentials
// ─────────────────────────────────────────────────────────────

export type LoadApiKeyOptions = {
  env?: NodeJS.ProcessEnv;
  credentialsPath?: string;
};

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * OPENAI_API_KEY from the environment, else the credentials file: either
 * JSON `{ "openai_api_key": "..." }` or an `export OPENAI_API_KEY=...` line.
 */
export function loadApiKey(options: LoadApiKeyOptions = {}): string {
  const env = options.env ?? process.env;
  const fromEnv = env.OPENAI_API_KEY?.trim();
  if (fromEnv) return fromEnv;

  const path = options.credentialsPath ?? defaultDataPaths().credentials;
  if (!existsSync(path)) throw new CredentialsError(`Credentials file not found: ${path}`);
  const text = readFileSync(path, 'utf-8');

  const doc = parseJsonOrNull(text);
  if (typeof doc === 'object' && doc !== null && 'openai_api_key' in doc) {
    const key = doc.openai_api_key;
    if (typeof key === 'string' && key.trim()) return key.trim();
  }

  const line = /^\s*export\s+OPENAI_API_KEY\s*=\s*["']?([^"'\s]+)["']?\s*$/m.exec(text);
  if (line?.[1]) return line[1];

  throw new CredentialsError(`OpenAI API key not found in credentials file: ${path}`);
}

// ─────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────

function toMessageParam(m: { role: ChatRole; content: string }): ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
    case 'user':
      return { role: 'user', content: m.content };
  }
}

export function createOpenAiClient(apiKey: string = loadApiKey()): ChatCompletionClient {
  const openai = new OpenAI({ apiKey });
  return {
    async complete(request) {
      const body: ChatCompletionCreateParamsNonStreaming = Object.assign({}, request.extra, {
        model: request.model,
        messages: request.messages.map(toMessageParam),
        temperature: request.temperature,
        max_tokens: request.max_tokens,
        top_p: request.top_p,
      });
      const response = await openai.chat.completions.create(body);
      return response.choices[0]?.message.content ?? null;
    },
  };
}

// ─────────────────────────────────────────────────────────────
// Calls
// ─────────────────────────────────────────────────────────────

function isChatRole(role: string): role is ChatRole {
  return ROLES.some(r => r === role);
}

export function buildChatRequest(system: string, messages: readonly ChatMessage[], modelArgs: ModelArgs = {}): ChatCompletionRequest {
  const chat: ChatCompletionRequest['messages'] = [];
  if (system) chat.push({ role: 'system', content: system });
  for (const message of messages) {
    const role = message.role.toLowerCase();
    if (isChatRole(role)) {
      chat.push({ role, content: message.content });
    } else {
      console.warn(`⚠️  Invalid role '${message.role}', defaulting to 'user'`);
      chat.push({ role: 'user', content: message.content });
    }
  }
  if (!chat.some(m => m.role !== 'system')) chat.push({ role: 'user', content: 'Hello' });

  // Replies are read whole, so `stream` is never forwarded.
  const { model, temperature, max_tokens, top_p, stream, ...rest } = modelArgs;
  if (stream !== undefined) console.warn("⚠️  Ignoring model arg 'stream'");
  const extra: Record<string, ModelArgValue> = {};
  for (const [k, v] of Object.entries(rest)) {
    if (v !== undefined) extra[k] = v;
  }
  return {
    model: typeof model === 'string' ? model : DEFAULT_MODEL_ARGS.model,
    messages: chat,
    temperature: typeof temperature === 'number' ? temperature : DEFAULT_MODEL_ARGS.temperature,
    max_tokens: typeof max_tokens === 'number' ? max_tokens : DEFAULT_MODEL_ARGS.max_tokens,
    top_p: typeof top_p === 'number' ? top_p : DEFAULT_MODEL_ARGS.top_p,
    extra,
  };
}

export async function callChatCompletion(
  system: string,
  messages: readonly ChatMessage[],
  modelArgs: ModelArgs = {},
  client?: ChatCompletionClient,
): Promise<string> {
  const request = buildChatRequest(system, messages, modelArgs);
  try {
    const content = await (client ?? createOpenAiClient()).complete(request);
    if (!content?.trim()) throw new Error(`Empty completion from model ${request.model}`);
    return content;
  } catch (err) {
    console.error(`❌ LLM call failed: ${errorMessage(err)}`);
    throw err;
  }
}

export function simplePrompt(
  prompt: string,
  system = '',
  modelArgs: ModelArgs = {},
  client?: ChatCompletionClient,
): Promise<string> {
  return callChatCompletion(system, [{ role: 'user', content: prompt }], modelArgs, client);
}
