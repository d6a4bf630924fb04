import { writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempDir } from './fixtures';
import {
  CredentialsError,
  buildChatRequest,
  callChatCompletion,
  createOpenAiClient,
  loadApiKey,
  simplePrompt,
  type ChatCompletionClient,
  type ChatCompletionRequest,
} from './llm';

const { create } = vi.hoisted(() => ({
  create: vi.fn(async (_body: unknown) => ({ choices: [{ message: { content: 'A reply' } }] })),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

let dir = '';
let cleanup = () => {};

beforeEach(() => {
  ({ dir, cleanup } = makeTempDir());
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  cleanup();
});

function recordingClient(reply: string | null | Error) {
  const requests: ChatCompletionRequest[] = [];
  const client: ChatCompletionClient = {
    async complete(request) {
      requests.push(request);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
  return { client, requests };
}

describe('loadApiKey', () => {
  it('prefers the environment', () => {
    expect(loadApiKey({ env: { OPENAI_API_KEY: ' test-secret ' }, credentialsPath: join(dir, 'none') })).toBe('test-secret');
  });

  it('reads a JSON credentials file', () => {
    const path = join(dir, 'credentials');
    writeFileSync(path, JSON.stringify({ openai_api_key: 'test-secret' }), 'utf-8');
    expect(loadApiKey({ env: {}, credentialsPath: path })).toBe('test-secret');
  });

  it('reads an export line', () => {
    const path = join(dir, 'credentials');
    writeFileSync(path, '# keys\nexport OPENAI_API_KEY="test-secret"\n', 'utf-8');
    expect(loadApiKey({ env: {}, credentialsPath: path })).toBe('test-secret');
  });

  it('throws a CredentialsError when no key can be found', () => {
    const missing = join(dir, 'missing');
    expect(() => loadApiKey({ env: {}, credentialsPath: missing })).toThrow(CredentialsError);
    expect(() => loadApiKey({ env: {}, credentialsPath: missing })).toThrow(`Credentials file not found: ${missing}`);

    const path = join(dir, 'credentials');
    writeFileSync(path, 'nothing useful', 'utf-8');
    expect(() => loadApiKey({ env: {}, credentialsPath: path })).toThrow(
      `OpenAI API key not found in credentials file: ${path}`,
    );
  });
});

describe('buildChatRequest', () => {
  it('normalizes roles and splits known model args from extras', () => {
    const request = buildChatRequest(
      'Be brief',
      [
        { role: 'User', content: 'hi' },
        { role: 'narrator', content: 'meanwhile' },
      ],
      { model: 'test-model', temperature: 0.2, presence_penalty: 0.5 },
    );
    expect(request).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'hi' },
        { role: 'user', content: 'meanwhile' },
      ],
      temperature: 0.2,
      max_tokens: 1024,
      top_p: 0.95,
      extra: { presence_penalty: 0.5 },
    });
    expect(console.warn).toHaveBeenCalledWith("⚠️  Invalid role 'narrator', defaulting to 'user'");
  });

  it('keeps list and mapping model args intact and drops stream', () => {
    const request = buildChatRequest('', [{ role: 'user', content: 'hi' }], {
      stop: ['\n\n', 'END'],
      response_format: { type: 'json_object' },
      stream: true,
    });
    expect(request.extra).toEqual({ stop: ['\n\n', 'END'], response_format: { type: 'json_object' } });
    expect(console.warn).toHaveBeenCalledWith("⚠️  Ignoring model arg 'stream'");
  });

  it('adds a greeting when only a system prompt is given', () => {
    expect(buildChatRequest('Be brief', []).messages).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'Hello' },
    ]);
  });

  it('omits an empty system prompt', () => {
    expect(buildChatRequest('', [{ role: 'assistant', content: 'ok' }, { role: 'user', content: 'go' }]).messages).toEqual([
      { role: 'assistant', content: 'ok' },
      { role: 'user', content: 'go' },
    ]);
  });
});

describe('callChatCompletion', () => {
  it('returns the completion text', async () => {
    const { client, requests } = recordingClient('An article');
    await expect(callChatCompletion('sys', [{ role: 'user', content: 'write' }], {}, client)).resolves.toBe('An article');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.model).toBe('gpt-4o-mini');
  });

  it('treats an empty completion as a failure', async () => {
    const { client } = recordingClient('   ');
    await expect(callChatCompletion('sys', [], {}, client)).rejects.toThrow('Empty completion from model gpt-4o-mini');
    expect(console.error).toHaveBeenCalledWith('❌ LLM call failed: Empty completion from model gpt-4o-mini');
  });

  it('logs and rethrows client errors', async () => {
    const failure = new Error('rate limited');
    const { client } = recordingClient(failure);
    await expect(callChatCompletion('sys', [], {}, client)).rejects.toBe(failure);
    expect(console.error).toHaveBeenCalledWith('❌ LLM call failed: rate limited');
  });

  it('wraps a single prompt with an optional system message', async () => {
    const { client, requests } = recordingClient('hi');
    await simplePrompt('Say hi', 'Be brief', { max_tokens: 20 }, client);
    expect(requests[0]?.messages).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'Say hi' },
    ]);
    expect(requests[0]?.max_tokens).toBe(20);
  });
});

describe('createOpenAiClient', () => {
  it('sends every model arg in the completion body', async () => {
    create.mockClear();
    const request = buildChatRequest('', [{ role: 'user', content: 'hi' }], {
      model: 'test-model',
      n: 2,
      logprobs: true,
      service_tier: 'auto',
      stop: ['END'],
    });
    await expect(createOpenAiClient('test-secret').complete(request)).resolves.toBe('A reply');
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.7,
      max_tokens: 1024,
      top_p: 0.95,
      n: 2,
      logprobs: true,
      service_tier: 'auto',
      stop: ['END'],
    });
  });

  it('lets the known fields win over same-named extras', async () => {
    create.mockClear();
    const request = buildChatRequest('', [{ role: 'user', content: 'hi' }], { model: 'test-model' });
    request.extra.messages = [];
    await createOpenAiClient('test-secret').complete(request);
    expect(create.mock.calls[0]?.[0]).toMatchObject({ model: 'test-model', messages: [{ role: 'user', content: 'hi' }] });
  });
});
