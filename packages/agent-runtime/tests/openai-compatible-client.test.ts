import { describe, it, expect, vi } from 'vitest';
import { TransportError } from '@gramloop/core';
import type { ModelRequest } from '@gramloop/core';
import { OpenAICompatibleClient, readCompletion } from '../src/openai-compatible-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function mockFetch(respond: (init?: RequestInit) => Promise<Response>) {
  return vi.fn((_input: string | URL | Request, init?: RequestInit) => respond(init));
}

const REQUEST: ModelRequest = {
  messages: [{ role: 'user', content: 'hi' }],
  tools: [{ type: 'function', function: { name: 'add', description: 'Add', parameters: { type: 'object' } } }],
  constraint: { structured_outputs: { type: 'grammar', grammar: 'root ::= "x"' } },
};

const OK_BODY = {
  choices: [
    {
      message: {
        content: 'hello',
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'add', arguments: '{"a":1}' } }],
      },
      finish_reason: 'tool_calls',
    },
  ],
  usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 },
};

function createClient(fetchImpl: ReturnType<typeof mockFetch>, apiKey: string | undefined = 'test-secret') {
  return new OpenAICompatibleClient({
    baseUrl: 'http://localhost:8000/v1/',
    model: 'test-model',
    apiKey,
    temperature: 0,
    maxTokens: 64,
    fetch: fetchImpl,
  });
}

describe('OpenAICompatibleClient', () => {
  it('declares constraint support and a default id', () => {
    const client = createClient(mockFetch(async () => jsonResponse(OK_BODY)));
    expect(client.acceptsConstraints).toBe(true);
    expect(client.id).toBe('openai-compatible:test-model');
  });

  it('posts the request with tools, sampling options and the constraint merged in', async () => {
    const fetchImpl = mockFetch(async () => jsonResponse(OK_BODY));
    await createClient(fetchImpl).complete(REQUEST);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost:8000/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      tools: REQUEST.tools,
      tool_choice: 'auto',
      temperature: 0,
      max_tokens: 64,
      structured_outputs: { type: 'grammar', grammar: 'root ::= "x"' },
    });
  });

  it('omits the authorization header without an api key', async () => {
    const fetchImpl = mockFetch(async () => jsonResponse(OK_BODY));
    await createClient(fetchImpl, undefined).complete({ messages: [] });
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('parses text, tool calls, usage and finish reason', async () => {
    const response = await createClient(mockFetch(async () => jsonResponse(OK_BODY))).complete(REQUEST);
    expect(response).toEqual({
      text: 'hello',
      nativeToolCalls: [{ id: 'c1', type: 'function', function: { name: 'add', arguments: '{"a":1}' } }],
      usage: { input: 3, output: 4, total: 7 },
      finishReason: 'tool_calls',
    });
  });

  it('marks server errors retryable', async () => {
    const client = createClient(
      mockFetch(async () => new Response('overloaded', { status: 503, statusText: 'Service Unavailable' })),
    );
    const error = await client.complete(REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      status: 503,
      retryable: true,
      message: 'Endpoint returned 503 Service Unavailable: overloaded',
    });
  });

  it('marks client errors non-retryable', async () => {
    const client = createClient(mockFetch(async () => new Response('bad', { status: 400, statusText: 'Bad Request' })));
    await expect(client.complete(REQUEST)).rejects.toMatchObject({ status: 400, retryable: false });
  });

  it('wraps network failures', async () => {
    const client = createClient(
      mockFetch(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    await expect(client.complete(REQUEST)).rejects.toMatchObject({
      kind: 'transport',
      message: 'Network error: fetch failed',
      retryable: true,
    });
  });

  it('times out through the abort signal', async () => {
    const client = createClient(
      mockFetch(
        (init) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      ),
    );
    await expect(client.complete(REQUEST, { timeoutMs: 10 })).rejects.toMatchObject({
      message: 'Request timed out after 10ms',
      status: 408,
    });
  });

  it('rejects bodies that are not JSON', async () => {
    const client = createClient(mockFetch(async () => new Response('<html>', { status: 200 })));
    const error = await client.complete(REQUEST).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ retryable: false });
  });
});

describe('readCompletion', () => {
  it('rejects bodies without a first choice', () => {
    expect(() => readCompletion({ choices: [] })).toThrow('Malformed completion response: missing choices[0].message');
  });

  it('treats null content as empty text and encodes object arguments', () => {
    expect(
      readCompletion({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: 'c1', function: { name: 'add', arguments: { a: 1 } } }, { id: 'bad' }],
            },
          },
        ],
      }),
    ).toEqual({
      text: '',
      nativeToolCalls: [{ id: 'c1', type: 'function', function: { name: 'add', arguments: '{"a":1}' } }],
    });
  });

  it('derives a missing total from input and output', () => {
    expect(readCompletion({ choices: [{ message: { content: 'x' } }], usage: { prompt_tokens: 2, completion_tokens: 3 } }))
      .toEqual({ text: 'x', usage: { input: 2, output: 3, total: 5 } });
  });
});
