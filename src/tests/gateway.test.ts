import { describe, it, expect, vi } from 'vitest';
import { OpenAIClient } from '../ai/llm/providers/OpenAIClient';
import { LLMGateway, complete } from '../ai/llm/gateway';
import { LLMClient } from '../ai/llm/LLMClient';
import { createLLMClient } from '../ai/llm';
import type { LLMCompletionRequest, LLMCompletionResponse, LLMProvider } from '../ai/llm/types';
import {
  GatewayAuthError,
  GatewayError,
  GatewayRateLimitError,
  GatewayTimeoutError,
} from '../lib/errors';

const jsonResponse = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });

const completion = (content: string) => ({
  model: 'gpt-4o-2024-08-06',
  choices: [
    { message: { role: 'assistant', content }, finish_reason: 'stop' },
    { message: { role: 'assistant', content: 'second choice' }, finish_reason: 'stop' },
  ],
  usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
});

const makeClient = () =>
  new OpenAIClient({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1/', timeoutMs: 50 });

class FakeClient extends LLMClient {
  readonly requests: LLMCompletionRequest[] = [];

  constructor(private readonly reply: () => Promise<string>) {
    super({
      provider: 'openai',
      apiKey: 'test-key',
      baseUrl: 'https://llm.test/v1',
      defaultModel: 'gpt-4o',
      timeoutMs: 50,
    });
  }

  get provider(): LLMProvider {
    return 'openai';
  }

  isConfigured(): boolean {
    return true;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push(request);
    const content = await this.reply();
    return {
      content,
      model: request.model ?? 'gpt-4o',
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      finishReason: 'stop',
      latencyMs: 3,
    };
  }
}

describe('OpenAIClient', () => {
  it('sends one user message and returns the first choice', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse(completion('Fill the form.')));
    vi.stubGlobal('fetch', fetchMock);

    const response = await makeClient().complete({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'the prompt' }],
    });

    expect(response.content).toBe('Fill the form.');
    expect(response.model).toBe('gpt-4o-2024-08-06');
    expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 4, totalTokens: 16 });
    expect(response.finishReason).toBe('stop');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe('Bearer test-key');
    expect(JSON.parse(init.body)).toEqual({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'the prompt' }],
      stream: false,
    });
  });

  it('fails with GatewayAuthError without calling the API when no key is set', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      new OpenAIClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toBeInstanceOf(GatewayAuthError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('maps 401 to GatewayAuthError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse({ error: { message: 'bad key' } }, { status: 401 }))
    );

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toBeInstanceOf(GatewayAuthError);
  });

  it('maps 429 to GatewayRateLimitError with the retry delay', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ error: { message: 'slow down' } }, { status: 429, headers: { 'retry-after': '2' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toMatchObject({ name: 'GatewayRateLimitError', retryAfterMs: 2000, retryable: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('leaves the retry delay unset when retry-after is an HTTP date', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse(
          { error: { message: 'slow down' } },
          { status: 429, headers: { 'retry-after': 'Wed, 21 Oct 2026 07:28:00 GMT' } }
        )
      )
    );

    const error = await makeClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GatewayRateLimitError);
    expect(error).toMatchObject({ retryAfterMs: undefined });
  });

  it('surfaces server errors once, without retrying', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ error: { message: 'overloaded' } }, { status: 503 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toMatchObject({
      name: 'GatewayError',
      message: 'overloaded',
      statusCode: 503,
      retryable: true,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails when the model returns no choices', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ choices: [] })));

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toThrowError('OpenAI returned no choices');
  });

  it('wraps transport failures in GatewayError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toMatchObject({ name: 'GatewayError', message: 'OpenAI request failed: fetch failed' });
  });

  it('aborts after the configured timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () =>
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
            );
          })
      )
    );

    await expect(
      makeClient().complete({ messages: [{ role: 'user', content: 'x' }] })
    ).rejects.toBeInstanceOf(GatewayTimeoutError);
  });
});

describe('LLMGateway', () => {
  it('sends the prompt as the only user message with the default model', async () => {
    const client = new FakeClient(async () => 'an answer');
    const gateway = new LLMGateway(client);

    await expect(gateway.complete('the prompt')).resolves.toBe('an answer');
    expect(client.requests).toEqual([
      { model: 'gpt-4o', messages: [{ role: 'user', content: 'the prompt' }] },
    ]);
  });

  it('uses the model passed to complete over the configured default', async () => {
    const client = new FakeClient(async () => 'ok');
    const gateway = new LLMGateway(client, { defaultModel: 'gpt-4o-mini' });

    await gateway.complete('p');
    await gateway.complete('p', 'gpt-4.1');

    expect(client.requests.map((r) => r.model)).toEqual(['gpt-4o-mini', 'gpt-4.1']);
  });

  it('wraps unexpected client failures in GatewayError', async () => {
    const cause = new Error('socket hang up');
    const gateway = new LLMGateway(new FakeClient(() => Promise.reject(cause)));

    const error = await gateway.complete('p').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({ message: 'LLM call failed: socket hang up', provider: 'openai', cause });
  });

  it('passes gateway errors through unchanged', async () => {
    const original = new GatewayRateLimitError('openai', 1000);
    const gateway = new LLMGateway(new FakeClient(() => Promise.reject(original)));

    await expect(gateway.complete('p')).rejects.toBe(original);
  });
});

describe('complete', () => {
  it('defaults to gpt-4o', async () => {
    const client = new FakeClient(async () => 'done');

    await expect(complete(client, 'p')).resolves.toBe('done');
    expect(client.requests[0].model).toBe('gpt-4o');
  });
});

describe('createLLMClient', () => {
  it('builds an OpenAI client from partial config', () => {
    const client = createLLMClient('openai', { apiKey: 'test-key' });

    expect(client).toBeInstanceOf(OpenAIClient);
    expect(client.isConfigured()).toBe(true);
    expect(client.getDefaultModel()).toBe('gpt-4o');
  });
});
