import { afterEach, describe, it, expect, vi } from 'vitest';
import { OpenAIChatCompletions } from '../llm/openai.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIChatCompletions', () => {
  it('posts the chat request and maps the first choice', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(200, {
      choices: [{ message: { content: '{"intent_id":"a"}' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
    }));
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();

    const out = await new OpenAIChatCompletions('test-secret', 'http://llm.local/v1/').complete({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.3,
      max_tokens: 100,
      signal: controller.signal
    });

    expect(out).toEqual({
      content: '{"intent_id":"a"}',
      finish_reason: 'stop',
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.local/v1/chat/completions');
    expect(init.signal).toBe(controller.signal);
    expect(init.headers).toEqual({ 'content-type': 'application/json', authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.3,
      max_tokens: 100
    });
  });

  it('returns empty content when the response has no choices', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(200, { choices: [] })));
    const out = await new OpenAIChatCompletions('test-secret').complete({ model: 'm', messages: [] });
    expect(out).toEqual({ content: '', finish_reason: undefined, usage: undefined });
  });

  it('throws with the status and body on an HTTP error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('rate limited', { status: 429 })));
    await expect(new OpenAIChatCompletions('test-secret').complete({ model: 'm', messages: [] }))
      .rejects.toThrow('LLM HTTP 429: rate limited');
  });
});
