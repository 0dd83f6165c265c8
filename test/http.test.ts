import { describe, expect, it } from 'vitest';
import { HttpError, requestJson } from '../src/http.js';

describe('requestJson', () => {
  it('retries transient statuses and returns the parsed body', async () => {
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      if (calls < 3) return new Response('busy', { status: 503 });
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    };

    expect(await requestJson<{ ok: boolean }>('https://example.test/x', { backoffMs: 1 }, fetcher)).toEqual({ ok: true });
    expect(calls).toBe(3);
  });

  it('throws other HTTP errors at once, named by label', async () => {
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      return new Response('nope', { status: 404 });
    };

    const err = await requestJson('https://example.test/secret/x', { label: 'getThing', backoffMs: 1 }, fetcher).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ message: 'HTTP 404 for getThing', status: 404, target: 'getThing', responseText: 'nope' });
    expect(calls).toBe(1);
  });

  it('retries network errors, then gives up', async () => {
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      throw new TypeError('fetch failed');
    };

    await expect(requestJson('https://example.test/x', { retries: 2, backoffMs: 1 }, fetcher)).rejects.toThrow('fetch failed');
    expect(calls).toBe(3);
  });

  it('does not retry once aborted', async () => {
    const controller = new AbortController();
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      controller.abort();
      throw new Error('aborted');
    };

    await expect(requestJson('https://example.test/x', { signal: controller.signal, backoffMs: 1 }, fetcher)).rejects.toThrow(
      'aborted',
    );
    expect(calls).toBe(1);
  });

  it('posts the body as JSON', async () => {
    const seen: RequestInit[] = [];
    const fetcher: typeof fetch = async (_url, init) => {
      seen.push(init ?? {});
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    };

    await requestJson('https://example.test/x', { body: { chat_id: 1 } }, fetcher);

    expect(seen[0].method).toBe('POST');
    expect(seen[0].body).toBe('{"chat_id":1}');
    expect(seen[0].headers).toEqual({ accept: 'application/json', 'content-type': 'application/json' });
  });

  it('returns undefined for empty bodies', async () => {
    const fetcher: typeof fetch = async () => new Response(null, { status: 204 });
    expect(await requestJson('https://example.test/x', {}, fetcher)).toBeUndefined();
  });
});
