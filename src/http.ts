export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  /** Sent as the JSON request body. */
  body?: unknown;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Aborts the request and any pending retry. */
  signal?: AbortSignal;
  /**
   * Name used in error messages instead of the URL.
   * Bot API URLs embed the token, so callers against them always set this.
   */
  label?: string;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly target: string,
    public readonly responseText?: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// Simple global limiter keyed by origin.
const lastRequestAt = new Map<string, number>();

function originOf(url: string) {
  try {
    return new URL(url).origin;
  } catch {
    return 'unknown';
  }
}

async function throttle(url: string, rps?: number, signal?: AbortSignal) {
  if (!rps || rps <= 0) return;
  const minGap = 1000 / rps;
  const key = originOf(url);
  const last = lastRequestAt.get(key) ?? 0;
  const wait = last + minGap - Date.now();
  if (wait > 0) await sleep(wait, signal);
  lastRequestAt.set(key, Date.now());
}

function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

/**
 * JSON POST with retries on network errors, 429 and 5xx.
 * TASK_BOT_HTTP_RPS caps the request rate per origin.
 * Other HTTP errors are thrown at once as HttpError.
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T> {
  const target = opts.label ?? url;
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt++;
    let res: Response;
    try {
      opts.signal?.throwIfAborted();
      const envRps = process.env.TASK_BOT_HTTP_RPS ? Number(process.env.TASK_BOT_HTTP_RPS) : undefined;
      await throttle(url, envRps, opts.signal);

      res = await fetcher(url, {
        method: 'POST',
        headers: {
          accept: 'application/json',
          ...(opts.body ? { 'content-type': 'application/json' } : {}),
        },
        body: opts.body ? JSON.stringify(opts.body) : undefined,
        signal: opts.signal,
      });
    } catch (e) {
      if (opts.signal?.aborted) throw e;
      // network errors
      if (attempt <= retries) {
        await sleep(backoffMs * 2 ** (attempt - 1), opts.signal);
        continue;
      }
      throw e;
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => undefined);
      const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
      if (attempt <= retries && isTransientStatus(res.status)) {
        await sleep(retryAfterMs ?? backoffMs * 2 ** (attempt - 1), opts.signal);
        continue;
      }
      throw new HttpError(`HTTP ${res.status} for ${target}`, res.status, target, txt);
    }

    // empty body
    if (res.status === 204) return undefined as T;

    const text = await res.text();
    if (!text) return undefined as T;
    return JSON.parse(text) as T;
  }
}
