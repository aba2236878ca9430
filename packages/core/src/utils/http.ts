export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Thrown when an HTTP request (including reading its body) exceeds its timeout.
 */
export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

export interface FetchJsonOptions {
  /** Abort the request after this many milliseconds. */
  timeoutMs: number;

  /** `fetch` implementation. Defaults to the global `fetch`. */
  fetch?: FetchLike;

  headers?: Record<string, string>;
}

/**
 * GET `url` and decode the body as JSON, whatever the status code.
 *
 * Rejects with `RequestTimeoutError` when the deadline passes, or with the
 * underlying error for transport faults and malformed bodies.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<JsonResponse> {
  const fetchImpl = options.fetch ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const res = await fetchImpl(url, {
      signal: controller.signal,
      headers: { accept: 'application/json', ...options.headers },
    });
    const body: unknown = await res.json();
    return { status: res.status, ok: res.ok, body };
  } catch (error) {
    if (controller.signal.aborted) throw new RequestTimeoutError(options.timeoutMs);
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}
