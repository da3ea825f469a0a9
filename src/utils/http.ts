export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** A response whose body has already been read in full. */
export interface TimedResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
}

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * fetch() with an abort timer that covers both the headers and the body.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs = 30_000,
  fetchImpl: FetchLike = fetch,
): Promise<TimedResponse> {
  const ctrl = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ctrl.abort();
      reject(new RequestTimeoutError(url, timeoutMs));
    }, timeoutMs);
  });

  const request = async (): Promise<TimedResponse> => {
    const res = await fetchImpl(url, { ...init, signal: ctrl.signal });
    return { status: res.status, ok: res.ok, headers: res.headers, text: await res.text() };
  };

  try {
    return await Promise.race([request(), expired]);
  } finally {
    clearTimeout(timer);
  }
}
