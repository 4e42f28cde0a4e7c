export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type FetchResponseLike = {
  ok: boolean;
  status: number;
  headers: {
    get(name: string): string | null;
  };
  json(): Promise<unknown>;
  text(): Promise<string>;
};

export type FetchInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
};

export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponseLike>;

export class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms.`);
    this.name = "RequestTimeoutError";
  }
}

/**
 * Settles with `work`, or rejects with `onTimeout()` once `timeoutMs` passes.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function bufferedResponse(response: FetchResponseLike, body: string): FetchResponseLike {
  return {
    ok: response.ok,
    status: response.status,
    headers: response.headers,
    text: async () => body,
    json: async (): Promise<unknown> => JSON.parse(body),
  };
}

/**
 * fetch() bound to a per-request timeout. The deadline covers the body as
 * well as the headers; the returned response is already buffered.
 */
export function createTimeoutFetch(
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
): FetchLike {
  return async (url, init = {}) => {
    const controller = new AbortController();

    const request = async (): Promise<FetchResponseLike> => {
      const response = await globalThis.fetch(url, { ...init, signal: controller.signal });
      const body = await response.text();
      return bufferedResponse(response, body);
    };

    return withTimeout(request(), timeoutMs, () => {
      controller.abort();
      return new RequestTimeoutError(url, timeoutMs);
    });
  };
}

export function buildUrl(
  baseUrl: string,
  pathname: string,
  params: Record<string, string> = {},
): string {
  const url = new URL(`${baseUrl.replace(/\/$/, "")}${pathname}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export async function parseJsonResponse<T>(response: FetchResponseLike): Promise<T> {
  return (await response.json()) as T;
}
