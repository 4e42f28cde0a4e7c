import { FetchInit, FetchLike } from "../utils/http";

export type MockResponse = {
  ok?: boolean;
  status?: number;
  headers?: Record<string, string>;
  jsonBody?: unknown;
  textBody?: string;
  /** Makes the call reject instead of resolving. */
  networkError?: Error;
};

export type RecordedCall = {
  url: string;
  init: FetchInit;
};

export function createFetch(
  responses: MockResponse[],
  calls: RecordedCall[] = [],
): FetchLike {
  return async (url, init = {}) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected fetch call: ${url}`);
    }
    if (next.networkError) {
      throw next.networkError;
    }

    const status = next.status ?? 200;
    return {
      ok: next.ok ?? (status >= 200 && status < 300),
      status,
      headers: {
        get(name: string) {
          return next.headers?.[name.toLowerCase()] ?? null;
        },
      },
      async json() {
        return next.jsonBody;
      },
      async text() {
        return next.textBody ?? JSON.stringify(next.jsonBody ?? "");
      },
    };
  };
}

export function requestBody(call: RecordedCall | undefined): unknown {
  return call?.init.body === undefined ? undefined : JSON.parse(call.init.body);
}
