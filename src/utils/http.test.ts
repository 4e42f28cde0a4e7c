import { afterEach, describe, expect, it, vi } from "vitest";

import { createTimeoutFetch, RequestTimeoutError, withTimeout } from "./http";

const URL_UNDER_TEST = "https://api.example.test/contacts";

function stubResponse(text: () => Promise<string>) {
  return {
    ok: true,
    status: 200,
    headers: { get: () => null },
    text,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createTimeoutFetch", () => {
  it("returns the buffered body and passes an abort signal", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: { signal?: AbortSignal }) =>
      stubResponse(async () => '{"id":"h-1"}'),
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await createTimeoutFetch(50)(URL_UNDER_TEST, { method: "POST" });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ id: "h-1" });
    expect(await response.text()).toBe('{"id":"h-1"}');
    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("raises RequestTimeoutError and aborts when the server never answers", async () => {
    let signal: AbortSignal | undefined;
    vi.stubGlobal(
      "fetch",
      (_url: string, init?: { signal?: AbortSignal }) => {
        signal = init?.signal;
        return new Promise(() => {});
      },
    );

    await expect(createTimeoutFetch(20)(URL_UNDER_TEST)).rejects.toThrow(
      new RequestTimeoutError(URL_UNDER_TEST, 20),
    );
    expect(signal?.aborted).toBe(true);
  });

  it("raises RequestTimeoutError when the body stalls after the headers", async () => {
    vi.stubGlobal("fetch", async () => stubResponse(() => new Promise<string>(() => {})));

    await expect(createTimeoutFetch(20)(URL_UNDER_TEST)).rejects.toThrow(
      "Request to https://api.example.test/contacts timed out after 20ms.",
    );
  });
});

describe("withTimeout", () => {
  it("settles with the work when it finishes first", async () => {
    await expect(
      withTimeout(Promise.resolve("done"), 50, () => new Error("late")),
    ).resolves.toBe("done");
  });

  it("rejects with the timeout error when the work is slower", async () => {
    await expect(
      withTimeout(new Promise<string>(() => {}), 10, () => new Error("late")),
    ).rejects.toThrow("late");
  });
});
