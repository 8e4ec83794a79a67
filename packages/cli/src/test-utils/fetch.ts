import { vi } from "vitest";

type FetchFn = typeof globalThis.fetch;

type FetchInput = Parameters<FetchFn>[0];
type FetchInit = Parameters<FetchFn>[1];

export function getFetchUrl(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function getFetchMethod(input: FetchInput, init?: FetchInit): string {
  return init?.method ?? (input instanceof Request ? input.method : "GET");
}

export function formatFetchCall(input: FetchInput, init?: FetchInit): string {
  return `${getFetchMethod(input, init)} ${getFetchUrl(input)}`;
}

export type MockRequest = {
  method: string;
  url: string;
  headers: Headers;
  /** Request body as text ("" when there is none) */
  body: string;
};

export type MockReply = {
  status?: number;
  body: unknown;
};

export type MockRoute = (request: MockRequest) => MockReply | Promise<MockReply>;

/**
 * Replaces global fetch with a table of routes keyed by "METHOD url".
 * Unlisted requests reject. Undo with `vi.unstubAllGlobals()`.
 */
export function mockFetch(routes: Record<string, MockRoute>) {
  const requests: MockRequest[] = [];

  vi.stubGlobal("fetch", async (input: FetchInput, init?: FetchInit) => {
    const request: MockRequest = {
      method: getFetchMethod(input, init),
      url: getFetchUrl(input),
      headers: new Headers(init?.headers),
      body: init?.body ? String(init.body) : "",
    };
    requests.push(request);

    const route = routes[`${request.method} ${request.url}`];
    if (!route) {
      throw new Error(`Unmocked fetch: ${formatFetchCall(input, init)}`);
    }

    const reply = await route(request);
    return new Response(JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  });

  return { requests };
}

/** Makes every fetch fail as if the network were down. */
export function mockFetchError(message: string) {
  vi.stubGlobal("fetch", async (input: FetchInput, init?: FetchInit) => {
    throw new TypeError(`${message} (${formatFetchCall(input, init)})`);
  });
}
