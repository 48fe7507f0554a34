import type { FetchLike } from "../src/registry.js";

export type FetchCall = {
  url: string;
  authorization: string | null;
};

export const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) => {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
};

/** A fetch stand-in that routes each request to `handler` and records it. */
export const fakeFetch = (handler: (url: URL) => Response | Promise<Response>) => {
  const calls: FetchCall[] = [];
  const signals: Array<AbortSignal | null | undefined> = [];
  const fetch: FetchLike = async (input, init) => {
    calls.push({ url: input, authorization: new Headers(init?.headers).get("authorization") });
    signals.push(init?.signal);
    return handler(new URL(input));
  };
  return { fetch, calls, signals };
};
