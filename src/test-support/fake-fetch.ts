// In-process stand-in for `fetch`, plugged in behind FetchHttpClient.

import { FetchHttpClient, type HttpClient } from "@effect/platform";
import { Layer } from "effect";

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string;
}

export interface FakeFetch {
  readonly calls: RecordedRequest[];
  readonly layer: Layer.Layer<FetchHttpClient.Fetch | HttpClient.HttpClient>;
}

export function fakeFetch(
  respond: (request: RecordedRequest) => Response,
): FakeFetch {
  const calls: RecordedRequest[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    const request = new Request(input, init);
    const recorded: RecordedRequest = {
      url: request.url,
      method: request.method,
      headers: request.headers,
      body: await request.text(),
    };
    calls.push(recorded);
    return respond(recorded);
  };
  return {
    calls,
    layer: Layer.mergeAll(
      FetchHttpClient.layer,
      Layer.succeed(FetchHttpClient.Fetch, fetch),
    ),
  };
}

export const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
