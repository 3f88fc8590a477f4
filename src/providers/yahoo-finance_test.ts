import { ConfigProvider, Effect, Either } from "effect";
import { expect, test } from "vitest";
import {
  decodeDailyCloses,
  decodeSnapshot,
  makeYahooFinanceApi,
} from "./yahoo-finance.ts";
import type { MarketDataError } from "../market-data.ts";
import { fakeFetch, json } from "../test-support/fake-fetch.ts";

// --- Test data ---

const chart = (result: unknown) => ({ chart: { result: [result], error: null } });

const snapshotResponse = chart({
  meta: {
    symbol: "VRT",
    regularMarketPrice: 182.47,
    currency: "USD",
    exchangeName: "NYQ",
  },
});

const historyResponse = chart({
  meta: { symbol: "SFFLY", currency: "USD" },
  timestamp: [1749762000, 1749589200, 1749675600],
  indicators: { quote: [{ close: [null, 6.12, 6.3] }] },
});

// --- Helpers ---

async function decodeFailure(
  effect: Effect.Effect<unknown, MarketDataError>,
): Promise<MarketDataError> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeSnapshot ---

test("decodeSnapshot: reads price and currency from meta", async () => {
  const snapshot = await Effect.runPromise(decodeSnapshot(snapshotResponse, "VRT"));
  expect(snapshot).toEqual({ lastPrice: 182.47, currency: "USD" });
});

test("decodeSnapshot: fields of the wrong type read as absent", async () => {
  const snapshot = await Effect.runPromise(
    decodeSnapshot(chart({ meta: { regularMarketPrice: "n/a", currency: 7 } }), "X"),
  );
  expect(snapshot).toEqual({});
});

test("decodeSnapshot: missing price keeps the currency", async () => {
  const snapshot = await Effect.runPromise(
    decodeSnapshot(chart({ meta: { currency: "EUR" } }), "X"),
  );
  expect(snapshot).toEqual({ currency: "EUR" });
});

test("decodeSnapshot: empty result is SymbolNotFound", async () => {
  const error = await decodeFailure(
    decodeSnapshot({ chart: { result: [], error: null } }, "XYZ"),
  );
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeSnapshot: chart error is SymbolNotFound", async () => {
  const error = await decodeFailure(
    decodeSnapshot(
      { chart: { result: null, error: { description: "No data found" } } },
      "XYZ",
    ),
  );
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeSnapshot: unrelated payload is ParseError", async () => {
  const error = await decodeFailure(decodeSnapshot({ foo: "bar" }, "X"));
  expect(error._tag).toBe("ParseError");
});

// --- decodeDailyCloses ---

test("decodeDailyCloses: chronological bars, gaps kept as missing closes", async () => {
  const bars = await Effect.runPromise(decodeDailyCloses(historyResponse, "SFFLY"));
  expect(bars).toEqual([
    { timestamp: 1749589200000, close: 6.12 },
    { timestamp: 1749675600000, close: 6.3 },
    { timestamp: 1749762000000 },
  ]);
});

test("decodeDailyCloses: no indicators means no bars with closes", async () => {
  const bars = await Effect.runPromise(
    decodeDailyCloses(chart({ meta: {}, timestamp: [1749589200] }), "X"),
  );
  expect(bars).toEqual([{ timestamp: 1749589200000 }]);
});

// --- Provider over HTTP ---

const BASE_URL = "https://chart.test/v8/finance/chart";

function withProvider<A, E>(
  respond: Parameters<typeof fakeFetch>[0],
  use: (api: Effect.Effect.Success<typeof makeYahooFinanceApi>) => Effect.Effect<A, E>,
) {
  const http = fakeFetch(respond);
  const effect = makeYahooFinanceApi.pipe(
    Effect.flatMap(use),
    Effect.provide(http.layer),
    Effect.withConfigProvider(
      ConfigProvider.fromMap(new Map([["YAHOO_BASE_URL", BASE_URL]])),
    ),
  );
  return { calls: http.calls, run: () => Effect.runPromise(Effect.either(effect)) };
}

test("open: rejects symbols with unexpected characters", async () => {
  const { calls, run } = withProvider(() => json(snapshotResponse), (api) =>
    api.open("BRK B"),
  );
  const result = await run();
  expect(Either.isLeft(result) && result.left._tag).toBe("InvalidSymbol");
  expect(calls).toEqual([]);
});

test("snapshot: GETs the one-day chart for the symbol", async () => {
  const { calls, run } = withProvider(() => json(snapshotResponse), (api) =>
    api.open("VRT").pipe(Effect.flatMap((handle) => handle.snapshot)),
  );
  const result = await run();

  expect(Either.isRight(result) && result.right).toEqual({
    lastPrice: 182.47,
    currency: "USD",
  });
  expect(calls).toHaveLength(1);
  const url = new URL(calls[0].url);
  expect(url.origin + url.pathname).toBe(`${BASE_URL}/VRT`);
  expect(url.searchParams.get("range")).toBe("1d");
  expect(url.searchParams.get("interval")).toBe("1d");
});

test("dailyCloses: asks for the trailing window in days", async () => {
  const { calls, run } = withProvider(() => json(historyResponse), (api) =>
    api.open("SFFLY").pipe(Effect.flatMap((handle) => handle.dailyCloses(5))),
  );
  const result = await run();

  expect(Either.isRight(result)).toBe(true);
  expect(new URL(calls[0].url).searchParams.get("range")).toBe("5d");
});

test("snapshot: non-2xx status is HttpError", async () => {
  const { run } = withProvider(
    () => json({ chart: { result: null, error: { description: "Not Found" } } }, 404),
    (api) => api.open("NOPE").pipe(Effect.flatMap((handle) => handle.snapshot)),
  );
  const result = await run();

  expect(Either.isLeft(result) && result.left).toEqual(
    expect.objectContaining({ _tag: "HttpError", status: 404 }),
  );
});
