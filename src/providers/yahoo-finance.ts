// Yahoo Finance — implementation of MarketData over the chart endpoint.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Predicate, Schema } from "effect";
import type { DailyClose, Snapshot, Ticker } from "../domain.ts";
import {
  HttpError,
  InvalidSymbol,
  MarketData,
  NetworkError,
  ParseError,
  SymbolNotFound,
  type TickerHandle,
} from "../market-data.ts";

// --- Yahoo response schema ---

// `meta` varies by listing, so it stays an open record and fields are
// probed one by one.
const YahooChartResult = Schema.Struct({
  meta: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({
      quote: Schema.optional(
        Schema.Array(
          Schema.Struct({
            close: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
          }),
        ),
      ),
    }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooChartResult)),
    error: Schema.optional(
      Schema.NullOr(
        Schema.Struct({
          description: Schema.optional(Schema.String),
        }),
      ),
    ),
  }),
});

type YahooChartResultType = typeof YahooChartResult.Type;

const SYMBOL_PATTERN = /^[A-Z0-9.\-^=]+$/;

// --- Decoding ---

function decodeChart(
  json: unknown,
  symbol: string,
): Effect.Effect<YahooChartResultType, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ chart }) => {
      if (chart.error !== undefined && chart.error !== null) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      if (chart.result === null || chart.result.length === 0) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      return Effect.succeed(chart.result[0]);
    }),
  );
}

export function decodeSnapshot(
  json: unknown,
  symbol: string,
): Effect.Effect<Snapshot, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.map(({ meta }) => {
      const price = meta["regularMarketPrice"];
      const currency = meta["currency"];
      return {
        ...(Predicate.isNumber(price) ? { lastPrice: price } : {}),
        ...(Predicate.isString(currency) && currency.length > 0
          ? { currency }
          : {}),
      };
    }),
  );
}

/** Daily bars in chronological order; a missing close stays missing. */
export function decodeDailyCloses(
  json: unknown,
  symbol: string,
): Effect.Effect<ReadonlyArray<DailyClose>, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.map((result) => {
      const timestamps = result.timestamp ?? [];
      const closes = result.indicators?.quote?.[0]?.close ?? [];
      return timestamps
        .map((seconds, i): DailyClose => {
          const close = closes[i];
          return close === null || close === undefined
            ? { timestamp: seconds * 1000 }
            : { timestamp: seconds * 1000, close };
        })
        .sort((a, b) => a.timestamp - b.timestamp);
    }),
  );
}

// --- Yahoo Finance layer ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  const fetchChart = (symbol: Ticker, range: string) =>
    Effect.gen(function* () {
      const response = yield* client.get(
        `${baseUrl}/${encodeURIComponent(symbol)}`,
        { urlParams: { range, interval: "1d", includePrePost: "false" } },
      );
      return yield* response.json;
    }).pipe(
      Effect.scoped,
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? Effect.fail(new HttpError({ status: e.response.status }))
            : Effect.fail(
                new ParseError({
                  message: `JSON parse failed: ${e.message}`,
                }),
              ),
      }),
    );

  const handle = (symbol: Ticker): TickerHandle => ({
    symbol,
    snapshot: fetchChart(symbol, "1d").pipe(
      Effect.flatMap((json) => decodeSnapshot(json, symbol)),
    ),
    dailyCloses: (days) =>
      fetchChart(symbol, `${days}d`).pipe(
        Effect.flatMap((json) => decodeDailyCloses(json, symbol)),
      ),
  });

  return MarketData.of({
    open: (symbol: Ticker) =>
      SYMBOL_PATTERN.test(symbol)
        ? Effect.succeed(handle(symbol))
        : Effect.fail(new InvalidSymbol({ symbol })),
  });
});

export const YahooFinanceLive = Layer.effect(MarketData, makeYahooFinanceApi);
