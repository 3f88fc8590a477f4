// Price resolution — snapshot first, daily history as fallback.
//
// Every fault below the per-ticker boundary ends up as a PriceResult status;
// nothing escapes resolveTicker on the error channel.

import { Cause, Console, Duration, Effect, Predicate } from "effect";
import type { DailyClose, PriceResult, Ticker } from "./domain.ts";
import {
  MarketData,
  NetworkError,
  type MarketDataError,
  type TickerHandle,
} from "./market-data.ts";

// --- Tier results ---

export type Found = {
  readonly _tag: "Found";
  readonly price: number;
  readonly currency?: string;
};
export type NotFound = { readonly _tag: "NotFound"; readonly currency?: string };

export type TierResult = Found | NotFound;

export const Found = (price: number, currency?: string): Found =>
  currency === undefined
    ? { _tag: "Found", price }
    : { _tag: "Found", price, currency };

export const NotFound = (currency?: string): NotFound =>
  currency === undefined ? { _tag: "NotFound" } : { _tag: "NotFound", currency };

export interface Tier {
  readonly name: string;
  readonly lookup: Effect.Effect<TierResult>;
}

/** Trailing window for the history fallback, in calendar days. */
export const HISTORY_DAYS = 5;

export interface ResolveOptions {
  readonly timeout: Duration.DurationInput;
}

// --- Helpers ---

export function isUsablePrice(value: unknown): value is number {
  return Predicate.isNumber(value) && Number.isFinite(value);
}

export function lastClose(bars: ReadonlyArray<DailyClose>): number | undefined {
  for (let i = bars.length - 1; i >= 0; i--) {
    const close = bars[i].close;
    if (isUsablePrice(close)) return close;
  }
  return undefined;
}

/** Category name of whatever ended a lookup: an error tag or a class name. */
export function faultKind(cause: Cause.Cause<unknown>): string {
  const fault = Cause.squash(cause);
  if (Predicate.hasProperty(fault, "_tag") && Predicate.isString(fault._tag)) {
    return fault._tag;
  }
  if (fault instanceof Error) return fault.constructor.name;
  return "Unknown";
}

/** Wrap a lookup so that timeouts, failures and defects all read as NotFound. */
export function tier(
  name: string,
  symbol: Ticker,
  lookup: Effect.Effect<TierResult, MarketDataError>,
  options: ResolveOptions,
): Tier {
  return {
    name,
    lookup: lookup.pipe(
      Effect.timeoutFail({
        duration: options.timeout,
        onTimeout: () =>
          new NetworkError({ message: `${name}: request timed out` }),
      }),
      Effect.catchAllCause((cause) =>
        Console.debug(
          `[resolver] ${symbol}: ${name} failed (${faultKind(cause)})`,
        ).pipe(Effect.as(NotFound())),
      ),
    ),
  };
}

// --- Tier composition ---

/** Run tiers in order; the first Found wins. A currency learned by an
 *  earlier tier carries over to a later Found that has none. */
export function firstFound(
  tiers: ReadonlyArray<Tier>,
  symbol: Ticker,
): Effect.Effect<TierResult> {
  const loop = (
    index: number,
    currency: string | undefined,
  ): Effect.Effect<TierResult> => {
    if (index >= tiers.length) return Effect.succeed(NotFound(currency));

    const { name, lookup } = tiers[index];

    return Console.debug(`[resolver] ${symbol}: trying ${name}...`).pipe(
      Effect.zipRight(lookup),
      Effect.flatMap((result) =>
        result._tag === "Found"
          ? Effect.succeed(Found(result.price, result.currency ?? currency))
          : loop(index + 1, currency ?? result.currency),
      ),
    );
  };

  return loop(0, undefined);
}

export function priceTiers(
  handle: TickerHandle,
  options: ResolveOptions,
): ReadonlyArray<Tier> {
  return [
    tier(
      "snapshot",
      handle.symbol,
      handle.snapshot.pipe(
        Effect.map((snapshot) =>
          isUsablePrice(snapshot.lastPrice)
            ? Found(snapshot.lastPrice, snapshot.currency)
            : NotFound(snapshot.currency),
        ),
      ),
      options,
    ),
    tier(
      "history",
      handle.symbol,
      handle.dailyCloses(HISTORY_DAYS).pipe(
        Effect.map((bars) => {
          const close = lastClose(bars);
          return close === undefined ? NotFound() : Found(close);
        }),
      ),
      options,
    ),
  ];
}

// --- Resolution ---

function toPriceResult(ticker: Ticker, result: TierResult): PriceResult {
  const currency =
    result.currency !== undefined ? { currency: result.currency } : {};
  return result._tag === "Found"
    ? { ticker, price: result.price, ...currency, status: "ok" }
    : { ticker, ...currency, status: "no_data" };
}

export function resolveTicker(
  raw: string,
  options: ResolveOptions,
): Effect.Effect<PriceResult, never, MarketData> {
  const symbol = raw.trim().toUpperCase();
  if (symbol.length === 0) {
    const empty: PriceResult = { ticker: raw, status: "empty_ticker" };
    return Effect.succeed(empty);
  }

  return Effect.gen(function* () {
    const api = yield* MarketData;
    const handle = yield* api.open(symbol);
    const result = yield* firstFound(priceTiers(handle, options), symbol);
    return toPriceResult(symbol, result);
  }).pipe(
    Effect.catchAllCause((cause) => {
      const kind = faultKind(cause);
      return Console.debug(`[resolver] ${symbol}: ${kind}`).pipe(
        Effect.as<PriceResult>({ ticker: symbol, status: `error:${kind}` }),
      );
    }),
  );
}

export interface ResolveAllOptions extends ResolveOptions {
  readonly concurrency: number;
}

/** Resolve every ticker; results come back in input order. */
export function resolveAll(
  tickers: ReadonlyArray<string>,
  options: ResolveAllOptions,
): Effect.Effect<ReadonlyArray<PriceResult>, never, MarketData> {
  return Effect.forEach(tickers, (ticker) => resolveTicker(ticker, options), {
    concurrency: options.concurrency,
  });
}
