// Market data — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { DailyClose, Snapshot, Ticker } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class InvalidSymbol extends Data.TaggedError("InvalidSymbol")<{
  readonly symbol: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | InvalidSymbol;

// --- Service ---

/** Lookups bound to one symbol, obtained from `MarketData.open`. */
export interface TickerHandle {
  readonly symbol: Ticker;
  readonly snapshot: Effect.Effect<Snapshot, MarketDataError>;
  /** Daily bars covering the trailing `days` calendar days. */
  readonly dailyCloses: (
    days: number,
  ) => Effect.Effect<ReadonlyArray<DailyClose>, MarketDataError>;
}

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    readonly open: (
      symbol: Ticker,
    ) => Effect.Effect<TickerHandle, MarketDataError>;
  }
>() {}
