// Pure domain types — no framework dependency, no I/O.

/** Normalized stock symbol: trimmed, upper-cased, non-empty. */
export type Ticker = string;

export type PriceStatus = "ok" | "empty_ticker" | "no_data" | `error:${string}`;

export interface PriceResult {
  readonly ticker: Ticker;
  readonly price?: number;
  readonly currency?: string;
  readonly status: PriceStatus;
}

export interface Holding {
  readonly ticker: Ticker;
  readonly avgCost: number; // per share
  readonly shares?: number;
}

export type Portfolio = ReadonlyMap<Ticker, Holding>;

// --- Market data shapes ---

/** Lightweight current quote. Providers omit fields freely. */
export interface Snapshot {
  readonly lastPrice?: number;
  readonly currency?: string;
}

export interface DailyClose {
  readonly timestamp: number; // epoch ms
  readonly close?: number;
}

// --- Presentation ---

export interface TableRow {
  readonly ticker: Ticker;
  readonly price?: number;
  readonly currency?: string;
  readonly status: PriceStatus;
}

export type ReportStyle = "detailed" | "terse";

export interface DeliveryOutcome {
  readonly channel: string;
  readonly delivered: boolean;
  readonly detail: string;
}
