// Ticker lists — parsing, file loading and the built-in fallbacks.

import { FileSystem } from "@effect/platform";
import { Cause, Console, Effect } from "effect";
import type { Ticker } from "./domain.ts";

// --- Fallback lists ---
// Each deployment picks one; the lists differ on purpose.

export const FALLBACK_TICKERS = {
  watchlist: [
    "VRT", "COHR", "RRX", "MBLY", "MOD", "GDX", "TER",
    "FN", "CCJ", "XYL", "HMY", "FCX", "IEX",
  ],
  daily: [
    "VRT", "COHR", "RRX", "MBLY", "MOD", "GDX", "TER",
    "FN", "CCJ", "XYL", "HMY", "SFFLY",
  ],
} as const satisfies Record<string, ReadonlyArray<Ticker>>;

export type TickerPreset = keyof typeof FALLBACK_TICKERS;

export interface TickerSettings {
  /** Raw override string; blank means "not set". */
  readonly override: string;
  readonly file: string;
  readonly preset: TickerPreset;
}

// --- Parsing ---

/** Comma- and/or newline-separated tickers, `#` comments allowed.
 *  Upper-cased, de-duplicated, first occurrence wins. Never fails. */
export function parseTickers(raw: string): Ticker[] {
  const seen = new Set<Ticker>();
  const out: Ticker[] = [];

  for (const rawLine of raw.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) continue;

    const hash = line.indexOf("#");
    if (hash !== -1) line = line.slice(0, hash).trim();

    for (const part of line.split(",")) {
      const ticker = part.trim().toUpperCase();
      if (ticker.length === 0 || seen.has(ticker)) continue;
      seen.add(ticker);
      out.push(ticker);
    }
  }

  return out;
}

// --- Sources ---

/** Parsed contents of a ticker file; any read failure yields an empty list. */
export function loadTickersFromFile(
  path: string,
): Effect.Effect<Ticker[], never, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs.readFileString(path, "utf-8");
    return parseTickers(text);
  }).pipe(
    Effect.catchAllCause((cause) =>
      Console.debug(
        `[tickers] ${path} not used: ${Cause.pretty(cause).split("\n")[0]}`,
      ).pipe(Effect.as<Ticker[]>([])),
    ),
  );
}

export function resolveDefaultTickers(
  settings: TickerSettings,
): Effect.Effect<Ticker[], never, FileSystem.FileSystem> {
  return loadTickersFromFile(settings.file).pipe(
    Effect.map((fromFile) =>
      fromFile.length > 0 ? fromFile : [...FALLBACK_TICKERS[settings.preset]],
    ),
  );
}

/** Explicit list (flag, then TICKERS) if it names anything, else the defaults. */
export function selectTickers(
  settings: TickerSettings,
  explicit?: string,
): Effect.Effect<Ticker[], never, FileSystem.FileSystem> {
  for (const candidate of [explicit, settings.override]) {
    if (candidate === undefined) continue;
    const parsed = parseTickers(candidate);
    if (parsed.length > 0) return Effect.succeed(parsed);
  }
  return resolveDefaultTickers(settings);
}
