// Portfolio — average cost per holding, used for P/L annotations.
//
// File format:
//   { "VRT": { "avgCost": 175.98 }, "IEX": { "avgCost": 194.96, "shares": 3 } }

import { FileSystem } from "@effect/platform";
import { Console, Effect, Schema } from "effect";
import type { Holding, Portfolio, Ticker } from "./domain.ts";
import { ConfigurationError } from "./config.ts";

const HoldingEntry = Schema.Struct({
  avgCost: Schema.Number,
  shares: Schema.optional(Schema.Number),
});

const PortfolioFile = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: HoldingEntry }),
);

export const emptyPortfolio: Portfolio = new Map();

export function decodePortfolio(
  text: string,
): Effect.Effect<Portfolio, ConfigurationError> {
  return Schema.decodeUnknown(PortfolioFile)(text).pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `Invalid portfolio: ${e.message}` }),
    ),
    Effect.map((entries) => {
      const holdings = new Map<Ticker, Holding>();
      for (const [key, entry] of Object.entries(entries)) {
        const ticker = key.trim().toUpperCase();
        if (ticker.length === 0) continue;
        holdings.set(
          ticker,
          entry.shares === undefined
            ? { ticker, avgCost: entry.avgCost }
            : { ticker, avgCost: entry.avgCost, shares: entry.shares },
        );
      }
      return holdings;
    }),
  );
}

/** A missing file is an empty portfolio; an unreadable or malformed one is fatal. */
export function loadPortfolio(
  path: string,
): Effect.Effect<Portfolio, ConfigurationError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) {
      yield* Console.debug(`[portfolio] ${path} not found, no P/L annotations`);
      return emptyPortfolio;
    }
    const text = yield* fs.readFileString(path, "utf-8");
    const holdings = yield* decodePortfolio(text);
    yield* Console.debug(`[portfolio] ${holdings.size} holdings from ${path}`);
    return holdings;
  }).pipe(
    Effect.catchTags({
      SystemError: (e) =>
        Effect.fail(new ConfigurationError({ message: `${path}: ${e.message}` })),
      BadArgument: (e) =>
        Effect.fail(new ConfigurationError({ message: `${path}: ${e.message}` })),
    }),
  );
}
