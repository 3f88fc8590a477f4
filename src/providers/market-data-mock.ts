// MarketDataTest — mock implementation of MarketData for testing and development.

import { Effect, Layer } from "effect";
import type { DailyClose, Snapshot, Ticker } from "../domain.ts";
import {
  InvalidSymbol,
  MarketData,
  SymbolNotFound,
  type TickerHandle,
} from "../market-data.ts";

// --- Sample data ---

interface SampleListing {
  readonly snapshot: Snapshot;
  readonly closes: ReadonlyArray<DailyClose>;
}

const day = (iso: string) => Date.parse(`${iso}T21:00:00Z`);

const listings: Record<string, SampleListing> = {
  VRT: {
    snapshot: { lastPrice: 182.47, currency: "USD" },
    closes: [
      { timestamp: day("2025-06-12"), close: 179.1 },
      { timestamp: day("2025-06-13"), close: 182.47 },
    ],
  },
  CCJ: {
    snapshot: { lastPrice: 114.82, currency: "USD" },
    closes: [{ timestamp: day("2025-06-13"), close: 114.82 }],
  },
  // Thinly traded ADR: no snapshot price, history only.
  SFFLY: {
    snapshot: { currency: "USD" },
    closes: [
      { timestamp: day("2025-06-11"), close: 6.12 },
      { timestamp: day("2025-06-12"), close: 6.3 },
      { timestamp: day("2025-06-13") },
    ],
  },
};

// --- Mock layer ---

export const MarketDataTestLive = Layer.succeed(
  MarketData,
  MarketData.of({
    open: (symbol: Ticker) => {
      if (symbol.includes(" ")) {
        return Effect.fail(new InvalidSymbol({ symbol }));
      }
      const listing = listings[symbol];
      const handle: TickerHandle = {
        symbol,
        snapshot: listing !== undefined
          ? Effect.succeed(listing.snapshot)
          : Effect.fail(new SymbolNotFound({ symbol })),
        dailyCloses: () =>
          listing !== undefined
            ? Effect.succeed(listing.closes)
            : Effect.fail(new SymbolNotFound({ symbol })),
      };
      return Effect.succeed(handle);
    },
  }),
);
