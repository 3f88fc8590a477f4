import { FileSystem } from "@effect/platform";
import { Effect, FastCheck } from "effect";
import { expect, test } from "vitest";
import {
  FALLBACK_TICKERS,
  loadTickersFromFile,
  parseTickers,
  resolveDefaultTickers,
  selectTickers,
  type TickerSettings,
} from "./tickers.ts";

// --- Helpers ---

function withFiles(files: Record<string, string>) {
  const missing = FileSystem.makeNoop({});
  return FileSystem.layerNoop({
    readFileString: (path, encoding) => {
      const content = files[path];
      return content !== undefined
        ? Effect.succeed(content)
        : missing.readFileString(path, encoding);
    },
  });
}

function run<A>(
  effect: Effect.Effect<A, never, FileSystem.FileSystem>,
  files: Record<string, string> = {},
): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(withFiles(files))));
}

const settings: TickerSettings = {
  override: "",
  file: "tickers.txt",
  preset: "watchlist",
};

// --- parseTickers ---

test("parseTickers: de-duplicates case-insensitively, first occurrence wins", () => {
  expect(parseTickers("vrt, VRT, COHR\nvrt")).toEqual(["VRT", "COHR"]);
});

test("parseTickers: strips inline comments", () => {
  expect(parseTickers("AAPL # my favorite\nMSFT")).toEqual(["AAPL", "MSFT"]);
});

test("parseTickers: skips blank and full-line comment lines", () => {
  expect(parseTickers("# watchlist\n\n  \nfcx\n   # later\nccj")).toEqual([
    "FCX",
    "CCJ",
  ]);
});

test("parseTickers: mixes commas and newlines", () => {
  expect(parseTickers("a,b\r\nc, ,d,\n,e")).toEqual(["A", "B", "C", "D", "E"]);
});

test("parseTickers: malformed input yields no tickers", () => {
  expect(parseTickers("")).toEqual([]);
  expect(parseTickers(",,,\n#,AAPL\n , ")).toEqual([]);
});

// Strings built from the characters the parser cares about, mixed with
// arbitrary ones.
const rawTickerText = FastCheck.oneof(
  FastCheck.string(),
  FastCheck.array(
    FastCheck.constantFrom("a", "B", "x", "1", ".", " ", ",", "#", "\n", "\r\n", "\t"),
  ).map((parts) => parts.join("")),
);

test("parseTickers: parsing the joined result gives it back", () => {
  FastCheck.assert(
    FastCheck.property(rawTickerText, (raw) => {
      const once = parseTickers(raw);
      expect(parseTickers(once.join(","))).toEqual(once);
      expect(parseTickers(once.join("\n"))).toEqual(once);
    }),
  );
});

// --- Fallback lists ---

test("FALLBACK_TICKERS: presets keep their exact order", () => {
  expect(FALLBACK_TICKERS.watchlist.join(",")).toBe(
    "VRT,COHR,RRX,MBLY,MOD,GDX,TER,FN,CCJ,XYL,HMY,FCX,IEX",
  );
  expect(FALLBACK_TICKERS.daily.join(",")).toBe(
    "VRT,COHR,RRX,MBLY,MOD,GDX,TER,FN,CCJ,XYL,HMY,SFFLY",
  );
});

// --- File and defaults ---

test("loadTickersFromFile: parses the file", async () => {
  const tickers = await run(loadTickersFromFile("tickers.txt"), {
    "tickers.txt": "# mine\nxyl\nhmy, xyl\n",
  });
  expect(tickers).toEqual(["XYL", "HMY"]);
});

test("loadTickersFromFile: missing file reads as empty", async () => {
  expect(await run(loadTickersFromFile("nope.txt"))).toEqual([]);
});

test("resolveDefaultTickers: file wins when it names tickers", async () => {
  const tickers = await run(resolveDefaultTickers(settings), {
    "tickers.txt": "CCJ\nFCX",
  });
  expect(tickers).toEqual(["CCJ", "FCX"]);
});

test("resolveDefaultTickers: empty file falls back to the preset", async () => {
  const tickers = await run(resolveDefaultTickers(settings), {
    "tickers.txt": "# nothing yet\n",
  });
  expect(tickers).toEqual([...FALLBACK_TICKERS.watchlist]);
});

test("resolveDefaultTickers: missing file falls back to the chosen preset", async () => {
  const tickers = await run(
    resolveDefaultTickers({ ...settings, preset: "daily" }),
  );
  expect(tickers).toEqual([...FALLBACK_TICKERS.daily]);
});

// --- selectTickers ---

test("selectTickers: explicit list beats TICKERS and the file", async () => {
  const tickers = await run(
    selectTickers({ ...settings, override: "IEX" }, "mod,ter"),
    { "tickers.txt": "CCJ" },
  );
  expect(tickers).toEqual(["MOD", "TER"]);
});

test("selectTickers: TICKERS override beats the file", async () => {
  const tickers = await run(selectTickers({ ...settings, override: "iex\nfcx" }), {
    "tickers.txt": "CCJ",
  });
  expect(tickers).toEqual(["IEX", "FCX"]);
});

test("selectTickers: blank override falls through to the defaults", async () => {
  const tickers = await run(selectTickers({ ...settings, override: "  " }, ""), {
    "tickers.txt": "CCJ",
  });
  expect(tickers).toEqual(["CCJ"]);
});
