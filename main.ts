#!/usr/bin/env -S npx tsx
import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Clock, Config, Console, Effect, Layer, Option } from "effect";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import {
  type ConfigurationError,
  type RunDefaults,
  type RunSettings,
  emailSettings,
  loadConfig,
  pushSettings,
  runSettings,
} from "./src/config.ts";
import { resolveAll } from "./src/price-resolver.ts";
import { loadPortfolio } from "./src/portfolio.ts";
import { parseTickers, resolveDefaultTickers, selectTickers } from "./src/tickers.ts";
import {
  formatError,
  formatOutcome,
  formatTable,
  formatTimestamp,
  renderCopyBlock,
  renderReport,
  renderTable,
} from "./src/format.ts";
import { SmtpMailerLive, emailReport } from "./src/delivery/email.ts";
import { pushReport } from "./src/delivery/push.ts";

// --- Pipeline ---

const tickers = Options.text("tickers").pipe(
  Options.withDescription(
    "Comma and/or newline separated tickers (overrides TICKERS and the tickers file)",
  ),
  Options.optional,
);

const buildReport = (settings: RunSettings, explicit: Option.Option<string>) =>
  Effect.gen(function* () {
    const symbols = yield* selectTickers(
      settings.tickers,
      Option.getOrUndefined(explicit),
    );
    yield* Console.debug(`[run] resolving ${symbols.length} tickers`);
    const holdings = yield* loadPortfolio(settings.portfolioFile);
    const results = yield* resolveAll(symbols, settings.resolve);
    const now = yield* Clock.currentTimeMillis;
    return renderReport(results, { now, holdings, style: settings.style });
  });

const settingsFor = (defaults: RunDefaults) => loadConfig(runSettings(defaults));

// --- Commands ---

const print = Command.make("print", { tickers }, ({ tickers }) =>
  Effect.gen(function* () {
    const settings = yield* settingsFor({ preset: "daily", style: "detailed" });
    yield* Console.log(yield* buildReport(settings, tickers));
  }),
).pipe(Command.withDescription("Print the report to stdout"));

const email = Command.make("email", { tickers }, ({ tickers }) =>
  Effect.gen(function* () {
    const delivery = yield* loadConfig(emailSettings);
    const settings = yield* settingsFor({ preset: "daily", style: "detailed" });
    const report = yield* buildReport(settings, tickers);
    const outcome = yield* emailReport(report, delivery).pipe(
      Effect.provide(SmtpMailerLive(delivery)),
    );
    yield* Console.log(formatOutcome(outcome));
  }),
).pipe(Command.withDescription("Email the report to EMAIL_USER"));

const push = Command.make("push", { tickers }, ({ tickers }) =>
  Effect.gen(function* () {
    const delivery = yield* loadConfig(pushSettings);
    const settings = yield* settingsFor({ preset: "watchlist", style: "terse" });
    const report = yield* buildReport(settings, tickers);
    const outcome = yield* pushReport(report, delivery);
    yield* Console.log(formatOutcome(outcome));
  }),
).pipe(Command.withDescription("Send the report as a push notification"));

const view = Command.make("view", {}, () =>
  Effect.gen(function* () {
    const settings = yield* settingsFor({ preset: "watchlist", style: "detailed" });
    const defaults = yield* resolveDefaultTickers(settings.tickers);
    const raw = yield* Prompt.text({
      message: "Stock tickers (comma and/or newline separated)",
      default: defaults.join(", "),
    });
    const symbols = parseTickers(raw);
    yield* Console.log(`Tickers parsed: ${symbols.length}`);
    if (symbols.length === 0) {
      return yield* Console.log("Please enter at least one ticker.");
    }

    const holdings = yield* loadPortfolio(settings.portfolioFile);
    const results = yield* resolveAll(symbols, settings.resolve);
    const now = yield* Clock.currentTimeMillis;

    yield* Console.log(`\nResults (${formatTimestamp(now)})\n`);
    yield* Console.log(formatTable(renderTable(results)));

    const copy = yield* Prompt.confirm({
      message: "Show copy-friendly output?",
      initial: true,
    });
    if (copy) {
      yield* Console.log(
        `\n${renderCopyBlock(results, { holdings, style: settings.style })}`,
      );
    }
  }),
).pipe(Command.withDescription("Interactive price table"));

const command = Command.make("stock-digest").pipe(
  Command.withSubcommands([print, email, push, view]),
);

// --- Layers ---
// Set STOCK_PROVIDER to "yahoo" (default) or "test".

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("STOCK_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    switch (provider) {
      case "test":
        return MarketDataTestLive;
      default:
        return YahooFinanceLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "stock-digest",
  version: "0.1.0",
});

const fatal = (e: ConfigurationError) =>
  Console.error(formatError(e)).pipe(
    Effect.zipRight(
      Effect.sync(() => {
        process.exitCode = 1;
      }),
    ),
  );

cli(process.argv).pipe(
  Effect.catchTags({
    ConfigurationError: fatal,
  }),
  Effect.provide(MarketDataLive),
  Effect.provide(FetchHttpClient.layer),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
