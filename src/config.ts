// Configuration — read from the environment once per run.

import { Config, Data, Duration, Effect, Option, Redacted } from "effect";
import type { ReportStyle } from "./domain.ts";
import type { ResolveAllOptions } from "./price-resolver.ts";
import type { TickerPreset, TickerSettings } from "./tickers.ts";

// --- Error ---

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
}> {}

/** Read a config, turning a missing or invalid setting into a fatal error. */
export function loadConfig<A>(
  config: Config.Config<A>,
): Effect.Effect<A, ConfigurationError> {
  return config.pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `Invalid configuration: ${e}` }),
    ),
  );
}

// --- Run settings ---

export interface RunSettings {
  readonly tickers: TickerSettings;
  readonly portfolioFile: string;
  readonly resolve: ResolveAllOptions;
  readonly style: ReportStyle;
}

export interface RunDefaults {
  readonly preset: TickerPreset;
  readonly style: ReportStyle;
}

const reportStyle = Config.literal("detailed", "terse");

export function runSettings(defaults: RunDefaults): Config.Config<RunSettings> {
  return Config.all({
    tickers: Config.all({
      override: Config.string("TICKERS").pipe(Config.withDefault("")),
      file: Config.string("TICKERS_FILE").pipe(Config.withDefault("tickers.txt")),
      preset: Config.literal("watchlist", "daily")("TICKER_PRESET").pipe(
        Config.withDefault(defaults.preset),
      ),
    }),
    portfolioFile: Config.string("PORTFOLIO_FILE").pipe(
      Config.withDefault("portfolio.json"),
    ),
    resolve: Config.all({
      timeout: Config.duration("MARKET_DATA_TIMEOUT").pipe(
        Config.withDefault(Duration.seconds(10)),
      ),
      concurrency: Config.integer("RESOLVE_CONCURRENCY").pipe(
        Config.withDefault(4),
        Config.validate({
          message: "RESOLVE_CONCURRENCY must be at least 1",
          validation: (n: number) => n >= 1,
        }),
      ),
    }),
    style: reportStyle("REPORT_STYLE").pipe(Config.withDefault(defaults.style)),
  });
}

// --- Email ---

export interface EmailSettings {
  readonly user: string;
  readonly password: Redacted.Redacted<string>;
  readonly server: string;
  readonly port: number;
  readonly timeout: Duration.Duration;
}

const deliveryTimeout = Config.duration("DELIVERY_TIMEOUT").pipe(
  Config.withDefault(Duration.seconds(12)),
);

export const emailSettings: Config.Config<EmailSettings> = Config.all({
  user: Config.nonEmptyString("EMAIL_USER"),
  password: Config.nonEmptyString("EMAIL_PASSWORD").pipe(
    Config.map((value) => Redacted.make(value)),
  ),
  server: Config.string("SMTP_SERVER").pipe(Config.withDefault("smtp.gmail.com")),
  port: Config.integer("SMTP_PORT").pipe(Config.withDefault(465)),
  timeout: deliveryTimeout,
});

// --- Push ---

export type ClickMode = "paste" | "html" | "none";

export interface PushSettings {
  readonly server: string;
  readonly topic: string;
  readonly token: Option.Option<Redacted.Redacted<string>>;
  readonly priority: string;
  readonly tags: string;
  readonly click: ClickMode;
  readonly pasteUrl: string;
  readonly timeout: Duration.Duration;
}

export const pushSettings: Config.Config<PushSettings> = Config.all({
  server: Config.string("NTFY_SERVER").pipe(Config.withDefault("https://ntfy.sh")),
  topic: Config.nonEmptyString("NTFY_TOPIC"),
  token: Config.option(
    Config.nonEmptyString("NTFY_TOKEN").pipe(
      Config.map((value) => Redacted.make(value)),
    ),
  ),
  priority: Config.string("NTFY_PRIORITY").pipe(Config.withDefault("default")),
  tags: Config.string("NTFY_TAGS").pipe(
    Config.withDefault("chart_with_upwards_trend"),
  ),
  click: Config.literal("paste", "html", "none")("PUSH_CLICK").pipe(
    Config.withDefault<ClickMode>("paste"),
  ),
  pasteUrl: Config.string("PASTE_URL").pipe(Config.withDefault("https://paste.rs")),
  timeout: deliveryTimeout,
});
