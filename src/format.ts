// Pure formatting functions — no I/O.

import type {
  DeliveryOutcome,
  Holding,
  Portfolio,
  PriceResult,
  PriceStatus,
  ReportStyle,
  TableRow,
} from "./domain.ts";
import type { ConfigurationError } from "./config.ts";
import type { TransportError } from "./delivery/errors.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export const REPORT_TITLE = "Daily Stock Update";

// --- Numbers and time ---

/** `YYYY-MM-DD HH:MM UTC` */
export function formatTimestamp(epochMs: number): string {
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

export function roundPrice(price: number): number {
  return Math.round(price * 10_000) / 10_000;
}

export function formatPnl(price: number, holding: Holding): string | undefined {
  if (!(holding.avgCost > 0)) return undefined;
  const percent = ((price - holding.avgCost) / holding.avgCost) * 100;
  const sign = percent >= 0 ? "+" : "-";
  return `(P/L ${sign}${Math.abs(percent).toFixed(2)}%)`;
}

export function describeStatus(status: PriceStatus): string {
  switch (status) {
    case "ok":
      return "ok";
    case "empty_ticker":
      return "empty ticker";
    case "no_data":
      return "invalid ticker or no data";
    default:
      return `error: ${status.slice("error:".length)}`;
  }
}

// --- Report ---

export interface RenderOptions {
  readonly holdings?: Portfolio;
  readonly style?: ReportStyle;
}

export function formatLine(result: PriceResult, options: RenderOptions = {}): string {
  const { ticker, price } = result;
  if (result.status !== "ok" || price === undefined) {
    return options.style === "terse"
      ? `${ticker}: Error`
      : `${ticker}: N/A (${describeStatus(result.status)})`;
  }

  const line = `${ticker}: $${price.toFixed(2)}`;
  const holding = options.holdings?.get(ticker);
  const pnl = holding !== undefined ? formatPnl(price, holding) : undefined;
  return pnl !== undefined ? `${line}  ${pnl}` : line;
}

export function renderCopyBlock(
  results: ReadonlyArray<PriceResult>,
  options: RenderOptions = {},
): string {
  return results.map((result) => formatLine(result, options)).join("\n");
}

export function renderReport(
  results: ReadonlyArray<PriceResult>,
  options: RenderOptions & { readonly now: number },
): string {
  return [
    `${REPORT_TITLE} (${formatTimestamp(options.now)})`,
    "",
    ...results.map((result) => formatLine(result, options)),
  ].join("\n");
}

// --- Table ---

export function renderTable(results: ReadonlyArray<PriceResult>): TableRow[] {
  return results.map((result) => ({
    ticker: result.ticker,
    ...(result.price !== undefined ? { price: roundPrice(result.price) } : {}),
    ...(result.currency !== undefined ? { currency: result.currency } : {}),
    status: result.status,
  }));
}

/** Plain-text columns; no ANSI codes so the output can be pasted as-is. */
export function formatTable(rows: ReadonlyArray<TableRow>): string {
  const header = ["ticker", "price", "currency", "status"];
  const cells = rows.map((row) => [
    row.ticker,
    row.price !== undefined ? String(row.price) : "",
    row.currency ?? "",
    row.status,
  ]);
  const widths = header.map((title, col) =>
    Math.max(title.length, ...cells.map((line) => line[col].length)),
  );
  return [header, ...cells]
    .map((line) =>
      line.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd(),
    )
    .join("\n");
}

// --- Delivery outcome ---

export function formatOutcome(outcome: DeliveryOutcome): string {
  return outcome.delivered
    ? `${GREEN}✓ ${outcome.channel}${RESET} ${DIM}${outcome.detail}${RESET}`
    : `${RED}✗ ${outcome.channel}${RESET} ${DIM}${outcome.detail}${RESET}`;
}

// --- Error formatting ---

export function formatError(error: ConfigurationError | TransportError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(
  error: ConfigurationError | TransportError,
): ClassifiedError {
  switch (error._tag) {
    case "ConfigurationError":
      return {
        title: "Configuration error",
        hint: error.message,
      };
    case "TransportError":
      return {
        title: `Delivery failed (${error.channel})`,
        hint: error.message,
      };
  }
}
