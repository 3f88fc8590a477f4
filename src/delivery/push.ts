// Push notifications — one POST per run to an ntfy topic.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Console, Effect, Option, Redacted } from "effect";
import type { DeliveryOutcome } from "../domain.ts";
import type { PushSettings } from "../config.ts";
import { REPORT_TITLE, formatError } from "../format.ts";
import { TransportError } from "./errors.ts";
import { createPaste } from "./paste.ts";
import { reportDataUri } from "./html-page.ts";

/** HTTP header values must stay printable ASCII. */
export function asciiHeader(value: string): string {
  return value.replace(/[^\x20-\x7E]/g, "").trim();
}

export function clickTarget(
  report: string,
  settings: PushSettings,
): Effect.Effect<Option.Option<string>, never, HttpClient.HttpClient> {
  switch (settings.click) {
    case "none":
      return Effect.succeed(Option.none());
    case "html":
      return Effect.succeed(Option.some(reportDataUri(report)));
    case "paste":
      return createPaste(report, {
        url: settings.pasteUrl,
        timeout: settings.timeout,
      });
  }
}

export function pushHeaders(
  settings: PushSettings,
  click: Option.Option<string>,
): Record<string, string> {
  const headers: Record<string, string> = {
    Title: asciiHeader(REPORT_TITLE),
    Priority: asciiHeader(settings.priority),
    Tags: asciiHeader(settings.tags),
  };
  if (Option.isSome(click)) headers["Click"] = asciiHeader(click.value);
  if (Option.isSome(settings.token)) {
    headers["Authorization"] = `Bearer ${asciiHeader(Redacted.value(settings.token.value))}`;
  }
  return headers;
}

export function pushReport(
  report: string,
  settings: PushSettings,
): Effect.Effect<DeliveryOutcome, never, HttpClient.HttpClient> {
  const url = `${settings.server.replace(/\/+$/, "")}/${encodeURIComponent(settings.topic)}`;

  return Effect.gen(function* () {
    const click = yield* clickTarget(report, settings);
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);

    yield* Console.debug(
      `[push] POST ${url}${Option.isSome(click) ? " with click-through" : ""}`,
    );
    yield* client
      .execute(
        HttpClientRequest.post(url).pipe(
          HttpClientRequest.setHeaders(pushHeaders(settings, click)),
          HttpClientRequest.bodyText(report, "text/plain; charset=utf-8"),
        ),
      )
      .pipe(
        Effect.scoped,
        Effect.timeoutFail({
          duration: settings.timeout,
          onTimeout: () =>
            new TransportError({ channel: "push", message: "request timed out" }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new TransportError({ channel: "push", message: e.message })),
          ResponseError: (e) =>
            Effect.fail(
              new TransportError({
                channel: "push",
                message:
                  e.reason === "StatusCode"
                    ? `HTTP ${e.response.status}`
                    : e.message,
              }),
            ),
        }),
      );

    const outcome: DeliveryOutcome = {
      channel: "push",
      delivered: true,
      detail: `posted to ${settings.topic}`,
    };
    return outcome;
  }).pipe(
    Effect.catchTag("TransportError", (e) =>
      Console.error(formatError(e)).pipe(
        Effect.as<DeliveryOutcome>({
          channel: "push",
          delivered: false,
          detail: e.message,
        }),
      ),
    ),
  );
}
