// Paste hosting — optional click-through target for push notifications.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Console, Duration, Effect, Option } from "effect";
import { TransportError } from "./errors.ts";

export interface PasteOptions {
  readonly url: string;
  readonly timeout: Duration.DurationInput;
}

/** POST the text and return the paste URL. Never fails: a paste that could
 *  not be created is `None`. */
export function createPaste(
  text: string,
  options: PasteOptions,
): Effect.Effect<Option.Option<string>, never, HttpClient.HttpClient> {
  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const body = yield* client
      .execute(
        HttpClientRequest.post(options.url).pipe(
          HttpClientRequest.bodyText(text, "text/plain; charset=utf-8"),
        ),
      )
      .pipe(
        Effect.flatMap((response) => response.text),
        Effect.map((raw) => raw.trim()),
        Effect.scoped,
      );
    if (!/^https?:\/\/\S+$/.test(body)) {
      return yield* Effect.fail(
        new TransportError({ channel: "paste", message: "response is not a URL" }),
      );
    }
    yield* Console.debug(`[paste] created ${body}`);
    return Option.some(body);
  }).pipe(
    Effect.timeoutFail({
      duration: options.timeout,
      onTimeout: () =>
        new TransportError({ channel: "paste", message: "request timed out" }),
    }),
    Effect.catchAll((e) =>
      Console.error(`[paste] not created: ${e.message}`).pipe(
        Effect.as(Option.none<string>()),
      ),
    ),
  );
}
