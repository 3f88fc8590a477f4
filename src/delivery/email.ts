// Email delivery — one plain-text message to the configured account.

import net from "node:net";
import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import { Console, Context, Duration, Effect, Layer, Redacted, type Scope } from "effect";
import type { DeliveryOutcome } from "../domain.ts";
import type { EmailSettings } from "../config.ts";
import { REPORT_TITLE, formatError } from "../format.ts";
import { TransportError } from "./errors.ts";

export interface MailMessage {
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly text: string;
}

// --- Service ---

export class Mailer extends Context.Tag("Mailer")<
  Mailer,
  {
    readonly send: (message: MailMessage) => Effect.Effect<void, TransportError>;
  }
>() {}

/** SMTP over implicit TLS. The mailer opens its own sockets so that an
 *  interrupted send, or the end of the scope, tears the connection down. */
export function makeSmtpMailer(
  settings: EmailSettings,
): Effect.Effect<Context.Tag.Service<Mailer>, never, Scope.Scope> {
  const timeout = Duration.toMillis(settings.timeout);
  const sockets = new Set<net.Socket>();
  const dropSockets = () => {
    for (const socket of sockets) socket.destroy();
    sockets.clear();
  };

  const options: SMTPTransport.Options = {
    host: settings.server,
    port: settings.port,
    secure: true,
    auth: {
      user: settings.user,
      pass: Redacted.value(settings.password),
    },
    connectionTimeout: timeout,
    greetingTimeout: timeout,
    socketTimeout: timeout,
    getSocket: (_options, callback) => {
      const socket = net.connect({ host: settings.server, port: settings.port });
      sockets.add(socket);
      socket.once("close", () => sockets.delete(socket));
      const onError = (error: Error) => callback(error, { connection: socket });
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        callback(null, { connection: socket });
      });
    },
  };

  const acquire = Effect.sync(() => nodemailer.createTransport(options));

  return Effect.acquireRelease(acquire, (transporter) =>
    Effect.sync(() => {
      dropSockets();
      transporter.close();
    }),
  ).pipe(
    Effect.map((transporter) =>
      Mailer.of({
        send: (message) =>
          Effect.tryPromise({
            try: (signal) => {
              signal.addEventListener("abort", dropSockets, { once: true });
              return transporter.sendMail({ ...message });
            },
            catch: (e) =>
              new TransportError({
                channel: "email",
                message: e instanceof Error ? e.message : String(e),
              }),
          }).pipe(
            Effect.tap((info) => Console.debug(`[email] accepted ${info.messageId}`)),
            Effect.asVoid,
          ),
      }),
    ),
  );
}

export const SmtpMailerLive = (settings: EmailSettings) =>
  Layer.scoped(Mailer, makeSmtpMailer(settings));

// --- Delivery ---

export function composeReportEmail(report: string, account: string): MailMessage {
  return {
    from: account,
    to: account,
    subject: REPORT_TITLE,
    text: report,
  };
}

export function emailReport(
  report: string,
  settings: EmailSettings,
): Effect.Effect<DeliveryOutcome, never, Mailer> {
  return Effect.gen(function* () {
    const mailer = yield* Mailer;
    yield* Console.debug(
      `[email] sending via ${settings.server}:${settings.port}`,
    );
    yield* mailer.send(composeReportEmail(report, settings.user)).pipe(
      Effect.timeoutFail({
        duration: settings.timeout,
        onTimeout: () =>
          new TransportError({ channel: "email", message: "SMTP timed out" }),
      }),
    );
    const outcome: DeliveryOutcome = {
      channel: "email",
      delivered: true,
      detail: `sent to ${settings.user}`,
    };
    return outcome;
  }).pipe(
    Effect.catchTag("TransportError", (e) =>
      Console.error(formatError(e)).pipe(
        Effect.as<DeliveryOutcome>({
          channel: "email",
          delivered: false,
          detail: e.message,
        }),
      ),
    ),
  );
}
