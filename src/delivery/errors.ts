// Delivery — transport errors shared by every channel.

import { Data } from "effect";

export class TransportError extends Data.TaggedError("TransportError")<{
  readonly channel: string;
  readonly message: string;
}> {}
