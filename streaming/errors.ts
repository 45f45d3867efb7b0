"use strict";

/**
 * Raised by a data source that has no more packets. It is the only source
 * error `PacketSource.packets()` treats as a clean end of the stream.
 */
export class EndOfStreamError extends Error {
  readonly code = "E_END_OF_STREAM" as const;

  constructor() {
    super("End of packet stream");
    this.name = "EndOfStreamError";
  }
}

export const isEndOfStream = (error: unknown): error is EndOfStreamError =>
  error instanceof EndOfStreamError;
