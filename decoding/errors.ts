"use strict";

/**
 * Returned by `PacketBuilder.requestNext` when no decoder was given, usually
 * because a lookup for an unsupported protocol came back empty.
 */
export class InvalidDecoderError extends Error {
  readonly code = "E_INVALID_DECODER" as const;

  constructor() {
    super("requestNext was passed no decoder, probably an unsupported decode type");
    this.name = "InvalidDecoderError";
  }
}

/**
 * Returned by `PacketBuilder.requestNext` when the decoder has not added a
 * layer whose payload the next decoder could run against.
 */
export class NoLayerError extends Error {
  readonly code = "E_NO_LAYER" as const;

  constructor() {
    super("requestNext called, but no layers added yet");
    this.name = "NoLayerError";
  }
}

/** Thrown when a decoder keeps using its builder after `decode` returned. */
export class StaleBuilderError extends Error {
  readonly code = "E_STALE_BUILDER" as const;

  constructor(readonly operation: string) {
    super(`PacketBuilder.${operation} called after its decode step finished`);
    this.name = "StaleBuilderError";
  }
}

/** Wraps a value thrown by a decoder that is not an `Error`. */
export class DecodeFaultError extends Error {
  readonly code = "E_DECODE_FAULT" as const;

  constructor(readonly fault: unknown) {
    super(`Decoder fault: ${String(fault)}`);
    this.name = "DecodeFaultError";
  }
}

export const toDecodeError = (fault: unknown): Error =>
  fault instanceof Error ? fault : new DecodeFaultError(fault);
