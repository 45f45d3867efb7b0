"use strict";

import type { CaptureInfo, DecodeOptions, Packet } from "../decoding/types.js";
import type { Logger } from "../logger.js";

export type PacketData = {
  data: Uint8Array;
  captureInfo: CaptureInfo;
};

/**
 * Supplier of raw packet bytes. `readPacketData` throws (or rejects with)
 * `EndOfStreamError` once it runs out; any other error is specific to the
 * source.
 */
export interface PacketDataSource {
  readPacketData(): Promise<PacketData> | PacketData;
}

export type PacketSourceOptions = {
  decodeOptions?: Partial<DecodeOptions>;
  logger?: Logger;
};

export type PacketsOptions = {
  /** Stops the producer and ends the stream when aborted. */
  signal?: AbortSignal;
};

/** Consuming end of `PacketSource.packets()`. */
export interface PacketStream extends AsyncIterableIterator<Packet> {
  /** Ends the stream early and lets the producer stop. */
  close(): void;
}
