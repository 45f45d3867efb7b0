"use strict";

import { setImmediate } from "node:timers/promises";

import { createPacket } from "../decoding/packet.js";
import { resolveDecodeOptions } from "../decoding/options.js";
import type { DecodeOptions, Decoder, Packet } from "../decoding/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { RendezvousChannel } from "./channel.js";
import { isEndOfStream } from "./errors.js";
import type {
  PacketDataSource,
  PacketSourceOptions,
  PacketStream,
  PacketsOptions
} from "./types.js";

/**
 * Reads raw packets from a data source and decodes each one.
 *
 * `nextPacket()` surfaces every source error, end of stream included, and
 * leaves the loop to the caller. `packets()` runs the loop in the background
 * and hands packets over one at a time; source errors other than end of
 * stream are logged and skipped there.
 */
export class PacketSource {
  /** Options used for every packet decoded from here on. */
  decodeOptions: DecodeOptions;
  private readonly logger: Logger;

  constructor(
    private readonly source: PacketDataSource,
    private readonly decoder: Decoder,
    options: PacketSourceOptions = {}
  ) {
    this.decodeOptions = resolveDecodeOptions(options.decodeOptions);
    this.logger = options.logger ?? rootLogger.child({ component: "packet-source" });
  }

  async nextPacket(): Promise<Packet> {
    const { data, captureInfo } = await this.source.readPacketData();
    const packet = createPacket(data, this.decoder, this.decodeOptions);
    packet.captureInfo = { ...captureInfo };
    return packet;
  }

  packets(options: PacketsOptions = {}): PacketStream {
    const channel = new RendezvousChannel<Packet>();
    const { signal } = options;
    const onAbort = (): void => channel.close();
    if (signal?.aborted) channel.close();
    signal?.addEventListener("abort", onAbort, { once: true });
    void this.produce(channel)
      .catch((error: unknown) => {
        this.logger.error({ err: error }, "packet producer stopped unexpectedly");
        channel.close();
      })
      .finally(() => signal?.removeEventListener("abort", onAbort));
    return channel;
  }

  private async produce(channel: RendezvousChannel<Packet>): Promise<void> {
    this.logger.debug("packet producer started");
    let delivered = 0;
    while (!channel.isClosed) {
      let packet: Packet;
      try {
        packet = await this.nextPacket();
      } catch (error) {
        if (isEndOfStream(error)) break;
        this.logger.debug({ err: error }, "discarding packet source error");
        // A source that keeps failing must not starve timers and abort listeners.
        await setImmediate();
        continue;
      }
      if (!(await channel.send(packet))) break;
      delivered += 1;
    }
    channel.close();
    this.logger.debug({ delivered }, "packet producer stopped");
  }
}
