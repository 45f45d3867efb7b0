"use strict";

import { copyBytes } from "../binary-utils.js";
import { logger } from "../logger.js";
import { InvalidDecoderError, NoLayerError, StaleBuilderError, toDecodeError } from "./errors.js";
import { formatLayers } from "./format.js";
import { createDecodeFailure } from "./layers.js";
import { resolveDecodeOptions } from "./options.js";
import type {
  CaptureInfo,
  DecodeOptions,
  DecodeStrategy,
  Decoder,
  ErrorLayer,
  Layer,
  LayerClass,
  LayerRole,
  LayerType,
  Packet,
  PacketBuilder,
  RoleLayers
} from "./types.js";

type RoleSlots = { [R in LayerRole]: RoleLayers[R] | null };

export const emptyCaptureInfo = (): CaptureInfo => ({
  populated: false,
  timestamp: null,
  captureLength: 0,
  originalLength: 0
});

/**
 * Shared state for both strategies. The strategy only decides when decode
 * steps run: an eager packet drains in its constructor, a lazy one steps from
 * inside its accessors until the requested answer is known.
 */
class DecodedPacket implements Packet {
  readonly data: Uint8Array;
  captureInfo: CaptureInfo = emptyCaptureInfo();

  private readonly decoded: Layer[] = [];
  private last: Layer | null = null;
  private pending: Decoder | null;
  private readonly roles: RoleSlots = {
    link: null,
    network: null,
    transport: null,
    application: null,
    error: null
  };

  constructor(data: Uint8Array, firstDecoder: Decoder, strategy: DecodeStrategy) {
    this.data = data;
    this.pending = firstDecoder;
    if (strategy === "eager") this.drain();
  }

  layers(): readonly Layer[] {
    this.drain();
    return this.decoded;
  }

  layer(layerType: LayerType): Layer | null {
    return this.find(layer => layer.layerType.id === layerType.id);
  }

  layerClass(layerClass: LayerClass): Layer | null {
    return this.find(layer => layerClass.contains(layer.layerType));
  }

  linkLayer(): Layer | null {
    return this.role("link");
  }

  networkLayer(): Layer | null {
    return this.role("network");
  }

  transportLayer(): Layer | null {
    return this.role("transport");
  }

  applicationLayer(): Layer | null {
    return this.role("application");
  }

  errorLayer(): ErrorLayer | null {
    return this.role("error");
  }

  isDecoded(): boolean {
    return this.pending === null;
  }

  decodeAll(): this {
    this.drain();
    return this;
  }

  toString(): string {
    return formatLayers(this.layers());
  }

  private drain(): void {
    while (this.pending) this.step();
  }

  private role<R extends LayerRole>(role: R): RoleSlots[R] {
    while (this.roles[role] === null && this.pending) this.step();
    return this.roles[role];
  }

  // Scans each layer once, stepping only when the layers seen so far don't match.
  private find(matches: (layer: Layer) => boolean): Layer | null {
    let scanned = 0;
    for (;;) {
      for (; scanned < this.decoded.length; scanned += 1) {
        const layer = this.decoded[scanned];
        if (layer && matches(layer)) return layer;
      }
      if (!this.pending) return null;
      this.step();
    }
  }

  private remainder(): Uint8Array {
    return this.last ? this.last.payload : this.data;
  }

  private append(layer: Layer): void {
    this.decoded.push(layer);
    this.last = layer;
  }

  private claim<R extends LayerRole>(role: R, layer: RoleLayers[R]): void {
    if (this.roles[role] === null) this.roles[role] = layer;
  }

  private step(): void {
    const next = this.pending;
    if (!next) return;
    this.pending = null;
    const input = this.remainder();
    if (input.length === 0) return;

    let open = true;
    const ensureOpen = (operation: string): void => {
      if (!open) throw new StaleBuilderError(operation);
    };
    const builder: PacketBuilder = {
      addLayer: (layer: Layer): void => {
        ensureOpen("addLayer");
        this.append(layer);
      },
      claimRole: <R extends LayerRole>(role: R, layer: RoleLayers[R]): void => {
        ensureOpen("claimRole");
        this.claim(role, layer);
      },
      requestNext: (decoder: Decoder | null | undefined): Error | null => {
        ensureOpen("requestNext");
        if (!decoder) return new InvalidDecoderError();
        if (!this.last) return new NoLayerError();
        this.pending = decoder;
        return null;
      }
    };

    let outcome: unknown;
    try {
      outcome = next.decode(input, builder);
    } catch (thrown) {
      outcome = toDecodeError(thrown);
      logger.debug({ err: outcome, decoder: next.name }, "decoder threw, recording decode failure");
    } finally {
      open = false;
    }
    if (outcome) this.fail(toDecodeError(outcome));
  }

  private fail(cause: Error): void {
    const failure = createDecodeFailure(this.remainder(), cause);
    this.append(failure);
    this.claim("error", failure);
    this.pending = null;
  }
}

/**
 * Builds a packet from `data`, decoding it with `firstDecoder` and whatever
 * decoders it chains to. Decode errors never escape: they end up as a
 * `DecodeFailure` layer reported by `errorLayer()`.
 */
export const createPacket = (
  data: Uint8Array,
  firstDecoder: Decoder,
  options?: Partial<DecodeOptions>
): Packet => {
  const resolved = resolveDecodeOptions(options);
  const buffer = resolved.noCopy ? data : copyBytes(data);
  return new DecodedPacket(buffer, firstDecoder, resolved.lazy ? "lazy" : "eager");
};
