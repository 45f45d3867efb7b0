"use strict";

export type LayerType = {
  readonly id: number;
  readonly name: string;
};

export type LayerClass = {
  readonly name: string;
  contains(layerType: LayerType): boolean;
};

export interface Layer {
  readonly layerType: LayerType;
  /** Bytes that make up this layer itself. */
  readonly contents: Uint8Array;
  /** Bytes left over for the next decode step. */
  readonly payload: Uint8Array;
  /** Human-readable summary used by packet dumps. */
  describe?(): string;
}

export interface ErrorLayer extends Layer {
  readonly error: Error;
}

export type LayerRole = "link" | "network" | "transport" | "application" | "error";

export type RoleLayers = {
  link: Layer;
  network: Layer;
  transport: Layer;
  application: Layer;
  error: ErrorLayer;
};

/**
 * Mutation surface handed to a decoder for the duration of one decode step.
 * A builder must not be kept after `decode` returns.
 */
export interface PacketBuilder {
  addLayer(layer: Layer): void;
  /** First claim of a role wins; later claims for the same role are ignored. */
  claimRole<R extends LayerRole>(role: R, layer: RoleLayers[R]): void;
  /**
   * Queues `decoder` to run against the payload of the most recently added
   * layer. Returns an error when `decoder` is missing or no layer exists yet.
   */
  requestNext(decoder: Decoder | null | undefined): Error | null;
}

export interface Decoder {
  readonly name?: string;
  /**
   * Parses `data` into layers on `builder`. Returns `null` on success or the
   * error that stopped decoding. Thrown values are treated like returned errors.
   */
  decode(data: Uint8Array, builder: PacketBuilder): Error | null;
}

export type CaptureInfo = {
  /** When false, none of the other fields carry real information. */
  populated: boolean;
  timestamp: Date | null;
  captureLength: number;
  originalLength: number;
};

export type DecodeOptions = {
  /** Decode only as far as each accessor call needs. */
  readonly lazy: boolean;
  /** Keep a view of the caller's buffer instead of copying it. */
  readonly noCopy: boolean;
};

export type DecodeStrategy = "eager" | "lazy";

/**
 * A decoded packet.
 *
 * Eager packets are fully decoded when created and every accessor is a plain
 * read. Lazy packets decode on demand: every accessor below, `toString()`
 * included, may run further decode steps and grow the layer list, so a lazy
 * packet must not be used from two places at once until `decodeAll()` has run.
 */
export interface Packet {
  /** The packet's raw bytes. */
  readonly data: Uint8Array;
  /** Capture metadata, written by whoever supplied the bytes. */
  captureInfo: CaptureInfo;
  layers(): readonly Layer[];
  layer(layerType: LayerType): Layer | null;
  layerClass(layerClass: LayerClass): Layer | null;
  linkLayer(): Layer | null;
  networkLayer(): Layer | null;
  transportLayer(): Layer | null;
  applicationLayer(): Layer | null;
  /** Non-null when decoding stopped on a failure rather than running out of data. */
  errorLayer(): ErrorLayer | null;
  /** True once no decode step is pending. */
  isDecoded(): boolean;
  /** Runs every pending decode step. */
  decodeAll(): this;
  toString(): string;
}
