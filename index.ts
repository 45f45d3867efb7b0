"use strict";

export type {
  CaptureInfo,
  DecodeOptions,
  Decoder,
  ErrorLayer,
  Layer,
  LayerClass,
  LayerRole,
  LayerType,
  Packet,
  PacketBuilder,
  RoleLayers
} from "./decoding/types.js";
export { DecodeFailureType, PayloadType, defineLayerType, layerClass } from "./decoding/layer-type.js";
export {
  DecodeFaultError,
  InvalidDecoderError,
  NoLayerError,
  StaleBuilderError
} from "./decoding/errors.js";
export { baseLayer, createDecodeFailure, createPayload, isDecodeFailure } from "./decoding/layers.js";
export type { DecodeFailure } from "./decoding/layers.js";
export { decoderFunc, payloadDecoder } from "./decoding/decoders.js";
export type { DecodeFunction } from "./decoding/decoders.js";
export { DEFAULT_DECODE_OPTIONS, LAZY, NO_COPY, resolveDecodeOptions } from "./decoding/options.js";
export { createPacket, emptyCaptureInfo } from "./decoding/packet.js";
export { formatLayers } from "./decoding/format.js";

export { EndOfStreamError, isEndOfStream } from "./streaming/errors.js";
export { RendezvousChannel } from "./streaming/channel.js";
export { PacketSource } from "./streaming/packet-source.js";
export type {
  PacketData,
  PacketDataSource,
  PacketSourceOptions,
  PacketStream,
  PacketsOptions
} from "./streaming/types.js";

export { PcapFormatError, openPcap, openPcapFile } from "./capture/pcap/index.js";
export type { PcapDataSource, PcapGlobalHeader, PcapOptions, PcapTimestampResolution } from "./capture/pcap/index.js";

export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
