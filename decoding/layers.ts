"use strict";

import { DecodeFailureType, PayloadType } from "./layer-type.js";
import type { ErrorLayer, Layer, LayerType } from "./types.js";

const EMPTY = new Uint8Array(0);

/**
 * Splits `data` into a header of `headerLength` bytes and the rest. Both halves
 * are views of `data`, so they share its memory.
 */
export const baseLayer = (layerType: LayerType, data: Uint8Array, headerLength: number): Layer => {
  const split = Math.max(0, Math.min(headerLength, data.length));
  return {
    layerType,
    contents: data.subarray(0, split),
    payload: data.subarray(split)
  };
};

export type DecodeFailure = ErrorLayer;

export const createDecodeFailure = (remainder: Uint8Array, error: Error): DecodeFailure => ({
  layerType: DecodeFailureType,
  contents: remainder,
  payload: EMPTY,
  error,
  describe: () => `Packet decoding error: ${error.message}`
});

export const isDecodeFailure = (layer: Layer): layer is DecodeFailure =>
  layer.layerType.id === DecodeFailureType.id;

export const createPayload = (data: Uint8Array): Layer => ({
  layerType: PayloadType,
  contents: data,
  payload: EMPTY,
  describe: () => `${data.length} byte(s)`
});
