"use strict";

import type { LayerClass, LayerType } from "./types.js";

let nextLayerTypeId = 0;

export const defineLayerType = (name: string): LayerType => {
  nextLayerTypeId += 1;
  return Object.freeze({ id: nextLayerTypeId, name });
};

export const layerClass = (name: string, ...members: LayerType[]): LayerClass => {
  const ids = new Set(members.map(member => member.id));
  return Object.freeze({
    name,
    contains: (layerType: LayerType): boolean => ids.has(layerType.id)
  });
};

export const DecodeFailureType = defineLayerType("DecodeFailure");
export const PayloadType = defineLayerType("Payload");
