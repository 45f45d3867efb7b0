"use strict";

import { previewHex } from "../binary-utils.js";
import type { Layer } from "./types.js";

const describeLayer = (layer: Layer): string => {
  if (layer.describe) return layer.describe();
  return `contents=${previewHex(layer.contents)} payload=${layer.payload.length} bytes`;
};

export const formatLayers = (layers: readonly Layer[]): string =>
  layers
    .map((layer, index) => `--- Layer ${index + 1}: ${layer.layerType.name} ---\n${describeLayer(layer)}\n`)
    .join("");
