"use strict";

import { createPayload } from "./layers.js";
import type { Decoder, PacketBuilder } from "./types.js";

export type DecodeFunction = (data: Uint8Array, builder: PacketBuilder) => Error | null;

export const decoderFunc = (name: string, decode: DecodeFunction): Decoder => ({ name, decode });

// Takes everything that is left as the application payload.
export const payloadDecoder: Decoder = decoderFunc("Payload", (data, builder) => {
  const payload = createPayload(data);
  builder.addLayer(payload);
  builder.claimRole("application", payload);
  return null;
});
