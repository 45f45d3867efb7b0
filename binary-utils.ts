"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const bufferToHex = (bytes: Uint8Array): string =>
  Array.from(bytes, byteValue => byteValue.toString(16).padStart(2, "0")).join("");

// Hex of at most `limit` bytes, with an ellipsis when the input is longer.
export const previewHex = (bytes: Uint8Array, limit = 32): string => {
  if (bytes.length <= limit) return bufferToHex(bytes);
  return `${bufferToHex(bytes.subarray(0, limit))}…`;
};

export const copyBytes = (bytes: Uint8Array): Uint8Array => {
  const copy = new Uint8Array(bytes.length);
  copy.set(bytes);
  return copy;
};
