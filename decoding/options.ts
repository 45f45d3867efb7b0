"use strict";

import type { DecodeOptions } from "./types.js";

/** Eager decoding over a private copy of the input. */
export const DEFAULT_DECODE_OPTIONS: DecodeOptions = Object.freeze({ lazy: false, noCopy: false });

export const LAZY: DecodeOptions = Object.freeze({ lazy: true, noCopy: false });

export const NO_COPY: DecodeOptions = Object.freeze({ lazy: false, noCopy: true });

export const resolveDecodeOptions = (options?: Partial<DecodeOptions>): DecodeOptions =>
  Object.freeze({
    lazy: options?.lazy ?? DEFAULT_DECODE_OPTIONS.lazy,
    noCopy: options?.noCopy ?? DEFAULT_DECODE_OPTIONS.noCopy
  });
