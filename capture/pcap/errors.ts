"use strict";

export class PcapFormatError extends Error {
  readonly code = "E_PCAP_FORMAT" as const;

  constructor(message: string) {
    super(message);
    this.name = "PcapFormatError";
  }
}
