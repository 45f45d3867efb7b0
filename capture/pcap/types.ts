"use strict";

import type { PacketDataSource } from "../../streaming/types.js";

export type PcapTimestampResolution = "microseconds" | "nanoseconds";

export type PcapGlobalHeader = {
  littleEndian: boolean;
  timestampResolution: PcapTimestampResolution;
  versionMajor: number;
  versionMinor: number;
  thiszone: number;
  sigfigs: number;
  snaplen: number;
  network: number;
  networkName: string;
};

export type PcapDataSource = PacketDataSource & {
  readonly header: PcapGlobalHeader;
  /** Problems noticed so far; grows as records are read. */
  readonly issues: readonly string[];
  /** Number of records returned so far. */
  readonly packetsRead: number;
};
