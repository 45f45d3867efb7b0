"use strict";

import type { Blob } from "node:buffer";
import { openAsBlob } from "node:fs";

import { toHex32 } from "../../binary-utils.js";
import type { Logger } from "../../logger.js";
import { logger as rootLogger } from "../../logger.js";
import { EndOfStreamError } from "../../streaming/errors.js";
import type { PacketData } from "../../streaming/types.js";
import { PcapFormatError } from "./errors.js";
import type { PcapDataSource, PcapGlobalHeader, PcapTimestampResolution } from "./types.js";

export { PcapFormatError } from "./errors.js";
export type { PcapDataSource, PcapGlobalHeader, PcapTimestampResolution } from "./types.js";

const GLOBAL_HEADER_SIZE = 24;
const RECORD_HEADER_SIZE = 16;
const MAX_ISSUES = 200;

const PCAP_MAGIC_USEC = 0xa1b2c3d4;
const PCAP_MAGIC_NSEC = 0xa1b23c4d;
const PCAP_MAGIC_USEC_SWAPPED = 0xd4c3b2a1;
const PCAP_MAGIC_NSEC_SWAPPED = 0x4d3cb2a1;

export type PcapOptions = {
  logger?: Logger;
};

const describeLinkType = (linkType: number): string => {
  if (linkType === 0) return "Null/loopback";
  if (linkType === 1) return "Ethernet";
  if (linkType === 101) return "Raw IP";
  if (linkType === 105) return "IEEE 802.11";
  if (linkType === 113) return "Linux cooked capture";
  return `LinkType ${linkType}`;
};

const detectPcapMagic = (
  dv: DataView
): { littleEndian: boolean; timestampResolution: PcapTimestampResolution } | null => {
  if (dv.byteLength < 4) return null;
  const magic = dv.getUint32(0, false);
  if (magic === PCAP_MAGIC_USEC) return { littleEndian: false, timestampResolution: "microseconds" };
  if (magic === PCAP_MAGIC_NSEC) return { littleEndian: false, timestampResolution: "nanoseconds" };
  if (magic === PCAP_MAGIC_USEC_SWAPPED) return { littleEndian: true, timestampResolution: "microseconds" };
  if (magic === PCAP_MAGIC_NSEC_SWAPPED) return { littleEndian: true, timestampResolution: "nanoseconds" };
  return null;
};

const readBytes = async (blob: Blob, start: number, end: number): Promise<Uint8Array> =>
  new Uint8Array(await blob.slice(start, end).arrayBuffer());

/**
 * Opens a classic libpcap capture held in `blob` and returns a data source that
 * yields one record per `readPacketData()` call.
 */
export const openPcap = async (blob: Blob, options: PcapOptions = {}): Promise<PcapDataSource> => {
  const log = options.logger ?? rootLogger.child({ component: "pcap" });
  const headerBytes = await readBytes(blob, 0, GLOBAL_HEADER_SIZE);
  const headerDv = new DataView(headerBytes.buffer, headerBytes.byteOffset, headerBytes.byteLength);
  const magic = detectPcapMagic(headerDv);
  if (!magic) {
    const found = headerBytes.length >= 4 ? toHex32(headerDv.getUint32(0, false), 8) : "nothing";
    throw new PcapFormatError(`Not a pcap capture (magic ${found}).`);
  }
  if (headerBytes.length < GLOBAL_HEADER_SIZE) {
    throw new PcapFormatError(`Global header is truncated (${headerBytes.length}/${GLOBAL_HEADER_SIZE} bytes).`);
  }

  const le = magic.littleEndian;
  const network = headerDv.getUint32(20, le);
  const header: PcapGlobalHeader = {
    littleEndian: le,
    timestampResolution: magic.timestampResolution,
    versionMajor: headerDv.getUint16(4, le),
    versionMinor: headerDv.getUint16(6, le),
    thiszone: headerDv.getInt32(8, le),
    sigfigs: headerDv.getUint32(12, le),
    snaplen: headerDv.getUint32(16, le),
    network,
    networkName: describeLinkType(network)
  };

  const issues: string[] = [];
  const pushIssue = (message: string): void => {
    if (issues.length >= MAX_ISSUES) return;
    issues.push(message);
    log.warn({ issue: message }, "pcap capture issue");
  };

  if (header.versionMajor !== 2 || header.versionMinor !== 4) {
    pushIssue(`Unusual PCAP version ${header.versionMajor}.${header.versionMinor} (expected 2.4).`);
  }

  const subSecondsPerMillisecond = magic.timestampResolution === "microseconds" ? 1_000 : 1_000_000;
  let offset = GLOBAL_HEADER_SIZE;
  let packetsRead = 0;
  let exhausted = false;

  const readPacketData = async (): Promise<PacketData> => {
    if (exhausted) throw new EndOfStreamError();
    if (offset + RECORD_HEADER_SIZE > blob.size) {
      exhausted = true;
      if (offset < blob.size) {
        pushIssue(`File ends with ${blob.size - offset} trailing bytes (truncated packet record header).`);
      }
      throw new EndOfStreamError();
    }

    const recordHeader = await readBytes(blob, offset, offset + RECORD_HEADER_SIZE);
    const recordDv = new DataView(recordHeader.buffer, recordHeader.byteOffset, recordHeader.byteLength);
    const tsSeconds = recordDv.getUint32(0, le);
    const tsSubseconds = recordDv.getUint32(4, le);
    const capturedLength = recordDv.getUint32(8, le);
    const originalLength = recordDv.getUint32(12, le);
    const recordNumber = packetsRead + 1;

    if (originalLength < capturedLength) {
      pushIssue(
        `Packet #${recordNumber} has captured length (${capturedLength}) larger than original length (${originalLength}).`
      );
    }
    if (capturedLength > header.snaplen) {
      pushIssue(`Packet #${recordNumber} captured length (${capturedLength}) exceeds snaplen (${header.snaplen}).`);
    }

    const dataStart = offset + RECORD_HEADER_SIZE;
    const recordEnd = dataStart + capturedLength;
    if (recordEnd > blob.size) {
      exhausted = true;
      const message = `Packet #${recordNumber} payload runs past EOF (need ${capturedLength} bytes at offset ${dataStart}).`;
      pushIssue(message);
      throw new PcapFormatError(message);
    }

    const data = await readBytes(blob, dataStart, recordEnd);
    offset = recordEnd;
    packetsRead = recordNumber;
    return {
      data,
      captureInfo: {
        populated: true,
        timestamp: new Date(tsSeconds * 1000 + tsSubseconds / subSecondsPerMillisecond),
        captureLength: capturedLength,
        originalLength
      }
    };
  };

  return {
    header,
    get issues(): readonly string[] {
      return issues;
    },
    get packetsRead(): number {
      return packetsRead;
    },
    readPacketData
  };
};

export const openPcapFile = async (path: string, options: PcapOptions = {}): Promise<PcapDataSource> =>
  openPcap(await openAsBlob(path), options);
