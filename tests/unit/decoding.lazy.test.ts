"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { layerClass } from "../../decoding/layer-type.js";
import { DEFAULT_DECODE_OPTIONS, LAZY } from "../../decoding/options.js";
import { createPacket } from "../../decoding/packet.js";
import type { Decoder, Packet } from "../../decoding/types.js";
import {
  TestNetworkType,
  TestTransportType,
  TestTunnelType,
  createTestStack,
  fixedHeaderDecoder,
  makeTestFrame
} from "../fixtures/decoders.js";

const stepCounts = (stack: ReturnType<typeof createTestStack>): number[] => [
  stack.link.calls(),
  stack.network.calls(),
  stack.transport.calls(),
  stack.payload.calls()
];

const summarize = (packet: Packet) => ({
  layers: packet.layers().map(layer => ({
    type: layer.layerType.name,
    contents: Array.from(layer.contents),
    payload: Array.from(layer.payload)
  })),
  roles: [
    packet.linkLayer(),
    packet.networkLayer(),
    packet.transportLayer(),
    packet.applicationLayer(),
    packet.errorLayer()
  ].map(layer => (layer ? packet.layers().indexOf(layer) : -1)),
  error: packet.errorLayer()?.error.message ?? null
});

void test("a lazy packet decodes nothing until it is asked", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);
  assert.strictEqual(packet.isDecoded(), false);
  assert.deepStrictEqual(stepCounts(stack), [0, 0, 0, 0]);
});

void test("role accessors decode only as far as the requested role", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);

  assert.deepStrictEqual(Array.from(packet.linkLayer()?.contents ?? []), [0, 1, 2, 3]);
  assert.deepStrictEqual(stepCounts(stack), [1, 0, 0, 0]);

  assert.deepStrictEqual(Array.from(packet.transportLayer()?.contents ?? []), [8, 9]);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 0]);

  // Already known: no further steps.
  assert.notStrictEqual(packet.networkLayer(), null);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 0]);

  assert.notStrictEqual(packet.applicationLayer(), null);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 1]);
  assert.strictEqual(packet.isDecoded(), true);
});

void test("layer lookups step until a match appears", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);

  assert.strictEqual(packet.layer(TestNetworkType)?.layerType, TestNetworkType);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 0, 0]);

  const transportish = layerClass("transportish", TestTransportType, TestTunnelType);
  assert.strictEqual(packet.layerClass(transportish)?.layerType, TestTransportType);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 0]);

  assert.strictEqual(packet.layer(TestTunnelType), null);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 1]);
  assert.strictEqual(packet.isDecoded(), true);
});

void test("errorLayer drains a packet that decodes cleanly", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);
  assert.strictEqual(packet.errorLayer(), null);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 1]);
});

void test("decodeAll drains the packet and returns it", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);
  assert.strictEqual(packet.decodeAll(), packet);
  assert.strictEqual(packet.isDecoded(), true);
  assert.strictEqual(packet.layers().length, 4);
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 1]);
});

void test("a drained lazy packet returns the same values on every call", () => {
  const stack = createTestStack();
  const packet = createPacket(makeTestFrame(), stack.link.decoder, LAZY);
  const layers = packet.layers();
  assert.strictEqual(packet.layers(), layers);
  assert.strictEqual(packet.applicationLayer(), layers[3]);
  assert.strictEqual(packet.applicationLayer(), packet.applicationLayer());
  assert.deepStrictEqual(stepCounts(stack), [1, 1, 1, 1]);
});

void test("eager and fully drained lazy decoding agree", () => {
  const shortNetwork = fixedHeaderDecoder({ layerType: TestNetworkType, role: "network", headerLength: 32 });
  const throwing: Decoder = {
    name: "Throwing",
    decode: () => {
      throw new RangeError("offset is outside the bounds of the DataView");
    }
  };
  const linkInto = (next: Decoder): Decoder =>
    fixedHeaderDecoder({ layerType: TestTunnelType, role: "link", headerLength: 4, next: () => next });

  const cases: Array<{ decoder: () => Decoder; data: Uint8Array }> = [
    { decoder: () => createTestStack().link.decoder, data: makeTestFrame() },
    { decoder: () => createTestStack().link.decoder, data: makeTestFrame().subarray(0, 9) },
    { decoder: () => createTestStack().link.decoder, data: makeTestFrame().subarray(0, 6) },
    { decoder: () => linkInto(shortNetwork), data: makeTestFrame() },
    { decoder: () => linkInto(throwing), data: makeTestFrame() },
    { decoder: () => throwing, data: makeTestFrame() }
  ];

  for (const { decoder, data } of cases) {
    const eager = createPacket(data, decoder(), DEFAULT_DECODE_OPTIONS);
    const lazy = createPacket(data, decoder(), LAZY);
    assert.deepStrictEqual(summarize(lazy), summarize(eager));
  }
});
