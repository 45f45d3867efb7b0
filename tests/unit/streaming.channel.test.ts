"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { RendezvousChannel } from "../../streaming/channel.js";

const settle = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

void test("send waits until a receiver takes the value", async () => {
  const channel = new RendezvousChannel<number>();
  let delivered: boolean | null = null;
  void channel.send(1).then(result => {
    delivered = result;
  });
  await settle();
  assert.strictEqual(delivered, null);

  assert.deepStrictEqual(await channel.next(), { value: 1, done: false });
  await settle();
  assert.strictEqual(delivered, true);
});

void test("a waiting receiver gets the next value sent", async () => {
  const channel = new RendezvousChannel<string>();
  const received = channel.next();
  assert.strictEqual(await channel.send("frame"), true);
  assert.deepStrictEqual(await received, { value: "frame", done: false });
});

void test("close ends iteration and releases blocked senders", async () => {
  const channel = new RendezvousChannel<number>();
  const pending = channel.send(7);
  const waiting = new RendezvousChannel<number>();
  const receiver = waiting.next();

  channel.close();
  waiting.close();

  assert.strictEqual(await pending, false);
  assert.strictEqual(await channel.send(8), false);
  assert.deepStrictEqual(await channel.next(), { value: undefined, done: true });
  assert.deepStrictEqual(await receiver, { value: undefined, done: true });
  assert.strictEqual(channel.isClosed, true);
});

void test("breaking out of for await closes the channel", async () => {
  const channel = new RendezvousChannel<number>();
  const sends = [channel.send(1), channel.send(2)];
  const seen: number[] = [];
  for await (const value of channel) {
    seen.push(value);
    break;
  }
  assert.deepStrictEqual(seen, [1]);
  assert.strictEqual(channel.isClosed, true);
  assert.deepStrictEqual(await Promise.all(sends), [true, false]);
});
