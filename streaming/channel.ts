"use strict";

type PendingSend<T> = {
  value: T;
  resolve: (delivered: boolean) => void;
};

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = Object.freeze({ value: undefined, done: true });

/**
 * Unbuffered channel: `send` resolves only once a receiver has taken the value,
 * so a producer never runs ahead of its consumer. Closing resolves every
 * pending `send` with `false` and ends iteration.
 */
export class RendezvousChannel<T> implements AsyncIterableIterator<T> {
  private closed = false;
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      this.senders.push({ value, resolve });
    });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve({ value: sender.value, done: false });
    }
    if (this.closed) return Promise.resolve(DONE);
    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sender of this.senders.splice(0)) sender.resolve(false);
    for (const receiver of this.receivers.splice(0)) receiver(DONE);
  }

  // Called by `for await` when the loop exits early.
  return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
