/**
 * Outbound Audio Queue
 * Per-call lazy sequence of outbound items consumed by the transport
 *
 * The session pushes; a single consumer pulls with `for await`.
 * clear() drops everything not yet pulled; close() ends the sequence.
 */

import type { OutboundItem } from '../types';

type Waiter = (result: IteratorResult<OutboundItem>) => void;

export class OutboundAudioQueue implements AsyncIterable<OutboundItem> {
  private items: OutboundItem[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Audio items queued but not yet pulled by the transport
   */
  get pendingAudio(): number {
    return this.items.filter((item) => item.type === 'audio').length;
  }

  push(item: OutboundItem): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Drop every queued item; returns how many audio chunks were discarded
   */
  clear(): number {
    const dropped = this.pendingAudio;
    this.items = [];
    return dropped;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.items = [];
    for (const waiter of this.waiters) {
      waiter({ value: undefined, done: true });
    }
    this.waiters = [];
  }

  next(): Promise<IteratorResult<OutboundItem>> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<OutboundItem> {
    return {
      next: () => this.next(),
      return: () => Promise.resolve({ value: undefined, done: true }),
    };
  }
}
