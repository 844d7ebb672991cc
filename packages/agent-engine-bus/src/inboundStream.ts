/**
 * Async-iterable view over a bus subscription.
 *
 * Each item must still be acknowledged through `ack()`; unacknowledged items
 * are redelivered by the bus and show up in the stream again.
 */

import type { CommunicationBus } from "./communicationBus";
import type { BusSubscription, DeliveryReceipt, Message, SubscribeOptions } from "./types";

export interface InboundMessage {
  message: Message;
  receipt: DeliveryReceipt;
  attempt: number;
  ack(): boolean;
}

export class InboundStream implements AsyncIterable<InboundMessage> {
  private readonly buffer: InboundMessage[] = [];
  private readonly waiters: Array<(result: IteratorResult<InboundMessage>) => void> = [];
  private readonly subscription: BusSubscription;
  private closed = false;

  constructor(bus: CommunicationBus, endpoint: string, options: SubscribeOptions = {}) {
    this.subscription = bus.subscribe(
      endpoint,
      (message, context) => {
        this.push({
          message,
          receipt: context.receipt,
          attempt: context.attempt,
          ack: context.ack,
        });
      },
      options
    );
  }

  /** Resolves with the next message, or undefined once closed. */
  async next(): Promise<InboundMessage | undefined> {
    const result = await this.pull();
    return result.done ? undefined : result.value;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.subscription.unsubscribe();
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<InboundMessage> {
    return {
      next: () => this.pull(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  private pull(): Promise<IteratorResult<InboundMessage>> {
    const item = this.buffer.shift();
    if (item) {
      return Promise.resolve({ done: false, value: item });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private push(item: InboundMessage): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return;
    }
    this.buffer.push(item);
  }
}
