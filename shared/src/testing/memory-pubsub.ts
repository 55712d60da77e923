import { decodeMessage, encodeMessage, type ChannelHandler, type PubSub } from '../pubsub.js';

/**
 * In-process pub/sub with Redis-like delivery: messages are serialised and
 * handed to subscribers on a later microtask.
 */
export class MemoryPubSub implements PubSub {
  readonly published: Array<{ channel: string; message: unknown }> = [];
  private readonly handlers = new Map<string, Set<ChannelHandler>>();
  private connected = true;

  async publish(channel: string, message: unknown): Promise<boolean> {
    if (!this.connected) return false;
    const raw = encodeMessage(message);
    this.published.push({ channel, message: decodeMessage(raw) });
    const set = this.handlers.get(channel);
    if (set) {
      for (const handler of [...set]) {
        queueMicrotask(() => handler(decodeMessage(raw), channel));
      }
    }
    return true;
  }

  async subscribe(channel: string, handler: ChannelHandler): Promise<void> {
    let set = this.handlers.get(channel);
    if (!set) {
      set = new Set();
      this.handlers.set(channel, set);
    }
    set.add(handler);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.handlers.delete(channel);
  }

  async ping(): Promise<boolean> {
    return this.connected;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    this.handlers.clear();
    this.connected = false;
  }

  setConnected(connected: boolean): void {
    this.connected = connected;
  }

  subscribedChannels(): string[] {
    return [...this.handlers.keys()];
  }

  messagesOn(channel: string): unknown[] {
    return this.published.filter((p) => p.channel === channel).map((p) => p.message);
  }
}

/** Resolves once queued deliveries and the handlers' own promise chains have run. */
export async function flushDeliveries(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}
