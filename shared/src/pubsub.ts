import { Redis } from 'ioredis';
import { errorMessage } from './errors.js';

export type ChannelHandler = (message: unknown, channel: string) => void;

/** Transport between the bridge and the dashboard. Messages travel as JSON. */
export interface PubSub {
  publish(channel: string, message: unknown): Promise<boolean>;
  subscribe(channel: string, handler: ChannelHandler): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  ping(): Promise<boolean>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export function encodeMessage(message: unknown): string {
  try {
    const encoded = JSON.stringify(message);
    if (encoded !== undefined) return encoded;
  } catch {
    // circular or BigInt values fall through to the string form
  }
  return JSON.stringify(String(message));
}

export function decodeMessage(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

// Subset of the ioredis client used here; lets tests supply a stand-in.
export interface RedisPublisher {
  readonly status: string;
  publish(channel: string, message: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export interface RedisSubscriber {
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  quit(): Promise<string>;
}

export interface RedisOptions {
  host: string;
  port: number;
  password?: string;
}

export class RedisPubSub implements PubSub {
  private readonly handlers = new Map<string, Set<ChannelHandler>>();

  constructor(
    private readonly publisher: RedisPublisher,
    private readonly subscriber: RedisSubscriber,
    private readonly logPrefix = 'redis',
  ) {
    this.subscriber.on('message', (channel, raw) => this.dispatch(channel, raw));
  }

  async publish(channel: string, message: unknown): Promise<boolean> {
    try {
      await this.publisher.publish(channel, encodeMessage(message));
      return true;
    } catch (e) {
      console.error(`[${this.logPrefix}] redis publish to ${channel} failed:`, errorMessage(e));
      return false;
    }
  }

  async subscribe(channel: string, handler: ChannelHandler): Promise<void> {
    const existing = this.handlers.get(channel);
    if (existing) {
      existing.add(handler);
      return;
    }
    const set = new Set<ChannelHandler>([handler]);
    this.handlers.set(channel, set);
    try {
      await this.subscriber.subscribe(channel);
    } catch (e) {
      if (this.handlers.get(channel) === set) this.handlers.delete(channel);
      throw e;
    }
    console.log(`[${this.logPrefix}] subscribed to redis channel ${channel}`);
  }

  async unsubscribe(channel: string): Promise<void> {
    if (!this.handlers.delete(channel)) return;
    await this.subscriber.unsubscribe(channel);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.publisher.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  isConnected(): boolean {
    return this.publisher.status === 'ready';
  }

  async close(): Promise<void> {
    this.handlers.clear();
    await Promise.allSettled([this.subscriber.quit(), this.publisher.quit()]);
  }

  private dispatch(channel: string, raw: string): void {
    const set = this.handlers.get(channel);
    if (!set) return;
    const message = decodeMessage(raw);
    for (const handler of set) {
      try {
        handler(message, channel);
      } catch (e) {
        console.error(`[${this.logPrefix}] handler for ${channel} failed:`, errorMessage(e));
      }
    }
  }
}

export function createRedisPubSub(options: RedisOptions, logPrefix = 'redis'): RedisPubSub {
  // A subscriber connection queues commands until Redis is reachable.
  const build = (role: string, maxRetriesPerRequest: number | null): Redis => {
    const client = new Redis({
      host: options.host,
      port: options.port,
      password: options.password,
      lazyConnect: false,
      maxRetriesPerRequest,
    });
    client.on('connect', () => console.log(`[${logPrefix}] redis ${role} connected to ${options.host}:${options.port}`));
    client.on('error', (err: Error) => console.error(`[${logPrefix}] redis ${role} error:`, err.message));
    return client;
  };
  return new RedisPubSub(build('publisher', 3), build('subscriber', null), logPrefix);
}
