import type { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { decodeMessage, errorMessage, isRecord, isValidTopicFilter, readString } from '@mqtt-dashboard/shared';
import { METRIC_CHANNELS, METRIC_CHANNEL_NAMES, isMetricChannel, prepareChannelData, type MetricChannel } from './channels.js';
import { SERVICE } from './config.js';
import type { BrokerState } from './state.js';
import type { SubscriptionManager } from './subscriptions.js';

export const WS_PATH = '/api/ws';

interface ClientCtx {
  id: string;
  ws: WebSocket;
  channels: Set<MetricChannel>;
}

type Frame = { type: string } & Record<string, unknown>;

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function send(ws: WebSocket, frame: Frame): void {
  if (ws.readyState !== WebSocket.OPEN) return;
  try {
    ws.send(JSON.stringify(frame));
  } catch (e) {
    console.warn(`[${SERVICE}] ws send failed:`, errorMessage(e));
  }
}

function channelList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * WebSocket endpoint on the dashboard's HTTP server. Clients pick metric
 * channels that are pushed on a timer and may follow MQTT filters, whose
 * messages arrive through the bridge.
 */
export class RealtimeHub {
  private readonly clients = new Map<string, ClientCtx>();
  private wss: WebSocketServer | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly state: BrokerState,
    private readonly subscriptions: SubscriptionManager,
    private readonly pushIntervalMs: number,
  ) {}

  attach(server: Server): void {
    this.wss = new WebSocketServer({
      server,
      path: WS_PATH,
      clientTracking: false,
      perMessageDeflate: false,
      maxPayload: 1024 * 1024,
    });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
    this.subscriptions.setMessageListener((clientId, message) => {
      const ctx = this.clients.get(clientId);
      if (ctx) send(ctx.ws, { type: 'topic_message', ...message });
    });
    this.state.on('status', this.onStatus);
    this.timer = setInterval(() => {
      this.state.refresh();
      this.pushStats();
    }, this.pushIntervalMs);
  }

  clientCount(): number {
    return this.clients.size;
  }

  /** Sends every metric channel to its subscribers. */
  pushStats(): void {
    if (!this.state.hasStats() || !this.state.isSysSubscribed()) return;
    const stats = this.state.getStats();
    const now = new Date();
    for (const channel of METRIC_CHANNEL_NAMES) {
      let payload: Record<string, unknown> | null = null;
      for (const ctx of this.clients.values()) {
        if (!ctx.channels.has(channel)) continue;
        payload ??= prepareChannelData(channel, stats, now);
        send(ctx.ws, { type: `${channel}_update`, ...payload });
      }
    }
  }

  async close(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.state.off('status', this.onStatus);
    this.subscriptions.setMessageListener(null);
    for (const ctx of this.clients.values()) ctx.ws.terminate();
    this.clients.clear();
    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
  }

  private handleConnection(ws: WebSocket): void {
    const ctx: ClientCtx = { id: uuidv4(), ws, channels: new Set() };
    this.clients.set(ctx.id, ctx);
    console.log(`[${SERVICE}] ws client ${ctx.id} connected`);

    ws.on('error', (err) => console.warn(`[${SERVICE}] ws client ${ctx.id} error:`, err.message));
    ws.on('message', (data) => {
      this.handleFrame(ctx, rawToString(data)).catch((e) => {
        console.error(`[${SERVICE}] ws frame handling failed:`, errorMessage(e));
        send(ws, { type: 'error', message: 'Internal error' });
      });
    });
    ws.on('close', () => {
      this.clients.delete(ctx.id);
      console.log(`[${SERVICE}] ws client ${ctx.id} disconnected`);
      this.subscriptions
        .unsubscribeClientAll(ctx.id)
        .catch((e) => console.error(`[${SERVICE}] cleanup for ${ctx.id} failed:`, errorMessage(e)));
    });

    send(ws, {
      type: 'connected',
      client_id: ctx.id,
      available_channels: METRIC_CHANNEL_NAMES,
      push_interval_seconds: this.pushIntervalMs / 1000,
    });
  }

  private async handleFrame(ctx: ClientCtx, text: string): Promise<void> {
    const msg = decodeMessage(text);
    const type = isRecord(msg) ? readString(msg, 'type') : undefined;
    if (!isRecord(msg) || !type) {
      send(ctx.ws, { type: 'error', message: 'Invalid message format' });
      return;
    }

    switch (type) {
      case 'subscribe': {
        const channels: MetricChannel[] = [];
        const invalid: unknown[] = [];
        for (const name of channelList(msg.channels)) {
          if (isMetricChannel(name)) {
            ctx.channels.add(name);
            if (!channels.includes(name)) channels.push(name);
          } else {
            invalid.push(name);
          }
        }
        send(ctx.ws, { type: 'subscribed', channels, invalid_channels: invalid });
        const stats = this.state.getStats();
        for (const channel of channels) {
          send(ctx.ws, { type: `${channel}_update`, ...prepareChannelData(channel, stats) });
        }
        return;
      }
      case 'unsubscribe': {
        const channels: MetricChannel[] = [];
        for (const name of channelList(msg.channels)) {
          if (!isMetricChannel(name)) continue;
          ctx.channels.delete(name);
          channels.push(name);
        }
        send(ctx.ws, { type: 'unsubscribed', channels });
        return;
      }
      case 'get_channels':
        send(ctx.ws, { type: 'channels', channels: METRIC_CHANNELS, push_interval_seconds: this.pushIntervalMs / 1000 });
        return;
      case 'ping_broker':
        send(ctx.ws, this.brokerStatusFrame());
        return;
      case 'subscribe_topic':
        await this.subscribeTopic(ctx, msg.topic);
        return;
      case 'unsubscribe_topic': {
        const topic = typeof msg.topic === 'string' ? msg.topic : '';
        if (!topic) {
          send(ctx.ws, { type: 'error', message: 'Topic is required', code: 'invalid_topic_filter' });
          return;
        }
        await this.subscriptions.unsubscribeClient(ctx.id, topic);
        send(ctx.ws, { type: 'topic_unsubscribed', topic });
        return;
      }
      default:
        send(ctx.ws, { type: 'error', message: `Unknown message type: ${type}` });
    }
  }

  private async subscribeTopic(ctx: ClientCtx, raw: unknown): Promise<void> {
    const topic = typeof raw === 'string' ? raw : '';
    if (!isValidTopicFilter(topic)) {
      send(ctx.ws, { type: 'error', message: `Invalid topic filter: ${topic}`, code: 'invalid_topic_filter' });
      return;
    }
    if (!this.state.isBrokerConnected()) {
      send(ctx.ws, { type: 'error', message: 'Not connected to MQTT broker', code: 'broker_disconnected' });
      return;
    }
    const ok = await this.subscriptions.subscribeClient(ctx.id, topic);
    if (ok) send(ctx.ws, { type: 'topic_subscribed', topic });
    else send(ctx.ws, { type: 'error', message: `Failed to subscribe to ${topic}`, code: 'subscribe_failed' });
  }

  private brokerStatusFrame(): Frame {
    return {
      type: 'broker_status',
      connected: this.state.isBrokerConnected(),
      sys_monitor_subscribed: this.state.isSysSubscribed(),
      timestamp: new Date().toISOString(),
    };
  }

  private readonly onStatus = (): void => {
    const frame = this.brokerStatusFrame();
    for (const ctx of this.clients.values()) send(ctx.ws, frame);
  };
}
