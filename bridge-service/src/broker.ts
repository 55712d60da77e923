import { connect, type IClientOptions } from 'mqtt';
import { EventEmitter } from 'eventemitter3';
import { existsSync, readFileSync } from 'fs';
import { errorMessage, topicMatches, type QoS } from '@mqtt-dashboard/shared';
import { SERVICE } from './config.js';

export interface BrokerMessage {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
  /** The registered filter that matched `topic`. */
  subscription: string;
}

export type MessageCallback = (message: BrokerMessage) => void;

/** The slice of `MqttClient` the connection drives. */
export interface MqttTransport {
  readonly connected: boolean;
  subscribeAsync(topic: string, opts: { qos: QoS }): Promise<Array<{ qos: number }>>;
  unsubscribeAsync(topic: string): Promise<unknown>;
  publishAsync(topic: string, message: string, opts: { qos: QoS; retain: boolean }): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

interface Registration {
  qos: QoS;
  callbacks: Set<MessageCallback>;
  active: boolean;
}

type BrokerEvents = {
  connected: [];
  disconnected: [];
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodePayload(payload: Buffer): string {
  try {
    return utf8.decode(payload);
  } catch {
    return payload.toString('hex');
  }
}

/**
 * Owns the MQTT session: keeps a filter -> callbacks registry, replays it on
 * every (re)connect and fans incoming messages out to matching callbacks.
 */
export class BrokerConnection extends EventEmitter<BrokerEvents> {
  private readonly registry = new Map<string, Registration>();
  private online = false;

  constructor(private readonly transport: MqttTransport) {
    super();
  }

  get isConnected(): boolean {
    return this.transport.connected;
  }

  isActive(filter: string): boolean {
    return this.registry.get(filter)?.active ?? false;
  }

  filters(): string[] {
    return [...this.registry.keys()];
  }

  async subscribe(filter: string, callback: MessageCallback, qos: QoS = 0): Promise<boolean> {
    let reg = this.registry.get(filter);
    if (!reg) {
      reg = { qos, callbacks: new Set(), active: false };
      this.registry.set(filter, reg);
    }
    reg.callbacks.add(callback);
    if (!this.transport.connected) return false;
    if (reg.active) return true;

    const ok = await this.sendSubscribe(filter, reg);
    if (!ok) {
      reg.callbacks.delete(callback);
      if (reg.callbacks.size === 0) this.registry.delete(filter);
    }
    return ok;
  }

  async unsubscribe(filter: string, callback?: MessageCallback): Promise<boolean> {
    const reg = this.registry.get(filter);
    if (!reg) return true;
    if (callback) reg.callbacks.delete(callback);
    else reg.callbacks.clear();
    if (reg.callbacks.size > 0) return true;

    this.registry.delete(filter);
    if (!reg.active || !this.transport.connected) return true;
    try {
      await this.transport.unsubscribeAsync(filter);
      console.log(`[${SERVICE}] unsubscribed from ${filter}`);
      return true;
    } catch (e) {
      console.error(`[${SERVICE}] unsubscribe error for ${filter}:`, errorMessage(e));
      return false;
    }
  }

  async publish(topic: string, payload: string, opts: { qos: QoS; retain: boolean }): Promise<boolean> {
    if (!this.transport.connected) {
      console.warn(`[${SERVICE}] cannot publish to ${topic}: not connected`);
      return false;
    }
    try {
      await this.transport.publishAsync(topic, payload, opts);
      return true;
    } catch (e) {
      console.error(`[${SERVICE}] publish error for ${topic}:`, errorMessage(e));
      return false;
    }
  }

  async handleConnect(): Promise<void> {
    this.online = true;
    console.log(`[${SERVICE}] connected to MQTT`);
    await Promise.all([...this.registry].map(([filter, reg]) => this.sendSubscribe(filter, reg)));
    this.emit('connected');
  }

  handleClose(): void {
    for (const reg of this.registry.values()) reg.active = false;
    if (!this.online) return;
    this.online = false;
    console.warn(`[${SERVICE}] mqtt connection closed`);
    this.emit('disconnected');
  }

  handleMessage(topic: string, payload: Buffer, qos: QoS, retain: boolean): void {
    const text = decodePayload(payload);
    for (const [filter, reg] of this.registry) {
      if (!topicMatches(filter, topic)) continue;
      for (const callback of [...reg.callbacks]) {
        try {
          callback({ topic, payload: text, qos, retain, subscription: filter });
        } catch (e) {
          console.error(`[${SERVICE}] message handler error on ${topic}:`, errorMessage(e));
        }
      }
    }
  }

  async close(): Promise<void> {
    try {
      await this.transport.endAsync();
    } catch (e) {
      console.warn(`[${SERVICE}] error closing MQTT client:`, errorMessage(e));
    }
  }

  private async sendSubscribe(filter: string, reg: Registration): Promise<boolean> {
    try {
      const grants = await this.transport.subscribeAsync(filter, { qos: reg.qos });
      const granted = grants.every((g) => g.qos !== 128);
      reg.active = granted;
      if (granted) console.log(`[${SERVICE}] subscribed to ${filter}`);
      else console.error(`[${SERVICE}] broker rejected subscription to ${filter}`);
      return granted;
    } catch (e) {
      reg.active = false;
      console.error(`[${SERVICE}] subscribe error for ${filter}:`, errorMessage(e));
      return false;
    }
  }
}

export interface BrokerConfig {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  keepalive: number;
  reconnectMs: number;
  tlsCa?: string;
  tlsCert?: string;
  tlsKey?: string;
  rejectUnauthorized: boolean;
}

function readTlsFile(label: string, file: string | undefined, usingTls: boolean): Buffer | undefined {
  if (!usingTls || !file) return undefined;
  if (!existsSync(file)) {
    console.warn(`[${SERVICE}] WARNING: ${label} path set but file not found: ${file}`);
    return undefined;
  }
  return readFileSync(file);
}

export function connectBroker(config: BrokerConfig): BrokerConnection {
  const usingTls = config.url.startsWith('mqtts://');
  const options: IClientOptions = {
    clientId: config.clientId,
    username: config.username,
    password: config.password,
    keepalive: config.keepalive,
    reconnectPeriod: config.reconnectMs,
    // BrokerConnection replays its own registry on connect
    resubscribe: false,
    ca: readTlsFile('MQTT_TLS_CA', config.tlsCa, usingTls),
    cert: readTlsFile('MQTT_TLS_CERT', config.tlsCert, usingTls),
    key: readTlsFile('MQTT_TLS_KEY', config.tlsKey, usingTls),
    rejectUnauthorized: config.rejectUnauthorized,
  };

  console.log(`[${SERVICE}] MQTT config: url=${config.url} clientId=${config.clientId} ca=${config.tlsCa || 'unset'} cert=${config.tlsCert || 'unset'} key=${config.tlsKey || 'unset'} rejectUnauthorized=${config.rejectUnauthorized}`);

  const client = connect(config.url, options);
  const broker = new BrokerConnection(client);
  client.on('connect', () => {
    broker.handleConnect().catch((e) => console.error(`[${SERVICE}] resubscribe failed:`, errorMessage(e)));
  });
  client.on('close', () => broker.handleClose());
  client.on('error', (err) => console.error(`[${SERVICE}] mqtt error`, err.message));
  client.on('reconnect', () => console.log(`[${SERVICE}] mqtt reconnecting...`));
  client.on('message', (topic, payload, packet) => broker.handleMessage(topic, payload, packet.qos, packet.retain));
  return broker;
}
