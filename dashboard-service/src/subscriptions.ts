import { RedisChannels, errorMessage, parseMessageReceived, type PubSub, type QoS } from '@mqtt-dashboard/shared';
import type { BridgeCommands } from './commands.js';
import { SERVICE } from './config.js';

export interface TopicMessage {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
  subscription: string;
  timestamp: string;
}

export type TopicMessageListener = (clientId: string, message: TopicMessage) => void;

/**
 * Per-client MQTT filter subscriptions for WebSocket clients. The bridge is
 * asked to subscribe a filter when its first client arrives and to drop it
 * when the last one leaves.
 */
export class SubscriptionManager {
  private readonly clientTopics = new Map<string, Set<string>>();
  private readonly topicClients = new Map<string, Set<string>>();
  private readonly inflight = new Map<string, Promise<boolean>>();
  private listener: TopicMessageListener | null = null;

  constructor(
    private readonly commands: Pick<BridgeCommands, 'subscribe' | 'unsubscribe'>,
    private readonly pubsub: PubSub,
  ) {}

  async attach(): Promise<void> {
    await this.pubsub.subscribe(RedisChannels.MQTT_MESSAGES, (m) => this.handleMessage(m));
  }

  setMessageListener(listener: TopicMessageListener | null): void {
    this.listener = listener;
  }

  async subscribeClient(clientId: string, topic: string): Promise<boolean> {
    const already = this.topicClients.get(topic)?.has(clientId) ?? false;
    this.attachClient(clientId, topic);

    const pending = this.inflight.get(topic);
    if (pending) {
      const ok = await pending;
      if (!ok && !already) this.detachClient(clientId, topic);
      return ok;
    }
    if ((this.topicClients.get(topic)?.size ?? 0) > 1 || already) return true;

    const request = this.commands.subscribe(topic).then((outcome) => {
      if (!outcome.success) console.warn(`[${SERVICE}] bridge refused ${topic}: ${outcome.code ?? 'unknown'}`);
      return outcome.success;
    });
    this.inflight.set(topic, request);
    const ok = await request;
    this.inflight.delete(topic);

    if (!ok) {
      this.detachClient(clientId, topic);
      return false;
    }
    console.log(`[${SERVICE}] client ${clientId} subscribed to ${topic}`);
    if (!this.topicClients.has(topic)) {
      // everyone left while the subscribe was in flight
      await this.releaseTopic(topic);
    }
    return true;
  }

  async unsubscribeClient(clientId: string, topic: string): Promise<boolean> {
    const emptied = this.detachClient(clientId, topic);
    if (emptied && !this.inflight.has(topic)) await this.releaseTopic(topic);
    return true;
  }

  async unsubscribeClientAll(clientId: string): Promise<void> {
    for (const topic of this.getClientSubscriptions(clientId)) {
      await this.unsubscribeClient(clientId, topic);
    }
  }

  getClientSubscriptions(clientId: string): string[] {
    return [...(this.clientTopics.get(clientId) ?? [])];
  }

  getTopicSubscribers(topic: string): string[] {
    return [...(this.topicClients.get(topic) ?? [])];
  }

  getAllSubscriptions(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [clientId, topics] of this.clientTopics) out[clientId] = [...topics];
    return out;
  }

  handleMessage(raw: unknown): void {
    const msg = parseMessageReceived(raw);
    if (!msg) return;
    const clients = this.topicClients.get(msg.subscription);
    if (!clients || !this.listener) return;
    const { topic, payload, qos, retain, subscription, timestamp } = msg;
    for (const clientId of clients) {
      try {
        this.listener(clientId, { topic, payload, qos, retain, subscription, timestamp });
      } catch (e) {
        console.error(`[${SERVICE}] forwarding to ${clientId} failed:`, errorMessage(e));
      }
    }
  }

  private attachClient(clientId: string, topic: string): void {
    let clients = this.topicClients.get(topic);
    if (!clients) {
      clients = new Set();
      this.topicClients.set(topic, clients);
    }
    clients.add(clientId);
    let topics = this.clientTopics.get(clientId);
    if (!topics) {
      topics = new Set();
      this.clientTopics.set(clientId, topics);
    }
    topics.add(topic);
  }

  /** Returns true when this removal left the topic without subscribers. */
  private detachClient(clientId: string, topic: string): boolean {
    const topics = this.clientTopics.get(clientId);
    if (topics) {
      topics.delete(topic);
      if (topics.size === 0) this.clientTopics.delete(clientId);
    }
    const clients = this.topicClients.get(topic);
    if (!clients?.delete(clientId)) return false;
    if (clients.size > 0) return false;
    this.topicClients.delete(topic);
    return true;
  }

  private async releaseTopic(topic: string): Promise<void> {
    const outcome = await this.commands.unsubscribe(topic);
    if (outcome.success) console.log(`[${SERVICE}] released ${topic}`);
    else console.warn(`[${SERVICE}] bridge unsubscribe of ${topic} failed: ${outcome.code ?? 'unknown'}`);
  }
}
