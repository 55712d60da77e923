import { EventEmitter } from 'eventemitter3';
import type { TopicInfo } from '@mqtt-dashboard/shared';
import type { BrokerConnection, BrokerMessage } from './broker.js';
import { SERVICE } from './config.js';
import { SYS_FILTER } from './sys-monitor.js';

export const ALL_TOPICS_FILTER = '#';

/** Cuts `payload` to `max` code points, marking the cut with `...`. */
export function truncatePayload(payload: string, max: number): string {
  const chars = Array.from(payload);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : payload;
}

export interface TopicTrackerOptions {
  /** Seconds without traffic before a topic is pruned; 0 keeps topics forever. */
  inactiveTimeoutSeconds: number;
  maxPayloadSize: number;
  trackSysTopics: boolean;
}

type TopicTrackerEvents = {
  update: [info: TopicInfo];
};

export class TopicTracker extends EventEmitter<TopicTrackerEvents> {
  private readonly topics = new Map<string, TopicInfo>();
  private readonly onMessage = (msg: BrokerMessage) => this.handle(msg);

  constructor(
    private readonly broker: BrokerConnection,
    private readonly options: TopicTrackerOptions,
    private readonly now: () => Date = () => new Date(),
  ) {
    super();
  }

  get isSubscribed(): boolean {
    return this.broker.isActive(ALL_TOPICS_FILTER);
  }

  get inactiveTimeoutSeconds(): number {
    return this.options.inactiveTimeoutSeconds;
  }

  async start(): Promise<boolean> {
    const ok = await this.broker.subscribe(ALL_TOPICS_FILTER, this.onMessage);
    if (this.options.trackSysTopics) await this.broker.subscribe(SYS_FILTER, this.onMessage);
    if (!ok) console.warn(`[${SERVICE}] topic tracking pending until broker connection`);
    return ok;
  }

  async stop(): Promise<void> {
    await this.broker.unsubscribe(ALL_TOPICS_FILTER, this.onMessage);
    if (this.options.trackSysTopics) await this.broker.unsubscribe(SYS_FILTER, this.onMessage);
  }

  /** Newest first. */
  getTopics(includeInactive = false): TopicInfo[] {
    if (!includeInactive) this.prune();
    return [...this.topics.values()].sort((a, b) => b.lastSeen.getTime() - a.lastSeen.getTime());
  }

  getTopic(name: string): TopicInfo | undefined {
    return this.topics.get(name);
  }

  getTopicCount(): number {
    this.prune();
    return this.topics.size;
  }

  clear(): void {
    this.topics.clear();
    console.log(`[${SERVICE}] cleared all tracked topics`);
  }

  private handle(msg: BrokerMessage): void {
    if (!this.options.trackSysTopics && msg.topic.startsWith('$SYS/')) return;
    const payload = truncatePayload(msg.payload, this.options.maxPayloadSize);
    const now = this.now();

    let info = this.topics.get(msg.topic);
    if (info) {
      info.messageCount += 1;
      info.lastPayload = payload;
      info.lastQos = msg.qos;
      info.lastRetained = msg.retain;
      info.lastSeen = now;
    } else {
      info = {
        topic: msg.topic,
        messageCount: 1,
        lastPayload: payload,
        lastQos: msg.qos,
        lastRetained: msg.retain,
        firstSeen: now,
        lastSeen: now,
      };
      this.topics.set(msg.topic, info);
    }
    this.emit('update', info);
  }

  private prune(): void {
    const timeout = this.options.inactiveTimeoutSeconds;
    if (timeout <= 0) return;
    const cutoff = this.now().getTime() - timeout * 1000;
    let removed = 0;
    for (const [name, info] of this.topics) {
      if (info.lastSeen.getTime() < cutoff) {
        this.topics.delete(name);
        removed++;
      }
    }
    if (removed) console.log(`[${SERVICE}] pruned ${removed} inactive topics`);
  }
}
