import { EventEmitter } from 'eventemitter3';
import {
  RedisChannels,
  createBrokerStats,
  parseStatsUpdate,
  parseStatusChange,
  parseTopicsUpdate,
  statsFromDict,
  topicFromDict,
  type BrokerStats,
  type PubSub,
  type StatsUpdateMessage,
  type StatusChangeMessage,
  type TopicInfo,
} from '@mqtt-dashboard/shared';
import { SERVICE } from './config.js';

type BrokerStateEvents = {
  status: [connected: boolean];
};

/**
 * Latest broker view as published by the bridge. The dashboard never talks to
 * MQTT itself, so every answer here comes from the last Redis message seen.
 */
export class BrokerState extends EventEmitter<BrokerStateEvents> {
  private status: StatusChangeMessage | null = null;
  private statusReceivedAt = 0;
  private stats: StatsUpdateMessage | null = null;
  private sysSubscribed = false;
  private topics: TopicInfo[] = [];
  private inactiveTimeoutSeconds = 0;
  private lastConnected = false;

  constructor(
    private readonly staleMs: number,
    private readonly now: () => number = Date.now,
  ) {
    super();
  }

  async attach(pubsub: PubSub): Promise<void> {
    await pubsub.subscribe(RedisChannels.BROKER_STATUS, (m) => this.handleStatus(m));
    await pubsub.subscribe(RedisChannels.BROKER_STATS, (m) => this.handleStats(m));
    await pubsub.subscribe(RedisChannels.TOPIC_LIST, (m) => this.handleTopics(m));
  }

  handleStatus(message: unknown): void {
    const status = parseStatusChange(message);
    if (!status) {
      console.warn(`[${SERVICE}] ignoring malformed status message`);
      return;
    }
    this.status = status;
    this.statusReceivedAt = this.now();
    this.sysSubscribed = status.sys_subscribed;
    this.refresh();
  }

  handleStats(message: unknown): void {
    const stats = parseStatsUpdate(message);
    if (!stats) {
      console.warn(`[${SERVICE}] ignoring malformed stats message`);
      return;
    }
    this.stats = stats;
    this.sysSubscribed = stats.sys_subscribed;
  }

  handleTopics(message: unknown): void {
    const update = parseTopicsUpdate(message);
    if (!update) {
      console.warn(`[${SERVICE}] ignoring malformed topics message`);
      return;
    }
    const topics: TopicInfo[] = [];
    for (const raw of update.data) {
      const info = topicFromDict(raw);
      if (info) topics.push(info);
    }
    this.topics = topics.sort((a, b) => b.lastSeen.getTime() - a.lastSeen.getTime());
    this.inactiveTimeoutSeconds = update.inactive_timeout_seconds;
  }

  /** Re-evaluates staleness and emits `status` when the connected flag flips. */
  refresh(): void {
    const connected = this.isBrokerConnected();
    if (connected === this.lastConnected) return;
    this.lastConnected = connected;
    console.log(`[${SERVICE}] broker ${connected ? 'connected' : 'disconnected'} (via bridge)`);
    this.emit('status', connected);
  }

  isBrokerConnected(): boolean {
    if (!this.status?.connected) return false;
    return this.now() - this.statusReceivedAt <= this.staleMs;
  }

  isSysSubscribed(): boolean {
    return this.isBrokerConnected() && this.sysSubscribed;
  }

  isTopicTrackerSubscribed(): boolean {
    return this.isBrokerConnected() && (this.status?.topic_tracker_subscribed ?? false);
  }

  lastStatusAt(): string | null {
    return this.status?.timestamp ?? null;
  }

  hasStats(): boolean {
    return this.stats !== null;
  }

  getStats(): BrokerStats {
    return this.stats ? statsFromDict(this.stats.data) : createBrokerStats();
  }

  /** Newest first; topics idle longer than the bridge's timeout are left out unless asked for. */
  getTopics(includeInactive = false): TopicInfo[] {
    if (includeInactive || this.inactiveTimeoutSeconds <= 0) return [...this.topics];
    const cutoff = this.now() - this.inactiveTimeoutSeconds * 1000;
    return this.topics.filter((t) => t.lastSeen.getTime() >= cutoff);
  }

  getTopic(name: string): TopicInfo | undefined {
    return this.getTopics().find((t) => t.topic === name);
  }

  getTopicCount(): number {
    return this.getTopics().length;
  }
}
