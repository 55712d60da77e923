import { EventEmitter } from 'eventemitter3';
import { applySysMessage, catalogEntryForTopic, createBrokerStats, type BrokerStats, type StatsField } from '@mqtt-dashboard/shared';
import type { BrokerConnection, BrokerMessage } from './broker.js';
import { SERVICE } from './config.js';

export const SYS_FILTER = '$SYS/#';

type SysMonitorEvents = {
  update: [field: StatsField, stats: BrokerStats];
};

/** Folds `$SYS/broker/...` messages into a single BrokerStats snapshot. */
export class SysMonitor extends EventEmitter<SysMonitorEvents> {
  private stats: BrokerStats = createBrokerStats();
  private readonly onMessage = (msg: BrokerMessage) => this.handle(msg);

  constructor(private readonly broker: BrokerConnection) {
    super();
  }

  get isSubscribed(): boolean {
    return this.broker.isActive(SYS_FILTER);
  }

  get hasData(): boolean {
    return this.stats.lastUpdated !== null;
  }

  async start(): Promise<boolean> {
    const ok = await this.broker.subscribe(SYS_FILTER, this.onMessage);
    if (!ok) console.warn(`[${SERVICE}] $SYS monitoring pending until broker connection`);
    return ok;
  }

  async stop(): Promise<void> {
    await this.broker.unsubscribe(SYS_FILTER, this.onMessage);
  }

  getStats(): BrokerStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = createBrokerStats();
  }

  private handle(msg: BrokerMessage): void {
    const entry = catalogEntryForTopic(msg.topic);
    if (!entry) return;
    if (applySysMessage(this.stats, msg.topic, msg.payload)) {
      this.emit('update', entry.field, this.stats);
    }
  }
}
