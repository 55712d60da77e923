import { readFileSync } from 'fs';
import { isRecord, readPath, writePath, type JsonObject } from './json.js';

/**
 * Broker statistics as reported by Mosquitto on `$SYS/broker/...`.
 *
 * Field to topic mapping and the nested dictionary layout live in
 * `data/stats-catalog.json`; this module only knows the shape of the model.
 */
export interface BrokerCounters {
  uptime: number;
  clientsConnected: number;
  clientsDisconnected: number;
  clientsTotal: number;
  clientsMaximum: number;
  clientsExpired: number;
  messagesReceived: number;
  messagesSent: number;
  messagesStored: number;
  messagesInflight: number;
  messagesDropped: number;
  publishReceived: number;
  publishSent: number;
  publishDropped: number;
  bytesReceived: number;
  bytesSent: number;
  subscriptionsCount: number;
  retainedMessagesCount: number;
  loadMessagesReceived1min: number;
  loadMessagesReceived5min: number;
  loadMessagesReceived15min: number;
  loadMessagesSent1min: number;
  loadMessagesSent5min: number;
  loadMessagesSent15min: number;
  loadBytesReceived1min: number;
  loadBytesReceived5min: number;
  loadBytesReceived15min: number;
  loadBytesSent1min: number;
  loadBytesSent5min: number;
  loadBytesSent15min: number;
  loadConnections1min: number;
  loadConnections5min: number;
  loadConnections15min: number;
  loadPublishReceived1min: number;
  loadPublishReceived5min: number;
  loadPublishReceived15min: number;
  loadPublishSent1min: number;
  loadPublishSent5min: number;
  loadPublishSent15min: number;
  loadSockets1min: number;
  loadSockets5min: number;
  loadSockets15min: number;
  heapCurrent: number;
  heapMaximum: number;
}

export type CounterField = keyof BrokerCounters;
export type StatsField = 'version' | CounterField;

export interface BrokerStats extends BrokerCounters {
  version: string;
  lastUpdated: string | null;
}

export type ValueKind = 'string' | 'int' | 'float';

export interface CatalogEntry {
  field: StatsField;
  kind: ValueKind;
  path: string[];
  topics: string[];
}

const ZERO_COUNTERS: BrokerCounters = {
  uptime: 0,
  clientsConnected: 0,
  clientsDisconnected: 0,
  clientsTotal: 0,
  clientsMaximum: 0,
  clientsExpired: 0,
  messagesReceived: 0,
  messagesSent: 0,
  messagesStored: 0,
  messagesInflight: 0,
  messagesDropped: 0,
  publishReceived: 0,
  publishSent: 0,
  publishDropped: 0,
  bytesReceived: 0,
  bytesSent: 0,
  subscriptionsCount: 0,
  retainedMessagesCount: 0,
  loadMessagesReceived1min: 0,
  loadMessagesReceived5min: 0,
  loadMessagesReceived15min: 0,
  loadMessagesSent1min: 0,
  loadMessagesSent5min: 0,
  loadMessagesSent15min: 0,
  loadBytesReceived1min: 0,
  loadBytesReceived5min: 0,
  loadBytesReceived15min: 0,
  loadBytesSent1min: 0,
  loadBytesSent5min: 0,
  loadBytesSent15min: 0,
  loadConnections1min: 0,
  loadConnections5min: 0,
  loadConnections15min: 0,
  loadPublishReceived1min: 0,
  loadPublishReceived5min: 0,
  loadPublishReceived15min: 0,
  loadPublishSent1min: 0,
  loadPublishSent5min: 0,
  loadPublishSent15min: 0,
  loadSockets1min: 0,
  loadSockets5min: 0,
  loadSockets15min: 0,
  heapCurrent: 0,
  heapMaximum: 0,
};

export function isCounterField(name: string): name is CounterField {
  return Object.prototype.hasOwnProperty.call(ZERO_COUNTERS, name);
}

function isValueKind(v: unknown): v is ValueKind {
  return v === 'string' || v === 'int' || v === 'float';
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

export function parseCatalog(raw: unknown): CatalogEntry[] {
  if (!Array.isArray(raw)) throw new Error('stats catalog must be an array');
  return raw.map((item, i) => {
    if (!isRecord(item)) throw new Error(`stats catalog entry ${i} is not an object`);
    const { field, kind, path, topics } = item;
    if (typeof field !== 'string' || (field !== 'version' && !isCounterField(field))) {
      throw new Error(`stats catalog entry ${i} has unknown field ${String(field)}`);
    }
    if (!isValueKind(kind)) throw new Error(`stats catalog entry ${i} has invalid kind`);
    if (!isStringArray(path) || path.length === 0) throw new Error(`stats catalog entry ${i} has invalid path`);
    if (!isStringArray(topics)) throw new Error(`stats catalog entry ${i} has invalid topics`);
    if ((field === 'version') !== (kind === 'string')) throw new Error(`stats catalog entry ${i}: only version is a string`);
    return { field, kind, path, topics };
  });
}

export const STATS_CATALOG: readonly CatalogEntry[] = parseCatalog(
  JSON.parse(readFileSync(new URL('../data/stats-catalog.json', import.meta.url), 'utf8')),
);

const BY_TOPIC = new Map<string, CatalogEntry>();
for (const entry of STATS_CATALOG) {
  for (const topic of entry.topics) BY_TOPIC.set(topic, entry);
}

export function catalogEntryForTopic(topic: string): CatalogEntry | undefined {
  return BY_TOPIC.get(topic);
}

export function createBrokerStats(): BrokerStats {
  return { ...ZERO_COUNTERS, version: '', lastUpdated: null };
}

// Mosquitto appends units to some values ("3600 seconds"), so only the first token counts.
export function parseSysValue(payload: string, kind: 'int' | 'float'): number | null {
  const token = payload.trim().split(/\s+/)[0] ?? '';
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(token)) return null;
  const value = Number(token);
  if (!Number.isFinite(value)) return null;
  return kind === 'int' ? Math.trunc(value) : value;
}

/**
 * Applies a single `$SYS` message to `stats`. Returns false when the topic is
 * not part of the catalog or the payload does not parse.
 */
export function applySysMessage(stats: BrokerStats, topic: string, payload: string, now: Date = new Date()): boolean {
  const entry = BY_TOPIC.get(topic);
  if (!entry) return false;
  if (entry.field === 'version') {
    stats.version = payload.trim();
  } else {
    if (entry.kind === 'string') return false;
    const value = parseSysValue(payload, entry.kind);
    if (value === null) return false;
    stats[entry.field] = value;
  }
  stats.lastUpdated = now.toISOString();
  return true;
}

export function statsToDict(stats: BrokerStats): JsonObject {
  const out: JsonObject = {};
  for (const entry of STATS_CATALOG) {
    writePath(out, entry.path, entry.field === 'version' ? stats.version : stats[entry.field]);
  }
  out.last_updated = stats.lastUpdated;
  return out;
}

export function statsFromDict(dict: unknown): BrokerStats {
  const stats = createBrokerStats();
  for (const entry of STATS_CATALOG) {
    const value = readPath(dict, entry.path);
    if (entry.field === 'version') {
      if (typeof value === 'string') stats.version = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      stats[entry.field] = value;
    }
  }
  const updated = readPath(dict, ['last_updated']);
  stats.lastUpdated = typeof updated === 'string' ? updated : null;
  return stats;
}

export function statsToSummary(stats: BrokerStats): JsonObject {
  return {
    version: stats.version,
    uptime: stats.uptime,
    clients_connected: stats.clientsConnected,
    clients_total: stats.clientsTotal,
    messages_received: stats.messagesReceived,
    messages_sent: stats.messagesSent,
    bytes_received: stats.bytesReceived,
    bytes_sent: stats.bytesSent,
    subscriptions: stats.subscriptionsCount,
    retained_messages: stats.retainedMessagesCount,
    last_updated: stats.lastUpdated,
  };
}
