import { isRecord, readBoolean, readNumber, readString, type JsonObject } from './json.js';

export type QoS = 0 | 1 | 2;

export function isQoS(value: unknown): value is QoS {
  return value === 0 || value === 1 || value === 2;
}

export interface TopicInfo {
  topic: string;
  messageCount: number;
  lastPayload: string;
  lastQos: QoS;
  lastRetained: boolean;
  firstSeen: Date;
  lastSeen: Date;
}

export function topicToDict(info: TopicInfo): JsonObject {
  return {
    topic: info.topic,
    message_count: info.messageCount,
    last_payload: info.lastPayload,
    last_qos: info.lastQos,
    last_retained: info.lastRetained,
    first_seen: info.firstSeen.toISOString(),
    last_seen: info.lastSeen.toISOString(),
  };
}

export function topicToSummary(info: TopicInfo): JsonObject {
  return {
    topic: info.topic,
    message_count: info.messageCount,
    last_seen: info.lastSeen.toISOString(),
  };
}

function readDate(obj: Record<string, unknown>, key: string): Date | null {
  const raw = readString(obj, key);
  if (raw === undefined) return null;
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function topicFromDict(value: unknown): TopicInfo | null {
  if (!isRecord(value)) return null;
  const topic = readString(value, 'topic');
  const firstSeen = readDate(value, 'first_seen');
  const lastSeen = readDate(value, 'last_seen');
  if (!topic || !firstSeen || !lastSeen) return null;
  const qos = value.last_qos;
  return {
    topic,
    messageCount: readNumber(value, 'message_count') ?? 0,
    lastPayload: readString(value, 'last_payload') ?? '',
    lastQos: isQoS(qos) ? qos : 0,
    lastRetained: readBoolean(value, 'last_retained') ?? false,
    firstSeen,
    lastSeen,
  };
}
