import type { Server } from 'http';
import {
  RedisChannels,
  applySysMessage,
  commandResult,
  createBrokerStats,
  isRecord,
  readString,
  statsToDict,
  type BrokerStats,
} from '@mqtt-dashboard/shared';
import type { MemoryPubSub } from '@mqtt-dashboard/shared/testing';
import type { CommandOutcome } from '../commands.js';

export const T0 = '2024-05-01T12:00:00.000Z';
export const T0_MS = Date.parse(T0);

export function statusMessage(overrides: Record<string, unknown> = {}) {
  return {
    type: 'status_change',
    connected: true,
    sys_subscribed: true,
    topic_tracker_subscribed: true,
    timestamp: T0,
    ...overrides,
  };
}

export function sampleStats(): BrokerStats {
  const stats = createBrokerStats();
  const at = new Date(T0);
  const feed: Array<[string, string]> = [
    ['$SYS/broker/version', 'mosquitto version 2.0.18'],
    ['$SYS/broker/uptime', '7200 seconds'],
    ['$SYS/broker/clients/connected', '4'],
    ['$SYS/broker/clients/disconnected', '2'],
    ['$SYS/broker/clients/total', '6'],
    ['$SYS/broker/clients/maximum', '9'],
    ['$SYS/broker/clients/expired', '1'],
    ['$SYS/broker/messages/received', '150'],
    ['$SYS/broker/messages/sent', '120'],
    ['$SYS/broker/bytes/received', '4096'],
    ['$SYS/broker/bytes/sent', '2048'],
    ['$SYS/broker/load/connections/1min', '0.5'],
    ['$SYS/broker/load/connections/5min', '0.3'],
    ['$SYS/broker/load/connections/15min', '0.2'],
  ];
  for (const [topic, payload] of feed) applySysMessage(stats, topic, payload, at);
  return stats;
}

export function statsMessage(stats: BrokerStats = sampleStats(), sysSubscribed = true) {
  return { type: 'stats_update', data: statsToDict(stats), sys_subscribed: sysSubscribed, timestamp: T0 };
}

export function topicDict(topic: string, lastSeen: string, count = 1) {
  return {
    topic,
    message_count: count,
    last_payload: 'x',
    last_qos: 0,
    last_retained: false,
    first_seen: lastSeen,
    last_seen: lastSeen,
  };
}

export function topicsMessage(data: unknown[], inactiveTimeoutSeconds = 3600) {
  return { type: 'topics_update', data, inactive_timeout_seconds: inactiveTimeoutSeconds, timestamp: T0 };
}

/** Answers every command on the bus the way the bridge would. */
export async function fakeBridge(
  pubsub: MemoryPubSub,
  respond: (command: Record<string, unknown>) => CommandOutcome = () => ({ success: true }),
): Promise<Array<Record<string, unknown>>> {
  const received: Array<Record<string, unknown>> = [];
  await pubsub.subscribe(RedisChannels.COMMANDS, (message) => {
    if (!isRecord(message)) return;
    received.push(message);
    const requestId = readString(message, 'request_id');
    if (requestId) void pubsub.publish(RedisChannels.COMMAND_RESULTS, commandResult(requestId, respond(message)));
  });
  return received;
}

export function baseUrl(server: Server, scheme = 'http'): string {
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  return `${scheme}://127.0.0.1:${address.port}`;
}
