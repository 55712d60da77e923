import { statsToDict, statsToSummary, type BrokerStats, type JsonObject } from '@mqtt-dashboard/shared';

export const METRIC_CHANNELS = {
  broker_stats: 'Full broker statistics',
  broker_summary: 'Summary broker statistics (lightweight)',
  clients: 'Client connection statistics',
  messages: 'Message throughput statistics',
  bytes: 'Byte transfer statistics',
  load: 'Load metrics (1min/5min/15min)',
} as const;

export type MetricChannel = keyof typeof METRIC_CHANNELS;

export function isMetricChannel(name: unknown): name is MetricChannel {
  return typeof name === 'string' && Object.prototype.hasOwnProperty.call(METRIC_CHANNELS, name);
}

export const METRIC_CHANNEL_NAMES = Object.keys(METRIC_CHANNELS).filter(isMetricChannel);

const windows = (one: number, five: number, fifteen: number): JsonObject => ({ '1min': one, '5min': five, '15min': fifteen });

function channelData(channel: MetricChannel, s: BrokerStats): JsonObject {
  switch (channel) {
    case 'broker_stats':
      return statsToDict(s);
    case 'broker_summary':
      return statsToSummary(s);
    case 'clients':
      return {
        connected: s.clientsConnected,
        disconnected: s.clientsDisconnected,
        total: s.clientsTotal,
        maximum: s.clientsMaximum,
        expired: s.clientsExpired,
        connection_rate: windows(s.loadConnections1min, s.loadConnections5min, s.loadConnections15min),
      };
    case 'messages':
      return {
        received: s.messagesReceived,
        sent: s.messagesSent,
        stored: s.messagesStored,
        inflight: s.messagesInflight,
        dropped: s.messagesDropped,
        publish_received: s.publishReceived,
        publish_sent: s.publishSent,
        publish_dropped: s.publishDropped,
        rate: {
          received_1min: s.loadMessagesReceived1min,
          received_5min: s.loadMessagesReceived5min,
          received_15min: s.loadMessagesReceived15min,
          sent_1min: s.loadMessagesSent1min,
          sent_5min: s.loadMessagesSent5min,
          sent_15min: s.loadMessagesSent15min,
        },
      };
    case 'bytes':
      return {
        received: s.bytesReceived,
        sent: s.bytesSent,
        rate: {
          received_1min: s.loadBytesReceived1min,
          received_5min: s.loadBytesReceived5min,
          received_15min: s.loadBytesReceived15min,
          sent_1min: s.loadBytesSent1min,
          sent_5min: s.loadBytesSent5min,
          sent_15min: s.loadBytesSent15min,
        },
      };
    case 'load':
      return {
        messages: {
          received: windows(s.loadMessagesReceived1min, s.loadMessagesReceived5min, s.loadMessagesReceived15min),
          sent: windows(s.loadMessagesSent1min, s.loadMessagesSent5min, s.loadMessagesSent15min),
        },
        bytes: {
          received: windows(s.loadBytesReceived1min, s.loadBytesReceived5min, s.loadBytesReceived15min),
          sent: windows(s.loadBytesSent1min, s.loadBytesSent5min, s.loadBytesSent15min),
        },
        connections: windows(s.loadConnections1min, s.loadConnections5min, s.loadConnections15min),
        publish: {
          received: windows(s.loadPublishReceived1min, s.loadPublishReceived5min, s.loadPublishReceived15min),
          sent: windows(s.loadPublishSent1min, s.loadPublishSent5min, s.loadPublishSent15min),
        },
        sockets: windows(s.loadSockets1min, s.loadSockets5min, s.loadSockets15min),
      };
  }
}

/** Payload of a `<channel>_update` frame. */
export function prepareChannelData(channel: MetricChannel, stats: BrokerStats, now: Date = new Date()): JsonObject {
  return { data: channelData(channel, stats), timestamp: now.toISOString() };
}
