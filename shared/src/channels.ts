import { isRecord, readBoolean, readNumber, readString } from './json.js';
import { isQoS, type QoS } from './topic-info.js';

/**
 * Redis pub/sub contract between the bridge (the only MQTT client) and the
 * dashboard. Every message is a JSON object carrying a `type`.
 */
export const RedisChannels = {
  BROKER_STATS: 'mqtt:broker:stats',
  BROKER_STATUS: 'mqtt:broker:status',
  TOPIC_LIST: 'mqtt:topics',
  COMMANDS: 'mqtt:commands',
  COMMAND_RESULTS: 'mqtt:commands:results',
  MQTT_MESSAGES: 'mqtt:messages',
} as const;

export const MessageTypes = {
  STATS_UPDATE: 'stats_update',
  STATUS_CHANGE: 'status_change',
  TOPICS_UPDATE: 'topics_update',
  CMD_PUBLISH: 'cmd_publish',
  CMD_SUBSCRIBE: 'cmd_subscribe',
  CMD_UNSUBSCRIBE: 'cmd_unsubscribe',
  COMMAND_RESULT: 'command_result',
  MESSAGE_RECEIVED: 'message_received',
} as const;

export interface StatsUpdateMessage {
  type: typeof MessageTypes.STATS_UPDATE;
  data: Record<string, unknown>;
  sys_subscribed: boolean;
  timestamp: string;
}

export interface StatusChangeMessage {
  type: typeof MessageTypes.STATUS_CHANGE;
  connected: boolean;
  sys_subscribed: boolean;
  topic_tracker_subscribed: boolean;
  timestamp: string;
}

export interface TopicsUpdateMessage {
  type: typeof MessageTypes.TOPICS_UPDATE;
  data: unknown[];
  inactive_timeout_seconds: number;
  timestamp: string;
}

export interface PublishCommand {
  type: typeof MessageTypes.CMD_PUBLISH;
  request_id?: string;
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
}

export interface SubscribeCommand {
  type: typeof MessageTypes.CMD_SUBSCRIBE;
  request_id?: string;
  topic: string;
  qos?: QoS;
}

export interface UnsubscribeCommand {
  type: typeof MessageTypes.CMD_UNSUBSCRIBE;
  request_id?: string;
  topic: string;
}

export type BridgeCommand = PublishCommand | SubscribeCommand | UnsubscribeCommand;

export interface CommandResultMessage {
  type: typeof MessageTypes.COMMAND_RESULT;
  request_id: string;
  success: boolean;
  code?: string;
  error?: string;
}

export interface MessageReceivedMessage {
  type: typeof MessageTypes.MESSAGE_RECEIVED;
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
  subscription: string;
  timestamp: string;
}

function typed(value: unknown, type: string): Record<string, unknown> | null {
  return isRecord(value) && value.type === type ? value : null;
}

export function parseStatsUpdate(value: unknown): StatsUpdateMessage | null {
  const msg = typed(value, MessageTypes.STATS_UPDATE);
  if (!msg || !isRecord(msg.data)) return null;
  return {
    type: MessageTypes.STATS_UPDATE,
    data: msg.data,
    sys_subscribed: readBoolean(msg, 'sys_subscribed') ?? true,
    timestamp: readString(msg, 'timestamp') ?? new Date().toISOString(),
  };
}

export function parseStatusChange(value: unknown): StatusChangeMessage | null {
  const msg = typed(value, MessageTypes.STATUS_CHANGE);
  if (!msg) return null;
  const connected = readBoolean(msg, 'connected');
  if (connected === undefined) return null;
  return {
    type: MessageTypes.STATUS_CHANGE,
    connected,
    sys_subscribed: readBoolean(msg, 'sys_subscribed') ?? false,
    topic_tracker_subscribed: readBoolean(msg, 'topic_tracker_subscribed') ?? false,
    timestamp: readString(msg, 'timestamp') ?? new Date().toISOString(),
  };
}

export function parseTopicsUpdate(value: unknown): TopicsUpdateMessage | null {
  const msg = typed(value, MessageTypes.TOPICS_UPDATE);
  if (!msg || !Array.isArray(msg.data)) return null;
  return {
    type: MessageTypes.TOPICS_UPDATE,
    data: msg.data,
    inactive_timeout_seconds: readNumber(msg, 'inactive_timeout_seconds') ?? 0,
    timestamp: readString(msg, 'timestamp') ?? new Date().toISOString(),
  };
}

/**
 * Accepts the three command shapes. Publish bodies are only checked for shape
 * here; value validation happens where the command is executed.
 */
export type ParsedCommand = Record<string, unknown> & { type: BridgeCommand['type'] };

export function parseCommand(value: unknown): ParsedCommand | null {
  if (!isRecord(value)) return null;
  const type = value.type;
  if (type === MessageTypes.CMD_PUBLISH || type === MessageTypes.CMD_SUBSCRIBE || type === MessageTypes.CMD_UNSUBSCRIBE) {
    return { ...value, type };
  }
  return null;
}

export function parseCommandResult(value: unknown): CommandResultMessage | null {
  const msg = typed(value, MessageTypes.COMMAND_RESULT);
  if (!msg) return null;
  const requestId = readString(msg, 'request_id');
  const success = readBoolean(msg, 'success');
  if (!requestId || success === undefined) return null;
  return {
    type: MessageTypes.COMMAND_RESULT,
    request_id: requestId,
    success,
    code: readString(msg, 'code'),
    error: readString(msg, 'error'),
  };
}

export function parseMessageReceived(value: unknown): MessageReceivedMessage | null {
  const msg = typed(value, MessageTypes.MESSAGE_RECEIVED);
  if (!msg) return null;
  const topic = readString(msg, 'topic');
  const subscription = readString(msg, 'subscription');
  if (!topic || !subscription) return null;
  return {
    type: MessageTypes.MESSAGE_RECEIVED,
    topic,
    payload: readString(msg, 'payload') ?? '',
    qos: isQoS(msg.qos) ? msg.qos : 0,
    retain: readBoolean(msg, 'retain') ?? false,
    subscription,
    timestamp: readString(msg, 'timestamp') ?? new Date().toISOString(),
  };
}

export function commandResult(requestId: string, outcome: { success: boolean; code?: string; error?: string }): CommandResultMessage {
  return { type: MessageTypes.COMMAND_RESULT, request_id: requestId, ...outcome };
}
