import {
  MessageTypes,
  RedisChannels,
  commandResult,
  errorMessage,
  isQoS,
  isRecord,
  isValidTopicFilter,
  parseCommand,
  readString,
  statsToDict,
  topicToDict,
  validatePublishRequest,
  type MessageReceivedMessage,
  type ParsedCommand,
  type PubSub,
  type StatsUpdateMessage,
  type StatusChangeMessage,
  type TopicsUpdateMessage,
} from '@mqtt-dashboard/shared';
import type { BrokerConnection, BrokerMessage, MessageCallback } from './broker.js';
import { SERVICE } from './config.js';
import type { SysMonitor } from './sys-monitor.js';
import type { TopicTracker } from './topic-tracker.js';

export interface BridgeOptions {
  statsIntervalMs: number;
  topicsIntervalMs: number;
  heartbeatMs: number;
}

interface CommandOutcome {
  success: boolean;
  code?: string;
  error?: string;
}

/**
 * Republishes broker state to Redis and executes commands received from it.
 * This process is the only MQTT client; dashboards talk to it through Redis.
 */
export class MqttRedisBridge {
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly forwarded = new Map<string, MessageCallback>();
  private running = false;

  constructor(
    private readonly broker: BrokerConnection,
    private readonly pubsub: PubSub,
    private readonly sysMonitor: SysMonitor,
    private readonly topicTracker: TopicTracker,
    private readonly options: BridgeOptions,
  ) {}

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    console.log(`[${SERVICE}] starting bridge`);

    this.broker.on('connected', this.onConnected);
    this.broker.on('disconnected', this.onDisconnected);
    await this.pubsub.subscribe(RedisChannels.COMMANDS, (message) => {
      this.handleCommand(message).catch((e) => console.error(`[${SERVICE}] command handling failed:`, errorMessage(e)));
    });

    await this.sysMonitor.start();
    await this.topicTracker.start();
    await this.publishStatus();

    this.timers.push(
      setInterval(() => void this.publishStats(), this.options.statsIntervalMs),
      setInterval(() => void this.publishTopics(), this.options.topicsIntervalMs),
      setInterval(() => void this.publishStatus(), this.options.heartbeatMs),
    );
    console.log(`[${SERVICE}] bridge running`);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (const t of this.timers.splice(0)) clearInterval(t);
    this.broker.off('connected', this.onConnected);
    this.broker.off('disconnected', this.onDisconnected);

    await this.pubsub.unsubscribe(RedisChannels.COMMANDS);
    for (const [topic, callback] of this.forwarded) await this.broker.unsubscribe(topic, callback);
    this.forwarded.clear();
    await this.topicTracker.stop();
    await this.sysMonitor.stop();
    await this.publishStatus(false);
    console.log(`[${SERVICE}] bridge stopped`);
  }

  forwardedTopics(): string[] {
    return [...this.forwarded.keys()];
  }

  async publishStatus(connected: boolean = this.broker.isConnected): Promise<boolean> {
    const message: StatusChangeMessage = {
      type: MessageTypes.STATUS_CHANGE,
      connected,
      sys_subscribed: connected && this.sysMonitor.isSubscribed,
      topic_tracker_subscribed: connected && this.topicTracker.isSubscribed,
      timestamp: new Date().toISOString(),
    };
    return this.pubsub.publish(RedisChannels.BROKER_STATUS, message);
  }

  async publishStats(): Promise<boolean> {
    if (!this.sysMonitor.hasData) return false;
    const message: StatsUpdateMessage = {
      type: MessageTypes.STATS_UPDATE,
      data: statsToDict(this.sysMonitor.getStats()),
      sys_subscribed: this.sysMonitor.isSubscribed,
      timestamp: new Date().toISOString(),
    };
    return this.pubsub.publish(RedisChannels.BROKER_STATS, message);
  }

  async publishTopics(): Promise<boolean> {
    const message: TopicsUpdateMessage = {
      type: MessageTypes.TOPICS_UPDATE,
      data: this.topicTracker.getTopics().map(topicToDict),
      inactive_timeout_seconds: this.topicTracker.inactiveTimeoutSeconds,
      timestamp: new Date().toISOString(),
    };
    return this.pubsub.publish(RedisChannels.TOPIC_LIST, message);
  }

  async handleCommand(message: unknown): Promise<void> {
    const requestId = isRecord(message) ? readString(message, 'request_id') : undefined;
    const command = parseCommand(message);
    let outcome: CommandOutcome;
    if (command) {
      outcome = await this.execute(command);
      if (!outcome.success) console.warn(`[${SERVICE}] ${command.type} failed: ${outcome.code} ${outcome.error ?? ''}`);
    } else {
      console.error(`[${SERVICE}] dropping malformed command`);
      outcome = { success: false, code: 'invalid_request', error: 'Malformed command' };
    }
    if (requestId) await this.pubsub.publish(RedisChannels.COMMAND_RESULTS, commandResult(requestId, outcome));
  }

  private execute(command: ParsedCommand): Promise<CommandOutcome> {
    switch (command.type) {
      case MessageTypes.CMD_PUBLISH:
        return this.executePublish(command);
      case MessageTypes.CMD_SUBSCRIBE:
        return this.executeSubscribe(command);
      case MessageTypes.CMD_UNSUBSCRIBE:
        return this.executeUnsubscribe(command);
    }
  }

  private async executePublish(command: Record<string, unknown>): Promise<CommandOutcome> {
    const checked = validatePublishRequest(command);
    if (!checked.ok) return { success: false, code: checked.code, error: checked.error };
    if (!this.broker.isConnected) return { success: false, code: 'broker_disconnected', error: 'Not connected to MQTT broker' };
    const { topic, payload, qos, retain } = checked.value;
    const ok = await this.broker.publish(topic, payload, { qos, retain });
    if (ok) console.log(`[${SERVICE}] published to ${topic}`);
    return ok ? { success: true } : { success: false, code: 'publish_failed', error: 'Failed to publish message' };
  }

  private async executeSubscribe(command: Record<string, unknown>): Promise<CommandOutcome> {
    const topic = readString(command, 'topic') ?? '';
    if (!isValidTopicFilter(topic)) return { success: false, code: 'invalid_topic_filter', error: `Invalid topic filter: ${topic}` };
    if (!this.broker.isConnected) return { success: false, code: 'broker_disconnected', error: 'Not connected to MQTT broker' };
    if (this.forwarded.has(topic)) return { success: true };

    const callback: MessageCallback = (msg) => void this.forward(msg);
    this.forwarded.set(topic, callback);
    const ok = await this.broker.subscribe(topic, callback, isQoS(command.qos) ? command.qos : 0);
    if (!ok) {
      this.forwarded.delete(topic);
      return { success: false, code: 'subscribe_failed', error: `Failed to subscribe to ${topic}` };
    }
    return { success: true };
  }

  private async executeUnsubscribe(command: Record<string, unknown>): Promise<CommandOutcome> {
    const topic = readString(command, 'topic');
    if (!topic) return { success: false, code: 'invalid_topic_filter', error: 'Topic is required' };
    const callback = this.forwarded.get(topic);
    if (!callback) return { success: true };
    this.forwarded.delete(topic);
    const ok = await this.broker.unsubscribe(topic, callback);
    return ok ? { success: true } : { success: false, code: 'unsubscribe_failed', error: `Failed to unsubscribe from ${topic}` };
  }

  private async forward(msg: BrokerMessage): Promise<void> {
    const message: MessageReceivedMessage = {
      type: MessageTypes.MESSAGE_RECEIVED,
      topic: msg.topic,
      payload: msg.payload,
      qos: msg.qos,
      retain: msg.retain,
      subscription: msg.subscription,
      timestamp: new Date().toISOString(),
    };
    await this.pubsub.publish(RedisChannels.MQTT_MESSAGES, message);
  }

  private readonly onConnected = (): void => {
    void this.publishStatus(true);
  };

  private readonly onDisconnected = (): void => {
    void this.publishStatus(false);
  };
}
