import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RedisChannels, isRecord } from '@mqtt-dashboard/shared';
import { MemoryPubSub, flushDeliveries } from '@mqtt-dashboard/shared/testing';
import { BrokerConnection } from '../broker.js';
import { MqttRedisBridge } from '../bridge.js';
import { SysMonitor } from '../sys-monitor.js';
import { TopicTracker } from '../topic-tracker.js';
import { FakeTransport } from './fake-transport.js';

const T0 = '2024-05-01T12:00:00.000Z';

describe('MqttRedisBridge', () => {
  let transport: FakeTransport;
  let broker: BrokerConnection;
  let pubsub: MemoryPubSub;
  let bridge: MqttRedisBridge;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] });
    vi.setSystemTime(new Date(T0));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    transport = new FakeTransport();
    broker = new BrokerConnection(transport);
    await broker.handleConnect();
    pubsub = new MemoryPubSub();
    const sysMonitor = new SysMonitor(broker);
    const topicTracker = new TopicTracker(broker, { inactiveTimeoutSeconds: 3600, maxPayloadSize: 1024, trackSysTopics: false });
    bridge = new MqttRedisBridge(broker, pubsub, sysMonitor, topicTracker, {
      statsIntervalMs: 5000,
      topicsIntervalMs: 10000,
      heartbeatMs: 10000,
    });
    await bridge.start();
  });

  afterEach(async () => {
    await bridge.stop();
    vi.useRealTimers();
  });

  it('listens for commands and announces its status at start', () => {
    expect(pubsub.subscribedChannels()).toEqual([RedisChannels.COMMANDS]);
    expect(transport.subscribed.map((s) => s.topic)).toEqual(['$SYS/#', '#']);
    expect(pubsub.messagesOn(RedisChannels.BROKER_STATUS)).toEqual([
      { type: 'status_change', connected: true, sys_subscribed: true, topic_tracker_subscribed: true, timestamp: T0 },
    ]);
  });

  it('publishes stats only once $SYS data has arrived', async () => {
    await vi.advanceTimersByTimeAsync(5000);
    expect(pubsub.messagesOn(RedisChannels.BROKER_STATS)).toEqual([]);

    broker.handleMessage('$SYS/broker/clients/connected', Buffer.from('3'), 0, false);
    await vi.advanceTimersByTimeAsync(5000);
    const [stats] = pubsub.messagesOn(RedisChannels.BROKER_STATS);
    expect(stats).toMatchObject({
      type: 'stats_update',
      sys_subscribed: true,
      timestamp: '2024-05-01T12:00:10.000Z',
      data: { clients: { connected: 3 }, last_updated: '2024-05-01T12:00:05.000Z' },
    });
  });

  it('publishes the topic list and a status heartbeat on their intervals', async () => {
    broker.handleMessage('sensors/1', Buffer.from('on'), 1, true);
    await vi.advanceTimersByTimeAsync(10000);

    expect(pubsub.messagesOn(RedisChannels.TOPIC_LIST)).toEqual([
      {
        type: 'topics_update',
        data: [
          {
            topic: 'sensors/1',
            message_count: 1,
            last_payload: 'on',
            last_qos: 1,
            last_retained: true,
            first_seen: T0,
            last_seen: T0,
          },
        ],
        inactive_timeout_seconds: 3600,
        timestamp: '2024-05-01T12:00:10.000Z',
      },
    ]);
    expect(pubsub.messagesOn(RedisChannels.BROKER_STATUS)).toHaveLength(2);
  });

  it('drops topics idle past the inactive timeout from the published list', async () => {
    broker.handleMessage('sensors/old', Buffer.from('1'), 0, false);
    await vi.advanceTimersByTimeAsync(3_590_000);
    broker.handleMessage('sensors/new', Buffer.from('2'), 0, false);

    await vi.advanceTimersByTimeAsync(10_000);
    const names = () => {
      const lists = pubsub.messagesOn(RedisChannels.TOPIC_LIST);
      const last = lists[lists.length - 1];
      return isRecord(last) && Array.isArray(last.data) ? last.data.map((t) => (isRecord(t) ? t.topic : null)) : [];
    };
    expect(names()).toEqual(['sensors/new', 'sensors/old']);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(names()).toEqual(['sensors/new']);
  });

  it('announces broker disconnects and reconnects', async () => {
    transport.connected = false;
    broker.handleClose();
    transport.connected = true;
    await broker.handleConnect();

    const statuses = pubsub.messagesOn(RedisChannels.BROKER_STATUS);
    expect(statuses.slice(1)).toEqual([
      { type: 'status_change', connected: false, sys_subscribed: false, topic_tracker_subscribed: false, timestamp: T0 },
      { type: 'status_change', connected: true, sys_subscribed: true, topic_tracker_subscribed: true, timestamp: T0 },
    ]);
  });

  it('executes publish commands received over redis and answers them', async () => {
    await pubsub.publish(RedisChannels.COMMANDS, {
      type: 'cmd_publish',
      request_id: 'req-1',
      topic: 'lights/hall',
      payload: { on: true },
      qos: 1,
      retain: true,
    });
    await flushDeliveries();

    expect(transport.publishedMessages).toEqual([{ topic: 'lights/hall', message: '{"on":true}', qos: 1, retain: true }]);
    expect(pubsub.messagesOn(RedisChannels.COMMAND_RESULTS)).toEqual([
      { type: 'command_result', request_id: 'req-1', success: true },
    ]);
  });

  it('reports publish failures with their code', async () => {
    await bridge.handleCommand({ type: 'cmd_publish', request_id: 'r1', topic: 'a/#' });
    transport.failPublish = true;
    await bridge.handleCommand({ type: 'cmd_publish', request_id: 'r2', topic: 'a' });
    transport.connected = false;
    await bridge.handleCommand({ type: 'cmd_publish', request_id: 'r3', topic: 'a' });

    expect(pubsub.messagesOn(RedisChannels.COMMAND_RESULTS)).toEqual([
      {
        type: 'command_result',
        request_id: 'r1',
        success: false,
        code: 'invalid_topic_wildcards',
        error: 'Topic cannot contain wildcard characters (+ or #) when publishing',
      },
      { type: 'command_result', request_id: 'r2', success: false, code: 'publish_failed', error: 'Failed to publish message' },
      { type: 'command_result', request_id: 'r3', success: false, code: 'broker_disconnected', error: 'Not connected to MQTT broker' },
    ]);
  });

  it('forwards messages of subscribed filters until unsubscribed', async () => {
    await bridge.handleCommand({ type: 'cmd_subscribe', request_id: 's1', topic: 'alerts/+' });
    await bridge.handleCommand({ type: 'cmd_subscribe', request_id: 's2', topic: 'alerts/+' });
    expect(transport.subscribed.filter((s) => s.topic === 'alerts/+')).toHaveLength(1);
    expect(bridge.forwardedTopics()).toEqual(['alerts/+']);

    broker.handleMessage('alerts/fire', Buffer.from('drill'), 0, false);
    await flushDeliveries();
    expect(pubsub.messagesOn(RedisChannels.MQTT_MESSAGES)).toEqual([
      { type: 'message_received', topic: 'alerts/fire', payload: 'drill', qos: 0, retain: false, subscription: 'alerts/+', timestamp: T0 },
    ]);

    await bridge.handleCommand({ type: 'cmd_unsubscribe', request_id: 'u1', topic: 'alerts/+' });
    await bridge.handleCommand({ type: 'cmd_unsubscribe', request_id: 'u2', topic: 'alerts/+' });
    expect(transport.unsubscribed).toEqual(['alerts/+']);
    broker.handleMessage('alerts/fire', Buffer.from('again'), 0, false);
    await flushDeliveries();
    expect(pubsub.messagesOn(RedisChannels.MQTT_MESSAGES)).toHaveLength(1);

    const results = pubsub.messagesOn(RedisChannels.COMMAND_RESULTS);
    expect(results).toEqual(['s1', 's2', 'u1', 'u2'].map((id) => ({ type: 'command_result', request_id: id, success: true })));
  });

  it('rejects invalid subscribe filters and subscribes while offline', async () => {
    await bridge.handleCommand({ type: 'cmd_subscribe', request_id: 's1', topic: 'a/#/b' });
    transport.connected = false;
    await bridge.handleCommand({ type: 'cmd_subscribe', request_id: 's2', topic: 'a/b' });

    expect(pubsub.messagesOn(RedisChannels.COMMAND_RESULTS)).toEqual([
      { type: 'command_result', request_id: 's1', success: false, code: 'invalid_topic_filter', error: 'Invalid topic filter: a/#/b' },
      { type: 'command_result', request_id: 's2', success: false, code: 'broker_disconnected', error: 'Not connected to MQTT broker' },
    ]);
    expect(bridge.forwardedTopics()).toEqual([]);
  });

  it('answers malformed commands only when they carry a request id', async () => {
    await bridge.handleCommand({ type: 'cmd_reboot' });
    await bridge.handleCommand('garbage');
    await bridge.handleCommand({ type: 'cmd_reboot', request_id: 'x1' });
    expect(pubsub.messagesOn(RedisChannels.COMMAND_RESULTS)).toEqual([
      { type: 'command_result', request_id: 'x1', success: false, code: 'invalid_request', error: 'Malformed command' },
    ]);
  });

  it('stops timers, drops forwarded filters and announces the disconnect', async () => {
    await bridge.handleCommand({ type: 'cmd_subscribe', topic: 'alerts/+' });
    await bridge.stop();

    expect(transport.unsubscribed).toEqual(['alerts/+', '#', '$SYS/#']);
    const statuses = pubsub.messagesOn(RedisChannels.BROKER_STATUS);
    expect(statuses[statuses.length - 1]).toEqual({
      type: 'status_change',
      connected: false,
      sys_subscribed: false,
      topic_tracker_subscribed: false,
      timestamp: T0,
    });

    const count = pubsub.published.length;
    await vi.advanceTimersByTimeAsync(60000);
    expect(pubsub.published).toHaveLength(count);
  });
});
