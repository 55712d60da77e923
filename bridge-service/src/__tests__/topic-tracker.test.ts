import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrokerConnection } from '../broker.js';
import { TopicTracker, truncatePayload, type TopicTrackerOptions } from '../topic-tracker.js';
import { FakeTransport } from './fake-transport.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

const T0 = new Date('2024-05-01T12:00:00.000Z').getTime();

function setup(options: Partial<TopicTrackerOptions> = {}) {
  const transport = new FakeTransport();
  const broker = new BrokerConnection(transport);
  let now = T0;
  const tracker = new TopicTracker(
    broker,
    { inactiveTimeoutSeconds: 60, maxPayloadSize: 8, trackSysTopics: false, ...options },
    () => new Date(now),
  );
  const send = (topic: string, payload: string, qos: 0 | 1 | 2 = 0, retain = false) =>
    broker.handleMessage(topic, Buffer.from(payload), qos, retain);
  const advance = (ms: number) => {
    now += ms;
  };
  return { transport, broker, tracker, send, advance };
}

describe('TopicTracker', () => {
  it('subscribes # and, when tracking $SYS, $SYS/# too', async () => {
    const plain = setup();
    await plain.tracker.start();
    expect(plain.transport.subscribed.map((s) => s.topic)).toEqual(['#']);
    expect(plain.tracker.isSubscribed).toBe(true);

    const withSys = setup({ trackSysTopics: true });
    await withSys.tracker.start();
    expect(withSys.transport.subscribed.map((s) => s.topic)).toEqual(['#', '$SYS/#']);
  });

  it('counts messages per topic and keeps the latest details', async () => {
    const { tracker, send, advance } = setup();
    await tracker.start();
    send('sensors/1', 'a', 1, true);
    advance(1000);
    send('sensors/1', 'b', 0, false);

    const info = tracker.getTopic('sensors/1');
    expect(info).toEqual({
      topic: 'sensors/1',
      messageCount: 2,
      lastPayload: 'b',
      lastQos: 0,
      lastRetained: false,
      firstSeen: new Date(T0),
      lastSeen: new Date(T0 + 1000),
    });
  });

  it('truncates long payloads', async () => {
    const { tracker, send } = setup();
    await tracker.start();
    send('long', '0123456789');
    send('exact', '01234567');
    expect(tracker.getTopic('long')?.lastPayload).toBe('01234567...');
    expect(tracker.getTopic('exact')?.lastPayload).toBe('01234567');
  });

  it('truncates by code point without splitting surrogate pairs', () => {
    expect(truncatePayload('😀'.repeat(10), 8)).toBe(`${'😀'.repeat(8)}...`);
    expect(truncatePayload('a😀b', 2)).toBe('a😀...');
    expect(truncatePayload('😀'.repeat(8), 8)).toBe('😀'.repeat(8));
  });

  it('ignores $SYS topics unless tracking them', async () => {
    const off = setup();
    await off.tracker.start();
    off.send('$SYS/broker/uptime', '1');
    expect(off.tracker.getTopicCount()).toBe(0);

    const on = setup({ trackSysTopics: true });
    await on.tracker.start();
    on.send('$SYS/broker/uptime', '1');
    expect(on.tracker.getTopic('$SYS/broker/uptime')?.messageCount).toBe(1);
  });

  it('sorts newest first and prunes inactive topics', async () => {
    const { tracker, send, advance } = setup();
    await tracker.start();
    send('old', '1');
    advance(30_000);
    send('newer', '1');
    advance(40_000);

    expect(tracker.getTopics(true).map((t) => t.topic)).toEqual(['newer', 'old']);
    expect(tracker.getTopics().map((t) => t.topic)).toEqual(['newer']);
    expect(tracker.getTopic('old')).toBeUndefined();
    expect(tracker.getTopicCount()).toBe(1);
  });

  it('never prunes with a zero timeout', async () => {
    const { tracker, send, advance } = setup({ inactiveTimeoutSeconds: 0 });
    await tracker.start();
    send('a', '1');
    advance(10 * 24 * 3600 * 1000);
    expect(tracker.getTopicCount()).toBe(1);
  });

  it('emits updates and clears', async () => {
    const { tracker, send } = setup();
    await tracker.start();
    const seen: number[] = [];
    tracker.on('update', (info) => seen.push(info.messageCount));
    send('a', '1');
    send('a', '2');
    expect(seen).toEqual([1, 2]);
    tracker.clear();
    expect(tracker.getTopics(true)).toEqual([]);
  });
});
