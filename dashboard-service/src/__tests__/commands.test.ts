import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RedisChannels } from '@mqtt-dashboard/shared';
import { MemoryPubSub, flushDeliveries } from '@mqtt-dashboard/shared/testing';
import { BridgeCommands } from '../commands.js';
import { fakeBridge } from './fixtures.js';

describe('BridgeCommands', () => {
  let pubsub: MemoryPubSub;
  let commands: BridgeCommands;
  let seq: number;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    seq = 0;
    pubsub = new MemoryPubSub();
    commands = new BridgeCommands(pubsub, 5000, () => `req-${++seq}`);
    await commands.attach();
  });

  afterEach(() => {
    commands.stop();
    vi.useRealTimers();
  });

  it('sends commands with a request id and returns the bridge result', async () => {
    const received = await fakeBridge(pubsub, (cmd) =>
      cmd.type === 'cmd_publish' ? { success: false, code: 'publish_failed', error: 'Failed to publish message' } : { success: true },
    );

    expect(await commands.subscribe('alerts/#', 1)).toEqual({ success: true });
    expect(await commands.publish({ topic: 'a', payload: 'x', qos: 0, retain: false })).toEqual({
      success: false,
      code: 'publish_failed',
      error: 'Failed to publish message',
    });
    expect(await commands.unsubscribe('alerts/#')).toEqual({ success: true });

    expect(received).toEqual([
      { type: 'cmd_subscribe', request_id: 'req-1', topic: 'alerts/#', qos: 1 },
      { type: 'cmd_publish', request_id: 'req-2', topic: 'a', payload: 'x', qos: 0, retain: false },
      { type: 'cmd_unsubscribe', request_id: 'req-3', topic: 'alerts/#' },
    ]);
    expect(commands.pendingCount()).toBe(0);
  });

  it('times out when the bridge stays silent', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const result = commands.subscribe('a');
    await vi.advanceTimersByTimeAsync(5000);
    expect(await result).toEqual({ success: false, code: 'bridge_timeout', error: 'Bridge did not respond in time' });
  });

  it('fails fast when redis is unavailable', async () => {
    pubsub.setConnected(false);
    expect(await commands.subscribe('a')).toEqual({ success: false, code: 'bridge_unavailable', error: 'Could not reach the bridge' });
    expect(commands.pendingCount()).toBe(0);
  });

  it('ignores results for unknown requests', async () => {
    const result = commands.subscribe('a');
    await pubsub.publish(RedisChannels.COMMAND_RESULTS, { type: 'command_result', request_id: 'someone-else', success: true });
    await flushDeliveries();
    expect(commands.pendingCount()).toBe(1);
    commands.handleResult({ type: 'command_result', request_id: 'req-1', success: true });
    expect(await result).toEqual({ success: true });
  });

  it('settles pending commands on stop', async () => {
    const result = commands.publish({ topic: 'a', payload: '', qos: 0, retain: false });
    await flushDeliveries();
    commands.stop();
    expect(await result).toEqual({ success: false, code: 'bridge_unavailable', error: 'Dashboard is shutting down' });
  });
});
