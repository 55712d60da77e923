import { errorMessage, type PubSub } from '@mqtt-dashboard/shared';
import type { BrokerConnection } from './broker.js';
import type { MqttRedisBridge } from './bridge.js';
import { SERVICE } from './config.js';

export function registerShutdown(bridge: MqttRedisBridge, broker: BrokerConnection, pubsub: PubSub): void {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    // Fallback exit if a close hangs
    setTimeout(() => process.exit(0), 3000).unref();

    try {
      await bridge.stop();
    } catch (e) {
      console.warn(`[${SERVICE}] error stopping bridge:`, errorMessage(e));
    }
    await broker.close();
    try {
      await pubsub.close();
    } catch (e) {
      console.warn(`[${SERVICE}] error closing redis:`, errorMessage(e));
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
