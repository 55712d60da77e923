import type { Server } from 'http';
import { errorMessage, type PubSub } from '@mqtt-dashboard/shared';
import type { BridgeCommands } from './commands.js';
import { SERVICE } from './config.js';
import type { RealtimeHub } from './realtime.js';

export function registerShutdown(server: Server, hub: RealtimeHub, commands: BridgeCommands, pubsub: PubSub): void {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    // Fallback exit if close hangs
    setTimeout(() => process.exit(0), 3000).unref();

    commands.stop();
    try {
      await hub.close();
    } catch (e) {
      console.warn(`[${SERVICE}] error closing websocket server:`, errorMessage(e));
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
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
