/**
 * MQTT Dashboard: dashboard-service
 * ---------------------------------------------
 * Purpose
 * - REST and WebSocket API behind the dashboard UI.
 *
 * Responsibilities
 * - Cache bridge state (status, `$SYS` stats, topic list) from Redis.
 * - Serve `/health` and `/api/*` (broker, clients, topics, messages).
 * - Provide `/api/ws` for metric channel pushes and per-client MQTT filter subscriptions.
 * - Send publish/subscribe/unsubscribe commands to the bridge and await its results.
 *
 * Environment & Dependencies
 * - HOST, PORT: listen address (default 0.0.0.0:5000).
 * - CORS_ORIGINS: `*` or a comma-separated origin list for `/api/*`.
 * - REDIS_HOST, REDIS_PORT, REDIS_PASSWORD: pub/sub shared with bridge-service.
 * - STATS_PUSH_INTERVAL_MS, COMMAND_TIMEOUT_MS, STATUS_STALE_MS.
 *
 * Operational Notes
 * - This process holds no MQTT connection; a bridge status older than STATUS_STALE_MS reads as disconnected.
 * - Filter refcounts live in this process, so run a single dashboard instance per bridge.
 * - HTTP and WS share one server instance.
 */
import 'dotenv/config';
import http from 'http';
import { createRedisPubSub } from '@mqtt-dashboard/shared';
import { createApp } from './app.js';
import { BridgeCommands } from './commands.js';
import {
  SERVICE,
  HOST,
  PORT,
  CORS_ORIGINS,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  STATS_PUSH_INTERVAL_MS,
  COMMAND_TIMEOUT_MS,
  STATUS_STALE_MS,
} from './config.js';
import { RealtimeHub } from './realtime.js';
import { registerShutdown } from './shutdown.js';
import { BrokerState } from './state.js';
import { SubscriptionManager } from './subscriptions.js';

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const pubsub = createRedisPubSub({ host: REDIS_HOST, port: REDIS_PORT, password: REDIS_PASSWORD }, SERVICE);

  const state = new BrokerState(STATUS_STALE_MS);
  const commands = new BridgeCommands(pubsub, COMMAND_TIMEOUT_MS);
  const subscriptions = new SubscriptionManager(commands, pubsub);
  await state.attach(pubsub);
  await commands.attach();
  await subscriptions.attach();

  const app = createApp({ state, commands, corsOrigins: CORS_ORIGINS });
  const server = http.createServer(app);
  const hub = new RealtimeHub(state, subscriptions, STATS_PUSH_INTERVAL_MS);
  hub.attach(server);
  registerShutdown(server, hub, commands, pubsub);

  server.listen(PORT, HOST, () => {
    console.log(`[${SERVICE}] listening on http://${HOST}:${PORT}`);
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
