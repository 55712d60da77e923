/**
 * MQTT Dashboard: bridge-service
 * ---------------------------------------------
 * Purpose
 * - The only process holding an MQTT connection. Mirrors broker state into Redis and
 *   executes commands the dashboard sends back over Redis.
 *
 * Responsibilities
 * - Subscribe `$SYS/#` and fold it into broker statistics (SysMonitor).
 * - Subscribe `#` and track per-topic activity (TopicTracker).
 * - Publish `mqtt:broker:stats`, `mqtt:topics` and `mqtt:broker:status` on timers.
 * - Execute `mqtt:commands` (publish/subscribe/unsubscribe) and answer on `mqtt:commands:results`.
 * - Forward messages of command-subscribed filters to `mqtt:messages`.
 *
 * Environment & Dependencies
 * - MQTT_URL, MQTT_CLIENT_ID, MQTT_USERNAME, MQTT_PASSWORD, MQTT_KEEPALIVE, MQTT_RECONNECT_MS.
 * - MQTT_TLS_CA, MQTT_TLS_CERT, MQTT_TLS_KEY, MQTT_TLS_REJECT_UNAUTHORIZED (mqtts:// only).
 * - REDIS_HOST, REDIS_PORT, REDIS_PASSWORD.
 * - STATS_PUBLISH_INTERVAL_MS, TOPICS_PUBLISH_INTERVAL_MS, STATUS_HEARTBEAT_MS.
 * - TRACK_SYS_TOPICS, TOPIC_INACTIVE_SECONDS, TOPIC_MAX_PAYLOAD.
 *
 * Operational Notes
 * - Reconnects are left to the mqtt and ioredis clients; filters are replayed on every connect.
 * - A status heartbeat lets the dashboard notice a dead bridge.
 * - Shutdown publishes a final disconnected status via `registerShutdown()`.
 *
 * Security Notes
 * - Payload contents and credentials are never logged.
 */
import 'dotenv/config';
import { createRedisPubSub } from '@mqtt-dashboard/shared';
import { connectBroker } from './broker.js';
import { MqttRedisBridge } from './bridge.js';
import {
  SERVICE,
  MQTT_URL,
  MQTT_CLIENT_ID,
  MQTT_USERNAME,
  MQTT_PASSWORD,
  MQTT_KEEPALIVE,
  MQTT_RECONNECT_MS,
  MQTT_TLS_CA,
  MQTT_TLS_CERT,
  MQTT_TLS_KEY,
  MQTT_TLS_REJECT_UNAUTHORIZED,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  STATS_PUBLISH_INTERVAL_MS,
  TOPICS_PUBLISH_INTERVAL_MS,
  STATUS_HEARTBEAT_MS,
  TRACK_SYS_TOPICS,
  TOPIC_INACTIVE_SECONDS,
  TOPIC_MAX_PAYLOAD,
} from './config.js';
import { registerShutdown } from './shutdown.js';
import { SysMonitor } from './sys-monitor.js';
import { TopicTracker } from './topic-tracker.js';

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const pubsub = createRedisPubSub({ host: REDIS_HOST, port: REDIS_PORT, password: REDIS_PASSWORD }, SERVICE);
  const broker = connectBroker({
    url: MQTT_URL,
    clientId: MQTT_CLIENT_ID,
    username: MQTT_USERNAME,
    password: MQTT_PASSWORD,
    keepalive: MQTT_KEEPALIVE,
    reconnectMs: MQTT_RECONNECT_MS,
    tlsCa: MQTT_TLS_CA,
    tlsCert: MQTT_TLS_CERT,
    tlsKey: MQTT_TLS_KEY,
    rejectUnauthorized: MQTT_TLS_REJECT_UNAUTHORIZED,
  });

  const sysMonitor = new SysMonitor(broker);
  const topicTracker = new TopicTracker(broker, {
    inactiveTimeoutSeconds: TOPIC_INACTIVE_SECONDS,
    maxPayloadSize: TOPIC_MAX_PAYLOAD,
    trackSysTopics: TRACK_SYS_TOPICS,
  });
  const bridge = new MqttRedisBridge(broker, pubsub, sysMonitor, topicTracker, {
    statsIntervalMs: STATS_PUBLISH_INTERVAL_MS,
    topicsIntervalMs: TOPICS_PUBLISH_INTERVAL_MS,
    heartbeatMs: STATUS_HEARTBEAT_MS,
  });

  registerShutdown(bridge, broker, pubsub);
  await bridge.start();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
