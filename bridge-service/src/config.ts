export const SERVICE = 'bridge-service';

// MQTT connection settings
export const MQTT_URL: string = process.env.MQTT_URL || 'mqtt://mosquitto:1883';
export const MQTT_CLIENT_ID: string = process.env.MQTT_CLIENT_ID || 'mqtt-dashboard-bridge';
export const MQTT_USERNAME: string | undefined = process.env.MQTT_USERNAME || undefined;
export const MQTT_PASSWORD: string | undefined = process.env.MQTT_PASSWORD || undefined;
export const MQTT_KEEPALIVE: number = Number(process.env.MQTT_KEEPALIVE || 60);
export const MQTT_RECONNECT_MS: number = Number(process.env.MQTT_RECONNECT_MS || 5000);
export const MQTT_TLS_CA: string | undefined = process.env.MQTT_TLS_CA || undefined; // e.g., /etc/mosquitto/certs/ca.crt
export const MQTT_TLS_CERT: string | undefined = process.env.MQTT_TLS_CERT || undefined;
export const MQTT_TLS_KEY: string | undefined = process.env.MQTT_TLS_KEY || undefined;
export const MQTT_TLS_REJECT_UNAUTHORIZED: boolean = (process.env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false';

// Redis pub/sub (shared with dashboard-service)
export const REDIS_HOST: string = process.env.REDIS_HOST || 'redis';
export const REDIS_PORT: number = Number(process.env.REDIS_PORT || 6379);
export const REDIS_PASSWORD: string | undefined = process.env.REDIS_PASSWORD || undefined;

// Publishing cadence towards Redis
export const STATS_PUBLISH_INTERVAL_MS: number = Number(process.env.STATS_PUBLISH_INTERVAL_MS || 5000);
export const TOPICS_PUBLISH_INTERVAL_MS: number = Number(process.env.TOPICS_PUBLISH_INTERVAL_MS || 10000);
export const STATUS_HEARTBEAT_MS: number = Number(process.env.STATUS_HEARTBEAT_MS || 10000);

// Topic tracking
export const TRACK_SYS_TOPICS: boolean = (process.env.TRACK_SYS_TOPICS || '').toLowerCase() === 'true';
export const TOPIC_INACTIVE_SECONDS: number = Number(process.env.TOPIC_INACTIVE_SECONDS || 3600);
export const TOPIC_MAX_PAYLOAD: number = Number(process.env.TOPIC_MAX_PAYLOAD || 1024);
