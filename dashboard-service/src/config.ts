export const SERVICE = 'dashboard-service';
export const API_VERSION = '1.0.0';

// HTTP/WebSocket server
export const HOST: string = process.env.HOST || '0.0.0.0';
export const PORT: number = Number(process.env.PORT || 5000);
// '*' or a comma-separated list of allowed origins
export const CORS_ORIGINS: string | string[] = parseOrigins(process.env.CORS_ORIGINS || '*');

// Redis pub/sub (shared with bridge-service)
export const REDIS_HOST: string = process.env.REDIS_HOST || 'redis';
export const REDIS_PORT: number = Number(process.env.REDIS_PORT || 6379);
export const REDIS_PASSWORD: string | undefined = process.env.REDIS_PASSWORD || undefined;

// Timing
export const STATS_PUSH_INTERVAL_MS: number = Number(process.env.STATS_PUSH_INTERVAL_MS || 5000);
export const COMMAND_TIMEOUT_MS: number = Number(process.env.COMMAND_TIMEOUT_MS || 5000);
// A bridge status older than this counts as disconnected
export const STATUS_STALE_MS: number = Number(process.env.STATUS_STALE_MS || 30000);

export function parseOrigins(raw: string): string | string[] {
  const trimmed = raw.trim();
  if (trimmed === '*') return '*';
  return trimmed.split(',').map((o) => o.trim()).filter(Boolean);
}
