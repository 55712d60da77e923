import type { BrokerStats, JsonObject } from '@mqtt-dashboard/shared';

// $SYS exposes aggregate counts only, so every client view is derived from BrokerStats.

function connectionRate(stats: BrokerStats): JsonObject {
  return {
    '1min': stats.loadConnections1min,
    '5min': stats.loadConnections5min,
    '15min': stats.loadConnections15min,
  };
}

export function clientCounts(stats: BrokerStats): JsonObject {
  return {
    connected: stats.clientsConnected,
    disconnected: stats.clientsDisconnected,
    total: stats.clientsTotal,
    maximum: stats.clientsMaximum,
    last_updated: stats.lastUpdated,
  };
}

export function clientStats(stats: BrokerStats): JsonObject {
  return {
    connected: stats.clientsConnected,
    disconnected: stats.clientsDisconnected,
    total: stats.clientsTotal,
    maximum: stats.clientsMaximum,
    expired: stats.clientsExpired,
    connection_rate: connectionRate(stats),
    last_updated: stats.lastUpdated,
  };
}

export function activeClients(stats: BrokerStats): JsonObject {
  return {
    active: stats.clientsConnected,
    connection_rate: connectionRate(stats),
    last_updated: stats.lastUpdated,
  };
}

export function clientList(stats: BrokerStats): JsonObject {
  return {
    summary: {
      total_tracked: stats.clientsTotal,
      currently_connected: stats.clientsConnected,
      persistent_disconnected: stats.clientsDisconnected,
      expired_sessions: stats.clientsExpired,
      peak_connections: stats.clientsMaximum,
    },
    categories: [
      {
        name: 'Connected',
        description: 'Clients currently connected to the broker',
        count: stats.clientsConnected,
        status: 'online',
      },
      {
        name: 'Disconnected (Persistent)',
        description: 'Persistent clients that are currently disconnected',
        count: stats.clientsDisconnected,
        status: 'offline',
      },
      {
        name: 'Expired',
        description: 'Clients whose sessions have expired and been removed',
        count: stats.clientsExpired,
        status: 'expired',
      },
    ],
    connection_activity: {
      rate_1min: stats.loadConnections1min,
      rate_5min: stats.loadConnections5min,
      rate_15min: stats.loadConnections15min,
    },
    last_updated: stats.lastUpdated,
  };
}
