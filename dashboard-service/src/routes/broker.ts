import { Router } from 'express';
import { statsToDict, statsToSummary } from '@mqtt-dashboard/shared';
import type { BrokerState } from '../state.js';
import { requireSysMonitor } from './guards.js';

export function brokerRouter(state: BrokerState): Router {
  const router = Router();

  // Never fails: reports what the bridge last told us.
  router.get('/status', (_req, res) => {
    const stats = state.getStats();
    res.json({
      connected: state.isBrokerConnected(),
      sys_monitor_subscribed: state.isSysSubscribed(),
      topic_tracker_subscribed: state.isTopicTrackerSubscribed(),
      broker: { version: stats.version, uptime: stats.uptime },
      last_status_at: state.lastStatusAt(),
    });
  });

  router.get('/stats', (_req, res) => {
    requireSysMonitor(state);
    res.json(statsToDict(state.getStats()));
  });

  router.get('/stats/summary', (_req, res) => {
    requireSysMonitor(state);
    res.json(statsToSummary(state.getStats()));
  });

  router.get('/version', (_req, res) => {
    requireSysMonitor(state);
    const stats = state.getStats();
    res.json({ version: stats.version, uptime: stats.uptime });
  });

  return router;
}
