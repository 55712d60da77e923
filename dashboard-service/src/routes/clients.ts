import { Router } from 'express';
import type { BrokerState } from '../state.js';
import { activeClients, clientCounts, clientList, clientStats } from '../client-monitor.js';
import { requireSysMonitor } from './guards.js';

export function clientsRouter(state: BrokerState): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    requireSysMonitor(state);
    res.json(clientList(state.getStats()));
  });

  router.get('/count', (_req, res) => {
    requireSysMonitor(state);
    res.json(clientCounts(state.getStats()));
  });

  router.get('/active', (_req, res) => {
    requireSysMonitor(state);
    res.json(activeClients(state.getStats()));
  });

  router.get('/stats', (_req, res) => {
    requireSysMonitor(state);
    res.json(clientStats(state.getStats()));
  });

  return router;
}
