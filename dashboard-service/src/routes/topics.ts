import { Router } from 'express';
import { topicMatches, topicToDict, topicToSummary } from '@mqtt-dashboard/shared';
import type { BrokerState } from '../state.js';
import { ApiError } from '../errors.js';
import { requireTopicTracker } from './guards.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function queryInt(value: unknown): number | undefined {
  if (typeof value !== 'string' || !/^-?\d+$/.test(value.trim())) return undefined;
  return Number.parseInt(value, 10);
}

function topicFromPath(path: string): string {
  try {
    return decodeURIComponent(path.slice(1));
  } catch {
    throw new ApiError(400, 'invalid_request', 'Malformed topic path');
  }
}

export function topicsRouter(state: BrokerState): Router {
  const router = Router();

  router.get('/', (req, res) => {
    requireTopicTracker(state);
    const filter = queryString(req.query.filter);
    const prefix = queryString(req.query.prefix);
    const limit = queryInt(req.query.limit);
    const includeInactive = String(req.query.include_inactive ?? 'false').toLowerCase() === 'true';

    let topics = state.getTopics(includeInactive);
    const total = topics.length;
    if (filter) topics = topics.filter((t) => topicMatches(filter, t.topic));
    if (prefix) topics = topics.filter((t) => t.topic.startsWith(prefix));
    const filtered = topics.length;
    if (limit !== undefined && limit > 0) topics = topics.slice(0, limit);

    res.json({ topics: topics.map(topicToDict), total, filtered });
  });

  router.get('/count', (_req, res) => {
    requireTopicTracker(state);
    res.json({ count: state.getTopicCount() });
  });

  router.get('/summary', (req, res) => {
    requireTopicTracker(state);
    const prefix = queryString(req.query.prefix);
    const limit = queryInt(req.query.limit) ?? 100;

    let topics = state.getTopics();
    if (prefix) topics = topics.filter((t) => t.topic.startsWith(prefix));
    const total = topics.length;
    if (limit > 0) topics = topics.slice(0, limit);

    res.json({ topics: topics.map(topicToSummary), total });
  });

  // Topic names contain slashes, so the rest of the path is the name.
  router.get('/*', (req, res) => {
    requireTopicTracker(state);
    const name = topicFromPath(req.path);
    const info = state.getTopic(name);
    if (!info) throw new ApiError(404, 'topic_not_found', `Topic '${name}' not found`);
    res.json(topicToDict(info));
  });

  return router;
}
