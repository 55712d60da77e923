import { isRecord } from './json.js';
import { hasWildcards } from './topic-match.js';
import { isQoS, type QoS } from './topic-info.js';

export interface PublishRequest {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
}

export type PublishErrorCode =
  | 'invalid_request'
  | 'missing_topic'
  | 'invalid_topic'
  | 'invalid_topic_wildcards'
  | 'invalid_qos'
  | 'invalid_retain';

export type PublishValidation =
  | { ok: true; value: PublishRequest }
  | { ok: false; code: PublishErrorCode; error: string };

function fail(code: PublishErrorCode, error: string): PublishValidation {
  return { ok: false, code, error };
}

function payloadToString(payload: unknown): string {
  if (payload === undefined || payload === null) return '';
  if (typeof payload === 'string') return payload;
  if (typeof payload === 'object') return JSON.stringify(payload);
  return String(payload);
}

/** Checks a publish body (`{topic, payload, qos, retain}`) the same way for REST and bridge commands. */
export function validatePublishRequest(body: unknown): PublishValidation {
  if (!isRecord(body)) return fail('invalid_request', 'Request body must be JSON');

  const topic = body.topic;
  if (topic === undefined || topic === null || topic === '') return fail('missing_topic', 'Topic is required');
  if (typeof topic !== 'string' || !topic.trim()) return fail('invalid_topic', 'Topic must be a non-empty string');
  if (hasWildcards(topic)) {
    return fail('invalid_topic_wildcards', 'Topic cannot contain wildcard characters (+ or #) when publishing');
  }

  const qos = body.qos ?? 0;
  if (!isQoS(qos)) return fail('invalid_qos', 'QoS must be 0, 1, or 2');

  const retain = body.retain ?? false;
  if (typeof retain !== 'boolean') return fail('invalid_retain', 'Retain must be a boolean value');

  return { ok: true, value: { topic, payload: payloadToString(body.payload), qos, retain } };
}
