import { describe, it, expect } from 'vitest';
import { validatePublishRequest } from '../publish-request.js';

describe('validatePublishRequest', () => {
  it('applies defaults', () => {
    expect(validatePublishRequest({ topic: 'sensors/1' })).toEqual({
      ok: true,
      value: { topic: 'sensors/1', payload: '', qos: 0, retain: false },
    });
  });

  it('converts non-string payloads', () => {
    const check = (payload: unknown) => {
      const r = validatePublishRequest({ topic: 't', payload });
      return r.ok ? r.value.payload : undefined;
    };
    expect(check({ a: 1 })).toBe('{"a":1}');
    expect(check([1, 2])).toBe('[1,2]');
    expect(check(21.5)).toBe('21.5');
    expect(check(true)).toBe('true');
    expect(check(null)).toBe('');
    expect(check('raw')).toBe('raw');
  });

  it.each([
    [null, 'invalid_request'],
    [[], 'invalid_request'],
    [{}, 'missing_topic'],
    [{ topic: '' }, 'missing_topic'],
    [{ topic: null }, 'missing_topic'],
    [{ topic: 12 }, 'invalid_topic'],
    [{ topic: '   ' }, 'invalid_topic'],
    [{ topic: 'a/+' }, 'invalid_topic_wildcards'],
    [{ topic: 'a/#' }, 'invalid_topic_wildcards'],
    [{ topic: 'a', qos: 3 }, 'invalid_qos'],
    [{ topic: 'a', qos: '1' }, 'invalid_qos'],
    [{ topic: 'a', qos: 1.5 }, 'invalid_qos'],
    [{ topic: 'a', retain: 'yes' }, 'invalid_retain'],
  ])('rejects %j with %s', (body, code) => {
    const r = validatePublishRequest(body);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.code).toBe(code);
  });

  it('checks the topic before qos and retain', () => {
    const r = validatePublishRequest({ topic: 'a/#', qos: 9, retain: 'x' });
    expect(r).toEqual({
      ok: false,
      code: 'invalid_topic_wildcards',
      error: 'Topic cannot contain wildcard characters (+ or #) when publishing',
    });
  });
});
