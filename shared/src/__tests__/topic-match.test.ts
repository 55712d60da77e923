import { describe, it, expect } from 'vitest';
import { hasWildcards, isValidTopicFilter, topicMatches } from '../topic-match.js';

describe('topicMatches', () => {
  it('matches exact topics only when every level is equal', () => {
    expect(topicMatches('home/kitchen/temp', 'home/kitchen/temp')).toBe(true);
    expect(topicMatches('home/kitchen/temp', 'home/kitchen')).toBe(false);
    expect(topicMatches('home/kitchen', 'home/kitchen/temp')).toBe(false);
  });

  it('treats + as exactly one level', () => {
    expect(topicMatches('home/+/temp', 'home/kitchen/temp')).toBe(true);
    expect(topicMatches('home/+/temp', 'home/kitchen/oven/temp')).toBe(false);
    expect(topicMatches('home/+', 'home')).toBe(false);
  });

  it('treats # as the remaining levels, including none', () => {
    expect(topicMatches('home/#', 'home/kitchen/temp')).toBe(true);
    expect(topicMatches('home/#', 'home')).toBe(true);
    expect(topicMatches('#', 'anything/at/all')).toBe(true);
  });

  it('keeps $ topics away from leading wildcards', () => {
    expect(topicMatches('#', '$SYS/broker/uptime')).toBe(false);
    expect(topicMatches('+/broker/uptime', '$SYS/broker/uptime')).toBe(false);
    expect(topicMatches('$SYS/#', '$SYS/broker/uptime')).toBe(true);
  });
});

describe('isValidTopicFilter', () => {
  it('accepts well-formed filters', () => {
    for (const f of ['a', 'a/b', '+', '#', 'a/+/c', 'a/#', '+/+/#', '$SYS/#']) {
      expect(isValidTopicFilter(f)).toBe(true);
    }
  });

  it('rejects misplaced wildcards and empty filters', () => {
    for (const f of ['', 'a/#/b', 'a#', 'a/b+', '#/a', 'a\u0000b']) {
      expect(isValidTopicFilter(f)).toBe(false);
    }
  });
});

describe('hasWildcards', () => {
  it('detects wildcard characters anywhere', () => {
    expect(hasWildcards('a/+/b')).toBe(true);
    expect(hasWildcards('a/b#')).toBe(true);
    expect(hasWildcards('a/b')).toBe(false);
  });
});
