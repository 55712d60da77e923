/**
 * MQTT topic filter helpers.
 *
 * `+` matches exactly one level, `#` matches the remaining levels (including
 * none, so `a/#` matches `a`). Topics beginning with `$` are never matched by
 * a filter whose first level is a wildcard.
 */
export function topicMatches(filter: string, topic: string): boolean {
  if (topic.startsWith('$') && (filter.startsWith('+') || filter.startsWith('#'))) return false;
  const f = filter.split('/');
  const t = topic.split('/');
  for (let i = 0; i < f.length; i++) {
    const level = f[i];
    if (level === '#') return true;
    if (i >= t.length) return false;
    if (level !== '+' && level !== t[i]) return false;
  }
  return f.length === t.length;
}

export function isValidTopicFilter(filter: string): boolean {
  if (!filter || filter.includes('\u0000')) return false;
  const levels = filter.split('/');
  for (let i = 0; i < levels.length; i++) {
    const level = levels[i];
    if (level.includes('#') && (level !== '#' || i !== levels.length - 1)) return false;
    if (level.includes('+') && level !== '+') return false;
  }
  return true;
}

export function hasWildcards(topic: string): boolean {
  return topic.includes('+') || topic.includes('#');
}
