import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { parseAccountConf, readAccountConf, resolveToken, saveToken } from '../account-conf.js';
import { tempDir } from './helpers.js';

describe('parseAccountConf', () => {
  it('reads quoted and bare values and skips comments', () => {
    const conf = parseAccountConf(
      [
        '# acme.sh account',
        '',
        "ACCOUNT_EMAIL='ops@example.com'",
        'SAVED_HETZNER_Token="test-secret"',
        'export SSL_DOMAIN=mqtt.example.com',
        'UPGRADE_HASH=abc=def',
        'not a setting',
      ].join('\n'),
    );
    expect([...conf]).toEqual([
      ['ACCOUNT_EMAIL', 'ops@example.com'],
      ['SAVED_HETZNER_Token', 'test-secret'],
      ['SSL_DOMAIN', 'mqtt.example.com'],
      ['UPGRADE_HASH', 'abc=def'],
    ]);
  });
});

describe('resolveToken', () => {
  const conf = new Map([
    ['SAVED_HETZNER_TOKEN', 'conf-upper'],
    ['SAVED_HETZNER_Token', 'conf-mixed'],
  ]);
  const env = { HETZNER_Token: 'env-mixed', HETZNER_TOKEN: 'env-upper' };

  it('prefers the override, then account.conf, then the environment', () => {
    expect(resolveToken({ override: 'cli', conf, env })).toEqual({ token: 'cli', source: 'override' });
    expect(resolveToken({ conf, env })).toEqual({ token: 'conf-upper', source: 'SAVED_HETZNER_TOKEN' });
    expect(resolveToken({ conf: new Map([['SAVED_HETZNER_Token', 'conf-mixed']]), env })).toEqual({
      token: 'conf-mixed',
      source: 'SAVED_HETZNER_Token',
    });
    expect(resolveToken({ conf: new Map(), env })).toEqual({ token: 'env-mixed', source: 'HETZNER_Token' });
    expect(resolveToken({ env: { HETZNER_TOKEN: 'env-upper' } })).toEqual({ token: 'env-upper', source: 'HETZNER_TOKEN' });
  });

  it('returns null when nothing is configured', () => {
    expect(resolveToken({ conf: new Map([['SAVED_HETZNER_Token', '']]), env: {} })).toBeNull();
  });
});

describe('account.conf files', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await tempDir();
    file = path.join(dir, 'account.conf');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('treats a missing file as empty', async () => {
    expect((await readAccountConf(file)).size).toBe(0);
  });

  it('replaces an existing key and keeps a backup', async () => {
    const before = "ACCOUNT_EMAIL='ops@example.com'\nSAVED_HETZNER_Token='old-token'\nAUTO_UPGRADE='1'\n";
    await fs.writeFile(file, before);
    await saveToken(file, 'SAVED_HETZNER_Token', 'test-secret');

    expect(await fs.readFile(file, 'utf8')).toBe("ACCOUNT_EMAIL='ops@example.com'\nSAVED_HETZNER_Token='test-secret'\nAUTO_UPGRADE='1'\n");
    expect(await fs.readFile(`${file}.backup`, 'utf8')).toBe(before);
  });

  it('appends a new key', async () => {
    await fs.writeFile(file, "ACCOUNT_EMAIL='ops@example.com'\n");
    await saveToken(file, 'SAVED_HETZNER_Token', 'test-secret');
    expect((await readAccountConf(file)).get('SAVED_HETZNER_Token')).toBe('test-secret');
    expect(await fs.readFile(file, 'utf8')).toBe("ACCOUNT_EMAIL='ops@example.com'\nSAVED_HETZNER_Token='test-secret'\n");
  });

  it('creates the file when there is none', async () => {
    await saveToken(file, 'SAVED_HETZNER_Token', 'test-secret');
    expect(await fs.readFile(file, 'utf8')).toBe("SAVED_HETZNER_Token='test-secret'\n");
    await expect(fs.access(`${file}.backup`)).rejects.toThrow();
  });
});
