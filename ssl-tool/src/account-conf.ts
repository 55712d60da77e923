import { promises as fs } from 'fs';

const LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

function unquote(raw: string): string {
  const v = raw.trim();
  if (v.length >= 2 && (v[0] === "'" || v[0] === '"') && v[v.length - 1] === v[0]) return v.slice(1, -1);
  return v;
}

/** Reads the `KEY='value'` lines acme.sh keeps in account.conf. */
export function parseAccountConf(text: string): Map<string, string> {
  const conf = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    if (/^\s*(#|$)/.test(line)) continue;
    const m = LINE.exec(line);
    if (m) conf.set(m[1], unquote(m[2]));
  }
  return conf;
}

export async function readAccountConf(file: string): Promise<Map<string, string>> {
  try {
    return parseAccountConf(await fs.readFile(file, 'utf8'));
  } catch (e) {
    if (isMissingFile(e)) return new Map();
    throw e;
  }
}

export function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

// dns_hetzner saves the mixed-case key; older setups used the upper-case one
export type TokenSource = 'override' | 'SAVED_HETZNER_TOKEN' | 'SAVED_HETZNER_Token' | 'HETZNER_Token' | 'HETZNER_TOKEN';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export interface TokenLookup {
  override?: string;
  conf?: Map<string, string>;
  env?: NodeJS.ProcessEnv;
}

export function resolveToken({ override, conf, env = process.env }: TokenLookup): ResolvedToken | null {
  if (override) return { token: override, source: 'override' };
  for (const key of ['SAVED_HETZNER_TOKEN', 'SAVED_HETZNER_Token'] as const) {
    const value = conf?.get(key);
    if (value) return { token: value, source: key };
  }
  for (const key of ['HETZNER_Token', 'HETZNER_TOKEN'] as const) {
    const value = env[key];
    if (value) return { token: value, source: key };
  }
  return null;
}

/** Sets `key` in account.conf, keeping the previous file as `<file>.backup`. */
export async function saveToken(file: string, key: string, token: string): Promise<void> {
  let text = '';
  try {
    text = await fs.readFile(file, 'utf8');
    await fs.copyFile(file, `${file}.backup`);
  } catch (e) {
    if (!isMissingFile(e)) throw e;
  }

  const entry = `${key}='${token}'`;
  const lines = text === '' ? [] : text.replace(/\n$/, '').split('\n');
  const at = lines.findIndex((l) => l.startsWith(`${key}=`));
  if (at >= 0) lines[at] = entry;
  else lines.push(entry);
  await fs.writeFile(file, `${lines.join('\n')}\n`, { mode: 0o600 });
}
