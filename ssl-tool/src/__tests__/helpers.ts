import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { SslSettings } from '../config.js';
import type { CommandResult, CommandRunner, RunOptions } from '../exec.js';

export const DOMAIN = 'mqtt.example.com';

export interface RecordedCall {
  cmd: string;
  args: string[];
  env?: Record<string, string>;
}

type Matcher = (cmd: string, args: string[]) => boolean;

/** Records every command and answers from a list of canned results; the first match wins. */
export class FakeRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responses: Array<{ match: Matcher; result: CommandResult }> = [];

  constructor(private readonly defaultCode = 0) {}

  on(cmd: string, result: Partial<CommandResult>, firstArg?: string): this {
    this.responses.push({
      match: (c, args) => c === cmd && (firstArg === undefined || args[0] === firstArg),
      result: { code: 0, out: '', err: '', ...result },
    });
    return this;
  }

  readonly run: CommandRunner = async (cmd: string, args: string[], opts?: RunOptions) => {
    this.calls.push(opts?.env ? { cmd, args, env: opts.env } : { cmd, args });
    const hit = this.responses.find((r) => r.match(cmd, args));
    return hit ? hit.result : { code: this.defaultCode, out: '', err: '' };
  };

  commands(): string[] {
    return this.calls.map((c) => [path.basename(c.cmd), ...c.args].join(' '));
  }
}

export interface SeenRequest {
  url: string | undefined;
  authorization: unknown;
  apiToken: unknown;
}

export type Reply = { status: number; data: unknown } | Error;

/** An axios instance whose adapter answers in process. */
export function fakeHttp(handler: (config: InternalAxiosRequestConfig) => Reply): {
  http: AxiosInstance;
  requests: SeenRequest[];
} {
  const requests: SeenRequest[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push({
        url: config.url,
        authorization: config.headers.get('Authorization'),
        apiToken: config.headers.get('Auth-API-Token'),
      });
      const reply = handler(config);
      if (reply instanceof Error) throw reply;
      return { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
    },
  });
  return { http, requests };
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'ssl-tool-'));
}

export function testSettings(root: string): SslSettings {
  return {
    domain: DOMAIN,
    acmeHome: path.join(root, 'acme'),
    acmeServer: 'letsencrypt',
    dnsProvider: 'dns_hetzner',
    certDir: path.join(root, 'certs'),
    mosquittoUser: 'mosquitto',
    mosquittoGroup: 'mosquitto',
    mosquittoConf: path.join(root, 'mosquitto.conf'),
    reloadCmd: 'systemctl reload mosquitto',
  };
}

/** Lays out what a successful `acme.sh --issue` leaves behind. */
export async function writeAcmeCertificate(acmeHome: string, domain = DOMAIN): Promise<string> {
  const dir = path.join(acmeHome, `${domain}_ecc`);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, 'fullchain.cer'), 'test-fullchain\n');
  await fs.writeFile(path.join(dir, `${domain}.key`), 'test-key\n');
  return dir;
}
