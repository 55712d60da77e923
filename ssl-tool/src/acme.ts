import path from 'path';
import type { CommandResult, CommandRunner } from './exec.js';

export class AcmeError extends Error {
  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
    message: string,
  ) {
    super(message);
    this.name = 'AcmeError';
  }
}

export interface AcmeOptions {
  acmeHome: string;
  server: string;
  dnsProvider: string;
  reloadCmd: string;
}

export interface IssueOptions {
  token: string;
  staging?: boolean;
  force?: boolean;
}

/** Drives `<ACME_HOME>/acme.sh`. */
export class AcmeClient {
  constructor(
    private readonly run: CommandRunner,
    private readonly opts: AcmeOptions,
  ) {}

  get binary(): string {
    return path.join(this.opts.acmeHome, 'acme.sh');
  }

  /** Where acme.sh keeps an ECC certificate for `domain`. */
  certDir(domain: string): string {
    return path.join(this.opts.acmeHome, `${domain}_ecc`);
  }

  async issue(domain: string, { token, staging = false, force = false }: IssueOptions): Promise<string> {
    const args = ['--issue', '--dns', this.opts.dnsProvider, '-d', domain, '--server', this.opts.server];
    if (staging) args.push('--staging');
    if (force) args.push('--force');
    const res = await this.exec(args, { HETZNER_Token: token });
    return res.out;
  }

  async installCert(domain: string, files: { fullchainFile: string; keyFile: string }): Promise<string> {
    const res = await this.exec([
      '--install-cert',
      '-d',
      domain,
      '--fullchain-file',
      files.fullchainFile,
      '--key-file',
      files.keyFile,
      '--reloadcmd',
      this.opts.reloadCmd,
    ]);
    return res.out;
  }

  async isRegistered(domain: string): Promise<boolean> {
    const res = await this.exec(['--list']);
    return res.out
      .split('\n')
      .slice(1)
      .some((line) => line.trim().split(/\s+/)[0] === domain);
  }

  async hasReloadHook(domain: string): Promise<boolean> {
    const res = await this.exec(['--info', '-d', domain]);
    return /^Le_ReloadCmd=\S/m.test(res.out);
  }

  private async exec(args: string[], env?: Record<string, string>): Promise<CommandResult> {
    const res = await this.run(this.binary, args, env ? { env } : undefined);
    if (res.code !== 0) {
      const detail = res.err.trim() || res.out.trim() || `exit code ${res.code}`;
      throw new AcmeError(res.code, res.err, `acme.sh ${args[0]} failed: ${detail}`);
    }
    return res;
  }
}
