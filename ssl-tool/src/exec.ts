import { spawn } from 'child_process';

export interface CommandResult {
  code: number | null;
  out: string;
  err: string;
}

export interface RunOptions {
  /** Added to the inherited environment. */
  env?: Record<string, string>;
  input?: string;
}

export type CommandRunner = (cmd: string, args: string[], opts?: RunOptions) => Promise<CommandResult>;

export const runCmd: CommandRunner = (cmd, args, opts = {}) => {
  return new Promise((resolve) => {
    const p = spawn(cmd, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: opts.env ? { ...process.env, ...opts.env } : process.env,
    });
    const out: string[] = [];
    const err: string[] = [];
    let settled = false;
    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };
    p.stdout.on('data', (c: Buffer) => out.push(c.toString()));
    p.stderr.on('data', (c: Buffer) => err.push(c.toString()));
    // spawn failures (ENOENT, EACCES) arrive here instead of 'close'
    p.on('error', (e) => finish({ code: null, out: out.join(''), err: e.message }));
    p.on('close', (code) => finish({ code, out: out.join(''), err: err.join('') }));
    if (opts.input) p.stdin.write(opts.input);
    p.stdin.end();
  });
};

export async function commandExists(run: CommandRunner, name: string): Promise<boolean> {
  const res = await run('sh', ['-c', 'command -v "$1"', 'sh', name]);
  return res.code === 0;
}

export async function userExists(run: CommandRunner, name: string): Promise<boolean> {
  const res = await run('id', [name]);
  return res.code === 0;
}
