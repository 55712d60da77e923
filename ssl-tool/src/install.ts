import { promises as fs } from 'fs';
import path from 'path';
import { isMissingFile } from './account-conf.js';
import type { CommandRunner } from './exec.js';
import { SERVICE } from './config.js';

export interface InstallOptions {
  domain: string;
  /** acme.sh directory holding `<domain>_ecc/`. */
  acmeHome: string;
  certDir: string;
  user: string;
  group: string;
  force?: boolean;
}

export interface InstallResult {
  status: 'installed' | 'unchanged';
  certFile: string;
  keyFile: string;
}

export function installedPaths(certDir: string, domain: string): { certFile: string; keyFile: string } {
  return { certFile: path.join(certDir, `${domain}.crt`), keyFile: path.join(certDir, `${domain}.key`) };
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function sameContents(a: string, b: string): Promise<boolean> {
  try {
    const [x, y] = await Promise.all([fs.readFile(a), fs.readFile(b)]);
    return x.equals(y);
  } catch (e) {
    if (isMissingFile(e)) return false;
    throw e;
  }
}

async function sourceCertificate(acmeDir: string, domain: string): Promise<string> {
  const fullchain = path.join(acmeDir, 'fullchain.cer');
  if (await exists(fullchain)) return fullchain;
  const single = path.join(acmeDir, `${domain}.cer`);
  if (await exists(single)) {
    console.warn(`[${SERVICE}] fullchain.cer not found, installing ${single} without the chain`);
    return single;
  }
  throw new Error(`Certificate not found: ${fullchain}`);
}

export interface Ownership {
  user: string;
  group: string;
}

async function chown(run: CommandRunner, { user, group }: Ownership, files: string[]): Promise<void> {
  const res = await run('chown', [`${user}:${group}`, ...files]);
  if (res.code !== 0) throw new Error(`chown ${user}:${group} failed: ${res.err.trim() || `exit code ${res.code}`}`);
}

/** Creates the certificate directory if needed and gives it to the broker user with mode 755. */
export async function prepareCertDir(run: CommandRunner, certDir: string, owner: Ownership): Promise<void> {
  await fs.mkdir(certDir, { recursive: true });
  await chown(run, owner, [certDir]);
  await fs.chmod(certDir, 0o755);
}

/** Sets broker ownership and the crt 644 / key 600 modes on files already in place. */
export async function fixPermissions(
  run: CommandRunner,
  files: { certFile: string; keyFile: string },
  owner: Ownership,
): Promise<void> {
  if (!(await exists(files.certFile))) throw new Error(`Certificate file not found: ${files.certFile}`);
  if (!(await exists(files.keyFile))) throw new Error(`Private key file not found: ${files.keyFile}`);
  await chown(run, owner, [files.certFile, files.keyFile]);
  await fs.chmod(files.certFile, 0o644);
  await fs.chmod(files.keyFile, 0o600);
}

/**
 * Copies the acme.sh certificate and key into Mosquitto's certificate
 * directory. Ownership and modes (crt 644, key 600) are enforced on every
 * run; only the copy is skipped when the installed files are current.
 */
export async function installCertificate(run: CommandRunner, opts: InstallOptions): Promise<InstallResult> {
  const acmeDir = path.join(opts.acmeHome, `${opts.domain}_ecc`);
  const srcCert = await sourceCertificate(acmeDir, opts.domain);
  const srcKey = path.join(acmeDir, `${opts.domain}.key`);
  if (!(await exists(srcKey))) throw new Error(`Private key not found: ${srcKey}`);

  const owner = { user: opts.user, group: opts.group };
  const files = installedPaths(opts.certDir, opts.domain);
  const current = !opts.force && (await sameContents(srcCert, files.certFile)) && (await sameContents(srcKey, files.keyFile));

  await prepareCertDir(run, opts.certDir, owner);
  if (!current) {
    await fs.copyFile(srcCert, files.certFile);
    await fs.copyFile(srcKey, files.keyFile);
  }
  await fixPermissions(run, files, owner);
  if (!current) console.log(`[${SERVICE}] installed ${files.certFile} (644) and ${files.keyFile} (600)`);
  return { status: current ? 'unchanged' : 'installed', ...files };
}

export interface FileState {
  path: string;
  exists: boolean;
  /** Permission bits in octal, e.g. "600". */
  mode: string | null;
}

async function fileState(file: string): Promise<FileState> {
  try {
    const st = await fs.stat(file);
    return { path: file, exists: true, mode: (st.mode & 0o777).toString(8) };
  } catch (e) {
    if (isMissingFile(e)) return { path: file, exists: false, mode: null };
    throw e;
  }
}

export async function inspectInstalledCertificate(
  certDir: string,
  domain: string,
): Promise<{ dir: FileState; cert: FileState; key: FileState }> {
  const { certFile, keyFile } = installedPaths(certDir, domain);
  const [dir, cert, key] = await Promise.all([fileState(certDir), fileState(certFile), fileState(keyFile)]);
  return { dir, cert, key };
}
