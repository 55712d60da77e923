import { constants, promises as fs } from 'fs';
import path from 'path';
import { errorMessage } from '@mqtt-dashboard/shared';
import { isMissingFile, readAccountConf, resolveToken } from './account-conf.js';
import type { AcmeClient } from './acme.js';
import { accountConfPath, type SslSettings } from './config.js';
import { commandExists, userExists, type CommandRunner } from './exec.js';
import { HetznerApiError, checkZoneAccess, type HetznerClient } from './hetzner.js';
import { inspectInstalledCertificate } from './install.js';
import { EXPECTED_LISTENERS, checkListeners, parseListeners } from './mosquitto-conf.js';

export type CheckStatus = 'ok' | 'fail' | 'warn' | 'blocked';

export interface Check {
  name: string;
  status: CheckStatus;
  message: string;
  hint?: string;
}

export interface Section {
  title: string;
  checks: Check[];
}

export interface StatusReport {
  domain: string;
  sections: Section[];
  total: number;
  passed: number;
  blocked: boolean;
}

export interface StatusDeps {
  settings: SslSettings;
  run: CommandRunner;
  acme: Pick<AcmeClient, 'binary' | 'certDir' | 'isRegistered' | 'hasReloadHook'>;
  hetzner: Pick<HetznerClient, 'listCloudZones'>;
  env?: NodeJS.ProcessEnv;
}

const MIN_TOKEN_LENGTH = 10;

function check(name: string, status: CheckStatus, message: string, hint?: string): Check {
  return hint ? { name, status, message, hint } : { name, status, message };
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await fs.access(file, constants.X_OK);
    return isFile(file);
  } catch {
    return false;
  }
}

async function prerequisites({ run, acme, settings }: StatusDeps): Promise<Check[]> {
  const checks: Check[] = [];
  if (await commandExists(run, 'mosquitto')) {
    checks.push(check('Mosquitto', 'ok', 'Installed'));
  } else if ((await run('test', ['-x', '/usr/sbin/mosquitto'])).code === 0) {
    checks.push(check('Mosquitto', 'ok', 'Installed at /usr/sbin/mosquitto'));
  } else {
    checks.push(check('Mosquitto', 'fail', 'Not installed', 'Install: apt-get install mosquitto mosquitto-clients'));
  }

  checks.push(
    (await userExists(run, settings.mosquittoUser))
      ? check('Mosquitto user', 'ok', 'User exists')
      : check('Mosquitto user', 'fail', `User ${settings.mosquittoUser} does not exist`),
  );

  checks.push(
    (await isExecutable(acme.binary))
      ? check('acme.sh', 'ok', `Installed at ${acme.binary}`)
      : check('acme.sh', 'fail', 'Not installed', 'Install: curl https://get.acme.sh | sh -s email=<your address>'),
  );
  return checks;
}

async function dnsToken({ settings, hetzner, env }: StatusDeps): Promise<Check[]> {
  const confPath = accountConfPath(settings.acmeHome);
  const resolved = resolveToken({ conf: await readAccountConf(confPath), env });
  if (!resolved) {
    return [check('DNS Token', 'fail', 'Not configured', `Add SAVED_HETZNER_Token to ${confPath} or export HETZNER_Token`)];
  }
  if (resolved.token.length <= MIN_TOKEN_LENGTH) {
    return [check('DNS Token', 'fail', 'Token appears empty or invalid')];
  }

  const checks = [check('DNS Token', 'ok', `Configured (${resolved.source})`)];
  try {
    const access = checkZoneAccess(await hetzner.listCloudZones(resolved.token), settings.domain);
    switch (access.status) {
      case 'ok':
        checks.push(check('Zone Access', 'ok', `Token has access to the ${access.zone} zone`));
        break;
      case 'no_zones':
        checks.push(
          check('Zone Access', 'blocked', 'Token has ZERO zones accessible', 'Use a token from the Hetzner project that owns the zone'),
        );
        break;
      case 'missing':
        checks.push(
          check('Zone Access', 'blocked', `Token does NOT have access to ${settings.domain}`, `Found zones: ${access.found.slice(0, 3).join(' ')}`),
        );
        break;
    }
  } catch (e) {
    if (e instanceof HetznerApiError) {
      checks.push(check('Zone Access', 'blocked', 'Token is INVALID', 'Generate a new token at console.hetzner.cloud'));
    } else {
      checks.push(check('Zone Access', 'warn', 'Could not verify (network issue?)', errorMessage(e)));
    }
  }
  return checks;
}

async function certificate({ acme, settings }: StatusDeps): Promise<Check[]> {
  const checks: Check[] = [];
  let registered = false;
  try {
    registered = await acme.isRegistered(settings.domain);
  } catch {
    registered = false;
  }
  checks.push(
    registered
      ? check('Domain Registration', 'ok', 'Registered with acme.sh')
      : check('Domain Registration', 'warn', 'Not registered with acme.sh yet'),
  );

  const dir = acme.certDir(settings.domain);
  let dirExists = false;
  try {
    dirExists = (await fs.stat(dir)).isDirectory();
  } catch (e) {
    if (!isMissingFile(e)) throw e;
  }
  if (!dirExists) {
    checks.push(check('Certificate Dir', 'warn', `Not created yet (${dir}/)`));
    return checks;
  }

  checks.push(
    (await isFile(path.join(dir, 'fullchain.cer')))
      ? check('Certificate (acme.sh)', 'ok', `Exists in ${dir}/`)
      : check('Certificate (acme.sh)', 'fail', 'NOT FOUND - certificate issuance failed', 'Run: mqtt-ssl issue --staging'),
  );
  checks.push(
    (await isFile(path.join(dir, `${settings.domain}.key`)))
      ? check('Private Key (acme.sh)', 'ok', 'Exists')
      : check('Private Key (acme.sh)', 'fail', 'Not found'),
  );
  return checks;
}

async function installation({ settings }: StatusDeps): Promise<Check[]> {
  const { dir, cert, key } = await inspectInstalledCertificate(settings.certDir, settings.domain);
  const checks: Check[] = [];
  checks.push(
    dir.exists
      ? check('Cert Directory', 'ok', `${dir.path} (${dir.mode})`)
      : check('Cert Directory', 'fail', 'Not created', 'Run: sudo mqtt-ssl install'),
  );
  checks.push(
    cert.exists
      ? check('Installed Cert', 'ok', `${cert.path} (${cert.mode})`)
      : check('Installed Cert', 'fail', 'Not installed', 'Run: sudo mqtt-ssl install'),
  );
  if (!key.exists) checks.push(check('Installed Key', 'fail', 'Not installed'));
  else if (key.mode === '600') checks.push(check('Installed Key', 'ok', `${key.path} (600)`));
  else checks.push(check('Installed Key', 'warn', `${key.path} (${key.mode} - should be 600)`));
  return checks;
}

async function renewal({ acme, run, settings }: StatusDeps): Promise<Check[]> {
  const checks: Check[] = [];
  if (await isExecutable(acme.binary)) {
    let hook = false;
    try {
      hook = await acme.hasReloadHook(settings.domain);
    } catch {
      hook = false;
    }
    checks.push(hook ? check('Reload Hook', 'ok', 'Configured') : check('Reload Hook', 'warn', 'Not configured'));
  }
  const cron = await run('crontab', ['-l']);
  checks.push(
    cron.code === 0 && cron.out.includes('acme.sh')
      ? check('Cron Job', 'ok', 'Active')
      : check('Cron Job', 'warn', 'Not found in crontab'),
  );
  return checks;
}

async function listeners({ settings }: StatusDeps): Promise<Check[]> {
  let conf: string;
  try {
    conf = await fs.readFile(settings.mosquittoConf, 'utf8');
  } catch (e) {
    if (!isMissingFile(e)) throw e;
    return [check('mosquitto.conf', 'warn', `Not found: ${settings.mosquittoConf}`)];
  }
  const { missing } = checkListeners(parseListeners(conf));
  return EXPECTED_LISTENERS.map((l) =>
    missing.includes(l)
      ? check(`Listener ${l.port}`, 'warn', `Not configured (${l.label})`)
      : check(`Listener ${l.port}`, 'ok', l.label),
  );
}

/** The checks that must pass before a certificate can be issued. */
export async function buildPreflight(deps: StatusDeps): Promise<Section[]> {
  return [
    { title: 'Prerequisites', checks: await prerequisites(deps) },
    { title: 'DNS token', checks: await dnsToken(deps) },
  ];
}

export async function buildStatusReport(deps: StatusDeps): Promise<StatusReport> {
  const sections: Section[] = [
    ...(await buildPreflight(deps)),
    { title: 'Certificate', checks: await certificate(deps) },
    { title: 'Installation', checks: await installation(deps) },
    { title: 'Renewal', checks: await renewal(deps) },
    { title: 'Listeners', checks: await listeners(deps) },
  ];
  const all = sections.flatMap((s) => s.checks);
  return {
    domain: deps.settings.domain,
    sections,
    total: all.length,
    passed: all.filter((c) => c.status === 'ok').length,
    blocked: all.some((c) => c.status === 'blocked'),
  };
}

const MARK: Record<CheckStatus, string> = { ok: '✓', fail: '✗', warn: '!', blocked: '✗' };

export function formatReport(report: StatusReport): string[] {
  const lines = [`SSL/TLS status for ${report.domain}`, ''];
  report.sections.forEach((section, i) => {
    lines.push(`${i + 1}. ${section.title.toUpperCase()}`);
    for (const c of section.checks) {
      lines.push(`  ${MARK[c.status]} ${c.name}: ${c.message}`);
      if (c.hint && c.status !== 'ok') lines.push(`     ${c.hint}`);
    }
    lines.push('');
  });
  lines.push(`Checks passed: ${report.passed}/${report.total}`);
  if (report.blocked) lines.push('BLOCKER: the DNS token cannot manage the zone; certificates cannot be issued');
  return lines;
}
