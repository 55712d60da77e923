import { parseArgs } from 'util';
import { errorMessage } from '@mqtt-dashboard/shared';
import { readAccountConf, resolveToken, saveToken } from './account-conf.js';
import { AcmeError, type AcmeClient } from './acme.js';
import { accountConfPath, type SslSettings } from './config.js';
import { userExists, type CommandRunner } from './exec.js';
import { HetznerApiError, checkZoneAccess, type HetznerClient, type Zone } from './hetzner.js';
import {
  fixPermissions,
  inspectInstalledCertificate,
  installCertificate,
  installedPaths,
  prepareCertDir,
  type InstallResult,
  type Ownership,
} from './install.js';
import { buildPreflight, buildStatusReport, formatReport } from './status.js';
import { checkToken, formatTokenReport } from './token-check.js';

export const USAGE = `Usage: mqtt-ssl <command> [options]

Let's Encrypt certificates for Mosquitto via Hetzner DNS and acme.sh.

Commands:
  zones [--token T] [--json]              List DNS zones visible to the Cloud API token
  test-token <token> [--domain D] [--save] Check a DNS Console token against the domain's zone
  verify-token [--token T] [--domain D]   Tell a DNS Console token from a Cloud token
  issue [--staging] [--force]             Issue the certificate with acme.sh (DNS-01)
  install [--force]                       Copy the certificate into Mosquitto's certificate directory (root)
  fix-permissions [--domain D]            Reset ownership and modes of the installed files (root)
  setup [--staging] [--force]             Check, issue, install and register renewal in one go (root)
  status                                  Show the state of every setup step
  help                                    Show this message

Environment: SSL_DOMAIN, ACME_HOME, MOSQUITTO_CERT_DIR, MOSQUITTO_CONF, MOSQUITTO_RELOAD_CMD, HETZNER_Token`;

export interface CliDeps {
  settings: SslSettings;
  run: CommandRunner;
  acme: AcmeClient;
  hetzner: HetznerClient;
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Defaults to checking the effective uid. */
  isRoot?: () => boolean;
}

type Values = {
  token?: string;
  json?: boolean;
  domain?: string;
  save?: boolean;
  staging?: boolean;
  force?: boolean;
  help?: boolean;
};

class UsageError extends Error {}

/** Runs one CLI invocation and returns the exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let values: Values;
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        token: { type: 'string' },
        json: { type: 'boolean' },
        domain: { type: 'string' },
        save: { type: 'boolean' },
        staging: { type: 'boolean' },
        force: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    err(USAGE);
    return 1;
  }

  const [command = 'help', ...rest] = positionals;
  if (values.help || command === 'help') {
    out(USAGE);
    return 0;
  }

  try {
    switch (command) {
      case 'zones':
        return await zones(values, deps, out, err);
      case 'test-token':
        return await testToken(rest[0], values, deps, out, err);
      case 'verify-token':
        return await verifyToken(values, deps, out, err);
      case 'issue':
        return await issue(values, deps, out, err);
      case 'install':
        return await install(values, deps, out, err);
      case 'fix-permissions':
        return await fixPermissionsCommand(values, deps, out, err);
      case 'setup':
        return await setup(values, deps, out, err);
      case 'status':
        return await status(deps, out, err);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      err(`Error: ${e.message}`);
      err(USAGE);
      return 1;
    }
    if (e instanceof AcmeError || e instanceof HetznerApiError) {
      err(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

type Print = (line: string) => void;

async function domainOf(deps: CliDeps, override?: string): Promise<string> {
  const domain =
    override || deps.settings.domain || (await readAccountConf(accountConfPath(deps.settings.acmeHome))).get('SSL_DOMAIN');
  if (!domain) throw new UsageError('No domain configured (set SSL_DOMAIN or pass --domain)');
  return domain;
}

async function zones(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  const conf = await readAccountConf(accountConfPath(deps.settings.acmeHome));
  const resolved = resolveToken({ override: values.token, conf, env: deps.env });
  if (!resolved) {
    err('Error: no Hetzner token found (account.conf, HETZNER_Token or --token)');
    return 1;
  }
  const list = await deps.hetzner.listCloudZones(resolved.token);
  if (values.json) {
    out(JSON.stringify({ zones: list }, null, 2));
    return 0;
  }
  if (list.length === 0) {
    out('No zones accessible with this token');
    return 0;
  }
  out(`Zones (token from ${resolved.source}):`);
  for (const z of list) out(`  ${z.name}  id=${z.id} ttl=${z.ttl}`);
  return 0;
}

async function testToken(token: string | undefined, values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  if (!token) throw new UsageError('test-token needs a token');
  const domain = await domainOf(deps, values.domain);

  let list: Zone[];
  try {
    list = await deps.hetzner.listDnsZones(token);
  } catch (e) {
    if (e instanceof HetznerApiError && e.code === 'invalid_credentials') {
      err('[FAIL] Invalid token - authentication failed');
      err('Use a token from dns.hetzner.com, not from console.hetzner.cloud');
      return 1;
    }
    throw e;
  }

  const access = checkZoneAccess(list, domain);
  if (access.status !== 'ok') {
    const found = access.status === 'missing' ? access.found.join(' ') : 'none';
    err(`[WARN] Token is valid but does NOT have access to ${domain}`);
    err(`Zones accessible with this token: ${found}`);
    return 1;
  }

  out(`[OK] Token is valid and has access to the ${access.zone} zone`);
  if (values.save) {
    const file = accountConfPath(deps.settings.acmeHome);
    await saveToken(file, 'SAVED_HETZNER_Token', token);
    out(`[OK] Token saved to ${file}`);
  }
  return 0;
}

function requireRoot(command: string, deps: CliDeps, err: Print): boolean {
  const isRoot = deps.isRoot ?? (() => process.getuid?.() === 0);
  if (isRoot()) return true;
  err(`Error: ${command} must be run as root (use sudo)`);
  return false;
}

function ownerOf(settings: SslSettings): Ownership {
  return { user: settings.mosquittoUser, group: settings.mosquittoGroup };
}

async function verifyToken(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  const domain = await domainOf(deps, values.domain);
  const conf = await readAccountConf(accountConfPath(deps.settings.acmeHome));
  const resolved = resolveToken({ override: values.token, conf, env: deps.env });
  if (!resolved) {
    err('Error: no Hetzner token found (account.conf, HETZNER_Token or --token)');
    return 1;
  }
  out(`Checking the token from ${resolved.source} for ${domain}`);
  const report = await checkToken(deps.hetzner, resolved.token, domain);
  for (const line of formatTokenReport(report)) out(line);
  return report.provider ? 0 : 1;
}

async function issueCertificate(domain: string, values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  const conf = await readAccountConf(accountConfPath(deps.settings.acmeHome));
  const resolved = resolveToken({ conf, env: deps.env });
  if (!resolved) {
    err('Error: Hetzner DNS token not configured (SAVED_HETZNER_Token in account.conf or HETZNER_Token)');
    return 1;
  }

  if (!values.force && (await deps.acme.isRegistered(domain))) {
    out(`Certificate for ${domain} already exists; use --force to re-issue`);
    return 0;
  }
  const server = values.staging ? `${deps.settings.acmeServer} (staging)` : deps.settings.acmeServer;
  out(`Issuing certificate for ${domain} via ${deps.settings.dnsProvider} on ${server}`);
  await deps.acme.issue(domain, { token: resolved.token, staging: values.staging, force: values.force });
  out('Certificate issued');
  if (values.staging) out('Staging certificates are not trusted by clients');
  return 0;
}

async function issue(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  return issueCertificate(await domainOf(deps), values, deps, out, err);
}

async function installAndHook(domain: string, force: boolean | undefined, deps: CliDeps, out: Print, err: Print): Promise<number> {
  const { settings } = deps;
  const owner = ownerOf(settings);
  let result: InstallResult;
  try {
    result = await installCertificate(deps.run, {
      domain,
      acmeHome: settings.acmeHome,
      certDir: settings.certDir,
      user: owner.user,
      group: owner.group,
      force,
    });
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    return 1;
  }
  if (result.status === 'unchanged') {
    out(`Certificate at ${result.certFile} is current; ownership and modes reset`);
    return 0;
  }
  out(`Installed ${result.certFile} (644) and ${result.keyFile} (600)`);

  // Registers the renewal hook so acme.sh redeploys and reloads Mosquitto on renewal.
  try {
    await deps.acme.installCert(domain, { fullchainFile: result.certFile, keyFile: result.keyFile });
    out(`Renewal hook set: ${settings.reloadCmd}`);
  } catch (e) {
    const { certFile, keyFile } = installedPaths(settings.certDir, domain);
    err(`Warning: could not set the renewal hook: ${errorMessage(e)}`);
    err(`Run: ${deps.acme.binary} --install-cert -d ${domain} --fullchain-file ${certFile} --key-file ${keyFile} --reloadcmd '${settings.reloadCmd}'`);
  }
  return 0;
}

async function install(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  if (!requireRoot('install', deps, err)) return 1;
  return installAndHook(await domainOf(deps), values.force, deps, out, err);
}

/** Compares the installed files against crt 644 / key 600; prints one line per file. */
async function verifyInstalled(domain: string, deps: CliDeps, out: Print, err: Print): Promise<boolean> {
  const { cert, key } = await inspectInstalledCertificate(deps.settings.certDir, domain);
  let ok = true;
  for (const [file, expected] of [
    [cert, '644'],
    [key, '600'],
  ] as const) {
    if (file.mode === expected) {
      out(`[OK] ${file.path} (${expected})`);
    } else {
      ok = false;
      err(`[FAIL] ${file.path}: ${file.exists ? `mode ${file.mode}, expected ${expected}` : 'not found'}`);
    }
  }
  return ok;
}

async function fixPermissionsCommand(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  if (!requireRoot('fix-permissions', deps, err)) return 1;
  const domain = await domainOf(deps, values.domain);
  const owner = ownerOf(deps.settings);
  if (!(await userExists(deps.run, owner.user))) {
    err(`Error: Mosquitto user '${owner.user}' does not exist; install Mosquitto first`);
    return 1;
  }
  try {
    await fixPermissions(deps.run, installedPaths(deps.settings.certDir, domain), owner);
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    err('Install the certificate first: mqtt-ssl install');
    return 1;
  }
  out(`Ownership set to ${owner.user}:${owner.group}`);
  return (await verifyInstalled(domain, deps, out, err)) ? 0 : 1;
}

async function setup(values: Values, deps: CliDeps, out: Print, err: Print): Promise<number> {
  if (!requireRoot('setup', deps, err)) return 1;
  const domain = await domainOf(deps);
  const settings = { ...deps.settings, domain };

  out(`Step 1: checking prerequisites for ${domain}`);
  const failed = (await buildPreflight({ ...deps, settings }))
    .flatMap((section) => section.checks)
    .filter((c) => c.status === 'fail' || c.status === 'blocked');
  if (failed.length > 0) {
    for (const c of failed) err(`  ✗ ${c.name}: ${c.message}`);
    err('Prerequisites check failed; fix the issues above and run setup again');
    return 1;
  }

  out(`Step 2: preparing ${settings.certDir}`);
  try {
    await prepareCertDir(deps.run, settings.certDir, ownerOf(settings));
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    return 1;
  }

  out('Step 3: issuing the certificate');
  if ((await issueCertificate(domain, values, deps, out, err)) !== 0) return 1;

  out('Step 4: installing the certificate');
  if ((await installAndHook(domain, values.force, deps, out, err)) !== 0) return 1;

  out('Step 5: verifying the installation');
  if (!(await verifyInstalled(domain, deps, out, err))) return 1;
  out(`Setup complete; point a TLS listener at ${installedPaths(settings.certDir, domain).certFile} and reload Mosquitto`);
  return 0;
}

async function status(deps: CliDeps, out: Print, err: Print): Promise<number> {
  const domain = await domainOf(deps);
  const report = await buildStatusReport({ ...deps, settings: { ...deps.settings, domain } });
  for (const line of formatReport(report)) out(line);
  if (report.blocked) {
    err('Fix the blocked checks above before issuing a certificate');
    return 1;
  }
  return 0;
}
