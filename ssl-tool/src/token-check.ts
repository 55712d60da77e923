import { errorMessage } from '@mqtt-dashboard/shared';
import { HetznerApiError, checkZoneAccess, type CloudTokenStatus, type HetznerClient, type ZoneAccess } from './hetzner.js';

export type ConsoleVerdict =
  | { status: 'access'; zoneCount: number; access: ZoneAccess }
  | { status: 'invalid' }
  | { status: 'error'; message: string };

/** acme.sh DNS plugin that can serve the domain with the checked token. */
export type DnsProvider = 'dns_hetzner' | 'dns_hetznercloud';

export interface TokenReport {
  domain: string;
  console: ConsoleVerdict;
  cloud: CloudTokenStatus;
  /** Zone access through the Cloud API; only looked up for a valid Cloud token. */
  cloudAccess: ZoneAccess | null;
  provider: DnsProvider | null;
}

type TokenApis = Pick<HetznerClient, 'listDnsZones' | 'listCloudZones' | 'checkCloudToken'>;

async function consoleVerdict(hetzner: TokenApis, token: string, domain: string): Promise<ConsoleVerdict> {
  try {
    const zones = await hetzner.listDnsZones(token);
    return { status: 'access', zoneCount: zones.length, access: checkZoneAccess(zones, domain) };
  } catch (e) {
    if (e instanceof HetznerApiError && e.code === 'invalid_credentials') return { status: 'invalid' };
    return { status: 'error', message: errorMessage(e) };
  }
}

async function cloudVerdict(hetzner: TokenApis, token: string, domain: string): Promise<[CloudTokenStatus, ZoneAccess | null]> {
  let status: CloudTokenStatus;
  try {
    status = await hetzner.checkCloudToken(token);
  } catch {
    return ['unknown', null];
  }
  if (status !== 'valid') return [status, null];
  try {
    return [status, checkZoneAccess(await hetzner.listCloudZones(token), domain)];
  } catch {
    return [status, null];
  }
}

/**
 * Tries `token` against both Hetzner DNS backends: the DNS Console API
 * (dns.hetzner.com, used by dns_hetzner) and the Cloud API (used by
 * dns_hetznercloud).
 */
export async function checkToken(hetzner: TokenApis, token: string, domain: string): Promise<TokenReport> {
  const [consoleResult, [cloud, cloudAccess]] = await Promise.all([
    consoleVerdict(hetzner, token, domain),
    cloudVerdict(hetzner, token, domain),
  ]);
  let provider: DnsProvider | null = null;
  if (consoleResult.status === 'access' && consoleResult.access.status === 'ok') provider = 'dns_hetzner';
  else if (cloudAccess?.status === 'ok') provider = 'dns_hetznercloud';
  return { domain, console: consoleResult, cloud, cloudAccess, provider };
}

function consoleLines(verdict: ConsoleVerdict, domain: string): string[] {
  if (verdict.status === 'invalid') return ['[FAIL] DNS Console API: Unauthorized (invalid token)'];
  if (verdict.status === 'error') return [`[FAIL] DNS Console API: ${verdict.message}`];
  const { access, zoneCount } = verdict;
  switch (access.status) {
    case 'no_zones':
      return ['[WARN] DNS Console API: No zones found'];
    case 'missing':
      return [`[OK] DNS Console API: ${zoneCount} zone(s) accessible`, `[WARN] No zone for ${domain} among: ${access.found.join(', ')}`];
    case 'ok':
      return [`[OK] DNS Console API: ${zoneCount} zone(s) accessible`, `[OK] Zone '${access.zone}' is accessible via DNS Console API`];
  }
}

function cloudLines(report: TokenReport): string[] {
  if (report.cloud === 'unauthorized') return ['[WARN] Cloud API: Token not valid for Hetzner Cloud API'];
  if (report.cloud === 'forbidden') return ['[FAIL] Cloud API: Forbidden (insufficient permissions)'];
  if (report.cloud === 'unknown') return ['[WARN] Cloud API: Could not verify (may be a DNS-only token)'];
  const lines = ['[OK] Cloud API: Token is valid for Hetzner Cloud'];
  if (report.cloudAccess?.status === 'ok') lines.push(`[OK] Zone '${report.cloudAccess.zone}' is accessible via Cloud API`);
  else lines.push(`[WARN] No zone for ${report.domain} via Cloud API`);
  return lines;
}

export function formatTokenReport(report: TokenReport): string[] {
  const lines = [...consoleLines(report.console, report.domain), ...cloudLines(report)];
  switch (report.provider) {
    case 'dns_hetzner':
      lines.push('READY: DNS Console token; issue with --dns dns_hetzner');
      break;
    case 'dns_hetznercloud':
      lines.push('READY: Cloud token; issue with --dns dns_hetznercloud (set HETZNER_DNS_PROVIDER)');
      break;
    case null:
      lines.push(`NOT READY: no zone for ${report.domain} is accessible with this token`);
      break;
  }
  return lines;
}
