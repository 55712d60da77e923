import axios, { type AxiosInstance } from 'axios';
import { isRecord, readNumber, readString } from '@mqtt-dashboard/shared';
import { HETZNER_CLOUD_API, HETZNER_DNS_API, HTTP_TIMEOUT_MS } from './config.js';

export interface Zone {
  id: string;
  name: string;
  ttl: number;
}

export class HetznerApiError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'HetznerApiError';
  }
}

export interface HetznerUrls {
  cloud: string;
  dns: string;
}

function toZone(raw: unknown): Zone[] {
  if (!isRecord(raw)) return [];
  const name = readString(raw, 'name');
  if (!name) return [];
  const id = raw.id;
  return [{ id: typeof id === 'string' || typeof id === 'number' ? String(id) : '', name, ttl: readNumber(raw, 'ttl') ?? 0 }];
}

function apiError(body: unknown): HetznerApiError | null {
  if (!isRecord(body)) return null;
  const error = body.error;
  if (isRecord(error)) {
    const code = readString(error, 'code') ?? String(readNumber(error, 'code') ?? 'api_error');
    return new HetznerApiError(code, readString(error, 'message') ?? 'Hetzner API error');
  }
  if (typeof error === 'string') return new HetznerApiError('api_error', error);
  return null;
}

function zonesOf(body: unknown, status: number): Zone[] {
  if (status >= 400) throw new HetznerApiError(`http_${status}`, `Hetzner API returned HTTP ${status}`);
  if (!isRecord(body) || !Array.isArray(body.zones)) {
    throw new HetznerApiError('invalid_response', 'Unexpected response from Hetzner API');
  }
  return body.zones.flatMap(toZone);
}

/**
 * Zone listing for the two Hetzner DNS backends. Network failures surface as
 * axios errors; anything the API itself rejects becomes a HetznerApiError.
 */
export class HetznerClient {
  constructor(
    private readonly http: AxiosInstance = axios.create({ timeout: HTTP_TIMEOUT_MS }),
    private readonly urls: HetznerUrls = { cloud: HETZNER_CLOUD_API, dns: HETZNER_DNS_API },
  ) {}

  /** Hetzner Cloud API (console.hetzner.cloud tokens). */
  async listCloudZones(token: string): Promise<Zone[]> {
    const res = await this.http.get<unknown>(`${this.urls.cloud}/zones`, {
      headers: { Authorization: `Bearer ${token}` },
      validateStatus: () => true,
    });
    const error = apiError(res.data);
    if (error) throw error;
    return zonesOf(res.data, res.status);
  }

  /** DNS Console API (dns.hetzner.com tokens), which dns_hetzner uses. */
  async listDnsZones(token: string): Promise<Zone[]> {
    const res = await this.http.get<unknown>(`${this.urls.dns}/zones`, {
      headers: { 'Auth-API-Token': token },
      validateStatus: () => true,
    });
    if (isRecord(res.data) && readString(res.data, 'message') === 'Invalid authentication credentials') {
      throw new HetznerApiError('invalid_credentials', 'Invalid authentication credentials');
    }
    const error = apiError(res.data);
    if (error) throw error;
    return zonesOf(res.data, res.status);
  }

  /** Whether `token` is a Hetzner Cloud token, judged from a read-only Cloud API call. */
  async checkCloudToken(token: string): Promise<CloudTokenStatus> {
    const res = await this.http.get<unknown>(`${this.urls.cloud}/primary_ips`, {
      headers: { Authorization: `Bearer ${token}` },
      validateStatus: () => true,
    });
    const error = apiError(res.data);
    if (error) return error.code === 'unauthorized' || error.code === 'forbidden' ? error.code : 'unknown';
    return isRecord(res.data) && Array.isArray(res.data.primary_ips) ? 'valid' : 'unknown';
  }
}

export type CloudTokenStatus = 'valid' | 'unauthorized' | 'forbidden' | 'unknown';

export type ZoneAccess =
  | { status: 'ok'; zone: string }
  | { status: 'no_zones' }
  | { status: 'missing'; found: string[] };

function normalise(name: string): string {
  return name.trim().toLowerCase().replace(/\.$/, '');
}

/** Finds the zone that `domain` lives in; the most specific one wins. */
export function checkZoneAccess(zones: Zone[], domain: string): ZoneAccess {
  if (zones.length === 0) return { status: 'no_zones' };
  const wanted = normalise(domain);
  let best: string | null = null;
  for (const zone of zones) {
    const name = normalise(zone.name);
    if (wanted !== name && !wanted.endsWith(`.${name}`)) continue;
    if (best === null || name.length > best.length) best = name;
  }
  return best === null ? { status: 'missing', found: zones.map((z) => z.name) } : { status: 'ok', zone: best };
}
