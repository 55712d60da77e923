import os from 'os';
import path from 'path';

export const SERVICE = 'ssl-tool';

// Domain the broker certificate is issued for; falls back to SSL_DOMAIN in account.conf
export const SSL_DOMAIN: string = process.env.SSL_DOMAIN || '';

// acme.sh
export const ACME_HOME: string = process.env.ACME_HOME || path.join(os.homedir(), '.acme.sh');
export const ACME_SERVER: string = process.env.ACME_SERVER || 'letsencrypt';
export const HETZNER_DNS_PROVIDER: string = process.env.HETZNER_DNS_PROVIDER || 'dns_hetzner';

// Mosquitto
export const MOSQUITTO_CERT_DIR: string = process.env.MOSQUITTO_CERT_DIR || '/etc/mosquitto/certs';
export const MOSQUITTO_USER: string = process.env.MOSQUITTO_USER || 'mosquitto';
export const MOSQUITTO_GROUP: string = process.env.MOSQUITTO_GROUP || 'mosquitto';
export const MOSQUITTO_CONF: string = process.env.MOSQUITTO_CONF || '/etc/mosquitto/mosquitto.conf';
export const MOSQUITTO_RELOAD_CMD: string = process.env.MOSQUITTO_RELOAD_CMD || 'systemctl reload mosquitto';

// Hetzner APIs
export const HETZNER_CLOUD_API: string = process.env.HETZNER_CLOUD_API || 'https://api.hetzner.cloud/v1';
export const HETZNER_DNS_API: string = process.env.HETZNER_DNS_API || 'https://dns.hetzner.com/api/v1';
export const HTTP_TIMEOUT_MS: number = Number(process.env.HTTP_TIMEOUT_MS || 15000);

export interface SslSettings {
  domain: string;
  acmeHome: string;
  acmeServer: string;
  dnsProvider: string;
  certDir: string;
  mosquittoUser: string;
  mosquittoGroup: string;
  mosquittoConf: string;
  reloadCmd: string;
}

export function settingsFromEnv(): SslSettings {
  return {
    domain: SSL_DOMAIN,
    acmeHome: ACME_HOME,
    acmeServer: ACME_SERVER,
    dnsProvider: HETZNER_DNS_PROVIDER,
    certDir: MOSQUITTO_CERT_DIR,
    mosquittoUser: MOSQUITTO_USER,
    mosquittoGroup: MOSQUITTO_GROUP,
    mosquittoConf: MOSQUITTO_CONF,
    reloadCmd: MOSQUITTO_RELOAD_CMD,
  };
}

export function accountConfPath(acmeHome: string): string {
  return path.join(acmeHome, 'account.conf');
}
