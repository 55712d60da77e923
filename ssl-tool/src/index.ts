/**
 * ssl-tool CLI entrypoint
 *
 * Purpose
 * - Automates Let's Encrypt certificates for the Mosquitto broker: Hetzner DNS
 *   token checks, DNS-01 issuance through acme.sh, installation into the
 *   broker's certificate directory, a one-shot `setup` and a status report.
 *
 * Environment & Dependencies
 * - See src/config.ts. Reads `.env` via dotenv; the Hetzner token comes from
 *   acme.sh's account.conf or HETZNER_Token.
 * - Shells out to acme.sh, chown, id and crontab.
 *
 * Security Notes
 * - Tokens are never printed. `install`, `fix-permissions` and `setup` run
 *   only as root and leave the private key at mode 600.
 */
import 'dotenv/config';
import { AcmeClient } from './acme.js';
import { runCli } from './cli.js';
import { settingsFromEnv } from './config.js';
import { runCmd } from './exec.js';
import { HetznerClient } from './hetzner.js';

async function main(): Promise<void> {
  const settings = settingsFromEnv();
  const acme = new AcmeClient(runCmd, {
    acmeHome: settings.acmeHome,
    server: settings.acmeServer,
    dnsProvider: settings.dnsProvider,
    reloadCmd: settings.reloadCmd,
  });
  process.exitCode = await runCli(process.argv.slice(2), { settings, run: runCmd, acme, hetzner: new HetznerClient() });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
