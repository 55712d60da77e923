export interface Listener {
  port: number;
  bind?: string;
  protocol: 'mqtt' | 'websockets';
  tls: boolean;
}

export interface ExpectedListener {
  port: number;
  label: string;
}

export const EXPECTED_LISTENERS: readonly ExpectedListener[] = [
  { port: 1883, label: 'mqtt' },
  { port: 8883, label: 'mqtt+TLS' },
  { port: 9001, label: 'websockets' },
  { port: 8084, label: 'websockets+TLS' },
];

/**
 * Reads the listener blocks of a mosquitto.conf. Settings such as `protocol`
 * and `certfile` apply to the most recent `listener` (or legacy `port`) line.
 */
export function parseListeners(conf: string): Listener[] {
  const listeners: Listener[] = [];
  let current: Listener | null = null;
  for (const raw of conf.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const [key, ...rest] = line.split(/\s+/);
    switch (key) {
      case 'listener':
      case 'port': {
        const port = Number(rest[0]);
        if (!Number.isInteger(port)) break;
        current = { port, protocol: 'mqtt', tls: false };
        if (key === 'listener' && rest[1]) current.bind = rest[1];
        listeners.push(current);
        break;
      }
      case 'protocol':
        if (current && rest[0] === 'websockets') current.protocol = 'websockets';
        break;
      case 'certfile':
      case 'keyfile':
        if (current) current.tls = true;
        break;
    }
  }
  return listeners;
}

export function checkListeners(
  listeners: Listener[],
  expected: readonly ExpectedListener[] = EXPECTED_LISTENERS,
): { present: ExpectedListener[]; missing: ExpectedListener[] } {
  const ports = new Set(listeners.map((l) => l.port));
  return {
    present: expected.filter((e) => ports.has(e.port)),
    missing: expected.filter((e) => !ports.has(e.port)),
  };
}
