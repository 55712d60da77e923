import { describe, it, expect } from 'vitest';
import { checkListeners, parseListeners } from '../mosquitto-conf.js';

const CONF = `# Default listener
listener 1883
allow_anonymous false

# TLS
listener 8883 0.0.0.0
certfile /etc/mosquitto/certs/mqtt.example.com.crt
keyfile /etc/mosquitto/certs/mqtt.example.com.key

listener 9001
protocol websockets
`;

describe('parseListeners', () => {
  it('reads listener blocks', () => {
    expect(parseListeners(CONF)).toEqual([
      { port: 1883, protocol: 'mqtt', tls: false },
      { port: 8883, bind: '0.0.0.0', protocol: 'mqtt', tls: true },
      { port: 9001, protocol: 'websockets', tls: false },
    ]);
  });

  it('understands the legacy port option', () => {
    expect(parseListeners('port 1883\n#listener 8883\nlistener abc\n')).toEqual([{ port: 1883, protocol: 'mqtt', tls: false }]);
  });
});

describe('checkListeners', () => {
  it('reports the expected ports that are missing', () => {
    const { present, missing } = checkListeners(parseListeners(CONF));
    expect(present.map((l) => l.port)).toEqual([1883, 8883, 9001]);
    expect(missing).toEqual([{ port: 8084, label: 'websockets+TLS' }]);
  });
});
