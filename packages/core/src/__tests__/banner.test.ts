import { describe, it, expect } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import { formatBanner, resolveHostAddress } from '../daemon/banner.js';

function iface(address: string, family: 'IPv4' | 'IPv6', internal: boolean): NetworkInterfaceInfo {
  if (family === 'IPv4') {
    return { address, family, internal, netmask: '255.255.255.0', mac: '00:00:00:00:00:00', cidr: null };
  }
  return {
    address,
    family,
    internal,
    netmask: 'ffff:ffff:ffff:ffff::',
    mac: '00:00:00:00:00:00',
    cidr: null,
    scopeid: 0,
  };
}

describe('resolveHostAddress', () => {
  it('should return the first external IPv4 address', () => {
    const address = resolveHostAddress({
      lo: [iface('127.0.0.1', 'IPv4', true)],
      eth0: [iface('fe80::1', 'IPv6', false), iface('192.168.1.20', 'IPv4', false)],
    });

    expect(address).toBe('192.168.1.20');
  });

  it('should fall back to loopback', () => {
    expect(resolveHostAddress({ lo: [iface('127.0.0.1', 'IPv4', true)] })).toBe('127.0.0.1');
  });
});

describe('formatBanner', () => {
  it('should include the password on first run', () => {
    const rule = '='.repeat(50);

    expect(formatBanner({ address: '192.168.1.20', port: 43210, password: 'testpass' })).toBe(
      [
        '',
        rule,
        'SENTINEL SERVER STARTED',
        rule,
        'IP Address: 192.168.1.20',
        'Port: 43210',
        'Password: testpass',
        rule,
        '',
        '',
      ].join('\n'),
    );
  });

  it('should omit the password line when there is none', () => {
    const banner = formatBanner({ address: '10.0.0.5', port: 43210 });

    expect(banner.split('\n')).not.toContain('Password: testpass');
    expect(banner.split('\n').filter((line) => line.startsWith('Password'))).toEqual([]);
  });
});
