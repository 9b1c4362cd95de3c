import { networkInterfaces } from 'node:os';
import type { NetworkInterfaceInfo } from 'node:os';

const RULE = '='.repeat(50);

export interface BannerDetails {
  address: string;
  port: number;
  password?: string;
}

/** First external IPv4 address of the host, or loopback when there is none. */
export function resolveHostAddress(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces(),
): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        return entry.address;
      }
    }
  }
  return '127.0.0.1';
}

export function formatBanner(details: BannerDetails): string {
  const lines = [
    '',
    RULE,
    'SENTINEL SERVER STARTED',
    RULE,
    `IP Address: ${details.address}`,
    `Port: ${details.port}`,
  ];
  if (details.password !== undefined) {
    lines.push(`Password: ${details.password}`);
  }
  lines.push(RULE, '');
  return lines.join('\n') + '\n';
}
