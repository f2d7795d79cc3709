import dns from 'dns/promises';
import type { Request } from 'express';
import { createChildLogger } from './logger.js';
import { secretsMatch } from './secrets.js';

const logger = createChildLogger('auth');

export type HostResolver = (host: string) => Promise<string[]>;

export const resolveHostAddresses: HostResolver = async (host) => {
  const addresses = await dns.lookup(host, { all: true });
  return addresses.map((entry) => entry.address);
};

/**
 * Strip the IPv4-mapped IPv6 prefix so that ::ffff:10.0.0.1 matches 10.0.0.1
 */
export function normalizeAddress(address: string): string {
  return address.startsWith('::ffff:') ? address.substring(7) : address;
}

export function getClientIP(req: Request): string {
  return normalizeAddress(req.socket.remoteAddress || req.ip || 'unknown');
}

/**
 * Whether the remote address belongs to one of the allowed client hosts
 */
export async function isAllowedClient(
  remoteAddress: string,
  allowedClients: readonly string[],
  resolve: HostResolver = resolveHostAddresses
): Promise<boolean> {
  const client = normalizeAddress(remoteAddress);

  for (const host of allowedClients) {
    let addresses: string[];
    try {
      addresses = await resolve(host);
    } catch (error) {
      logger.warn('Unable to resolve allowed client', {
        host,
        error: error instanceof Error ? error.message : 'Unknown',
      });
      continue;
    }
    if (addresses.some((address) => normalizeAddress(address) === client)) {
      return true;
    }
  }

  return false;
}

/**
 * Whether the request carries the IOP shared secret as a Bearer token
 */
export function hasIopSecret(authorization: string | undefined, iopsecret: string): boolean {
  if (!authorization || !authorization.startsWith('Bearer ')) {
    return false;
  }
  return secretsMatch(authorization.substring(7), iopsecret);
}
