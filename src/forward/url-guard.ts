import { promises as dns } from 'dns';
import ipaddr from 'ipaddr.js';
import { OutboundUrlRejectedError } from '../common/errors';

export type HostResolver = (hostname: string) => Promise<string[]>;

export interface OutboundUrlPolicy {
  /** Hosts (and their subdomains) that may be called. Empty means any public host. */
  allowedHosts: readonly string[];
  resolve?: HostResolver;
}

export interface CheckedUrl {
  url: URL;
  /** Address the guard resolved and approved; `null` when no lookup was made. */
  address: string | null;
}

type LookupCallback = (err: Error | null, address: string, family?: 4 | 6) => void;

export const resolveHost: HostResolver = async (hostname) => {
  const addresses = await dns.lookup(hostname, { all: true, verbatim: true });
  return addresses.map((entry) => entry.address);
};

/** Anything outside the global unicast space: loopback, private, link-local, CGNAT, multicast... */
export function isBlockedAddress(address: string): boolean {
  if (!ipaddr.isValid(address)) return true;
  return ipaddr.process(address).range() !== 'unicast';
}

function normalizeHostEntry(entry: string): string {
  return entry.trim().toLowerCase().replace(/^\*?\./, '').replace(/\.$/, '');
}

export function isHostAllowed(hostname: string, allowedHosts: readonly string[]): boolean {
  return allowedHosts
    .map(normalizeHostEntry)
    .filter(Boolean)
    .some((entry) => hostname === entry || hostname.endsWith(`.${entry}`));
}

/** `lookup` for an HTTP request that must connect to an already checked address. */
export function pinnedLookup(address: string) {
  const family = ipaddr.parse(address).kind() === 'ipv6' ? 6 : 4;
  return (_hostname: string, _options: object, callback: LookupCallback) => callback(null, address, family);
}

/**
 * Validates a user-supplied URL before the server calls it. Only https to a
 * public host is accepted; with an allow-list the host must also be on it.
 */
export async function validateOutboundUrl(raw: string, policy: OutboundUrlPolicy): Promise<URL> {
  return (await checkOutboundUrl(raw, policy)).url;
}

/** Same checks as `validateOutboundUrl`, also returning the address DNS gave for the host. */
export async function checkOutboundUrl(raw: string, policy: OutboundUrlPolicy): Promise<CheckedUrl> {
  const reject = (reason: string): never => {
    throw new OutboundUrlRejectedError(raw, reason);
  };

  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return reject('not a valid URL');
  }

  if (url.protocol !== 'https:') reject('only https URLs are allowed');
  if (url.username || url.password) reject('credentials in URLs are not allowed');

  const hostname = url.hostname.toLowerCase().replace(/^\[|\]$/g, '').replace(/\.$/, '');
  if (!hostname) reject('missing host');
  if (hostname === 'localhost' || hostname.endsWith('.localhost')) reject('local hosts are not allowed');

  const isIpLiteral = ipaddr.isValid(hostname);
  if (isIpLiteral && isBlockedAddress(hostname)) reject('private or reserved addresses are not allowed');

  if (policy.allowedHosts.length) {
    if (!isHostAllowed(hostname, policy.allowedHosts)) reject(`host ${hostname} is not on the allow-list`);
    return { url, address: null };
  }

  if (isIpLiteral) return { url, address: null };

  const resolve = policy.resolve ?? resolveHost;
  let addresses: string[];
  try {
    addresses = await resolve(hostname);
  } catch {
    return reject(`host ${hostname} could not be resolved`);
  }
  if (!addresses.length) reject(`host ${hostname} could not be resolved`);
  if (addresses.some(isBlockedAddress)) reject(`host ${hostname} resolves to a private address`);

  return { url, address: addresses[0] };
}
