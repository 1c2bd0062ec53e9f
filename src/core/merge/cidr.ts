import { isIP } from 'node:net';

/**
 * True for a bare IPv4/IPv6 address or an address with a prefix length
 * that fits its family (`10.0.0.0/8`, `2001:db8::/32`).
 */
export function isIpOrCidr(value: string): boolean {
  const slash = value.indexOf('/');
  const address = slash === -1 ? value : value.slice(0, slash);
  const family = isIP(address);
  if (family === 0) return false;
  if (slash === -1) return true;

  const prefix = value.slice(slash + 1);
  if (!/^\d{1,3}$/.test(prefix)) return false;
  return Number(prefix) <= (family === 4 ? 32 : 128);
}
