import { isIPv4 } from 'net';
import { ValidationError } from '@/types/errors';

const parseOctets = (host: string): number[] => host.split('.').map(part => Number(part));

/**
 * Checks that a configured host is a unicast IPv4 address a unit could own.
 * Rejects loopback (127/8), multicast (224/4), reserved (240/4, including the
 * limited broadcast address) and the unspecified address.
 *
 * @throws ValidationError
 */
export function validateDeviceHost(host: string): void {
  if (!isIPv4(host)) {
    throw new ValidationError(`Invalid IPv4 address: ${host}`);
  }

  const [first] = parseOctets(host);

  if (host === '0.0.0.0') {
    throw new ValidationError(`IP address ${host} is unspecified`);
  }
  if (first === 127) {
    throw new ValidationError(`IP address ${host} is loopback (127.x.x.x)`);
  }
  if (first >= 224 && first <= 239) {
    throw new ValidationError(`IP address ${host} is multicast`);
  }
  if (first >= 240) {
    throw new ValidationError(`IP address ${host} is reserved`);
  }
}

export function isValidDeviceHost(host: string): boolean {
  try {
    validateDeviceHost(host);
    return true;
  } catch {
    return false;
  }
}

/**
 * Formats a 6-byte hardware address held as hex ("accf23aa3190") as
 * "ac:cf:23:aa:31:90".
 */
export function formatMacAddress(hex: string): string {
  return (hex.match(/.{1,2}/g) ?? []).join(':');
}
