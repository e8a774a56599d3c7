import { parseUint } from './util.js';

export type IPv4Address = `${number}.${number}.${number}.${number}`;

export const IPV4_ADDRESS_LENGTH = 4;

/**
 * Parses a 4 byte IPv4 address into its dotted-quad string.
 */
export function parseIPv4Address(data: Uint8Array) {
  if (data.length !== IPV4_ADDRESS_LENGTH) {
    throw new Error(`ipv4 address must be 4 bytes, got ${data.length}`);
  }

  return data.join('.') as IPv4Address;
}

/**
 * Serialize an IPv4 address string into a Uint8Array.
 *
 * Each octet must be plain decimal digits in the range 0-255.
 */
export function serializeIPv4Address(ip: string) {
  const octets = ip.split('.');

  if (octets.length !== IPV4_ADDRESS_LENGTH) {
    throw new Error(`invalid ipv4 address: ${ip}`);
  }

  try {
    return new Uint8Array(octets.map((octet) => parseUint(octet, 255)));
  } catch (err) {
    throw new Error(`invalid ipv4 address: ${ip}`, { cause: err });
  }
}

export function isIPv4Address(ip: string): ip is IPv4Address {
  try {
    serializeIPv4Address(ip);
    return true;
  } catch {
    return false;
  }
}
