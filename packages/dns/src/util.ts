import { isUint } from '@dns-relay/wire';
import { DnsFormatError } from './errors.js';

/**
 * Creates a `DataView` over exactly the bytes of `data`, which may be a
 * window into a larger buffer.
 */
export function createView(data: Uint8Array) {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Throws a `DnsFormatError` unless `length` bytes are available
 * at `offset`.
 */
export function ensureAvailable(
  data: Uint8Array,
  offset: number,
  length: number,
  what: string
) {
  if (offset + length > data.length) {
    throw new DnsFormatError(
      `${what} at offset ${offset} needs ${length} bytes, ${Math.max(data.length - offset, 0)} left`
    );
  }
}

/**
 * Throws a `DnsFormatError` unless `value` fits the field's bit width.
 */
export function assertUint(field: string, value: number, bits: number) {
  if (!isUint(value, bits)) {
    throw new DnsFormatError(`${field} ${value} does not fit in ${bits} bits`);
  }
}

/**
 * Normalizes a thrown value into an `Error`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
