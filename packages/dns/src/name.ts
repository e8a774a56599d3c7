import { HEADER_LENGTH, MAX_LABEL_LENGTH, POINTER_FLAG } from './constants.js';
import { DnsFormatError, DnsUnsupportedError } from './errors.js';
import type { DnsName } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Parses a DNS name starting at `offset`.
 *
 * `data` must be the whole message, not a slice of it: the offset
 * stored for a compression pointer is relative to the start of the
 * message. Pointers are not followed here, see `decompressName`.
 */
export function parseName(
  data: Uint8Array,
  offset: number
): [name: DnsName, offset: number] {
  const labels: string[] = [];
  let currentOffset = offset;

  while (true) {
    const length = data[currentOffset];
    if (length === undefined) {
      throw new DnsFormatError(`name at offset ${offset} is truncated`);
    }
    currentOffset++;

    if (length === 0) {
      return [{ labels }, currentOffset];
    }

    if ((length & POINTER_FLAG) === POINTER_FLAG) {
      const low = data[currentOffset];
      if (low === undefined) {
        throw new DnsFormatError(
          `compression pointer at offset ${currentOffset - 1} is truncated`
        );
      }

      // A pointer always ends the name
      const pointer = ((length & 0x3f) << 8) | low;
      if (pointer < HEADER_LENGTH) {
        throw new DnsFormatError(
          `compression pointer ${pointer} points into the header`
        );
      }
      return [{ labels, pointer }, currentOffset + 1];
    }

    if (length > MAX_LABEL_LENGTH) {
      throw new DnsFormatError(
        `label length ${length} at offset ${currentOffset - 1} exceeds ${MAX_LABEL_LENGTH} bytes`
      );
    }

    if (currentOffset + length > data.length) {
      throw new DnsFormatError(
        `label at offset ${currentOffset - 1} is truncated`
      );
    }

    labels.push(
      decodeLabel(data.subarray(currentOffset, currentOffset + length))
    );
    currentOffset += length;
  }
}

/**
 * Serializes a DNS name as length-prefixed labels and a root label.
 *
 * Compression is not implemented, so a name that still holds a pointer
 * must be decompressed first.
 */
export function serializeName(name: DnsName): Uint8Array {
  if (name.pointer !== undefined) {
    throw new DnsUnsupportedError(
      `cannot serialize compressed name ${formatName(name)}`
    );
  }

  const labels = name.labels.map(encodeLabel);
  const length = labels.reduce((sum, label) => sum + 1 + label.length, 1);

  if (length > 0xffff) {
    throw new DnsFormatError(`name is too long: ${length} bytes`);
  }

  const bytes = new Uint8Array(length);
  let offset = 0;

  for (const label of labels) {
    bytes[offset] = label.length;
    bytes.set(label, offset + 1);
    offset += 1 + label.length;
  }

  bytes[offset] = 0; // Root label
  return bytes;
}

/**
 * Number of bytes `name` takes on the wire, as it was read.
 *
 * A trailing pointer costs 2 bytes and replaces the root label.
 */
export function nameLength(name: DnsName): number {
  const labels = name.labels.reduce(
    (sum, label) => sum + 1 + labelLength(label),
    0
  );
  return labels + (name.pointer === undefined ? 1 : 2);
}

/**
 * Number of bytes in a label, excluding its length prefix.
 */
export function labelLength(label: string): number {
  return encoder.encode(label).length;
}

/**
 * Creates a name from dotted text.
 *
 * @example
 * createName('codecrafters.io');
 * // { labels: ['codecrafters', 'io'] }
 */
export function createName(text: string): DnsName {
  const trimmed = text.replace(/^\.|\.$/g, '');

  if (trimmed === '') {
    return { labels: [] };
  }

  const labels = trimmed.split('.');
  labels.forEach(encodeLabel);

  return { labels };
}

/**
 * Formats a name as dotted text. A pointer shows as `@offset`.
 */
export function formatName(name: DnsName): string {
  const parts =
    name.pointer === undefined
      ? name.labels
      : [...name.labels, `@${name.pointer}`];

  return parts.length === 0 ? '.' : parts.join('.');
}

function encodeLabel(label: string): Uint8Array {
  const bytes = encoder.encode(label);

  if (bytes.length === 0) {
    throw new DnsFormatError('empty label');
  }

  if (bytes.length > MAX_LABEL_LENGTH) {
    throw new DnsFormatError(
      `label '${label}' is ${bytes.length} bytes, max is ${MAX_LABEL_LENGTH}`
    );
  }

  return bytes;
}

function decodeLabel(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new DnsFormatError('label is not valid utf-8', { cause: err });
  }
}
