import {
  IPV4_ADDRESS_LENGTH,
  isIPv4Address,
  parseIPv4Address,
  serializeIPv4Address,
} from '@dns-relay/wire';
import {
  formatCode,
  parseDnsClass,
  parseDnsType,
  serializeDnsClass,
  serializeDnsType,
} from './codes.js';
import { DnsFormatError, DnsUnsupportedError } from './errors.js';
import { parseName, serializeName } from './name.js';
import type {
  DnsARecord,
  DnsClass,
  DnsName,
  DnsRecord,
  DnsResourceData,
  DnsType,
} from './types.js';
import { assertUint, createView, ensureAvailable } from './util.js';

// type(2) + class(2) + ttl(4) + rdlength(2)
const RECORD_FIELDS_LENGTH = 10;

/**
 * Creates an A record.
 */
export function createARecord(
  name: DnsName,
  ip: string,
  ttl: number,
  cls: DnsClass = 'IN'
): DnsARecord {
  if (!isIPv4Address(ip)) {
    throw new DnsFormatError(`invalid ipv4 address: ${ip}`);
  }
  assertUint('ttl', ttl, 32);

  return { name, type: 'A', class: cls, ttl, ip };
}

/**
 * Parses the type specific data (RDATA) of a resource record.
 *
 * Only A records have a data codec.
 */
export function parseResourceData(
  type: DnsType,
  data: Uint8Array,
  offset: number,
  length: number
): DnsResourceData {
  switch (type) {
    case 'A': {
      if (length !== IPV4_ADDRESS_LENGTH) {
        throw new DnsFormatError(
          `A record data must be ${IPV4_ADDRESS_LENGTH} bytes, got ${length}`
        );
      }
      const ip = parseIPv4Address(data.slice(offset, offset + length));
      return { type, ip };
    }
    default: {
      throw new DnsUnsupportedError(
        `unsupported record type: ${formatCode(type)}`
      );
    }
  }
}

/**
 * Serializes the type specific data (RDATA) of a resource record,
 * prefixed with its 16 bit length.
 */
export function serializeResourceData(data: DnsResourceData) {
  switch (data.type) {
    case 'A': {
      if (!isIPv4Address(data.ip)) {
        throw new DnsFormatError(`invalid ipv4 address: ${data.ip}`);
      }
      const buffer = new Uint8Array(2 + IPV4_ADDRESS_LENGTH);
      createView(buffer).setUint16(0, IPV4_ADDRESS_LENGTH);
      buffer.set(serializeIPv4Address(data.ip), 2);
      return buffer;
    }
    default: {
      throw new DnsUnsupportedError('unsupported record type');
    }
  }
}

/**
 * Parses a DNS resource record (answer, authority, or additional).
 */
export function parseResourceRecord(
  data: Uint8Array,
  offset: number
): [record: DnsRecord, offset: number] {
  const [name, nameOffset] = parseName(data, offset);
  ensureAvailable(data, nameOffset, RECORD_FIELDS_LENGTH, 'resource record');

  const view = createView(data);
  const type = parseDnsType(view.getUint16(nameOffset));
  const cls = parseDnsClass(view.getUint16(nameOffset + 2));
  const ttl = view.getUint32(nameOffset + 4);
  const rdLength = view.getUint16(nameOffset + 8);

  const dataOffset = nameOffset + RECORD_FIELDS_LENGTH;
  ensureAvailable(data, dataOffset, rdLength, 'resource data');

  const resourceData = parseResourceData(type, data, dataOffset, rdLength);

  return [
    { name, class: cls, ttl, ...resourceData },
    dataOffset + rdLength,
  ];
}

/**
 * Serializes a DNS resource record (answer, authority, or additional).
 */
export function serializeResourceRecord(record: DnsRecord) {
  assertUint('ttl', record.ttl, 32);

  const nameBytes = serializeName(record.name);
  const resourceData = serializeResourceData(record);

  // The data carries its own length prefix, so only type, class and
  // ttl are written here
  const fieldsLength = RECORD_FIELDS_LENGTH - 2;
  const buffer = new Uint8Array(
    nameBytes.length + fieldsLength + resourceData.length
  );
  const view = createView(buffer);
  let offset = 0;

  buffer.set(nameBytes, offset);
  offset += nameBytes.length;

  view.setUint16(offset, serializeDnsType(record.type));
  view.setUint16(offset + 2, serializeDnsClass(record.class));
  view.setUint32(offset + 4, record.ttl);
  offset += fieldsLength;

  buffer.set(resourceData, offset);

  return buffer;
}
