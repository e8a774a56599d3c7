import { getRandomValues } from 'crypto';
import {
  parseDnsOpCode,
  parseDnsRCode,
  serializeDnsOpCode,
  serializeDnsRCode,
} from './codes.js';
import { HEADER_LENGTH } from './constants.js';
import { DnsFormatError } from './errors.js';
import type { DnsHeader } from './types.js';
import { assertUint, createView } from './util.js';

/**
 * Parses a DNS header.
 *
 * Unknown opcodes and response codes do not fail the parse; they come
 * back as `{ unknown: value }`.
 */
export function parseHeader(
  data: Uint8Array
): [header: DnsHeader, offset: number] {
  if (data.length < HEADER_LENGTH) {
    throw new DnsFormatError(
      `dns header is too short: ${data.length} of ${HEADER_LENGTH} bytes`
    );
  }

  const view = createView(data);
  const flags = view.getUint8(2);
  const flags2 = view.getUint8(3);

  const header: DnsHeader = {
    id: view.getUint16(0),
    isResponse: Boolean(flags & 0x80),
    opcode: parseDnsOpCode((flags >> 3) & 0x0f),
    isAuthoritativeAnswer: Boolean(flags & 0x04),
    isTruncated: Boolean(flags & 0x02),
    isRecursionDesired: Boolean(flags & 0x01),
    isRecursionAvailable: Boolean(flags2 & 0x80),
    reserved: (flags2 >> 4) & 0x07,
    rcode: parseDnsRCode(flags2 & 0x0f),
    questionCount: view.getUint16(4),
    answerCount: view.getUint16(6),
    authorityCount: view.getUint16(8),
    additionalCount: view.getUint16(10),
  };

  return [header, HEADER_LENGTH];
}

/**
 * Serializes a DNS header.
 */
export function serializeHeader(header: DnsHeader): Uint8Array {
  assertUint('id', header.id, 16);
  assertUint('reserved', header.reserved, 3);
  assertUint('question count', header.questionCount, 16);
  assertUint('answer count', header.answerCount, 16);
  assertUint('authority count', header.authorityCount, 16);
  assertUint('additional count', header.additionalCount, 16);

  const buffer = new Uint8Array(HEADER_LENGTH);
  const view = createView(buffer);

  view.setUint16(0, header.id);

  view.setUint8(
    2,
    (header.isResponse ? 0x80 : 0) |
      (serializeDnsOpCode(header.opcode) << 3) |
      (header.isAuthoritativeAnswer ? 0x04 : 0) |
      (header.isTruncated ? 0x02 : 0) |
      (header.isRecursionDesired ? 0x01 : 0)
  );

  view.setUint8(
    3,
    (header.isRecursionAvailable ? 0x80 : 0) |
      (header.reserved << 4) |
      serializeDnsRCode(header.rcode)
  );

  view.setUint16(4, header.questionCount);
  view.setUint16(6, header.answerCount);
  view.setUint16(8, header.authorityCount);
  view.setUint16(10, header.additionalCount);

  return buffer;
}

/**
 * Generates a random 16 bit message ID.
 */
export function generateMessageId(): number {
  return getRandomValues(new Uint16Array(1))[0] ?? 0;
}

/**
 * Creates the header of a new outbound query carrying
 * `questionCount` questions.
 */
export function createQueryHeader(questionCount: number): DnsHeader {
  return {
    id: generateMessageId(),
    isResponse: false,
    opcode: 'QUERY',
    isAuthoritativeAnswer: false,
    isTruncated: false,
    isRecursionDesired: false,
    isRecursionAvailable: false,
    reserved: 0,
    rcode: 'NOERROR',
    questionCount,
    answerCount: 0,
    authorityCount: 0,
    additionalCount: 0,
  };
}
