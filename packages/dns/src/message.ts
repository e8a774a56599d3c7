import { concatBytes } from '@dns-relay/wire';
import { HEADER_LENGTH } from './constants.js';
import { DnsFormatError } from './errors.js';
import { createQueryHeader, parseHeader, serializeHeader } from './header.js';
import {
  parseQuestion,
  questionLabelsAt,
  questionLength,
  serializeQuestion,
} from './question.js';
import { parseResourceRecord, serializeResourceRecord } from './record.js';
import type {
  DnsHeader,
  DnsMessage,
  DnsName,
  DnsQuestion,
  DnsRCode,
  DnsRecord,
} from './types.js';

/**
 * Parses a DNS message.
 *
 * The header counts decide how many entries are read from each section.
 */
export function parseDnsMessage(data: Uint8Array): DnsMessage {
  const [header, headerLength] = parseHeader(data);
  let offset = headerLength;

  const questions: DnsQuestion[] = [];
  for (let i = 0; i < header.questionCount; i++) {
    const [question, newOffset] = parseQuestion(data, offset);
    questions.push(question);
    offset = newOffset;
  }

  const parseRecords = (count: number) => {
    const records: DnsRecord[] = [];
    for (let i = 0; i < count; i++) {
      const [record, newOffset] = parseResourceRecord(data, offset);
      records.push(record);
      offset = newOffset;
    }
    return records;
  };

  // Sections must be read in wire order
  const answers = parseRecords(header.answerCount);
  const authorities = parseRecords(header.authorityCount);
  const additionals = parseRecords(header.additionalCount);

  return {
    header,
    questions,
    answers,
    authorities,
    additionals,
  };
}

/**
 * Serializes a DNS message.
 *
 * Header counts are taken from the section lengths. The message itself
 * is left untouched, so serializing it again gives the same bytes.
 */
export function serializeDnsMessage(message: DnsMessage): Uint8Array {
  const header = serializeHeader({
    ...message.header,
    questionCount: message.questions.length,
    answerCount: message.answers.length,
    authorityCount: message.authorities.length,
    additionalCount: message.additionals.length,
  });

  return concatBytes([
    header,
    ...message.questions.map(serializeQuestion),
    ...message.answers.map(serializeResourceRecord),
    ...message.authorities.map(serializeResourceRecord),
    ...message.additionals.map(serializeResourceRecord),
  ]);
}

/**
 * Creates a query message with a fresh random ID.
 */
export function createQueryMessage(questions: DnsQuestion[]): DnsMessage {
  return {
    header: createQueryHeader(questions.length),
    questions,
    answers: [],
    authorities: [],
    additionals: [],
  };
}

/**
 * Creates the reply to `query`.
 *
 * Only standard queries are answered with NOERROR; any other opcode
 * gets NOTIMP.
 */
export function createReplyMessage(
  query: DnsMessage,
  questions: DnsQuestion[],
  answers: DnsRecord[]
): DnsMessage {
  return {
    header: {
      id: query.header.id,
      isResponse: true,
      opcode: query.header.opcode,
      isAuthoritativeAnswer: false,
      isTruncated: false,
      isRecursionDesired: false,
      isRecursionAvailable: false,
      reserved: 0,
      rcode: query.header.opcode === 'QUERY' ? 'NOERROR' : 'NOTIMP',
      questionCount: questions.length,
      answerCount: answers.length,
      authorityCount: 0,
      additionalCount: 0,
    },
    questions,
    answers,
    authorities: [],
    additionals: [],
  };
}

/**
 * Creates an empty reply carrying only an error code, for requests
 * whose body could not be handled.
 */
export function createErrorReply(
  header: DnsHeader,
  rcode: DnsRCode
): DnsMessage {
  return {
    header: {
      id: header.id,
      isResponse: true,
      opcode: header.opcode,
      isAuthoritativeAnswer: false,
      isTruncated: false,
      isRecursionDesired: false,
      isRecursionAvailable: false,
      reserved: 0,
      rcode,
      questionCount: 0,
      answerCount: 0,
      authorityCount: 0,
      additionalCount: 0,
    },
    questions: [],
    answers: [],
    authorities: [],
    additionals: [],
  };
}

/**
 * Looks up the name stored at `offset` (counted from the start of the
 * message) for a compression pointer.
 *
 * Only the question section is searched. The result may itself end in
 * a pointer.
 */
export function resolveLabels(message: DnsMessage, offset: number): DnsName {
  // `parseName` already rejects these; names built by hand are not parsed
  if (offset < HEADER_LENGTH) {
    throw new DnsFormatError(
      `compression pointer ${offset} points into the header`
    );
  }

  let questionOffset = HEADER_LENGTH;
  for (const question of message.questions) {
    const length = questionLength(question);
    if (offset < questionOffset + length) {
      return questionLabelsAt(question, offset - questionOffset);
    }
    questionOffset += length;
  }

  throw new DnsFormatError(
    `compression pointer ${offset} points past the question section`
  );
}

/**
 * Returns `name` with its compression pointer, if any, replaced by the
 * labels it points to in `message`.
 */
export function decompressName(name: DnsName, message: DnsMessage): DnsName {
  const labels = [...name.labels];
  const visited = new Set<number>();
  let pointer = name.pointer;

  while (pointer !== undefined) {
    if (visited.has(pointer)) {
      throw new DnsFormatError(`compression loop at offset ${pointer}`);
    }
    visited.add(pointer);

    const target = resolveLabels(message, pointer);
    labels.push(...target.labels);
    pointer = target.pointer;
  }

  return { labels };
}
