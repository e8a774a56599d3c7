import { describe, expect, test } from 'vitest';
import { bytes } from '../test/util.js';
import { DnsFormatError, DnsUnsupportedError } from './errors.js';
import {
  createErrorReply,
  createQueryMessage,
  createReplyMessage,
  decompressName,
  parseDnsMessage,
  resolveLabels,
  serializeDnsMessage,
} from './message.js';
import { createName } from './name.js';
import { createARecord } from './record.js';
import type { DnsMessage, DnsQuestion } from './types.js';

const question: DnsQuestion = {
  name: createName('codecrafters.io'),
  type: 'A',
  class: 'IN',
};

// A reply whose answer name points back at the question name
const replyBytes = bytes(
  0x04, 0xd2, // ID = 1234
  0x81, 0x80, // QR, RD, RA
  0x00, 0x01, // 1 question
  0x00, 0x01, // 1 answer
  0x00, 0x00,
  0x00, 0x00,
  12, 'codecrafters', 2, 'io', 0, // offset 12
  0x00, 0x01, 0x00, 0x01,
  0xc0, 12, // pointer to offset 12
  0x00, 0x01, 0x00, 0x01,
  0x00, 0x00, 0x00, 0x3c,
  0x00, 0x04, 8, 8, 8, 8
);

function messageWith(questions: DnsQuestion[]): DnsMessage {
  return { ...createQueryMessage(questions), questions };
}

describe('parseDnsMessage', () => {
  test('should parse every section in order', () => {
    const message = parseDnsMessage(replyBytes);

    expect(message.header.id).toBe(1234);
    expect(message.header.isResponse).toBe(true);
    expect(message.questions).toEqual([question]);
    expect(message.answers).toEqual([
      {
        name: { labels: [], pointer: 12 },
        type: 'A',
        class: 'IN',
        ttl: 60,
        ip: '8.8.8.8',
      },
    ]);
    expect(message.authorities).toEqual([]);
    expect(message.additionals).toEqual([]);
  });

  test('should reject counts larger than the data', () => {
    const data = bytes(0, 1, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0);

    expect(() => parseDnsMessage(data)).toThrow(DnsFormatError);
    expect(() => parseDnsMessage(data)).toThrow(
      'name at offset 12 is truncated'
    );
  });

  test('should reject a message shorter than a header', () => {
    expect(() => parseDnsMessage(bytes(0, 1, 0))).toThrow(
      'dns header is too short: 3 of 12 bytes'
    );
  });

  test('should fail with NOTIMP for unsupported answer types', () => {
    const data = bytes(
      0, 1, 0x81, 0x80, 0, 0, 0, 1, 0, 0, 0, 0,
      0, 0, 28, 0, 1, 0, 0, 0, 60, 0, 0
    );

    expect(() => parseDnsMessage(data)).toThrow(DnsUnsupportedError);
  });
});

describe('serializeDnsMessage', () => {
  test('should round trip a query', () => {
    const query = createQueryMessage([question]);

    expect(parseDnsMessage(serializeDnsMessage(query))).toEqual(query);
  });

  test('should take the header counts from the sections', () => {
    const query = createQueryMessage([question]);
    query.header.questionCount = 7;
    query.header.answerCount = 3;

    const data = serializeDnsMessage(query);

    expect(Array.from(data.subarray(4, 12))).toEqual([0, 1, 0, 0, 0, 0, 0, 0]);
    expect(query.header.questionCount).toBe(7);
    expect(query.header.answerCount).toBe(3);
  });

  test('should give the same bytes every time', () => {
    const reply = createReplyMessage(createQueryMessage([question]), [question], [
      createARecord(question.name, '8.8.8.8', 60),
    ]);

    expect(serializeDnsMessage(reply)).toEqual(serializeDnsMessage(reply));
  });

  test('should serialize the sections in order', () => {
    const record = createARecord(question.name, '8.8.8.8', 60);
    const message: DnsMessage = {
      ...createQueryMessage([]),
      answers: [record],
      additionals: [{ ...record, ip: '1.1.1.1' }],
    };

    const parsed = parseDnsMessage(serializeDnsMessage(message));

    expect(parsed.header.answerCount).toBe(1);
    expect(parsed.header.authorityCount).toBe(0);
    expect(parsed.header.additionalCount).toBe(1);
    expect(parsed.answers[0]?.ip).toBe('8.8.8.8');
    expect(parsed.additionals[0]?.ip).toBe('1.1.1.1');
  });

  test('should refuse a message that still holds compressed names', () => {
    const message = parseDnsMessage(replyBytes);

    expect(() => serializeDnsMessage(message)).toThrow(DnsUnsupportedError);
  });
});

describe('createQueryMessage', () => {
  test('should create a standard query with a random id', () => {
    const query = createQueryMessage([question]);

    expect(query.header.isResponse).toBe(false);
    expect(query.header.opcode).toBe('QUERY');
    expect(query.header.questionCount).toBe(1);
    expect(query.questions).toEqual([question]);
    expect(query.answers).toEqual([]);
    expect(query.header.id).toBeGreaterThanOrEqual(0);
    expect(query.header.id).toBeLessThanOrEqual(0xffff);
  });
});

describe('createReplyMessage', () => {
  test('should answer a standard query', () => {
    const query = createQueryMessage([question]);
    query.header.id = 1234;
    query.header.isRecursionDesired = true;

    const answers = [
      createARecord(question.name, '8.8.8.8', 60),
      createARecord(question.name, '8.8.4.4', 60),
    ];
    const reply = createReplyMessage(query, [question], answers);

    expect(reply).toEqual({
      header: {
        id: 1234,
        isResponse: true,
        opcode: 'QUERY',
        isAuthoritativeAnswer: false,
        isTruncated: false,
        isRecursionDesired: false,
        isRecursionAvailable: false,
        reserved: 0,
        rcode: 'NOERROR',
        questionCount: 1,
        answerCount: 2,
        authorityCount: 0,
        additionalCount: 0,
      },
      questions: [question],
      answers,
      authorities: [],
      additionals: [],
    });
  });

  test('should answer other opcodes with NOTIMP', () => {
    const query = createQueryMessage([question]);
    query.header.opcode = 'IQUERY';

    const reply = createReplyMessage(query, [question], []);

    expect(reply.header.opcode).toBe('IQUERY');
    expect(reply.header.rcode).toBe('NOTIMP');
  });

  test('should copy unknown opcodes', () => {
    const query = createQueryMessage([]);
    query.header.opcode = { unknown: 6 };

    const reply = createReplyMessage(query, [], []);

    expect(reply.header.opcode).toEqual({ unknown: 6 });
    expect(reply.header.rcode).toBe('NOTIMP');
  });
});

describe('createErrorReply', () => {
  test('should reply with the error code and no sections', () => {
    const { header } = parseDnsMessage(replyBytes);
    const reply = createErrorReply({ ...header, isResponse: false }, 'FORMERR');

    expect(reply.header).toMatchObject({
      id: 1234,
      isResponse: true,
      opcode: 'QUERY',
      rcode: 'FORMERR',
      questionCount: 0,
      answerCount: 0,
    });
    expect(reply.questions).toEqual([]);
    expect(serializeDnsMessage(reply)).toEqual(
      bytes(0x04, 0xd2, 0x80, 0x01, 0, 0, 0, 0, 0, 0, 0, 0)
    );
  });
});

describe('decompressName', () => {
  test('should resolve an answer name that points at the question', () => {
    const message = parseDnsMessage(replyBytes);
    const answer = message.answers[0];

    expect(answer).toBeDefined();
    expect(answer && decompressName(answer.name, message)).toEqual({
      labels: ['codecrafters', 'io'],
    });
  });

  test('should leave uncompressed names as they are', () => {
    const message = messageWith([question]);

    expect(decompressName(question.name, message)).toEqual(question.name);
  });

  test('should append the labels a pointer refers to', () => {
    const message = messageWith([question]);

    expect(
      decompressName({ labels: ['www'], pointer: 25 }, message)
    ).toEqual({ labels: ['www', 'io'] });
  });

  test('should follow chains of pointers', () => {
    const message = messageWith([
      question,
      { name: { labels: ['www'], pointer: 12 }, type: 'A', class: 'IN' },
    ]);

    expect(decompressName({ labels: [], pointer: 33 }, message)).toEqual({
      labels: ['www', 'codecrafters', 'io'],
    });
  });

  test('should reject pointer loops', () => {
    const message = messageWith([
      { name: { labels: ['a'], pointer: 12 }, type: 'A', class: 'IN' },
    ]);

    expect(() => decompressName({ labels: [], pointer: 12 }, message)).toThrow(
      'compression loop at offset 12'
    );
  });
});

describe('resolveLabels', () => {
  const message = messageWith([question]);

  test('should find names inside the question section', () => {
    expect(resolveLabels(message, 12)).toEqual({
      labels: ['codecrafters', 'io'],
    });
    expect(resolveLabels(message, 25)).toEqual({ labels: ['io'] });
  });

  test('should reject pointers into the header', () => {
    expect(() => resolveLabels(message, 5)).toThrow(DnsFormatError);
    expect(() => resolveLabels(message, 5)).toThrow(
      'compression pointer 5 points into the header'
    );
  });

  test('should reject pointers past the question section', () => {
    expect(() => resolveLabels(message, 33)).toThrow(
      'compression pointer 33 points past the question section'
    );
    expect(() => resolveLabels(message, 40)).toThrow(DnsFormatError);
  });

  test('should reject pointers into the middle of a label', () => {
    expect(() => resolveLabels(message, 14)).toThrow(
      'offset 2 is not on a label boundary of the question'
    );
  });
});
