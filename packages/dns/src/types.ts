import type { ClassCode, OpCode, RCode, TypeCode } from './constants.js';

/**
 * A code read off the wire that has no entry in the code tables.
 * The raw value is kept so the message can be written back unchanged.
 */
export type UnknownCode = { unknown: number };

export type DnsType = keyof typeof TypeCode | UnknownCode;
export type DnsClass = keyof typeof ClassCode | UnknownCode;
export type DnsOpCode = keyof typeof OpCode | UnknownCode;
export type DnsRCode = keyof typeof RCode | UnknownCode;

export type DnsHeader = {
  id: number;
  isResponse: boolean;
  opcode: DnsOpCode;
  isAuthoritativeAnswer: boolean;
  isTruncated: boolean;
  isRecursionDesired: boolean;
  isRecursionAvailable: boolean;
  /**
   * The 3 bit Z field.
   */
  reserved: number;
  rcode: DnsRCode;
  questionCount: number;
  answerCount: number;
  authorityCount: number;
  additionalCount: number;
};

/**
 * A domain name as a list of labels.
 *
 * `pointer` is set when the name ended in a compression pointer. It is
 * an offset from the start of the message the name was read from, and
 * always comes after every label.
 */
export type DnsName = {
  labels: string[];
  pointer?: number;
};

export type DnsQuestion = {
  name: DnsName;
  type: DnsType;
  class: DnsClass;
};

export type DnsBaseRecord = {
  name: DnsName;
  class: DnsClass;
  ttl: number;
};

export type DnsAData = {
  type: 'A';
  ip: string;
};

export type DnsResourceData = DnsAData;

export type DnsARecord = DnsBaseRecord & DnsAData;

export type DnsRecord = DnsARecord;

export type DnsMessage = {
  header: DnsHeader;
  questions: DnsQuestion[];
  answers: DnsRecord[];
  authorities: DnsRecord[];
  additionals: DnsRecord[];
};

export type NameServer = {
  ip: string;
  port: number;
};
