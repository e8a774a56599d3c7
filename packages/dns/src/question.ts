import {
  parseDnsClass,
  parseDnsType,
  serializeDnsClass,
  serializeDnsType,
} from './codes.js';
import { DnsFormatError } from './errors.js';
import { labelLength, nameLength, parseName, serializeName } from './name.js';
import type { DnsName, DnsQuestion } from './types.js';
import { createView, ensureAvailable } from './util.js';

const QUESTION_FIELDS_LENGTH = 4;

/**
 * Parses a DNS question section.
 */
export function parseQuestion(
  data: Uint8Array,
  offset: number
): [question: DnsQuestion, offset: number] {
  const [name, nameOffset] = parseName(data, offset);
  ensureAvailable(data, nameOffset, QUESTION_FIELDS_LENGTH, 'question');

  const view = createView(data);
  const type = parseDnsType(view.getUint16(nameOffset));
  const cls = parseDnsClass(view.getUint16(nameOffset + 2));

  return [{ name, type, class: cls }, nameOffset + QUESTION_FIELDS_LENGTH];
}

/**
 * Serializes a DNS question section.
 */
export function serializeQuestion(q: DnsQuestion) {
  const nameBytes = serializeName(q.name);
  const buffer = new Uint8Array(nameBytes.length + QUESTION_FIELDS_LENGTH);
  const view = createView(buffer);

  buffer.set(nameBytes, 0);
  view.setUint16(nameBytes.length, serializeDnsType(q.type));
  view.setUint16(nameBytes.length + 2, serializeDnsClass(q.class));

  return buffer;
}

/**
 * Number of bytes the question took on the wire.
 */
export function questionLength(q: DnsQuestion) {
  return nameLength(q.name) + QUESTION_FIELDS_LENGTH;
}

/**
 * Returns the name that starts `offset` bytes into the question.
 *
 * The offset must land on one of the question's label boundaries
 * (the root label and a trailing pointer count as boundaries).
 */
export function questionLabelsAt(q: DnsQuestion, offset: number): DnsName {
  const { labels, pointer } = q.name;
  let position = 0;

  for (let i = 0; i <= labels.length; i++) {
    if (position === offset) {
      const rest = labels.slice(i);
      return pointer === undefined ? { labels: rest } : { labels: rest, pointer };
    }

    const label = labels[i];
    if (label === undefined || position > offset) {
      break;
    }
    position += 1 + labelLength(label);
  }

  throw new DnsFormatError(
    `offset ${offset} is not on a label boundary of the question`
  );
}
