import { isUint } from '@dns-relay/wire';
import { ClassCode, OpCode, RCode, TypeCode } from './constants.js';
import { DnsFormatError } from './errors.js';
import type {
  DnsClass,
  DnsOpCode,
  DnsRCode,
  DnsType,
  UnknownCode,
} from './types.js';

type CodeTable<K extends string> = Readonly<Record<K, number>>;

/**
 * Builds a parse/serialize pair for one code table.
 *
 * Values missing from the table parse to `{ unknown: value }` instead of
 * failing, and serialize back to the same value.
 */
function createCodeCodec<K extends string>(
  kind: string,
  table: CodeTable<K>,
  bits: number
) {
  const isName = (name: string): name is K => Object.hasOwn(table, name);

  const names = new Map<number, K>();
  for (const name of Object.keys(table)) {
    if (isName(name)) {
      names.set(table[name], name);
    }
  }

  return {
    parse(value: number): K | UnknownCode {
      return names.get(value) ?? { unknown: value };
    },

    serialize(code: K | UnknownCode): number {
      if (typeof code === 'string') {
        if (!isName(code)) {
          throw new DnsFormatError(`unknown dns ${kind}: ${code}`);
        }
        return table[code];
      }

      if (!isUint(code.unknown, bits)) {
        throw new DnsFormatError(
          `dns ${kind} ${code.unknown} does not fit in ${bits} bits`
        );
      }

      return code.unknown;
    },
  };
}

const typeCodec = createCodeCodec('type', TypeCode, 16);
const classCodec = createCodeCodec('class', ClassCode, 16);
const opCodeCodec = createCodeCodec('opcode', OpCode, 4);
const rCodeCodec = createCodeCodec('rcode', RCode, 4);

export function isUnknownCode(code: string | UnknownCode): code is UnknownCode {
  return typeof code !== 'string';
}

/**
 * Renders a code for logs, e.g. `A` or `UNKNOWN(28)`.
 */
export function formatCode(code: string | UnknownCode): string {
  return isUnknownCode(code) ? `UNKNOWN(${code.unknown})` : code;
}

/**
 * Parses a DNS type.
 */
export function parseDnsType(type: number): DnsType {
  return typeCodec.parse(type);
}

/**
 * Serializes a DNS type.
 */
export function serializeDnsType(type: DnsType) {
  return typeCodec.serialize(type);
}

/**
 * Parses a DNS class.
 */
export function parseDnsClass(cls: number): DnsClass {
  return classCodec.parse(cls);
}

/**
 * Serializes a DNS class.
 */
export function serializeDnsClass(cls: DnsClass) {
  return classCodec.serialize(cls);
}

/**
 * Parses a DNS opcode (operation code).
 */
export function parseDnsOpCode(opcode: number): DnsOpCode {
  return opCodeCodec.parse(opcode);
}

/**
 * Serializes a DNS opcode (operation code).
 */
export function serializeDnsOpCode(opcode: DnsOpCode) {
  return opCodeCodec.serialize(opcode);
}

/**
 * Parses a DNS RCode (response code).
 */
export function parseDnsRCode(rcode: number): DnsRCode {
  return rCodeCodec.parse(rcode);
}

/**
 * Serializes a DNS RCode (response code).
 */
export function serializeDnsRCode(rcode: DnsRCode) {
  return rCodeCodec.serialize(rcode);
}
