/**
 * Parses a string of decimal digits into an unsigned integer.
 *
 * Throws if `str` is empty, contains anything but `0-9`, or the
 * value is greater than `max`.
 */
export function parseUint(str: string, max = Number.MAX_SAFE_INTEGER): number {
  if (str.length === 0) {
    throw new Error('empty string');
  }

  let value = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);

    if (char < 48 || char > 57) {
      // 0-9
      throw new Error(`invalid character in '${str}'`);
    }

    value = value * 10 + (char - 48);

    if (value > max) {
      throw new Error(`${str} is greater than ${max}`);
    }
  }

  return value;
}

/**
 * Checks that `value` is an integer that fits in `bits` unsigned bits.
 */
export function isUint(value: number, bits: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < 2 ** bits;
}

/**
 * Joins byte arrays into one.
 */
export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const size = parts.reduce((sum, part) => sum + part.length, 0);
  const buffer = new Uint8Array(size);

  let offset = 0;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }

  return buffer;
}
