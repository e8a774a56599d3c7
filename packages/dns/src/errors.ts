/**
 * Base class for failures raised by the codec.
 *
 * `rcode` is the response code a server should answer with when the
 * failure came from decoding a request.
 */
export abstract class DnsError extends Error {
  abstract readonly rcode: 'FORMERR' | 'NOTIMP';
}

/**
 * The bytes (or the values handed to an encoder) do not form a valid
 * DNS message.
 */
export class DnsFormatError extends DnsError {
  override readonly rcode = 'FORMERR';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DnsFormatError';
  }
}

/**
 * The message is well formed but uses something this codec does not
 * implement, such as record data for a type other than A.
 */
export class DnsUnsupportedError extends DnsError {
  override readonly rcode = 'NOTIMP';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DnsUnsupportedError';
  }
}
