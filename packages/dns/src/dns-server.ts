import { EventEmitter } from 'eventemitter3';
import { HEADER_LENGTH, MAX_UDP_MESSAGE_LENGTH } from './constants.js';
import { DnsError } from './errors.js';
import { parseHeader } from './header.js';
import {
  createErrorReply,
  parseDnsMessage,
  serializeDnsMessage,
} from './message.js';
import { handleQuery, type Resolver } from './resolver.js';
import type { DnsMessage, DnsRCode } from './types.js';
import {
  openUdpSocket,
  type OpenUdpFn,
  type UdpAddress,
  type UdpDatagram,
  type UdpSocket,
} from './udp.js';
import { toError } from './util.js';

export interface DnsServerEventTypes {
  listening: (address: UdpAddress) => void;
  query: (query: DnsMessage, client: UdpAddress) => void;
  reply: (reply: DnsMessage, client: UdpAddress) => void;
  error: (err: Error, client?: UdpAddress) => void;
  close: () => void;
}

export type DnsServerOptions = {
  /**
   * Address to listen on.
   *
   * @default '127.0.0.1'
   */
  host?: string;

  /**
   * Port to listen on.
   *
   * @default 2053
   */
  port?: number;

  /**
   * Answers the questions of each request.
   */
  resolver: Resolver;

  /**
   * Opens the listening socket.
   *
   * @default openUdpSocket
   */
  openUdp?: OpenUdpFn;
};

/**
 * UDP DNS server that answers each request through a `Resolver`.
 *
 * Requests are handled strictly one at a time, in arrival order. A
 * request that fails is answered with an error code (or dropped, when
 * not even its header can be read); it never stops the server.
 */
export class DnsServer extends EventEmitter<DnsServerEventTypes> {
  #options: DnsServerOptions;
  #socket?: UdpSocket;
  #processing?: Promise<void>;

  constructor(options: DnsServerOptions) {
    super();
    this.#options = options;
  }

  get address(): UdpAddress | undefined {
    return this.#socket?.address;
  }

  async listen() {
    if (this.#socket) {
      throw new Error('dns server is already listening');
    }

    const openUdp = this.#options.openUdp ?? openUdpSocket;
    const socket = await openUdp({
      host: this.#options.host ?? '127.0.0.1',
      port: this.#options.port ?? 2053,
    });

    this.#socket = socket;
    this.#processing = this.#processDnsMessages(socket);
    this.emit('listening', socket.address);
  }

  async close() {
    const socket = this.#socket;
    if (!socket) {
      return;
    }

    this.#socket = undefined;
    await socket.close();
    await this.#processing;
    this.emit('close');
  }

  async #processDnsMessages(socket: UdpSocket) {
    try {
      for await (const datagram of socket) {
        await this.#processDnsMessage(socket, datagram);
      }
    } catch (err) {
      this.emit('error', toError(err));
      await this.#release(socket);
    }
  }

  /**
   * Stops listening after `socket` failed, unless `close` already did.
   */
  async #release(socket: UdpSocket) {
    if (this.#socket !== socket) {
      return;
    }

    this.#socket = undefined;
    try {
      await socket.close();
    } catch (err) {
      this.emit('error', toError(err));
    }
    this.emit('close');
  }

  async #processDnsMessage(socket: UdpSocket, datagram: UdpDatagram) {
    const client = { host: datagram.host, port: datagram.port };
    let reply = await this.#createReply(datagram.data, client);

    if (!reply) {
      return;
    }

    let data: Uint8Array;
    try {
      data = serializeReply(reply);
    } catch (err) {
      this.emit('error', toError(err), client);
      reply = createErrorReply(reply.header, 'SERVFAIL');
      data = serializeDnsMessage(reply);
    }

    try {
      await socket.send({ ...client, data });
      this.emit('reply', reply, client);
    } catch (err) {
      this.emit('error', toError(err), client);
    }
  }

  async #createReply(
    data: Uint8Array,
    client: UdpAddress
  ): Promise<DnsMessage | undefined> {
    try {
      const query = parseDnsMessage(data);
      this.emit('query', query, client);
      return await handleQuery(query, this.#options.resolver);
    } catch (err) {
      const error = toError(err);
      this.emit('error', error, client);

      // Without a header there is no ID to reply to
      if (data.length < HEADER_LENGTH) {
        return;
      }

      const [header] = parseHeader(data);
      return createErrorReply(header, errorRCode(error));
    }
  }
}

/**
 * Maps a failure to the response code of the error reply.
 */
export function errorRCode(err: Error): DnsRCode {
  return err instanceof DnsError ? err.rcode : 'SERVFAIL';
}

/**
 * Serializes a reply for UDP.
 *
 * A reply that does not fit in a UDP message is sent with the TC bit
 * set and only its question section.
 */
export function serializeReply(reply: DnsMessage): Uint8Array {
  const data = serializeDnsMessage(reply);

  if (data.length <= MAX_UDP_MESSAGE_LENGTH) {
    return data;
  }

  return serializeDnsMessage({
    ...reply,
    header: { ...reply.header, isTruncated: true },
    answers: [],
    authorities: [],
    additionals: [],
  });
}
