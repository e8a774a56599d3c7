import { DnsError } from './errors.js';
import {
  createQueryMessage,
  createReplyMessage,
  decompressName,
  parseDnsMessage,
  serializeDnsMessage,
} from './message.js';
import { createARecord } from './record.js';
import type { DnsMessage, DnsQuestion, DnsRecord, NameServer } from './types.js';
import { openUdpSocket, type OpenUdpFn } from './udp.js';

/**
 * Answers a single question taken from `query`.
 *
 * `query` is the message the question came from; names in the question
 * may point into it.
 */
export interface Resolver {
  resolve(question: DnsQuestion, query: DnsMessage): Promise<DnsRecord[]>;
}

export type ForwardingResolverOptions = {
  /**
   * Upstream name server every question is forwarded to.
   */
  nameServer: NameServer;

  /**
   * Opens the socket used for each upstream exchange.
   * @default openUdpSocket
   */
  openUdp?: OpenUdpFn;
};

/**
 * Forwards each question to an upstream name server.
 *
 * Every question gets its own single-question query and socket. The
 * first datagram that comes back is taken as the reply; there is no
 * retry and no timeout.
 */
export class ForwardingResolver implements Resolver {
  #nameServer: NameServer;
  #openUdp: OpenUdpFn;

  constructor(options: ForwardingResolverOptions) {
    this.#nameServer = options.nameServer;
    this.#openUdp = options.openUdp ?? openUdpSocket;
  }

  get nameServer(): NameServer {
    return this.#nameServer;
  }

  async resolve(question: DnsQuestion, query: DnsMessage) {
    const message = createQueryMessage([
      { ...question, name: decompressName(question.name, query) },
    ]);
    message.header.isRecursionDesired = query.header.isRecursionDesired;

    const reply = await this.#exchange(message);

    try {
      // Answer names may point into the upstream reply, never into `query`
      return reply.answers.map((answer) => ({
        ...answer,
        name: decompressName(answer.name, reply),
      }));
    } catch (err) {
      throw toUpstreamError(err);
    }
  }

  /**
   * Sends `message` upstream and waits for one reply datagram.
   */
  async #exchange(message: DnsMessage): Promise<DnsMessage> {
    const socket = await this.#openUdp();

    try {
      await socket.send({
        host: this.#nameServer.ip,
        port: this.#nameServer.port,
        data: serializeDnsMessage(message),
      });

      for await (const datagram of socket) {
        let reply: DnsMessage;
        try {
          reply = parseDnsMessage(datagram.data);
        } catch (err) {
          throw toUpstreamError(err);
        }

        if (reply.header.id !== message.header.id) {
          throw new Error(
            `upstream reply id ${reply.header.id} does not match query id ${message.header.id}`
          );
        }

        return reply;
      }

      throw new Error('udp socket closed before receiving a reply');
    } finally {
      await socket.close();
    }
  }
}

/**
 * Wraps a codec error raised by an upstream reply so that it maps to
 * SERVFAIL rather than to the FORMERR or NOTIMP of the client's query.
 */
function toUpstreamError(err: unknown) {
  if (err instanceof DnsError) {
    return new Error(`malformed upstream reply: ${err.message}`, {
      cause: err,
    });
  }
  return err;
}

export type StaticResolverOptions = {
  /**
   * Address every question is answered with.
   * @default '8.8.8.8'
   */
  ip?: string;

  /**
   * TTL of the answers in seconds.
   * @default 60
   */
  ttl?: number;
};

/**
 * Answers every question with the same A record, without any network
 * access. Used when no upstream name server is configured.
 */
export class StaticResolver implements Resolver {
  #ip: string;
  #ttl: number;

  constructor(options: StaticResolverOptions = {}) {
    this.#ip = options.ip ?? '8.8.8.8';
    this.#ttl = options.ttl ?? 60;
  }

  async resolve(question: DnsQuestion, query: DnsMessage) {
    const name = decompressName(question.name, query);
    return [createARecord(name, this.#ip, this.#ttl)];
  }
}

/**
 * Builds the reply to `query`, resolving its questions one at a time
 * in order.
 *
 * Questions are echoed decompressed. Queries with an opcode other than
 * QUERY are answered NOTIMP without being resolved.
 */
export async function handleQuery(
  query: DnsMessage,
  resolver: Resolver
): Promise<DnsMessage> {
  const questions = query.questions.map((question) => ({
    ...question,
    name: decompressName(question.name, query),
  }));

  if (query.header.opcode !== 'QUERY') {
    return createReplyMessage(query, questions, []);
  }

  const answers: DnsRecord[] = [];
  for (const question of questions) {
    answers.push(...(await resolver.resolve(question, query)));
  }

  return createReplyMessage(query, questions, answers);
}

