import dgram from 'dgram';
import { on } from 'events';

export type UdpDatagram = {
  host: string;
  port: number;
  data: Uint8Array;
};

export type UdpAddress = {
  host: string;
  port: number;
};

/**
 * A bound UDP socket. Iterating it yields received datagrams until the
 * socket is closed.
 */
export interface UdpSocket extends AsyncIterable<UdpDatagram> {
  readonly address: UdpAddress;
  send(datagram: UdpDatagram): Promise<void>;
  close(): Promise<void>;
}

export type UdpSocketOptions = {
  /**
   * Local address to bind to.
   * @default '0.0.0.0'
   */
  host?: string;

  /**
   * Local port to bind to. `0` picks an ephemeral port.
   * @default 0
   */
  port?: number;
};

export type OpenUdpFn = (options?: UdpSocketOptions) => Promise<UdpSocket>;

/**
 * Opens a UDP (IPv4) socket on the host's network stack.
 */
export const openUdpSocket: OpenUdpFn = async (options = {}) => {
  const socket = dgram.createSocket('udp4');

  await new Promise<void>((resolve, reject) => {
    socket.once('error', reject);
    socket.bind({ address: options.host, port: options.port ?? 0 }, () => {
      socket.off('error', reject);
      resolve();
    });
  });

  return new NodeUdpSocket(socket);
};

class NodeUdpSocket implements UdpSocket {
  #socket: dgram.Socket;
  #abort = new AbortController();
  #messages: AsyncIterableIterator<unknown[]>;
  #closed = false;

  constructor(socket: dgram.Socket) {
    this.#socket = socket;

    // Listen right away so datagrams that arrive before iteration starts
    // are buffered
    this.#messages = on(socket, 'message', { signal: this.#abort.signal });
  }

  get address(): UdpAddress {
    const { address, port } = this.#socket.address();
    return { host: address, port };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<UdpDatagram> {
    try {
      for await (const [message, remote] of this.#messages) {
        if (!(message instanceof Uint8Array) || !isRemoteInfo(remote)) {
          continue;
        }
        yield {
          host: remote.address,
          port: remote.port,
          data: new Uint8Array(message),
        };
      }
    } catch (err) {
      // Closing the socket aborts the iterator
      if (this.#abort.signal.aborted) {
        return;
      }
      throw err;
    }
  }

  async send({ host, port, data }: UdpDatagram) {
    await new Promise<void>((resolve, reject) => {
      this.#socket.send(data, port, host, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async close() {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#abort.abort();

    await new Promise<void>((resolve) => this.#socket.close(() => resolve()));
  }
}

function isRemoteInfo(value: unknown): value is dgram.RemoteInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'address' in value &&
    'port' in value
  );
}
