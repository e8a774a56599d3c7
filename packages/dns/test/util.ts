import type {
  UdpAddress,
  UdpDatagram,
  UdpSocket,
  UdpSocketOptions,
} from '../src/udp.js';

/**
 * In-process UDP network for tests. Sockets opened through `openUdp`
 * deliver datagrams to each other by address; datagrams sent to an
 * address nobody is bound to are dropped.
 */
export class MemoryNetwork {
  #sockets = new Map<string, MemoryUdpSocket>();
  #nextPort = 49152;

  /**
   * Every datagram sent on the network, in order.
   */
  sent: UdpDatagram[] = [];

  openUdp = async (options: UdpSocketOptions = {}): Promise<UdpSocket> => {
    const address = {
      host: options.host ?? '127.0.0.1',
      port: options.port || this.#nextPort++,
    };
    const key = addressKey(address);

    if (this.#sockets.has(key)) {
      throw new Error(`address in use: ${key}`);
    }

    const socket = new MemoryUdpSocket(this, address);
    this.#sockets.set(key, socket);
    return socket;
  };

  deliver(from: UdpAddress, datagram: UdpDatagram) {
    this.sent.push(datagram);
    this.#sockets
      .get(addressKey(datagram))
      ?.receive({ host: from.host, port: from.port, data: datagram.data });
  }

  remove(address: UdpAddress) {
    this.#sockets.delete(addressKey(address));
  }
}

class MemoryUdpSocket implements UdpSocket {
  #network: MemoryNetwork;
  #queue: UdpDatagram[] = [];
  #waiting?: (datagram: UdpDatagram | undefined) => void;
  #closed = false;

  readonly address: UdpAddress;

  constructor(network: MemoryNetwork, address: UdpAddress) {
    this.#network = network;
    this.address = address;
  }

  receive(datagram: UdpDatagram) {
    if (this.#closed) {
      return;
    }

    const waiting = this.#waiting;
    if (waiting) {
      this.#waiting = undefined;
      waiting(datagram);
    } else {
      this.#queue.push(datagram);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<UdpDatagram> {
    while (true) {
      const datagram = await this.#next();
      if (!datagram) {
        return;
      }
      yield datagram;
    }
  }

  async send(datagram: UdpDatagram) {
    if (this.#closed) {
      throw new Error('socket is closed');
    }
    this.#network.deliver(this.address, datagram);
  }

  async close() {
    this.#closed = true;
    this.#network.remove(this.address);
    this.#waiting?.(undefined);
    this.#waiting = undefined;
  }

  #next(): Promise<UdpDatagram | undefined> {
    const datagram = this.#queue.shift();
    if (datagram || this.#closed) {
      return Promise.resolve(datagram);
    }
    return new Promise((resolve) => {
      this.#waiting = resolve;
    });
  }
}

function addressKey({ host, port }: UdpAddress) {
  return `${host}:${port}`;
}

/**
 * Binds a fake upstream name server at `address` that answers every
 * datagram with `respond(data)`. Returns a function that stops it.
 */
export async function serveUpstream(
  network: MemoryNetwork,
  address: UdpAddress,
  respond: (data: Uint8Array) => Uint8Array | undefined
) {
  const socket = await network.openUdp(address);

  const loop = (async () => {
    for await (const datagram of socket) {
      const reply = respond(datagram.data);
      if (reply) {
        await socket.send({ host: datagram.host, port: datagram.port, data: reply });
      }
    }
  })();

  return async () => {
    await socket.close();
    await loop;
  };
}

/**
 * Builds a byte array from numbers and ASCII strings.
 *
 * @example
 * bytes(3, 'www', 0); // Uint8Array [3, 119, 119, 119, 0]
 */
export function bytes(...parts: (number | string)[]): Uint8Array {
  const values: number[] = [];
  for (const part of parts) {
    if (typeof part === 'number') {
      values.push(part);
    } else {
      for (let i = 0; i < part.length; i++) {
        values.push(part.charCodeAt(i));
      }
    }
  }
  return Uint8Array.from(values);
}
