import { isIPv4Address, parseUint } from '@dns-relay/wire';
import { parseArgs } from 'util';
import { DNS_PORT } from './constants.js';
import type { NameServer } from './types.js';

export type RelayConfig = {
  host: string;
  port: number;
  /**
   * Upstream name server. Without one the relay answers every
   * question itself.
   */
  resolver?: NameServer;
};

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 2053;

/**
 * Reads the relay configuration from command line flags, falling back
 * to `DNS_RELAY_*` environment variables.
 *
 * @example
 * loadConfig(['--resolver', '10.0.0.53:53'], process.env);
 * // { host: '127.0.0.1', port: 2053, resolver: { ip: '10.0.0.53', port: 53 } }
 */
export function loadConfig(
  argv: string[],
  env: Record<string, string | undefined> = {}
): RelayConfig {
  let values: { resolver?: string; host?: string; port?: string };

  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        resolver: { type: 'string' },
        host: { type: 'string' },
        port: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new ConfigError(
      err instanceof Error ? err.message : 'invalid arguments',
      { cause: err }
    );
  }

  const host = values.host ?? env.DNS_RELAY_HOST ?? DEFAULT_HOST;
  if (!isIPv4Address(host)) {
    throw new ConfigError(`--host must be an ipv4 address, got '${host}'`);
  }

  const port = values.port ?? env.DNS_RELAY_PORT;
  const resolver = values.resolver ?? env.DNS_RELAY_RESOLVER;

  return {
    host,
    port: port === undefined ? DEFAULT_PORT : parsePort(port, '--port'),
    ...(resolver === undefined ? {} : { resolver: parseNameServer(resolver) }),
  };
}

/**
 * Parses a name server address in the form `ip` or `ip:port`.
 */
export function parseNameServer(value: string): NameServer {
  const [ip = '', port, ...rest] = value.split(':');

  if (rest.length > 0 || !isIPv4Address(ip)) {
    throw new ConfigError(
      `--resolver must be <ipv4>[:port], got '${value}'`
    );
  }

  return {
    ip,
    port: port === undefined ? DNS_PORT : parsePort(port, '--resolver'),
  };
}

function parsePort(value: string, option: string): number {
  try {
    return parseUint(value, 0xffff);
  } catch (err) {
    throw new ConfigError(`${option} has an invalid port '${value}'`, {
      cause: err,
    });
  }
}
