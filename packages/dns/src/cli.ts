#!/usr/bin/env node
import { formatCode } from './codes.js';
import { ConfigError, loadConfig } from './config.js';
import { DnsServer } from './dns-server.js';
import { formatName } from './name.js';
import {
  ForwardingResolver,
  StaticResolver,
  type Resolver,
} from './resolver.js';
import type { DnsMessage } from './types.js';

function describe(message: DnsMessage) {
  return message.questions
    .map((q) => `${formatName(q.name)} ${formatCode(q.type)}`)
    .join(', ');
}

async function main() {
  const config = loadConfig(process.argv.slice(2), process.env);

  const resolver: Resolver = config.resolver
    ? new ForwardingResolver({ nameServer: config.resolver })
    : new StaticResolver();

  const server = new DnsServer({
    host: config.host,
    port: config.port,
    resolver,
  });

  server.on('listening', ({ host, port }) => {
    const upstream = config.resolver
      ? `forwarding to ${config.resolver.ip}:${config.resolver.port}`
      : 'answering locally';
    console.log(`dns-relay listening on ${host}:${port}, ${upstream}`);
  });
  server.on('query', (query, { host, port }) => {
    console.log(`${host}:${port} query #${query.header.id}: ${describe(query)}`);
  });
  server.on('reply', (reply, { host, port }) => {
    console.log(
      `${host}:${port} reply #${reply.header.id}: ${formatCode(reply.header.rcode)}, ${reply.answers.length} answer(s)`
    );
  });
  server.on('error', (err, client) => {
    const source = client ? `${client.host}:${client.port}` : 'server';
    console.error(`${source} error:`, err.message);
  });

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('error closing dns server:', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.listen();
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`dns-relay: ${err.message}`);
    process.exit(2);
  }
  console.error('dns-relay failed to start:', err);
  process.exit(1);
});
