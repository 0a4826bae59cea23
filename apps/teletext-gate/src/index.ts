import type { FastifyInstance } from 'fastify';
import { loadConfig } from './config.js';
import { buildServer } from './server.js';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/** Closes the server on the first shutdown signal so in-flight relays can finish. */
export function registerShutdown(server: FastifyInstance, source: SignalSource = process): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    server.log.info({ signal }, 'teletext-gate shutting down');
    server.close().then(
      () => {
        server.log.info('teletext-gate stopped');
      },
      (error: unknown) => {
        server.log.error(error, 'failed_to_stop');
        process.exitCode = 1;
      },
    );
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    source.once(signal, shutdown);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const server = await buildServer({ config });
  registerShutdown(server);

  try {
    await server.listen({
      port: config.port,
      host: config.host,
    });
    server.log.info({ port: config.port, host: config.host, upstream: config.upstreamUrl }, 'teletext-gate listening');
  } catch (error) {
    server.log.error(error, 'failed_to_start');
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
