#!/usr/bin/env node
import pino from 'pino';
import { loadConfig } from './infrastructure/config/index.js';
import { RelayDaemon } from './daemon.js';

/**
 * Daemon entry point.
 *
 * Receives editor activity over a Unix socket, buffers it in SQLite and
 * forwards it to the remote collection endpoint.
 * SIGINT / SIGTERM trigger a clean stop with a final sync attempt.
 */
const log = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  redact: ['config.apiToken'],
});

async function main(): Promise<void> {
  const config = loadConfig();

  log.info(
    { config, syncEnabled: config.apiToken !== '' },
    'Configuration loaded',
  );

  const daemon = new RelayDaemon(config, log);

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down...');
    daemon.stop();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await daemon.run();
  log.info('Daemon stopped');
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Daemon crashed');
  process.exit(1);
});
