import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { RelayConfig } from './infrastructure/config/index.js';
import { createActivityBuffer, createDbClient, ensureSchema } from './infrastructure/db/index.js';
import { SyncEngine } from './infrastructure/sync/index.js';
import { IntakeServer } from './interfaces/socket/index.js';
import { SyncRateLimiter } from './application/sync-rate-limiter.js';

/**
 * Wires the buffer, intake listener and sync engine together.
 *
 * Order on run():
 * 1) Data directories + SQLite schema
 * 2) Intake socket (fatal if it cannot bind)
 * 3) Sync engine loop, blocking until stop()
 *
 * stop() aborts one shared signal: the listener stops accepting and the
 * engine makes a final flush. run() resolves after both have finished
 * and the database is closed.
 */
export class RelayDaemon {
  private readonly config: RelayConfig;
  private readonly log: Logger;
  private readonly ac = new AbortController();

  constructor(config: RelayConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async run(): Promise<void> {
    const { config, log } = this;

    mkdirSync(dirname(config.dbPath), { recursive: true });
    mkdirSync(dirname(config.socketPath), { recursive: true });

    const { sqlite, db } = createDbClient(config.dbPath);

    try {
      await ensureSchema(sqlite);
      const buffer = createActivityBuffer(db);

      const counts = await buffer.counts();
      log.info({ dbPath: config.dbPath, ...counts }, 'Activity buffer opened');

      const engine = new SyncEngine({
        buffer,
        log: log.child({ component: 'sync' }),
        signal: this.ac.signal,
        serverUrl: config.serverUrl,
        apiToken: config.apiToken,
        intervalMs: config.syncIntervalMinutes * 60_000,
        batchSize: config.syncBatchSize,
        metricsOnly: config.metricsOnly,
      });

      if (!engine.hasCredential) {
        log.warn('No API token configured, activities will be buffered but not synced');
      }

      const intake = new IntakeServer({
        socketPath: config.socketPath,
        buffer,
        machine: config.machine,
        log: log.child({ component: 'intake' }),
        rateLimiter: new SyncRateLimiter(),
        syncHandler: () => engine.syncNow(),
        signal: this.ac.signal,
      });

      await intake.start();

      await engine.run();
      await intake.stop();
    } finally {
      sqlite.close();
      log.info('Database closed');
    }
  }

  stop(): void {
    if (this.ac.signal.aborted) return;
    this.log.info('Stopping daemon...');
    this.ac.abort();
  }
}
