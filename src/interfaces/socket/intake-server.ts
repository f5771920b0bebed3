import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { chmod, rm } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ActivityBuffer } from '../../application/activity-buffer.js';
import { parseActivity, requestEnvelopeSchema } from '../../application/activity-schema.js';
import { SyncRateLimiter } from '../../application/sync-rate-limiter.js';
import { RateLimited } from '../../domain/index.js';
import type { IntakeResponse } from './protocol.js';
import { OK, encodeResponse, failure, success } from './protocol.js';

const DEFAULT_MAX_LINE_BYTES = 1024 * 1024;

/** Invoked for an admitted `sync` request; rejection text goes to the client. */
export type SyncHandler = () => Promise<void>;

export interface IntakeServerOptions {
  socketPath: string;
  buffer: ActivityBuffer;
  /** Stamped on every activity; client-sent values are ignored. */
  machine: string;
  log: Logger;
  syncHandler?: SyncHandler | undefined;
  rateLimiter?: SyncRateLimiter | undefined;
  /** Stops the server when aborted. */
  signal?: AbortSignal | undefined;
  maxLineBytes?: number | undefined;
}

let nextConnectionId = 1;

interface IntakeConnection {
  id: number;
  socket: Socket;
  buffer: string;
  /** Set while skipping the rest of an over-long line. */
  discarding: boolean;
  /** Tail of this connection's request chain; keeps responses in order. */
  pending: Promise<void>;
  closed: boolean;
}

/**
 * Unix-socket listener for editor plugins.
 *
 * Each connection is read line by line. Lines are handled strictly in
 * arrival order: the next request starts only after the previous
 * response was written. A bad line yields one error response and the
 * connection stays open.
 */
export class IntakeServer {
  private readonly socketPath: string;
  private readonly buffer: ActivityBuffer;
  private readonly machine: string;
  private readonly log: Logger;
  private readonly rateLimiter: SyncRateLimiter;
  private readonly maxLineBytes: number;
  private syncHandler: SyncHandler | undefined;

  private server: Server | null = null;
  private readonly connections: Set<IntakeConnection> = new Set();
  private stopping: Promise<void> | null = null;

  constructor(options: IntakeServerOptions) {
    this.socketPath = options.socketPath;
    this.buffer = options.buffer;
    this.machine = options.machine;
    this.log = options.log;
    this.syncHandler = options.syncHandler;
    this.rateLimiter = options.rateLimiter ?? new SyncRateLimiter();
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;

    options.signal?.addEventListener(
      'abort',
      () => {
        void this.stop().catch((err: unknown) => {
          this.log.error({ err }, 'Failed to stop intake server');
        });
      },
      { once: true },
    );
  }

  setSyncHandler(handler: SyncHandler): void {
    this.syncHandler = handler;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  /**
   * Removes a stale socket file, listens, and restricts the socket to
   * the owner (0600). Rejects if the socket cannot be bound.
   */
  async start(): Promise<void> {
    await rm(this.socketPath, { force: true });

    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (err) => {
      this.log.error({ err }, 'Intake server error');
    });

    await chmod(this.socketPath, 0o600);
    this.server = server;

    this.log.info({ socketPath: this.socketPath }, 'Intake server listening');
  }

  /**
   * Stops accepting, lets every connection finish its current request,
   * then closes it and removes the socket file. Idempotent.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) return;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    for (const conn of this.connections) {
      void conn.pending.then(() => this.closeConnection(conn, 'server_shutdown'));
    }

    await closed;
    await rm(this.socketPath, { force: true });
    this.server = null;

    this.log.info('Intake server stopped');
  }

  /* ------------------------------------------------------------------ */
  /*  Connections                                                       */
  /* ------------------------------------------------------------------ */

  private accept(socket: Socket): void {
    if (this.stopping) {
      socket.destroy();
      return;
    }

    const conn: IntakeConnection = {
      id: nextConnectionId++,
      socket,
      buffer: '',
      discarding: false,
      pending: Promise.resolve(),
      closed: false,
    };

    this.connections.add(conn);
    this.log.debug({ connectionId: conn.id }, 'Client connected');

    socket.setEncoding('utf8');

    socket.on('data', (chunk: string) => {
      this.consume(conn, chunk);
    });

    // Client finished sending: answer what is queued, then close our side
    socket.on('end', () => {
      if (conn.buffer.length > 0 && !conn.discarding) {
        this.enqueue(conn, conn.buffer);
      }
      conn.buffer = '';
      void conn.pending.then(() => this.closeConnection(conn, 'client_end'));
    });

    socket.on('close', () => {
      conn.closed = true;
      this.connections.delete(conn);
      this.log.debug({ connectionId: conn.id }, 'Client disconnected');
    });

    socket.on('error', (err) => {
      this.log.debug({ connectionId: conn.id, err }, 'Client socket error');
      this.closeConnection(conn, 'error');
    });
  }

  /** Splits incoming text into lines and queues each one. */
  private consume(conn: IntakeConnection, chunk: string): void {
    conn.buffer += chunk;

    let newline = conn.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = conn.buffer.slice(0, newline);
      conn.buffer = conn.buffer.slice(newline + 1);

      if (conn.discarding) {
        conn.discarding = false;
      } else if (Buffer.byteLength(line) > this.maxLineBytes) {
        this.rejectLongLine(conn);
      } else {
        this.enqueue(conn, line);
      }
      newline = conn.buffer.indexOf('\n');
    }

    if (!conn.discarding && Buffer.byteLength(conn.buffer) > this.maxLineBytes) {
      conn.buffer = '';
      conn.discarding = true;
      this.rejectLongLine(conn);
    } else if (conn.discarding) {
      conn.buffer = '';
    }
  }

  private rejectLongLine(conn: IntakeConnection): void {
    this.log.warn({ connectionId: conn.id }, 'Request line too long, discarding');
    this.enqueueResponse(conn, failure('invalid json'));
  }

  private enqueue(conn: IntakeConnection, rawLine: string): void {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    conn.pending = conn.pending
      .then(async () => {
        const response = await this.handleLine(line);
        this.write(conn, response);
      })
      .catch((err: unknown) => {
        this.log.error({ connectionId: conn.id, err }, 'Failed to handle request');
      });
  }

  private enqueueResponse(conn: IntakeConnection, response: IntakeResponse): void {
    conn.pending = conn.pending
      .then(() => this.write(conn, response))
      .catch((err: unknown) => {
        this.log.error({ connectionId: conn.id, err }, 'Failed to write response');
      });
  }

  private write(conn: IntakeConnection, response: IntakeResponse): void {
    if (conn.closed || conn.socket.destroyed || !conn.socket.writable) return;
    conn.socket.write(encodeResponse(response));
  }

  private closeConnection(conn: IntakeConnection, reason: string): void {
    if (conn.closed) return;
    conn.closed = true;
    this.connections.delete(conn);
    conn.socket.end(() => conn.socket.destroy());
    this.log.debug({ connectionId: conn.id, reason }, 'Closing client connection');
  }

  /* ------------------------------------------------------------------ */
  /*  Requests                                                          */
  /* ------------------------------------------------------------------ */

  /** Decodes and answers one request line. Never rejects. */
  async handleLine(line: string): Promise<IntakeResponse> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      return failure('invalid json');
    }

    const envelope = requestEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      return failure('invalid json');
    }

    switch (envelope.data.type) {
      case 'activity':
        return this.handleActivity(envelope.data.data);
      case 'ping':
        return OK;
      case 'sync':
        return this.handleSync();
      default:
        return failure('unknown request type');
    }
  }

  private async handleActivity(data: unknown): Promise<IntakeResponse> {
    const parsed = parseActivity(data, this.machine);
    if (!parsed.success) {
      this.log.debug({ reason: parsed.fault.message }, 'Rejected activity');
      return failure(parsed.fault.message);
    }

    try {
      const id = await this.buffer.append(parsed.activity);
      this.log.debug({ id, project: parsed.activity.project }, 'Activity buffered');
      return OK;
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to buffer activity');
      return failure(err instanceof Error ? err.message : String(err));
    }
  }

  private async handleSync(): Promise<IntakeResponse> {
    if (!this.syncHandler) {
      return failure('sync not available');
    }

    try {
      this.rateLimiter.admit();
    } catch (err: unknown) {
      if (err instanceof RateLimited) {
        this.log.warn({ retryAfterMs: err.retryAfterMs }, 'Manual sync rate limited');
        return failure(err.message);
      }
      throw err;
    }

    try {
      await this.syncHandler();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Manual sync failed');
      return failure(err instanceof Error ? err.message : String(err));
    }

    return success('sync complete');
  }
}
