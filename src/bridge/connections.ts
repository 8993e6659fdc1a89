/**
 * WebSocket Connection Manager
 *
 * Owns the live socket, retry timer and backoff counter of every destination.
 * All state changes for a destination happen inside this class, on the event
 * loop, so a late send can never interleave with a reconnect half-way through.
 *
 *   Disconnected --connect--> Connecting --open--> Open
 *   Connecting --handshake failure--> Failed
 *   Open --remote close / network error--> Failed
 *   Failed --retry timer--> Connecting
 *   Open --close()--> Closing --> Disconnected
 */

import WebSocket from 'ws';

import { computeBackoffDelay } from '../lib/backoff.js';
import type { ConnectionConfig } from '../lib/config.js';
import {
  AddressError,
  QueueOverflowError,
  TransportError,
  formatError,
  toErrorRecord,
  type BridgeError,
} from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { Destination, EventSink, PendingSend } from '../lib/types.js';

/** The subset of a `ws` client socket the manager relies on */
export interface BridgeSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SocketFactory = (url: string) => BridgeSocket;

export interface RejectedResult {
  outcome: 'rejected';
  error: BridgeError;
  /** The same failure was already surfaced for this destination */
  alreadyReported: boolean;
}

export type SendResult = { outcome: 'sent' } | { outcome: 'queued' } | RejectedResult;
export type ConnectResult = { outcome: 'open' } | { outcome: 'connecting' } | RejectedResult;

export interface ConnectionManagerOptions {
  connection: ConnectionConfig;
  /** Destination id -> ws:// or wss:// URL */
  aliases?: Record<string, string>;
  onEvent: EventSink;
  createSocket?: SocketFactory;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
}

/** Live resources held on behalf of one destination */
interface Connection {
  socket: BridgeSocket | null;
  socketError: Error | null;
  retryTimer: NodeJS.Timeout | null;
  closeTimer: NodeJS.Timeout | null;
  closeWaiters: Array<() => void>;
  /** Consecutive failures since the last successful open */
  attempts: number;
  /** Invalid address value already reported to the host */
  reportedAddress: string | null;
}

const defaultSocketFactory: SocketFactory = (url) => new WebSocket(url);

export class ConnectionManager {
  private connections = new Map<Destination, Connection>();
  private stopped = false;
  private readonly createSocket: SocketFactory;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.log = options.logger ?? createLogger('connections');
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /**
   * Transmit now when open, otherwise queue the payload and make sure a
   * connect attempt is under way.
   */
  send(destination: Destination, payload: string, correlationId?: string): SendResult {
    if (this.stopped) {
      return this.shuttingDown();
    }
    const conn = this.connectionFor(destination);
    const item: PendingSend = { payload, enqueuedAt: this.now() };
    if (correlationId !== undefined) item.correlationId = correlationId;

    switch (destination.connectionState) {
      case 'Open':
        if (this.transmit(destination, conn, payload)) {
          return { outcome: 'sent' };
        }
        this.enqueue(destination, item);
        this.fail(destination, conn, new TransportError('Send failed on open connection', 'SEND_FAILED'));
        return { outcome: 'queued' };

      case 'Connecting':
      case 'Closing':
        this.enqueue(destination, item);
        return { outcome: 'queued' };

      case 'Disconnected':
      case 'Failed': {
        const target = this.resolve(destination, conn);
        if (target instanceof AddressError) {
          return this.rejectAddress(destination, conn, target);
        }
        this.enqueue(destination, item);
        this.openSocket(destination, conn, target);
        return { outcome: 'queued' };
      }
    }
  }

  /**
   * Open the destination's connection without sending anything.
   * A pending retry is cut short.
   */
  connect(destination: Destination): ConnectResult {
    if (this.stopped) {
      return this.shuttingDown();
    }
    const conn = this.connectionFor(destination);
    if (destination.connectionState === 'Open') return { outcome: 'open' };
    if (destination.connectionState === 'Connecting' || destination.connectionState === 'Closing') {
      return { outcome: 'connecting' };
    }

    const target = this.resolve(destination, conn);
    if (target instanceof AddressError) {
      return this.rejectAddress(destination, conn, target);
    }
    this.openSocket(destination, conn, target);
    return { outcome: 'connecting' };
  }

  /**
   * Close the connection and cancel any retry. Pending sends are kept and go
   * out on the next connection. Resolves once the socket is gone.
   */
  close(destination: Destination): Promise<void> {
    const conn = this.connections.get(destination);
    if (!conn) return Promise.resolve();
    this.clearRetry(conn);

    const socket = conn.socket;
    if (!socket) {
      destination.connectionState = 'Disconnected';
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      conn.closeWaiters.push(resolve);
      if (destination.connectionState === 'Closing') return;

      destination.connectionState = 'Closing';
      this.log.debug('Closing connection', { destination: destination.id });
      conn.closeTimer = setTimeout(() => {
        if (conn.socket !== socket) return;
        conn.socket = null;
        socket.terminate();
        this.finishClose(destination, conn, 'terminated after close timeout');
      }, this.options.connection.close_timeout_ms);

      try {
        socket.close(1000, 'bridge closing');
      } catch (error) {
        this.log.warn('Socket close failed, terminating', {
          destination: destination.id,
          error: formatError(error),
        });
        conn.socket = null;
        socket.terminate();
        this.finishClose(destination, conn, 'terminated');
      }
    });
  }

  /**
   * Close the connection and forget it. The caller owns the registry entry.
   */
  async remove(destination: Destination): Promise<void> {
    await this.close(destination);
    this.connections.delete(destination);
  }

  /**
   * Close every connection. Retry timers are cancelled immediately.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    const destinations = [...this.connections.keys()];
    await Promise.all(destinations.map((d) => this.close(d)));
    this.connections.clear();
  }

  isRetryScheduled(destination: Destination): boolean {
    return this.connections.get(destination)?.retryTimer != null;
  }

  private connectionFor(destination: Destination): Connection {
    let conn = this.connections.get(destination);
    if (!conn) {
      conn = {
        socket: null,
        socketError: null,
        retryTimer: null,
        closeTimer: null,
        closeWaiters: [],
        attempts: 0,
        reportedAddress: null,
      };
      this.connections.set(destination, conn);
    }
    return conn;
  }

  private rawTarget(id: string): string {
    return this.options.aliases?.[id] ?? id;
  }

  private resolve(destination: Destination, conn: Connection): string | AddressError {
    const raw = this.rawTarget(destination.id);
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      return new AddressError(`Destination "${raw}" is not a valid URL`, destination.id);
    }
    if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
      return new AddressError(
        `Destination "${raw}" must use ws:// or wss://, got ${url.protocol}//`,
        destination.id
      );
    }
    destination.target = raw;
    conn.reportedAddress = null;
    return raw;
  }

  private rejectAddress(destination: Destination, conn: Connection, error: AddressError): RejectedResult {
    const raw = this.rawTarget(destination.id);
    const alreadyReported = conn.reportedAddress === raw;

    this.clearRetry(conn);
    destination.target = undefined;
    destination.connectionState = 'Failed';
    destination.lastError = toErrorRecord(error, this.now());

    if (!alreadyReported) {
      conn.reportedAddress = raw;
      this.log.warn('Invalid destination address, not retrying', { destination: destination.id });
    }
    return { outcome: 'rejected', error, alreadyReported };
  }

  private shuttingDown(): RejectedResult {
    return {
      outcome: 'rejected',
      error: new TransportError('Bridge is shutting down', 'CONNECTION_LOST'),
      alreadyReported: false,
    };
  }

  private enqueue(destination: Destination, item: PendingSend): void {
    destination.pendingSends.push(item);
    const capacity = this.options.connection.queue_capacity;
    while (destination.pendingSends.length > capacity) {
      const dropped = destination.pendingSends.shift();
      const error = new QueueOverflowError(
        `Pending queue full (${capacity}), dropped oldest message`,
        destination.id
      );
      this.log.warn(error.message, { destination: destination.id });
      this.options.onEvent({
        event: 'dropped',
        destination: destination.id,
        detail: error.message,
        correlationId: dropped?.correlationId,
      });
    }
  }

  private openSocket(destination: Destination, conn: Connection, target: string): void {
    this.clearRetry(conn);
    if (conn.socket) {
      // Never two live sockets per destination
      const stale = conn.socket;
      conn.socket = null;
      stale.terminate();
    }

    destination.connectionState = 'Connecting';
    conn.socketError = null;
    this.log.debug('Connecting', { destination: destination.id, target, attempt: conn.attempts });

    let socket: BridgeSocket;
    try {
      socket = this.createSocket(target);
    } catch (error) {
      this.enterFailed(
        destination,
        conn,
        new TransportError(`Could not create socket: ${formatError(error)}`, 'CONNECT_FAILED'),
        false
      );
      return;
    }
    conn.socket = socket;

    socket.on('open', () => {
      if (conn.socket !== socket) return;
      this.handleOpen(destination, conn);
    });
    socket.on('message', (data, isBinary) => {
      if (conn.socket !== socket) return;
      this.options.onEvent({
        event: 'received',
        destination: destination.id,
        detail: rawDataToString(data, isBinary),
      });
    });
    socket.on('error', (error) => {
      if (conn.socket !== socket) return;
      conn.socketError = error;
      this.log.debug('Socket error', { destination: destination.id, error: error.message });
    });
    socket.on('close', (code, reason) => {
      if (conn.socket !== socket) return;
      conn.socket = null;
      this.handleClose(destination, conn, code, reason.toString('utf8'));
    });
  }

  private handleOpen(destination: Destination, conn: Connection): void {
    destination.connectionState = 'Open';
    destination.lastError = undefined;
    conn.attempts = 0;
    conn.socketError = null;
    this.log.info('Connection open', { destination: destination.id });
    this.options.onEvent({ event: 'opened', destination: destination.id, detail: destination.target });
    this.flush(destination, conn);
  }

  private handleClose(destination: Destination, conn: Connection, code: number, reason: string): void {
    if (destination.connectionState === 'Closing') {
      this.finishClose(destination, conn, `closed (${code})`);
      return;
    }

    const wasOpen = destination.connectionState === 'Open';
    const cause = conn.socketError?.message ?? `code ${code}${reason ? `: ${reason}` : ''}`;
    const error = wasOpen
      ? new TransportError(`Connection lost (${cause})`, 'CONNECTION_LOST')
      : new TransportError(`Connection failed (${cause})`, 'CONNECT_FAILED');
    this.enterFailed(destination, conn, error, wasOpen);
  }

  private finishClose(destination: Destination, conn: Connection, detail: string): void {
    if (conn.closeTimer) {
      clearTimeout(conn.closeTimer);
      conn.closeTimer = null;
    }
    destination.connectionState = 'Disconnected';
    this.log.debug('Connection closed', { destination: destination.id, detail });
    this.options.onEvent({ event: 'closed', destination: destination.id, detail });
    for (const resolve of conn.closeWaiters.splice(0)) {
      resolve();
    }
  }

  /**
   * Drain pending sends in FIFO order. A failed send stops the drain with the
   * failed payload and everything after it still queued.
   */
  private flush(destination: Destination, conn: Connection): void {
    const ttl = this.options.connection.pending_ttl_ms;
    while (destination.pendingSends.length > 0 && destination.connectionState === 'Open') {
      const next = destination.pendingSends[0];

      if (ttl > 0 && this.now() - next.enqueuedAt > ttl) {
        destination.pendingSends.shift();
        this.options.onEvent({
          event: 'dropped',
          destination: destination.id,
          detail: `expired after ${ttl}ms`,
          correlationId: next.correlationId,
        });
        continue;
      }

      if (!this.transmit(destination, conn, next.payload)) {
        this.fail(
          destination,
          conn,
          new TransportError('Send failed while flushing pending messages', 'SEND_FAILED')
        );
        return;
      }
      destination.pendingSends.shift();
      this.options.onEvent({
        event: 'sent',
        destination: destination.id,
        detail: 'flushed',
        correlationId: next.correlationId,
      });
    }
  }

  private transmit(destination: Destination, conn: Connection, payload: string): boolean {
    const socket = conn.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return false;
    try {
      socket.send(payload, (error) => {
        if (!error) return;
        if (conn.socket === socket) {
          this.fail(destination, conn, new TransportError(`Delivery failed: ${error.message}`, 'SEND_FAILED'));
          return;
        }
        // Socket already replaced; its failure was handled then
        this.log.warn('Delivery failed', { destination: destination.id, error: error.message });
        this.options.onEvent({
          event: 'error',
          destination: destination.id,
          detail: `Delivery failed: ${error.message}`,
        });
      });
      return true;
    } catch (error) {
      this.log.warn('Send threw', { destination: destination.id, error: formatError(error) });
      return false;
    }
  }

  /** Drop the current socket and move to Failed */
  private fail(destination: Destination, conn: Connection, error: TransportError): void {
    const wasOpen = destination.connectionState === 'Open';
    const socket = conn.socket;
    conn.socket = null;
    socket?.terminate();
    this.enterFailed(destination, conn, error, wasOpen);
  }

  private enterFailed(
    destination: Destination,
    conn: Connection,
    error: TransportError,
    wasOpen: boolean
  ): void {
    destination.connectionState = 'Failed';
    destination.lastError = toErrorRecord(error, this.now());

    const delay = computeBackoffDelay(conn.attempts, this.options.connection.backoff, this.random);
    conn.attempts += 1;
    this.log.warn(error.message, { destination: destination.id, retryInMs: delay });
    this.options.onEvent({
      event: wasOpen ? 'closed' : 'error',
      destination: destination.id,
      detail: `${error.message}; retrying in ${delay}ms`,
    });

    if (this.stopped) return;
    this.clearRetry(conn);
    conn.retryTimer = setTimeout(() => {
      conn.retryTimer = null;
      if (this.stopped || destination.connectionState !== 'Failed') return;
      const target = this.resolve(destination, conn);
      if (target instanceof AddressError) {
        this.rejectAddress(destination, conn, target);
        return;
      }
      this.openSocket(destination, conn, target);
    }, delay);
  }

  private clearRetry(conn: Connection): void {
    if (conn.retryTimer) {
      clearTimeout(conn.retryTimer);
      conn.retryTimer = null;
    }
  }
}

function rawDataToString(data: WebSocket.RawData, isBinary: boolean): string {
  let buffer: Buffer;
  if (Buffer.isBuffer(data)) {
    buffer = data;
  } else if (Array.isArray(data)) {
    buffer = Buffer.concat(data);
  } else {
    buffer = Buffer.from(data);
  }
  return isBinary ? `base64:${buffer.toString('base64')}` : buffer.toString('utf8');
}
