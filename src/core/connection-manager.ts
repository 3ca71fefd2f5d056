/**
 * ConnectionManager: owns the controller socket.
 *
 * State machine: disconnected → connecting → connected → disconnected.
 *
 * `run()` is the read loop. It waits for inbound bytes (at most
 * `pollIntervalMs` between checks), frames them into lines and hands each
 * line to its callback in arrival order. It resolves exactly once per
 * connection with the reason the connection ended: an explicit
 * `disconnect()`, the peer closing, or a socket error.
 *
 * Outbound messages go through `send()`, which queues one JSON line on a
 * single write chain so writes never interleave.
 */

import { ErrorCode } from '../types/errors.js';
import {
  DEFAULT_HOST,
  DEFAULT_MAX_SEND_BUFFER_BYTES,
  DEFAULT_PORT,
  MAX_LINE_BYTES,
  type SendableMessage,
} from '../types/protocol.js';
import type { SocketFactory, StreamSocket } from '../types/socket.js';
import { ClientError, toError, usageError } from './client-error.js';
import { LineFramer } from './line-framer.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type DisconnectReason =
  | { kind: 'requested' }
  | { kind: 'peer-closed' }
  | { kind: 'error'; error: ClientError };

export interface ConnectionManagerOptions {
  socketFactory: SocketFactory;
  host?: string;
  port?: number;
  /** Longest wait between read-loop checks. */
  pollIntervalMs?: number;
  /** Cap on bytes queued for writing but not yet written. */
  maxSendBufferBytes?: number;
  maxLineBytes?: number;
  /** Called for each inbound line discarded for exceeding `maxLineBytes`. */
  onOversizedLine?: (byteLength: number) => void;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL_MS = 10;

function transportError(message: string, cause: unknown): ClientError {
  return new ClientError({ code: ErrorCode.TRANSPORT_ERROR, message, cause });
}

// ---------------------------------------------------------------------------
// ConnectionManager
// ---------------------------------------------------------------------------

export class ConnectionManager {
  private readonly socketFactory: SocketFactory;
  private readonly host: string;
  private readonly port: number;
  private readonly pollIntervalMs: number;
  private readonly maxSendBufferBytes: number;
  private readonly framer: LineFramer;
  private readonly logger: Logger;

  private currentState: ConnectionState = 'disconnected';
  private socket: StreamSocket | null = null;
  private inbox: Buffer[] = [];
  private stopReason: DisconnectReason | undefined;
  private closing: Promise<void> | null = null;
  private wakeLoop: (() => void) | null = null;
  private running = false;
  private writeChain: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(options: ConnectionManagerOptions) {
    this.socketFactory = options.socketFactory;
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxSendBufferBytes = options.maxSendBufferBytes ?? DEFAULT_MAX_SEND_BUFFER_BYTES;
    this.logger = options.logger ?? createLogger('connection');
    const onOversizedLine = options.onOversizedLine;
    this.framer = new LineFramer({
      maxLineBytes: options.maxLineBytes ?? MAX_LINE_BYTES,
      onOversizedLine: (byteLength) => {
        this.logger.warn('inbound line too long, discarded', { bytes: byteLength });
        onOversizedLine?.(byteLength);
      },
    });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === 'connected';
  }

  /** Bytes queued for writing. */
  get queuedBytes(): number {
    return this.queued;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Open the connection.
   *
   * Resolves without connecting when `disconnect()` is called while the
   * socket is still connecting; `run()` then returns the requested reason.
   *
   * @throws ClientError (TRANSPORT_ERROR) when the endpoint cannot be
   *   reached; the manager is back in `disconnected`.
   */
  async open(): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw usageError(`Cannot open a connection that is ${this.currentState}`);
    }

    this.currentState = 'connecting';
    this.stopReason = undefined;
    this.closing = null;
    this.inbox = [];
    this.queued = 0;
    this.writeChain = Promise.resolve();
    this.framer.reset();

    const socket = this.socketFactory.createStreamSocket();
    this.socket = socket;
    socket.onData((chunk) => {
      if (this.socket !== socket) return;
      this.inbox.push(chunk);
      this.wake();
    });
    socket.onClose(() => {
      if (this.socket !== socket || this.currentState !== 'connected') return;
      void this.stop({ kind: 'peer-closed' });
    });
    socket.onError((err) => {
      if (this.socket !== socket || this.currentState !== 'connected') return;
      void this.stop({ kind: 'error', error: transportError(`Socket error: ${err.message}`, err) });
    });

    try {
      await socket.connect(this.host, this.port);
    } catch (err) {
      if (this.stopRequestedFor(socket)) return;
      this.socket = null;
      this.currentState = 'disconnected';
      await this.closeSocket(socket);
      throw transportError(`Cannot connect to ${this.host}:${this.port}: ${toError(err).message}`, err);
    }

    if (this.stopRequestedFor(socket)) return;
    if (this.socket !== socket) {
      throw transportError('Connection closed while connecting', undefined);
    }
    this.currentState = 'connected';
    this.logger.info('connected', { host: this.host, port: this.port });
  }

  /**
   * Read until the connection ends. Resolves once with the reason.
   *
   * Lines already received when the peer closes or the socket fails are
   * still delivered; after `disconnect()` none are.
   */
  async run(onLine: (line: string) => void): Promise<DisconnectReason> {
    if (this.running) {
      throw usageError('The read loop is already running');
    }
    if (this.currentState !== 'connected' && this.stopReason === undefined) {
      throw new ClientError({ code: ErrorCode.NOT_CONNECTED, message: 'Not connected' });
    }

    this.running = true;
    try {
      for (;;) {
        const reason = this.stopReason;
        if (reason !== undefined && (reason.kind === 'requested' || this.inbox.length === 0)) {
          await this.closing;
          this.logger.info('disconnected', { reason: reason.kind });
          return reason;
        }

        const chunk = this.inbox.shift();
        if (chunk === undefined) {
          await this.waitForData();
          continue;
        }
        for (const line of this.framer.push(chunk)) {
          if (this.stopReason?.kind === 'requested') break;
          this.deliver(onLine, line);
        }
      }
    } finally {
      this.running = false;
    }
  }

  /** Close the connection. Does nothing when already disconnected. */
  async disconnect(): Promise<void> {
    if (this.socket === null && this.closing === null) return;
    await this.stop({ kind: 'requested' });
  }

  // -------------------------------------------------------------------------
  // Writing
  // -------------------------------------------------------------------------

  /**
   * Queue one message as a JSON line.
   *
   * @throws ClientError (NOT_CONNECTED) when no connection is open.
   * @throws ClientError (SEND_BUFFER_FULL) when the queued bytes would
   *   exceed `maxSendBufferBytes`.
   */
  send(message: SendableMessage): void {
    const socket = this.socket;
    if (this.currentState !== 'connected' || socket === null) {
      throw new ClientError({ code: ErrorCode.NOT_CONNECTED, message: 'Not connected' });
    }

    const data = Buffer.from(JSON.stringify(message) + '\n', 'utf-8');
    if (this.queued + data.length > this.maxSendBufferBytes) {
      throw new ClientError({
        code: ErrorCode.SEND_BUFFER_FULL,
        message: `Send buffer is full: ${this.queued} bytes queued, limit ${this.maxSendBufferBytes}`,
      });
    }

    this.queued += data.length;
    this.writeChain = this.writeChain.then(() => this.writeFrame(socket, data));
  }

  /** Resolves once every queued message has been written or dropped. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async writeFrame(socket: StreamSocket, data: Buffer): Promise<void> {
    try {
      if (this.socket === socket) {
        await socket.write(data);
      } else {
        this.logger.debug('dropped write after disconnect', { bytes: data.length });
      }
    } catch (err) {
      if (this.socket === socket) {
        await this.stop({
          kind: 'error',
          error: transportError(`Write failed: ${toError(err).message}`, err),
        });
      }
    } finally {
      this.queued -= data.length;
    }
  }

  /** Whether `disconnect()` ended the attempt that opened `socket`. */
  private stopRequestedFor(socket: StreamSocket): boolean {
    if (this.socket === socket || this.stopReason?.kind !== 'requested') return false;
    this.logger.info('connect abandoned', { host: this.host, port: this.port });
    return true;
  }

  private deliver(onLine: (line: string) => void, line: string): void {
    try {
      onLine(line);
    } catch (err) {
      this.logger.error('line handler failed', { error: toError(err) });
    }
  }

  /** Record why the connection ended and close the socket. Runs once. */
  private stop(reason: DisconnectReason): Promise<void> {
    if (this.closing !== null) return this.closing;

    this.stopReason = reason;
    this.currentState = 'disconnected';
    const socket = this.socket;
    this.socket = null;
    this.closing = socket === null ? Promise.resolve() : this.closeSocket(socket);
    if (reason.kind === 'error') {
      this.logger.warn('connection failed', { error: reason.error, error_code: reason.error.code });
    }
    this.wake();
    return this.closing;
  }

  private async closeSocket(socket: StreamSocket): Promise<void> {
    try {
      await socket.close();
    } catch (err) {
      this.logger.warn('socket close failed', { error: toError(err) });
    }
  }

  private waitForData(): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wakeLoop = null;
        resolve();
      };
      const timer = setTimeout(done, this.pollIntervalMs);
      this.wakeLoop = done;
    });
  }

  private wake(): void {
    this.wakeLoop?.();
  }
}
