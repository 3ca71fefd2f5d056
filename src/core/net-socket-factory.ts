/**
 * Production SocketFactory backed by `node:net` TCP sockets.
 *
 * Adapts the EventEmitter-based `net.Socket` into the callback-based
 * StreamSocket interface the connection layer expects.
 *
 * @see src/types/socket.ts for the interfaces
 * @see src/testing/fake-socket.ts for the test double
 */

import { Socket } from 'node:net';

import type {
  CloseHandler,
  DataHandler,
  SocketErrorHandler,
  SocketFactory,
  StreamSocket,
} from '../types/socket.js';

class NetStreamSocket implements StreamSocket {
  private readonly socket = new Socket();
  private readonly dataHandlers: DataHandler[] = [];
  private readonly closeHandlers: CloseHandler[] = [];
  private readonly errorHandlers: SocketErrorHandler[] = [];

  constructor() {
    this.socket.on('data', (chunk: Buffer) => {
      for (const handler of this.dataHandlers) handler(chunk);
    });
    this.socket.on('close', () => {
      for (const handler of this.closeHandlers) handler();
    });
    this.socket.on('error', (err: Error) => {
      for (const handler of this.errorHandlers) handler(err);
    });
  }

  /** Rejects on a socket error or a close before the connection is up. */
  connect(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const settle = (): void => {
        this.socket.off('error', onError);
        this.socket.off('close', onClose);
      };
      const onError = (err: Error): void => {
        settle();
        reject(err);
      };
      const onClose = (): void => {
        settle();
        reject(new Error('Socket closed before connecting'));
      };
      this.socket.once('error', onError);
      this.socket.once('close', onClose);
      this.socket.connect(port, host, () => {
        settle();
        this.socket.setNoDelay(true);
        resolve();
      });
    });
  }

  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  onData(handler: DataHandler): void {
    this.dataHandlers.push(handler);
  }

  onClose(handler: CloseHandler): void {
    this.closeHandlers.push(handler);
  }

  onError(handler: SocketErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  close(): Promise<void> {
    if (this.socket.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.destroy();
    });
  }
}

export class NetSocketFactory implements SocketFactory {
  createStreamSocket(): StreamSocket {
    return new NetStreamSocket();
  }
}
