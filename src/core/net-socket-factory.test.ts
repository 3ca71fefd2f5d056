/**
 * Tests for NetSocketFactory, the production SocketFactory on `node:net`.
 *
 * `node:net` is mocked so the adapter's wiring is checked without opening
 * real sockets.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EventEmitter } from 'node:events';

interface MockNetSocket extends EventEmitter {
  destroyed: boolean;
  destroyCount: number;
  noDelay: boolean;
  written: Buffer[];
  writeError: Error | undefined;
  connectArgs: [number, string] | undefined;
  connectListener: (() => void) | undefined;
}

const registry = vi.hoisted(() => {
  const sockets: MockNetSocket[] = [];
  return { sockets };
});

vi.mock('node:net', async () => {
  const { EventEmitter } = await import('node:events');

  class Socket extends EventEmitter implements MockNetSocket {
    destroyed = false;
    destroyCount = 0;
    noDelay = false;
    written: Buffer[] = [];
    writeError: Error | undefined = undefined;
    connectArgs: [number, string] | undefined = undefined;
    connectListener: (() => void) | undefined = undefined;

    constructor() {
      super();
      registry.sockets.push(this);
    }

    connect(port: number, host: string, listener: () => void): this {
      this.connectArgs = [port, host];
      this.connectListener = listener;
      return this;
    }

    setNoDelay(noDelay: boolean): this {
      this.noDelay = noDelay;
      return this;
    }

    write(data: Buffer, callback: (err?: Error | null) => void): boolean {
      const err = this.writeError;
      queueMicrotask(() => {
        if (err !== undefined) {
          callback(err);
          return;
        }
        this.written.push(data);
        callback();
      });
      return true;
    }

    destroy(): this {
      this.destroyCount++;
      this.destroyed = true;
      queueMicrotask(() => this.emit('close', false));
      return this;
    }
  }

  return { Socket };
});

import { NetSocketFactory } from './net-socket-factory.js';
import type { StreamSocket } from '../types/socket.js';

function create(): { socket: StreamSocket; raw: MockNetSocket } {
  const socket = new NetSocketFactory().createStreamSocket();
  const raw = registry.sockets.at(-1);
  if (raw === undefined) throw new Error('net.Socket was not constructed');
  return { socket, raw };
}

function established(raw: MockNetSocket): void {
  const listener = raw.connectListener;
  if (listener === undefined) throw new Error('connect() was not called');
  listener();
}

beforeEach(() => {
  registry.sockets.length = 0;
});

// ---------------------------------------------------------------------------
// connect
// ---------------------------------------------------------------------------

describe('NetSocketFactory: connect', () => {
  it('connects to the endpoint and disables Nagle', async () => {
    const { socket, raw } = create();
    const connecting = socket.connect('127.0.0.1', 12136);
    established(raw);

    await expect(connecting).resolves.toBeUndefined();
    expect(raw.connectArgs).toEqual([12136, '127.0.0.1']);
    expect(raw.noDelay).toBe(true);
  });

  it('drops its one-shot listeners once connected', async () => {
    const { socket, raw } = create();
    const connecting = socket.connect('127.0.0.1', 12136);
    established(raw);
    await connecting;

    expect(raw.listenerCount('error')).toBe(1);
    expect(raw.listenerCount('close')).toBe(1);
  });

  it('rejects on a socket error and removes its listeners', async () => {
    const { socket, raw } = create();
    const connecting = socket.connect('127.0.0.1', 12136);
    raw.emit('error', new Error('connect ECONNREFUSED 127.0.0.1:12136'));

    await expect(connecting).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:12136');
    expect(raw.listenerCount('error')).toBe(1);
    expect(raw.listenerCount('close')).toBe(1);
  });

  it('rejects when the socket closes before connecting', async () => {
    const { socket, raw } = create();
    const connecting = socket.connect('127.0.0.1', 12136);
    raw.emit('close', false);

    await expect(connecting).rejects.toThrow('Socket closed before connecting');
  });
});

// ---------------------------------------------------------------------------
// write / close
// ---------------------------------------------------------------------------

describe('NetSocketFactory: write and close', () => {
  it('resolves a write once the data was handed over', async () => {
    const { socket, raw } = create();

    await socket.write(Buffer.from('{"type":"pair","id":"demo"}\n'));

    expect(Buffer.concat(raw.written).toString('utf-8')).toBe('{"type":"pair","id":"demo"}\n');
  });

  it('rejects a write whose callback reports an error', async () => {
    const { socket, raw } = create();
    raw.writeError = new Error('write EPIPE');

    await expect(socket.write(Buffer.from('x\n'))).rejects.toThrow('write EPIPE');
  });

  it('resolves close() after the socket closed', async () => {
    const { socket, raw } = create();

    await socket.close();

    expect(raw.destroyCount).toBe(1);
    expect(raw.destroyed).toBe(true);
  });

  it('does nothing when closing a destroyed socket', async () => {
    const { socket, raw } = create();
    await socket.close();

    await socket.close();

    expect(raw.destroyCount).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Event fan-out
// ---------------------------------------------------------------------------

describe('NetSocketFactory: events', () => {
  it('delivers data, close and error to every registered handler', () => {
    const { socket, raw } = create();
    const chunks: string[] = [];
    const closes: number[] = [];
    const errors: string[] = [];
    for (const tag of [1, 2]) {
      socket.onData((chunk) => chunks.push(`${tag}:${chunk.toString('utf-8')}`));
      socket.onClose(() => closes.push(tag));
      socket.onError((err) => errors.push(`${tag}:${err.message}`));
    }

    raw.emit('data', Buffer.from('abc'));
    raw.emit('error', new Error('read ECONNRESET'));
    raw.emit('close', true);

    expect(chunks).toEqual(['1:abc', '2:abc']);
    expect(errors).toEqual(['1:read ECONNRESET', '2:read ECONNRESET']);
    expect(closes).toEqual([1, 2]);
  });
});
