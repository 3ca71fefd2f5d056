import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MessageDispatcher } from './message-dispatcher.js';
import { decodeMessage } from './message-decoder.js';
import { createRecordingLogger, type RecordingLogger } from '../testing/recording-logger.js';
import type { ActionMessage, ErrorEvent, InboundMessage } from '../types/protocol.js';

let logger: RecordingLogger;
let dispatcher: MessageDispatcher;

beforeEach(() => {
  logger = createRecordingLogger();
  dispatcher = new MessageDispatcher({ maxWorkers: 4, logger });
});

function feed(line: string): void {
  dispatcher.dispatch(decodeMessage(line));
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe('MessageDispatcher: registration', () => {
  it('delivers decoded action data to an action handler', async () => {
    const seen: ActionMessage[] = [];
    dispatcher.on('action', (message) => {
      seen.push(message);
    });

    feed('{"type":"action","actionId":"Foo","data":[{"id":"X","value":"42"}]}');
    await dispatcher.whenIdle();

    expect(seen).toHaveLength(1);
    expect(seen[0]?.data.find((item) => item.id === 'X')?.value).toBe('42');
  });

  it('delivers every message to `any` handlers', async () => {
    const kinds: string[] = [];
    dispatcher.on('any', (message: InboundMessage) => {
      kinds.push(message.type);
    });

    feed('{"type":"action","actionId":"a"}');
    feed('{"type":"broadcast","event":"pageChange"}');
    feed('{"type":"somethingNew"}');
    await dispatcher.whenIdle();

    expect(kinds.sort()).toEqual(['action', 'broadcast', 'somethingNew']);
  });

  it('does not deliver a kind to handlers of another kind', async () => {
    const onAction = vi.fn();
    dispatcher.on('action', onAction);

    feed('{"type":"up","actionId":"a"}');
    await dispatcher.whenIdle();

    expect(onAction).not.toHaveBeenCalled();
  });

  it('stops delivering after off()', async () => {
    const handler = vi.fn();
    dispatcher.on('closePlugin', handler);

    expect(dispatcher.off('closePlugin', handler)).toBe(true);
    expect(dispatcher.off('closePlugin', handler)).toBe(false);
    feed('{"type":"closePlugin"}');
    await dispatcher.whenIdle();

    expect(handler).not.toHaveBeenCalled();
    expect(dispatcher.handlerCount('closePlugin')).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Handler failures
// ---------------------------------------------------------------------------

describe('MessageDispatcher: handler failures', () => {
  it('turns a throwing settings handler into one error event and keeps dispatching', async () => {
    const errors: ErrorEvent[] = [];
    const onAction = vi.fn();
    dispatcher.on('error', (event) => {
      errors.push(event);
    });
    dispatcher.on('settings', () => {
      throw new Error('bad settings');
    });
    dispatcher.on('action', onAction);

    feed('{"type":"settings","values":[{"A":"1"}]}');
    feed('{"type":"action","actionId":"Foo"}');
    await dispatcher.whenIdle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      type: 'error',
      code: 'HANDLER_ERROR',
      message: 'Handler for "settings" failed: bad settings',
      messageType: 'settings',
    });
    expect(errors[0]?.error.message).toBe('bad settings');
    expect(onAction).toHaveBeenCalledOnce();
  });

  it('reports rejected promises from async handlers', async () => {
    const onError = vi.fn();
    dispatcher.on('error', onError);
    dispatcher.on('any', async () => {
      await Promise.resolve();
      throw 'not an error object';
    });

    feed('{"type":"broadcast","event":"pageChange"}');
    await dispatcher.whenIdle();

    expect(onError).toHaveBeenCalledOnce();
    const event: ErrorEvent = onError.mock.calls[0]?.[0];
    expect(event.message).toBe('Handler for "any" failed: not an error object');
    expect(event.messageType).toBe('broadcast');
  });

  it('isolates handlers registered for the same message', async () => {
    const second = vi.fn();
    dispatcher.on('action', () => {
      throw new Error('first fails');
    });
    dispatcher.on('action', second);

    feed('{"type":"action","actionId":"a"}');
    await dispatcher.whenIdle();

    expect(second).toHaveBeenCalledOnce();
  });

  it('logs failures of error handlers without dispatching them again', async () => {
    const onError = vi.fn(() => {
      throw new Error('error handler broke');
    });
    dispatcher.on('error', onError);
    dispatcher.on('action', () => {
      throw new Error('boom');
    });

    feed('{"type":"action","actionId":"a"}');
    await dispatcher.whenIdle();

    expect(onError).toHaveBeenCalledOnce();
    expect(logger.messages('error')).toEqual(['error handler failed']);
  });

  it('logs reported errors even without error handlers', async () => {
    dispatcher.reportError({ code: 'PROTOCOL_ERROR', error: new Error('Malformed JSON'), line: '{' });
    await dispatcher.whenIdle();

    expect(logger.records).toEqual([
      {
        level: 'warn',
        component: 'test',
        message: 'Malformed JSON',
        meta: { error_code: 'PROTOCOL_ERROR', message_type: undefined, handlers: 0 },
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

describe('MessageDispatcher: concurrency', () => {
  it('lets a later message complete while an earlier handler is still running', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const completed: string[] = [];
    dispatcher.on('action', async (message) => {
      if (message.actionId === 'slow') await gate;
      completed.push(message.actionId);
    });

    feed('{"type":"action","actionId":"slow"}');
    feed('{"type":"action","actionId":"fast"}');
    await Promise.resolve();

    expect(completed).toEqual(['fast']);
    release();
    await dispatcher.whenIdle();
    expect(completed).toEqual(['fast', 'slow']);
  });

  it('delivers error events with the offending line', async () => {
    const onError = vi.fn();
    dispatcher.on('error', onError);

    dispatcher.reportError({ code: 'PROTOCOL_ERROR', error: new Error('bad'), line: 'not json' });
    await dispatcher.whenIdle();

    expect(onError).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'PROTOCOL_ERROR', message: 'bad', line: 'not json' }),
    );
  });
});
