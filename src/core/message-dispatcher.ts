/**
 * MessageDispatcher: fans decoded messages out to registered handlers.
 *
 * Each handler invocation is submitted to a TaskPool as its own task, so
 * handlers for different messages may run concurrently and complete out
 * of order. A handler that throws or rejects produces exactly one
 * HANDLER_ERROR event; failures inside `error` handlers are only logged.
 */

import { ErrorCode, type ErrorCodeValue } from '../types/errors.js';
import type { DecodedMessage, ErrorEvent, HandlerEventMap, HandlerKind } from '../types/protocol.js';
import { toError } from './client-error.js';
import { createLogger, type Logger } from './logger.js';
import { TaskPool } from './task-pool.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Handler<K extends HandlerKind> = (event: HandlerEventMap[K]) => unknown;

type HandlerTable = { [K in HandlerKind]: Array<Handler<K>> };

export interface MessageDispatcherOptions {
  /** Worker limit for the pool created when none is passed. */
  maxWorkers?: number;
  pool?: TaskPool;
  logger?: Logger;
}

/** Input to {@link MessageDispatcher.reportError}. */
export interface ErrorReport {
  code: ErrorCodeValue;
  error: unknown;
  message?: string;
  messageType?: string;
  line?: string;
}

const DEFAULT_MAX_WORKERS = 8;

// ---------------------------------------------------------------------------
// MessageDispatcher
// ---------------------------------------------------------------------------

export class MessageDispatcher {
  private readonly pool: TaskPool;
  private readonly logger: Logger;
  private readonly handlers: HandlerTable = {
    info: [],
    action: [],
    down: [],
    up: [],
    listChange: [],
    connectorChange: [],
    settings: [],
    broadcast: [],
    notificationOptionClicked: [],
    closePlugin: [],
    unknown: [],
    any: [],
    error: [],
  };

  constructor(options: MessageDispatcherOptions = {}) {
    this.logger = options.logger ?? createLogger('dispatcher');
    this.pool =
      options.pool ??
      new TaskPool({
        maxConcurrency: options.maxWorkers ?? DEFAULT_MAX_WORKERS,
        onTaskError: (error) => this.logger.error('dispatch task failed', { error }),
      });
  }

  /** Register a handler. The same function may be registered more than once. */
  on<K extends HandlerKind>(kind: K, handler: Handler<K>): void {
    this.handlers[kind].push(handler);
  }

  /** Remove one registration of `handler`. Returns false when it was not registered. */
  off<K extends HandlerKind>(kind: K, handler: Handler<K>): boolean {
    const list = this.handlers[kind];
    const index = list.indexOf(handler);
    if (index === -1) return false;
    list.splice(index, 1);
    return true;
  }

  handlerCount(kind: HandlerKind): number {
    return this.handlers[kind].length;
  }

  /** Submit every handler for the message's kind, then every `any` handler. */
  dispatch(decoded: DecodedMessage): void {
    this.submit(decoded.kind, decoded.message, decoded.kind);
    this.submit('any', decoded.message, decoded.kind);
  }

  /** Log a failure and deliver it to every `error` handler. */
  reportError(report: ErrorReport): void {
    const error = toError(report.error);
    const event: ErrorEvent = {
      type: 'error',
      code: report.code,
      message: report.message ?? error.message,
      error,
    };
    if (report.messageType !== undefined) event.messageType = report.messageType;
    if (report.line !== undefined) event.line = report.line;

    this.logger.warn(event.message, {
      error_code: event.code,
      message_type: event.messageType,
      handlers: this.handlers.error.length,
    });
    this.submit('error', event, event.messageType);
  }

  /** Resolves when no handler is running or queued. */
  whenIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  private submit<K extends HandlerKind>(
    kind: K,
    event: HandlerEventMap[K],
    messageType: string | undefined,
  ): void {
    for (const handler of this.handlers[kind]) {
      this.pool.submit(async () => {
        try {
          await handler(event);
        } catch (err) {
          this.handlerFailed(kind, err, messageType);
        }
      });
    }
  }

  private handlerFailed(kind: HandlerKind, err: unknown, messageType: string | undefined): void {
    const error = toError(err);
    if (kind === 'error') {
      this.logger.error('error handler failed', { error, message_type: messageType });
      return;
    }
    this.reportError({
      code: ErrorCode.HANDLER_ERROR,
      error,
      message: `Handler for "${kind}" failed: ${error.message}`,
      messageType,
    });
  }
}
