/**
 * PluginClient: one plugin's connection to the controller.
 *
 * Owns a ConnectionManager, a StateStore and a MessageDispatcher. Several
 * clients may coexist in one process; nothing is global.
 *
 * Inbound lines are decoded, checked against the plugin id, applied to
 * the store (hold tracking, settings, broadcast resend) and then handed to
 * the dispatcher. Outbound calls validate their arguments synchronously,
 * consult the store to suppress repeated values, and queue one JSON line.
 * A value is recorded in the store only once its line was queued, so a
 * rejected send never suppresses the next attempt.
 *
 * @example
 * ```ts
 * const client = new PluginClient({ pluginId: 'demo' });
 * client.on('action', (message) => {
 *   client.stateUpdate('demo.state.last', message.actionId);
 * });
 * const reason = await client.connect();
 * ```
 */

import {
  resolveClientOptions,
  type ClientOptions,
  type ClientOptionsInput,
} from '../types/config.js';
import type { PluginDescriptor } from '../types/descriptor.js';
import { ErrorCode, type ErrorCodeValue } from '../types/errors.js';
import {
  CONNECTOR_ID_MAX_LENGTH,
  CONNECTOR_ID_PREFIX,
  type ActionDataItem,
  type ClosePluginMessage,
  type DecodedMessage,
  type HandlerKind,
  type NotificationOption,
  type OutboundMessage,
  type SendableMessage,
} from '../types/protocol.js';
import type { SocketFactory } from '../types/socket.js';
import { ClientError, isClientError, toError, usageError } from './client-error.js';
import { ConnectionManager, type DisconnectReason } from './connection-manager.js';
import { createLogger, type Logger } from './logger.js';
import { decodeMessage, findDataValue } from './message-decoder.js';
import { MessageDispatcher, type Handler } from './message-dispatcher.js';
import { NetSocketFactory } from './net-socket-factory.js';
import { StateStore } from './state-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PluginClientOptions extends ClientOptionsInput {
  /** Descriptor whose states are registered as declared (static) states. */
  descriptor?: PluginDescriptor;
  socketFactory?: SocketFactory;
  logger?: Logger;
}

export interface StateDefinition {
  id: string;
  description: string;
  value: string;
  parentGroup?: string;
}

export interface StateValue {
  id: string;
  value: string;
}

// ---------------------------------------------------------------------------
// Argument checks
// ---------------------------------------------------------------------------

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw usageError(`${field} must be a non-empty string`, field);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw usageError(`${field} must be a string`, field);
  }
  return value;
}

function requireFinite(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw usageError(`${field} must be a finite number`, field);
  }
  return value;
}

function resolveOptions(input: ClientOptionsInput): ClientOptions {
  try {
    return resolveClientOptions(input);
  } catch (err) {
    throw new ClientError({ code: ErrorCode.USAGE_ERROR, message: toError(err).message, cause: err });
  }
}

// ---------------------------------------------------------------------------
// PluginClient
// ---------------------------------------------------------------------------

export class PluginClient {
  readonly options: Readonly<ClientOptions>;

  private readonly connection: ConnectionManager;
  private readonly store = new StateStore();
  private readonly dispatcher: MessageDispatcher;
  private readonly logger: Logger;
  private running = false;

  constructor(options: PluginClientOptions) {
    const { descriptor, socketFactory, logger, ...input } = options;
    this.options = resolveOptions(input);

    this.logger = (logger ?? createLogger('client')).withContext({ plugin: this.options.pluginId });
    this.dispatcher = new MessageDispatcher({
      maxWorkers: this.options.maxWorkers,
      logger: this.logger.child('dispatcher'),
    });
    this.connection = new ConnectionManager({
      socketFactory: socketFactory ?? new NetSocketFactory(),
      host: this.options.host,
      port: this.options.port,
      pollIntervalMs: this.options.pollIntervalMs,
      maxSendBufferBytes: this.options.maxSendBufferBytes,
      logger: this.logger.child('connection'),
      onOversizedLine: (byteLength) => {
        this.reportError(
          ErrorCode.PROTOCOL_ERROR,
          new Error(`Inbound line of ${byteLength} bytes exceeds the line limit`),
        );
      },
    });

    if (descriptor !== undefined) {
      const added = this.store.seedFromDescriptor(descriptor);
      this.logger.debug('declared states registered', { count: added });
    }
  }

  // -------------------------------------------------------------------------
  // Handlers
  // -------------------------------------------------------------------------

  on<K extends HandlerKind>(kind: K, handler: Handler<K>): this {
    this.dispatcher.on(kind, handler);
    return this;
  }

  off<K extends HandlerKind>(kind: K, handler: Handler<K>): boolean {
    return this.dispatcher.off(kind, handler);
  }

  /** Resolves when no handler is running or queued. */
  whenIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Connect, pair, and process messages until the connection ends.
   *
   * Resolves with the reason the connection ended. A connection that
   * cannot be opened resolves with an `error` reason and raises a
   * TRANSPORT_ERROR event; it does not reject.
   */
  async connect(): Promise<DisconnectReason> {
    if (this.running) {
      throw usageError('connect() is already running');
    }
    this.running = true;
    try {
      try {
        await this.connection.open();
      } catch (err) {
        if (!isClientError(err) || err.code !== ErrorCode.TRANSPORT_ERROR) throw err;
        this.reportError(err.code, err);
        return { kind: 'error', error: err };
      }

      if (this.connection.isConnected) {
        this.connection.send({ type: 'pair', id: this.options.pluginId });
      }
      const reason = await this.connection.run((line) => this.handleLine(line));
      this.store.clearHeld();

      if (reason.kind !== 'requested') {
        this.raiseShutdown(reason);
      }
      return reason;
    } finally {
      this.running = false;
    }
  }

  /** Stop the read loop and close the socket. Safe to call at any time. */
  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  isConnected(): boolean {
    return this.connection.isConnected;
  }

  /** Resolves once every queued message has been written. */
  flush(): Promise<void> {
    return this.connection.flush();
  }

  // -------------------------------------------------------------------------
  // States
  // -------------------------------------------------------------------------

  /**
   * Create a state at runtime. Creating an existing state updates its
   * value instead; repeating the current value sends nothing.
   */
  createState(id: string, description: string, value: string, parentGroup?: string): void {
    requireText(id, 'id');
    requireString(description, 'description');
    requireString(value, 'value');
    if (parentGroup !== undefined) requireString(parentGroup, 'parentGroup');
    this.requireConnected();

    if (this.store.isCurrent(id, value)) return;
    if (this.store.has(id)) {
      this.connection.send({ type: 'stateUpdate', id, value });
    } else {
      const message: OutboundMessage =
        parentGroup === undefined
          ? { type: 'createState', id, desc: description, defaultValue: value }
          : { type: 'createState', id, desc: description, defaultValue: value, parentGroup };
      this.connection.send(message);
    }
    this.store.createOrUpdateState(id, description, value, parentGroup);
  }

  createStateMany(states: readonly StateDefinition[]): void {
    for (const state of states) {
      this.createState(state.id, state.description, state.value, state.parentGroup);
    }
  }

  /**
   * Remove a state created or updated at runtime. Unknown ids are ignored.
   *
   * @throws ClientError (USAGE_ERROR) for a state declared in the descriptor.
   */
  removeState(id: string): void {
    requireText(id, 'id');
    if (this.store.isDeclared(id)) {
      throw usageError(`State "${id}" is declared in the descriptor and cannot be removed`, 'id');
    }
    if (!this.store.has(id)) return;
    this.requireConnected();

    this.connection.send({ type: 'removeState', id });
    this.store.removeState(id);
  }

  removeStateMany(ids: readonly string[]): void {
    for (const id of ids) this.removeState(id);
  }

  /** Send a new state value unless it equals the last one sent. */
  stateUpdate(id: string, value: string): void {
    requireText(id, 'id');
    requireString(value, 'value');
    if (!this.options.allowImplicitStates && !this.store.has(id)) {
      throw usageError(`State "${id}" is neither declared nor created`, 'id');
    }
    this.requireConnected();

    if (this.store.isCurrent(id, value)) return;
    this.connection.send({ type: 'stateUpdate', id, value });
    this.store.updateValue(id, value);
  }

  stateUpdateMany(updates: readonly StateValue[]): void {
    for (const { id, value } of updates) this.stateUpdate(id, value);
  }

  // -------------------------------------------------------------------------
  // Other outbound messages
  // -------------------------------------------------------------------------

  /** Replace the choices of a choice list, optionally for one action instance. */
  choiceUpdate(id: string, values: readonly string[], instanceId?: string): void {
    requireText(id, 'id');
    if (!Array.isArray(values) || !values.every((value) => typeof value === 'string')) {
      throw usageError('values must be an array of strings', 'values');
    }
    if (instanceId !== undefined) requireText(instanceId, 'instanceId');
    this.requireConnected();

    const value = [...values];
    this.connection.send(
      instanceId === undefined
        ? { type: 'choiceUpdate', id, value }
        : { type: 'choiceUpdate', id, value, instanceId },
    );
  }

  /** Change a plugin setting unless it already holds `value`. */
  settingUpdate(name: string, value: string): void {
    requireText(name, 'name');
    requireString(value, 'value');
    this.requireConnected();

    if (this.store.isCurrentSetting(name, value)) return;
    this.connection.send({ type: 'settingUpdate', name, value });
    this.store.updateSetting(name, value);
  }

  /**
   * Move a connector (slider). `connectorId` is the part after the
   * `pc_<pluginId>_` prefix, including any `|name=value` data suffix.
   */
  connectorUpdate(connectorId: string, value: number): void {
    requireText(connectorId, 'connectorId');
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      throw usageError(`Connector value must be an integer between 0 and 100, got ${value}`, 'value');
    }
    const fullId = `${CONNECTOR_ID_PREFIX}${this.options.pluginId}_${connectorId}`;
    if (fullId.length > CONNECTOR_ID_MAX_LENGTH) {
      throw usageError(
        `Connector id "${fullId}" is longer than ${CONNECTOR_ID_MAX_LENGTH} characters`,
        'connectorId',
      );
    }
    this.requireConnected();

    this.connection.send({ type: 'connectorUpdate', connectorId: fullId, value });
  }

  showNotification(
    notificationId: string,
    title: string,
    msg: string,
    options: readonly NotificationOption[],
  ): void {
    requireText(notificationId, 'notificationId');
    requireString(title, 'title');
    requireString(msg, 'msg');
    for (const [index, option] of options.entries()) {
      if (typeof option.id !== 'string' || option.id.length === 0) {
        throw usageError(`Notification option ${index} has no id`, 'options');
      }
      if (typeof option.title !== 'string' || option.title.length === 0) {
        throw usageError(`Notification option "${option.id}" has no title`, 'options');
      }
    }
    this.requireConnected();

    this.connection.send({
      type: 'showNotification',
      notificationId,
      title,
      msg,
      options: options.map(({ id, title: optionTitle }) => ({ id, title: optionTitle })),
    });
  }

  /** Change the numeric range of one data item of an action instance. */
  updateActionData(instanceId: string, dataId: string, minValue: number, maxValue: number): void {
    requireText(instanceId, 'instanceId');
    requireText(dataId, 'dataId');
    requireFinite(minValue, 'minValue');
    requireFinite(maxValue, 'maxValue');
    if (minValue > maxValue) {
      throw usageError(`minValue ${minValue} is greater than maxValue ${maxValue}`, 'minValue');
    }
    this.requireConnected();

    this.connection.send({
      type: 'updateActionData',
      instanceId,
      data: { id: dataId, minValue, maxValue, type: 'number' },
    });
  }

  /** Send any message as-is, for protocol features without a dedicated method. */
  send(message: SendableMessage): void {
    this.connection.send(message);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Whether a hold-capable action is currently pressed. Without
   * `instanceId`, true when any instance is held.
   */
  isActionBeingHeld(actionId: string, instanceId?: string): boolean {
    return this.store.isHeld(actionId, instanceId);
  }

  /** Last known value of a plugin setting. */
  getSetting(name: string): string | undefined {
    return this.store.getSetting(name);
  }

  /** Value of data item `id` of an action message, or the first value. */
  static getActionDataValue(data: readonly ActionDataItem[], id?: string): string | undefined {
    return findDataValue(data, id);
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  private handleLine(line: string): void {
    let decoded: DecodedMessage;
    try {
      decoded = decodeMessage(line);
    } catch (err) {
      this.reportError(ErrorCode.PROTOCOL_ERROR, err, { line });
      return;
    }

    const { pluginId: target } = decoded.message;
    if (this.options.checkPluginId && target !== undefined && target !== this.options.pluginId) {
      this.reportError(
        ErrorCode.PROTOCOL_ERROR,
        new Error(`Message addressed to plugin "${target}", expected "${this.options.pluginId}"`),
        { line, messageType: decoded.kind },
      );
      return;
    }

    this.apply(decoded);
    this.dispatcher.dispatch(decoded);

    if (decoded.kind === 'closePlugin' && this.options.autoClose) {
      this.logger.info('controller asked the plugin to close');
      void this.disconnect();
    }
  }

  /** Store updates that must happen before handlers see the message. */
  private apply(decoded: DecodedMessage): void {
    switch (decoded.kind) {
      case 'info':
        this.store.syncSettings(decoded.message.settings);
        this.logger.info('paired', {
          sdk: decoded.message.sdkVersion,
          controller: decoded.message.controllerVersion,
        });
        break;
      case 'settings':
        this.store.syncSettings(decoded.message.values);
        break;
      case 'down':
        this.store.setHeld(decoded.message.actionId, decoded.message.instanceId, true);
        break;
      case 'up':
        this.store.setHeld(decoded.message.actionId, decoded.message.instanceId, false);
        break;
      case 'broadcast':
        if (this.options.updateStatesOnBroadcast) this.resendStates();
        break;
      default:
        break;
    }
  }

  /** Resend every known state value, bypassing repeat suppression. */
  private resendStates(): void {
    const states = this.store.snapshot();
    try {
      for (const { id, value } of states) {
        this.connection.send({ type: 'stateUpdate', id, value });
      }
    } catch (err) {
      this.reportError(isClientError(err) ? err.code : ErrorCode.TRANSPORT_ERROR, err, {
        messageType: 'broadcast',
      });
      return;
    }
    this.logger.debug('states resent', { count: states.length });
  }

  /** Dispatch a local closePlugin and a TRANSPORT_ERROR after an abnormal end. */
  private raiseShutdown(reason: Exclude<DisconnectReason, { kind: 'requested' }>): void {
    const error =
      reason.kind === 'error'
        ? reason.error
        : new ClientError({
            code: ErrorCode.TRANSPORT_ERROR,
            message: 'Connection closed by the controller',
          });

    const message: ClosePluginMessage = {
      type: 'closePlugin',
      synthetic: true,
      pluginId: this.options.pluginId,
      raw: { type: 'closePlugin', pluginId: this.options.pluginId },
    };
    this.dispatcher.dispatch({ kind: 'closePlugin', message });
    this.reportError(ErrorCode.TRANSPORT_ERROR, error);
  }

  private reportError(
    code: ErrorCodeValue,
    err: unknown,
    context: { line?: string; messageType?: string } = {},
  ): void {
    this.dispatcher.reportError({ code, error: err, ...context });
  }

  private requireConnected(): void {
    if (!this.connection.isConnected) {
      throw new ClientError({ code: ErrorCode.NOT_CONNECTED, message: 'Not connected' });
    }
  }
}
