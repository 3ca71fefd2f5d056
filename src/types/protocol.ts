/**
 * Wire protocol types.
 *
 * The controller and the plugin exchange newline-delimited JSON objects
 * over a local TCP socket. Every object carries a string `type` naming its
 * kind. Inbound messages are decoded into the typed shapes below; each
 * keeps the full decoded object in `raw` so fields this SDK does not model
 * remain reachable.
 */

import type { ErrorCodeValue } from './errors.js';
import type { JsonObject } from './json.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 12136;

/** Longest inbound line accepted before it is discarded. */
export const MAX_LINE_BYTES = 1024 * 1024; // 1 MB

/** Default cap on outbound bytes queued but not yet flushed. */
export const DEFAULT_MAX_SEND_BUFFER_BYTES = 1024 * 1024; // 1 MB

export const CONNECTOR_ID_PREFIX = 'pc_';

/** The controller truncates connector ids longer than this. */
export const CONNECTOR_ID_MAX_LENGTH = 200;

// ---------------------------------------------------------------------------
// Inbound kinds
// ---------------------------------------------------------------------------

export const INBOUND_KINDS = [
  'info',
  'action',
  'down',
  'up',
  'listChange',
  'connectorChange',
  'settings',
  'broadcast',
  'notificationOptionClicked',
  'closePlugin',
] as const;

export type InboundKind = (typeof INBOUND_KINDS)[number];

/**
 * Alternate wire names accepted for known kinds. `pair` is how some
 * controllers label the pairing acknowledgment; `on`/`off` are the
 * hold-start/hold-end names used by older ones.
 */
export const INBOUND_KIND_ALIASES: Readonly<Record<string, InboundKind>> = {
  pair: 'info',
  on: 'down',
  off: 'up',
};

// ---------------------------------------------------------------------------
// Inbound messages
// ---------------------------------------------------------------------------

/** One data-item id/value pair attached to an action or connector event. */
export interface ActionDataItem {
  id: string;
  value: string;
}

interface InboundBase {
  /** Plugin id the controller addressed, when the message carries one. */
  pluginId?: string;
  /** The complete decoded object. */
  raw: JsonObject;
}

/** Pairing acknowledgment. Carries current setting values. */
export interface InfoMessage extends InboundBase {
  type: 'info';
  sdkVersion?: number;
  controllerVersion?: string;
  pluginVersion?: number;
  settings: Record<string, string>;
}

export interface ActionMessage extends InboundBase {
  type: 'action' | 'down' | 'up';
  actionId: string;
  /** Per-instance id, present when the controller sends one. */
  instanceId?: string;
  data: ActionDataItem[];
}

export interface ListChangeMessage extends InboundBase {
  type: 'listChange';
  actionId: string;
  listId: string;
  instanceId?: string;
  value: string;
}

export interface ConnectorChangeMessage extends InboundBase {
  type: 'connectorChange';
  connectorId: string;
  /** Slider position, 0–100. */
  value: number;
  data: ActionDataItem[];
}

export interface SettingsMessage extends InboundBase {
  type: 'settings';
  values: Record<string, string>;
}

export interface BroadcastMessage extends InboundBase {
  type: 'broadcast';
  event: string;
  pageName?: string;
}

export interface NotificationOptionClickedMessage extends InboundBase {
  type: 'notificationOptionClicked';
  notificationId: string;
  optionId: string;
}

export interface ClosePluginMessage extends InboundBase {
  type: 'closePlugin';
  /** True when raised locally after the connection dropped. */
  synthetic?: boolean;
}

/** A message of a kind this SDK does not model. `type` is the wire value. */
export interface UnknownMessage extends InboundBase {
  type: string;
}

export interface InboundMessageMap {
  info: InfoMessage;
  action: ActionMessage;
  down: ActionMessage;
  up: ActionMessage;
  listChange: ListChangeMessage;
  connectorChange: ConnectorChangeMessage;
  settings: SettingsMessage;
  broadcast: BroadcastMessage;
  notificationOptionClicked: NotificationOptionClickedMessage;
  closePlugin: ClosePluginMessage;
  unknown: UnknownMessage;
}

export type DecodedKind = keyof InboundMessageMap;

export type InboundMessage = InboundMessageMap[DecodedKind];

/** A decoded message paired with the kind it dispatches under. */
export type DecodedMessage = {
  [K in DecodedKind]: { kind: K; message: InboundMessageMap[K] };
}[DecodedKind];

// ---------------------------------------------------------------------------
// Error events
// ---------------------------------------------------------------------------

/** Delivered to `error` handlers. Never sent on the wire. */
export interface ErrorEvent {
  type: 'error';
  code: ErrorCodeValue;
  message: string;
  error: Error;
  /** Kind of the message being handled when the failure happened. */
  messageType?: string;
  /** Offending inbound line, for decode failures. */
  line?: string;
}

/** Everything a handler can be registered for. */
export interface HandlerEventMap extends InboundMessageMap {
  any: InboundMessage;
  error: ErrorEvent;
}

export type HandlerKind = keyof HandlerEventMap;

// ---------------------------------------------------------------------------
// Outbound messages
// ---------------------------------------------------------------------------

export interface PairMessage {
  type: 'pair';
  id: string;
}

export interface StateUpdateMessage {
  type: 'stateUpdate';
  id: string;
  value: string;
}

export interface CreateStateMessage {
  type: 'createState';
  id: string;
  desc: string;
  defaultValue: string;
  parentGroup?: string;
}

export interface RemoveStateMessage {
  type: 'removeState';
  id: string;
}

export interface ChoiceUpdateMessage {
  type: 'choiceUpdate';
  id: string;
  value: string[];
  instanceId?: string;
}

export interface SettingUpdateMessage {
  type: 'settingUpdate';
  name: string;
  value: string;
}

export interface ConnectorUpdateMessage {
  type: 'connectorUpdate';
  connectorId: string;
  value: number;
}

export interface NotificationOption {
  id: string;
  title: string;
}

export interface ShowNotificationMessage {
  type: 'showNotification';
  notificationId: string;
  title: string;
  msg: string;
  options: NotificationOption[];
}

export interface UpdateActionDataMessage {
  type: 'updateActionData';
  instanceId: string;
  data: {
    id: string;
    minValue: number;
    maxValue: number;
    type: 'number';
  };
}

export type OutboundMessage =
  | PairMessage
  | StateUpdateMessage
  | CreateStateMessage
  | RemoveStateMessage
  | ChoiceUpdateMessage
  | SettingUpdateMessage
  | ConnectorUpdateMessage
  | ShowNotificationMessage
  | UpdateActionDataMessage;

/** Anything `send()` accepts: a modelled message or a passthrough object. */
export type SendableMessage = OutboundMessage | JsonObject;
