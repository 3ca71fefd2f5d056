/**
 * Decodes inbound protocol lines into typed messages.
 *
 * Every line must be a JSON object with a string `type`. Known kinds (and
 * their aliases) are decoded into the shapes in types/protocol.ts; any
 * other kind becomes an `unknown` message that still carries the whole
 * object. Failures throw a PROTOCOL_ERROR ClientError naming the problem;
 * the connection loop reports them and moves on to the next line.
 */

import { ErrorCode } from '../types/errors.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import {
  INBOUND_KINDS,
  INBOUND_KIND_ALIASES,
  type ActionDataItem,
  type DecodedMessage,
  type InboundKind,
} from '../types/protocol.js';
import { ClientError } from './client-error.js';

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function protocolError(message: string, cause?: unknown): ClientError {
  return new ClientError({ code: ErrorCode.PROTOCOL_ERROR, message, cause });
}

/** A string field; numbers and booleans are stringified. */
function optionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function requiredString(obj: JsonObject, key: string, kind: string): string {
  const value = optionalString(obj, key);
  if (value === undefined) {
    throw protocolError(`${kind} message has no "${key}" field`);
  }
  return value;
}

function optionalNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function scalarText(value: JsonValue | undefined): string | undefined {
  if (value === null || value === undefined || typeof value === 'object') return undefined;
  return String(value);
}

/** `data: [{ id, value }, ...]`, dropping entries without an id. */
function readDataItems(obj: JsonObject): ActionDataItem[] {
  const data = obj['data'];
  if (!Array.isArray(data)) return [];
  const items: ActionDataItem[] = [];
  for (const entry of data) {
    if (!isJsonObject(entry)) continue;
    const id = optionalString(entry, 'id');
    if (id === undefined) continue;
    items.push({ id, value: scalarText(entry['value']) ?? '' });
  }
  return items;
}

/**
 * Setting values arrive as a list of single-entry objects
 * (`[{ "Name": "value" }, ...]`); a plain object is accepted too.
 */
function readSettingValues(value: JsonValue | undefined): Record<string, string> {
  const entries = Array.isArray(value) ? value : value === undefined ? [] : [value];
  const result: Record<string, string> = {};
  for (const entry of entries) {
    if (!isJsonObject(entry)) continue;
    for (const [name, raw] of Object.entries(entry)) {
      const text = scalarText(raw);
      if (text !== undefined) result[name] = text;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Kind resolution
// ---------------------------------------------------------------------------

const KNOWN_KINDS: ReadonlySet<string> = new Set(INBOUND_KINDS);

function isInboundKind(value: string): value is InboundKind {
  return KNOWN_KINDS.has(value);
}

/** Canonical kind for a wire `type`, or undefined when it is not modelled. */
export function resolveKind(type: string): InboundKind | undefined {
  if (Object.hasOwn(INBOUND_KIND_ALIASES, type)) return INBOUND_KIND_ALIASES[type];
  return isInboundKind(type) ? type : undefined;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeKnown(kind: InboundKind, raw: JsonObject, pluginId?: string): DecodedMessage {
  const base = pluginId === undefined ? { raw } : { raw, pluginId };

  switch (kind) {
    case 'info': {
      const message = {
        ...base,
        type: kind,
        settings: readSettingValues(raw['settings']),
        sdkVersion: optionalNumber(raw, 'sdkVersion'),
        controllerVersion: optionalString(raw, 'tpVersionString'),
        pluginVersion: optionalNumber(raw, 'pluginVersion'),
      };
      return { kind, message };
    }
    case 'action':
    case 'down':
    case 'up': {
      const message = {
        ...base,
        type: kind,
        actionId: requiredString(raw, 'actionId', kind),
        instanceId: optionalString(raw, 'instanceId'),
        data: readDataItems(raw),
      };
      return { kind, message };
    }
    case 'listChange':
      return {
        kind,
        message: {
          ...base,
          type: kind,
          actionId: requiredString(raw, 'actionId', kind),
          listId: requiredString(raw, 'listId', kind),
          instanceId: optionalString(raw, 'instanceId'),
          value: optionalString(raw, 'value') ?? '',
        },
      };
    case 'connectorChange': {
      const value = optionalNumber(raw, 'value');
      if (value === undefined) {
        throw protocolError('connectorChange message has no numeric "value" field');
      }
      return {
        kind,
        message: {
          ...base,
          type: kind,
          connectorId: requiredString(raw, 'connectorId', kind),
          value,
          data: readDataItems(raw),
        },
      };
    }
    case 'settings':
      return { kind, message: { ...base, type: kind, values: readSettingValues(raw['values']) } };
    case 'broadcast':
      return {
        kind,
        message: {
          ...base,
          type: kind,
          event: optionalString(raw, 'event') ?? '',
          pageName: optionalString(raw, 'pageName'),
        },
      };
    case 'notificationOptionClicked':
      return {
        kind,
        message: {
          ...base,
          type: kind,
          notificationId: requiredString(raw, 'notificationId', kind),
          optionId: requiredString(raw, 'optionId', kind),
        },
      };
    case 'closePlugin':
      return { kind, message: { ...base, type: kind } };
  }
}

/**
 * Decode one protocol line.
 *
 * @throws ClientError (PROTOCOL_ERROR) for malformed JSON, a non-object,
 *   a missing `type`, or a known kind missing a field it cannot do without.
 */
export function decodeMessage(line: string): DecodedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw protocolError(`Malformed JSON: ${reason}`, err);
  }

  if (!isJsonObject(parsed)) {
    throw protocolError('Message is not a JSON object');
  }
  const type = parsed['type'];
  if (typeof type !== 'string' || type.length === 0) {
    throw protocolError('Message has no string "type" field');
  }

  const pluginId = optionalString(parsed, 'pluginId');
  const kind = resolveKind(type);
  if (kind === undefined) {
    const message = pluginId === undefined ? { type, raw: parsed } : { type, raw: parsed, pluginId };
    return { kind: 'unknown', message };
  }
  return decodeKnown(kind, parsed, pluginId);
}

/**
 * Value of the data item `id` in an action's data list, or the first
 * value present when no id is given.
 */
export function findDataValue(data: readonly ActionDataItem[], id?: string): string | undefined {
  if (data.length === 0) return undefined;
  if (id === undefined || id === '') return data[0]?.value;
  return data.find((item) => item.id === id)?.value;
}
