/**
 * DeclarationConverter: turns a descriptor back into a declaration.
 *
 * The reverse of {@link generateDescriptor}. Ids that follow the derivation
 * scheme are replaced by local names, attributes holding their rule-table
 * default are left out, an action prefix equal to its category name is
 * dropped, and `{$dataId$}` format tokens become `$[name]` or `$[n]`
 * placeholders. Generating from the result gives back the descriptor,
 * with two exceptions: attributes the descriptor leaves out come back with
 * their table default, and empty `actions`, `connectors`, `states`,
 * `events` and `settings` lists are not kept.
 */

import { isDeepStrictEqual } from 'node:util';
import { stringify as stringifyYaml } from 'yaml';

import type {
  ActionDataDescriptor,
  ActionDescriptor,
  CategoryDescriptor,
  ConnectorDescriptor,
  EventDescriptor,
  PluginDescriptor,
  StateDescriptor,
} from '../types/descriptor.js';
import type {
  ActionDeclaration,
  CategoryDeclaration,
  ConnectorDeclaration,
  DataDeclaration,
  EntityDeclaration,
  EventDeclaration,
  PluginDeclaration,
  PluginInfoDeclaration,
  SettingDeclaration,
  StateDeclaration,
} from '../types/declaration.js';
import { SDK_RULES, type EntityKind } from '../types/entity-rules.js';
import { ENTITY_ID_SEGMENT, type GroupKind } from './descriptor-generator.js';

const FORMAT_TOKEN = /\{\$([^$]+)\$\}/g;

/** Keys a JS object would reorder or refuse. */
const INTEGER_KEY = /^(0|[1-9]\d*)$/;
const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

const SKIP_ID: ReadonlySet<string> = new Set(['id']);

function lastSegment(id: string): string {
  return id.slice(id.lastIndexOf('.') + 1);
}

function isUsableKey(key: string): boolean {
  return key.length > 0 && !INTEGER_KEY.test(key) && !FORBIDDEN_KEYS.has(key);
}

/** Hands out unique record keys, falling back to `<fallback><n>`. */
class KeyPicker {
  private readonly used = new Set<string>();

  constructor(private readonly fallback: string) {}

  pick(preferred: string): string {
    let key = preferred;
    if (!isUsableKey(key) || this.used.has(key)) {
      let n = this.used.size + 1;
      while (this.used.has(`${this.fallback}${n}`)) n++;
      key = `${this.fallback}${n}`;
    }
    this.used.add(key);
    return key;
  }
}

// ---------------------------------------------------------------------------
// Converter
// ---------------------------------------------------------------------------

class Converter {
  constructor(
    private readonly pluginId: string,
    private readonly sdkVersion: number,
  ) {}

  /** Copy non-list attributes known to the table, minus those at their default. */
  copyAttributes(
    kind: EntityKind,
    entity: object,
    into: { [attribute: string]: unknown },
    skip: ReadonlySet<string>,
  ): void {
    const rules = SDK_RULES[kind];
    const attributes: Array<[string, unknown]> = Object.entries(entity);
    for (const [name, value] of attributes) {
      const rule = rules.get(name);
      if (value === undefined || skip.has(name) || rule === undefined || rule.type === 'list') {
        continue;
      }
      if (
        rule.default !== undefined &&
        rule.since <= this.sdkVersion &&
        isDeepStrictEqual(value, rule.default)
      ) {
        continue;
      }
      into[name] = structuredClone(value);
    }
  }

  category(category: CategoryDescriptor, categoryKey: string): CategoryDeclaration {
    const out: CategoryDeclaration = {};
    if (`${this.pluginId}.${categoryKey}` !== category.id) out.id = category.id;
    this.copyAttributes('category', category, out, SKIP_ID);

    const actions = this.group('action', category.actions, categoryKey, (action) =>
      this.action(action, category.name),
    );
    if (actions !== undefined) out.actions = actions;
    const connectors = this.group('connector', category.connectors, categoryKey, (connector) =>
      this.connector(connector),
    );
    if (connectors !== undefined) out.connectors = connectors;
    const states = this.group('state', category.states, categoryKey, (state) => this.state(state));
    if (states !== undefined) out.states = states;
    const events = this.group('event', category.events, categoryKey, (event) => this.event(event));
    if (events !== undefined) out.events = events;
    return out;
  }

  /** Key entities by local name; ids the generator would not derive stay explicit. */
  group<E extends { id: string }, D extends EntityDeclaration>(
    kind: GroupKind,
    entities: readonly E[] | undefined,
    categoryKey: string,
    build: (entity: E) => D,
  ): Record<string, D> | undefined {
    if (entities === undefined || entities.length === 0) return undefined;

    const prefix = `${this.pluginId}.${categoryKey}.${ENTITY_ID_SEGMENT[kind]}.`;
    const keys = new KeyPicker(kind);
    const out: Record<string, D> = {};
    for (const entity of entities) {
      const key = keys.pick(
        entity.id.startsWith(prefix) ? entity.id.slice(prefix.length) : lastSegment(entity.id),
      );
      const built = build(entity);
      out[key] = prefix + key === entity.id ? built : { id: entity.id, ...built };
    }
    return out;
  }

  action(action: ActionDescriptor, categoryName: string): ActionDeclaration {
    const out: ActionDeclaration = {};
    this.copyAttributes('action', action, out, new Set(['id', 'prefix', 'format']));
    if (action.prefix !== categoryName) out.prefix = action.prefix;
    this.dataAndFormat(action, out);
    return out;
  }

  connector(connector: ConnectorDescriptor): ConnectorDeclaration {
    const out: ConnectorDeclaration = {};
    this.copyAttributes('connector', connector, out, new Set(['id', 'format']));
    this.dataAndFormat(connector, out);
    return out;
  }

  state(state: StateDescriptor): StateDeclaration {
    const out: StateDeclaration = {};
    this.copyAttributes('state', state, out, SKIP_ID);
    return out;
  }

  event(event: EventDescriptor): EventDeclaration {
    const out: EventDeclaration = {};
    this.copyAttributes('event', event, out, SKIP_ID);
    return out;
  }

  dataAndFormat(
    entity: ActionDescriptor | ConnectorDescriptor,
    out: ActionDeclaration | ConnectorDeclaration,
  ): void {
    const items = entity.data ?? [];
    if (entity.format !== undefined) out.format = placeholderFormat(entity.format, items);
    if (entity.data === undefined) return;

    out.data =
      this.keyedData(entity.id, items) ??
      items.map((item, index) =>
        item.id === `${entity.id}.data.${index + 1}`
          ? this.dataItem(item)
          : { id: item.id, ...this.dataItem(item) },
      );
  }

  /** Data keyed by name when every id is `<ownerId>.data.<name>`. */
  keyedData(
    ownerId: string,
    items: readonly ActionDataDescriptor[],
  ): Record<string, DataDeclaration> | undefined {
    const prefix = `${ownerId}.data.`;
    const keyed = new Map<string, DataDeclaration>();
    for (const item of items) {
      const name = item.id.startsWith(prefix) ? item.id.slice(prefix.length) : '';
      if (!isUsableKey(name) || keyed.has(name)) return undefined;
      keyed.set(name, this.dataItem(item));
    }
    return keyed.size > 0 ? Object.fromEntries(keyed) : undefined;
  }

  dataItem(item: ActionDataDescriptor): DataDeclaration {
    const out: DataDeclaration = {};
    this.copyAttributes('actionData', item, out, SKIP_ID);
    return out;
  }
}

/**
 * `{$dataId$}` becomes `$[name]` when the last id segment names exactly
 * one item, `$[n]` otherwise. Tokens naming no data item are kept.
 */
function placeholderFormat(format: string, items: readonly ActionDataDescriptor[]): string {
  return format.replace(FORMAT_TOKEN, (token: string, id: string) => {
    const index = items.findIndex((item) => item.id === id);
    if (index === -1) return token;

    const name = lastSegment(id);
    const matches = items.filter((item) => item.id === name || lastSegment(item.id) === name);
    const byName = matches.length === 1 && !/^\d+$/.test(name) && !name.includes(']');
    return byName ? `$[${name}]` : `$[${index + 1}]`;
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Turn a valid descriptor into the declaration that generates it.
 * Every entity is nested in its category.
 */
export function descriptorToDeclaration(descriptor: PluginDescriptor): PluginDeclaration {
  const pluginId = descriptor.id;
  const converter = new Converter(pluginId, descriptor.sdk);

  const info: PluginInfoDeclaration = { id: pluginId };
  converter.copyAttributes('plugin', descriptor, info, SKIP_ID);
  info.sdk = descriptor.sdk;
  info.version = descriptor.version;

  const categories: Record<string, CategoryDeclaration> = {};
  const categoryKeys = new KeyPicker('category');
  for (const category of descriptor.categories) {
    const key = categoryKeys.pick(
      category.id.startsWith(`${pluginId}.`)
        ? category.id.slice(pluginId.length + 1)
        : lastSegment(category.id),
    );
    categories[key] = converter.category(category, key);
  }

  const declaration: PluginDeclaration = { info, categories };

  if (descriptor.settings !== undefined && descriptor.settings.length > 0) {
    const settings: Record<string, SettingDeclaration> = {};
    const settingKeys = new KeyPicker('setting');
    for (const setting of descriptor.settings) {
      const key = settingKeys.pick(setting.name);
      const out: SettingDeclaration = {};
      if (key !== setting.name) out.name = setting.name;
      converter.copyAttributes('setting', setting, out, new Set(['name']));
      settings[key] = out;
    }
    declaration.settings = settings;
  }

  return declaration;
}

/** Render a declaration as YAML. */
export function serializeDeclaration(declaration: PluginDeclaration): string {
  return stringifyYaml(declaration);
}
