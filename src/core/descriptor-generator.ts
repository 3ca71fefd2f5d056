/**
 * DescriptorGenerator: expands a plugin declaration into a descriptor.
 *
 * The expanded document always goes through {@link assertValidDescriptor};
 * a declaration that does not produce a valid descriptor throws
 * DescriptorValidationError and nothing is returned.
 *
 * Id derivation (an explicit `id` always wins):
 *   category   `<pluginId>.<categoryKey>`
 *   action     `<pluginId>.<categoryKey>.act.<name>`
 *   connector  `<pluginId>.<categoryKey>.conn.<name>`
 *   state      `<pluginId>.<categoryKey>.state.<name>`
 *   event      `<pluginId>.<categoryKey>.event.<name>`
 *   data item  `<ownerId>.data.<name>` (or `.data.<n>` for listed items)
 */

import type { PluginDescriptor } from '../types/descriptor.js';
import type {
  CategoryDeclaration,
  DataDeclarations,
  EntityDeclaration,
  PluginDeclaration,
} from '../types/declaration.js';
import { isRecord } from '../types/json.js';
import { DEFAULT_SDK_VERSION, SDK_RULES, type EntityKind } from '../types/entity-rules.js';
import { usageError } from './client-error.js';
import { assertValidDescriptor } from './descriptor-validator.js';
import { isSupportedSdkVersion } from './entity-model.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  /** Target SDK version. Defaults to `info.sdk`, then the default version. */
  sdkVersion?: number;
  /** Omit attributes too new for the target version instead of failing validation. */
  skipInvalid?: boolean;
  logger?: Logger;
}

export interface GenerateResult {
  descriptor: PluginDescriptor;
  /** Non-fatal findings: unresolved format tokens, dropped attributes. */
  warnings: string[];
}

type EntityRecord = Record<string, unknown>;

/** Declaration keys that are not descriptor attributes. */
const DECLARATION_ONLY_KEYS = new Set(['category', 'doc', 'value']);

const FORMAT_PLACEHOLDER = /\$\[([^\]]+)\]/g;

/** Id segment between the category key and the local name. */
export const ENTITY_ID_SEGMENT: Record<'action' | 'connector' | 'state' | 'event', string> = {
  action: 'act',
  connector: 'conn',
  state: 'state',
  event: 'event',
};

export type GroupKind = keyof typeof ENTITY_ID_SEGMENT;

type GroupAttribute = 'actions' | 'connectors' | 'states' | 'events';

const CATEGORY_LISTS: ReadonlyArray<{ kind: GroupKind; attribute: GroupAttribute }> = [
  { kind: 'action', attribute: 'actions' },
  { kind: 'connector', attribute: 'connectors' },
  { kind: 'state', attribute: 'states' },
  { kind: 'event', attribute: 'events' },
];

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

class Generator {
  readonly warnings: string[] = [];

  constructor(
    private readonly sdkVersion: number,
    private readonly skipInvalid: boolean,
  ) {}

  /**
   * Copy the non-list attributes of `source` in table order, filling table
   * defaults. List attributes are left to the caller.
   */
  buildEntity(kind: EntityKind, source: EntityRecord, label: string): EntityRecord {
    const out: EntityRecord = {};
    const rules = SDK_RULES[kind];

    for (const key of Object.keys(source)) {
      if (!rules.has(key) && !DECLARATION_ONLY_KEYS.has(key)) {
        this.warnings.push(`${label}: ignoring unknown attribute "${key}"`);
      }
    }

    for (const rule of rules.values()) {
      if (rule.type === 'list') continue;

      const value = source[rule.name];
      if (rule.since > this.sdkVersion) {
        if (value !== undefined && this.skipInvalid) {
          this.warnings.push(
            `${label}: omitted "${rule.name}" (requires SDK version ${rule.since})`,
          );
          continue;
        }
        if (value === undefined) continue;
      }

      if (value !== undefined) {
        out[rule.name] = structuredClone(value);
      } else if (rule.default !== undefined) {
        out[rule.name] = structuredClone(rule.default);
      }
    }
    return out;
  }

  buildData(
    ownerId: string,
    data: DataDeclarations | undefined,
  ): Array<{ key: string; entity: EntityRecord }> {
    if (data === undefined) return [];
    const entries: Array<[string, EntityRecord]> = Array.isArray(data)
      ? data.map((item, index): [string, EntityRecord] => [String(index + 1), item])
      : Object.entries(data);

    return entries.map(([key, item]) => {
      const id = typeof item['id'] === 'string' ? item['id'] : `${ownerId}.data.${key}`;
      const entity = this.buildEntity('actionData', { ...item, id }, `data "${id}"`);
      return { key, entity };
    });
  }

  /** Replace `$[name]` and `$[n]` placeholders with `{$dataId$}` tokens. */
  resolveFormat(
    format: string,
    data: ReadonlyArray<{ key: string; entity: EntityRecord }>,
    label: string,
  ): string {
    return format.replace(FORMAT_PLACEHOLDER, (placeholder: string, token: string) => {
      const match = /^\d+$/.test(token)
        ? data[Number(token) - 1]
        : data.find(({ key, entity }) => {
            const id = entity['id'];
            if (key === token) return true;
            return typeof id === 'string' && (id === token || id.split('.').pop() === token);
          });
      const id = match?.entity['id'];
      if (typeof id !== 'string') {
        this.warnings.push(`${label}: format placeholder "${placeholder}" matches no data item`);
        return placeholder;
      }
      return `{$${id}$}`;
    });
  }

  buildGroupEntity(
    kind: GroupKind,
    name: string,
    decl: EntityDeclaration,
    pluginId: string,
    categoryKey: string,
    categoryName: string,
  ): EntityRecord {
    const id = decl.id ?? `${pluginId}.${categoryKey}.${ENTITY_ID_SEGMENT[kind]}.${name}`;
    const label = `${kind} "${id}"`;
    const source: EntityRecord = { ...decl, id };
    if (kind === 'action' && source['prefix'] === undefined) source['prefix'] = categoryName;

    const entity = this.buildEntity(kind, source, label);

    if (kind === 'action' || kind === 'connector') {
      const rawData = decl['data'];
      const data = this.buildData(id, isDataDeclarations(rawData) ? rawData : undefined);
      if (typeof entity['format'] === 'string') {
        entity['format'] = this.resolveFormat(entity['format'], data, label);
      }
      if (data.length > 0 || rawData !== undefined) {
        entity['data'] = data.map(({ entity: item }) => item);
      }
    }
    return entity;
  }
}

function isDataDeclarations(value: unknown): value is DataDeclarations {
  if (Array.isArray(value)) return value.every(isRecord);
  return isRecord(value) && Object.values(value).every(isRecord);
}

/** Entities for one category: nested ones first, then top-level ones placed there. */
function entitiesFor(
  declaration: PluginDeclaration,
  categoryKey: string,
  category: CategoryDeclaration,
  attribute: GroupAttribute,
): Array<[string, EntityDeclaration]> {
  const nested: Array<[string, EntityDeclaration]> = Object.entries(category[attribute] ?? {});
  const shared: Array<[string, EntityDeclaration]> = Object.entries(declaration[attribute] ?? {});
  return [
    ...nested,
    ...shared.filter(([, decl]) => decl.category === undefined || decl.category === categoryKey),
  ];
}

function checkCategoryNames(declaration: PluginDeclaration): void {
  for (const { attribute } of CATEGORY_LISTS) {
    for (const [name, decl] of Object.entries(declaration[attribute] ?? {})) {
      if (decl.category !== undefined && !(decl.category in declaration.categories)) {
        throw usageError(
          `${attribute} entry "${name}" names unknown category "${decl.category}"`,
          'category',
        );
      }
    }
  }
}

/**
 * Expand a declaration into a validated descriptor.
 *
 * @throws ClientError (USAGE_ERROR) for an unusable declaration: missing
 *   plugin id, unsupported SDK version, unknown category reference.
 * @throws DescriptorValidationError when the expanded document is invalid.
 */
export function generateDescriptor(
  declaration: PluginDeclaration,
  options: GenerateOptions = {},
): GenerateResult {
  const logger = options.logger ?? createLogger('descriptor-generator');
  const { info } = declaration;

  const sdkVersion = options.sdkVersion ?? info.sdk ?? DEFAULT_SDK_VERSION;
  if (!isSupportedSdkVersion(sdkVersion)) {
    throw usageError(`Unsupported SDK version: ${sdkVersion}`, 'sdk');
  }
  if (typeof info.id !== 'string' || info.id.length === 0) {
    throw usageError('Declaration info.id must be a non-empty string', 'id');
  }
  checkCategoryNames(declaration);

  const gen = new Generator(sdkVersion, options.skipInvalid ?? false);
  const pluginId = info.id;

  const doc: EntityRecord = gen.buildEntity('plugin', { ...info, sdk: sdkVersion }, 'plugin');

  const categories: EntityRecord[] = [];
  for (const [categoryKey, category] of Object.entries(declaration.categories)) {
    const categoryId = category.id ?? `${pluginId}.${categoryKey}`;
    const categoryName = category.name ?? info.name ?? categoryKey;
    const entity = gen.buildEntity(
      'category',
      { ...category, id: categoryId, name: categoryName },
      `category "${categoryId}"`,
    );

    for (const { kind, attribute } of CATEGORY_LISTS) {
      const entries = entitiesFor(declaration, categoryKey, category, attribute);
      if (entries.length === 0) continue;
      if (kind === 'connector' && sdkVersion < 4) {
        gen.warnings.push(`category "${categoryId}": connectors require SDK version 4, omitted`);
        continue;
      }
      entity[attribute] = entries.map(([name, decl]) =>
        gen.buildGroupEntity(kind, name, decl, pluginId, categoryKey, categoryName),
      );
    }
    categories.push(entity);
  }
  doc['categories'] = categories;

  const settings = Object.entries(declaration.settings ?? {});
  if (settings.length > 0) {
    if (sdkVersion < 3) {
      gen.warnings.push('plugin: settings require SDK version 3, omitted');
    } else {
      doc['settings'] = settings.map(([key, setting]) => {
        const name = setting.name ?? key;
        return gen.buildEntity('setting', { ...setting, name }, `setting "${name}"`);
      });
    }
  }

  for (const warning of gen.warnings) {
    logger.warn(warning, { plugin: pluginId });
  }

  assertValidDescriptor(doc, { sdkVersion });
  logger.debug('descriptor generated', {
    plugin: pluginId,
    sdk: sdkVersion,
    categories: categories.length,
  });

  return { descriptor: doc, warnings: gen.warnings };
}

/** Render a descriptor as JSON text with a trailing newline. */
export function serializeDescriptor(descriptor: PluginDescriptor, indent = 2): string {
  return JSON.stringify(descriptor, null, indent) + '\n';
}
