/**
 * Versioned attribute rule table for plugin descriptors.
 *
 * The table lives in `sdk-rules.json` and is parsed and frozen once when
 * this module loads. Each entity kind maps attribute names (in emission
 * order) to an {@link AttributeRule}; an attribute is legal for a
 * descriptor only when `rule.since <= descriptor.sdk`.
 */

import rawRules from './sdk-rules.json' with { type: 'json' };
import { isRecord } from './json.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const ENTITY_KINDS = [
  'plugin',
  'setting',
  'category',
  'action',
  'actionData',
  'connector',
  'state',
  'event',
] as const;

/** Every kind of node that can appear in a descriptor tree. */
export type EntityKind = (typeof ENTITY_KINDS)[number];

export const VALUE_KINDS = [
  'string',
  'integer',
  'number',
  'boolean',
  'scalar',
  'object',
  'stringList',
  'list',
] as const;

/**
 * Value domain of an attribute.
 *
 * - `scalar`: string, number or boolean (action data defaults)
 * - `list`: array of nested entities of kind `items`
 */
export type ValueKind = (typeof VALUE_KINDS)[number];

export type RuleDefault = string | number | boolean | readonly string[];

export interface AttributeRule {
  readonly name: string;
  /** Minimum SDK version at which the attribute is legal. */
  readonly since: number;
  readonly required: boolean;
  readonly type: ValueKind;
  /** Value the generator fills in when a declaration omits the attribute. */
  readonly default?: RuleDefault;
  readonly choices?: readonly (string | number)[];
  /** Entity kind of the elements when `type` is `list`. */
  readonly items?: EntityKind;
}

export type RuleTable = Readonly<Record<EntityKind, ReadonlyMap<string, AttributeRule>>>;

export interface SdkRuleSet {
  defaultSdkVersion: number;
  sdkVersions: readonly number[];
  entities: RuleTable;
}

export function isEntityKind(value: unknown): value is EntityKind {
  return typeof value === 'string' && ENTITY_KINDS.some((kind) => kind === value);
}

function isValueKind(value: unknown): value is ValueKind {
  return typeof value === 'string' && VALUE_KINDS.some((kind) => kind === value);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function parseDefault(where: string, value: unknown): RuleDefault {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') throw new Error(`${where}: list defaults must hold strings`);
      items.push(item);
    }
    return Object.freeze(items);
  }
  throw new Error(`${where}: unsupported default value`);
}

function parseRule(kind: string, name: string, raw: unknown): AttributeRule {
  const where = `Invalid rule ${kind}.${name}`;
  if (!isRecord(raw)) throw new Error(`${where}: must be an object`);

  const { since, required, type } = raw;
  if (typeof since !== 'number' || !Number.isInteger(since) || since < 1) {
    throw new Error(`${where}: "since" must be a positive integer`);
  }
  if (typeof required !== 'boolean') {
    throw new Error(`${where}: "required" must be a boolean`);
  }
  if (!isValueKind(type)) {
    throw new Error(`${where}: unknown value type "${String(type)}"`);
  }

  const rule: {
    name: string;
    since: number;
    required: boolean;
    type: ValueKind;
    default?: RuleDefault;
    choices?: readonly (string | number)[];
    items?: EntityKind;
  } = { name, since, required, type };

  if (raw['default'] !== undefined) {
    rule.default = parseDefault(where, raw['default']);
  }

  if (raw['choices'] !== undefined) {
    const choices = raw['choices'];
    if (
      !Array.isArray(choices) ||
      choices.length === 0 ||
      !choices.every((c) => typeof c === 'string' || typeof c === 'number')
    ) {
      throw new Error(`${where}: "choices" must be a non-empty list of strings or numbers`);
    }
    const parsed: (string | number)[] = [];
    for (const choice of choices) {
      if (typeof choice === 'string' || typeof choice === 'number') parsed.push(choice);
    }
    rule.choices = Object.freeze(parsed);
  }

  const items = raw['items'];
  if (type === 'list') {
    if (!isEntityKind(items)) {
      throw new Error(`${where}: list rules must name an entity kind in "items"`);
    }
    rule.items = items;
  } else if (items !== undefined) {
    throw new Error(`${where}: "items" is only valid on list rules`);
  }

  return Object.freeze(rule);
}

/**
 * Parse and freeze a raw rule table. Throws on any malformed entry so a
 * broken table is caught at load time rather than during validation.
 */
export function parseRuleTable(raw: unknown): SdkRuleSet {
  if (!isRecord(raw)) throw new Error('Rule table must be an object');

  const versions = raw['sdkVersions'];
  if (
    !Array.isArray(versions) ||
    versions.length === 0 ||
    !versions.every((v) => typeof v === 'number' && Number.isInteger(v))
  ) {
    throw new Error('Rule table "sdkVersions" must be a non-empty list of integers');
  }
  const sdkVersions: number[] = [];
  for (const v of versions) {
    if (typeof v === 'number') sdkVersions.push(v);
  }

  const defaultSdkVersion = raw['defaultSdkVersion'];
  if (typeof defaultSdkVersion !== 'number' || !sdkVersions.includes(defaultSdkVersion)) {
    throw new Error('Rule table "defaultSdkVersion" must be one of "sdkVersions"');
  }

  const rawEntities = raw['entities'];
  if (!isRecord(rawEntities)) throw new Error('Rule table "entities" must be an object');

  for (const key of Object.keys(rawEntities)) {
    if (!isEntityKind(key)) throw new Error(`Rule table names unknown entity kind "${key}"`);
  }

  const build = (kind: EntityKind): ReadonlyMap<string, AttributeRule> => {
    const attributes = rawEntities[kind];
    if (!isRecord(attributes)) throw new Error(`Rule table is missing entity kind "${kind}"`);
    const rules = new Map<string, AttributeRule>();
    for (const [name, rule] of Object.entries(attributes)) {
      rules.set(name, parseRule(kind, name, rule));
    }
    return rules;
  };

  const entities: RuleTable = Object.freeze({
    plugin: build('plugin'),
    setting: build('setting'),
    category: build('category'),
    action: build('action'),
    actionData: build('actionData'),
    connector: build('connector'),
    state: build('state'),
    event: build('event'),
  });

  return {
    defaultSdkVersion,
    sdkVersions: Object.freeze(sdkVersions),
    entities,
  };
}

// ---------------------------------------------------------------------------
// Loaded table
// ---------------------------------------------------------------------------

const RULE_SET = parseRuleTable(rawRules);

export const SDK_RULES: RuleTable = RULE_SET.entities;

/** SDK version assumed when a descriptor does not declare a supported one. */
export const DEFAULT_SDK_VERSION: number = RULE_SET.defaultSdkVersion;

export const SDK_VERSIONS: readonly number[] = RULE_SET.sdkVersions;
