/**
 * JSON Schema for plugin descriptors, derived from the rule table.
 *
 * One schema is built per SDK version: each entity kind becomes a `$defs`
 * entry listing exactly the attributes legal at that version, with
 * `additionalProperties: false` so too-new and unknown attributes are
 * reported. Compiled validators are cached per version and reused.
 */

import _Ajv, { type ValidateFunction } from 'ajv';
// ajv ESM interop: the CJS export object carries the constructor on `default`
const Ajv = _Ajv.default;

import { SDK_RULES, ENTITY_KINDS, type AttributeRule, type EntityKind } from '../types/entity-rules.js';
import { attributesFor, isSupportedSdkVersion } from './entity-model.js';

// ---------------------------------------------------------------------------
// Schema construction
// ---------------------------------------------------------------------------

export type SchemaNode = Record<string, unknown>;

function baseSchema(rule: AttributeRule): SchemaNode {
  switch (rule.type) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
    case 'object':
      return { type: rule.type };
    case 'scalar':
      return { type: ['string', 'number', 'boolean'] };
    case 'stringList':
      return { type: 'array', items: { type: 'string' } };
    case 'list':
      return { type: 'array', items: { $ref: `#/$defs/${rule.items ?? 'plugin'}` } };
  }
}

/** Schema for one attribute value: its value kind plus any choice list. */
export function valueSchema(rule: AttributeRule): SchemaNode {
  const node = baseSchema(rule);
  if (rule.choices !== undefined) {
    node['enum'] = [...rule.choices];
  }
  return node;
}

function entitySchema(kind: EntityKind, sdkVersion: number): SchemaNode {
  const rules = attributesFor(kind, sdkVersion);
  const properties: Record<string, SchemaNode> = {};
  for (const rule of rules) {
    properties[rule.name] = valueSchema(rule);
  }
  return {
    type: 'object',
    required: rules.filter((rule) => rule.required).map((rule) => rule.name),
    additionalProperties: false,
    properties,
  };
}

/** Build the descriptor JSON Schema for one SDK version. */
export function buildDescriptorSchema(sdkVersion: number): SchemaNode {
  const $defs: Record<string, SchemaNode> = {};
  for (const kind of ENTITY_KINDS) {
    $defs[kind] = entitySchema(kind, sdkVersion);
  }
  return {
    $id: `descriptor-sdk${sdkVersion}.json`,
    ...entitySchema('plugin', sdkVersion),
    $defs,
  };
}

// ---------------------------------------------------------------------------
// Compiled validator cache
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validators = new Map<number, ValidateFunction>();

/**
 * Compiled validator for one SDK version. Compiles on first use.
 *
 * @throws If `sdkVersion` is not a supported version.
 */
export function getDescriptorValidator(sdkVersion: number): ValidateFunction {
  const cached = validators.get(sdkVersion);
  if (cached !== undefined) return cached;

  if (!isSupportedSdkVersion(sdkVersion)) {
    throw new Error(`Unsupported SDK version: ${sdkVersion}`);
  }

  const validate = ajv.compile(buildDescriptorSchema(sdkVersion));
  validators.set(sdkVersion, validate);
  return validate;
}

/** Entity kind of the elements of a list attribute, if it is one. */
export function childKind(kind: EntityKind, attribute: string): EntityKind | undefined {
  const rule = SDK_RULES[kind].get(attribute);
  return rule?.type === 'list' ? rule.items : undefined;
}
