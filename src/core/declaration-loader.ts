/**
 * Loads plugin declarations from JSON or YAML files.
 *
 * The parsed document is shape-checked with a JSON Schema derived from the
 * rule table: every attribute the table knows must carry a value of the
 * right kind, and unknown keys are left for the generator to warn about.
 * Validation of the expanded descriptor happens later, in the generator.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: the CJS export object carries the constructor on `default`
const Ajv = _Ajv.default;

import type { PluginDeclaration } from '../types/declaration.js';
import { isRecord } from '../types/json.js';
import { SDK_RULES, type EntityKind } from '../types/entity-rules.js';
import { usageError } from './client-error.js';
import { valueSchema, type SchemaNode } from './descriptor-schema.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const ref = (name: string): SchemaNode => ({ $ref: `#/$defs/${name}` });
const mapOf = (node: SchemaNode): SchemaNode => ({ type: 'object', additionalProperties: node });

function declarationEntitySchema(kind: EntityKind): SchemaNode {
  const properties: Record<string, SchemaNode> = {
    id: { type: 'string', minLength: 1 },
    category: { type: 'string' },
    doc: { type: 'string' },
  };
  for (const rule of SDK_RULES[kind].values()) {
    if (rule.type !== 'list') properties[rule.name] = valueSchema(rule);
  }
  return { type: 'object', properties };
}

function buildDeclarationSchema(): SchemaNode {
  const data = { oneOf: [mapOf(ref('actionData')), { type: 'array', items: ref('actionData') }] };

  const action = declarationEntitySchema('action');
  const connector = declarationEntitySchema('connector');
  for (const node of [action, connector]) {
    const properties = node['properties'];
    if (isRecord(properties)) properties['data'] = data;
  }

  const category = declarationEntitySchema('category');
  const categoryProperties = category['properties'];
  if (isRecord(categoryProperties)) {
    categoryProperties['actions'] = mapOf(ref('action'));
    categoryProperties['connectors'] = mapOf(ref('connector'));
    categoryProperties['states'] = mapOf(ref('state'));
    categoryProperties['events'] = mapOf(ref('event'));
  }

  const info = declarationEntitySchema('plugin');
  info['required'] = ['id'];

  return {
    type: 'object',
    required: ['info', 'categories'],
    additionalProperties: false,
    properties: {
      info: ref('info'),
      categories: mapOf(ref('category')),
      settings: mapOf(ref('setting')),
      actions: mapOf(ref('action')),
      connectors: mapOf(ref('connector')),
      states: mapOf(ref('state')),
      events: mapOf(ref('event')),
    },
    $defs: {
      info,
      category,
      action,
      connector,
      actionData: declarationEntitySchema('actionData'),
      state: declarationEntitySchema('state'),
      event: declarationEntitySchema('event'),
      setting: declarationEntitySchema('setting'),
    },
  };
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDeclaration = ajv.compile<PluginDeclaration>(buildDeclarationSchema());

// ---------------------------------------------------------------------------
// Error formatting
// ---------------------------------------------------------------------------

function formatSchemaError(err: ErrorObject): string {
  const path = err.instancePath || '/';
  if (err.keyword === 'required') {
    return `${path}: required property "${String(err.params['missingProperty'])}" is missing`;
  }
  if (err.keyword === 'additionalProperties') {
    return `${path}: unknown section "${String(err.params['additionalProperty'])}"`;
  }
  return `${path}: ${err.message ?? 'invalid value'}`;
}

const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function findForbiddenKeys(value: unknown, path = ''): string[] {
  const found: string[] = [];
  if (Array.isArray(value)) {
    value.forEach((item, index) => found.push(...findForbiddenKeys(item, `${path}/${index}`)));
  } else if (isRecord(value)) {
    for (const key of Object.keys(value)) {
      if (FORBIDDEN_KEYS.has(key)) {
        found.push(`${path}/${key}: key "${key}" is not allowed`);
      } else {
        found.push(...findForbiddenKeys(value[key], `${path}/${key}`));
      }
    }
  }
  return found;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Shape-check a parsed declaration document.
 *
 * @throws ClientError (USAGE_ERROR) listing every problem found.
 */
export function parseDeclaration(raw: unknown): PluginDeclaration {
  const forbidden = findForbiddenKeys(raw);
  if (forbidden.length > 0) {
    throw usageError(`Invalid declaration: ${forbidden.join('; ')}`);
  }
  if (!validateDeclaration(raw)) {
    const problems = (validateDeclaration.errors ?? []).map(formatSchemaError);
    throw usageError(`Invalid declaration: ${problems.join('; ')}`);
  }
  return raw;
}

/** Parse declaration text. JSON is accepted as a subset of YAML. */
export function parseDeclarationText(text: string, source = 'declaration'): PluginDeclaration {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw usageError(`Invalid syntax in ${source}: ${reason}`);
  }
  return parseDeclaration(raw);
}

/** Read and shape-check a declaration file (`.json`, `.yaml` or `.yml`). */
export function loadDeclaration(filePath: string): PluginDeclaration {
  return parseDeclarationText(readFileSync(filePath, 'utf-8'), filePath);
}
