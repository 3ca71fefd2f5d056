/**
 * DescriptorValidator: checks a descriptor document against the rule table.
 *
 * Validation is total: every violation in the document is collected in one
 * pass. Two stages run over the same tree:
 *   1. Structural (ajv + the per-version JSON Schema): required attributes,
 *      too-new and unknown attributes, value types and choice lists.
 *   2. Semantic (tree walk): type-specific value domains, global id
 *      uniqueness, and cross references (format tokens, event states).
 */

import type { ErrorObject } from 'ajv';
import type { PluginDescriptor, Violation, ViolationRule } from '../types/descriptor.js';
import { isRecord } from '../types/json.js';
import type { EntityKind } from '../types/entity-rules.js';
import { DescriptorValidationError, usageError } from './client-error.js';
import { childKind, getDescriptorValidator } from './descriptor-schema.js';
import {
  checkValueDomain,
  isSupportedSdkVersion,
  lookupAttribute,
  resolveSdkVersion,
} from './entity-model.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ValidateOptions {
  /** Validate against this SDK version instead of the document's `sdk`. */
  sdkVersion?: number;
}

export interface ValidationReport {
  valid: boolean;
  /** SDK version the document was checked against. */
  sdkVersion: number;
  violations: Violation[];
}

type PathSegment = string | number;

/** Matches `{$dataId$}` placeholders in action and connector formats. */
const FORMAT_TOKEN = /\{\$([^$]+)\$\}/g;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Render path segments as `categories[0].actions[1]`. */
export function formatPath(segments: readonly PathSegment[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

/** `categories[0].actions[1].name`, or `(root)`. */
export function violationLocation(violation: Violation): string {
  const location = [violation.path, violation.attribute].filter((part) => part.length > 0).join('.');
  return location.length > 0 ? location : '(root)';
}

/** One-line rendering: `categories[0].actions[1].name: message`. */
export function formatViolation(violation: Violation): string {
  return `${violationLocation(violation)}: ${violation.message}`;
}

interface Located {
  kind: EntityKind;
  entitySegments: PathSegment[];
  /** First segment below the entity, if the pointer goes below it. */
  attribute: string;
  /** Segments below the attribute (list indices). */
  rest: string[];
}

function decodePointer(pointer: string): string[] {
  if (pointer.length === 0) return [];
  return pointer
    .slice(1)
    .split('/')
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

/** Map a JSON pointer onto the entity it falls inside. */
function locate(pointer: string): Located {
  const segments = decodePointer(pointer);
  let kind: EntityKind = 'plugin';
  const entitySegments: PathSegment[] = [];
  let i = 0;

  while (i < segments.length) {
    const name = segments[i] ?? '';
    const index = segments[i + 1];
    const nested = childKind(kind, name);
    if (nested === undefined || index === undefined || !/^\d+$/.test(index)) break;
    kind = nested;
    entitySegments.push(name, Number(index));
    i += 2;
  }

  return {
    kind,
    entitySegments,
    attribute: segments[i] ?? '',
    rest: segments.slice(i + 1),
  };
}

function resolveNode(doc: unknown, segments: readonly PathSegment[]): unknown {
  let node = doc;
  for (const segment of segments) {
    if (typeof segment === 'number') {
      node = Array.isArray(node) ? node[segment] : undefined;
    } else {
      node = isRecord(node) ? node[segment] : undefined;
    }
  }
  return node;
}

function entityIdOf(entity: unknown): string | undefined {
  if (!isRecord(entity)) return undefined;
  if (typeof entity['id'] === 'string') return entity['id'];
  if (typeof entity['name'] === 'string') return entity['name'];
  return undefined;
}

function makeViolation(
  doc: unknown,
  segments: readonly PathSegment[],
  attribute: string,
  rule: ViolationRule,
  message: string,
): Violation {
  const violation: Violation = { path: formatPath(segments), attribute, rule, message };
  const entityId = entityIdOf(resolveNode(doc, segments));
  if (entityId !== undefined) violation.entityId = entityId;
  return violation;
}

// ---------------------------------------------------------------------------
// Structural stage
// ---------------------------------------------------------------------------

function readParam(err: ErrorObject, key: string): string | undefined {
  const value: unknown = err.params[key];
  return typeof value === 'string' ? value : undefined;
}

function mapSchemaError(doc: unknown, err: ErrorObject, sdkVersion: number): Violation {
  const where = locate(err.instancePath);

  if (err.keyword === 'required') {
    const missing = readParam(err, 'missingProperty') ?? '';
    return makeViolation(
      doc,
      where.entitySegments,
      missing,
      'required',
      `missing required attribute "${missing}"`,
    );
  }

  if (err.keyword === 'additionalProperties') {
    const extra = readParam(err, 'additionalProperty') ?? '';
    const lookup = lookupAttribute(where.kind, extra, sdkVersion);
    if (lookup.status === 'too-new') {
      return makeViolation(
        doc,
        where.entitySegments,
        extra,
        'version',
        `attribute "${extra}" requires SDK version ${lookup.since} or later (descriptor targets ${sdkVersion})`,
      );
    }
    return makeViolation(doc, where.entitySegments, extra, 'unknown-attribute', `unknown attribute "${extra}"`);
  }

  if (where.attribute.length === 0) {
    return makeViolation(doc, where.entitySegments, '', 'type', `${where.kind} entry ${err.message ?? 'is invalid'}`);
  }

  const label = where.attribute + where.rest.map((segment) => `[${segment}]`).join('');

  if (err.keyword === 'enum') {
    const lookup = lookupAttribute(where.kind, where.attribute, sdkVersion);
    const choices = lookup.status === 'unknown' ? [] : (lookup.rule.choices ?? []);
    return makeViolation(
      doc,
      where.entitySegments,
      where.attribute,
      'choice',
      `"${label}" must be one of: ${choices.join(', ')}`,
    );
  }

  return makeViolation(
    doc,
    where.entitySegments,
    where.attribute,
    'type',
    `"${label}" ${err.message ?? 'has an invalid value'}`,
  );
}

// ---------------------------------------------------------------------------
// Semantic stage
// ---------------------------------------------------------------------------

type EntityVisitor = (
  kind: EntityKind,
  entity: Record<string, unknown>,
  segments: readonly PathSegment[],
) => void;

/** Depth-first walk over every entity, including list attributes the version forbids. */
function walkEntities(
  entity: Record<string, unknown>,
  kind: EntityKind,
  segments: readonly PathSegment[],
  visit: EntityVisitor,
): void {
  visit(kind, entity, segments);
  for (const [attribute, value] of Object.entries(entity)) {
    const nested = childKind(kind, attribute);
    if (nested === undefined || !Array.isArray(value)) continue;
    value.forEach((item: unknown, index) => {
      if (isRecord(item)) walkEntities(item, nested, [...segments, attribute, index], visit);
    });
  }
}

function dataIdsOf(entity: Record<string, unknown>): Set<string> {
  const ids = new Set<string>();
  const data = entity['data'];
  if (!Array.isArray(data)) return ids;
  for (const item of data) {
    if (isRecord(item) && typeof item['id'] === 'string') ids.add(item['id']);
  }
  return ids;
}

function semanticViolations(doc: Record<string, unknown>, skip: ReadonlySet<string>): Violation[] {
  const violations: Violation[] = [];
  const seenIds = new Map<string, string>();
  const stateIds = new Set<string>();
  const eventRefs: Array<{ segments: readonly PathSegment[]; stateId: string }> = [];

  walkEntities(doc, 'plugin', [], (kind, entity, segments) => {
    const path = formatPath(segments);

    // Value domains; skip attributes the structural stage already flagged
    for (const issue of checkValueDomain(kind, entity)) {
      if (skip.has(`${path}#${issue.attribute}`)) continue;
      violations.push(makeViolation(doc, segments, issue.attribute, issue.rule, issue.message));
    }

    // Global identifier uniqueness
    const idAttribute = kind === 'setting' ? 'name' : 'id';
    const id = entity[idAttribute];
    if (typeof id === 'string') {
      const first = seenIds.get(id);
      if (first !== undefined) {
        violations.push(
          makeViolation(
            doc,
            segments,
            idAttribute,
            'duplicate-id',
            `identifier "${id}" is already used at ${first.length > 0 ? first : '(root)'}`,
          ),
        );
      } else {
        seenIds.set(id, path);
      }
    }

    // Format tokens must name the entity's own data items
    if ((kind === 'action' || kind === 'connector') && typeof entity['format'] === 'string') {
      const dataIds = dataIdsOf(entity);
      for (const match of entity['format'].matchAll(FORMAT_TOKEN)) {
        const ref = match[1] ?? '';
        if (!dataIds.has(ref)) {
          violations.push(
            makeViolation(
              doc,
              segments,
              'format',
              'unresolved-reference',
              `format references data item "${ref}" which this ${kind} does not declare`,
            ),
          );
        }
      }
    }

    if (kind === 'state' && typeof entity['id'] === 'string') {
      stateIds.add(entity['id']);
    }
    if (kind === 'event' && typeof entity['valueStateId'] === 'string') {
      eventRefs.push({ segments, stateId: entity['valueStateId'] });
    }
  });

  for (const ref of eventRefs) {
    if (!stateIds.has(ref.stateId)) {
      violations.push(
        makeViolation(
          doc,
          ref.segments,
          'valueStateId',
          'unresolved-reference',
          `valueStateId "${ref.stateId}" does not name a declared state`,
        ),
      );
    }
  }

  return violations;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a descriptor document.
 *
 * The document is checked against `options.sdkVersion` when given,
 * otherwise against its own `sdk` attribute (falling back to the default
 * version when that is missing or unsupported).
 */
export function validateDescriptor(doc: unknown, options: ValidateOptions = {}): ValidationReport {
  if (options.sdkVersion !== undefined && !isSupportedSdkVersion(options.sdkVersion)) {
    throw usageError(`Unsupported SDK version: ${options.sdkVersion}`, 'sdkVersion');
  }

  const sdkVersion =
    options.sdkVersion ?? resolveSdkVersion(isRecord(doc) ? doc['sdk'] : undefined);

  if (!isRecord(doc)) {
    return {
      valid: false,
      sdkVersion,
      violations: [
        { path: '', attribute: '', rule: 'type', message: 'descriptor must be a JSON object' },
      ],
    };
  }

  const validate = getDescriptorValidator(sdkVersion);
  validate(doc);
  const structural = (validate.errors ?? []).map((err) => mapSchemaError(doc, err, sdkVersion));

  const flagged = new Set(structural.map((v) => `${v.path}#${v.attribute}`));
  const violations = [...structural, ...semanticViolations(doc, flagged)];

  return { valid: violations.length === 0, sdkVersion, violations };
}

/** Parse descriptor text and validate it. Bad JSON is a single `syntax` violation. */
export function validateDescriptorText(text: string, options: ValidateOptions = {}): ValidationReport {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return {
      valid: false,
      sdkVersion: options.sdkVersion ?? resolveSdkVersion(undefined),
      violations: [{ path: '', attribute: '', rule: 'syntax', message: `Invalid JSON syntax: ${detail}` }],
    };
  }
  return validateDescriptor(doc, options);
}

/**
 * Throw {@link DescriptorValidationError} unless `doc` is a valid descriptor.
 * Narrows `doc` to {@link PluginDescriptor} on return.
 */
export function assertValidDescriptor(
  doc: unknown,
  options: ValidateOptions = {},
): asserts doc is PluginDescriptor {
  const report = validateDescriptor(doc, options);
  if (!report.valid) {
    throw new DescriptorValidationError(report.violations);
  }
}
