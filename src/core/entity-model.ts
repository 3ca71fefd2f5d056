/**
 * EntityModel: lookups over the versioned attribute rule table.
 *
 * Pure functions, no I/O. Shared by the descriptor validator, the
 * descriptor generator and the runtime. Fails closed: an unknown entity
 * kind or attribute name is never treated as allowed.
 */

import {
  DEFAULT_SDK_VERSION,
  SDK_RULES,
  SDK_VERSIONS,
  isEntityKind,
  type AttributeRule,
  type EntityKind,
} from '../types/entity-rules.js';

// ---------------------------------------------------------------------------
// Attribute lookup
// ---------------------------------------------------------------------------

export type AttributeLookup =
  | { status: 'allowed'; rule: AttributeRule }
  | { status: 'too-new'; rule: AttributeRule; since: number }
  | { status: 'unknown' };

/** Classify one attribute of one entity kind at a given SDK version. */
export function lookupAttribute(
  kind: string,
  attribute: string,
  sdkVersion: number,
): AttributeLookup {
  if (!isEntityKind(kind)) return { status: 'unknown' };

  const rule = SDK_RULES[kind].get(attribute);
  if (rule === undefined) return { status: 'unknown' };
  if (rule.since > sdkVersion) return { status: 'too-new', rule, since: rule.since };
  return { status: 'allowed', rule };
}

/** Rules legal for `kind` at `sdkVersion`, in table order. */
export function attributesFor(kind: EntityKind, sdkVersion: number): AttributeRule[] {
  return [...SDK_RULES[kind].values()].filter((rule) => rule.since <= sdkVersion);
}

export function requiredAttributes(kind: EntityKind, sdkVersion: number): AttributeRule[] {
  return attributesFor(kind, sdkVersion).filter((rule) => rule.required);
}

// ---------------------------------------------------------------------------
// SDK versions
// ---------------------------------------------------------------------------

export function isSupportedSdkVersion(value: unknown): value is number {
  return typeof value === 'number' && SDK_VERSIONS.includes(value);
}

/** The declared version when supported, otherwise the default. */
export function resolveSdkVersion(declared: unknown): number {
  return isSupportedSdkVersion(declared) ? declared : DEFAULT_SDK_VERSION;
}

// ---------------------------------------------------------------------------
// Value domains
// ---------------------------------------------------------------------------

export interface DomainIssue {
  attribute: string;
  rule: 'domain' | 'choice';
  message: string;
}

const COLOR_PATTERN = /^#[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/;

/** A finite number, or a string that parses as one. */
export function toNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim().length > 0) {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function checkNumberDomain(entity: Record<string, unknown>, defaultRequired: boolean): DomainIssue[] {
  const issues: DomainIssue[] = [];
  const min = toNumeric(entity['minValue']);
  const max = toNumeric(entity['maxValue']);

  if (min !== undefined && max !== undefined && min > max) {
    issues.push({
      attribute: 'minValue',
      rule: 'domain',
      message: `minValue ${min} is greater than maxValue ${max}`,
    });
  }

  const raw = entity['default'];
  if (raw === undefined && !defaultRequired) return issues;

  const value = toNumeric(raw);
  if (value === undefined) {
    issues.push({
      attribute: 'default',
      rule: 'domain',
      message: `number type requires a numeric default, got ${JSON.stringify(raw) ?? 'nothing'}`,
    });
    return issues;
  }
  if (min !== undefined && value < min) {
    issues.push({ attribute: 'default', rule: 'domain', message: `default ${value} is below minValue ${min}` });
  }
  if (max !== undefined && value > max) {
    issues.push({ attribute: 'default', rule: 'domain', message: `default ${value} is above maxValue ${max}` });
  }
  return issues;
}

function checkChoiceDomain(entity: Record<string, unknown>): DomainIssue[] {
  const choices = entity['valueChoices'];
  if (!Array.isArray(choices) || choices.length === 0) {
    return [
      {
        attribute: 'valueChoices',
        rule: 'domain',
        message: 'choice type requires a non-empty valueChoices list',
      },
    ];
  }

  const raw = entity['default'];
  if (raw === undefined) return [];
  const value = String(raw);
  if (!choices.some((choice) => choice === value)) {
    return [
      {
        attribute: 'default',
        rule: 'choice',
        message: `default "${value}" is not one of valueChoices`,
      },
    ];
  }
  return [];
}

/**
 * Type-specific value checks for one entity. Only action data, connector
 * data, settings and states have a typed value; other kinds never yield
 * issues. Structural type mismatches are left to the schema pass.
 */
export function checkValueDomain(kind: EntityKind, entity: Record<string, unknown>): DomainIssue[] {
  const type = entity['type'];
  if (typeof type !== 'string') return [];

  if (kind === 'actionData') {
    switch (type) {
      case 'number':
        return checkNumberDomain(entity, true);
      case 'choice':
        return checkChoiceDomain(entity);
      case 'color': {
        const raw = entity['default'];
        if (typeof raw === 'string' && COLOR_PATTERN.test(raw)) return [];
        return [
          {
            attribute: 'default',
            rule: 'domain',
            message: `color type requires a #RRGGBB or #RRGGBBAA default, got ${JSON.stringify(raw) ?? 'nothing'}`,
          },
        ];
      }
      case 'switch':
        if (typeof entity['default'] === 'boolean') return [];
        return [{ attribute: 'default', rule: 'domain', message: 'switch type requires a boolean default' }];
      default:
        return [];
    }
  }

  if (kind === 'setting' && type === 'number') {
    return checkNumberDomain(entity, false);
  }

  if (kind === 'state' && type === 'choice') {
    return checkChoiceDomain(entity);
  }

  return [];
}
