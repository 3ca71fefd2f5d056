import { describe, it, expect } from 'vitest';
import {
  attributesFor,
  checkValueDomain,
  lookupAttribute,
  requiredAttributes,
  resolveSdkVersion,
  toNumeric,
} from './entity-model.js';
import { DEFAULT_SDK_VERSION, SDK_RULES, parseRuleTable } from '../types/entity-rules.js';

// ---------------------------------------------------------------------------
// Rule table
// ---------------------------------------------------------------------------

describe('rule table', () => {
  it('defaults to SDK version 6', () => {
    expect(DEFAULT_SDK_VERSION).toBe(6);
  });

  it('keeps attributes in declaration order', () => {
    expect([...SDK_RULES.state.keys()]).toEqual([
      'id',
      'type',
      'desc',
      'default',
      'parentGroup',
      'valueChoices',
    ]);
  });

  it('rejects a table without versions', () => {
    expect(() => parseRuleTable({ entities: {} })).toThrow(
      'Rule table "sdkVersions" must be a non-empty list of integers',
    );
  });

  it('rejects a rule with an unknown value type', () => {
    const entities = Object.fromEntries(
      ['plugin', 'setting', 'category', 'action', 'actionData', 'connector', 'state', 'event'].map(
        (kind) => [kind, {}],
      ),
    );
    entities['state'] = { id: { since: 1, required: true, type: 'uuid' } };

    expect(() =>
      parseRuleTable({ defaultSdkVersion: 1, sdkVersions: [1], entities }),
    ).toThrow('Invalid rule state.id: unknown value type "uuid"');
  });

  it('rejects list rules without an item kind', () => {
    expect(() =>
      parseRuleTable({
        defaultSdkVersion: 1,
        sdkVersions: [1],
        entities: { plugin: { categories: { since: 1, required: true, type: 'list' } } },
      }),
    ).toThrow('Invalid rule plugin.categories: list rules must name an entity kind in "items"');
  });
});

// ---------------------------------------------------------------------------
// lookupAttribute
// ---------------------------------------------------------------------------

describe('lookupAttribute', () => {
  it('allows an attribute at and above its minimum version', () => {
    const lookup = lookupAttribute('action', 'hasHoldFunctionality', 3);
    expect(lookup.status).toBe('allowed');
  });

  it('reports attributes newer than the declared version', () => {
    expect(lookupAttribute('action', 'hasHoldFunctionality', 2)).toMatchObject({
      status: 'too-new',
      since: 3,
    });
    expect(lookupAttribute('category', 'connectors', 3)).toMatchObject({
      status: 'too-new',
      since: 4,
    });
    expect(lookupAttribute('state', 'parentGroup', 5)).toMatchObject({
      status: 'too-new',
      since: 6,
    });
  });

  it('fails closed on unknown attributes and kinds', () => {
    expect(lookupAttribute('action', 'colour', 6)).toEqual({ status: 'unknown' });
    expect(lookupAttribute('widget', 'id', 6)).toEqual({ status: 'unknown' });
    expect(lookupAttribute('action', 'constructor', 6)).toEqual({ status: 'unknown' });
  });
});

describe('attributesFor / requiredAttributes', () => {
  it('omits attributes introduced after the version', () => {
    const names = attributesFor('plugin', 3).map((rule) => rule.name);
    expect(names).toContain('settings');
    expect(names).not.toContain('plugin_start_cmd_windows');
  });

  it('lists the required state attributes', () => {
    expect(requiredAttributes('state', 6).map((rule) => rule.name)).toEqual([
      'id',
      'type',
      'desc',
      'default',
    ]);
  });
});

describe('resolveSdkVersion', () => {
  it('keeps supported versions and falls back otherwise', () => {
    expect(resolveSdkVersion(4)).toBe(4);
    expect(resolveSdkVersion(9)).toBe(6);
    expect(resolveSdkVersion('6')).toBe(6);
    expect(resolveSdkVersion(undefined)).toBe(6);
  });
});

// ---------------------------------------------------------------------------
// checkValueDomain
// ---------------------------------------------------------------------------

describe('checkValueDomain', () => {
  describe('number', () => {
    it('accepts numeric defaults as numbers or strings', () => {
      expect(checkValueDomain('actionData', { type: 'number', default: 5 })).toEqual([]);
      expect(checkValueDomain('actionData', { type: 'number', default: '5.5' })).toEqual([]);
    });

    it('rejects a non-numeric default', () => {
      expect(checkValueDomain('actionData', { type: 'number', default: 'loud' })).toEqual([
        {
          attribute: 'default',
          rule: 'domain',
          message: 'number type requires a numeric default, got "loud"',
        },
      ]);
    });

    it('rejects inverted bounds and out-of-range defaults', () => {
      const issues = checkValueDomain('actionData', {
        type: 'number',
        default: 150,
        minValue: 0,
        maxValue: 100,
      });
      expect(issues).toEqual([
        { attribute: 'default', rule: 'domain', message: 'default 150 is above maxValue 100' },
      ]);

      const inverted = checkValueDomain('setting', { type: 'number', minValue: 10, maxValue: 1 });
      expect(inverted).toEqual([
        { attribute: 'minValue', rule: 'domain', message: 'minValue 10 is greater than maxValue 1' },
      ]);
    });

    it('does not require a default for settings', () => {
      expect(checkValueDomain('setting', { type: 'number' })).toEqual([]);
    });
  });

  describe('choice', () => {
    it('requires a non-empty choice list', () => {
      expect(checkValueDomain('state', { type: 'choice', default: '', valueChoices: [] })).toEqual([
        {
          attribute: 'valueChoices',
          rule: 'domain',
          message: 'choice type requires a non-empty valueChoices list',
        },
      ]);
    });

    it('requires the default to be a member', () => {
      expect(
        checkValueDomain('actionData', { type: 'choice', default: 'blue', valueChoices: ['red'] }),
      ).toEqual([
        { attribute: 'default', rule: 'choice', message: 'default "blue" is not one of valueChoices' },
      ]);
      expect(
        checkValueDomain('actionData', { type: 'choice', default: 'red', valueChoices: ['red'] }),
      ).toEqual([]);
    });
  });

  it('checks color format', () => {
    expect(checkValueDomain('actionData', { type: 'color', default: '#FF00AA' })).toEqual([]);
    expect(checkValueDomain('actionData', { type: 'color', default: '#ff00aa80' })).toEqual([]);
    expect(checkValueDomain('actionData', { type: 'color', default: 'red' })).toHaveLength(1);
  });

  it('requires a boolean switch default', () => {
    expect(checkValueDomain('actionData', { type: 'switch', default: false })).toEqual([]);
    expect(checkValueDomain('actionData', { type: 'switch', default: 'false' })).toEqual([
      { attribute: 'default', rule: 'domain', message: 'switch type requires a boolean default' },
    ]);
  });

  it('ignores untyped kinds and text values', () => {
    expect(checkValueDomain('event', { type: 'communicate' })).toEqual([]);
    expect(checkValueDomain('actionData', { type: 'text', default: 3 })).toEqual([]);
  });
});

describe('toNumeric', () => {
  it('parses finite numbers only', () => {
    expect(toNumeric(' 42 ')).toBe(42);
    expect(toNumeric('')).toBeUndefined();
    expect(toNumeric(Number.NaN)).toBeUndefined();
    expect(toNumeric(true)).toBeUndefined();
  });
});
