import { describe, it, expect } from 'vitest';
import { generateDescriptor, serializeDescriptor } from './descriptor-generator.js';
import { DescriptorValidationError, isClientError } from './client-error.js';
import { createRecordingLogger } from '../testing/recording-logger.js';
import type { PluginDeclaration } from '../types/declaration.js';

function createDeclaration(): PluginDeclaration {
  return {
    info: {
      id: 'demo',
      name: 'Demo Plugin',
      version: 2,
      plugin_start_cmd: 'node demo/index.js',
    },
    categories: {
      main: { imagepath: '%TP_PLUGIN_FOLDER%demo/icon.png' },
    },
    settings: {
      interval: { name: 'Poll interval', type: 'number', default: '5', minValue: 1, maxValue: 60 },
    },
    actions: {
      volume: {
        name: 'Set volume',
        format: 'Set volume to $[level]',
        hasHoldFunctionality: true,
        data: {
          level: { type: 'number', label: 'Level', default: 50, minValue: 0, maxValue: 100 },
        },
      },
    },
    connectors: {
      volume: { name: 'Volume', format: 'Volume' },
    },
    states: {
      mode: { desc: 'Mode', default: 'off', type: 'choice', valueChoices: ['off', 'on'] },
    },
    events: {
      modeChanged: {
        name: 'Mode changed',
        format: 'When mode becomes $val',
        valueChoices: ['off', 'on'],
        valueStateId: 'demo.main.state.mode',
      },
    },
  };
}

function generate(declaration: PluginDeclaration, sdkVersion?: number, skipInvalid?: boolean) {
  const logger = createRecordingLogger();
  const result = generateDescriptor(declaration, { sdkVersion, skipInvalid, logger });
  return { ...result, logger };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

// ---------------------------------------------------------------------------
// Expansion
// ---------------------------------------------------------------------------

describe('generateDescriptor: expansion', () => {
  it('derives ids, fills defaults and resolves format placeholders', () => {
    const { descriptor, warnings } = generate(createDeclaration());

    expect(warnings).toEqual([]);
    expect(descriptor).toEqual({
      sdk: 6,
      version: 2,
      name: 'Demo Plugin',
      id: 'demo',
      plugin_start_cmd: 'node demo/index.js',
      categories: [
        {
          id: 'demo.main',
          name: 'Demo Plugin',
          imagepath: '%TP_PLUGIN_FOLDER%demo/icon.png',
          actions: [
            {
              id: 'demo.main.act.volume',
              name: 'Set volume',
              prefix: 'Demo Plugin',
              type: 'communicate',
              format: 'Set volume to {$demo.main.act.volume.data.level$}',
              hasHoldFunctionality: true,
              data: [
                {
                  id: 'demo.main.act.volume.data.level',
                  type: 'number',
                  label: 'Level',
                  default: 50,
                  minValue: 0,
                  maxValue: 100,
                },
              ],
            },
          ],
          connectors: [{ id: 'demo.main.conn.volume', name: 'Volume', format: 'Volume' }],
          states: [
            {
              id: 'demo.main.state.mode',
              type: 'choice',
              desc: 'Mode',
              default: 'off',
              valueChoices: ['off', 'on'],
            },
          ],
          events: [
            {
              id: 'demo.main.event.modeChanged',
              name: 'Mode changed',
              format: 'When mode becomes $val',
              type: 'communicate',
              valueChoices: ['off', 'on'],
              valueType: 'choice',
              valueStateId: 'demo.main.state.mode',
            },
          ],
        },
      ],
      settings: [
        {
          name: 'Poll interval',
          type: 'number',
          default: '5',
          minValue: 1,
          maxValue: 60,
          readOnly: false,
        },
      ],
    });
  });

  it('emits root attributes in rule-table order', () => {
    const { descriptor } = generate(createDeclaration());

    expect(Object.keys(descriptor)).toEqual([
      'sdk',
      'version',
      'name',
      'id',
      'plugin_start_cmd',
      'categories',
      'settings',
    ]);
  });

  it('lets an explicit id win over the derived one', () => {
    const declaration = createDeclaration();
    declaration.actions = {
      volume: {
        id: 'custom.volume',
        name: 'Set volume',
        format: 'Set $[level]',
        data: { level: { type: 'number', label: 'Level', default: 1 } },
      },
    };

    const action = generate(declaration).descriptor.categories[0]?.actions?.[0];

    expect(action?.id).toBe('custom.volume');
    expect(action?.format).toBe('Set {$custom.volume.data.level$}');
    expect(action?.data?.[0]?.id).toBe('custom.volume.data.level');
  });

  it('fills the version and names the category after the plugin', () => {
    const { descriptor } = generate({ info: { id: 'demo', name: 'Demo' }, categories: { tools: {} } });

    expect(descriptor.categories).toEqual([{ id: 'demo.tools', name: 'Demo' }]);
    expect(descriptor.version).toBe(1);
  });

  it('keeps an explicit prefix and category name', () => {
    const { descriptor } = generate({
      info: { id: 'demo', name: 'Demo Plugin' },
      categories: { main: { name: 'Main tools' } },
      actions: { ping: { name: 'Ping', prefix: 'Net' } },
    });

    expect(descriptor.categories[0]?.name).toBe('Main tools');
    expect(descriptor.categories[0]?.actions?.[0]?.prefix).toBe('Net');
  });
});

// ---------------------------------------------------------------------------
// Category placement
// ---------------------------------------------------------------------------

describe('generateDescriptor: category placement', () => {
  it('places an entity without a category in every category', () => {
    const { descriptor } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: {}, extra: {} },
      actions: { ping: { name: 'Ping' } },
    });

    expect(descriptor.categories.map((c) => c.actions?.map((a) => a.id))).toEqual([
      ['demo.main.act.ping'],
      ['demo.extra.act.ping'],
    ]);
  });

  it('places an entity with a category only in that category', () => {
    const { descriptor } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: {}, extra: {} },
      actions: { ping: { name: 'Ping', category: 'extra' } },
    });

    expect(descriptor.categories[0]?.actions).toBeUndefined();
    expect(descriptor.categories[1]?.actions?.[0]).toEqual({
      id: 'demo.extra.act.ping',
      name: 'Ping',
      prefix: 'Demo',
      type: 'communicate',
    });
  });

  it('lists nested entities before top-level ones', () => {
    const { descriptor } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: { actions: { first: { name: 'First' } } } },
      actions: { second: { name: 'Second' } },
    });

    expect(descriptor.categories[0]?.actions?.map((a) => a.id)).toEqual([
      'demo.main.act.first',
      'demo.main.act.second',
    ]);
  });

  it('rejects a reference to an unknown category', () => {
    const err = catchError(() =>
      generate({
        info: { id: 'demo' },
        categories: { main: {} },
        actions: { volume: { name: 'Volume', category: 'nope' } },
      }),
    );

    expect(isClientError(err) && err.code).toBe('USAGE_ERROR');
    expect(isClientError(err) && err.message).toBe(
      'actions entry "volume" names unknown category "nope"',
    );
  });
});

// ---------------------------------------------------------------------------
// Format placeholders
// ---------------------------------------------------------------------------

describe('generateDescriptor: format placeholders', () => {
  it('resolves positional placeholders against listed data items', () => {
    const { descriptor } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: {} },
      actions: {
        pick: {
          name: 'Pick',
          format: 'Pick $[1] then $[2]',
          data: [
            { id: 'lvl', type: 'text', label: 'Level', default: '' },
            { type: 'switch', label: 'Mute', default: false },
          ],
        },
      },
    });

    expect(descriptor.categories[0]?.actions?.[0]?.format).toBe(
      'Pick {$lvl$} then {$demo.main.act.pick.data.2$}',
    );
  });

  it('leaves an unmatched placeholder in place and warns', () => {
    const { descriptor, warnings, logger } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: {} },
      actions: { volume: { name: 'Volume', format: 'Set $[missing]' } },
    });

    const expected = 'action "demo.main.act.volume": format placeholder "$[missing]" matches no data item';
    expect(descriptor.categories[0]?.actions?.[0]?.format).toBe('Set $[missing]');
    expect(warnings).toEqual([expected]);
    expect(logger.messages('warn')).toEqual([expected]);
  });
});

// ---------------------------------------------------------------------------
// SDK version handling
// ---------------------------------------------------------------------------

describe('generateDescriptor: SDK versions', () => {
  it('omits connectors below version 4', () => {
    const { descriptor, warnings } = generate(createDeclaration(), 3);

    expect(descriptor.sdk).toBe(3);
    expect(descriptor.categories[0]?.connectors).toBeUndefined();
    expect(warnings).toEqual(['category "demo.main": connectors require SDK version 4, omitted']);
  });

  it('fails validation for attributes too new for the target version', () => {
    const err = catchError(() => generate(createDeclaration(), 2));

    expect(err).toBeInstanceOf(DescriptorValidationError);
  });

  it('drops too-new attributes with skipInvalid and reports each one', () => {
    const { descriptor, warnings } = generate(createDeclaration(), 2, true);

    expect(warnings).toEqual([
      'action "demo.main.act.volume": omitted "hasHoldFunctionality" (requires SDK version 3)',
      'data "demo.main.act.volume.data.level": omitted "minValue" (requires SDK version 3)',
      'data "demo.main.act.volume.data.level": omitted "maxValue" (requires SDK version 3)',
      'category "demo.main": connectors require SDK version 4, omitted',
      'plugin: settings require SDK version 3, omitted',
    ]);
    expect(descriptor.settings).toBeUndefined();
    expect(descriptor.categories[0]?.actions?.[0]?.hasHoldFunctionality).toBeUndefined();
  });

  it('takes the version from info.sdk when no option is given', () => {
    const declaration = createDeclaration();
    declaration.info.sdk = 4;

    expect(generate(declaration).descriptor.sdk).toBe(4);
  });

  it('rejects an unsupported version', () => {
    const err = catchError(() => generate(createDeclaration(), 99));

    expect(isClientError(err) && err.message).toBe('Unsupported SDK version: 99');
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('generateDescriptor: failures', () => {
  it('rejects a declaration without a plugin id', () => {
    const err = catchError(() => generate({ info: { id: '' }, categories: {} }));

    expect(isClientError(err) && err.code).toBe('USAGE_ERROR');
  });

  it('throws with the violations when the expansion is invalid', () => {
    const declaration = createDeclaration();
    declaration.states = { mode: { desc: 'Mode', type: 'choice', default: 'off' } };

    const err = catchError(() => generate(declaration));

    expect(err).toBeInstanceOf(DescriptorValidationError);
    const violations = err instanceof DescriptorValidationError ? err.violations : [];
    expect(violations.map((v) => v.entityId)).toContain('demo.main.state.mode');
  });

  it('warns about and drops unknown attributes', () => {
    const { descriptor, warnings } = generate({
      info: { id: 'demo', name: 'Demo' },
      categories: { main: {} },
      actions: { volume: { name: 'Volume', colour: 'red', doc: 'internal note' } },
    });

    expect(warnings).toEqual(['action "demo.main.act.volume": ignoring unknown attribute "colour"']);
    expect(descriptor.categories[0]?.actions?.[0]).not.toHaveProperty('colour');
    expect(descriptor.categories[0]?.actions?.[0]).not.toHaveProperty('doc');
  });
});

// ---------------------------------------------------------------------------
// serializeDescriptor
// ---------------------------------------------------------------------------

describe('serializeDescriptor', () => {
  it('renders indented JSON with a trailing newline', () => {
    const { descriptor } = generate({ info: { id: 'demo', name: 'Demo' }, categories: { main: {} } });

    expect(serializeDescriptor(descriptor, 0)).toBe(
      '{"sdk":6,"version":1,"name":"Demo","id":"demo","categories":[{"id":"demo.main","name":"Demo"}]}\n',
    );
    expect(serializeDescriptor(descriptor).startsWith('{\n  "sdk": 6,')).toBe(true);
  });
});
