/**
 * Plugin descriptor types.
 *
 * These mirror the JSON document (conventionally `entry.tp`) that declares
 * a plugin to the controller. Which attributes are legal for a given `sdk`
 * version is decided by the rule table in `sdk-rules.json`, not by these
 * types; a value of these types has already passed validation.
 */

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** Value types an action or connector data item can take. */
export type DataType = 'text' | 'number' | 'switch' | 'choice' | 'file' | 'folder' | 'color';

export type StateType = 'text' | 'choice';

export type SettingType = 'text' | 'number';

export type ActionType = 'communicate' | 'execute';

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export interface ActionDataDescriptor {
  id: string;
  type: DataType;
  label: string;
  default: string | number | boolean;
  valueChoices?: string[];
  extensions?: string[];
  allowDecimals?: boolean;
  minValue?: number;
  maxValue?: number;
}

export interface ActionDescriptor {
  id: string;
  name: string;
  prefix: string;
  type: ActionType;
  description?: string;
  format?: string;
  executionType?: string;
  execution_cmd?: string;
  tryInline?: boolean;
  hasHoldFunctionality?: boolean;
  data?: ActionDataDescriptor[];
}

export interface ConnectorDescriptor {
  id: string;
  name: string;
  format?: string;
  data?: ActionDataDescriptor[];
}

export interface StateDescriptor {
  id: string;
  type: StateType;
  desc: string;
  default: string;
  parentGroup?: string;
  valueChoices?: string[];
}

export interface EventDescriptor {
  id: string;
  name: string;
  format: string;
  type: 'communicate';
  valueChoices: string[];
  valueType: 'choice';
  valueStateId: string;
}

export interface CategoryDescriptor {
  id: string;
  name: string;
  imagepath?: string;
  actions?: ActionDescriptor[];
  connectors?: ConnectorDescriptor[];
  states?: StateDescriptor[];
  events?: EventDescriptor[];
}

export interface SettingDescriptor {
  name: string;
  type: SettingType;
  default?: string;
  maxLength?: number;
  isPassword?: boolean;
  minValue?: number;
  maxValue?: number;
  readOnly?: boolean;
}

/** Root of a descriptor document. */
export interface PluginDescriptor {
  sdk: number;
  version: number;
  name: string;
  id: string;
  configuration?: Record<string, unknown>;
  plugin_start_cmd?: string;
  plugin_start_cmd_windows?: string;
  plugin_start_cmd_linux?: string;
  plugin_start_cmd_mac?: string;
  categories: CategoryDescriptor[];
  settings?: SettingDescriptor[];
}

/** Conventional descriptor file name. */
export const DESCRIPTOR_FILE_NAME = 'entry.tp';

// ---------------------------------------------------------------------------
// Validation results
// ---------------------------------------------------------------------------

/** Which rule a descriptor violation broke. */
export type ViolationRule =
  | 'syntax'
  | 'required'
  | 'unknown-attribute'
  | 'version'
  | 'type'
  | 'choice'
  | 'domain'
  | 'duplicate-id'
  | 'unresolved-reference';

export interface Violation {
  /** Location of the offending entity, e.g. `categories[0].actions[1]`. Empty for the root. */
  path: string;
  /** Id of the offending entity, when it has one. */
  entityId?: string;
  /** Offending attribute. Empty when the violation concerns the whole entity. */
  attribute: string;
  rule: ViolationRule;
  message: string;
}
