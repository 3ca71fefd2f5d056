/**
 * Declarative plugin definitions consumed by the descriptor generator.
 *
 * A declaration mirrors the descriptor but lets most attributes be left
 * out: ids are derived from local names, attributes with a table default
 * are filled in, and entities can be declared once at the top level and
 * placed in categories by name. Keys that are not descriptor attributes
 * (`category`, `doc`, `value`) are accepted and dropped from the output.
 */

import type { ActionType, DataType, SettingType, StateType } from './descriptor.js';

/** Fields common to every declared entity. */
export interface EntityDeclaration {
  /** Explicit id. Wins over the derived one. */
  id?: string;
  /** Local name of the owning category. Absent means every category. */
  category?: string;
  /** Free-form documentation, never emitted. */
  doc?: string;
  [attribute: string]: unknown;
}

export interface DataDeclaration extends EntityDeclaration {
  type?: DataType;
  label?: string;
  default?: string | number | boolean;
  valueChoices?: string[];
  extensions?: string[];
  allowDecimals?: boolean;
  minValue?: number;
  maxValue?: number;
}

/** Data items keyed by local name, or listed in order. */
export type DataDeclarations = Record<string, DataDeclaration> | DataDeclaration[];

export interface ActionDeclaration extends EntityDeclaration {
  name?: string;
  prefix?: string;
  type?: ActionType;
  description?: string;
  /** May use `$[name]` or `$[n]` to place data items. */
  format?: string;
  executionType?: string;
  execution_cmd?: string;
  tryInline?: boolean;
  hasHoldFunctionality?: boolean;
  data?: DataDeclarations;
}

export interface ConnectorDeclaration extends EntityDeclaration {
  name?: string;
  format?: string;
  data?: DataDeclarations;
}

export interface StateDeclaration extends EntityDeclaration {
  type?: StateType;
  desc?: string;
  default?: string;
  parentGroup?: string;
  valueChoices?: string[];
}

export interface EventDeclaration extends EntityDeclaration {
  name?: string;
  format?: string;
  valueChoices?: string[];
  valueStateId?: string;
}

export interface SettingDeclaration {
  name?: string;
  type?: SettingType;
  default?: string;
  maxLength?: number;
  isPassword?: boolean;
  minValue?: number;
  maxValue?: number;
  readOnly?: boolean;
  doc?: string;
  [attribute: string]: unknown;
}

export interface CategoryDeclaration extends EntityDeclaration {
  name?: string;
  imagepath?: string;
  actions?: Record<string, ActionDeclaration>;
  connectors?: Record<string, ConnectorDeclaration>;
  states?: Record<string, StateDeclaration>;
  events?: Record<string, EventDeclaration>;
}

/** Root attributes. Only `id` is mandatory. */
export interface PluginInfoDeclaration {
  id: string;
  name?: string;
  sdk?: number;
  version?: number;
  configuration?: Record<string, unknown>;
  plugin_start_cmd?: string;
  plugin_start_cmd_windows?: string;
  plugin_start_cmd_linux?: string;
  plugin_start_cmd_mac?: string;
  [attribute: string]: unknown;
}

export interface PluginDeclaration {
  info: PluginInfoDeclaration;
  categories: Record<string, CategoryDeclaration>;
  settings?: Record<string, SettingDeclaration>;
  actions?: Record<string, ActionDeclaration>;
  connectors?: Record<string, ConnectorDeclaration>;
  states?: Record<string, StateDeclaration>;
  events?: Record<string, EventDeclaration>;
}
