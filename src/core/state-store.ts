/**
 * StateStore: the runtime model of states, settings and held actions.
 *
 * Values recorded here are the last ones handed to the connection, so a
 * value equal to the recorded one is never written again. Callers check
 * with {@link StateStore.isCurrent} and record only after the write was
 * queued. Operations are synchronous and run to completion on the event
 * loop, so no two updates for one key can interleave.
 */

import type { PluginDescriptor } from '../types/descriptor.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * `declared` states come from the descriptor, `dynamic` ones were created
 * at runtime and `implicit` ones were updated without being created.
 */
export type StateOrigin = 'declared' | 'dynamic' | 'implicit';

export interface RuntimeStateRecord {
  id: string;
  description: string;
  /** Last value sent to the controller; `null` until one has been sent. */
  value: string | null;
  origin: StateOrigin;
  parentGroup?: string;
}

export type CreateStateResult = 'created' | 'updated' | 'unchanged';

/** Key used for hold records that carry no instance id. */
const NO_INSTANCE = '';

// ---------------------------------------------------------------------------
// StateStore
// ---------------------------------------------------------------------------

export class StateStore {
  private readonly states = new Map<string, RuntimeStateRecord>();
  private readonly settings = new Map<string, string>();
  /** actionId → instance ids currently held. */
  private readonly held = new Map<string, Set<string>>();

  // -------------------------------------------------------------------------
  // States
  // -------------------------------------------------------------------------

  /**
   * Create a dynamic state, or update the value of an existing one.
   * The description of an existing state is never changed.
   */
  createOrUpdateState(
    id: string,
    description: string,
    value: string,
    parentGroup?: string,
  ): CreateStateResult {
    const existing = this.states.get(id);
    if (existing !== undefined) {
      if (existing.value === value) return 'unchanged';
      existing.value = value;
      return 'updated';
    }

    const record: RuntimeStateRecord = { id, description, value, origin: 'dynamic' };
    if (parentGroup !== undefined) record.parentGroup = parentGroup;
    this.states.set(id, record);
    return 'created';
  }

  /** Forget a state. Unknown ids are ignored. */
  removeState(id: string): RuntimeStateRecord | undefined {
    const record = this.states.get(id);
    this.states.delete(id);
    return record;
  }

  /**
   * Record `value` as the latest value of `id`.
   *
   * @returns `true` when the value differs from the last one sent and must
   *   be written. An unseen id is registered as an implicit state.
   */
  updateValue(id: string, value: string): boolean {
    const record = this.states.get(id);
    if (record === undefined) {
      this.states.set(id, { id, description: '', value, origin: 'implicit' });
      return true;
    }
    if (record.value === value) return false;
    record.value = value;
    return true;
  }

  /** Whether `value` is the last value sent for `id`. */
  isCurrent(id: string, value: string): boolean {
    return this.states.get(id)?.value === value;
  }

  has(id: string): boolean {
    return this.states.has(id);
  }

  get(id: string): RuntimeStateRecord | undefined {
    const record = this.states.get(id);
    return record === undefined ? undefined : { ...record };
  }

  isDeclared(id: string): boolean {
    return this.states.get(id)?.origin === 'declared';
  }

  /** Register the states declared in a descriptor. Existing records are kept. */
  seedFromDescriptor(descriptor: PluginDescriptor): number {
    let added = 0;
    for (const category of descriptor.categories) {
      for (const state of category.states ?? []) {
        if (this.states.has(state.id)) continue;
        const record: RuntimeStateRecord = {
          id: state.id,
          description: state.desc,
          value: null,
          origin: 'declared',
        };
        if (state.parentGroup !== undefined) record.parentGroup = state.parentGroup;
        this.states.set(state.id, record);
        added++;
      }
    }
    return added;
  }

  /** Every state that has a sent value, in registration order. */
  snapshot(): Array<{ id: string; value: string }> {
    const result: Array<{ id: string; value: string }> = [];
    for (const { id, value } of this.states.values()) {
      if (value !== null) result.push({ id, value });
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Settings
  // -------------------------------------------------------------------------

  /** Same diff suppression as {@link updateValue}, keyed by setting name. */
  updateSetting(name: string, value: string): boolean {
    if (this.settings.get(name) === value) return false;
    this.settings.set(name, value);
    return true;
  }

  /** Record values reported by the controller so echoing them is suppressed. */
  syncSettings(values: Readonly<Record<string, string>>): void {
    for (const [name, value] of Object.entries(values)) {
      this.settings.set(name, value);
    }
  }

  isCurrentSetting(name: string, value: string): boolean {
    return this.settings.get(name) === value;
  }

  getSetting(name: string): string | undefined {
    return this.settings.get(name);
  }

  settingsSnapshot(): Record<string, string> {
    return Object.fromEntries(this.settings);
  }

  // -------------------------------------------------------------------------
  // Held actions
  // -------------------------------------------------------------------------

  /**
   * Record a hold-start or hold-end. A hold-end without `instanceId`
   * releases every instance of the action.
   */
  setHeld(actionId: string, instanceId: string | undefined, held: boolean): void {
    const instance = instanceId ?? NO_INSTANCE;
    const instances = this.held.get(actionId);
    if (held) {
      if (instances === undefined) {
        this.held.set(actionId, new Set([instance]));
      } else {
        instances.add(instance);
      }
      return;
    }
    if (instances === undefined) return;
    if (instanceId === undefined) {
      this.held.delete(actionId);
      return;
    }
    instances.delete(instance);
    if (instances.size === 0) this.held.delete(actionId);
  }

  /**
   * Whether an action is held. Without `instanceId`, true when any
   * instance of the action is held.
   */
  isHeld(actionId: string, instanceId?: string): boolean {
    const instances = this.held.get(actionId);
    if (instances === undefined) return false;
    return instanceId === undefined ? instances.size > 0 : instances.has(instanceId);
  }

  clearHeld(): void {
    this.held.clear();
  }
}
