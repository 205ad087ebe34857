/**
 * Module lifecycle states and the transitions allowed between them.
 */

export enum ModuleState {
  Discovered = 'discovered',
  Validating = 'validating',
  ResolvingDeps = 'resolving_deps',
  MergingSettings = 'merging_settings',
  Loading = 'loading',
  Enabled = 'enabled',
  Disabled = 'disabled',
  Unloading = 'unloading',
  Unloaded = 'unloaded',
  Reloading = 'reloading',
  Errored = 'errored',
}

// A load in progress may also move to `unloading` when it is cancelled.
const TRANSITIONS: Readonly<Record<ModuleState, readonly ModuleState[]>> = Object.freeze({
  [ModuleState.Discovered]: [ModuleState.Validating, ModuleState.Unloading],
  [ModuleState.Validating]: [ModuleState.ResolvingDeps, ModuleState.Errored, ModuleState.Unloading],
  [ModuleState.ResolvingDeps]: [ModuleState.MergingSettings, ModuleState.Errored, ModuleState.Unloading],
  [ModuleState.MergingSettings]: [ModuleState.Loading, ModuleState.Errored, ModuleState.Unloading],
  [ModuleState.Loading]: [ModuleState.Enabled, ModuleState.Errored, ModuleState.Unloading],
  [ModuleState.Enabled]: [ModuleState.Disabled, ModuleState.Unloading],
  [ModuleState.Disabled]: [ModuleState.Enabled, ModuleState.Unloading, ModuleState.Errored],
  [ModuleState.Unloading]: [ModuleState.Unloaded, ModuleState.Reloading],
  [ModuleState.Unloaded]: [],
  [ModuleState.Reloading]: [ModuleState.Unloaded],
  [ModuleState.Errored]: [ModuleState.Validating, ModuleState.Unloading],
});

export function canTransition(from: ModuleState, to: ModuleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: ModuleState): readonly ModuleState[] {
  return TRANSITIONS[from];
}
