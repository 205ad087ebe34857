export {
  AlwaysDenyHandler,
  AutoApproveHandler,
  CallbackApprovalHandler,
  createPermissionDecision,
  createPermissionRequest,
} from './approval.js';
export type { PermissionApprover, PermissionDecision, PermissionRequest } from './approval.js';
export { createModuleContext } from './context.js';
export type { ModuleContextOptions } from './context.js';
export { FileEntryLoader, isModuleEntry, StaticEntryLoader, toModuleEntry } from './entry-point.js';
export { LifecycleManager } from './manager.js';
export type { LifecycleManagerOptions } from './manager.js';
export {
  directoryCandidate,
  MANIFEST_FILE,
  memoryCandidate,
  scanModuleDirectory,
  SETTINGS_SCHEMA_FILE,
} from './scanner.js';
export { allowedTransitions, canTransition, ModuleState } from './states.js';
export type {
  DiscoverResult,
  DispatchTarget,
  EntryLoader,
  EventHandler,
  LifecycleEventName,
  LifecycleHook,
  LoadAllResult,
  ModuleCandidate,
  ModuleContext,
  ModuleEntry,
  ModuleFactory,
  ModuleSnapshot,
  PlatformAccess,
  Subscription,
  TransitionEvent,
  TransitionListener,
} from './types.js';
