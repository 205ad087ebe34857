/**
 * modhost - module host for self-hosted chat bots.
 */

// Host
export { Host } from './host.js';
export type { HostOptions, ModuleDescription, StartOptions } from './host.js';

// Config
export { Config, DEFAULT_CONFIG } from './config.js';

// Errors
export {
  HostError,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  ManifestError,
  UnsupportedManifestVersionError,
  DependencyConflictError,
  DependencyInstallError,
  SettingsValidationError,
  ReservedSettingsKeyError,
  SettingNotFoundError,
  ModuleNotFoundError,
  ModuleLoadError,
  ModuleRuntimeError,
  ModuleTimeoutError,
  PermissionDeniedError,
  InvalidTransitionError,
  LifecycleCancelledError,
  ErrorCodes,
  toError,
} from './errors.js';
export type { ErrorCode, ErrorOptions, SettingsErrorDetail } from './errors.js';

// Permissions
export {
  PERMISSION_TAGS,
  PLATFORM_ACTIONS,
  covers,
  describePermissions,
  isPermissionTag,
  isPlatformAction,
} from './permissions.js';
export type { PermissionTag, PlatformAction } from './permissions.js';

// Manifest
export {
  loadManifestFile,
  normalizeVersion,
  parseManifest,
  parseRequirement,
  rangesIntersect,
  DEFAULT_ENTRY,
  SUPPORTED_MANIFEST_VERSIONS,
} from './manifest/index.js';
export type { DependencySpecifier, ModuleManifest, ParseManifestOptions } from './manifest/index.js';

// Dependencies
export { dependencyPrefix, DependencyResolver, isWithin, NpmInstaller } from './dependencies/index.js';
export type {
  DependencyClaim,
  DependencyResolverOptions,
  InstallPlan,
  InstallStep,
  NpmInstallerOptions,
  PackageInstaller,
} from './dependencies/index.js';

// Settings
export {
  HOST_SETTINGS,
  SettingsStore,
  parseSettingsSchema,
  validateSettingValue,
} from './settings/index.js';
export type {
  ObserveOptions,
  ScopedSettings,
  SettingObserver,
  SettingType,
  SettingView,
  SettingsSchemaEntry,
  SettingsStoreOptions,
} from './settings/index.js';

// Lifecycle
export {
  AlwaysDenyHandler,
  AutoApproveHandler,
  CallbackApprovalHandler,
  createPermissionDecision,
  FileEntryLoader,
  LifecycleManager,
  ModuleState,
  StaticEntryLoader,
  memoryCandidate,
  scanModuleDirectory,
} from './lifecycle/index.js';
export type {
  DispatchTarget,
  EntryLoader,
  EventHandler,
  LifecycleManagerOptions,
  ModuleCandidate,
  ModuleContext,
  ModuleEntry,
  ModuleFactory,
  ModuleSnapshot,
  PermissionApprover,
  PermissionDecision,
  PermissionRequest,
  TransitionEvent,
} from './lifecycle/index.js';

// Dispatch
export { EventDispatcher } from './dispatch/index.js';
export type { DispatchReport, GatewayClient, PlatformEvent } from './dispatch/index.js';

// Observability
export { ContextLogger, silentLogger } from './observability/index.js';
export type { ContextLoggerOptions, LogLevel } from './observability/index.js';

// Utils
export { matchPattern } from './utils/index.js';

export const VERSION = '0.1.0';
