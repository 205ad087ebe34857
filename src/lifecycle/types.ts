/**
 * Lifecycle types shared by the manager, the entry loaders and the
 * dispatcher.
 */

import type { PlatformEvent } from '../dispatch/types.js';
import type { DependencySpecifier, ModuleManifest } from '../manifest/index.js';
import type { ContextLogger } from '../observability/index.js';
import type { PermissionTag, PlatformAction } from '../permissions.js';
import type { ScopedSettings } from '../settings/index.js';
import type { ModuleState } from './states.js';

/**
 * Something the manager can load: a module directory found by the scanner,
 * or a module supplied in memory.
 */
export interface ModuleCandidate {
  readonly id: string;
  /** Human-readable origin, e.g. the module directory. */
  readonly source: string;
  /** Directory entry files are resolved against; null for in-memory modules. */
  readonly directory: string | null;
  /** Raw manifest: YAML text or a decoded mapping. */
  readManifest(): string | Record<string, unknown>;
  /** Raw settings schema, or null when the module declares none. */
  readSettingsSchema(): unknown;
}

export type EventHandler = (event: PlatformEvent) => unknown;

export interface Subscription {
  readonly pattern: string;
  readonly handler: EventHandler;
}

export interface PlatformAccess {
  /** Whether `action` is covered by the module's granted permissions. */
  can(action: PlatformAction): boolean;
  perform(action: PlatformAction, payload?: Record<string, unknown>): Promise<unknown>;
}

/**
 * Capabilities handed to a module's entry code.
 */
export interface ModuleContext {
  readonly moduleId: string;
  readonly manifest: ModuleManifest;
  readonly settings: ScopedSettings;
  readonly platform: PlatformAccess;
  readonly logger: ContextLogger;
  /** Receive events whose category matches `pattern` (`*` and `**` allowed). */
  subscribe(pattern: string, handler: EventHandler): () => void;
  /** Per-module data directory, created on first call. */
  storagePath(): string;
}

export type LifecycleHook = (context: ModuleContext) => unknown;

/**
 * What a module's entry file provides.
 */
export interface ModuleEntry {
  setup(context: ModuleContext): unknown;
  onEnable?: LifecycleHook;
  onDisable?: LifecycleHook;
  onUnload?: LifecycleHook;
}

export type ModuleFactory = () => ModuleEntry | Promise<ModuleEntry>;

export interface EntryLoader {
  load(candidate: ModuleCandidate, manifest: ModuleManifest): Promise<ModuleEntry>;
}

export interface ModuleSnapshot {
  readonly id: string;
  readonly state: ModuleState;
  readonly source: string;
  readonly manifest: ModuleManifest | null;
  readonly grantedPermissions: readonly PermissionTag[];
  readonly dependencies: readonly DependencySpecifier[];
  readonly settingsKeys: readonly string[];
  readonly subscriptions: readonly string[];
  readonly lastError: Error | null;
  readonly updatedAt: string;
}

/**
 * One enabled module as the dispatcher sees it.
 */
export interface DispatchTarget {
  readonly moduleId: string;
  readonly permissions: ReadonlySet<PermissionTag>;
  readonly subscriptions: readonly Subscription[];
}

export interface TransitionEvent {
  readonly moduleId: string;
  readonly from: ModuleState | null;
  readonly to: ModuleState;
  readonly error: Error | null;
}

export type LifecycleEventName = 'transition' | 'subscription';

export type TransitionListener = (event: TransitionEvent) => void;

export interface DiscoverResult {
  readonly registered: readonly string[];
  readonly skipped: readonly { readonly id: string; readonly source: string; readonly reason: string }[];
}

export interface LoadAllResult {
  readonly enabled: readonly string[];
  readonly failed: readonly { readonly id: string; readonly error: Error }[];
}
