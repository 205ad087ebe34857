/**
 * Dependency resolution types.
 */

import type { DependencySpecifier } from '../manifest/index.js';
import type { ContextLogger } from '../observability/index.js';

/**
 * The shared package environment modules install into.
 */
export interface PackageInstaller {
  /** Installed version of `name`, or null when it is not installed. */
  installedVersion(name: string): Promise<string | null>;
  /** Every published version of `name`, in any order. */
  availableVersions(name: string): Promise<string[]>;
  install(name: string, version: string): Promise<void>;
}

export interface InstallStep {
  readonly name: string;
  readonly version: string;
  readonly previousVersion: string | null;
  /** Every range the chosen version satisfies, the requesting module's first. */
  readonly ranges: readonly string[];
}

export interface InstallPlan {
  readonly moduleId: string;
  readonly steps: readonly InstallStep[];
}

export interface DependencyClaim {
  readonly moduleId: string;
  readonly specifier: DependencySpecifier;
}

export interface DependencyResolverOptions {
  /** Extra attempts after a failed install. */
  retries?: number;
  logger?: ContextLogger;
}
