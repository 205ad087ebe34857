/**
 * Manifest data types.
 */

import type { PermissionTag } from '../permissions.js';

export const SUPPORTED_MANIFEST_VERSIONS: readonly number[] = Object.freeze([1]);

export const DEFAULT_ENTRY = 'index.js';

/**
 * One third-party package a module needs. `range` is a semver range; `raw`
 * is the requirement as the module author wrote it.
 */
export interface DependencySpecifier {
  readonly name: string;
  readonly range: string;
  readonly raw: string;
}

export interface ModuleManifest {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly license: string;
  readonly authors: readonly string[];
  readonly requirements: readonly DependencySpecifier[];
  readonly permissions: readonly PermissionTag[];
  /** Entry file relative to the module directory. */
  readonly entry: string;
}

export interface ParseManifestOptions {
  /** When set, `module.id` must equal this value. */
  expectedId?: string;
}
