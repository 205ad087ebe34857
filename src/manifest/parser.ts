/**
 * Manifest parsing and validation.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { InvalidInputError, ManifestError, UnsupportedManifestVersionError } from '../errors.js';
import { isPermissionTag, type PermissionTag } from '../permissions.js';
import { deepFreeze, isMapping } from '../utils/index.js';
import { normalizeVersion, parseRequirement } from './requirement.js';
import {
  DEFAULT_ENTRY,
  SUPPORTED_MANIFEST_VERSIONS,
  type DependencySpecifier,
  type ModuleManifest,
  type ParseManifestOptions,
} from './types.js';

const ID_RE = /^[a-z_]{1,32}$/;

interface StringRule {
  min: number;
  max: number;
}

function readString(
  section: Record<string, unknown>,
  key: string,
  rule: StringRule,
  fallback?: string,
): string {
  const field = `module.${key}`;
  const value = section[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new ManifestError(field, 'is required');
  }
  if (typeof value !== 'string') {
    throw new ManifestError(field, `must be a string, got ${typeof value}`);
  }
  return checkLength(field, value, rule);
}

function checkLength(field: string, value: string, rule: StringRule): string {
  if (value.length < rule.min || value.length > rule.max) {
    const bounds = rule.min === 0 ? `at most ${rule.max}` : `${rule.min}-${rule.max}`;
    throw new ManifestError(field, `must be ${bounds} characters long, got ${value.length}`);
  }
  return value;
}

function readList(section: Record<string, unknown>, key: string): unknown[] {
  const value = section[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ManifestError(`module.${key}`, `must be a list, got ${typeof value}`);
  }
  return value;
}

function readVersion(section: Record<string, unknown>): string {
  const value = section['version'];
  if (value === undefined || value === null) {
    throw new ManifestError('module.version', 'is required');
  }
  // YAML reads a bare `1.2` as a number.
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ManifestError('module.version', `must be a string, got ${typeof value}`);
  }
  const normalized = normalizeVersion(String(value));
  if (normalized === null) {
    throw new ManifestError('module.version', `'${String(value)}' is not a valid version`);
  }
  return normalized;
}

function readAuthors(section: Record<string, unknown>): string[] {
  return readList(section, 'authors').map((author, i) => {
    const field = `module.authors[${i}]`;
    if (typeof author !== 'string') {
      throw new ManifestError(field, `must be a string, got ${typeof author}`);
    }
    return checkLength(field, author, { min: 1, max: 32 });
  });
}

function readRequirements(section: Record<string, unknown>): DependencySpecifier[] {
  const seen = new Set<string>();
  return readList(section, 'requirements').map((raw, i) => {
    const field = `module.requirements[${i}]`;
    if (typeof raw !== 'string') {
      throw new ManifestError(field, `must be a string, got ${typeof raw}`);
    }
    let spec: DependencySpecifier;
    try {
      spec = parseRequirement(raw);
    } catch (e) {
      if (e instanceof InvalidInputError) {
        throw new ManifestError(field, e.message, { cause: e });
      }
      throw e;
    }
    if (seen.has(spec.name)) {
      throw new ManifestError(field, `'${spec.name}' is listed more than once`);
    }
    seen.add(spec.name);
    return spec;
  });
}

function readPermissions(section: Record<string, unknown>): PermissionTag[] {
  const tags = new Set<PermissionTag>();
  readList(section, 'permissions').forEach((tag, i) => {
    if (!isPermissionTag(tag)) {
      throw new ManifestError(`module.permissions[${i}]`, `unknown permission '${String(tag)}'`);
    }
    tags.add(tag);
  });
  return [...tags].sort();
}

function readEntry(section: Record<string, unknown>): string {
  const entry = readString(section, 'entry', { min: 1, max: 256 }, DEFAULT_ENTRY);
  if (entry.startsWith('/') || entry.split(/[\\/]/).includes('..')) {
    throw new ManifestError('module.entry', `must be a path inside the module directory, got '${entry}'`);
  }
  return entry;
}

/**
 * Parse and validate a manifest from YAML text or an already-decoded mapping.
 *
 * The result is frozen. Parsing the same content twice gives deep-equal
 * manifests.
 */
export function parseManifest(
  raw: string | Record<string, unknown>,
  options?: ParseManifestOptions,
): ModuleManifest {
  let document: unknown = raw;
  if (typeof raw === 'string') {
    try {
      document = yaml.load(raw);
    } catch (e) {
      throw new ManifestError('manifest', `invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  if (!isMapping(document)) {
    throw new ManifestError('manifest', 'must be a mapping');
  }

  const manifestVersion = document['manifest_version'];
  if (manifestVersion === undefined || manifestVersion === null) {
    throw new ManifestError('manifest_version', 'is required');
  }
  if (typeof manifestVersion !== 'number' || !SUPPORTED_MANIFEST_VERSIONS.includes(manifestVersion)) {
    throw new UnsupportedManifestVersionError(manifestVersion, SUPPORTED_MANIFEST_VERSIONS);
  }

  const section = document['module'];
  if (!isMapping(section)) {
    throw new ManifestError('module', 'must be a mapping');
  }

  const id = readString(section, 'id', { min: 1, max: 32 });
  if (!ID_RE.test(id)) {
    throw new ManifestError('module.id', `'${id}' must match ${ID_RE.source}`);
  }
  if (options?.expectedId !== undefined && id !== options.expectedId) {
    throw new ManifestError('module.id', `'${id}' does not match the module directory '${options.expectedId}'`);
  }

  const manifest: ModuleManifest = {
    id,
    name: readString(section, 'name', { min: 1, max: 64 }),
    description: readString(section, 'description', { min: 0, max: 128 }, ''),
    version: readVersion(section),
    license: readString(section, 'license', { min: 1, max: 64 }, 'unspecified'),
    authors: readAuthors(section),
    requirements: readRequirements(section),
    permissions: readPermissions(section),
    entry: readEntry(section),
  };
  return deepFreeze(manifest);
}

export function loadManifestFile(path: string, options?: ParseManifestOptions): ModuleManifest {
  if (!existsSync(path)) {
    throw new ManifestError('manifest', `file not found: ${path}`);
  }
  return parseManifest(readFileSync(path, 'utf-8'), options);
}
