export { loadManifestFile, parseManifest } from './parser.js';
export { normalizeVersion, parseRequirement, rangesIntersect } from './requirement.js';
export { DEFAULT_ENTRY, SUPPORTED_MANIFEST_VERSIONS } from './types.js';
export type { DependencySpecifier, ModuleManifest, ParseManifestOptions } from './types.js';
