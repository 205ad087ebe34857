import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadManifestFile, parseManifest } from '../../src/manifest/parser.js';
import { ManifestError, UnsupportedManifestVersionError } from '../../src/errors.js';
import { manifestOf } from '../helpers.js';

const WEATHER_YAML = `
manifest_version: 1
module:
  id: weather
  name: Weather
  description: Forecasts on demand
  version: "1.2"
  license: MIT
  authors: [Ada, Grace]
  requirements:
    - "weather_api>=3.0"
  permissions: [send_messages, read_messages, send_messages]
`;

function fieldOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (e instanceof ManifestError) return e.field;
    throw e;
  }
  throw new Error('expected a ManifestError');
}

describe('parseManifest', () => {
  it('parses a complete YAML manifest', () => {
    const manifest = parseManifest(WEATHER_YAML);
    expect(manifest).toEqual({
      id: 'weather',
      name: 'Weather',
      description: 'Forecasts on demand',
      version: '1.2.0',
      license: 'MIT',
      authors: ['Ada', 'Grace'],
      requirements: [{ name: 'weather_api', range: '>=3.0.0', raw: 'weather_api>=3.0' }],
      permissions: ['read_messages', 'send_messages'],
      entry: 'index.js',
    });
  });

  it('is deterministic', () => {
    expect(parseManifest(WEATHER_YAML)).toEqual(parseManifest(WEATHER_YAML));
  });

  it('returns a frozen manifest', () => {
    const manifest = parseManifest(WEATHER_YAML);
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.permissions)).toBe(true);
  });

  it('applies defaults for optional fields', () => {
    const manifest = parseManifest(manifestOf('greeter'));
    expect(manifest.description).toBe('');
    expect(manifest.license).toBe('unspecified');
    expect(manifest.authors).toEqual([]);
    expect(manifest.requirements).toEqual([]);
    expect(manifest.permissions).toEqual([]);
  });

  it('reads numeric versions written without quotes', () => {
    expect(parseManifest(manifestOf('greeter', { version: 2 })).version).toBe('2.0.0');
    expect(parseManifest('manifest_version: 1\nmodule: {id: greeter, name: G, version: 1.5}').version).toBe('1.5.0');
  });

  it('rejects unsupported manifest versions', () => {
    expect(() => parseManifest({ ...manifestOf('greeter'), manifest_version: 2 })).toThrow(
      UnsupportedManifestVersionError,
    );
  });

  it('requires manifest_version', () => {
    expect(fieldOf(() => parseManifest({ module: { id: 'greeter', name: 'G', version: '1' } }))).toBe(
      'manifest_version',
    );
  });

  it('requires a module section', () => {
    expect(fieldOf(() => parseManifest({ manifest_version: 1 }))).toBe('module');
  });

  it('names the missing required field', () => {
    expect(fieldOf(() => parseManifest({ manifest_version: 1, module: { id: 'a', version: '1' } }))).toBe(
      'module.name',
    );
    expect(fieldOf(() => parseManifest({ manifest_version: 1, module: { name: 'A', version: '1' } }))).toBe(
      'module.id',
    );
  });

  it('rejects ids outside the allowed alphabet', () => {
    expect(fieldOf(() => parseManifest(manifestOf('Weather')))).toBe('module.id');
    expect(fieldOf(() => parseManifest(manifestOf('weather-2')))).toBe('module.id');
    expect(fieldOf(() => parseManifest(manifestOf('a'.repeat(33))))).toBe('module.id');
  });

  it('rejects an id that does not match the directory', () => {
    expect(() => parseManifest(manifestOf('weather'), { expectedId: 'forecast' })).toThrow(
      /does not match the module directory 'forecast'/,
    );
  });

  it('enforces field lengths', () => {
    expect(fieldOf(() => parseManifest(manifestOf('a', { name: '' })))).toBe('module.name');
    expect(fieldOf(() => parseManifest(manifestOf('a', { description: 'x'.repeat(129) })))).toBe('module.description');
    expect(fieldOf(() => parseManifest(manifestOf('a', { authors: ['x'.repeat(33)] })))).toBe('module.authors[0]');
  });

  it('rejects invalid versions', () => {
    expect(fieldOf(() => parseManifest(manifestOf('a', { version: 'soon' })))).toBe('module.version');
  });

  it('points at the offending requirement', () => {
    const raw = manifestOf('a', { requirements: ['chalk@^4', 'lodash', 'broken>=nope'] });
    expect(fieldOf(() => parseManifest(raw))).toBe('module.requirements[2]');
  });

  it('rejects a package listed twice', () => {
    const raw = manifestOf('a', { requirements: ['chalk@^4', 'chalk>=4.1'] });
    expect(() => parseManifest(raw)).toThrow(/'chalk' is listed more than once/);
  });

  it('rejects unknown permissions', () => {
    const raw = manifestOf('a', { permissions: ['send_messages', 'launch_rockets'] });
    expect(fieldOf(() => parseManifest(raw))).toBe('module.permissions[1]');
  });

  it('rejects entry paths that leave the module directory', () => {
    expect(fieldOf(() => parseManifest(manifestOf('a', { entry: '../other/index.js' })))).toBe('module.entry');
    expect(fieldOf(() => parseManifest(manifestOf('a', { entry: '/etc/passwd' })))).toBe('module.entry');
  });

  it('reports invalid YAML', () => {
    expect(fieldOf(() => parseManifest('module: [unclosed'))).toBe('manifest');
  });
});

describe('loadManifestFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'manifest-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads a manifest from disk', () => {
    const path = join(tempDir, 'manifest.yaml');
    writeFileSync(path, WEATHER_YAML);
    expect(loadManifestFile(path).id).toBe('weather');
  });

  it('reports a missing file', () => {
    expect(() => loadManifestFile(join(tempDir, 'missing.yaml'))).toThrow(/file not found/);
  });
});
