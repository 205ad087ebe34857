/**
 * Requirement strings and version normalisation.
 *
 * Two notations are accepted:
 *   npm form         `chalk@^4.1.0`, `@scope/pkg@1.x`, `left-pad`
 *   comparator form  `requests>=2.0`, `lib==1.4`, `lib>=1.0,<2.0`, `lib~=1.4`
 *
 * Comparator versions may be partial (`2`, `2.0`) and are padded to full
 * semver. The result is always a range `semver` accepts.
 */

import semver from 'semver';
import { InvalidInputError } from '../errors.js';
import type { DependencySpecifier } from './types.js';

const NAME_RE = /^((?:@[A-Za-z0-9][\w.-]*\/)?[A-Za-z0-9][\w.-]*)\s*(.*)$/;
const VERSION_RE = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;
const COMPARATOR_RE = /^(===|==|~=|!=|>=|<=|>|<|=)\s*(\S+)$/;

/**
 * Pad a partial version to `major.minor.patch`. Returns null when the input
 * is not a version.
 */
export function normalizeVersion(input: string): string | null {
  const m = VERSION_RE.exec(input.trim());
  if (!m) return null;
  const [, major, minor, patch, pre, build] = m;
  const candidate = `${major}.${minor ?? '0'}.${patch ?? '0'}${pre ?? ''}${build ?? ''}`;
  return semver.valid(candidate);
}

function requireVersion(version: string, raw: string): string {
  const normalized = normalizeVersion(version);
  if (normalized === null) {
    throw new InvalidInputError(`'${version}' in requirement '${raw}' is not a version`);
  }
  return normalized;
}

function compatibleRelease(version: string, raw: string): string {
  const segments = version.split('.').length;
  if (segments < 2) {
    throw new InvalidInputError(`'~=' needs at least two version segments in requirement '${raw}'`);
  }
  const lower = requireVersion(version, raw);
  const parsed = semver.parse(lower);
  if (parsed === null) {
    throw new InvalidInputError(`'${version}' in requirement '${raw}' is not a version`);
  }
  const upper = segments === 2 ? `${parsed.major + 1}.0.0` : `${parsed.major}.${parsed.minor + 1}.0`;
  return `>=${lower} <${upper}`;
}

function translateComparator(part: string, raw: string): string {
  const m = COMPARATOR_RE.exec(part);
  if (!m) {
    throw new InvalidInputError(`Cannot read constraint '${part}' in requirement '${raw}'`);
  }
  const [, op, version] = m;
  switch (op) {
    case '~=':
      return compatibleRelease(version, raw);
    case '!=':
      throw new InvalidInputError(`Exclusions ('!=') are not supported in requirement '${raw}'`);
    case '==':
    case '===':
    case '=':
      if (version.includes('*')) {
        return version.replace(/\*/g, 'x');
      }
      return requireVersion(version, raw);
    default:
      return `${op}${requireVersion(version, raw)}`;
  }
}

export function parseRequirement(raw: string): DependencySpecifier {
  const text = raw.trim();
  const m = NAME_RE.exec(text);
  if (!m) {
    throw new InvalidInputError(`'${raw}' does not start with a package name`);
  }
  const name = m[1];
  const rest = m[2].trim();

  let range: string;
  if (rest === '') {
    range = '*';
  } else if (rest.startsWith('@')) {
    range = rest.slice(1).trim() || '*';
  } else {
    range = rest
      .split(',')
      .map((part) => translateComparator(part.trim(), raw))
      .join(' ');
  }

  if (semver.validRange(range) === null) {
    throw new InvalidInputError(`'${range}' in requirement '${raw}' is not a valid version range`);
  }
  return { name, range, raw: text };
}

/**
 * Whether two ranges admit at least one common version.
 */
export function rangesIntersect(a: string, b: string): boolean {
  return semver.intersects(a, b);
}
