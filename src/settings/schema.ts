/**
 * Settings schema parsing.
 *
 * A schema is a YAML mapping. A mapping that has a `default` key declares one
 * setting; any other mapping is a group whose keys nest under it. A bare
 * scalar or list is shorthand for `{ default: <value> }`:
 *
 *   greeting: hello                 # string, inferred
 *   limits:
 *     per_minute:
 *       default: 10
 *       minimum: 1
 *       description: Messages allowed per user per minute
 *
 * Every key path is prefixed with the owning namespace, so the schema above
 * declared by `greeter` yields `greeter.greeting` and
 * `greeter.limits.per_minute`. Object-valued settings need an explicit
 * `type: object`, since a bare mapping is read as a group.
 */

import { Type, type TSchema } from '@sinclair/typebox';
import yaml from 'js-yaml';
import { InvalidInputError, SettingsValidationError, type SettingsErrorDetail } from '../errors.js';
import { isMapping } from '../utils/index.js';
import {
  CONSTRAINT_KEYS,
  SETTING_TYPES,
  type ConstraintKey,
  type SettingConstraints,
  type SettingType,
  type SettingsSchemaEntry,
} from './types.js';
import { validateSettingValue } from './validator.js';

const KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
// Assigning it would replace the prototype of the group holding it.
const FORBIDDEN_KEYS: ReadonlySet<string> = new Set(['__proto__']);

const NUMERIC_KEYS = ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum', 'multipleOf'] as const;
const LENGTH_KEYS = ['minLength', 'maxLength'] as const;
const ITEM_COUNT_KEYS = ['minItems', 'maxItems'] as const;

type NumericOptions = { [K in (typeof NUMERIC_KEYS)[number]]?: number };
type LengthOptions = { [K in (typeof LENGTH_KEYS)[number]]?: number };
type ItemCountOptions = { [K in (typeof ITEM_COUNT_KEYS)[number]]?: number };

const SCALARS: readonly SettingType[] = ['string', 'integer', 'number', 'boolean'];
const NUMBERS: readonly SettingType[] = ['integer', 'number'];

const APPLIES_TO: Record<ConstraintKey, readonly SettingType[]> = {
  enum: SCALARS,
  minimum: NUMBERS,
  maximum: NUMBERS,
  exclusiveMinimum: NUMBERS,
  exclusiveMaximum: NUMBERS,
  multipleOf: NUMBERS,
  minLength: ['string'],
  maxLength: ['string'],
  pattern: ['string'],
  minItems: ['array'],
  maxItems: ['array'],
  items: ['array'],
};

const ENTRY_KEYS: ReadonlySet<string> = new Set(['type', 'default', 'description', ...CONSTRAINT_KEYS]);

export function isSettingType(value: unknown): value is SettingType {
  return typeof value === 'string' && (SETTING_TYPES as readonly string[]).includes(value);
}

function isConstraintKey(value: string): value is ConstraintKey {
  return (CONSTRAINT_KEYS as readonly string[]).includes(value);
}

/**
 * The setting type a default value implies, or null for values no setting
 * can hold (null, functions, dates).
 */
export function inferSettingType(value: unknown): SettingType | null {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (Array.isArray(value)) return 'array';
  if (isMapping(value) && Object.getPrototypeOf(value) === Object.prototype) return 'object';
  return null;
}

function numericOptions(c: Record<string, unknown>): NumericOptions {
  const opts: NumericOptions = {};
  for (const key of NUMERIC_KEYS) {
    const value = c[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidInputError(`'${key}' must be a number`);
    }
    opts[key] = value;
  }
  if (opts.multipleOf !== undefined && opts.multipleOf <= 0) {
    throw new InvalidInputError(`'multipleOf' must be greater than 0`);
  }
  return opts;
}

function countOptions<K extends string>(c: Record<string, unknown>, keys: readonly K[]): { [P in K]?: number } {
  const opts: { [P in K]?: number } = {};
  for (const key of keys) {
    const value = c[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new InvalidInputError(`'${key}' must be a non-negative integer`);
    }
    opts[key] = value;
  }
  return opts;
}

function stringSchema(c: Record<string, unknown>): TSchema {
  const lengths: LengthOptions = countOptions(c, LENGTH_KEYS);
  const pattern = c['pattern'];
  if (pattern === undefined) return Type.String(lengths);
  if (typeof pattern !== 'string') {
    throw new InvalidInputError(`'pattern' must be a string`);
  }
  try {
    new RegExp(pattern);
  } catch (e) {
    throw new InvalidInputError(`'pattern' is not a valid regular expression: ${e instanceof Error ? e.message : String(e)}`);
  }
  return Type.String({ ...lengths, pattern });
}

function enumSchema(type: SettingType, values: unknown): TSchema {
  if (!Array.isArray(values) || values.length === 0) {
    throw new InvalidInputError(`'enum' must be a non-empty list`);
  }
  const literals = values.map((value) => {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new InvalidInputError(`'enum' values must be scalars, got ${JSON.stringify(value)}`);
    }
    const actual = inferSettingType(value);
    if (actual !== type && !(type === 'number' && actual === 'integer')) {
      throw new InvalidInputError(`'enum' value ${JSON.stringify(value)} is not of type '${type}'`);
    }
    return Type.Literal(value);
  });
  return Type.Union(literals);
}

function itemSchema(items: unknown): TSchema {
  if (!isMapping(items)) {
    throw new InvalidInputError(`'items' must be a mapping`);
  }
  const { type, description: _description, ...constraints } = items;
  if (!isSettingType(type)) {
    throw new InvalidInputError(`'items.type' must be one of ${SETTING_TYPES.join(', ')}`);
  }
  return buildSchema(type, constraints);
}

/**
 * Translate a declared type and its constraints into a TypeBox schema.
 */
export function buildSchema(type: SettingType, constraints: Record<string, unknown>): TSchema {
  for (const key of Object.keys(constraints)) {
    if (!isConstraintKey(key)) {
      throw new InvalidInputError(`unknown constraint '${key}'`);
    }
    if (!APPLIES_TO[key].includes(type)) {
      throw new InvalidInputError(`'${key}' does not apply to type '${type}'`);
    }
  }

  if (constraints['enum'] !== undefined) {
    return enumSchema(type, constraints['enum']);
  }

  switch (type) {
    case 'string':
      return stringSchema(constraints);
    case 'integer':
      return Type.Integer(numericOptions(constraints));
    case 'number':
      return Type.Number(numericOptions(constraints));
    case 'boolean':
      return Type.Boolean();
    case 'array': {
      const counts: ItemCountOptions = countOptions(constraints, ITEM_COUNT_KEYS);
      const items = constraints['items'] === undefined ? Type.Unknown() : itemSchema(constraints['items']);
      return Type.Array(items, counts);
    }
    case 'object':
      return Type.Record(Type.String(), Type.Unknown());
  }
}

function buildEntry(keyPath: string, spec: Record<string, unknown>): SettingsSchemaEntry {
  for (const key of Object.keys(spec)) {
    if (!ENTRY_KEYS.has(key)) {
      throw new InvalidInputError(`unknown schema key '${key}'`);
    }
  }

  const defaultValue = spec['default'];
  let type: SettingType;
  if (spec['type'] === undefined) {
    const inferred = inferSettingType(defaultValue);
    if (inferred === null) {
      throw new InvalidInputError(`cannot infer a type from default ${JSON.stringify(defaultValue)}`);
    }
    type = inferred;
  } else if (isSettingType(spec['type'])) {
    type = spec['type'];
  } else {
    throw new InvalidInputError(`'type' must be one of ${SETTING_TYPES.join(', ')}`);
  }

  const description = spec['description'] ?? '';
  if (typeof description !== 'string') {
    throw new InvalidInputError(`'description' must be a string`);
  }

  const constraints: Partial<Record<ConstraintKey, unknown>> = {};
  for (const key of CONSTRAINT_KEYS) {
    if (spec[key] !== undefined) constraints[key] = spec[key];
  }

  const frozen: SettingConstraints = Object.freeze(constraints);
  return Object.freeze({
    keyPath,
    type,
    default: defaultValue,
    constraints: frozen,
    description,
    schema: buildSchema(type, constraints),
  });
}

function walk(
  node: Record<string, unknown>,
  prefix: string,
  entries: SettingsSchemaEntry[],
  errors: SettingsErrorDetail[],
): void {
  for (const [key, value] of Object.entries(node)) {
    const keyPath = prefix === '' ? key : `${prefix}.${key}`;
    if (!KEY_RE.test(key) || FORBIDDEN_KEYS.has(key)) {
      errors.push({ keyPath, message: `'${key}' is not a valid setting key` });
      continue;
    }
    if (isMapping(value) && !('default' in value)) {
      walk(value, keyPath, entries, errors);
      continue;
    }

    let entry: SettingsSchemaEntry;
    try {
      entry = buildEntry(keyPath, isMapping(value) ? value : { default: value });
    } catch (e) {
      if (e instanceof InvalidInputError) {
        errors.push({ keyPath, message: e.message });
        continue;
      }
      throw e;
    }

    const defaultErrors = validateSettingValue(entry, entry.default);
    if (defaultErrors.length > 0) {
      for (const detail of defaultErrors) {
        errors.push({ ...detail, message: `default does not satisfy its own constraints: ${detail.message}` });
      }
      continue;
    }
    entries.push(entry);
  }
}

/**
 * Parse a settings schema into entries under `namespace`. A null namespace
 * leaves key paths unprefixed (host settings).
 */
export function parseSettingsSchema(namespace: string | null, raw: unknown): SettingsSchemaEntry[] {
  const label = namespace === null ? 'host settings schema' : `settings schema of '${namespace}'`;
  let document: unknown = raw;
  if (typeof raw === 'string') {
    try {
      document = yaml.load(raw);
    } catch (e) {
      throw new SettingsValidationError(`Invalid YAML in ${label}`, [
        { keyPath: namespace ?? '', message: e instanceof Error ? e.message : String(e) },
      ]);
    }
  }
  if (document === null || document === undefined) return [];
  if (!isMapping(document)) {
    throw new SettingsValidationError(`The ${label} must be a mapping`, [
      { keyPath: namespace ?? '', message: 'must be a mapping' },
    ]);
  }

  const entries: SettingsSchemaEntry[] = [];
  const errors: SettingsErrorDetail[] = [];
  walk(document, namespace ?? '', entries, errors);
  if (errors.length > 0) {
    throw new SettingsValidationError(`The ${label} is invalid`, errors);
  }
  return entries;
}
