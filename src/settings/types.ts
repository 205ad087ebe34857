/**
 * Settings schema types.
 */

import type { TSchema } from '@sinclair/typebox';

export const SETTING_TYPES = ['string', 'integer', 'number', 'boolean', 'array', 'object'] as const;

export type SettingType = (typeof SETTING_TYPES)[number];

export const CONSTRAINT_KEYS = [
  'enum',
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'minLength',
  'maxLength',
  'pattern',
  'minItems',
  'maxItems',
  'items',
] as const;

export type ConstraintKey = (typeof CONSTRAINT_KEYS)[number];

export type SettingConstraints = Readonly<Partial<Record<ConstraintKey, unknown>>>;

/**
 * One declared setting. `keyPath` is `<namespace>.<key>[.<key>...]`; host
 * entries have no namespace.
 */
export interface SettingsSchemaEntry {
  readonly keyPath: string;
  readonly type: SettingType;
  readonly default: unknown;
  readonly constraints: SettingConstraints;
  readonly description: string;
  /** TypeBox schema values are checked against. */
  readonly schema: TSchema;
}

export interface SettingView {
  readonly keyPath: string;
  readonly type: SettingType;
  readonly value: unknown;
  readonly default: unknown;
  readonly description: string;
  readonly constraints: SettingConstraints;
}

export type SettingObserver = (oldValue: unknown, newValue: unknown) => void;

export interface ObserveOptions {
  /** Call the observer even when the new value equals the old one. */
  alwaysTrigger?: boolean;
}

/**
 * A module's view of its own namespace. Keys are relative to the namespace.
 */
export interface ScopedSettings {
  readonly namespace: string;
  has(key: string): boolean;
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  observe(key: string, observer: SettingObserver, options?: ObserveOptions): () => void;
  entries(): SettingView[];
}
