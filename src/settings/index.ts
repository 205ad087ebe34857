export { buildSchema, inferSettingType, isSettingType, parseSettingsSchema } from './schema.js';
export { HOST_SETTINGS, SettingsStore } from './store.js';
export type { SettingsStoreOptions } from './store.js';
export { validateSettingValue } from './validator.js';
export { CONSTRAINT_KEYS, SETTING_TYPES } from './types.js';
export type {
  ConstraintKey,
  ObserveOptions,
  ScopedSettings,
  SettingConstraints,
  SettingObserver,
  SettingType,
  SettingView,
  SettingsSchemaEntry,
} from './types.js';
