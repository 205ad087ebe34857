/**
 * Checks setting values against their declared TypeBox schema.
 */

import { Value, type ValueError } from '@sinclair/typebox/value';
import type { SettingsErrorDetail } from '../errors.js';
import type { SettingsSchemaEntry } from './types.js';

function toDetail(keyPath: string, error: ValueError): SettingsErrorDetail {
  const where = error.path === '' ? '' : `${error.path}: `;
  return { keyPath, message: `${where}${error.message}`, value: error.value };
}

export function validateSettingValue(entry: SettingsSchemaEntry, value: unknown): SettingsErrorDetail[] {
  if (Value.Check(entry.schema, value)) return [];
  const errors: SettingsErrorDetail[] = [];
  for (const error of Value.Errors(entry.schema, value)) {
    errors.push(toDetail(entry.keyPath, error));
  }
  return errors;
}
