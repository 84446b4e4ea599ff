/**
 * `hotmic config` - read and write persisted settings.
 */

import { ZodError } from 'zod';
import type { AppSettings } from '../shared/types.js';
import { DEFAULT_SETTINGS, isSettingsKey } from '../main/settings/SettingsManager.js';
import type { SettingsManager } from '../main/settings/SettingsManager.js';
import { HotmicCliError } from './errors.js';

type ConfigStore = Pick<SettingsManager, 'get' | 'getAll' | 'setFromString'>;

export function maskSecret(value: string): string {
  if (value.length === 0) return '(not set)';
  if (value.length <= 8) return '****';
  return `****${value.slice(-4)}`;
}

export function formatSettingValue<K extends keyof AppSettings>(key: K, value: AppSettings[K]): string {
  if (key === 'cloudApiKey' && typeof value === 'string') {
    return maskSecret(value);
  }
  if (value === null) return '(none)';
  if (value === '') return '(default)';
  return String(value);
}

function requireKey(key: string): keyof AppSettings {
  if (!isSettingsKey(key)) {
    throw new HotmicCliError(
      `Unknown setting "${key}". Known settings: ${Object.keys(DEFAULT_SETTINGS).join(', ')}`,
      'user'
    );
  }
  return key;
}

export function listSettings(store: ConfigStore): string[] {
  const all = store.getAll();
  return Object.keys(DEFAULT_SETTINGS)
    .filter(isSettingsKey)
    .map((key) => `${key} = ${formatSettingValue(key, all[key])}`);
}

export function getSetting(store: ConfigStore, key: string): string {
  const settingsKey = requireKey(key);
  return formatSettingValue(settingsKey, store.get(settingsKey));
}

export function setSetting(store: ConfigStore, key: string, raw: string): string {
  const settingsKey = requireKey(key);
  try {
    store.setFromString(settingsKey, raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      throw new HotmicCliError(`Invalid value for ${settingsKey}: ${issue ? issue.message : error.message}`, 'user');
    }
    throw error;
  }
  return formatSettingValue(settingsKey, store.get(settingsKey));
}
