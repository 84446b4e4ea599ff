/**
 * In-memory SettingsReader for provider and coordinator tests.
 */

import type { SettingsReader } from '../../src/main/settings/SettingsManager.js';
import { DEFAULT_SETTINGS } from '../../src/main/settings/SettingsManager.js';
import type { AppSettings } from '../../src/shared/types.js';

export function createSettings(overrides: Partial<AppSettings> = {}): SettingsReader {
  const values: AppSettings = { ...DEFAULT_SETTINGS, ...overrides };
  return {
    get: (key) => values[key],
    getApiKey: () => (values.cloudApiKey.length > 0 ? values.cloudApiKey : null),
    getModelsDirectory: () => values.modelsDirectory || '/tmp/hotmic-test/models',
  };
}
