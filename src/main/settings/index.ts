/**
 * Settings Module
 *
 * Exports the SettingsManager for persistent settings storage.
 */

export { SettingsManager, DEFAULT_SETTINGS, API_KEY_ENV_VAR, isSettingsKey } from './SettingsManager.js';

export type { SettingsReader } from './SettingsManager.js';
