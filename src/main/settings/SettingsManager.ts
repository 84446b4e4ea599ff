/**
 * SettingsManager - Persistent settings for hotmic
 *
 * Handles:
 * - Persistent settings storage with conf (schema validated)
 * - API key lookup (HOTMIC_API_KEY environment variable first, then the store)
 * - First-launch bookkeeping
 * - Parsing of string values typed on the command line
 *
 * The transcription path only ever sees the read-only `SettingsReader` view.
 */

import Conf, { type Schema } from 'conf';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { AppSettings } from '../../shared/types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('Settings');

// ============================================================================
// Types
// ============================================================================

/**
 * Read-only settings view consumed by the transcription path.
 */
export interface SettingsReader {
  get<K extends keyof AppSettings>(key: K): AppSettings[K];
  getApiKey(): string | null;
  getModelsDirectory(): string;
}

// ============================================================================
// Constants
// ============================================================================

export const API_KEY_ENV_VAR = 'HOTMIC_API_KEY';

export const DEFAULT_SETTINGS: AppSettings = {
  transcriptionMode: 'local',
  language: '',
  cloudBaseURL: '',
  cloudModel: '',
  cloudTemperature: 0,
  cloudApiKey: '',
  selectedModel: null,
  modelsDirectory: '',
  whisperBinary: 'whisper-cli',
  audioDevice: 'default',
  hasLaunchedBefore: false,
  debugMode: false,
};

/**
 * Schema for conf validation
 */
const SETTINGS_SCHEMA: Schema<AppSettings> = {
  transcriptionMode: { type: 'string', enum: ['local', 'cloud'] },
  language: { type: 'string' },
  cloudBaseURL: { type: 'string' },
  cloudModel: { type: 'string' },
  cloudTemperature: { type: 'number', minimum: 0, maximum: 1 },
  cloudApiKey: { type: 'string' },
  selectedModel: { type: ['string', 'null'] },
  modelsDirectory: { type: 'string' },
  whisperBinary: { type: 'string' },
  audioDevice: { type: 'string' },
  hasLaunchedBefore: { type: 'boolean' },
  debugMode: { type: 'boolean' },
};

/**
 * Parsers for values arriving as strings (`hotmic config set <key> <value>`).
 */
const VALUE_PARSERS: { [K in keyof AppSettings]: z.ZodType<AppSettings[K], z.ZodTypeDef, unknown> } = {
  transcriptionMode: z.enum(['local', 'cloud']),
  language: z.string().trim().regex(/^([a-z]{2})?$/, 'Use a two-letter language code, or an empty string for auto-detect'),
  cloudBaseURL: z.union([z.literal(''), z.string().url()]),
  cloudModel: z.string().trim(),
  cloudTemperature: z.coerce.number().min(0).max(1),
  cloudApiKey: z.string().trim(),
  selectedModel: z.preprocess((value) => (value === '' || value === 'null' ? null : value), z.string().nullable()),
  modelsDirectory: z.string(),
  whisperBinary: z.string().min(1),
  audioDevice: z.string().min(1),
  hasLaunchedBefore: z.preprocess((value) => value === true || value === 'true', z.boolean()),
  debugMode: z.preprocess((value) => value === true || value === 'true', z.boolean()),
};

export function isSettingsKey(key: string): key is keyof AppSettings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

// ============================================================================
// SettingsManager
// ============================================================================

export class SettingsManager implements SettingsReader {
  private readonly store: Conf<AppSettings>;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.env = options.env ?? process.env;
    this.store = new Conf<AppSettings>({
      projectName: 'hotmic',
      cwd: options.cwd,
      defaults: DEFAULT_SETTINGS,
      schema: SETTINGS_SCHEMA,
    });
  }

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.store.get(key);
  }

  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void {
    this.store.set(key, value);
    logger.debug(`${key} updated`);
  }

  /**
   * Parse and store a value typed as a string. Throws a ZodError on bad input.
   */
  setFromString<K extends keyof AppSettings>(key: K, raw: string): void {
    this.set(key, VALUE_PARSERS[key].parse(raw));
  }

  getAll(): AppSettings {
    return { ...this.store.store };
  }

  reset(): void {
    this.store.clear();
    logger.info('Settings reset to defaults');
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * HOTMIC_API_KEY takes precedence over the stored key.
   */
  getApiKey(): string | null {
    const fromEnv = this.env[API_KEY_ENV_VAR]?.trim();
    if (fromEnv) {
      return fromEnv;
    }
    const stored = this.store.get('cloudApiKey').trim();
    return stored.length > 0 ? stored : null;
  }

  getModelsDirectory(): string {
    const configured = this.store.get('modelsDirectory').trim();
    return configured.length > 0 ? configured : join(homedir(), '.hotmic', 'models');
  }

  /**
   * First launch always starts on the on-device backend.
   */
  applyFirstLaunchDefaults(): boolean {
    if (this.store.get('hasLaunchedBefore')) {
      return false;
    }
    this.set('transcriptionMode', 'local');
    this.set('hasLaunchedBefore', true);
    logger.info('First launch: defaulting to local transcription');
    return true;
  }
}
