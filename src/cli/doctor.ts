/**
 * doctor.ts - Environment health check for hotmic
 *
 * Checks that all required and optional dependencies are available:
 * - Node.js version compatibility
 * - ffmpeg (required for recording)
 * - whisper.cpp binary and a speech model (local backend)
 * - API key (cloud backend)
 * - Clipboard and keystroke tooling for the current platform
 * - Whether the active backend is ready to run
 */

import { runCommand } from '../main/platform/childProcess.js';
import type { SettingsReader } from '../main/settings/SettingsManager.js';
import type { LocalWhisperProvider } from '../main/transcription/LocalWhisperProvider.js';
import type { TranscriptionCoordinator } from '../main/transcription/TranscriptionCoordinator.js';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

/** Resolves with the command's output, or null if it could not run */
export type QuietExec = (command: string, args: string[]) => Promise<string | null>;

export interface DoctorContext {
  settings: SettingsReader;
  coordinator: Pick<TranscriptionCoordinator, 'activeMode' | 'validateConfiguration'>;
  models: Pick<LocalWhisperProvider, 'listDownloadedModels' | 'resolveModel'>;
  platform?: NodeJS.Platform;
  nodeVersion?: string;
  exec?: QuietExec;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Execute a command and return its output, or null on failure.
 * Some tools (whisper-cli) print their usage on stderr.
 */
export const execQuiet: QuietExec = async (command, args) => {
  try {
    const { stdout, stderr } = await runCommand(command, args, { timeoutMs: 5000 });
    return stdout.toString('utf8').trim() || stderr.trim();
  } catch {
    return null;
  }
};

/**
 * Parse a semver string into [major, minor, patch].
 */
export function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function installHint(platform: NodeJS.Platform, pkg: string): string {
  return platform === 'darwin' ? `brew install ${pkg}` : `apt install ${pkg} (or your package manager)`;
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: 'hotmic requires Node.js >= 20.0.0',
    };
  }

  if (parsed[0] >= 20) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= 20.0.0)` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: 'hotmic requires Node.js >= 20.0.0. Upgrade at https://nodejs.org',
  };
}

export async function checkFfmpeg(exec: QuietExec, platform: NodeJS.Platform): Promise<DoctorCheck> {
  const stdout = await exec('ffmpeg', ['-version']);

  if (stdout === null) {
    return {
      name: 'ffmpeg',
      status: 'fail',
      message: 'Not found on PATH',
      hint: `Install via: ${installHint(platform, 'ffmpeg')}`,
    };
  }

  // First line reads "ffmpeg version 6.1.1 ..."
  const versionMatch = stdout.match(/ffmpeg version (\S+)/);
  return {
    name: 'ffmpeg',
    status: 'pass',
    message: `Installed (${versionMatch ? versionMatch[1] : 'unknown'})`,
  };
}

export async function checkWhisperBinary(exec: QuietExec, settings: SettingsReader): Promise<DoctorCheck> {
  const binary = settings.get('whisperBinary');
  const required = settings.get('transcriptionMode') === 'local';
  const output = await exec(binary, ['--help']);

  if (output === null) {
    return {
      name: 'whisper.cpp',
      status: required ? 'fail' : 'warn',
      message: `${binary} not found on PATH`,
      hint: 'Build whisper.cpp and put whisper-cli on PATH, or run `hotmic config set whisperBinary <path>`',
    };
  }

  return { name: 'whisper.cpp', status: 'pass', message: `${binary} runs` };
}

export async function checkSpeechModel(
  models: DoctorContext['models'],
  settings: SettingsReader
): Promise<DoctorCheck> {
  const directory = settings.getModelsDirectory();
  const required = settings.get('transcriptionMode') === 'local';
  const downloaded = await models.listDownloadedModels();

  if (downloaded.length === 0) {
    return {
      name: 'Speech model',
      status: required ? 'fail' : 'warn',
      message: 'No model files found',
      hint: `Models directory: ${directory}\nPlace a ggml-*.bin file from whisper.cpp there`,
    };
  }

  const resolved = await models.resolveModel();
  const selected = settings.get('selectedModel');
  if (selected && resolved && resolved.id !== selected) {
    return {
      name: 'Speech model',
      status: 'warn',
      message: `Selected model "${selected}" missing, using "${resolved.id}"`,
      hint: `Available: ${downloaded.join(', ')}`,
    };
  }

  return {
    name: 'Speech model',
    status: 'pass',
    message: `${resolved ? resolved.id : downloaded[0]} (${downloaded.length} installed in ${directory})`,
  };
}

export function checkApiKey(settings: SettingsReader): DoctorCheck {
  if (settings.getApiKey()) {
    return { name: 'API key', status: 'pass', message: 'Configured' };
  }

  return {
    name: 'API key',
    status: settings.get('transcriptionMode') === 'cloud' ? 'fail' : 'warn',
    message: 'Not set',
    hint: 'Needed for cloud transcription. Set HOTMIC_API_KEY or run `hotmic config set cloudApiKey <key>`',
  };
}

export async function checkInputTooling(exec: QuietExec, platform: NodeJS.Platform): Promise<DoctorCheck> {
  if (platform === 'darwin') {
    const output = await exec('osascript', ['-l', 'JavaScript', '-e', '"ok"']);
    return output === null
      ? { name: 'Text insertion', status: 'fail', message: 'osascript is not available' }
      : {
          name: 'Text insertion',
          status: 'pass',
          message: 'osascript available',
          hint: 'Grant Accessibility access to your terminal to paste automatically',
        };
  }

  if (platform === 'linux') {
    const [xclip, xdotool] = await Promise.all([
      exec('xclip', ['-version']),
      exec('xdotool', ['version']),
    ]);
    const missing = [xclip === null ? 'xclip' : null, xdotool === null ? 'xdotool' : null].filter(
      (name): name is string => name !== null
    );
    if (missing.length > 0) {
      return {
        name: 'Text insertion',
        status: 'fail',
        message: `Missing ${missing.join(' and ')}`,
        hint: `Install via: ${installHint(platform, missing.join(' '))}`,
      };
    }
    return { name: 'Text insertion', status: 'pass', message: 'xclip and xdotool available' };
  }

  return {
    name: 'Text insertion',
    status: 'fail',
    message: `Not supported on ${platform}`,
    hint: '`hotmic transcribe` still works',
  };
}

export async function checkConfiguration(coordinator: DoctorContext['coordinator']): Promise<DoctorCheck> {
  const mode = coordinator.activeMode;
  const problem = await coordinator.validateConfiguration();
  if (problem) {
    return { name: 'Configuration', status: 'fail', message: `${mode} backend not ready`, hint: problem };
  }
  return { name: 'Configuration', status: 'pass', message: `${mode} backend ready` };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(context: DoctorContext): Promise<DoctorResult> {
  const exec = context.exec ?? execQuiet;
  const platform = context.platform ?? process.platform;

  const checks = await Promise.all([
    checkNodeVersion(context.nodeVersion ?? process.version),
    checkFfmpeg(exec, platform),
    checkWhisperBinary(exec, context.settings),
    checkSpeechModel(context.models, context.settings),
    checkApiKey(context.settings),
    checkInputTooling(exec, platform),
    checkConfiguration(context.coordinator),
  ]);

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
