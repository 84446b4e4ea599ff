/**
 * CLI command helpers: doctor checks, config, one-shot transcription and
 * exit codes.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  checkApiKey,
  checkConfiguration,
  checkFfmpeg,
  checkInputTooling,
  checkNodeVersion,
  checkSpeechModel,
  checkWhisperBinary,
  parseSemver,
  runDoctorChecks,
} from '../../../src/cli/doctor.js';
import type { DoctorContext, QuietExec } from '../../../src/cli/doctor.js';
import { formatSettingValue, getSetting, listSettings, maskSecret, setSetting } from '../../../src/cli/config.js';
import { estimateDurationMs, loadArtifact, severityForFailure, transcribeFile } from '../../../src/cli/transcribe.js';
import { EXIT_SYSTEM_ERROR, EXIT_USER_ERROR, HotmicCliError, exitCodeFor } from '../../../src/cli/errors.js';
import { SettingsManager } from '../../../src/main/settings/SettingsManager.js';
import type { TranscriptionOutcome, TranscriptionRequest } from '../../../src/main/transcription/types.js';
import { createSettings } from '../../helpers/settings.js';

// =============================================================================
// doctor
// =============================================================================

describe('doctor', () => {
  const TOOL_OUTPUT: Record<string, string> = {
    ffmpeg: 'ffmpeg version 6.1.1 Copyright (c) 2000-2023 the FFmpeg developers',
    'whisper-cli': 'usage: whisper-cli [options] file0.wav',
    xclip: 'xclip version 0.13',
    xdotool: 'xdotool version 3.20160805.1',
    osascript: 'ok',
  };

  function createExec(missing: string[] = []) {
    return vi.fn<QuietExec>(async (command) =>
      missing.includes(command) ? null : (TOOL_OUTPUT[command] ?? null)
    );
  }

  function createModels(downloaded: string[]): DoctorContext['models'] {
    return {
      listDownloadedModels: async () => downloaded,
      resolveModel: async () =>
        downloaded.length > 0 ? { id: downloaded[0], path: `/tmp/hotmic-test/models/ggml-${downloaded[0]}.bin` } : null,
    };
  }

  it('parses versions', () => {
    expect(parseSemver('v20.11.1')).toEqual([20, 11, 1]);
    expect(parseSemver('nightly')).toBeNull();
  });

  it('checks the Node.js version', () => {
    expect(checkNodeVersion('v20.11.1')).toEqual({ name: 'Node.js', status: 'pass', message: 'v20.11.1 (>= 20.0.0)' });
    expect(checkNodeVersion('v18.19.0').status).toBe('fail');
    expect(checkNodeVersion('nightly').status).toBe('warn');
  });

  it('reports the ffmpeg version or how to install it', async () => {
    await expect(checkFfmpeg(createExec(), 'linux')).resolves.toEqual({
      name: 'ffmpeg',
      status: 'pass',
      message: 'Installed (6.1.1)',
    });
    await expect(checkFfmpeg(createExec(['ffmpeg']), 'darwin')).resolves.toMatchObject({
      status: 'fail',
      hint: 'Install via: brew install ffmpeg',
    });
  });

  it('requires whisper.cpp only for the local backend', async () => {
    const exec = createExec(['whisper-cli']);

    await expect(checkWhisperBinary(exec, createSettings())).resolves.toMatchObject({ status: 'fail' });
    await expect(checkWhisperBinary(exec, createSettings({ transcriptionMode: 'cloud' }))).resolves.toMatchObject({
      status: 'warn',
      message: 'whisper-cli not found on PATH',
    });
    expect(exec).toHaveBeenCalledWith('whisper-cli', ['--help']);
  });

  it('checks the speech model', async () => {
    await expect(checkSpeechModel(createModels([]), createSettings())).resolves.toMatchObject({
      status: 'fail',
      message: 'No model files found',
    });
    await expect(checkSpeechModel(createModels(['tiny']), createSettings())).resolves.toEqual({
      name: 'Speech model',
      status: 'pass',
      message: 'tiny (1 installed in /tmp/hotmic-test/models)',
    });
    await expect(
      checkSpeechModel(createModels(['tiny', 'base.en']), createSettings({ selectedModel: 'large-v3' }))
    ).resolves.toEqual({
      name: 'Speech model',
      status: 'warn',
      message: 'Selected model "large-v3" missing, using "tiny"',
      hint: 'Available: tiny, base.en',
    });
  });

  it('requires an API key only for the cloud backend', () => {
    expect(checkApiKey(createSettings()).status).toBe('warn');
    expect(checkApiKey(createSettings({ transcriptionMode: 'cloud' })).status).toBe('fail');
    expect(checkApiKey(createSettings({ cloudApiKey: 'test-secret' }))).toEqual({
      name: 'API key',
      status: 'pass',
      message: 'Configured',
    });
  });

  it('checks clipboard and keystroke tooling per platform', async () => {
    await expect(checkInputTooling(createExec(), 'linux')).resolves.toMatchObject({ status: 'pass' });
    await expect(checkInputTooling(createExec(['xdotool']), 'linux')).resolves.toMatchObject({
      status: 'fail',
      message: 'Missing xdotool',
    });
    await expect(checkInputTooling(createExec(), 'darwin')).resolves.toMatchObject({ status: 'pass' });
    await expect(checkInputTooling(createExec(), 'win32')).resolves.toMatchObject({
      status: 'fail',
      message: 'Not supported on win32',
    });
  });

  it('reports whether the active backend is ready', async () => {
    await expect(
      checkConfiguration({ activeMode: 'cloud', validateConfiguration: async () => 'No API key.' })
    ).resolves.toEqual({ name: 'Configuration', status: 'fail', message: 'cloud backend not ready', hint: 'No API key.' });
  });

  it('runs every check and tallies the results', async () => {
    const result = await runDoctorChecks({
      settings: createSettings(),
      coordinator: { activeMode: 'local', validateConfiguration: async () => null },
      models: createModels(['tiny']),
      platform: 'linux',
      nodeVersion: 'v20.11.1',
      exec: createExec(),
    });

    expect(result.checks.map((check) => check.name)).toEqual([
      'Node.js',
      'ffmpeg',
      'whisper.cpp',
      'Speech model',
      'API key',
      'Text insertion',
      'Configuration',
    ]);
    expect(result).toMatchObject({ passed: 6, warned: 1, failed: 0 });
  });
});

// =============================================================================
// config
// =============================================================================

describe('config', () => {
  it('masks secrets', () => {
    expect(maskSecret('')).toBe('(not set)');
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('test-secret')).toBe('****cret');
  });

  it('formats values for display', () => {
    expect(formatSettingValue('selectedModel', null)).toBe('(none)');
    expect(formatSettingValue('language', '')).toBe('(default)');
    expect(formatSettingValue('cloudTemperature', 0)).toBe('0');
  });

  it('lists every setting in order', () => {
    const store = new SettingsManager({ env: {} });

    expect(listSettings(store)).toEqual([
      'transcriptionMode = local',
      'language = (default)',
      'cloudBaseURL = (default)',
      'cloudModel = (default)',
      'cloudTemperature = 0',
      'cloudApiKey = (not set)',
      'selectedModel = (none)',
      'modelsDirectory = (default)',
      'whisperBinary = whisper-cli',
      'audioDevice = default',
      'hasLaunchedBefore = false',
      'debugMode = false',
    ]);
  });

  it('sets and reads back values', () => {
    const store = new SettingsManager({ env: {} });

    expect(setSetting(store, 'cloudTemperature', '0.5')).toBe('0.5');
    expect(setSetting(store, 'cloudApiKey', 'test-secret')).toBe('****cret');
    expect(getSetting(store, 'cloudTemperature')).toBe('0.5');
  });

  it('rejects unknown keys and invalid values as user errors', () => {
    const store = new SettingsManager({ env: {} });

    expect(() => getSetting(store, 'theme')).toThrow(/^Unknown setting "theme"/);
    expect(() => setSetting(store, 'transcriptionMode', 'hybrid')).toThrow(/^Invalid value for transcriptionMode: /);

    let caught: unknown;
    try {
      setSetting(store, 'cloudTemperature', '5');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(HotmicCliError);
    expect(exitCodeFor(caught)).toBe(EXIT_USER_ERROR);
  });
});

// =============================================================================
// transcribe
// =============================================================================

describe('transcribe', () => {
  let workDir: string;
  let audioPath: string;
  const transcribe = vi.fn<(request: TranscriptionRequest) => Promise<TranscriptionOutcome>>();

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'hotmic-cli-'));
    audioPath = join(workDir, 'memo.wav');
    await writeFile(audioPath, Buffer.alloc(44 + 32_000));
    transcribe.mockReset();
    transcribe.mockResolvedValue({ status: 'completed', text: '  Buy milk.  ' });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('estimates WAV duration from the file size', () => {
    expect(estimateDurationMs('memo.wav', 44 + 32_000)).toBe(1000);
    expect(estimateDurationMs('memo.WAV', 44 + 16_000)).toBe(500);
    expect(estimateDurationMs('memo.mp3', 50_000)).toBe(0);
    expect(estimateDurationMs('memo.wav', 44)).toBe(0);
  });

  it('loads the artifact and rejects paths that are not files', async () => {
    await expect(loadArtifact(audioPath)).resolves.toEqual({ path: audioPath, sizeBytes: 32_044, durationMs: 1000 });
    await expect(loadArtifact(join(workDir, 'gone.wav'))).rejects.toMatchObject({
      message: `Audio file not found: ${join(workDir, 'gone.wav')}`,
      severity: 'user',
    });
    await expect(loadArtifact(workDir)).rejects.toMatchObject({ message: `Not a file: ${workDir}`, severity: 'user' });
  });

  it('returns the trimmed text and passes the mode through', async () => {
    await expect(transcribeFile({ transcribe }, audioPath, { mode: 'cloud' })).resolves.toEqual({
      status: 'completed',
      text: 'Buy milk.',
    });
    expect(transcribe.mock.calls[0][0]).toMatchObject({
      artifact: { path: audioPath, sizeBytes: 32_044, durationMs: 1000 },
      mode: 'cloud',
    });
  });

  it('raises failures with a severity that decides the exit code', async () => {
    transcribe.mockResolvedValueOnce({ status: 'failed', failure: { kind: 'noModelAvailable' } });
    await expect(transcribeFile({ transcribe }, audioPath)).rejects.toMatchObject({
      message: 'No speech model installed.',
      severity: 'user',
    });

    transcribe.mockResolvedValueOnce({ status: 'failed', failure: { kind: 'networkError', detail: 'timed out' } });
    await expect(transcribeFile({ transcribe }, audioPath)).rejects.toMatchObject({
      message: "Couldn't connect: timed out",
      severity: 'system',
    });
  });

  it('treats silence as a user error', async () => {
    transcribe.mockResolvedValueOnce({ status: 'completed', text: '  ' });

    await expect(transcribeFile({ transcribe }, audioPath)).rejects.toMatchObject({
      message: 'No speech detected in the recording.',
      severity: 'user',
    });
  });

  it('passes cancellation through', async () => {
    transcribe.mockResolvedValueOnce({ status: 'cancelled' });

    await expect(transcribeFile({ transcribe }, audioPath)).resolves.toEqual({ status: 'cancelled' });
  });

  it('classifies failure severity', () => {
    expect(severityForFailure({ kind: 'credentialMissing' })).toBe('user');
    expect(severityForFailure({ kind: 'audioUnreadable', detail: 'file is empty' })).toBe('user');
    expect(severityForFailure({ kind: 'modelLoadFailed', detail: 'bad file' })).toBe('system');
    expect(severityForFailure({ kind: 'busy' })).toBe('system');
  });
});

describe('exitCodeFor', () => {
  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new HotmicCliError('bad flag', 'user'))).toBe(EXIT_USER_ERROR);
    expect(exitCodeFor(new HotmicCliError('backend down', 'system'))).toBe(EXIT_SYSTEM_ERROR);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_SYSTEM_ERROR);
  });
});
