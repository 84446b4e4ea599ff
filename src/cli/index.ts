#!/usr/bin/env node
/**
 * hotmic CLI - hands-free dictation from the terminal
 *
 * Usage:
 *   hotmic listen [--mock] [--verbose]
 *   hotmic transcribe <audio-file> [--mode local|cloud]
 *   hotmic doctor
 *   hotmic config list | get <key> | set <key> <value> | path
 */

import { resolve } from 'path';
import { Command, Option } from 'commander';
import { SettingsManager } from '../main/settings/SettingsManager.js';
import { createDictationApp, createTranscriptionCoordinator } from '../main/createDictationApp.js';
import type { DictationApp } from '../main/createDictationApp.js';
import { LocalWhisperProvider } from '../main/transcription/LocalWhisperProvider.js';
import { CancellationToken } from '../main/transcription/CancellationToken.js';
import { configureLogging, getLogFilePath } from '../main/utils/Logger.js';
import type { TranscriptionMode } from '../shared/types.js';
import { EXIT_SIGINT, EXIT_SUCCESS, EXIT_SYSTEM_ERROR, EXIT_USER_ERROR, exitCodeFor } from './errors.js';
import { KeypressListener } from './KeypressListener.js';
import { ListenSession } from './listen.js';
import { TerminalPresenter } from './TerminalPresenter.js';
import { runDoctorChecks } from './doctor.js';
import { getSetting, listSettings, setSetting } from './config.js';
import { transcribeFile } from './transcribe.js';
import { SYMBOLS, VERSION, banner, fail, step, success, warn } from './output.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Signal handling
// ============================================================================

let activeApp: DictationApp | null = null;
let activeToken: CancellationToken | null = null;

function setupSignalHandlers(): void {
  const handler = async () => {
    console.log('\n  Interrupted, cleaning up...');
    activeToken?.cancel();
    if (activeApp) {
      await activeApp.shutdown();
    }
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('hotmic')
  .description('Press a key, speak, press again: your words land in the focused app')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// listen command
// ============================================================================

program
  .command('listen')
  .description('Start an interactive dictation session')
  .option('--mock', 'Walk through the session states without recording', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (options: { mock: boolean; verbose: boolean }) => {
    const settings = new SettingsManager();
    configureLogging({ verbose: options.verbose || settings.get('debugMode') });
    banner(options.mock ? 'Listen (mock)' : 'Listen');

    if (settings.applyFirstLaunchDefaults()) {
      step('First run: using on-device transcription');
    }

    const presenter = new TerminalPresenter();
    const app = createDictationApp(settings, presenter);
    activeApp = app;

    if (!options.mock) {
      const problem = await app.coordinator.validateConfiguration();
      if (problem) {
        await app.shutdown();
        activeApp = null;
        fail(`The ${app.coordinator.activeMode} backend is not ready`);
        console.log(`  ${problem}`);
        console.log('  Run `hotmic doctor` for details.');
        process.exit(EXIT_USER_ERROR);
      }
    }

    step(`Backend: ${app.coordinator.activeMode}`);
    step(`Log:     ${getLogFilePath()}`);
    console.log();

    const keys = new KeypressListener();
    await new Promise<void>((done) => {
      const session = new ListenSession(app, {
        mock: options.mock,
        onQuit: () => {
          session.dispose();
          keys.stop();
          done();
        },
      });
      presenter.showState(app.controller.getState());
      keys.start((action) => {
        session.handle(action).catch((error: unknown) => {
          fail(`Key handling failed: ${errorMessage(error)}`);
        });
      });
    });

    await app.shutdown();
    activeApp = null;
    console.log();
    success('Bye.');
    process.exit(EXIT_SUCCESS);
  });

// ============================================================================
// transcribe command
// ============================================================================

program
  .command('transcribe')
  .description('Transcribe an audio file and print the text')
  .argument('<audio-file>', 'Path to the audio file')
  .addOption(new Option('--mode <mode>', 'Backend to use (defaults to the configured one)').choices(['local', 'cloud']))
  .option('--verbose', 'Verbose output', false)
  .action(async (audioFile: string, options: { mode?: TranscriptionMode; verbose: boolean }) => {
    const settings = new SettingsManager();
    configureLogging({ verbose: options.verbose || settings.get('debugMode') });
    const coordinator = createTranscriptionCoordinator(settings);
    const token = new CancellationToken();
    activeToken = token;

    try {
      const result = await transcribeFile(coordinator, resolve(audioFile), { mode: options.mode, token });
      if (result.status === 'cancelled') {
        process.exit(EXIT_SIGINT);
      }
      console.log(result.text);
      process.exit(EXIT_SUCCESS);
    } catch (error) {
      fail(`Transcription failed: ${errorMessage(error)}`);
      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }
      process.exit(exitCodeFor(error));
    } finally {
      activeToken = null;
    }
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check that hotmic can record, transcribe and insert text here')
  .action(async () => {
    banner('Doctor');
    const settings = new SettingsManager();
    configureLogging({ silentConsole: true });

    try {
      const result = await runDoctorChecks({
        settings,
        coordinator: createTranscriptionCoordinator(settings),
        models: new LocalWhisperProvider(settings),
      });

      for (const check of result.checks) {
        const icon =
          check.status === 'pass'
            ? SYMBOLS.check
            : check.status === 'warn'
              ? SYMBOLS.warn
              : SYMBOLS.cross;
        console.log(`  ${icon} ${check.name}: ${check.message}`);
        if (check.hint && check.status !== 'pass') {
          for (const line of check.hint.split('\n')) {
            console.log(`      ${line}`);
          }
        }
      }

      console.log();
      console.log(`  ${result.passed} passed, ${result.warned} warnings, ${result.failed} failed`);
      console.log();

      process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
    } catch (error) {
      fail(`Doctor failed: ${errorMessage(error)}`);
      process.exit(EXIT_SYSTEM_ERROR);
    }
  });

// ============================================================================
// config command group
// ============================================================================

const configCmd = program
  .command('config')
  .description('Show or change settings');

configCmd
  .command('list')
  .description('Show every setting')
  .action(() => {
    const settings = new SettingsManager();
    for (const line of listSettings(settings)) {
      console.log(`  ${line}`);
    }
  });

configCmd
  .command('get')
  .description('Show one setting')
  .argument('<key>', 'Setting name')
  .action((key: string) => {
    try {
      console.log(getSetting(new SettingsManager(), key));
    } catch (error) {
      fail(errorMessage(error));
      process.exit(exitCodeFor(error));
    }
  });

configCmd
  .command('set')
  .description('Change one setting')
  .argument('<key>', 'Setting name')
  .argument('<value>', 'New value (use "" to restore the default)')
  .action((key: string, value: string) => {
    try {
      const stored = setSetting(new SettingsManager(), key, value);
      success(`${key} = ${stored}`);
      if (key === 'cloudApiKey') {
        warn('The key is stored in plain text. HOTMIC_API_KEY overrides it.');
      }
    } catch (error) {
      fail(errorMessage(error));
      process.exit(exitCodeFor(error));
    }
  });

configCmd
  .command('path')
  .description('Print the settings file location')
  .action(() => {
    console.log(new SettingsManager().path);
  });

// ============================================================================
// Parse and run
// ============================================================================

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(errorMessage(error));
  process.exit(EXIT_SYSTEM_ERROR);
});
