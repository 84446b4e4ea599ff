/**
 * Wiring for the long-running dictation process.
 *
 * Everything is constructed once here and owned by the returned app; nothing
 * else in the tree creates platform adapters or providers.
 */

import { DictationController } from './DictationController.js';
import type { DictationPresenter } from './DictationController.js';
import { SystemInterruptionMonitor } from './SystemInterruptionMonitor.js';
import { RecordingService } from './audio/index.js';
import { TextInsertionService } from './output/index.js';
import { createAccessibilityChecker, createPasteKeystroke, createSystemClipboard } from './platform/index.js';
import type { SettingsManager, SettingsReader } from './settings/index.js';
import { CloudTranscriptionProvider, LocalWhisperProvider, TranscriptionCoordinator } from './transcription/index.js';

export interface DictationApp {
  controller: DictationController;
  coordinator: TranscriptionCoordinator;
  monitor: SystemInterruptionMonitor;
  /** Stop monitoring, abandon any session and wait for cleanup */
  shutdown(): Promise<void>;
}

export function createTranscriptionCoordinator(settings: SettingsReader): TranscriptionCoordinator {
  return new TranscriptionCoordinator(settings, {
    local: new LocalWhisperProvider(settings),
    cloud: new CloudTranscriptionProvider(settings),
  });
}

export function createDictationApp(settings: SettingsManager, presenter: DictationPresenter): DictationApp {
  const platform = process.platform;
  const accessibility = createAccessibilityChecker(platform);
  const coordinator = createTranscriptionCoordinator(settings);

  const controller = new DictationController({
    recorder: new RecordingService({ device: settings.get('audioDevice'), platform }),
    coordinator,
    insertion: new TextInsertionService({
      clipboard: createSystemClipboard(platform),
      keystroke: createPasteKeystroke(platform),
      accessibility,
    }),
    accessibility,
    presenter,
  });

  const monitor = new SystemInterruptionMonitor(controller);
  monitor.start();

  return {
    controller,
    coordinator,
    monitor,
    async shutdown() {
      monitor.stop();
      await controller.shutdown();
    },
  };
}
