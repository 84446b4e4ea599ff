/**
 * Accessibility (synthetic input) capability checks.
 *
 * The check never prompts: the permission flow is left to the OS settings UI.
 */

import { CommandError, runCommand } from './childProcess.js';
import type { AccessibilityChecker } from './types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('Accessibility');

const JXA_IS_TRUSTED = `
ObjC.import('ApplicationServices');
function run() {
  return $.AXIsProcessTrusted() ? 'true' : 'false';
}`;

export class MacAccessibilityChecker implements AccessibilityChecker {
  async isGranted(): Promise<boolean> {
    try {
      const { stdout } = await runCommand('osascript', ['-l', 'JavaScript', '-e', JXA_IS_TRUSTED], { timeoutMs: 5000 });
      return stdout.toString('utf8').trim() === 'true';
    } catch (error) {
      logger.warn('Accessibility check failed:', error instanceof Error ? error.message : String(error));
      return false;
    }
  }
}

/**
 * X11 has no per-process permission; synthetic input works whenever a
 * display is reachable and xdotool is installed.
 */
export class X11AccessibilityChecker implements AccessibilityChecker {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async isGranted(): Promise<boolean> {
    if (!this.env.DISPLAY) {
      return false;
    }
    try {
      await runCommand('xdotool', ['version'], { timeoutMs: 2000 });
      return true;
    } catch (error) {
      if (error instanceof CommandError && error.notFound) {
        logger.warn('xdotool not found on PATH');
      }
      return false;
    }
  }
}

class UnsupportedAccessibilityChecker implements AccessibilityChecker {
  async isGranted(): Promise<boolean> {
    return false;
  }
}

export function createAccessibilityChecker(platform: NodeJS.Platform = process.platform): AccessibilityChecker {
  switch (platform) {
    case 'darwin':
      return new MacAccessibilityChecker();
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return new X11AccessibilityChecker();
    default:
      return new UnsupportedAccessibilityChecker();
  }
}
