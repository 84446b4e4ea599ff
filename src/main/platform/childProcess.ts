/**
 * Child process helpers shared by the platform adapters, capture and the
 * on-device recogniser.
 */

import { execFile, spawn } from 'child_process';

/**
 * Safe child environment: only PATH and what audio, display and clipboard
 * tools need to find their servers.
 */
export const SAFE_CHILD_ENV: NodeJS.ProcessEnv = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR,
  DISPLAY: process.env.DISPLAY,
  XAUTHORITY: process.env.XAUTHORITY,
  XDG_RUNTIME_DIR: process.env.XDG_RUNTIME_DIR,
  PULSE_SERVER: process.env.PULSE_SERVER,
};

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  /** The executable could not be found */
  readonly notFound: boolean;

  constructor(command: string, message: string, options: { exitCode?: number | null; stderr?: string; notFound?: boolean } = {}) {
    super(message);
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
    this.notFound = options.notFound ?? false;
  }
}

export interface CommandResult {
  stdout: Buffer;
  stderr: string;
}

export interface RunCommandOptions {
  /** Written to stdin, which is then closed */
  input?: string | Buffer;
  timeoutMs?: number;
  /** Aborting kills the child; the call rejects with `CommandError` */
  signal?: AbortSignal;
}

/**
 * Run a command to completion and collect its output.
 * Rejects with `CommandError` on spawn failure, non-zero exit or timeout.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = execFile(
      command,
      args,
      {
        env: SAFE_CHILD_ENV,
        encoding: 'buffer',
        timeout: options.timeoutMs ?? 0,
        maxBuffer: 64 * 1024 * 1024,
        signal: options.signal,
      },
      (error, stdout, stderr) => {
        const stderrText = stderr.toString();
        if (error) {
          const code: unknown = error.code;
          const notFound = code === 'ENOENT';
          reject(
            new CommandError(
              command,
              notFound ? `${command} not found on PATH` : `${command} failed: ${stderrText.trim() || error.message}`,
              {
                exitCode: typeof code === 'number' ? code : null,
                stderr: stderrText,
                notFound,
              }
            )
          );
          return;
        }
        resolve({ stdout, stderr: stderrText });
      }
    );

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}

/**
 * Feed `input` to a command that forks into the background to keep serving
 * it (xclip). Resolves on the foreground process's exit, without waiting for
 * the forked server to release its inherited stdio.
 */
export function runDetachingCommand(command: string, args: string[], input: string | Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: SAFE_CHILD_ENV,
      stdio: ['pipe', 'ignore', 'ignore'],
    });

    child.once('error', (error: NodeJS.ErrnoException) => {
      const notFound = error.code === 'ENOENT';
      reject(new CommandError(command, notFound ? `${command} not found on PATH` : error.message, { notFound }));
    });

    child.once('exit', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new CommandError(command, `${command} exited with code ${code}`, { exitCode: code }));
      }
    });

    child.stdin?.end(input);
  });
}
