/**
 * Console output helpers shared by the commands.
 */

export const VERSION = '0.1.0';

export const SYMBOLS = {
  check: '\u2714',    // checkmark
  cross: '\u2718',    // cross
  arrow: '\u2192',    // right arrow
  bullet: '\u2022',   // bullet
  ellipsis: '\u2026', // ellipsis
  line: '\u2500',     // horizontal line
  warn: '\u26A0',     // warning sign
  dot: '\u25CF',      // filled circle
} as const;

export function banner(mode: string): void {
  console.log();
  console.log(`  hotmic v${VERSION} ${SYMBOLS.bullet} ${mode}`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

export function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

export function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

export function warn(message: string): void {
  console.log(`  ${SYMBOLS.warn} ${message}`);
}

export function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}
