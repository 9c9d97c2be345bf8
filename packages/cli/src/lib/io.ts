/**
 * I/O helpers for CLI
 */

/**
 * Write to stderr without a trailing newline
 */
export function writeStderr(text: string): void {
  process.stderr.write(text);
}
