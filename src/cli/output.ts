/**
 * CLI Output Utilities
 *
 * Report lines go to stdout so they can be piped; everything meant for the
 * operator goes to stderr alongside the structured logs.
 */

/**
 * Print a report line to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n');
}

/**
 * Print an error message to stderr for CLI error output
 */
export function printError(message: string): void {
  process.stderr.write(message + '\n');
}

export function printWarn(message: string): void {
  process.stderr.write(message + '\n');
}
