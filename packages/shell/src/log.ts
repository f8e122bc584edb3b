/* eslint-disable no-console */

// Diagnostics go to stderr; operator-facing text goes through the Prompter.
export function logError(message: string): void {
  console.error(`[farmtech] ${message}`);
}
