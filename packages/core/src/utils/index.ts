/**
 * Pure utility functions shared across narrator packages.
 */

/** Generate a random ID (nanoid-style, no deps) */
export function generateId(length = 21): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-';
  const bytes = crypto.getRandomValues(new Uint8Array(length));
  let id = '';
  for (const byte of bytes) {
    id += chars[byte & 63];
  }
  return id;
}

/** Sleep for a given number of milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ANSI CSI sequences plus single-character escapes.
const ANSI_PATTERN = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

/** Remove terminal escape sequences from text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
