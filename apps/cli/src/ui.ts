/**
 * Shared CLI styling: colors, box drawing and key-value rows for the
 * narrator banner and command output.
 *
 * Zero external dependencies. Pure string rendering with console.log().
 */

// ---------------------------------------------------------------------------
// Colors: true-color amber for the brand, standard ANSI for accents
// ---------------------------------------------------------------------------

/** Primary brand color. True-color (24-bit). */
export const AMBER = '\x1b[38;2;232;170;66m';

/** Dimmed amber for borders. */
export const AMBER_DIM = '\x1b[38;2;150;110;42m';

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// Box drawing characters
// ---------------------------------------------------------------------------

export const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;

// ---------------------------------------------------------------------------
// Terminal helpers
// ---------------------------------------------------------------------------

/** Get terminal width with 80-column fallback. */
export function termWidth(): number {
  return process.stdout.columns ?? 80;
}

/** Measure visible character length (strips ANSI color sequences). */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a bordered box with an optional title.
 *
 * ```
 * ╭── narrator ───────────────────────╮
 * │                                    │
 * │  Gateway   http://127.0.0.1:8357   │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function box(title: string, lines: string[], width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 2;
  const innerW = w - 2;
  const blank = `  ${AMBER_DIM}${BOX.vertical}${RESET}${' '.repeat(innerW)}${AMBER_DIM}${BOX.vertical}${RESET}`;

  const out: string[] = [];

  if (title) {
    const titleStr = ` ${title} `;
    const dashesAfter = Math.max(0, w - 4 - visibleLength(titleStr));
    out.push(
      `  ${AMBER_DIM}${BOX.topLeft}${BOX.horizontal.repeat(2)}${RESET}` +
      `${AMBER}${BOLD}${titleStr}${RESET}` +
      `${AMBER_DIM}${BOX.horizontal.repeat(dashesAfter)}${BOX.topRight}${RESET}`,
    );
  } else {
    out.push(`  ${AMBER_DIM}${BOX.topLeft}${BOX.horizontal.repeat(w - 2)}${BOX.topRight}${RESET}`);
  }

  out.push(blank);
  for (const line of lines) {
    const padRight = Math.max(0, innerW - 2 - visibleLength(line));
    out.push(
      `  ${AMBER_DIM}${BOX.vertical}${RESET}  ${line}${' '.repeat(padRight)}${AMBER_DIM}${BOX.vertical}${RESET}`,
    );
  }
  out.push(blank);

  out.push(`  ${AMBER_DIM}${BOX.bottomLeft}${BOX.horizontal.repeat(w - 2)}${BOX.bottomRight}${RESET}`);

  return out.join('\n');
}

/**
 * Render a key-value row with aligned label.
 *
 * Example: "Gateway        http://127.0.0.1:8357"
 */
export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `${BOLD}${label.padEnd(labelWidth, ' ')}${RESET} ${value}`;
}
