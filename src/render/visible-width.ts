const ESC = "\u001B";

/**
 * On-screen column count of a string that may carry ANSI SGR sequences.
 *
 * An escape runs from ESC up to and including the next `m` and counts zero.
 * Every other Unicode scalar counts one column, so double-width glyphs are
 * undercounted by one each.
 */
export function visibleWidth(text: string): number {
  let width = 0;
  let inEscape = false;
  for (const ch of text) {
    if (ch === ESC) {
      inEscape = true;
    } else if (inEscape) {
      if (ch === "m") inEscape = false;
    } else {
      width++;
    }
  }
  return width;
}

/** Number of Unicode scalars, escapes included. Used for box titles. */
export function scalarCount(text: string): number {
  return Array.from(text).length;
}

/** Max visible width over lines; 0 for none. */
export function maxVisibleWidth(lines: readonly string[]): number {
  let max = 0;
  for (const line of lines) {
    max = Math.max(max, visibleWidth(line));
  }
  return max;
}
