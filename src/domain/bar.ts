const CELLS = 10;

function filledCells(percent: number): number {
  if (!Number.isFinite(percent) || percent <= 0) return 0;
  return Math.min(CELLS, Math.round(percent / 10));
}

/** `[=====     ]` */
export function createBarAscii(percent: number): string {
  const filled = filledCells(percent);
  return `[${"=".repeat(filled)}${" ".repeat(CELLS - filled)}]`;
}

/** Block-glyph bar for patched (nerd) fonts. */
export function createBarPretty(percent: number): string {
  const filled = filledCells(percent);
  return `${"█".repeat(filled)}${"░".repeat(CELLS - filled)}`;
}

export function createBar(percent: number, nerdFont: boolean): string {
  return nerdFont ? createBarPretty(percent) : createBarAscii(percent);
}
