import type { TerminalGeometry } from "../domain/types";

export const DEFAULT_TERMINAL_WIDTH = 80;
export const DEFAULT_TERMINAL_HEIGHT = 24;

/** The slice of a TTY write stream the probe reads. */
export interface WindowSizeSource {
  columns?: number;
  rows?: number;
}

function positiveInt(value: number | undefined): number | null {
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : null;
}

function parseDimension(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return positiveInt(Number.parseInt(raw, 10));
}

/**
 * Current terminal size. Tries the output stream's window size, then
 * COLUMNS/LINES, then 80x24. Read fresh on every call.
 */
export function probeTerminal(
  stream: WindowSizeSource | undefined = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): TerminalGeometry {
  const ttyColumns = positiveInt(stream?.columns);
  const ttyRows = positiveInt(stream?.rows);
  if (ttyColumns !== null && ttyRows !== null) {
    return { columns: ttyColumns, rows: ttyRows };
  }

  const envColumns = parseDimension(env.COLUMNS);
  const envRows = parseDimension(env.LINES);
  if (envColumns !== null && envRows !== null) {
    return { columns: envColumns, rows: envRows };
  }

  return { columns: DEFAULT_TERMINAL_WIDTH, rows: DEFAULT_TERMINAL_HEIGHT };
}
