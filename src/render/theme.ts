import { Chalk, type ColorSupportLevel } from "chalk";
import type { Palette } from "../domain/types";

export type Paint = (text: string) => string;

/** Color functions applied to box chrome, section rows and art. */
export interface Theme {
  border: Paint;
  title: Paint;
  key: Paint;
  value: Paint;
  /** Indexed by art placeholder number minus one. */
  art: readonly Paint[];
}

const identity: Paint = (text) => text;

export const plainTheme: Theme = {
  border: identity,
  title: identity,
  key: identity,
  value: identity,
  art: [],
};

/**
 * Build a truecolor theme from a palette. `level` overrides chalk's own
 * detection; pass 0 for `--no-color`.
 */
export function createTheme(palette: Palette, level?: ColorSupportLevel): Theme {
  const chalk = new Chalk(level === undefined ? {} : { level });
  const paint =
    (hex: string): Paint =>
    (text) =>
      text.length === 0 ? text : chalk.hex(hex)(text);
  return {
    border: paint(palette.border),
    title: paint(palette.title),
    key: paint(palette.key),
    value: paint(palette.value),
    art: palette.art.map(paint),
  };
}
