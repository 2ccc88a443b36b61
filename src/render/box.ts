import { plainTheme, type Theme } from "./theme";
import { maxVisibleWidth, scalarCount, visibleWidth } from "./visible-width";

export const BOX_CHARS = {
  topLeft: "╭",
  topRight: "╮",
  bottomLeft: "╰",
  bottomRight: "╯",
  horizontal: "─",
  vertical: "│",
} as const;

export interface BoxOptions {
  /** Centered in the top border. Measured by scalar count. */
  title?: string;
  /** Minimum inner width; the box still grows to fit content and title. */
  minWidth?: number;
  /** Minimum total height, borders included. Slack is split top/bottom. */
  minHeight?: number;
  /** Center each line; otherwise left-align with the slack on the right. */
  centerContent?: boolean;
  theme?: Theme;
}

/**
 * Inner width of the box `buildBox` would draw for these lines. The drawn
 * rows are this plus 4 columns wide (two borders, two margins).
 */
export function boxInnerWidth(
  lines: readonly string[],
  title?: string,
  minWidth?: number,
): number {
  const titleWidth = title === undefined ? 0 : scalarCount(title);
  return Math.max(maxVisibleWidth(lines), titleWidth, minWidth ?? 0);
}

/**
 * Draw `lines` inside a rounded border. Every returned row has the same
 * visible width; content is never truncated.
 */
export function buildBox(
  lines: readonly string[],
  options: BoxOptions = {},
): string[] {
  const { title, minWidth, minHeight, centerContent = false } = options;
  const theme = options.theme ?? plainTheme;

  const innerWidth = boxInnerWidth(lines, title, minWidth);
  const naturalHeight = lines.length + 2;
  const totalHeight = Math.max(naturalHeight, minHeight ?? 0);
  const slack = totalHeight - naturalHeight;
  const topRows = Math.floor(slack / 2);
  const bottomRows = slack - topRows;

  const vertical = theme.border(BOX_CHARS.vertical);
  const rule = theme.border(BOX_CHARS.horizontal.repeat(innerWidth + 2));
  const blankRow = `${vertical}${" ".repeat(innerWidth + 2)}${vertical}`;

  const rows: string[] = [];

  if (title === undefined) {
    rows.push(
      `${theme.border(BOX_CHARS.topLeft)}${rule}${theme.border(BOX_CHARS.topRight)}`,
    );
  } else {
    const dashes = innerWidth - scalarCount(title);
    const left = Math.floor(dashes / 2);
    const right = dashes - left;
    rows.push(
      [
        theme.border(BOX_CHARS.topLeft),
        theme.border(BOX_CHARS.horizontal.repeat(left)),
        ` ${theme.title(title)} `,
        theme.border(BOX_CHARS.horizontal.repeat(right)),
        theme.border(BOX_CHARS.topRight),
      ].join(""),
    );
  }

  for (let i = 0; i < topRows; i++) rows.push(blankRow);

  for (const line of lines) {
    const pad = innerWidth - visibleWidth(line);
    const left = centerContent ? Math.floor(pad / 2) : 0;
    const right = pad - left;
    rows.push(
      `${vertical} ${" ".repeat(left)}${line}${" ".repeat(right)} ${vertical}`,
    );
  }

  for (let i = 0; i < bottomRows; i++) rows.push(blankRow);

  rows.push(
    `${theme.border(BOX_CHARS.bottomLeft)}${rule}${theme.border(BOX_CHARS.bottomRight)}`,
  );

  return rows;
}
