import { probeTerminal } from "../cli/terminal";
import type {
  ArtBlock,
  ArtVariantName,
  ArtVariants,
  LayoutChoice,
  Section,
  TerminalGeometry,
} from "../domain/types";
import { buildBox } from "./box";
import {
  formatSections,
  sectionsContentWidth,
  sectionsHeight,
} from "./sections";
import { plainTheme, type Theme } from "./theme";
import { maxVisibleWidth, visibleWidth } from "./visible-width";

/** Border plus margin columns on each side of a box. */
const BOX_CHROME = 4;
const GAP = " ";

/** Columns needed to put `art` beside sections `contentWidth` wide. */
export function widthBeside(art: ArtBlock, contentWidth: number): number {
  return (
    maxVisibleWidth(art) + BOX_CHROME + GAP.length + contentWidth + BOX_CHROME
  );
}

/** Rows needed to put `art` above sections `stackHeight` tall. */
export function heightAbove(art: ArtBlock, stackHeight: number): number {
  return art.length + 2 + stackHeight;
}

/**
 * Pick the first layout that fits, in priority order: wide, compact and
 * medium art beside the sections; compact and narrow art above them;
 * sections alone.
 */
export function selectLayout(
  art: ArtVariants,
  sections: readonly Section[],
  geometry: TerminalGeometry,
): LayoutChoice {
  const contentWidth = sectionsContentWidth(sections);
  const stackHeight = sectionsHeight(sections);
  const { columns, rows } = geometry;

  if (columns >= widthBeside(art.wide, contentWidth)) {
    return { kind: "side-by-side", variant: "wide" };
  }
  if (art.compact && columns >= widthBeside(art.compact, contentWidth)) {
    return { kind: "side-by-side", variant: "compact" };
  }
  if (columns >= widthBeside(art.medium, contentWidth)) {
    return { kind: "side-by-side", variant: "medium" };
  }
  if (art.compact && rows >= heightAbove(art.compact, stackHeight)) {
    return { kind: "stacked", variant: "compact" };
  }
  if (rows >= heightAbove(art.narrow, stackHeight)) {
    return { kind: "stacked", variant: "narrow" };
  }
  return { kind: "sections-only" };
}

function artFor(art: ArtVariants, variant: ArtVariantName): ArtBlock {
  if (variant === "compact") return art.compact ?? art.narrow;
  return art[variant];
}

/** Interleave two boxes row by row with a one-column gap. */
export function composeSideBySide(
  left: readonly string[],
  right: readonly string[],
): string {
  const height = Math.max(left.length, right.length);
  const blank = " ".repeat(left.length > 0 ? visibleWidth(left[0] ?? "") : 0);
  let out = "";
  for (let i = 0; i < height; i++) {
    out += `${left[i] ?? blank}${GAP}${right[i] ?? ""}\n`;
  }
  return out;
}

/** One block under the other, every row newline-terminated. */
export function composeStacked(
  top: readonly string[],
  bottom: readonly string[],
): string {
  return [...top, ...bottom].map((line) => `${line}\n`).join("");
}

/** Render a known layout choice. */
export function renderChoice(
  choice: LayoutChoice,
  art: ArtVariants,
  sections: readonly Section[],
  theme: Theme = plainTheme,
): string {
  switch (choice.kind) {
    case "side-by-side": {
      const stack = formatSections(sections, undefined, theme);
      const artBox = buildBox(artFor(art, choice.variant), {
        minHeight: stack.length,
        centerContent: true,
        theme,
      });
      return composeSideBySide(artBox, stack);
    }
    case "stacked": {
      const lines = artFor(art, choice.variant);
      const sharedWidth = Math.max(
        maxVisibleWidth(lines),
        sectionsContentWidth(sections),
      );
      const artBox = buildBox(lines, {
        minWidth: sharedWidth,
        centerContent: true,
        theme,
      });
      return composeStacked(
        artBox,
        formatSections(sections, sharedWidth, theme),
      );
    }
    case "sections-only":
      return composeStacked([], formatSections(sections, undefined, theme));
  }
}

export interface RenderOptions {
  theme?: Theme;
  /** Geometry source, called once per render. */
  probe?: () => TerminalGeometry;
  /** Receives the choice that was made, e.g. for verbose logging. */
  onLayout?: (choice: LayoutChoice, geometry: TerminalGeometry) => void;
}

/**
 * Compose art and sections into one printable block sized to the current
 * terminal.
 */
export function renderLayout(
  art: ArtVariants,
  sections: readonly Section[],
  options: RenderOptions = {},
): string {
  const geometry = (options.probe ?? probeTerminal)();
  const choice = selectLayout(art, sections, geometry);
  options.onLayout?.(choice, geometry);
  return renderChoice(choice, art, sections, options.theme);
}
