import type { Section, TerminalGeometry } from "../domain/types";
import { buildBox } from "../render/box";
import { composeSideBySide, composeStacked } from "../render/layout";
import {
  formatSections,
  sectionsContentWidth,
  sectionsHeight,
} from "../render/sections";
import { plainTheme, type Theme } from "../render/theme";

/** Smallest stacked image box content width worth drawing. */
const MIN_STACKED_IMAGE_WIDTH = 8;

export type ImageLayout =
  | {
      kind: "side-by-side" | "stacked";
      text: string;
      /** Cells inside the empty box the image is scaled into. */
      cellColumns: number;
      cellRows: number;
    }
  | { kind: "sections-only"; text: string };

/**
 * Lay out sections next to (or under) an empty box sized for an image.
 * Terminal cells are about twice as tall as wide, so the side-by-side box
 * is twice as wide as it is tall.
 */
export function planImageLayout(
  sections: readonly Section[],
  geometry: TerminalGeometry,
  theme: Theme = plainTheme,
): ImageLayout {
  const contentWidth = sectionsContentWidth(sections);
  const stackHeight = sectionsHeight(sections);

  const sideImageWidth = stackHeight * 2;
  if (geometry.columns >= sideImageWidth + 4 + 1 + contentWidth + 4) {
    const stack = formatSections(sections, undefined, theme);
    const imageBox = buildBox([], {
      minWidth: sideImageWidth,
      minHeight: stack.length,
      centerContent: true,
      theme,
    });
    return {
      kind: "side-by-side",
      text: composeSideBySide(imageBox, stack),
      cellColumns: sideImageWidth,
      cellRows: Math.max(0, stack.length - 2),
    };
  }

  const boxHeight = Math.ceil((contentWidth + 6) / 2);
  if (
    geometry.rows >= boxHeight + stackHeight &&
    contentWidth > MIN_STACKED_IMAGE_WIDTH
  ) {
    const imageBox = buildBox([], {
      minWidth: contentWidth,
      minHeight: boxHeight,
      centerContent: true,
      theme,
    });
    return {
      kind: "stacked",
      text: composeStacked(imageBox, formatSections(sections, contentWidth, theme)),
      cellColumns: contentWidth,
      cellRows: Math.max(0, boxHeight - 2),
    };
  }

  return {
    kind: "sections-only",
    text: composeStacked([], formatSections(sections, undefined, theme)),
  };
}

/**
 * The layout followed by cursor moves that place `imageEscape` inside the
 * empty box, then return below the block.
 */
export function withImage(layout: ImageLayout, imageEscape: string): string {
  if (layout.kind === "sections-only") return layout.text;
  const lines = layout.text.split("\n").length - 1;
  return [
    layout.text,
    `\u001B[${lines - 1}A`,
    "\u001B[2C",
    imageEscape,
    `\u001B[${lines}B\n`,
  ].join("");
}
