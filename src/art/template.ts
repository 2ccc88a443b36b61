import type { Paint, Theme } from "../render/theme";

const PLACEHOLDER = /\{([1-9])\}/g;

const identity: Paint = (text) => text;

/**
 * Turn an art template into painted lines. `{1}`..`{9}` switch to the
 * matching theme art color for everything after it, across line breaks;
 * text before the first placeholder is left unpainted.
 */
export function renderArtTemplate(template: string, theme: Theme): string[] {
  const lines = template.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") {
    lines.pop();
  }

  let paint = identity;
  return lines.map((line) => {
    let out = "";
    let cursor = 0;
    for (const match of line.matchAll(PLACEHOLDER)) {
      const index = match.index ?? cursor;
      out += paint(line.slice(cursor, index));
      paint = theme.art[Number(match[1]) - 1] ?? identity;
      cursor = index + match[0].length;
    }
    return out + paint(line.slice(cursor));
  });
}
