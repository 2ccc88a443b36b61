import type { Section } from "../domain/types";
import { buildBox } from "./box";
import { plainTheme, type Theme } from "./theme";
import { scalarCount, visibleWidth } from "./visible-width";

/** `key: value` rows for one section, key and value painted separately. */
export function formatSectionLines(
  section: Section,
  theme: Theme = plainTheme,
): string[] {
  return section.lines.map(
    ([key, value]) => `${theme.key(key)}: ${theme.value(value)}`,
  );
}

/**
 * Widest title or `key: value` row across all sections, measured on the
 * unpainted strings.
 */
export function sectionsContentWidth(sections: readonly Section[]): number {
  let width = 0;
  for (const section of sections) {
    width = Math.max(width, scalarCount(section.title));
    for (const [key, value] of section.lines) {
      width = Math.max(width, visibleWidth(key) + 2 + visibleWidth(value));
    }
  }
  return width;
}

/** Rows the stacked section boxes occupy. */
export function sectionsHeight(sections: readonly Section[]): number {
  return sections.reduce((sum, section) => sum + section.lines.length + 2, 0);
}

/**
 * Render every section as a left-aligned titled box, all at one shared
 * width, stacked in input order.
 */
export function formatSections(
  sections: readonly Section[],
  sharedWidth?: number,
  theme: Theme = plainTheme,
): string[] {
  const rows = sections.map((section) => ({
    title: section.title,
    lines: formatSectionLines(section, theme),
  }));

  let width = sharedWidth ?? 0;
  for (const { title, lines } of rows) {
    width = Math.max(width, scalarCount(title));
    for (const line of lines) {
      width = Math.max(width, visibleWidth(line));
    }
  }

  return rows.flatMap(({ title, lines }) =>
    buildBox(lines, { title, minWidth: width, centerContent: false, theme }),
  );
}
