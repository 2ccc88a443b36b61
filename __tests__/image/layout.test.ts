import { describe, expect, it } from "vitest";
import type { Section } from "../../src/domain/types";
import { planImageLayout, withImage } from "../../src/image/layout";

const core: Section[] = [{ title: "Core", lines: [["OS", "Linux"]] }];

describe("planImageLayout", () => {
  it("puts a box twice as wide as the stack is tall beside it", () => {
    const layout = planImageLayout(core, { columns: 24, rows: 10 });
    expect(layout).toEqual({
      kind: "side-by-side",
      text: [
        "╭────────╮ ╭── Core ───╮",
        "│        │ │ OS: Linux │",
        "╰────────╯ ╰───────────╯",
        "",
      ].join("\n"),
      cellColumns: 6,
      cellRows: 1,
    });
  });

  it("stacks a roughly square box when too narrow", () => {
    const layout = planImageLayout(core, { columns: 23, rows: 11 });
    expect(layout.kind).toBe("stacked");
    if (layout.kind !== "stacked") return;
    expect(layout.cellColumns).toBe(9);
    expect(layout.cellRows).toBe(6);
    const rows = layout.text.split("\n").slice(0, -1);
    expect(rows).toHaveLength(11);
    expect(rows[0]).toBe("╭───────────╮");
    expect(rows[1]).toBe("│           │");
    expect(rows[8]).toBe("╭── Core ───╮");
  });

  it("shows only sections when neither fits", () => {
    expect(planImageLayout(core, { columns: 23, rows: 10 })).toEqual({
      kind: "sections-only",
      text: "╭── Core ───╮\n│ OS: Linux │\n╰───────────╯\n",
    });
  });
});

describe("withImage", () => {
  it("moves into the box, draws, and returns below", () => {
    const layout = planImageLayout(core, { columns: 24, rows: 10 });
    expect(withImage(layout, "<img>")).toBe(
      `${layout.text}\x1b[2A\x1b[2C<img>\x1b[3B\n`,
    );
  });

  it("leaves a sections-only layout untouched", () => {
    const layout = planImageLayout(core, { columns: 10, rows: 5 });
    expect(withImage(layout, "<img>")).toBe(layout.text);
  });
});
