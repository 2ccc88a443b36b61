import { describe, expect, it, vi } from "vitest";
import {
  type ArtVariants,
  DEFAULT_PALETTE,
  type LayoutChoice,
  type Section,
} from "../../src/domain/types";
import {
  composeSideBySide,
  heightAbove,
  renderLayout,
  selectLayout,
  widthBeside,
} from "../../src/render/layout";
import { createTheme } from "../../src/render/theme";
import { visibleWidth } from "../../src/render/visible-width";

const core: Section[] = [{ title: "Core", lines: [["OS", "Linux"]] }];

const narrow = ["#####", "# # #", "#####"];

// Section content width is 9 and stack height is 3 for `core`.
const art: ArtVariants = {
  wide: ["w".repeat(60)], // beside: 78
  medium: ["m".repeat(30)], // beside: 48
  narrow, // above: 8
};
const withCompact: ArtVariants = {
  ...art,
  compact: ["c".repeat(10), "c".repeat(10)], // beside: 28, above: 7
};

const at = (columns: number, rows: number) => () => ({ columns, rows });

function outputLines(text: string): string[] {
  return text.split("\n").slice(0, -1);
}

describe("widthBeside / heightAbove", () => {
  it("adds box chrome and the gap", () => {
    expect(widthBeside(narrow, 9)).toBe(5 + 4 + 1 + 9 + 4);
    expect(heightAbove(narrow, 3)).toBe(3 + 2 + 3);
  });
});

describe("selectLayout", () => {
  const cases: Array<[string, ArtVariants, number, number, LayoutChoice]> = [
    ["wide art beside", withCompact, 80, 24, { kind: "side-by-side", variant: "wide" }],
    ["compact art beside before medium", withCompact, 40, 24, { kind: "side-by-side", variant: "compact" }],
    ["medium art beside without compact", art, 50, 24, { kind: "side-by-side", variant: "medium" }],
    ["narrow art above when too narrow", art, 30, 24, { kind: "stacked", variant: "narrow" }],
    ["compact art above", withCompact, 20, 7, { kind: "stacked", variant: "compact" }],
    ["narrow art above without compact", art, 20, 8, { kind: "stacked", variant: "narrow" }],
    ["sections only when nothing fits", art, 20, 7, { kind: "sections-only" }],
    ["sections only with compact too tall", withCompact, 20, 6, { kind: "sections-only" }],
  ];

  it.each(cases)("%s", (_name, variants, columns, rows, expected) => {
    expect(selectLayout(variants, core, { columns, rows })).toEqual(expected);
  });

  it("takes thresholds inclusively", () => {
    expect(selectLayout(art, core, { columns: 78, rows: 1 })).toEqual({
      kind: "side-by-side",
      variant: "wide",
    });
    expect(selectLayout(art, core, { columns: 77, rows: 1 })).toEqual({
      kind: "side-by-side",
      variant: "medium",
    });
    expect(selectLayout(art, core, { columns: 48, rows: 24 })).toEqual({
      kind: "side-by-side",
      variant: "medium",
    });
    expect(selectLayout(art, core, { columns: 47, rows: 24 })).toEqual({
      kind: "stacked",
      variant: "narrow",
    });
  });
});

describe("renderLayout", () => {
  it("stacks narrow art over sections when too narrow to sit beside", () => {
    const out = renderLayout(art, core, { probe: at(40, 24) });
    expect(outputLines(out)).toHaveLength(3 + 2 + 1 + 2);
    expect(out).toBe(
      [
        "╭───────────╮",
        "│   #####   │",
        "│   # # #   │",
        "│   #####   │",
        "╰───────────╯",
        "╭── Core ───╮",
        "│ OS: Linux │",
        "╰───────────╯",
        "",
      ].join("\n"),
    );
  });

  it("falls back to sections only in a tiny terminal", () => {
    const out = renderLayout(art, core, { probe: at(10, 5) });
    expect(out).toBe("╭── Core ───╮\n│ OS: Linux │\n╰───────────╯\n");
    expect(out).not.toContain("#");
  });

  it("puts art beside sections with a one-column gap", () => {
    const small: ArtVariants = {
      wide: ["/\\", "\\/"],
      medium: ["/\\", "\\/"],
      narrow: ["/\\", "\\/"],
    };
    const out = renderLayout(small, core, { probe: at(80, 24) });
    expect(out).toBe(
      [
        "╭────╮ ╭── Core ───╮",
        "│ /\\ │ │ OS: Linux │",
        "│ \\/ │ ╰───────────╯",
        "╰────╯ ",
        "",
      ].join("\n"),
    );
  });

  it("pads the art box to the height of the section stack", () => {
    const two: Section[] = [
      ...core,
      { title: "Hardware", lines: [["CPU", "Ryzen 7"]] },
    ];
    const one = { wide: ["@"], medium: ["@"], narrow: ["@"] };
    const rows = outputLines(renderLayout(one, two, { probe: at(80, 24) }));
    expect(rows).toHaveLength(6);
    expect(rows[0]).toBe("╭───╮ ╭──── Core ────╮");
    expect(rows[1]).toBe("│   │ │ OS: Linux    │");
    expect(rows[2]).toBe("│ @ │ ╰──────────────╯");
    expect(rows[5]).toBe("╰───╯ ╰──────────────╯");
  });

  it("reads geometry once per call and reports the choice", () => {
    const probe = vi.fn(at(40, 24));
    const onLayout = vi.fn();
    renderLayout(art, core, { probe, onLayout });
    renderLayout(art, core, { probe, onLayout });
    expect(probe).toHaveBeenCalledTimes(2);
    expect(onLayout).toHaveBeenLastCalledWith(
      { kind: "stacked", variant: "narrow" },
      { columns: 40, rows: 24 },
    );
  });

  it("renders something for no sections and empty art", () => {
    const empty = { wide: [], medium: [], narrow: [] };
    expect(renderLayout(empty, [], { probe: at(80, 24) })).toBe(
      "╭──╮ \n╰──╯ \n",
    );
  });

  it("keeps stacked rows aligned when colored", () => {
    const theme = createTheme(DEFAULT_PALETTE, 3);
    const out = renderLayout(art, core, { probe: at(40, 24), theme });
    expect(out).toContain("\x1b[");
    expect(new Set(outputLines(out).map(visibleWidth))).toEqual(new Set([13]));
  });
});

describe("composeSideBySide", () => {
  it("pads past the end of the left block", () => {
    expect(composeSideBySide(["ab"], ["1", "2"])).toBe("ab 1\n   2\n");
  });
});
