import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  customArt,
  defaultArt,
  findOsArt,
  osArt,
  resolveArt,
} from "../../src/art/catalog";
import { ErrorCode } from "../../src/domain/errors";
import { plainTheme } from "../../src/render/theme";

describe("findOsArt", () => {
  it("matches by case-insensitive substring", () => {
    expect(findOsArt("Arch Linux")).toBe("arch");
    expect(findOsArt("CachyOS Linux")).toBe("cachyos");
    expect(findOsArt("Fedora Linux 40 (Workstation Edition)")).toBe("fedora");
    expect(findOsArt("Ubuntu 24.04 LTS")).toBe("ubuntu");
    expect(findOsArt("NixOS 24.05 (Uakari)")).toBe("nixos");
  });

  it("returns null for unknown systems", () => {
    expect(findOsArt("Debian GNU/Linux 12")).toBeNull();
    expect(findOsArt("")).toBeNull();
  });
});

describe("bundled art", () => {
  it("loads the default logo in three sizes", () => {
    const art = defaultArt(plainTheme)._unsafeUnwrap();
    expect(art.wide.length).toBeGreaterThan(0);
    expect(art.medium.length).toBeGreaterThan(0);
    expect(art.narrow).toEqual([" .-------.", " | fetch |", " |  box  |", " '-------'"]);
    expect(art.compact).toBeUndefined();
  });

  it("uses one OS logo for every size and its small logo as compact", () => {
    const art = osArt("Arch Linux", plainTheme)._unsafeUnwrap();
    expect(art).not.toBeNull();
    expect(art?.wide).toBe(art?.narrow);
    expect(art?.compact).toEqual(["   /\\", "  /  \\", " /_/\\_\\"]);
  });

  it("returns null when no OS logo matches", () => {
    expect(osArt("Plan 9", plainTheme)._unsafeUnwrap()).toBeNull();
  });

  it("reports a missing art directory", () => {
    const error = defaultArt(plainTheme, "/nonexistent/art")._unsafeUnwrapErr();
    expect(error.code).toBe(ErrorCode.FILE_READ_FAILED);
  });
});

describe("resolveArt", () => {
  let dir: string;
  let customPath: string;

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), "fetchbox-art-"));
    customPath = path.join(dir, "logo.txt");
    writeFileSync(customPath, "{1}<>\n{2}><\n");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const base = {
    osArt: { kind: "disabled" } as const,
    customArt: null,
    detectedOs: "Fedora Linux 40",
    theme: plainTheme,
  };

  it("reads custom art for every size", () => {
    const art = customArt(customPath, plainTheme)._unsafeUnwrap();
    expect(art).toEqual({ wide: ["<>", "><"], medium: ["<>", "><"], narrow: ["<>", "><"] });
  });

  it("uses the default logo when nothing is configured", () => {
    const art = resolveArt(base)._unsafeUnwrap();
    expect(art.narrow).toEqual(defaultArt(plainTheme)._unsafeUnwrap().narrow);
  });

  it("detects the OS logo for an empty --os", () => {
    const art = resolveArt({ ...base, osOverride: "" })._unsafeUnwrap();
    expect(art).toEqual(osArt("fedora", plainTheme)._unsafeUnwrap());
  });

  it("prefers the --os name over config", () => {
    const art = resolveArt({
      ...base,
      osOverride: "ubuntu",
      osArt: { kind: "specific", name: "arch" },
    })._unsafeUnwrap();
    expect(art).toEqual(osArt("ubuntu", plainTheme)._unsafeUnwrap());
  });

  it("uses config osArt auto with the detected OS", () => {
    const art = resolveArt({ ...base, osArt: { kind: "auto" } })._unsafeUnwrap();
    expect(art.compact).toEqual(osArt("fedora", plainTheme)._unsafeUnwrap()?.compact);
  });

  it("falls through to custom art when no OS logo matches", () => {
    const art = resolveArt({
      ...base,
      osArt: { kind: "specific", name: "haiku" },
      customArt: customPath,
    })._unsafeUnwrap();
    expect(art.wide).toEqual(["<>", "><"]);
  });

  it("reports an unreadable custom art file", () => {
    const error = resolveArt({
      ...base,
      customArt: path.join(dir, "missing.txt"),
    })._unsafeUnwrapErr();
    expect(error.code).toBe(ErrorCode.FILE_READ_FAILED);
  });
});
