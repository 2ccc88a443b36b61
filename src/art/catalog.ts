import { readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { err, ok, Result } from "neverthrow";
import { type AppError, buildError, ErrorCode } from "../domain/errors";
import type { ArtVariants, OsArtSetting } from "../domain/types";
import type { Theme } from "../render/theme";
import { renderArtTemplate } from "./template";

export const DEFAULT_ART_DIR = fileURLToPath(
  new URL("../../assets/art", import.meta.url),
);

/** Bundled OS logos, matched by substring of the lower-cased OS name in this order. */
export const OS_ART = [
  { name: "arch", match: ["arch"] },
  { name: "cachyos", match: ["cachyos", "cachy"] },
  { name: "fedora", match: ["fedora"] },
  { name: "ubuntu", match: ["ubuntu"] },
  { name: "nixos", match: ["nixos", "nix"] },
] as const;

export type OsArtName = (typeof OS_ART)[number]["name"];

export function findOsArt(osName: string): OsArtName | null {
  const lower = osName.toLowerCase();
  const hit = OS_ART.find((entry) =>
    entry.match.some((needle) => lower.includes(needle)),
  );
  return hit?.name ?? null;
}

export function readArtFile(filePath: string): Result<string, AppError> {
  try {
    return ok(readFileSync(filePath, "utf-8"));
  } catch (e) {
    return err(
      buildError(
        ErrorCode.FILE_READ_FAILED,
        `Failed to read art file at ${filePath}`,
        e,
      ),
    );
  }
}

export function defaultArt(
  theme: Theme,
  artDir = DEFAULT_ART_DIR,
): Result<ArtVariants, AppError> {
  const read = (size: string) =>
    readArtFile(path.join(artDir, "default", `${size}.txt`)).map((text) =>
      renderArtTemplate(text, theme),
    );
  return Result.combine([read("wide"), read("medium"), read("narrow")]).map(
    ([wide, medium, narrow]) => ({ wide, medium, narrow }),
  );
}

/**
 * OS logo in every size, with its small logo as the compact variant.
 * `null` when no bundled logo matches.
 */
export function osArt(
  osName: string,
  theme: Theme,
  artDir = DEFAULT_ART_DIR,
): Result<ArtVariants | null, AppError> {
  const name = findOsArt(osName);
  if (name === null) return ok(null);
  const read = (file: string) =>
    readArtFile(path.join(artDir, "os", file)).map((text) =>
      renderArtTemplate(text, theme),
    );
  return Result.combine([read(`${name}.txt`), read(`${name}-smol.txt`)]).map(
    ([logo, smol]) => ({ wide: logo, medium: logo, narrow: logo, compact: smol }),
  );
}

/** A user template used for every size. */
export function customArt(
  filePath: string,
  theme: Theme,
): Result<ArtVariants, AppError> {
  return readArtFile(filePath).map((text) => {
    const lines = renderArtTemplate(text, theme);
    return { wide: lines, medium: lines, narrow: lines };
  });
}

export interface ArtRequest {
  /** `--os [name]`: `""` means detect from `detectedOs`. */
  osOverride?: string;
  osArt: OsArtSetting;
  customArt: string | null;
  detectedOs: string;
  theme: Theme;
  artDir?: string;
}

/**
 * Pick the art to show: an OS logo (flag, then config), then custom art,
 * then the bundled default. Lookups that find nothing fall through.
 */
export function resolveArt(req: ArtRequest): Result<ArtVariants, AppError> {
  const osName =
    req.osOverride !== undefined
      ? req.osOverride || req.detectedOs
      : req.osArt.kind === "specific"
        ? req.osArt.name
        : req.osArt.kind === "auto"
          ? req.detectedOs
          : null;

  const fromOs: Result<ArtVariants | null, AppError> =
    osName === null ? ok(null) : osArt(osName, req.theme, req.artDir);

  return fromOs.andThen((art) => {
    if (art) return ok(art);
    if (req.customArt) return customArt(req.customArt, req.theme);
    return defaultArt(req.theme, req.artDir);
  });
}
