import { err, ok, type Result } from "neverthrow";
import { defaultArt, resolveArt } from "../art/catalog";
import { type AppError, buildError, ErrorCode } from "../domain/errors";
import type {
  ArtVariants,
  Config,
  LayoutChoice,
  Section,
  TerminalGeometry,
} from "../domain/types";
import {
  kittyImageEscape,
  resolveImagePath,
  supportsKittyGraphics,
} from "../image/kitty";
import { planImageLayout, withImage } from "../image/layout";
import { renderLayout } from "../render/layout";
import type { Theme } from "../render/theme";
import { probeTerminal } from "./terminal";

export interface FetchOptions {
  /** `--os [name]`; `true` means detect from the OS row. */
  os?: string | boolean;
  /** `--image [path]`; `true` means use the configured path. */
  image?: string | boolean;
}

export interface FetchInput {
  sections: readonly Section[];
  config: Config;
  options: FetchOptions;
  theme: Theme;
  env?: NodeJS.ProcessEnv;
  probe?: () => TerminalGeometry;
  artDir?: string;
  warn?: (message: string) => void;
  log?: (message: string) => void;
}

const EMPTY_ART: ArtVariants = { wide: [], medium: [], narrow: [] };

export function sectionValue(
  sections: readonly Section[],
  key: string,
): string | undefined {
  for (const s of sections) {
    const hit = s.lines.find(([k]) => k === key);
    if (hit) return hit[1];
  }
  return undefined;
}

export function describeLayout(
  choice: LayoutChoice,
  geometry: TerminalGeometry,
): string {
  const layout =
    choice.kind === "sections-only"
      ? choice.kind
      : `${choice.kind} (${choice.variant})`;
  return `layout ${layout} for ${geometry.columns}x${geometry.rows}`;
}

function imageOutput(input: FetchInput): Result<string | null, AppError> {
  const { config, options } = input;
  const requested = options.image !== undefined && options.image !== false;
  if (!requested && !config.image) return ok(null);

  const imagePath =
    typeof options.image === "string" ? options.image : config.imagePath;
  if (!imagePath) {
    return err(
      buildError(ErrorCode.VALIDATION_FAILED, "Image mode needs an image path"),
    );
  }
  if (!supportsKittyGraphics(input.env)) {
    return err(
      buildError(
        ErrorCode.IMAGE_UNSUPPORTED,
        "Terminal does not support the Kitty graphics protocol",
      ),
    );
  }
  return resolveImagePath(imagePath).map((absolute) => {
    const geometry = (input.probe ?? probeTerminal)();
    const layout = planImageLayout(input.sections, geometry, input.theme);
    input.log?.(`image layout ${layout.kind} for ${geometry.columns}x${geometry.rows}`);
    return layout.kind === "sections-only"
      ? layout.text
      : withImage(
          layout,
          kittyImageEscape(absolute, layout.cellColumns, layout.cellRows),
        );
  });
}

function artFor(input: FetchInput): ArtVariants {
  const { config, options, theme, artDir } = input;
  const warn = input.warn ?? (() => {});
  return resolveArt({
    osOverride:
      options.os === undefined || options.os === false
        ? undefined
        : options.os === true
          ? ""
          : options.os,
    osArt: config.osArt,
    customArt: config.customArt,
    detectedOs: sectionValue(input.sections, "OS") ?? "",
    theme,
    artDir,
  })
    .orElse((e) => {
      warn(`${e.message}; using the default logo`);
      return defaultArt(theme, artDir);
    })
    .match(
      (art) => art,
      (e) => {
        warn(`${e.message}; rendering without art`);
        return EMPTY_ART;
      },
    );
}

/** Everything written to stdout for one run. */
export function renderFetch(input: FetchInput): string {
  const image = imageOutput(input).match(
    (text) => text,
    (e) => {
      input.warn?.(`${e.message}; falling back to ASCII art`);
      return null;
    },
  );
  if (image !== null) return image;

  return renderLayout(artFor(input), input.sections, {
    theme: input.theme,
    probe: input.probe,
    onLayout: (choice, geometry) =>
      input.log?.(describeLayout(choice, geometry)),
  });
}
