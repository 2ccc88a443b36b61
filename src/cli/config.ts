import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import * as path from "node:path";
import { err, ok, type Result } from "neverthrow";
import { type AppError, buildError, ErrorCode } from "../domain/errors";
import {
  type Config,
  type ConfigFile,
  ConfigFileSchema,
  DEFAULT_CONFIG,
  DEFAULT_PALETTE,
  HEX_COLOR_REGEX,
  type OsArtSetting,
  type Palette,
} from "../domain/types";

const APP_DIR = "fetchbox";
const CONFIG_FILE = "config.json";
const LOCAL_CONFIG_FILE = "fetchbox.config.json";

/** Expand a leading `~/` to the home directory. */
export function expandHome(p: string, home: string = homedir()): string {
  return p.startsWith("~/") ? path.join(home, p.slice(2)) : p;
}

/** Candidate config locations, most specific first. */
export function configSearchPaths(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string[] {
  const paths: string[] = [];
  if (env.XDG_CONFIG_HOME) {
    paths.push(path.join(env.XDG_CONFIG_HOME, APP_DIR, CONFIG_FILE));
  }
  if (env.HOME) {
    paths.push(path.join(env.HOME, ".config", APP_DIR, CONFIG_FILE));
  }
  paths.push(path.join(cwd, LOCAL_CONFIG_FILE));
  return paths;
}

/** Normalize `#RRGGBB` / `RRGGBB` to `#RRGGBB`; null when malformed. */
export function parseHexColor(raw: string): string | null {
  const trimmed = raw.trim().replace(/^"|"$/g, "");
  if (!HEX_COLOR_REGEX.test(trimmed)) return null;
  const hex = trimmed.startsWith("#") ? trimmed.slice(1) : trimmed;
  return `#${hex.toUpperCase()}`;
}

function resolvePalette(colors: ConfigFile["colors"]): Palette {
  const pick = (raw: string | undefined, fallback: string) =>
    (raw === undefined ? null : parseHexColor(raw)) ?? fallback;
  return {
    border: pick(colors?.border, DEFAULT_PALETTE.border),
    title: pick(colors?.title, DEFAULT_PALETTE.title),
    key: pick(colors?.key, DEFAULT_PALETTE.key),
    value: pick(colors?.value, DEFAULT_PALETTE.value),
    art: DEFAULT_PALETTE.art.map((fallback, i) =>
      pick(colors?.art?.[i], fallback),
    ),
  };
}

function resolveOsArt(raw: ConfigFile["osArt"]): OsArtSetting {
  if (raw === true) return { kind: "auto" };
  if (typeof raw === "string" && raw.trim() !== "") {
    return { kind: "specific", name: raw.trim() };
  }
  return { kind: "disabled" };
}

/** Fill defaults and expand paths in a validated config file. */
export function resolveConfig(file: ConfigFile, home?: string): Config {
  const optionalPath = (p: string | undefined) =>
    p && p.trim() !== "" ? expandHome(p.trim(), home) : null;
  return {
    osArt: resolveOsArt(file.osArt),
    customArt: optionalPath(file.customArt),
    image: file.image ?? DEFAULT_CONFIG.image,
    imagePath: optionalPath(file.imagePath),
    nerdFont: file.nerdFont ?? DEFAULT_CONFIG.nerdFont,
    colors: resolvePalette(file.colors),
  };
}

export function parseConfig(
  contents: string,
  source: string,
  home?: string,
): Result<Config, AppError> {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (e) {
    return err(
      buildError(
        ErrorCode.CONFIG_PARSE_FAILED,
        `Failed to parse config file at ${source}`,
        e,
      ),
    );
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      buildError(
        ErrorCode.VALIDATION_FAILED,
        `Invalid config at ${source}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        parsed.error,
      ),
    );
  }
  return ok(resolveConfig(parsed.data, home));
}

/**
 * Load the config from `explicitPath`, or the first existing search path.
 * CONFIG_NOT_FOUND when there is none.
 */
export function readConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Result<Config, AppError> {
  const configPath = explicitPath
    ? expandHome(explicitPath, env.HOME)
    : configSearchPaths(env, cwd).find((p) => existsSync(p));
  if (!configPath || !existsSync(configPath)) {
    return err(
      buildError(
        ErrorCode.CONFIG_NOT_FOUND,
        explicitPath
          ? `Config file not found at ${explicitPath}`
          : "No config file found; using defaults",
      ),
    );
  }
  try {
    const contents = readFileSync(configPath, "utf-8");
    return parseConfig(contents, configPath, env.HOME);
  } catch (e) {
    return err(
      buildError(
        ErrorCode.FILE_READ_FAILED,
        `Failed to read config file at ${configPath}`,
        e,
      ),
    );
  }
}
