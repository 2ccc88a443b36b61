#!/usr/bin/env -S node --import tsx
import { Command } from "commander";
import { ErrorCode } from "../domain/errors";
import { type Config, DEFAULT_CONFIG } from "../domain/types";
import { collectSections } from "../probe";
import { createTheme } from "../render/theme";
import { readConfig } from "./config";
import { type FetchOptions, renderFetch } from "./fetch";

interface CliOptions extends FetchOptions {
  config?: string;
  color: boolean;
  verbose: boolean;
}

const warn = (message: string) => console.warn(`[fetchbox] ${message}`);

function loadConfig(explicitPath: string | undefined): Config {
  return readConfig(explicitPath).match(
    (config) => config,
    (e) => {
      // No config anywhere is the normal case.
      if (e.code !== ErrorCode.CONFIG_NOT_FOUND || explicitPath) {
        warn(`${e.message}; using defaults`);
      }
      return DEFAULT_CONFIG;
    },
  );
}

export async function runFetch(opts: CliOptions): Promise<void> {
  const log = opts.verbose
    ? (message: string) => console.error(`[fetchbox] ${message}`)
    : undefined;
  const config = loadConfig(opts.config);
  const theme = createTheme(
    config.colors,
    opts.color === false || process.env.NO_COLOR ? 0 : undefined,
  );
  const sections = await collectSections({
    nerdFont: config.nerdFont,
    onError: (e) => log?.(`${e.message}: ${String(e.cause)}`),
  });
  const output = renderFetch({
    sections,
    config,
    options: { os: opts.os, image: opts.image },
    theme,
    warn,
    log,
  });
  process.stdout.write(output);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("fetchbox")
    .description("Print a boxed system summary beside an ASCII logo")
    .version("0.1.0")
    .option(
      "--os [name]",
      "Show an OS logo; detect from the OS row when no name is given",
    )
    .option("-c, --config <path>", "Read config from this file")
    .option("--image [path]", "Show an image via the Kitty graphics protocol")
    .option("--no-color", "Disable colors")
    .option("--verbose", "Log probe failures and the chosen layout", false)
    .action(async (opts: CliOptions) => {
      try {
        await runFetch(opts);
      } catch (e) {
        console.error(
          `[fetchbox] ${e instanceof Error ? e.message : String(e)}`,
        );
        process.exit(1);
      }
    });

  return program;
}

const isMainEntrypoint =
  process.argv[1]?.endsWith("cli/index.js") ||
  process.argv[1]?.endsWith("cli/index.ts") ||
  process.argv[1]?.endsWith("fetchbox");

if (isMainEntrypoint) {
  createProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error(`[fetchbox] ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    });
}
