import { existsSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";

const COMMAND_TIMEOUT_MS = 2000;

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** First word starting with a digit, cut at `(` or `-`: `5.2.26` from `bash 5.2.26(1)-release`. */
export function parseShellVersion(output: string): string | null {
  const firstLine = output.split("\n")[0] ?? "";
  const word = firstLine.split(/\s+/).find((w) => /^\d/.test(w));
  return word ? word.split(/[(-]/)[0] ?? word : null;
}

const DESKTOP_WM: Record<string, string> = {
  hyprland: "Hyprland",
  sway: "Sway",
  kde: "KWin",
  plasma: "KWin",
  gnome: "Mutter",
  xfce: "Xfwm4",
  i3: "i3",
  bspwm: "bspwm",
  awesome: "Awesome",
  qtile: "Qtile",
  niri: "Niri",
};

export function windowManager(env: NodeJS.ProcessEnv = process.env): string {
  const desktop = env.XDG_CURRENT_DESKTOP;
  if (desktop) return DESKTOP_WM[desktop.toLowerCase()] ?? desktop;
  if (env.DESKTOP_SESSION) return capitalize(env.DESKTOP_SESSION);
  return "unknown";
}

/** Terminal-specific variables win over TERM_PROGRAM and TERM. */
export function terminalName(env: NodeJS.ProcessEnv = process.env): string {
  if (env.KITTY_PID !== undefined) return "Kitty";
  if (env.KONSOLE_VERSION !== undefined) return "Konsole";
  if (env.GNOME_TERMINAL_SCREEN !== undefined) return "Gnome Terminal";
  const term = env.TERM_PROGRAM ?? env.TERM;
  if (!term) return "unknown";
  return capitalize(term.replace(/-256color.*$/, "").replace(/-color.*$/, ""));
}

const DESKTOP_SHELLS: Record<string, string> = {
  kde: "Plasma Shell",
  plasma: "Plasma Shell",
  gnome: "Gnome Shell",
};

/** Process names of desktop shells and bars, checked in this order. */
const SHELL_PROCESSES: ReadonlyArray<[string, string]> = [
  ["noctalia-shell", "Noctalia Shell"],
  ["plasmashell", "Plasma Shell"],
  ["gnome-shell", "Gnome Shell"],
  ["waybar", "Custom Waybar setup"],
];

/** Desktop shell named by a running process's command line, if any. */
export function uiFromCmdlines(cmdlines: readonly string[]): string | null {
  for (const [needle, name] of SHELL_PROCESSES) {
    if (cmdlines.some((cmdline) => cmdline.includes(needle))) return name;
  }
  return null;
}

async function processCmdlines(): Promise<string[]> {
  const pids = (await readdir("/proc")).filter((entry) => /^\d+$/.test(entry));
  return Promise.all(
    pids.map((pid) =>
      readFile(path.join("/proc", pid, "cmdline"), "utf-8").catch(() => ""),
    ),
  );
}

/** The desktop shell: from XDG_CURRENT_DESKTOP, else from running processes. */
export async function ui(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  for (const desktop of (env.XDG_CURRENT_DESKTOP ?? "").split(":")) {
    const known = DESKTOP_SHELLS[desktop.toLowerCase()];
    if (known) return known;
  }
  return uiFromCmdlines(await processCmdlines()) ?? "unknown";
}

export async function shell(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const shellPath = env.SHELL;
  const name = shellPath ? path.basename(shellPath) : "";
  if (!shellPath || !name) return "unknown";
  const { stdout } = await execa(shellPath, ["--version"], {
    reject: false,
    timeout: COMMAND_TIMEOUT_MS,
  });
  const version = parseShellVersion(stdout);
  return version ? `${capitalize(name)} ${version}` : capitalize(name);
}

/** Installed-package lines in a dpkg status file. */
export function countDpkgInstalled(status: string): number {
  return status.split("\nStatus: install ok installed\n").length - 1;
}

export function countLines(output: string): number {
  return output.split("\n").filter((line) => line.trim() !== "").length;
}

async function countDir(dir: string): Promise<number> {
  const entries = await readdir(dir).catch(() => []);
  return entries.length;
}

/** Counts per package manager, e.g. `1204 (pacman) | 12 (flatpak)`. */
export async function packages(): Promise<string> {
  const [pacman, dpkg, rpm, flatpak] = await Promise.all([
    countDir("/var/lib/pacman/local"),
    readFile("/var/lib/dpkg/status", "utf-8")
      .then(countDpkgInstalled)
      .catch(() => 0),
    existsSync("/var/lib/rpm/rpmdb.sqlite") || existsSync("/var/lib/rpm/Packages")
      ? execa("rpm", ["-qa"], { reject: false, timeout: COMMAND_TIMEOUT_MS }).then(
          ({ stdout }) => countLines(stdout),
        )
      : Promise.resolve(0),
    countDir("/var/lib/flatpak/app"),
  ]);
  const counts = Object.entries({ pacman, dpkg, rpm, flatpak })
    .filter(([, count]) => count > 0)
    .map(([manager, count]) => `${count} (${manager})`);
  return counts.length > 0 ? counts.join(" | ") : "unknown";
}
