import { readFile } from "node:fs/promises";
import * as os from "node:os";

/** PRETTY_NAME from an os-release file, unquoted. */
export function parseOsRelease(contents: string): string | null {
  for (const line of contents.split("\n")) {
    if (line.startsWith("PRETTY_NAME=")) {
      return line
        .slice("PRETTY_NAME=".length)
        .trim()
        .replace(/^["']|["']$/g, "");
    }
  }
  return null;
}

/** `12h 4m`, or `4m` under an hour. */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

export async function osName(): Promise<string> {
  if (process.platform !== "linux") return os.type();
  const contents = await readFile("/etc/os-release", "utf-8").catch(() => "");
  return parseOsRelease(contents) ?? "Linux";
}

export async function kernel(): Promise<string> {
  return os.release();
}

export async function uptime(): Promise<string> {
  return formatUptime(os.uptime());
}
