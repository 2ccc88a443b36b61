import { readFile, statfs } from "node:fs/promises";
import * as os from "node:os";
import { execa } from "execa";
import { createBar } from "../domain/bar";

const COMMAND_TIMEOUT_MS = 2000;

/**
 * Trim a CPU model string: drops integrated-graphics suffixes
 * ("with Radeon Graphics", "w/ ..."), "N-Core" words and "Processor".
 */
export function cleanCpuModel(model: string): string {
  const words = model.trim().split(/\s+/);
  const gpuStart = words.findIndex((w) => /^(with|w\/)$/i.test(w));
  return (gpuStart === -1 ? words : words.slice(0, gpuStart))
    .filter((w) => !w.endsWith("-Core") && w !== "Processor")
    .join(" ");
}

/** cpuinfo_max_freq is in kHz. */
export function formatBoostClock(khz: number): string {
  return `@ ${(khz / 1_000_000).toFixed(2)}GHz`;
}

export interface MemInfo {
  totalKb: number;
  availableKb: number;
}

export function parseMeminfo(contents: string): MemInfo | null {
  const field = (name: string) => {
    const match = new RegExp(`^${name}:\\s+(\\d+)`, "m").exec(contents);
    return match?.[1] === undefined ? null : Number(match[1]);
  };
  const totalKb = field("MemTotal");
  const availableKb = field("MemAvailable");
  if (totalKb === null || availableKb === null || totalKb <= 0) return null;
  return { totalKb, availableKb };
}

/** `[====      ] 6GB/16GB`, decimal gigabytes. */
export function formatMemory(mem: MemInfo, nerdFont: boolean): string {
  const usedKb = Math.max(0, mem.totalKb - mem.availableKb);
  const percent = (usedKb / mem.totalKb) * 100;
  const gb = (kb: number) => (kb / 1_000_000).toFixed(0);
  return `${createBar(percent, nerdFont)} ${gb(usedKb)}GB/${gb(mem.totalKb)}GB`;
}

export async function cpu(): Promise<string> {
  const cores = os.cpus();
  const model = cores[0]?.model;
  if (!model) return "unknown";
  const maxFreq = await readFile(
    "/sys/devices/system/cpu/cpu0/cpufreq/cpuinfo_max_freq",
    "utf-8",
  ).catch(() => "");
  const khz = Number.parseInt(maxFreq.trim(), 10);
  const parts = [cleanCpuModel(model), `(${cores.length})`];
  if (Number.isFinite(khz) && khz > 0) parts.push(formatBoostClock(khz));
  return parts.join(" ");
}

export async function memory(nerdFont: boolean): Promise<string> {
  const meminfo = await readFile("/proc/meminfo", "utf-8").catch(() => "");
  const mem = parseMeminfo(meminfo) ?? {
    totalKb: os.totalmem() / 1000,
    availableKb: os.freemem() / 1000,
  };
  return formatMemory(mem, nerdFont);
}

const GPU_CLASSES = ["VGA compatible controller", "3D controller"];

function shortVendor(vendor: string): string {
  if (vendor.includes("Advanced Micro Devices") || vendor.includes("AMD")) {
    return "AMD";
  }
  if (vendor.includes("NVIDIA")) return "NVIDIA";
  if (vendor.includes("Intel")) return "Intel";
  return vendor;
}

/**
 * First discrete display controller in `lspci -mm` output, as
 * `<vendor> <device>`. Integrated graphics are skipped.
 */
export function parseLspciGpu(output: string): string | null {
  for (const line of output.split("\n")) {
    if (!GPU_CLASSES.some((cls) => line.includes(cls))) continue;
    // Quoted fields: class, vendor, device, ...
    const fields = line.split('"').filter((_, i) => i % 2 === 1);
    const [, vendor, device] = fields;
    if (vendor === undefined || device === undefined) continue;
    if (device.includes("Processor") || device.includes("Integrated")) continue;
    return `${shortVendor(vendor)} ${device}`;
  }
  return null;
}

export async function gpu(): Promise<string> {
  const { stdout } = await execa("lspci", ["-mm"], {
    reject: false,
    timeout: COMMAND_TIMEOUT_MS,
  });
  return parseLspciGpu(stdout) ?? "unknown";
}

/** Mount points of real block devices in /proc/mounts, one per device. */
export function parseMounts(contents: string): string[] {
  const seen = new Set<string>();
  const mountPoints: string[] = [];
  for (const line of contents.split("\n")) {
    const [device, mountPoint] = line.split(" ");
    if (device === undefined || mountPoint === undefined) continue;
    if (!device.startsWith("/dev/") || device.includes("/loop")) continue;
    if (seen.has(device)) continue;
    seen.add(device);
    // Spaces and tabs arrive octal-escaped, e.g. `\040`.
    mountPoints.push(
      mountPoint.replace(/\\([0-7]{3})/g, (_, octal: string) =>
        String.fromCharCode(Number.parseInt(octal, 8)),
      ),
    );
  }
  return mountPoints;
}

/** `[===       ] 120GB/512GB`; totals of 1000GB and up switch to TB. */
export function formatStorage(
  usedBytes: number,
  totalBytes: number,
  nerdFont: boolean,
): string {
  const bar = createBar((usedBytes / totalBytes) * 100, nerdFont);
  const usedGb = usedBytes / 1e9;
  const totalGb = totalBytes / 1e9;
  if (totalGb < 1000) {
    return `${bar} ${usedGb.toFixed(0)}GB/${totalGb.toFixed(0)}GB`;
  }
  const totalTb = totalGb / 1000;
  const tb =
    Math.abs(totalTb - Math.round(totalTb)) < 0.005
      ? `${Math.round(totalTb)}TB`
      : `${totalTb.toFixed(2)}TB`;
  return `${bar} ${usedGb.toFixed(0)}GB/${tb}`;
}

/** Usage summed over every mounted physical disk. */
export async function storage(nerdFont: boolean): Promise<string> {
  const mounts = parseMounts(await readFile("/proc/mounts", "utf-8"));
  const stats = await Promise.all(
    mounts.map((mountPoint) => statfs(mountPoint).catch(() => null)),
  );
  let total = 0;
  let used = 0;
  for (const stat of stats) {
    if (stat === null) continue;
    total += stat.blocks * stat.bsize;
    used += (stat.blocks - stat.bfree) * stat.bsize;
  }
  return total > 0 ? formatStorage(used, total, nerdFont) : "unknown";
}
