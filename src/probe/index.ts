import { ResultAsync } from "neverthrow";
import { type AppError, buildError, ErrorCode } from "../domain/errors";
import { type Section, section } from "../domain/types";
import { kernel, osName, uptime } from "./core";
import { cpu, gpu, memory, storage } from "./hardware";
import {
  packages,
  shell,
  terminalName,
  ui,
  windowManager,
} from "./userspace";

export const UNKNOWN = "unknown";

export interface CollectOptions {
  nerdFont: boolean;
  env?: NodeJS.ProcessEnv;
  /** Called for each probe that rejected; its value becomes "unknown". */
  onError?: (error: AppError) => void;
}

/** Resolve a probe to its value, or to UNKNOWN after reporting the failure. */
export function settle(
  label: string,
  probe: () => Promise<string>,
  onError?: (error: AppError) => void,
): Promise<string> {
  return ResultAsync.fromPromise(Promise.resolve().then(probe), (e) =>
    buildError(ErrorCode.PROBE_FAILED, `${label} probe failed`, e),
  ).match(
    (value) => value,
    (error) => {
      onError?.(error);
      return UNKNOWN;
    },
  );
}

/** Run every probe concurrently and group the results into sections. */
export async function collectSections(options: CollectOptions): Promise<Section[]> {
  const env = options.env ?? process.env;
  const run = (label: string, probe: () => Promise<string>) =>
    settle(label, probe, options.onError);

  const [os, kernelRelease, up, cpuModel, gpuModel, mem, disk, pkgs, sh, desktop] =
    await Promise.all([
      run("OS", osName),
      run("Kernel", kernel),
      run("Uptime", uptime),
      run("CPU", cpu),
      run("GPU", gpu),
      run("Memory", () => memory(options.nerdFont)),
      run("Storage", () => storage(options.nerdFont)),
      run("Packages", packages),
      run("Shell", () => shell(env)),
      run("UI", () => ui(env)),
    ]);

  return [
    section("Core", [
      ["OS", os],
      ["Kernel", kernelRelease],
      ["Uptime", up],
    ]),
    section("Hardware", [
      ["CPU", cpuModel],
      ["GPU", gpuModel],
      ["Memory", mem],
      ["Storage", disk],
    ]),
    section("Userspace", [
      ["Packages", pkgs],
      ["Terminal", terminalName(env)],
      ["Shell", sh],
      ["WM", windowManager(env)],
      ["UI", desktop],
    ]),
  ];
}
