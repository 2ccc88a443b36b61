import { existsSync } from "node:fs";
import * as path from "node:path";
import { err, ok, type Result } from "neverthrow";
import { type AppError, buildError, ErrorCode } from "../domain/errors";

const APC_START = "\u001B_G";
const APC_END = "\u001B\\";

/** Kitty itself, or a terminal that speaks its graphics protocol. */
export function supportsKittyGraphics(
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.KITTY_WINDOW_ID !== undefined) return true;
  const term = env.TERM ?? "";
  if (term.includes("kitty") || term.includes("ghostty")) return true;
  return (env.TERM_PROGRAM ?? "").toLowerCase().includes("ghostty");
}

/** Absolute path of an existing image file. */
export function resolveImagePath(
  imagePath: string,
  cwd: string = process.cwd(),
): Result<string, AppError> {
  const absolute = path.resolve(cwd, imagePath);
  if (!existsSync(absolute)) {
    return err(
      buildError(
        ErrorCode.FILE_READ_FAILED,
        `Image file not found: ${absolute}`,
      ),
    );
  }
  return ok(absolute);
}

/**
 * Transmit-and-display command that has the terminal read a PNG from disk
 * and scale it into `columns` x `rows` cells.
 */
export function kittyImageEscape(
  absolutePath: string,
  columns: number,
  rows: number,
): string {
  const payload = Buffer.from(absolutePath, "utf-8").toString("base64");
  return `${APC_START}a=T,f=100,t=f,c=${columns},r=${rows};${payload}${APC_END}`;
}
