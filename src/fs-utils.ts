import { chmodSync, mkdirSync, renameSync, rmSync, statSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { basename, dirname, join } from "node:path";

export interface AtomicWriteOptions {
  /** Permission bits of the new file. Defaults to the replaced file's, else 0o644. */
  mode?: number;
  createParents?: boolean;
}

/** Permission bits of `path`, or `fallback` when it cannot be stat'ed. */
export function fileModeOrDefault(path: string, fallback: number): number {
  try {
    return statSync(path).mode & 0o777;
  } catch {
    return fallback;
  }
}

/** Hidden sibling of `targetPath` in the same directory. */
function stagingPath(targetPath: string): string {
  const tag = `${process.pid}-${randomBytes(4).toString("hex")}`;
  return join(dirname(targetPath), `.${basename(targetPath)}.${tag}.tmp`);
}

/**
 * Replaces `targetPath` with `content` in one rename. Readers see either the
 * old file or the new one; a failed write leaves no staging file behind.
 */
export function writeFileAtomicSync(
  targetPath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  const mode = options.mode ?? fileModeOrDefault(targetPath, 0o644);
  if (options.createParents) {
    mkdirSync(dirname(targetPath), { recursive: true });
  }

  const staging = stagingPath(targetPath);
  try {
    writeFileSync(staging, content, { encoding: "utf8", mode, flag: "wx" });
    // The create mode is filtered through the umask.
    chmodSync(staging, mode);
    renameSync(staging, targetPath);
  } catch (err: unknown) {
    rmSync(staging, { force: true });
    throw err;
  }
}

export function writeJsonFileAtomicSync(targetPath: string, data: unknown, mode = 0o600): void {
  writeFileAtomicSync(targetPath, JSON.stringify(data), { mode });
}

/** Splits a text file into lines, ignoring the single trailing newline. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  return text.replace(/\r?\n$/, "").split(/\r?\n/);
}

export function joinLines(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}
