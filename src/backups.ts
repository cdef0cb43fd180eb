import { existsSync, readdirSync, readFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import { fileModeOrDefault, writeFileAtomicSync } from "./fs-utils.js";

const BACKUP_MARKER = ".bak.";
const MAX_SAME_SECOND_BACKUPS = 99;
const BACKUP_SUFFIX = /^\d{8}-\d{6}(-\d{2})?$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD-HHMMSS`. */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function nextBackupPath(path: string, now: Date): string {
  const base = `${path}${BACKUP_MARKER}${formatBackupTimestamp(now)}`;
  if (!existsSync(base)) return base;
  // Same-second backups get a counter so an earlier snapshot is never replaced.
  for (let counter = 1; counter <= MAX_SAME_SECOND_BACKUPS; counter += 1) {
    const candidate = `${base}-${pad(counter)}`;
    if (!existsSync(candidate)) return candidate;
  }
  throw new Error(`Too many backups of ${path} within one second`);
}

/**
 * Copies `path` to a new timestamped sibling and returns the backup path.
 * Throws when the copy cannot be made.
 */
export function createBackup(path: string, now: Date = new Date()): string {
  const content = readFileSync(path, "utf8");
  const target = nextBackupPath(path, now);
  writeFileAtomicSync(target, content, { mode: fileModeOrDefault(path, 0o600) });
  return target;
}

/** Timestamped backups of `path`, oldest first. */
export function listBackups(path: string): string[] {
  const dir = dirname(path);
  const prefix = `${basename(path)}${BACKUP_MARKER}`;
  let names: string[];
  try {
    names = readdirSync(dir);
  } catch {
    return [];
  }
  return names
    .filter((name) => name.startsWith(prefix) && BACKUP_SUFFIX.test(name.slice(prefix.length)))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(dir, name));
}

export function latestBackup(path: string): string | null {
  const backups = listBackups(path);
  return backups.length > 0 ? backups[backups.length - 1] : null;
}

/**
 * Writes `backupPath`'s content over `path`, after backing up the current
 * content of `path` when it exists.
 */
export function restoreFromBackup(
  path: string,
  backupPath: string,
  now: Date = new Date()
): { backup: string | null } {
  const content = readFileSync(backupPath, "utf8");
  const backup = existsSync(path) ? createBackup(path, now) : null;
  writeFileAtomicSync(path, content, {
    mode: fileModeOrDefault(path, fileModeOrDefault(backupPath, 0o644)),
    createParents: true,
  });
  return { backup };
}
